import {
  BatchIdConflictError,
  BatchNotFoundError,
  InvalidBatchTransitionError,
  canTransitionBatch,
  isBatchStatus,
  type BatchId,
  type BatchRecord,
  type BatchStatus,
} from "@photorelay/shared";

import { timedQuery, withClient, withTransaction, type DbPool } from "../db/pool.js";

export interface CreateBatchInput {
  batch_id: BatchId;
  file_count: number;
  staged_dir: string;
  timeout_sec: number;
}

export interface BatchPatch {
  file_count?: number;
  timeout_sec?: number;
  imported_count?: number | null;
  warnings?: string[];
  last_error?: string | null;
}

export interface ListBatchesQuery {
  statuses?: BatchStatus[];
  /** ISO timestamp; only records last updated before it. */
  updated_before?: string;
  /** Default `newest`. */
  order?: "newest" | "oldest";
  /** Keyset cursor: the last batch id of the previous page. */
  after?: BatchId;
  limit?: number;
}

/**
 * Source-side record of every batch. Transitions outside the lifecycle table
 * are rejected.
 */
export interface BatchLedger {
  create(input: CreateBatchInput): Promise<BatchRecord>;
  get(batchId: BatchId): Promise<BatchRecord | null>;
  list(query?: ListBatchesQuery): Promise<BatchRecord[]>;
  transition(batchId: BatchId, to: BatchStatus, patch?: BatchPatch): Promise<BatchRecord>;
}

type BatchRow = {
  batch_id: string;
  status: string;
  file_count: number;
  staged_dir: string;
  timeout_sec: number;
  imported_count: number | null;
  warnings: unknown;
  last_error: string | null;
  created_at: Date;
  updated_at: Date;
};

const SELECT_COLUMNS = `batch_id, status, file_count, staged_dir, timeout_sec, imported_count,
  warnings, last_error, created_at, updated_at`;

function toRecord(row: BatchRow): BatchRecord {
  if (!isBatchStatus(row.status)) {
    throw new Error(`unknown batch status in ledger: ${row.status}`);
  }
  const warnings = Array.isArray(row.warnings)
    ? row.warnings.filter((w): w is string => typeof w === "string")
    : [];
  return {
    batch_id: row.batch_id,
    status: row.status,
    file_count: row.file_count,
    staged_dir: row.staged_dir,
    timeout_sec: row.timeout_sec,
    imported_count: row.imported_count,
    warnings,
    last_error: row.last_error,
    created_at: row.created_at.toISOString(),
    updated_at: row.updated_at.toISOString(),
  };
}

export function applyPatch(record: BatchRecord, to: BatchStatus, patch: BatchPatch, nowIso: string): BatchRecord {
  return {
    ...record,
    status: to,
    file_count: patch.file_count ?? record.file_count,
    timeout_sec: patch.timeout_sec ?? record.timeout_sec,
    imported_count: patch.imported_count !== undefined ? patch.imported_count : record.imported_count,
    warnings: patch.warnings ?? record.warnings,
    last_error: patch.last_error !== undefined ? patch.last_error : record.last_error,
    updated_at: nowIso,
  };
}

export class PgBatchLedger implements BatchLedger {
  constructor(private readonly pool: DbPool) {}

  async create(input: CreateBatchInput): Promise<BatchRecord> {
    return withClient(this.pool, async (client) => {
      const res = await timedQuery<BatchRow>(
        client,
        `INSERT INTO pipeline_batches (batch_id, status, file_count, staged_dir, timeout_sec)
         VALUES ($1, 'staged', $2, $3, $4)
         ON CONFLICT (batch_id) DO NOTHING
         RETURNING ${SELECT_COLUMNS}`,
        [input.batch_id, input.file_count, input.staged_dir, input.timeout_sec],
      );
      const row = res.rows[0];
      if (!row) throw new BatchIdConflictError(input.batch_id);
      return toRecord(row);
    });
  }

  async get(batchId: BatchId): Promise<BatchRecord | null> {
    return withClient(this.pool, async (client) => {
      const res = await timedQuery<BatchRow>(
        client,
        `SELECT ${SELECT_COLUMNS} FROM pipeline_batches WHERE batch_id = $1`,
        [batchId],
      );
      const row = res.rows[0];
      return row ? toRecord(row) : null;
    });
  }

  async list(query: ListBatchesQuery = {}): Promise<BatchRecord[]> {
    const limit = Math.min(Math.max(query.limit ?? 100, 1), 500);
    const oldestFirst = query.order === "oldest";
    const where: string[] = [];
    const values: unknown[] = [];
    if (query.statuses?.length) {
      values.push(query.statuses);
      where.push(`status = ANY($${values.length}::text[])`);
    }
    if (query.updated_before) {
      values.push(query.updated_before);
      where.push(`updated_at < $${values.length}::timestamptz`);
    }
    if (query.after) {
      values.push(query.after);
      where.push(`batch_id ${oldestFirst ? ">" : "<"} $${values.length}`);
    }
    values.push(limit);
    return withClient(this.pool, async (client) => {
      const res = await timedQuery<BatchRow>(
        client,
        `SELECT ${SELECT_COLUMNS} FROM pipeline_batches
         ${where.length ? `WHERE ${where.join(" AND ")}` : ""}
         ORDER BY batch_id ${oldestFirst ? "ASC" : "DESC"}
         LIMIT $${values.length}`,
        values,
      );
      return res.rows.map(toRecord);
    });
  }

  async transition(batchId: BatchId, to: BatchStatus, patch: BatchPatch = {}): Promise<BatchRecord> {
    return withTransaction(this.pool, async (client) => {
      const current = await timedQuery<BatchRow>(
        client,
        `SELECT ${SELECT_COLUMNS} FROM pipeline_batches WHERE batch_id = $1 FOR UPDATE`,
        [batchId],
      );
      const row = current.rows[0];
      if (!row) throw new BatchNotFoundError(batchId);
      const record = toRecord(row);
      if (!canTransitionBatch(record.status, to)) {
        throw new InvalidBatchTransitionError(batchId, record.status, to);
      }

      const next = applyPatch(record, to, patch, new Date().toISOString());
      const updated = await timedQuery<BatchRow>(
        client,
        `UPDATE pipeline_batches
         SET status = $2, file_count = $3, timeout_sec = $4, imported_count = $5,
             warnings = $6::jsonb, last_error = $7, updated_at = now()
         WHERE batch_id = $1
         RETURNING ${SELECT_COLUMNS}`,
        [
          batchId,
          next.status,
          next.file_count,
          next.timeout_sec,
          next.imported_count,
          JSON.stringify(next.warnings),
          next.last_error,
        ],
      );
      const updatedRow = updated.rows[0];
      if (!updatedRow) throw new BatchNotFoundError(batchId);
      return toRecord(updatedRow);
    });
  }
}

/** In-process ledger for the CLI scripts and tests. */
export class MemoryBatchLedger implements BatchLedger {
  private readonly records = new Map<BatchId, BatchRecord>();

  constructor(private readonly nowIso: () => string = () => new Date().toISOString()) {}

  async create(input: CreateBatchInput): Promise<BatchRecord> {
    if (this.records.has(input.batch_id)) throw new BatchIdConflictError(input.batch_id);
    const now = this.nowIso();
    const record: BatchRecord = {
      batch_id: input.batch_id,
      status: "staged",
      file_count: input.file_count,
      staged_dir: input.staged_dir,
      timeout_sec: input.timeout_sec,
      imported_count: null,
      warnings: [],
      last_error: null,
      created_at: now,
      updated_at: now,
    };
    this.records.set(record.batch_id, record);
    return { ...record };
  }

  async get(batchId: BatchId): Promise<BatchRecord | null> {
    const record = this.records.get(batchId);
    return record ? { ...record } : null;
  }

  async list(query: ListBatchesQuery = {}): Promise<BatchRecord[]> {
    const limit = Math.min(Math.max(query.limit ?? 100, 1), 500);
    const { statuses, updated_before: before, after } = query;
    const oldestFirst = query.order === "oldest";
    return [...this.records.values()]
      .filter((r) => !statuses?.length || statuses.includes(r.status))
      .filter((r) => !before || Date.parse(r.updated_at) < Date.parse(before))
      .filter((r) => !after || (oldestFirst ? r.batch_id > after : r.batch_id < after))
      .sort((a, b) => (oldestFirst ? a.batch_id.localeCompare(b.batch_id) : b.batch_id.localeCompare(a.batch_id)))
      .slice(0, limit)
      .map((r) => ({ ...r }));
  }

  async transition(batchId: BatchId, to: BatchStatus, patch: BatchPatch = {}): Promise<BatchRecord> {
    const record = this.records.get(batchId);
    if (!record) throw new BatchNotFoundError(batchId);
    if (!canTransitionBatch(record.status, to)) {
      throw new InvalidBatchTransitionError(batchId, record.status, to);
    }
    const next = applyPatch(record, to, patch, this.nowIso());
    this.records.set(batchId, next);
    return { ...next };
  }

  /** Rewrites updated_at, for aging batches in retention checks. */
  backdate(batchId: BatchId, updatedAtIso: string): void {
    const record = this.records.get(batchId);
    if (record) this.records.set(batchId, { ...record, updated_at: updatedAtIso });
  }
}
