import type { FastifyInstance } from "fastify";

import { isBatchId, isBatchStatus, type BatchStatus, type PipelineConfig } from "@photorelay/shared";

import type { BatchLedger } from "../../ledger/batchLedger.js";
import type { BatchRunner } from "../../pipeline/runBatch.js";
import { inspectRemoteBatch } from "../../pipeline/remoteState.js";
import type { StageInput } from "../../pipeline/staging.js";
import type { RemoteHost } from "../../remote/remoteHost.js";
import { buildErrorPayload, sendError, sendPipelineError } from "../errors.js";

export interface BatchRouteDeps {
  runner: BatchRunner;
  ledger: BatchLedger;
  host: RemoteHost;
  cfg: Readonly<PipelineConfig>;
}

const SHA256_HEX = /^[0-9a-f]{64}$/i;

/** Accepts `"path"` or `{ path, sha256? }` entries. */
export function parseStageInputs(raw: unknown): StageInput[] | null {
  if (!Array.isArray(raw) || raw.length === 0) return null;
  const out: StageInput[] = [];
  for (const item of raw) {
    if (typeof item === "string" && item.trim().length) {
      out.push({ path: item.trim() });
      continue;
    }
    if (!item || typeof item !== "object" || Array.isArray(item)) return null;
    const entry: Record<string, unknown> = Object.fromEntries(Object.entries(item));
    if (typeof entry.path !== "string" || !entry.path.trim().length) return null;
    if (entry.sha256 !== undefined && (typeof entry.sha256 !== "string" || !SHA256_HEX.test(entry.sha256))) {
      return null;
    }
    out.push({
      path: entry.path.trim(),
      sha256: typeof entry.sha256 === "string" ? entry.sha256.toLowerCase() : undefined,
    });
  }
  return out;
}

function parseStatuses(raw: string | undefined): BatchStatus[] | null {
  if (!raw) return [];
  const statuses: BatchStatus[] = [];
  for (const part of raw.split(",")) {
    const v = part.trim();
    if (!v) continue;
    if (!isBatchStatus(v)) return null;
    statuses.push(v);
  }
  return statuses;
}

function parseLimit(raw: string | undefined): number | null {
  if (!raw) return 100;
  const n = Number(raw);
  if (!Number.isInteger(n) || n <= 0) return null;
  return Math.min(n, 500);
}

export async function registerBatchRoutes(app: FastifyInstance, deps: BatchRouteDeps): Promise<void> {
  app.post<{ Body: { files?: unknown } }>("/v1/batches", async (req, reply) => {
    const files = parseStageInputs(req.body?.files);
    if (!files) {
      return sendError(reply, buildErrorPayload("invalid_request", { field: "files" }));
    }
    try {
      const result = await deps.runner.submit(files);
      return reply.code(201).send(result);
    } catch (err) {
      return sendPipelineError(reply, err);
    }
  });

  app.get<{ Querystring: { status?: string; limit?: string } }>("/v1/batches", async (req, reply) => {
    const statuses = parseStatuses(req.query.status);
    const limit = parseLimit(req.query.limit);
    if (!statuses || limit === null) {
      return sendError(reply, buildErrorPayload("invalid_request", { field: statuses ? "limit" : "status" }));
    }
    const batches = await deps.ledger.list({ statuses, limit });
    return { batches };
  });

  app.get<{ Params: { batchId: string } }>("/v1/batches/:batchId", async (req, reply) => {
    const batchId = req.params.batchId;
    if (!isBatchId(batchId)) {
      return sendError(reply, buildErrorPayload("invalid_request", { field: "batch_id" }));
    }
    const batch = await deps.ledger.get(batchId);
    if (!batch) {
      return sendError(reply, buildErrorPayload("batch_not_found", { batch_id: batchId }));
    }
    return { batch, active: deps.runner.isActive(batchId) };
  });

  app.get<{ Params: { batchId: string } }>("/v1/batches/:batchId/remote", async (req, reply) => {
    const batchId = req.params.batchId;
    if (!isBatchId(batchId)) {
      return sendError(reply, buildErrorPayload("invalid_request", { field: "batch_id" }));
    }
    try {
      return await inspectRemoteBatch(deps.host, deps.cfg, batchId);
    } catch (err) {
      return sendPipelineError(reply, err);
    }
  });

  app.post<{ Params: { batchId: string } }>("/v1/batches/:batchId/recheck", async (req, reply) => {
    const batchId = req.params.batchId;
    if (!isBatchId(batchId)) {
      return sendError(reply, buildErrorPayload("invalid_request", { field: "batch_id" }));
    }
    try {
      const batch = await deps.runner.recheck(batchId);
      return { batch };
    } catch (err) {
      return sendPipelineError(reply, err);
    }
  });

  app.post<{ Params: { batchId: string } }>("/v1/batches/:batchId/retry", async (req, reply) => {
    const batchId = req.params.batchId;
    if (!isBatchId(batchId)) {
      return sendError(reply, buildErrorPayload("invalid_request", { field: "batch_id" }));
    }
    try {
      const batch = await deps.runner.retry(batchId);
      return reply.code(202).send({ batch, queued: deps.runner.isActive(batchId) });
    } catch (err) {
      return sendPipelineError(reply, err);
    }
  });
}
