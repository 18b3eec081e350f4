import { ProtocolViolationError } from "./errors.js";
import type { BatchId } from "./ids.js";

export const READY_MARKER_NAME = ".ready";
export const TRANSFER_MANIFEST_NAME = "transfer_manifest.json";
export const IMPORT_LOG_NAME = "import.log";

export function completionManifestName(batchId: BatchId): string {
  return `manifest_${batchId}.json`;
}

/** `token` keeps concurrent writers for one batch off each other's temp file. */
export function completionManifestTempName(batchId: BatchId, token?: string): string {
  return token ? `.manifest_${batchId}_${token}_tmp.json` : `.manifest_${batchId}_tmp.json`;
}

export const TEMP_MANIFEST_PATTERN = /^\.manifest_.+_tmp\.json$/;

export interface TransferManifestEntry {
  remote_path: string;
  original_path: string;
}

export interface TransferManifest {
  batch_id?: BatchId;
  timestamp?: string;
  files: TransferManifestEntry[];
}

export interface CompletionRecord {
  filename: string;
  original_path: string;
  import_time: string;
  warning?: string;
}

export interface CompletionManifest {
  batch_id: BatchId;
  timestamp: string;
  count: number;
  files: CompletionRecord[];
  warnings?: string[];
}

function isRecord(raw: unknown): raw is Record<string, unknown> {
  return typeof raw === "object" && raw !== null && !Array.isArray(raw);
}

export function parseTransferManifest(raw: unknown, batchId?: BatchId): TransferManifest {
  if (!isRecord(raw) || !Array.isArray(raw.files)) {
    throw new ProtocolViolationError("transfer manifest must be an object with a files list", batchId);
  }

  const seen = new Set<string>();
  const files: TransferManifestEntry[] = [];
  for (const [idx, entry] of raw.files.entries()) {
    if (!isRecord(entry) || typeof entry.remote_path !== "string" || typeof entry.original_path !== "string") {
      throw new ProtocolViolationError(`transfer manifest entry ${idx} is missing remote_path or original_path`, batchId);
    }
    if (seen.has(entry.remote_path)) {
      throw new ProtocolViolationError(`duplicate remote_path in transfer manifest: ${entry.remote_path}`, batchId);
    }
    seen.add(entry.remote_path);
    files.push({ remote_path: entry.remote_path, original_path: entry.original_path });
  }

  const manifest: TransferManifest = { files };
  if (typeof raw.batch_id === "string") manifest.batch_id = raw.batch_id;
  if (typeof raw.timestamp === "string") manifest.timestamp = raw.timestamp;
  return manifest;
}

/** Returns null for anything that is not a well-formed completion manifest. */
export function parseCompletionManifest(raw: unknown): CompletionManifest | null {
  if (!isRecord(raw)) return null;
  if (typeof raw.batch_id !== "string" || typeof raw.timestamp !== "string") return null;
  if (!Array.isArray(raw.files)) return null;

  const files: CompletionRecord[] = [];
  for (const entry of raw.files) {
    if (!isRecord(entry)) return null;
    if (typeof entry.filename !== "string" || typeof entry.original_path !== "string") return null;
    const record: CompletionRecord = {
      filename: entry.filename,
      original_path: entry.original_path,
      import_time: typeof entry.import_time === "string" ? entry.import_time : raw.timestamp,
    };
    if (typeof entry.warning === "string") record.warning = entry.warning;
    files.push(record);
  }

  const manifest: CompletionManifest = {
    batch_id: raw.batch_id,
    timestamp: raw.timestamp,
    count: typeof raw.count === "number" ? raw.count : files.length,
    files,
  };
  if (Array.isArray(raw.warnings)) {
    manifest.warnings = raw.warnings.filter((w): w is string => typeof w === "string");
  }
  return manifest;
}

/** ISO-8601 UTC at second resolution, e.g. `2026-03-01T09:15:00Z`. */
export function formatManifestTimestamp(now: Date): string {
  return `${now.toISOString().slice(0, 19)}Z`;
}
