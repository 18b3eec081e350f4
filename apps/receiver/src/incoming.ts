import type { Dirent } from "node:fs";
import fs from "node:fs/promises";
import path from "node:path";

import {
  ProtocolViolationError,
  READY_MARKER_NAME,
  TRANSFER_MANIFEST_NAME,
  compareBatchIds,
  completionManifestName,
  errnoCode,
  expandHome,
  fileExists,
  isBatchId,
  parseTransferManifest,
  type BatchId,
  type PipelineConfig,
  type TransferManifest,
} from "@photorelay/shared";

export interface ReceiverPaths {
  homeDir: string;
  incoming: string;
  processed: string;
  reports: string;
}

export function resolveReceiverPaths(cfg: Readonly<PipelineConfig>, homeDir: string): ReceiverPaths {
  return {
    homeDir,
    incoming: expandHome(cfg.paths.remote_incoming, homeDir),
    processed: expandHome(cfg.paths.remote_processed, homeDir),
    reports: expandHome(cfg.paths.remote_reports, homeDir),
  };
}

export type NextBatch = { kind: "idle" } | { kind: "ready"; batchId: BatchId; batchDir: string };

export interface ValidatedBatch {
  batchId: BatchId;
  batchDir: string;
  manifest: TransferManifest;
}

async function listBatchDirs(incoming: string): Promise<BatchId[]> {
  let entries: Dirent[];
  try {
    entries = await fs.readdir(incoming, { withFileTypes: true });
  } catch (err) {
    if (errnoCode(err) === "ENOENT") return [];
    throw err;
  }
  return entries
    .filter((e) => e.isDirectory() && isBatchId(e.name))
    .map((e) => e.name)
    .sort(compareBatchIds);
}

/**
 * Oldest batch that carries a ready marker and has no completion manifest
 * yet. Batches in `skip` are passed over.
 */
export async function findNextReadyBatch(
  paths: ReceiverPaths,
  skip: ReadonlySet<BatchId> = new Set(),
): Promise<NextBatch> {
  for (const batchId of await listBatchDirs(paths.incoming)) {
    if (skip.has(batchId)) continue;
    const batchDir = path.join(paths.incoming, batchId);
    if (!(await fileExists(path.join(batchDir, READY_MARKER_NAME)))) continue;
    if (await fileExists(path.join(paths.reports, completionManifestName(batchId)))) continue;
    return { kind: "ready", batchId, batchDir };
  }
  return { kind: "idle" };
}

/** Every batch directory present under the incoming root. */
export async function listIncomingBatches(paths: ReceiverPaths): Promise<BatchId[]> {
  return listBatchDirs(paths.incoming);
}

/** A ready batch must carry a readable transfer manifest before import. */
export async function validateBatch(paths: ReceiverPaths, batchId: BatchId): Promise<ValidatedBatch> {
  const batchDir = path.join(paths.incoming, batchId);
  let text: string;
  try {
    text = await fs.readFile(path.join(batchDir, TRANSFER_MANIFEST_NAME), "utf8");
  } catch (err) {
    if (errnoCode(err) === "ENOENT") {
      throw new ProtocolViolationError(`No transfer manifest found for batch ${batchId}`, batchId);
    }
    throw err;
  }

  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch {
    throw new ProtocolViolationError(`Transfer manifest for batch ${batchId} is not valid JSON`, batchId);
  }
  return { batchId, batchDir, manifest: parseTransferManifest(raw, batchId) };
}
