import { randomUUID } from "node:crypto";
import fs from "node:fs/promises";
import path from "node:path";

import {
  ReconciliationError,
  buildPathLookup,
  completionManifestName,
  completionManifestTempName,
  errnoCode,
  fileExists,
  formatManifestTimestamp,
  hasImageExtension,
  reconcileImportedFiles,
  safeMove,
  toErrorMessage,
  writeFileOnce,
  type BatchId,
  type CompletionManifest,
} from "@photorelay/shared";

import { validateBatch, type ReceiverPaths, type ValidatedBatch } from "./incoming.js";
import type { ReceiverLog } from "./log.js";

export interface ReconcileInput {
  paths: ReceiverPaths;
  batchId: BatchId;
  imageExtensions: readonly string[];
  log: ReceiverLog;
  now?: () => Date;
}

export type MoveResult = {
  processed_dir: string;
  moved: string[];
  failures: string[];
  removed_incoming: boolean;
};

export type ReconcileOutcome =
  | { status: "written"; manifest_path: string; manifest: CompletionManifest; move: MoveResult }
  | { status: "skipped"; reason: "manifest_exists"; manifest_path: string };

/** Image files directly inside the batch directory, sorted by name. */
export async function scanBatchImages(batchDir: string, extensions: readonly string[]): Promise<string[]> {
  const entries = await fs.readdir(batchDir, { withFileTypes: true });
  return entries
    .filter((e) => e.isFile() && hasImageExtension(e.name, extensions))
    .map((e) => path.join(batchDir, e.name))
    .sort();
}

/**
 * Moves every entry out of the incoming batch directory, dotfiles included,
 * and removes the directory only when all of them moved.
 */
export async function moveBatchToProcessed(
  paths: ReceiverPaths,
  batchId: BatchId,
  log: ReceiverLog,
): Promise<MoveResult> {
  const batchDir = path.join(paths.incoming, batchId);
  const processedDir = path.join(paths.processed, batchId);
  await fs.mkdir(processedDir, { recursive: true });

  const moved: string[] = [];
  const failures: string[] = [];
  const names = (await fs.readdir(batchDir)).sort();
  for (const name of names) {
    try {
      await safeMove(path.join(batchDir, name), path.join(processedDir, name));
      moved.push(name);
    } catch (err) {
      failures.push(`${name}:${toErrorMessage(err)}`);
    }
  }

  let removedIncoming = false;
  if (failures.length === 0) {
    try {
      await fs.rmdir(batchDir);
      removedIncoming = true;
    } catch (err) {
      if (errnoCode(err) !== "ENOTEMPTY" && errnoCode(err) !== "EEXIST") throw err;
      failures.push(`${batchId}:${toErrorMessage(err)}`);
    }
  }

  if (failures.length === 0) {
    await log.importLog(`Batch ${batchId} moved to processed`);
  } else {
    await log.importLog("WARNING - Could not move batch to processed");
    log.event("move_partial", batchId, { failures });
  }
  return { processed_dir: processedDir, moved, failures, removed_incoming: removedIncoming };
}

/**
 * Writes `manifest_<batchId>.json` for an imported batch, then moves the
 * batch into the processed root. The manifest is never rewritten.
 */
export async function reconcileBatch(input: ReconcileInput): Promise<ReconcileOutcome> {
  const { paths, batchId, log } = input;
  const now = input.now ?? (() => new Date());
  const manifestPath = path.join(paths.reports, completionManifestName(batchId));

  const skipped = (): ReconcileOutcome => {
    log.event("manifest_exists", batchId);
    return { status: "skipped", reason: "manifest_exists", manifest_path: manifestPath };
  };

  if (await fileExists(manifestPath)) return skipped();

  await log.importLog(`Creating manifest for batch: ${batchId}`);
  let validated: ValidatedBatch;
  let images: string[];
  try {
    validated = await validateBatch(paths, batchId);
    images = await scanBatchImages(validated.batchDir, input.imageExtensions);
  } catch (err) {
    // A concurrent run may have published and moved the batch meanwhile.
    if (await fileExists(manifestPath)) return skipped();
    await log.importLog(`ERROR - ${toErrorMessage(err)}`);
    throw err;
  }
  const { manifest: transfer } = validated;

  if (images.length === 0) {
    await log.importLog("ERROR - No image files found in batch");
    throw new ReconciliationError(`No image files found in batch ${batchId}`, batchId);
  }
  await log.importLog(`Found ${images.length} image files`);

  const importTime = formatManifestTimestamp(now());
  const { records, warnings } = reconcileImportedFiles(
    images,
    buildPathLookup(transfer, paths.homeDir),
    importTime,
  );
  const manifest: CompletionManifest = {
    batch_id: batchId,
    timestamp: importTime,
    count: records.length,
    files: records,
  };
  if (warnings.length > 0) manifest.warnings = warnings;

  await fs.mkdir(paths.reports, { recursive: true });
  const published = await writeFileOnce(
    manifestPath,
    `${JSON.stringify(manifest, null, 2)}\n`,
    path.join(paths.reports, completionManifestTempName(batchId, randomUUID())),
  );
  if (!published) return skipped();
  await log.importLog(`Manifest created: ${manifestPath}`);
  await log.importLog(`Successfully imported ${records.length} files from batch ${batchId}`);
  log.event("manifest_written", batchId, { count: records.length, warnings: warnings.length });

  const move = await moveBatchToProcessed(paths, batchId, log);
  return { status: "written", manifest_path: manifestPath, manifest, move };
}
