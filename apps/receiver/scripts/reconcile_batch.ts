import { isBatchId, loadPipelineConfig } from "@photorelay/shared";

import { loadReceiverConfig } from "../src/config.js";
import { findNextReadyBatch, resolveReceiverPaths } from "../src/incoming.js";
import { createReceiverLog } from "../src/log.js";
import { reconcileBatch } from "../src/reconcileBatch.js";

// Writes the completion manifest for an imported batch. Takes the batch id
// as the only argument, or picks the oldest ready batch without a manifest.
async function run(): Promise<void> {
  const config = loadReceiverConfig();
  const cfg = await loadPipelineConfig(config.pipelineConfigPath);
  const paths = resolveReceiverPaths(cfg, config.homeDir);
  const log = createReceiverLog(paths.reports);

  await log.importLog("=== Manifest generation script started ===");
  let batchId = process.argv[2];
  if (batchId !== undefined && !isBatchId(batchId)) {
    throw new Error(`invalid batch id: ${batchId}`);
  }
  if (batchId === undefined) {
    const next = await findNextReadyBatch(paths);
    if (next.kind === "idle") {
      await log.importLog("ERROR - No batch directory found that needs manifest");
      throw new Error("no batch needs a manifest");
    }
    batchId = next.batchId;
  }

  const outcome = await reconcileBatch({ paths, batchId, imageExtensions: cfg.import.image_extensions, log });
  await log.importLog("=== Manifest generation script completed ===");
  // eslint-disable-next-line no-console
  console.log(
    JSON.stringify(
      outcome.status === "written"
        ? { status: outcome.status, manifest_path: outcome.manifest_path, count: outcome.manifest.count, move: outcome.move }
        : outcome,
    ),
  );
}

run().catch((err) => {
  // eslint-disable-next-line no-console
  console.error(err instanceof Error ? err.message : err);
  process.exitCode = 1;
});
