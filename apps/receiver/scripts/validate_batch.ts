import { ProtocolViolationError, loadPipelineConfig } from "@photorelay/shared";

import { loadReceiverConfig } from "../src/config.js";
import { findNextReadyBatch, resolveReceiverPaths, validateBatch } from "../src/incoming.js";
import { createReceiverLog } from "../src/log.js";

// Prints the directory of the next ready batch for an external importer;
// prints nothing when there is none.
async function run(): Promise<void> {
  const config = loadReceiverConfig();
  const cfg = await loadPipelineConfig(config.pipelineConfigPath);
  const paths = resolveReceiverPaths(cfg, config.homeDir);
  const log = createReceiverLog(paths.reports);

  await log.importLog("=== Folder action triggered ===");
  const next = await findNextReadyBatch(paths);
  if (next.kind === "idle") {
    await log.importLog("No unprocessed batch directories found with .ready file");
    return;
  }
  await log.importLog(`Found unprocessed batch: ${next.batchId} in ${next.batchDir}`);

  try {
    await validateBatch(paths, next.batchId);
  } catch (err) {
    if (err instanceof ProtocolViolationError) {
      await log.importLog(`ERROR - ${err.message}`);
    }
    throw err;
  }
  await log.importLog(`Batch ${next.batchId} validated, proceeding to import`);
  // eslint-disable-next-line no-console
  console.log(next.batchDir);
}

run().catch((err) => {
  // eslint-disable-next-line no-console
  console.error(err instanceof Error ? err.message : err);
  process.exitCode = 1;
});
