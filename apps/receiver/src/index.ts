import fs from "node:fs/promises";

import { loadPipelineConfig } from "@photorelay/shared";

import { loadReceiverConfig } from "./config.js";
import { commandImportTrigger } from "./importer.js";
import { resolveReceiverPaths } from "./incoming.js";
import { createReceiverLog } from "./log.js";
import { ReceiverLoop } from "./watcher.js";

async function main(): Promise<void> {
  const config = loadReceiverConfig();
  const cfg = await loadPipelineConfig(config.pipelineConfigPath);
  const paths = resolveReceiverPaths(cfg, config.homeDir);
  for (const dir of [paths.incoming, paths.processed, paths.reports]) {
    await fs.mkdir(dir, { recursive: true });
  }

  const command = cfg.import.command;
  const loop = new ReceiverLoop({
    cfg,
    paths,
    log: createReceiverLog(paths.reports),
    importer: command ? commandImportTrigger(command, cfg.import.timeout_seconds) : undefined,
    rescanMs: config.rescanMs,
    stabilityMs: config.stabilityMs,
  });

  // eslint-disable-next-line no-console
  console.log(
    `[receiver] started (incoming=${paths.incoming}, reports=${paths.reports}, import=${command ? command.join(" ") : "external"}, rescan=${config.rescanMs}ms)`,
  );

  if (config.runOnce) {
    const { handled } = await loop.requestScan();
    // eslint-disable-next-line no-console
    console.log(`[receiver] run-once handled ${handled.length} batch(es)`);
    return;
  }

  loop.start();
  const shutdown = () => {
    loop.stop().catch((err) => {
      // eslint-disable-next-line no-console
      console.error(err instanceof Error ? err.message : err);
      process.exitCode = 1;
    });
  };
  process.once("SIGINT", shutdown);
  process.once("SIGTERM", shutdown);
}

main().catch((err) => {
  // eslint-disable-next-line no-console
  console.error(err instanceof Error ? err.message : err);
  process.exitCode = 1;
});
