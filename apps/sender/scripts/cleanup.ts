import { expandHome, loadPipelineConfig } from "@photorelay/shared";

import { loadConfig } from "../src/config.js";
import { createPool } from "../src/db/pool.js";
import { PgBatchLedger } from "../src/ledger/batchLedger.js";
import { CleanupEngine } from "../src/pipeline/cleanup.js";
import { PipelineEventLog } from "../src/pipeline/events.js";
import { consoleLogger, systemClock } from "../src/pipeline/types.js";
import { createRemoteHost } from "../src/remote/createRemoteHost.js";

async function run(): Promise<void> {
  const config = loadConfig();
  const cfg = await loadPipelineConfig(config.pipelineConfigPath);
  const log = consoleLogger("cleanup");
  const pool = createPool(config.databaseUrl);
  const host = createRemoteHost(cfg, config.homeDir, log);
  try {
    const engine = new CleanupEngine({
      cfg,
      host,
      ledger: new PgBatchLedger(pool),
      events: new PipelineEventLog(),
      log,
      clock: systemClock,
      stagingRoot: expandHome(cfg.paths.staging_dir, config.homeDir),
    });
    const report = await engine.runSweeps(systemClock.now());
    // eslint-disable-next-line no-console
    console.log(JSON.stringify(report));
  } finally {
    await host.close();
    await pool.end();
  }
}

run().catch((err) => {
  // eslint-disable-next-line no-console
  console.error(err instanceof Error ? err.message : err);
  process.exitCode = 1;
});
