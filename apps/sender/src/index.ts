import { loadPipelineConfig } from "@photorelay/shared";

import { loadConfig } from "./config.js";
import { createPool } from "./db/pool.js";
import { PgBatchLedger } from "./ledger/batchLedger.js";
import { createRemoteHost } from "./remote/createRemoteHost.js";
import { buildServer } from "./server.js";

async function main(): Promise<void> {
  const config = loadConfig();
  const pipeline = await loadPipelineConfig(config.pipelineConfigPath);
  const pool = createPool(config.databaseUrl);
  const ledger = new PgBatchLedger(pool);
  const { app } = await buildServer({
    config,
    pipeline,
    ledger,
    pool,
    host: (log) => createRemoteHost(pipeline, config.homeDir, log),
  });

  await app.listen({
    host: "0.0.0.0",
    port: config.port,
  });
}

main().catch((err) => {
  // Avoid logging env, but keep the message.
  // eslint-disable-next-line no-console
  console.error(err instanceof Error ? err.message : err);
  process.exitCode = 1;
});
