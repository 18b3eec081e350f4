import os from "node:os";

import { loadPipelineConfig } from "@photorelay/shared";

import { createPool, type DbPool } from "../src/db/pool.js";
import { MemoryBatchLedger, PgBatchLedger, type BatchLedger } from "../src/ledger/batchLedger.js";
import { PipelineEventLog } from "../src/pipeline/events.js";
import { BatchRunner } from "../src/pipeline/runBatch.js";
import { consoleLogger, systemClock } from "../src/pipeline/types.js";
import { createRemoteHost } from "../src/remote/createRemoteHost.js";
import { sendUdpBroadcast } from "../src/remote/wake.js";

// Usage: tsx scripts/send_batch.ts <photo> [<photo> ...]
async function run(): Promise<void> {
  const files = process.argv.slice(2).filter((arg) => !arg.startsWith("--"));
  if (files.length === 0) throw new Error("usage: send_batch <photo> [<photo> ...]");

  const homeDir = process.env.PHOTO_RELAY_HOME?.trim() || os.homedir();
  const cfg = await loadPipelineConfig(process.env.PIPELINE_CONFIG_PATH?.trim() || undefined);
  const log = consoleLogger("send_batch");
  const databaseUrl = process.env.DATABASE_URL?.trim();
  const pool: DbPool | undefined = databaseUrl ? createPool(databaseUrl) : undefined;
  const ledger: BatchLedger = pool ? new PgBatchLedger(pool) : new MemoryBatchLedger();
  const host = createRemoteHost(cfg, homeDir, log);
  const events = new PipelineEventLog();
  const runner = new BatchRunner({
    cfg,
    host,
    ledger,
    events,
    log,
    clock: systemClock,
    wake: sendUdpBroadcast,
    homeDir,
  });

  const stop = (): void => {
    runner.cancel();
  };
  process.once("SIGINT", stop);

  try {
    const submitted = await runner.submit(files.map((p) => ({ path: p })));
    for (const failure of submitted.failures) {
      log.warn({ event: "staging.failure", ...failure });
    }
    await runner.idle();
    const record = await ledger.get(submitted.batch_id);
    // eslint-disable-next-line no-console
    console.log(JSON.stringify(record, null, 2));
    if (record?.status === "failed") process.exitCode = 1;
  } finally {
    process.off("SIGINT", stop);
    await runner.close();
    await host.close();
    await pool?.end();
  }
}

run().catch((err) => {
  // eslint-disable-next-line no-console
  console.error(err instanceof Error ? err.message : err);
  process.exitCode = 1;
});
