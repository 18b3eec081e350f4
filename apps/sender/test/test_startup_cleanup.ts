import assert from "node:assert/strict";
import { mkdir, readdir, utimes } from "node:fs/promises";
import path from "node:path";

import type { AppConfig } from "../src/config.js";
import { MemoryBatchLedger } from "../src/ledger/batchLedger.js";
import { LocalRemoteHost } from "../src/remote/localRemoteHost.js";
import { buildServer } from "../src/server.js";
import { FakeClock, makeHome, testConfig, writePhoto } from "./helpers.js";

const HOUR = 60 * 60 * 1000;

async function readyBatch(incoming: string, batchId: string, clock: FakeClock, ageMs: number): Promise<void> {
  await writePhoto(path.join(incoming, batchId), "harbor.heic", "x");
  const marker = await writePhoto(path.join(incoming, batchId), ".ready", "");
  const when = new Date(clock.now() - ageMs);
  await utimes(marker, when, when);
}

async function testStartupCleanupRemovesAgedOrphans(): Promise<void> {
  const home = await makeHome("startup-cleanup");
  const clock = new FakeClock();
  const incoming = path.join(home, "IncomingPhotos");
  await mkdir(path.join(home, "ImportReports"), { recursive: true });

  const aged = "20260314_070000";
  const fresh = "20260314_092500";
  await readyBatch(incoming, aged, clock, 2 * HOUR);
  await readyBatch(incoming, fresh, clock, 5 * 60 * 1000);

  const ledger = new MemoryBatchLedger(() => new Date(clock.now()).toISOString());
  await ledger.create({ batch_id: aged, file_count: 1, staged_dir: path.join(home, "ToSend", aged), timeout_sec: 30 });
  for (const step of ["transferring", "awaiting_import", "pending"] as const) await ledger.transition(aged, step);

  const config: AppConfig = {
    port: 0,
    databaseUrl: "postgres://unused",
    homeDir: home,
    cleanupSweepEnabled: false,
    cleanupSweepIntervalMs: 60_000,
  };
  const { app, events } = await buildServer({
    config,
    pipeline: testConfig({ cleanup: { startup_cleanup: true } }),
    ledger,
    host: new LocalRemoteHost(home),
    clock,
    logger: false,
  });

  try {
    await app.ready();
    assert.deepEqual(await readdir(incoming), [fresh]);
    assert.deepEqual((await readdir(path.join(incoming, fresh))).sort(), [".ready", "harbor.heic"]);
    const record = await ledger.get(aged);
    assert.equal(record?.status, "purged");
    assert.equal(record?.last_error, "orphaned_incoming_removed");
    assert.deepEqual(
      events.list().map((e) => [e.event_type, e.batch_id]),
      [
        ["cleanup.orphan_removed", aged],
        ["cleanup.sweep", null],
      ],
    );
  } finally {
    await app.close();
  }
}

async function testStartupCleanupDisabledLeavesIncoming(): Promise<void> {
  const home = await makeHome("startup-cleanup-off");
  const clock = new FakeClock();
  const incoming = path.join(home, "IncomingPhotos");
  const aged = "20260314_070000";
  await readyBatch(incoming, aged, clock, 2 * HOUR);

  const { app, events } = await buildServer({
    config: {
      port: 0,
      databaseUrl: "postgres://unused",
      homeDir: home,
      cleanupSweepEnabled: false,
      cleanupSweepIntervalMs: 60_000,
    },
    pipeline: testConfig({ cleanup: { startup_cleanup: false } }),
    ledger: new MemoryBatchLedger(() => new Date(clock.now()).toISOString()),
    host: new LocalRemoteHost(home),
    clock,
    logger: false,
  });

  try {
    await app.ready();
    assert.deepEqual(await readdir(incoming), [aged]);
    assert.deepEqual(events.list(), []);
  } finally {
    await app.close();
  }
}

async function main(): Promise<void> {
  await testStartupCleanupRemovesAgedOrphans();
  await testStartupCleanupDisabledLeavesIncoming();
}

main().catch((err) => {
  // eslint-disable-next-line no-console
  console.error(err instanceof Error ? err.stack || err.message : String(err));
  process.exitCode = 1;
});
