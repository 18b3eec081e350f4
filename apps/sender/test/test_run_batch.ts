import assert from "node:assert/strict";
import { readFile, readdir, writeFile } from "node:fs/promises";
import path from "node:path";

import { BatchIdConflictError, BatchNotFoundError, fileExists, newBatchId, parseCompletionManifest } from "@photorelay/shared";

import { MemoryBatchLedger } from "../src/ledger/batchLedger.js";
import { PipelineEventLog } from "../src/pipeline/events.js";
import { BatchRunner } from "../src/pipeline/runBatch.js";
import type { RemoteHost } from "../src/remote/remoteHost.js";
import { LocalRemoteHost } from "../src/remote/localRemoteHost.js";
import { FakeReceiverHost, IMPORT_TIME } from "./fakeReceiver.js";
import { FakeClock, MemoryLog, makeHome, testConfig, writePhoto } from "./helpers.js";

function makeRunner(home: string, host: RemoteHost, overrides: Record<string, Record<string, unknown>> = {}) {
  const clock = new FakeClock();
  const ledger = new MemoryBatchLedger(() => new Date(clock.now()).toISOString());
  const events = new PipelineEventLog(1000, () => new Date(clock.now()).toISOString());
  const log = new MemoryLog();
  const runner = new BatchRunner({
    cfg: testConfig(overrides),
    host,
    ledger,
    events,
    log,
    clock,
    wake: async () => {
      throw new Error("local destinations are never woken");
    },
    homeDir: home,
  });
  return { clock, ledger, events, log, runner };
}

async function testHappyPath(): Promise<void> {
  const home = await makeHome("run");
  const host = new FakeReceiverHost(home);
  const { clock, ledger, events, runner } = makeRunner(home, host);
  const harbor = await writePhoto(path.join(home, "edits"), "harbor.heic", "harbor-photo");
  const light = await writePhoto(path.join(home, "edits"), "lighthouse.jpg", "lighthouse");
  const batchId = newBatchId(new Date(clock.now()));

  const submitted = await runner.submit([{ path: harbor }, { path: light }]);
  assert.deepEqual(submitted, { batch_id: batchId, staged_count: 2, timeout_sec: 60, failures: [] });
  await runner.idle();

  assert.equal(host.imports, 1);
  assert.deepEqual(
    events.list().map((e) => e.event_type),
    [
      "batch.staged",
      "batch.transfer.started",
      "batch.transfer.progress",
      "batch.transfer.progress",
      "batch.awaiting_import",
      "batch.imported",
      "batch.processed",
      "batch.purged",
    ],
  );
  const progress = events.list().filter((e) => e.event_type === "batch.transfer.progress");
  assert.deepEqual(
    progress.map((e) => e.data.percent),
    [50, 100],
  );
  const imported = events.list().find((e) => e.event_type === "batch.imported");
  assert.equal(imported?.data.count, 2);
  assert.deepEqual(imported?.data.warnings, []);

  const record = await ledger.get(batchId);
  assert.equal(record?.status, "purged");
  assert.equal(record?.imported_count, 2);

  const localCopy = parseCompletionManifest(
    JSON.parse(await readFile(path.join(home, "reports", `manifest_${batchId}.json`), "utf8")),
  );
  assert.deepEqual(localCopy?.files, [
    { filename: "harbor.heic", original_path: harbor, import_time: IMPORT_TIME },
    { filename: "lighthouse.jpg", original_path: light, import_time: IMPORT_TIME },
  ]);

  assert.equal(await fileExists(path.join(home, "ToSend", batchId)), false);
  assert.deepEqual(await readdir(path.join(home, "ProcessedPhotos")), []);
  assert.equal(await fileExists(path.join(home, "ImportReports", `manifest_${batchId}.json`)), false);
  await runner.close();
}

async function testPendingThenRecheck(): Promise<void> {
  const home = await makeHome("run-pending");
  const host = new LocalRemoteHost(home);
  const { clock, ledger, events, runner } = makeRunner(home, host, {
    transfer: { timeout_per_photo: 5 },
    cleanup: { keep_successful_days: 7 },
  });
  const harbor = await writePhoto(path.join(home, "edits"), "harbor.heic", "harbor-photo");
  const { batch_id: batchId, timeout_sec } = await runner.submit([{ path: harbor }]);
  assert.equal(timeout_sec, 5);
  await runner.idle();

  const pending = await ledger.get(batchId);
  assert.equal(pending?.status, "pending");
  assert.equal(pending?.last_error, "completion manifest not seen within 5s");
  assert.equal(await fileExists(path.join(home, "ToSend", batchId)), true);
  assert.equal(await fileExists(path.join(home, "IncomingPhotos", batchId, ".ready")), true);
  assert.equal(events.list().at(-1)?.event_type, "batch.pending");

  // Nothing landed yet: a recheck leaves it pending.
  assert.equal((await runner.recheck(batchId)).status, "pending");

  await writeFile(
    path.join(home, "ImportReports", `manifest_${batchId}.json`),
    JSON.stringify({
      batch_id: batchId,
      timestamp: "2026-03-14T10:02:00Z",
      count: 1,
      files: [
        {
          filename: "harbor.heic",
          original_path: harbor,
          import_time: "2026-03-14T10:02:00Z",
          warning: "Could not map to original path",
        },
      ],
      warnings: [`No mapping found for ${path.join(home, "IncomingPhotos", batchId, "harbor.heic")}`],
    }),
  );
  clock.current += 60_000;
  const rechecked = await runner.recheck(batchId);
  assert.equal(rechecked.status, "imported");
  assert.equal(rechecked.imported_count, 1);
  assert.equal(rechecked.last_error, null);
  assert.deepEqual(rechecked.warnings, [
    `No mapping found for ${path.join(home, "IncomingPhotos", batchId, "harbor.heic")}`,
  ]);
  // keep_successful_days holds the batch's files.
  assert.equal(await fileExists(path.join(home, "ToSend", batchId)), true);

  await assert.rejects(runner.recheck("20200101_000000"), BatchNotFoundError);
  await runner.close();
}

async function testTransferFailure(): Promise<void> {
  const home = await makeHome("run-fail");
  const host = new FakeReceiverHost(home);
  host.failUploads = true;
  const { ledger, events, runner } = makeRunner(home, host, { transfer: { retry_count: 0 } });
  const harbor = await writePhoto(path.join(home, "edits"), "harbor.heic", "harbor-photo");
  const { batch_id: batchId } = await runner.submit([{ path: harbor }]);
  await runner.idle();

  const failed = events.list().find((e) => e.event_type === "batch.failed");
  assert.deepEqual(failed?.data, {
    kind: "transfer",
    retryable: true,
    message: "failed to transfer harbor.heic: disk full",
  });
  const record = await ledger.get(batchId);
  // keep_failed_days 0 purges straight away.
  assert.equal(record?.status, "purged");
  assert.equal(record?.last_error, "failed to transfer harbor.heic: disk full");
  assert.equal(await fileExists(path.join(home, "IncomingPhotos", batchId)), false);
  assert.equal(host.imports, 0);
  await runner.close();
}

async function testSameSecondConflict(): Promise<void> {
  const home = await makeHome("run-conflict");
  const host = new FakeReceiverHost(home);
  const { runner } = makeRunner(home, host);
  const harbor = await writePhoto(path.join(home, "edits"), "harbor.heic", "harbor-photo");
  await runner.submit([{ path: harbor }]);
  await assert.rejects(runner.submit([{ path: harbor }]), BatchIdConflictError);
  await runner.idle();
  await runner.close();
}

async function testCancelThenRetry(): Promise<void> {
  const home = await makeHome("run-cancel");
  const host = new FakeReceiverHost(home);
  host.blockUploads = true;
  const { ledger, events, runner } = makeRunner(home, host);
  const harbor = await writePhoto(path.join(home, "edits"), "harbor.heic", "harbor-photo");
  const started = host.uploadStarted();
  const { batch_id: batchId } = await runner.submit([{ path: harbor }]);
  await started;

  assert.equal(runner.isActive(batchId), true);
  assert.deepEqual(runner.cancel(batchId), [batchId]);
  await runner.idle();

  const staged = await ledger.get(batchId);
  assert.equal(staged?.status, "staged");
  assert.equal(staged?.last_error, "transfer aborted: cancelled");
  const aborted = events.list().find((e) => e.event_type === "batch.transfer.aborted");
  assert.deepEqual(aborted?.data, { reason: "cancelled" });
  assert.equal(await fileExists(path.join(home, "IncomingPhotos", batchId, ".ready")), false);

  host.blockUploads = false;
  await runner.retry(batchId);
  await runner.idle();
  assert.equal((await ledger.get(batchId))?.status, "purged");
  assert.equal(host.imports, 1);
  await runner.close();
}

async function main(): Promise<void> {
  await testHappyPath();
  await testPendingThenRecheck();
  await testTransferFailure();
  await testSameSecondConflict();
  await testCancelThenRetry();
}

main().catch((err) => {
  // eslint-disable-next-line no-console
  console.error(err instanceof Error ? err.stack || err.message : String(err));
  process.exitCode = 1;
});
