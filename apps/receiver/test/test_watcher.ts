import assert from "node:assert/strict";
import { readdir, rm, stat, writeFile } from "node:fs/promises";
import path from "node:path";

import type { BatchId } from "@photorelay/shared";

import type { ImportResult, ImportTrigger } from "../src/importer.js";
import { reconcileBatch } from "../src/reconcileBatch.js";
import { ReceiverLoop } from "../src/watcher.js";
import { MemoryReceiverLog, fixedNow, makeReceiver, writeBatch, type ReceiverFixture } from "./helpers.js";

class RecordingImporter {
  readonly calls: BatchId[] = [];
  failWith: string | null = null;

  readonly trigger: ImportTrigger = async (batchId) => {
    this.calls.push(batchId);
    if (this.failWith) return { ok: false, duration_ms: 1, reason: this.failWith, timed_out: false };
    return { ok: true, duration_ms: 1 };
  };
}

function newLoop(fx: ReceiverFixture, log: MemoryReceiverLog, importer?: ImportTrigger): ReceiverLoop {
  return new ReceiverLoop({ cfg: fx.cfg, paths: fx.paths, log, importer, now: fixedNow, stabilityMs: 50 });
}

async function exists(p: string): Promise<boolean> {
  try {
    await stat(p);
    return true;
  } catch {
    return false;
  }
}

async function testDrainsReadyBatchesOldestFirst(): Promise<void> {
  const fx = await makeReceiver("drain");
  await writeBatch(fx, "20260314_090000", { files: ["x.jpg"], manifest: null });
  await writeBatch(fx, "20260314_093000", { files: ["a.jpg"] });
  await writeBatch(fx, "20260314_100000", { files: ["b.heic", "c.jpg"] });
  const log = new MemoryReceiverLog();
  const importer = new RecordingImporter();
  const loop = newLoop(fx, log, importer.trigger);

  const handled = await loop.scanOnce();
  assert.deepEqual(
    handled.map((h) => [h.batch_id, h.result]),
    [
      ["20260314_090000", "halted"],
      ["20260314_093000", "reconciled"],
      ["20260314_100000", "reconciled"],
    ],
  );
  const halted = handled[0];
  assert.equal(halted?.result === "halted" ? halted.reason : null, "No transfer manifest found for batch 20260314_090000");
  assert.deepEqual(importer.calls, ["20260314_093000", "20260314_100000"]);
  assert.deepEqual(loop.haltedBatches(), ["20260314_090000"]);
  assert.deepEqual(log.lines.slice(0, 3), [
    "=== Folder action triggered ===",
    `Found unprocessed batch: 20260314_090000 in ${path.join(fx.paths.incoming, "20260314_090000")}`,
    "ERROR - No transfer manifest found for batch 20260314_090000",
  ]);
  assert.deepEqual(await readdir(fx.paths.reports), [
    "manifest_20260314_093000.json",
    "manifest_20260314_100000.json",
  ]);
  assert.deepEqual(await readdir(fx.paths.incoming), ["20260314_090000"]);

  assert.deepEqual(await loop.scanOnce(), []);
  assert.equal(importer.calls.length, 2);
}

async function testFailedImportHaltsBatch(): Promise<void> {
  const fx = await makeReceiver("importfail");
  const dir = await writeBatch(fx, "20260314_093000", { files: ["a.jpg"] });
  const log = new MemoryReceiverLog();
  const importer = new RecordingImporter();
  importer.failWith = "library locked";
  const loop = newLoop(fx, log, importer.trigger);

  const handled = await loop.scanOnce();
  assert.deepEqual(handled, [{ batch_id: "20260314_093000", result: "halted", reason: "library locked" }]);
  assert.equal(log.lines.at(-1), "ERROR - Import failed for batch 20260314_093000: library locked");
  assert.equal(await exists(path.join(dir, "a.jpg")), true);
  assert.deepEqual(await readdir(fx.paths.reports), []);
}

async function testReconcileFailureAfterImportHaltsBatch(): Promise<void> {
  const fx = await makeReceiver("reconcilefail");
  const dir = await writeBatch(fx, "20260314_093000", { files: ["a.jpg"] });
  await writeBatch(fx, "20260314_100000", { files: ["b.jpg"] });
  // A plain file where the reports directory should be makes the manifest write fail.
  await rm(fx.paths.reports, { recursive: true });
  await writeFile(fx.paths.reports, "");
  const log = new MemoryReceiverLog();
  const importer = new RecordingImporter();
  const loop = newLoop(fx, log, importer.trigger);

  const first = await loop.requestScan();
  assert.deepEqual(
    first.handled.map((h) => [h.batch_id, h.result]),
    [
      ["20260314_093000", "halted"],
      ["20260314_100000", "halted"],
    ],
  );
  assert.deepEqual(loop.haltedBatches(), ["20260314_093000", "20260314_100000"]);
  assert.ok(log.lines.some((l) => l.startsWith("ERROR - Manifest generation failed for batch 20260314_093000: ")));

  const second = await loop.requestScan();
  assert.deepEqual(second.handled, []);
  assert.deepEqual(importer.calls, ["20260314_093000", "20260314_100000"]);
  assert.equal(await exists(path.join(dir, "a.jpg")), true);
}

async function testValidateOnlyWaitsForExternalImport(): Promise<void> {
  const fx = await makeReceiver("external");
  await writeBatch(fx, "20260314_093000", { files: ["a.jpg"] });
  const log = new MemoryReceiverLog();
  const loop = newLoop(fx, log);

  assert.deepEqual(await loop.scanOnce(), [{ batch_id: "20260314_093000", result: "awaiting_import" }]);
  assert.deepEqual(await loop.scanOnce(), []);

  await reconcileBatch({
    paths: fx.paths,
    batchId: "20260314_093000",
    imageExtensions: fx.cfg.import.image_extensions,
    log,
    now: fixedNow,
  });
  // The reconciled batch left incoming, so it no longer needs holding back.
  await writeBatch(fx, "20260314_100000", { files: ["b.jpg"] });
  assert.deepEqual(await loop.scanOnce(), [{ batch_id: "20260314_100000", result: "awaiting_import" }]);
}

async function testConcurrentRequestsShareOneScan(): Promise<void> {
  const fx = await makeReceiver("coalesce");
  await writeBatch(fx, "20260314_093000", { files: ["a.jpg"] });
  const log = new MemoryReceiverLog();

  let release: () => void = () => undefined;
  const gate = new Promise<void>((resolve) => {
    release = resolve;
  });
  let started: () => void = () => undefined;
  const importStarted = new Promise<void>((resolve) => {
    started = resolve;
  });
  const calls: BatchId[] = [];
  const slowImporter: ImportTrigger = async (batchId): Promise<ImportResult> => {
    calls.push(batchId);
    started();
    await gate;
    return { ok: true, duration_ms: 5 };
  };
  const loop = newLoop(fx, log, slowImporter);

  const first = loop.requestScan();
  const second = loop.requestScan();
  assert.equal(first, second);
  await importStarted;
  await writeBatch(fx, "20260314_100000", { files: ["b.jpg"] });
  release();

  const { handled } = await first;
  assert.deepEqual(
    handled.map((h) => h.batch_id),
    ["20260314_093000", "20260314_100000"],
  );
  assert.deepEqual(calls, ["20260314_093000", "20260314_100000"]);
}

async function testStartProcessesExistingBatches(): Promise<void> {
  const fx = await makeReceiver("start");
  await writeBatch(fx, "20260314_093000", { files: ["a.jpg"] });
  const log = new MemoryReceiverLog();
  const importer = new RecordingImporter();
  const loop = newLoop(fx, log, importer.trigger);
  const manifest = path.join(fx.paths.reports, "manifest_20260314_093000.json");

  loop.start();
  try {
    const deadline = Date.now() + 5_000;
    while (!(await exists(manifest)) && Date.now() < deadline) {
      await new Promise((resolve) => setTimeout(resolve, 25));
    }
    assert.equal(await exists(manifest), true);
  } finally {
    await loop.stop();
  }
  assert.deepEqual(importer.calls, ["20260314_093000"]);
}

async function main(): Promise<void> {
  await testDrainsReadyBatchesOldestFirst();
  await testFailedImportHaltsBatch();
  await testReconcileFailureAfterImportHaltsBatch();
  await testValidateOnlyWaitsForExternalImport();
  await testConcurrentRequestsShareOneScan();
  await testStartProcessesExistingBatches();
}

main().catch((err) => {
  // eslint-disable-next-line no-console
  console.error(err instanceof Error ? err.stack || err.message : String(err));
  process.exitCode = 1;
});
