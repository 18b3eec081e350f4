import assert from "node:assert/strict";
import { readFile, rm, writeFile } from "node:fs/promises";
import path from "node:path";

import { ProtocolViolationError, TRANSFER_MANIFEST_NAME } from "@photorelay/shared";

import { findNextReadyBatch, listIncomingBatches, validateBatch } from "../src/incoming.js";
import { createReceiverLog } from "../src/log.js";
import { makeReceiver, writeBatch } from "./helpers.js";

async function testIdleWithoutIncomingRoot(): Promise<void> {
  const fx = await makeReceiver("idle");
  await rm(fx.paths.incoming, { recursive: true });
  assert.deepEqual(await findNextReadyBatch(fx.paths), { kind: "idle" });
  assert.deepEqual(await listIncomingBatches(fx.paths), []);
}

async function testPicksOldestReadyBatchWithoutManifest(): Promise<void> {
  const fx = await makeReceiver("next");
  await writeBatch(fx, "20260314_093000", { files: ["a.jpg"] });
  await writeFile(path.join(fx.paths.reports, "manifest_20260314_093000.json"), "{}");
  await writeBatch(fx, "20260314_094500", { files: ["b.jpg"], ready: false });
  const third = await writeBatch(fx, "20260314_100000", { files: ["c.jpg"] });
  await writeBatch(fx, "20260314_110000", { files: ["d.jpg"] });
  await writeBatch(fx, "not_a_batch", { files: ["e.jpg"] });

  assert.deepEqual(await findNextReadyBatch(fx.paths), {
    kind: "ready",
    batchId: "20260314_100000",
    batchDir: third,
  });
  const skipped = await findNextReadyBatch(fx.paths, new Set(["20260314_100000"]));
  assert.equal(skipped.kind === "ready" ? skipped.batchId : null, "20260314_110000");
  assert.deepEqual(await listIncomingBatches(fx.paths), [
    "20260314_093000",
    "20260314_094500",
    "20260314_100000",
    "20260314_110000",
  ]);
}

async function testValidateBatch(): Promise<void> {
  const fx = await makeReceiver("validate");
  await writeBatch(fx, "20260314_100000", { files: ["c.jpg"], manifest: null });
  await assert.rejects(validateBatch(fx.paths, "20260314_100000"), (err: unknown) => {
    assert.ok(err instanceof ProtocolViolationError);
    assert.equal(err.message, "No transfer manifest found for batch 20260314_100000");
    assert.equal(err.batchId, "20260314_100000");
    return true;
  });

  const dir = await writeBatch(fx, "20260314_110000", { files: ["d.jpg"] });
  const ok = await validateBatch(fx.paths, "20260314_110000");
  assert.equal(ok.batchDir, dir);
  assert.deepEqual(ok.manifest.files, [
    { remote_path: "~/IncomingPhotos/20260314_110000/d.jpg", original_path: "/Users/test/Pictures/trip/d.jpg" },
  ]);

  await writeFile(path.join(dir, TRANSFER_MANIFEST_NAME), "{not json");
  await assert.rejects(validateBatch(fx.paths, "20260314_110000"), ProtocolViolationError);
}

async function testImportLogAppends(): Promise<void> {
  const fx = await makeReceiver("log");
  const log = createReceiverLog(fx.paths.reports, () => new Date(2026, 2, 14, 9, 31, 5));
  await log.importLog("=== Folder action triggered ===");
  await log.importLog("No unprocessed batch directories found with .ready file");
  const text = await readFile(path.join(fx.paths.reports, "import.log"), "utf8");
  assert.equal(
    text,
    "2026-03-14 09:31:05: === Folder action triggered ===\n" +
      "2026-03-14 09:31:05: No unprocessed batch directories found with .ready file\n",
  );
}

async function main(): Promise<void> {
  await testIdleWithoutIncomingRoot();
  await testPicksOldestReadyBatchWithoutManifest();
  await testValidateBatch();
  await testImportLogAppends();
}

main().catch((err) => {
  // eslint-disable-next-line no-console
  console.error(err instanceof Error ? err.stack || err.message : String(err));
  process.exitCode = 1;
});
