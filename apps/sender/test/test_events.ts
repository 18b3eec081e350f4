import assert from "node:assert/strict";

import { PipelineEventLog, ProgressReporter } from "../src/pipeline/events.js";

async function testBoundedFeed(): Promise<void> {
  const log = new PipelineEventLog(3, () => "2026-03-14T09:30:00.000Z");
  const first = log.append("batch.staged", "20260314_093000", { staged_count: 2 });
  const second = log.append("batch.transfer.started", "20260314_093000");
  const third = log.append("batch.awaiting_import", "20260314_093000");
  const fourth = log.append("cleanup.sweep", null, { purged: 0 });

  assert.equal(log.size, 3);
  assert.deepEqual(
    log.list().map((e) => e.event_id),
    [second.event_id, third.event_id, fourth.event_id],
  );
  assert.match(first.event_id, /^pev_[0-9A-Z]{26}$/);
  assert.equal(fourth.batch_id, null);
  assert.equal(fourth.occurred_at, "2026-03-14T09:30:00.000Z");

  // An id that already fell off the feed still pages forward.
  assert.deepEqual(
    log.list(first.event_id).map((e) => e.event_type),
    ["batch.transfer.started", "batch.awaiting_import", "cleanup.sweep"],
  );
  assert.deepEqual(
    log.list(third.event_id).map((e) => e.event_id),
    [fourth.event_id],
  );
  assert.deepEqual(log.list(fourth.event_id), []);
  assert.equal(log.list(undefined, 1).length, 1);
}

async function testProgressSteps(): Promise<void> {
  const seen: Array<[number, number]> = [];
  const progress = new ProgressReporter(1000, (percent, sent) => seen.push([percent, sent]));
  progress.add(10);
  progress.add(20);
  progress.add(30);
  progress.add(500);
  progress.add(440);
  assert.deepEqual(seen, [
    [0, 10],
    [5, 60],
    [55, 560],
    [100, 1000],
  ]);

  const empty: number[] = [];
  new ProgressReporter(0, (percent) => empty.push(percent)).add(0);
  assert.deepEqual(empty, [100]);
}

async function main(): Promise<void> {
  await testBoundedFeed();
  await testProgressSteps();
}

main().catch((err) => {
  // eslint-disable-next-line no-console
  console.error(err instanceof Error ? err.stack || err.message : String(err));
  process.exitCode = 1;
});
