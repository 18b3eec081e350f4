import { monotonicFactory } from "ulid";

export type BatchId = string;
export type PipelineEventId = `pev_${string}`;

const BATCH_ID_PATTERN = /^(\d{4})(\d{2})(\d{2})_(\d{2})(\d{2})(\d{2})$/;

const nextUlid = monotonicFactory();

function pad2(n: number): string {
  return String(n).padStart(2, "0");
}

/** `YYYYMMDD_HHMMSS` in local time, second resolution. */
export function newBatchId(now: Date = new Date()): BatchId {
  const date = `${now.getFullYear()}${pad2(now.getMonth() + 1)}${pad2(now.getDate())}`;
  const time = `${pad2(now.getHours())}${pad2(now.getMinutes())}${pad2(now.getSeconds())}`;
  return `${date}_${time}`;
}

export function isBatchId(raw: string): boolean {
  return BATCH_ID_PATTERN.test(raw);
}

export function batchIdToDate(batchId: BatchId): Date | null {
  const m = BATCH_ID_PATTERN.exec(batchId);
  if (!m) return null;
  const [, y, mo, d, h, mi, s] = m;
  const date = new Date(Number(y), Number(mo) - 1, Number(d), Number(h), Number(mi), Number(s));
  return Number.isNaN(date.getTime()) ? null : date;
}

// Ids are fixed-width, so plain string order is chronological order.
export function compareBatchIds(a: BatchId, b: BatchId): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

export function newPipelineEventId(): PipelineEventId {
  return `pev_${nextUlid()}`;
}
