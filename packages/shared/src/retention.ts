import { outcomeForStatus, type BatchOutcome, type BatchStatus } from "./batches.js";

export interface RetentionSettings {
  keep_successful_days: number;
  keep_failed_days: number;
  clean_incoming_after_hours: number;
}

const DAY_MS = 24 * 60 * 60 * 1000;
const HOUR_MS = 60 * 60 * 1000;

export function retentionDaysFor(outcome: BatchOutcome, cfg: RetentionSettings): number {
  return outcome === "success" ? cfg.keep_successful_days : cfg.keep_failed_days;
}

/**
 * Zero-day windows clean right after the outcome is known. Pending batches
 * never clean immediately: the import may still land.
 */
export function shouldCleanImmediately(outcome: BatchOutcome, cfg: RetentionSettings): boolean {
  if (outcome === "pending") return false;
  return retentionDaysFor(outcome, cfg) <= 0;
}

export function orphanWindowMs(cfg: RetentionSettings): number | null {
  if (!(cfg.clean_incoming_after_hours > 0)) return null;
  return cfg.clean_incoming_after_hours * HOUR_MS;
}

export function isRetentionExpired(
  status: BatchStatus,
  lastChangeMs: number,
  nowMs: number,
  cfg: RetentionSettings,
): boolean {
  const outcome = outcomeForStatus(status);
  if (!outcome) return false;

  const ageMs = nowMs - lastChangeMs;
  const windowMs = Math.max(0, retentionDaysFor(outcome, cfg)) * DAY_MS;
  if (ageMs < windowMs) return false;

  if (outcome === "pending") {
    const orphanMs = orphanWindowMs(cfg);
    if (orphanMs !== null && ageMs < orphanMs) return false;
  }
  return true;
}

export function isOrphanExpired(referenceMs: number, nowMs: number, cfg: RetentionSettings): boolean {
  const windowMs = orphanWindowMs(cfg);
  if (windowMs === null) return false;
  return nowMs - referenceMs > windowMs;
}
