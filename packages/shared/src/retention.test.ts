import { describe, expect, it } from "vitest";

import { isOrphanExpired, isRetentionExpired, shouldCleanImmediately, type RetentionSettings } from "./retention.js";
import { dynamicTimeoutSec, pollBackoffMs } from "./timeouts.js";

const HOUR = 60 * 60 * 1000;
const DAY = 24 * HOUR;
const NOW = Date.UTC(2026, 2, 10, 12, 0, 0);

const immediate: RetentionSettings = {
  keep_successful_days: 0,
  keep_failed_days: 0,
  clean_incoming_after_hours: 0.25,
};

describe("shouldCleanImmediately", () => {
  it("cleans success and failure at zero days", () => {
    expect(shouldCleanImmediately("success", immediate)).toBe(true);
    expect(shouldCleanImmediately("failed", immediate)).toBe(true);
  });

  it("never cleans a pending batch right away", () => {
    expect(shouldCleanImmediately("pending", immediate)).toBe(false);
  });

  it("waits when a window is configured", () => {
    expect(shouldCleanImmediately("success", { ...immediate, keep_successful_days: 3 })).toBe(false);
  });
});

describe("isRetentionExpired", () => {
  const keep = { keep_successful_days: 7, keep_failed_days: 2, clean_incoming_after_hours: 0.25 };

  it("uses the success window for processed batches", () => {
    expect(isRetentionExpired("processed", NOW - 6 * DAY, NOW, keep)).toBe(false);
    expect(isRetentionExpired("processed", NOW - 7 * DAY, NOW, keep)).toBe(true);
  });

  it("uses the failure window for failed batches", () => {
    expect(isRetentionExpired("failed", NOW - 1 * DAY, NOW, keep)).toBe(false);
    expect(isRetentionExpired("failed", NOW - 3 * DAY, NOW, keep)).toBe(true);
  });

  it("holds pending batches for the orphan window too", () => {
    expect(isRetentionExpired("pending", NOW - 10 * 60 * 1000, NOW, immediate)).toBe(false);
    expect(isRetentionExpired("pending", NOW - 20 * 60 * 1000, NOW, immediate)).toBe(true);
  });

  it("ignores in-flight statuses", () => {
    expect(isRetentionExpired("transferring", NOW - 30 * DAY, NOW, keep)).toBe(false);
    expect(isRetentionExpired("awaiting_import", NOW - 30 * DAY, NOW, keep)).toBe(false);
  });
});

describe("isOrphanExpired", () => {
  it("compares against the hour threshold", () => {
    expect(isOrphanExpired(NOW - 16 * 60 * 1000, NOW, immediate)).toBe(true);
    expect(isOrphanExpired(NOW - 14 * 60 * 1000, NOW, immediate)).toBe(false);
  });

  it("is disabled at zero hours", () => {
    expect(isOrphanExpired(NOW - 30 * DAY, NOW, { ...immediate, clean_incoming_after_hours: 0 })).toBe(false);
  });
});

describe("timeouts", () => {
  const cfg = { timeout_seconds: 300, timeout_per_photo: 30 };

  it("scales with file count up to the cap", () => {
    expect(dynamicTimeoutSec(3, cfg)).toBe(90);
    expect(dynamicTimeoutSec(10, cfg)).toBe(300);
    expect(dynamicTimeoutSec(50, cfg)).toBe(300);
  });

  it("backs off as the wait grows", () => {
    expect(pollBackoffMs(0)).toBe(1000);
    expect(pollBackoffMs(4_999)).toBe(1000);
    expect(pollBackoffMs(5_000)).toBe(2000);
    expect(pollBackoffMs(15_000)).toBe(5000);
  });
});
