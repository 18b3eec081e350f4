import {
  completionManifestName,
  parseCompletionManifest,
  pollBackoffMs,
  type BatchId,
  type CompletionManifest,
  type PipelineConfig,
} from "@photorelay/shared";

import { joinRemote, type RemoteHost } from "../remote/remoteHost.js";
import type { Clock, LoggerLike } from "./types.js";

export const STATUS_INTERVAL_MS = 30_000;
export const MAX_CONSECUTIVE_READ_ERRORS = 5;

export type PollOutcome =
  | { status: "completed"; manifest: CompletionManifest }
  | { status: "pending"; waited_ms: number }
  | { status: "cancelled"; waited_ms: number };

export interface PollInput {
  batchId: BatchId;
  timeoutSec: number;
  cfg: Readonly<PipelineConfig>;
  host: RemoteHost;
  clock: Clock;
  log: LoggerLike;
  signal?: AbortSignal;
  onStatus?: (elapsedMs: number) => void;
}

export function completionManifestRemotePath(cfg: Readonly<PipelineConfig>, batchId: BatchId): string {
  return joinRemote(cfg.paths.remote_reports, completionManifestName(batchId));
}

/**
 * One look at the reports directory. A manifest that names another batch or
 * fails to parse counts as absent.
 */
export async function readCompletionManifest(
  host: RemoteHost,
  cfg: Readonly<PipelineConfig>,
  batchId: BatchId,
): Promise<CompletionManifest | null> {
  const text = await host.readText(completionManifestRemotePath(cfg, batchId));
  if (text === null) return null;
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch {
    return null;
  }
  const manifest = parseCompletionManifest(raw);
  if (!manifest || manifest.batch_id !== batchId) return null;
  return manifest;
}

export async function waitForCompletionManifest(input: PollInput): Promise<PollOutcome> {
  const { host, cfg, batchId, clock, log, signal } = input;
  const startedAt = clock.now();
  const timeoutMs = input.timeoutSec * 1000;
  let lastStatusAt = startedAt;
  let consecutiveErrors = 0;

  while (true) {
    const elapsed = clock.now() - startedAt;
    if (signal?.aborted) return { status: "cancelled", waited_ms: elapsed };

    try {
      const manifest = await readCompletionManifest(host, cfg, batchId);
      consecutiveErrors = 0;
      if (manifest) return { status: "completed", manifest };
    } catch (err) {
      consecutiveErrors += 1;
      log.warn({ event: "poll.read_error", batch_id: batchId, consecutive: consecutiveErrors });
      if (consecutiveErrors > MAX_CONSECUTIVE_READ_ERRORS) throw err;
    }

    const now = clock.now();
    const waited = now - startedAt;
    if (waited >= timeoutMs) {
      log.info({ event: "poll.timeout", batch_id: batchId, waited_ms: waited });
      return { status: "pending", waited_ms: waited };
    }
    if (now - lastStatusAt >= STATUS_INTERVAL_MS) {
      lastStatusAt = now;
      input.onStatus?.(waited);
    }
    await clock.sleep(Math.min(pollBackoffMs(waited), timeoutMs - waited), signal);
  }
}
