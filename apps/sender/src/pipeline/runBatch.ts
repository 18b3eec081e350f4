import fs from "node:fs/promises";
import path from "node:path";

import {
  BatchNotFoundError,
  PipelineError,
  TransferAbortedError,
  completionManifestName,
  dynamicTimeoutSec,
  expandHome,
  newBatchId,
  toErrorMessage,
  writeJsonAtomic,
  type BatchId,
  type BatchRecord,
  type CompletionManifest,
  type PipelineConfig,
} from "@photorelay/shared";

import type { BatchLedger } from "../ledger/batchLedger.js";
import { joinRemote, type RemoteHost } from "../remote/remoteHost.js";
import type { WakeSender } from "../remote/wake.js";
import { CleanupEngine } from "./cleanup.js";
import { ensureDestinationReachable } from "./connectivity.js";
import { ProgressReporter, type PipelineEventLog } from "./events.js";
import { readCompletionManifest, waitForCompletionManifest, type PollOutcome } from "./poller.js";
import {
  loadStagedFiles,
  stageFiles,
  type StagedFile,
  type StageInput,
  type StageResult,
  type StagingFailure,
} from "./staging.js";
import { prepareDestination } from "./remoteState.js";
import { transferBatch } from "./transfer.js";
import type { Clock, LoggerLike } from "./types.js";

export interface PipelineContext {
  cfg: Readonly<PipelineConfig>;
  host: RemoteHost;
  ledger: BatchLedger;
  events: PipelineEventLog;
  log: LoggerLike;
  clock: Clock;
  wake: WakeSender;
  homeDir: string;
}

export interface SubmitResult {
  batch_id: BatchId;
  staged_count: number;
  timeout_sec: number;
  failures: StagingFailure[];
}

type QueuedRun = { batchId: BatchId; files: StagedFile[] };
type ActiveRun = { controller: AbortController; done: Promise<void> };

/** Child controller that aborts with its parent, and on its own after `timeoutMs`. */
function linkedController(parent: AbortSignal, timeoutMs: number): { signal: AbortSignal; dispose: () => void } {
  const controller = new AbortController();
  const onAbort = (): void => controller.abort(parent.reason);
  if (parent.aborted) onAbort();
  else parent.addEventListener("abort", onAbort, { once: true });
  const timer = setTimeout(() => controller.abort(new TransferAbortedError("timeout")), timeoutMs);
  return {
    signal: controller.signal,
    dispose: () => {
      clearTimeout(timer);
      parent.removeEventListener("abort", onAbort);
    },
  };
}

/**
 * Runs batches end to end: stage, wake, transfer, wait for the completion
 * manifest, clean up. Up to `max_concurrent_batches` run at once; stages
 * within one batch are strictly sequential.
 */
export class BatchRunner {
  readonly cleanup: CleanupEngine;
  readonly stagingRoot: string;
  readonly localReports: string;
  private readonly shutdown = new AbortController();
  private readonly queue: QueuedRun[] = [];
  private readonly running = new Map<BatchId, ActiveRun>();

  constructor(private readonly ctx: PipelineContext) {
    this.stagingRoot = path.resolve(expandHome(ctx.cfg.paths.staging_dir, ctx.homeDir));
    this.localReports = path.resolve(expandHome(ctx.cfg.paths.local_reports, ctx.homeDir));
    this.cleanup = new CleanupEngine({
      cfg: ctx.cfg,
      host: ctx.host,
      ledger: ctx.ledger,
      events: ctx.events,
      log: ctx.log,
      clock: ctx.clock,
      stagingRoot: this.stagingRoot,
      isActive: (batchId) => this.isActive(batchId),
    });
  }

  isActive(batchId: BatchId): boolean {
    return this.running.has(batchId) || this.queue.some((q) => q.batchId === batchId);
  }

  get activeCount(): number {
    return this.running.size;
  }

  get queuedCount(): number {
    return this.queue.length;
  }

  async submit(files: StageInput[]): Promise<SubmitResult> {
    const { cfg, ledger, events, clock } = this.ctx;
    const batchId = newBatchId(new Date(clock.now()));
    const timeoutSec = dynamicTimeoutSec(files.length, cfg.transfer);
    await ledger.create({
      batch_id: batchId,
      file_count: files.length,
      staged_dir: path.join(this.stagingRoot, batchId),
      timeout_sec: timeoutSec,
    });

    let result: StageResult;
    try {
      result = await stageFiles({
        batchId,
        stagingRoot: this.stagingRoot,
        files,
        batchSizeLimit: cfg.transfer.batch_size_limit,
      });
    } catch (err) {
      await this.fail(batchId, err);
      throw err;
    }

    const stagedTimeout = dynamicTimeoutSec(result.staged.length, cfg.transfer);
    events.append("batch.staged", batchId, {
      staged_count: result.staged.length,
      failures: result.failures.length,
    });
    this.enqueue({ batchId, files: result.staged });
    return {
      batch_id: batchId,
      staged_count: result.staged.length,
      timeout_sec: stagedTimeout,
      failures: result.failures,
    };
  }

  /** Re-queues a batch left in `staged` by an aborted transfer. */
  async retry(batchId: BatchId): Promise<BatchRecord> {
    const record = await this.ctx.ledger.get(batchId);
    if (!record) throw new BatchNotFoundError(batchId);
    if (record.status !== "staged" || this.isActive(batchId)) return record;
    const files = await loadStagedFiles(record.staged_dir);
    this.enqueue({ batchId, files });
    return record;
  }

  /** Cancels one batch, or every queued and running batch when no id is given. */
  cancel(batchId?: BatchId): BatchId[] {
    const cancelled: BatchId[] = [];
    for (let i = this.queue.length - 1; i >= 0; i -= 1) {
      const queued = this.queue[i];
      if (queued && (!batchId || queued.batchId === batchId)) {
        this.queue.splice(i, 1);
        cancelled.push(queued.batchId);
      }
    }
    for (const [id, run] of this.running) {
      if (batchId && id !== batchId) continue;
      run.controller.abort(new TransferAbortedError("cancelled"));
      cancelled.push(id);
    }
    return cancelled.sort((a, b) => a.localeCompare(b));
  }

  /** One poll for a pending batch; completes it when the manifest has landed. */
  async recheck(batchId: BatchId): Promise<BatchRecord> {
    const record = await this.ctx.ledger.get(batchId);
    if (!record) throw new BatchNotFoundError(batchId);
    if (record.status !== "pending") return record;
    const manifest = await readCompletionManifest(this.ctx.host, this.ctx.cfg, batchId);
    if (!manifest) return record;
    await this.settleCompleted(batchId, manifest);
    return (await this.ctx.ledger.get(batchId)) ?? record;
  }

  /** Resolves once nothing is queued or running. */
  async idle(): Promise<void> {
    while (this.running.size > 0 || this.queue.length > 0) {
      if (this.running.size === 0) return;
      await Promise.allSettled([...this.running.values()].map((r) => r.done));
    }
  }

  async close(): Promise<void> {
    this.queue.length = 0;
    this.shutdown.abort(new TransferAbortedError("cancelled"));
    await Promise.allSettled([...this.running.values()].map((r) => r.done));
  }

  private enqueue(run: QueuedRun): void {
    this.queue.push(run);
    this.queue.sort((a, b) => a.batchId.localeCompare(b.batchId));
    this.pump();
  }

  private pump(): void {
    const limit = Math.max(1, this.ctx.cfg.transfer.max_concurrent_batches);
    while (!this.shutdown.signal.aborted && this.running.size < limit) {
      const next = this.queue.shift();
      if (!next) return;
      const controller = new AbortController();
      const onShutdown = (): void => controller.abort(this.shutdown.signal.reason);
      this.shutdown.signal.addEventListener("abort", onShutdown, { once: true });

      const done = this.execute(next, controller.signal)
        .catch((err: unknown) => {
          this.ctx.log.error({ event: "batch.run.crashed", batch_id: next.batchId, message: toErrorMessage(err) });
        })
        .finally(() => {
          this.shutdown.signal.removeEventListener("abort", onShutdown);
          this.running.delete(next.batchId);
          this.pump();
        });
      this.running.set(next.batchId, { controller, done });
    }
  }

  private async execute(run: QueuedRun, signal: AbortSignal): Promise<void> {
    const { cfg, ledger, events, host, log, clock } = this.ctx;
    const { batchId, files } = run;
    const timeoutSec = dynamicTimeoutSec(files.length, cfg.transfer);

    await ledger.transition(batchId, "transferring", { file_count: files.length, timeout_sec: timeoutSec });
    events.append("batch.transfer.started", batchId, { file_count: files.length, timeout_sec: timeoutSec });

    const totalBytes = files.reduce((sum, f) => sum + f.size, 0);
    const progress = new ProgressReporter(totalBytes, (percent, sentBytes) => {
      events.append("batch.transfer.progress", batchId, { percent, sent_bytes: sentBytes, total_bytes: totalBytes });
    });

    const transferScope = linkedController(signal, timeoutSec * 1000);
    try {
      await ensureDestinationReachable({
        host,
        dest: cfg.destination,
        wake: this.ctx.wake,
        clock,
        log,
        signal: transferScope.signal,
        onWake: () => events.append("destination.waking", batchId),
      });
      const created = await prepareDestination(host, cfg);
      if (created.length > 0) log.info({ event: "destination.prepared", batch_id: batchId, created });
      const result = await transferBatch({
        batchId,
        files,
        cfg,
        host,
        clock,
        log,
        signal: transferScope.signal,
        onBytes: (bytes) => progress.add(bytes),
      });
      log.info({ event: "batch.transferred", batch_id: batchId, ...result });
    } catch (err) {
      if (err instanceof TransferAbortedError) {
        await ledger.transition(batchId, "staged", { last_error: err.message });
        events.append("batch.transfer.aborted", batchId, { reason: err.reason });
        log.warn({ event: "batch.transfer.aborted", batch_id: batchId, reason: err.reason });
        return;
      }
      await this.fail(batchId, err);
      return;
    } finally {
      transferScope.dispose();
    }

    await ledger.transition(batchId, "awaiting_import");
    events.append("batch.awaiting_import", batchId);

    let outcome: PollOutcome;
    try {
      outcome = await waitForCompletionManifest({
        batchId,
        timeoutSec,
        cfg,
        host,
        clock,
        log,
        signal,
        onStatus: (elapsedMs) => events.append("batch.poll.status", batchId, { elapsed_ms: elapsedMs }),
      });
    } catch (err) {
      await this.markPending(batchId, `poll_failed: ${toErrorMessage(err)}`);
      return;
    }

    if (outcome.status === "completed") {
      await this.settleCompleted(batchId, outcome.manifest);
    } else if (outcome.status === "pending") {
      await this.markPending(batchId, `completion manifest not seen within ${timeoutSec}s`);
    } else {
      await this.markPending(batchId, "poll_cancelled");
    }
  }

  private async markPending(batchId: BatchId, reason: string): Promise<void> {
    await this.ctx.ledger.transition(batchId, "pending", { last_error: reason });
    this.ctx.events.append("batch.pending", batchId, { reason });
    this.ctx.log.info({ event: "batch.pending", batch_id: batchId, reason });
    await this.cleanup.cleanupBatch(batchId, "pending");
  }

  private async settleCompleted(batchId: BatchId, manifest: CompletionManifest): Promise<void> {
    const { ledger, events, host, cfg, log } = this.ctx;
    try {
      await fs.mkdir(this.localReports, { recursive: true });
      await writeJsonAtomic(path.join(this.localReports, completionManifestName(batchId)), manifest);
    } catch (err) {
      log.warn({ event: "batch.local_report_failed", batch_id: batchId, message: toErrorMessage(err) });
    }

    const warnings = manifest.warnings ?? [];
    await ledger.transition(batchId, "imported", {
      imported_count: manifest.count,
      warnings,
      last_error: null,
    });
    events.append("batch.imported", batchId, {
      count: manifest.count,
      files: manifest.files,
      warnings,
    });
    log.info({ event: "batch.imported", batch_id: batchId, count: manifest.count, warnings: warnings.length });

    const processed = await host.stat(joinRemote(cfg.paths.remote_processed, batchId));
    if (processed?.isDirectory) {
      await ledger.transition(batchId, "processed");
      events.append("batch.processed", batchId);
    }
    await this.cleanup.cleanupBatch(batchId, "success");
  }

  private async fail(batchId: BatchId, err: unknown): Promise<void> {
    const { ledger, events, log } = this.ctx;
    const kind = err instanceof PipelineError ? err.kind : "unknown";
    const retryable = err instanceof PipelineError ? err.retryable : false;
    await ledger.transition(batchId, "failed", { last_error: toErrorMessage(err) });
    events.append("batch.failed", batchId, { kind, retryable, message: toErrorMessage(err) });
    log.error({ event: "batch.failed", batch_id: batchId, kind, retryable, message: toErrorMessage(err) });
    await this.cleanup.cleanupBatch(batchId, "failed");
  }
}
