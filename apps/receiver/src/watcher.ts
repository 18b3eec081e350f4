import chokidar, { type FSWatcher } from "chokidar";

import {
  ProtocolViolationError,
  toErrorMessage,
  type BatchId,
  type PipelineConfig,
} from "@photorelay/shared";

import { findNextReadyBatch, listIncomingBatches, validateBatch, type ReceiverPaths } from "./incoming.js";
import type { ImportTrigger } from "./importer.js";
import type { ReceiverLog } from "./log.js";
import { reconcileBatch, type ReconcileOutcome } from "./reconcileBatch.js";

export interface ReceiverLoopOptions {
  cfg: Readonly<PipelineConfig>;
  paths: ReceiverPaths;
  log: ReceiverLog;
  /** Absent means validate-only: batches wait for an external import. */
  importer?: ImportTrigger;
  rescanMs?: number;
  stabilityMs?: number;
  now?: () => Date;
}

export type BatchHandled =
  | { batch_id: BatchId; result: "reconciled"; outcome: ReconcileOutcome }
  | { batch_id: BatchId; result: "awaiting_import" }
  | { batch_id: BatchId; result: "halted"; reason: string };

export type ScanResult = { handled: BatchHandled[] };

/**
 * Watches the incoming root and drains ready batches one at a time. Change
 * events only request a scan; scans never overlap and a request that lands
 * mid-scan triggers exactly one more.
 */
export class ReceiverLoop {
  private readonly halted = new Set<BatchId>();
  private readonly awaiting = new Set<BatchId>();
  private watcher: FSWatcher | null = null;
  private timer: NodeJS.Timeout | null = null;
  private current: Promise<ScanResult> | null = null;
  private rescanRequested = false;
  private stopping = false;

  constructor(private readonly opts: ReceiverLoopOptions) {}

  /** Batches held back after a protocol or import failure. */
  haltedBatches(): BatchId[] {
    return [...this.halted].sort();
  }

  start(): void {
    if (this.watcher) return;
    this.stopping = false;
    const stabilityMs = this.opts.stabilityMs ?? 500;
    this.watcher = chokidar.watch(this.opts.paths.incoming, {
      ignoreInitial: true,
      depth: 1,
      awaitWriteFinish: { stabilityThreshold: stabilityMs, pollInterval: Math.max(50, Math.floor(stabilityMs / 5)) },
    });
    this.watcher.on("add", () => void this.requestScan());
    this.watcher.on("addDir", () => void this.requestScan());
    this.watcher.on("change", () => void this.requestScan());
    this.watcher.on("error", (err) => {
      this.opts.log.event("watch_error", "-", { reason: toErrorMessage(err) });
    });

    const rescanMs = this.opts.rescanMs ?? 0;
    if (rescanMs > 0) {
      this.timer = setInterval(() => void this.requestScan(), rescanMs);
    }
    void this.requestScan();
  }

  async stop(): Promise<void> {
    this.stopping = true;
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
    const watcher = this.watcher;
    this.watcher = null;
    if (watcher) await watcher.close();
    if (this.current) await this.current;
  }

  /** Resolves once the scan this request joined (or started) has finished. */
  requestScan(): Promise<ScanResult> {
    if (this.current) {
      this.rescanRequested = true;
      return this.current;
    }
    const run = this.drain().finally(() => {
      this.current = null;
    });
    this.current = run;
    run.catch((err) => {
      this.opts.log.event("scan_failed", "-", { reason: toErrorMessage(err) });
    });
    return run;
  }

  private async drain(): Promise<ScanResult> {
    const handled: BatchHandled[] = [];
    do {
      this.rescanRequested = false;
      handled.push(...(await this.scanOnce()));
    } while (this.rescanRequested && !this.stopping);
    return { handled };
  }

  /** Processes every ready batch currently visible, oldest first. */
  async scanOnce(): Promise<BatchHandled[]> {
    await this.pruneForgotten();
    const handled: BatchHandled[] = [];
    while (!this.stopping) {
      const skip = new Set([...this.halted, ...this.awaiting]);
      const next = await findNextReadyBatch(this.opts.paths, skip);
      if (next.kind === "idle") break;
      handled.push(await this.handleBatch(next.batchId, next.batchDir));
    }
    return handled;
  }

  private async handleBatch(batchId: BatchId, batchDir: string): Promise<BatchHandled> {
    const { log } = this.opts;
    await log.importLog("=== Folder action triggered ===");
    await log.importLog(`Found unprocessed batch: ${batchId} in ${batchDir}`);

    try {
      await validateBatch(this.opts.paths, batchId);
    } catch (err) {
      if (!(err instanceof ProtocolViolationError)) throw err;
      await log.importLog(`ERROR - ${err.message}`);
      return this.halt(batchId, err.message);
    }
    await log.importLog(`Batch ${batchId} validated, proceeding to import`);

    const importer = this.opts.importer;
    if (!importer) {
      this.awaiting.add(batchId);
      log.event("awaiting_import", batchId);
      return { batch_id: batchId, result: "awaiting_import" };
    }

    const imported = await importer(batchId, batchDir);
    if (!imported.ok) {
      await log.importLog(`ERROR - Import failed for batch ${batchId}: ${imported.reason}`);
      return this.halt(batchId, imported.reason);
    }
    log.event("imported", batchId, { duration_ms: imported.duration_ms });

    try {
      await log.importLog("=== Manifest generation script started ===");
      const outcome = await reconcileBatch({
        paths: this.opts.paths,
        batchId,
        imageExtensions: this.opts.cfg.import.image_extensions,
        log,
        now: this.opts.now,
      });
      await log.importLog("=== Manifest generation script completed ===");
      return { batch_id: batchId, result: "reconciled", outcome };
    } catch (err) {
      // The library already holds these files; importing again would duplicate them.
      const reason = toErrorMessage(err);
      await log.importLog(`ERROR - Manifest generation failed for batch ${batchId}: ${reason}`);
      return this.halt(batchId, reason);
    }
  }

  private halt(batchId: BatchId, reason: string): BatchHandled {
    this.halted.add(batchId);
    this.opts.log.event("halted", batchId, { reason });
    return { batch_id: batchId, result: "halted", reason };
  }

  // A batch removed by the sender's orphan sweep no longer needs holding back.
  private async pruneForgotten(): Promise<void> {
    if (this.halted.size === 0 && this.awaiting.size === 0) return;
    const present = new Set(await listIncomingBatches(this.opts.paths));
    for (const set of [this.halted, this.awaiting]) {
      for (const batchId of set) {
        if (!present.has(batchId)) set.delete(batchId);
      }
    }
  }
}
