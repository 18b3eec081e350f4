import fs from "node:fs/promises";
import path from "node:path";

import {
  IMPORT_LOG_NAME,
  READY_MARKER_NAME,
  TEMP_MANIFEST_PATTERN,
  canTransitionBatch,
  cleanedLogLine,
  completionManifestName,
  isBatchId,
  isOrphanExpired,
  isRetentionExpired,
  outcomeForStatus,
  shouldCleanImmediately,
  toErrorMessage,
  type BatchId,
  type BatchOutcome,
  type PipelineConfig,
} from "@photorelay/shared";

import type { BatchLedger } from "../ledger/batchLedger.js";
import { joinRemote, type RemoteHost } from "../remote/remoteHost.js";
import type { PipelineEventLog } from "./events.js";
import { stagingRecordPath } from "./staging.js";
import type { Clock, LoggerLike } from "./types.js";

const DAY_MS = 24 * 60 * 60 * 1000;
const SWEEP_PAGE_SIZE = 500;

export interface CleanupDeps {
  cfg: Readonly<PipelineConfig>;
  host: RemoteHost;
  ledger: BatchLedger;
  events: PipelineEventLog;
  log: LoggerLike;
  clock: Clock;
  stagingRoot: string;
  /** Batches the runner still owns; the orphan sweep leaves them alone. */
  isActive?: (batchId: BatchId) => boolean;
}

export type CleanupReport =
  | { batch_id: BatchId; skipped: true }
  | { batch_id: BatchId; skipped: false; removed: string[]; errors: string[] };

export interface SweepReport {
  purged: BatchId[];
  orphans_removed: BatchId[];
  temp_manifests_removed: string[];
  errors: string[];
}

function emptySweep(): SweepReport {
  return { purged: [], orphans_removed: [], temp_manifests_removed: [], errors: [] };
}

export class CleanupEngine {
  constructor(private readonly deps: CleanupDeps) {}

  /** Cleans right away when the outcome's retention window is zero. */
  async cleanupBatch(batchId: BatchId, outcome: BatchOutcome): Promise<CleanupReport> {
    if (!shouldCleanImmediately(outcome, this.deps.cfg.cleanup)) {
      return { batch_id: batchId, skipped: true };
    }
    return this.purge(batchId, outcome);
  }

  /**
   * Deletes local staging, remote incoming and processed copies, and the
   * completion manifest last. The manifest survives any earlier failure so
   * the batch still reads as imported.
   */
  async purge(batchId: BatchId, outcome: BatchOutcome): Promise<CleanupReport> {
    const { cfg, host, log, ledger, events } = this.deps;
    const removed: string[] = [];
    const errors: string[] = [];

    try {
      removed.push(await this.removeLocalStaging(batchId));
    } catch (err) {
      errors.push(`local_staging:${toErrorMessage(err)}`);
    }

    for (const remote of [
      joinRemote(cfg.paths.remote_incoming, batchId),
      joinRemote(cfg.paths.remote_processed, batchId),
    ]) {
      try {
        await host.remove(remote);
        removed.push(remote);
      } catch (err) {
        errors.push(`${remote}:${toErrorMessage(err)}`);
      }
    }

    if (errors.length === 0) {
      const manifestPath = joinRemote(cfg.paths.remote_reports, completionManifestName(batchId));
      try {
        await host.remove(manifestPath);
        removed.push(manifestPath);
      } catch (err) {
        errors.push(`${manifestPath}:${toErrorMessage(err)}`);
      }
    }

    if (outcome === "success" && cfg.cleanup.clean_import_log && errors.length === 0) {
      try {
        await host.writeText(
          joinRemote(cfg.paths.remote_reports, IMPORT_LOG_NAME),
          cleanedLogLine(batchId, new Date(this.deps.clock.now())),
        );
      } catch (err) {
        log.warn({ event: "cleanup.import_log_failed", batch_id: batchId, message: toErrorMessage(err) });
      }
    }

    if (errors.length > 0) {
      log.warn({ event: "cleanup.partial", batch_id: batchId, errors });
      return { batch_id: batchId, skipped: false, removed, errors };
    }

    const record = await ledger.get(batchId);
    if (record && canTransitionBatch(record.status, "purged")) {
      await ledger.transition(batchId, "purged");
    }
    events.append("batch.purged", batchId, { outcome, removed });
    log.info({ event: "cleanup.purged", batch_id: batchId, outcome });
    return { batch_id: batchId, skipped: false, removed, errors };
  }

  /** Staged copy and its `.staged.json` sidecar. */
  private async removeLocalStaging(batchId: BatchId): Promise<string> {
    const stagedDir = path.join(this.deps.stagingRoot, batchId);
    await fs.rm(stagedDir, { recursive: true, force: true });
    await fs.rm(stagingRecordPath(stagedDir), { force: true });
    return stagedDir;
  }

  async sweepRetention(nowMs: number): Promise<SweepReport> {
    const report = emptySweep();
    const { cleanup } = this.deps.cfg;
    // Nothing updated after this instant can be past either window.
    const shortestWindowMs = Math.max(0, Math.min(cleanup.keep_successful_days, cleanup.keep_failed_days)) * DAY_MS;
    const updatedBefore = new Date(nowMs - shortestWindowMs + 1).toISOString();

    let after: BatchId | undefined;
    while (true) {
      const page = await this.deps.ledger.list({
        statuses: ["processed", "imported", "failed", "pending"],
        updated_before: updatedBefore,
        order: "oldest",
        after,
        limit: SWEEP_PAGE_SIZE,
      });
      for (const record of page) {
        const outcome = outcomeForStatus(record.status);
        if (!outcome) continue;
        if (!isRetentionExpired(record.status, Date.parse(record.updated_at), nowMs, cleanup)) continue;
        try {
          const res = await this.purge(record.batch_id, outcome);
          if (!res.skipped && res.errors.length === 0) report.purged.push(record.batch_id);
          else if (!res.skipped) report.errors.push(...res.errors);
        } catch (err) {
          report.errors.push(`${record.batch_id}:${toErrorMessage(err)}`);
        }
      }
      const last = page.at(-1);
      if (!last || page.length < SWEEP_PAGE_SIZE) break;
      after = last.batch_id;
    }
    return report;
  }

  /**
   * Force-removes incoming batches that never produced a completion manifest
   * once their ready marker (or the directory itself) outlives the orphan
   * window, plus temp manifests left by an interrupted write.
   */
  async sweepOrphans(nowMs: number): Promise<SweepReport> {
    const { cfg, host, log, events, ledger } = this.deps;
    const report = emptySweep();
    if (!(cfg.cleanup.clean_incoming_after_hours > 0)) return report;

    for (const entry of await host.list(cfg.paths.remote_incoming)) {
      if (!entry.isDirectory || !isBatchId(entry.name)) continue;
      if (this.deps.isActive?.(entry.name)) continue;
      const batchId = entry.name;
      const dir = joinRemote(cfg.paths.remote_incoming, batchId);
      try {
        const manifest = await host.stat(joinRemote(cfg.paths.remote_reports, completionManifestName(batchId)));
        if (manifest) continue;
        const marker = await host.stat(joinRemote(dir, READY_MARKER_NAME));
        const referenceMs = marker?.mtimeMs ?? entry.mtimeMs;
        if (!isOrphanExpired(referenceMs, nowMs, cfg.cleanup)) continue;

        await host.remove(dir);
        report.orphans_removed.push(batchId);
        events.append("cleanup.orphan_removed", batchId, { had_marker: marker !== null });
        log.warn({ event: "cleanup.orphan_removed", batch_id: batchId, had_marker: marker !== null });

        // Once purged the retention sweep never revisits the batch, so the
        // local copy has to go now.
        const record = await ledger.get(batchId);
        if (record && canTransitionBatch(record.status, "purged")) {
          await this.removeLocalStaging(batchId);
          await ledger.transition(batchId, "purged", { last_error: "orphaned_incoming_removed" });
        }
      } catch (err) {
        report.errors.push(`${batchId}:${toErrorMessage(err)}`);
      }
    }

    for (const entry of await host.list(cfg.paths.remote_reports)) {
      if (entry.isDirectory || !TEMP_MANIFEST_PATTERN.test(entry.name)) continue;
      if (!isOrphanExpired(entry.mtimeMs, nowMs, cfg.cleanup)) continue;
      try {
        await host.remove(joinRemote(cfg.paths.remote_reports, entry.name));
        report.temp_manifests_removed.push(entry.name);
      } catch (err) {
        report.errors.push(`${entry.name}:${toErrorMessage(err)}`);
      }
    }

    return report;
  }

  /** Both sweeps, orphans first. */
  async runSweeps(nowMs: number): Promise<SweepReport> {
    const orphans = await this.sweepOrphans(nowMs);
    const retention = await this.sweepRetention(nowMs);
    const report: SweepReport = {
      purged: retention.purged,
      orphans_removed: orphans.orphans_removed,
      temp_manifests_removed: orphans.temp_manifests_removed,
      errors: [...orphans.errors, ...retention.errors],
    };
    this.deps.events.append("cleanup.sweep", null, {
      purged: report.purged.length,
      orphans_removed: report.orphans_removed.length,
      temp_manifests_removed: report.temp_manifests_removed.length,
      errors: report.errors.length,
    });
    return report;
  }
}
