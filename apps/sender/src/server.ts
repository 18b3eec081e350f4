import Fastify, { type FastifyInstance } from "fastify";

import { toErrorMessage, type PipelineConfig } from "@photorelay/shared";

import type { AppConfig } from "./config.js";
import { setDbLogger, type DbPool } from "./db/pool.js";
import type { BatchLedger } from "./ledger/batchLedger.js";
import { PipelineEventLog } from "./pipeline/events.js";
import { BatchRunner } from "./pipeline/runBatch.js";
import { systemClock, type Clock, type LoggerLike } from "./pipeline/types.js";
import type { RemoteHost } from "./remote/remoteHost.js";
import { sendUdpBroadcast, type WakeSender } from "./remote/wake.js";
import { registerHealthRoutes } from "./routes/health.js";
import { registerV1Routes } from "./routes/v1/index.js";

export interface BuildContext {
  config: AppConfig;
  pipeline: Readonly<PipelineConfig>;
  ledger: BatchLedger;
  /** A host, or a factory that receives the server's logger. */
  host: RemoteHost | ((log: LoggerLike) => RemoteHost);
  pool?: DbPool;
  wake?: WakeSender;
  clock?: Clock;
  logger?: boolean;
}

export interface SenderServer {
  app: FastifyInstance;
  runner: BatchRunner;
  events: PipelineEventLog;
}

export async function buildServer(ctx: BuildContext): Promise<SenderServer> {
  const app = Fastify({ logger: ctx.logger ?? true });
  const clock = ctx.clock ?? systemClock;
  const host = typeof ctx.host === "function" ? ctx.host(app.log) : ctx.host;
  const events = new PipelineEventLog(undefined, () => new Date(clock.now()).toISOString());
  const runner = new BatchRunner({
    cfg: ctx.pipeline,
    host,
    ledger: ctx.ledger,
    events,
    log: app.log,
    clock,
    wake: ctx.wake ?? sendUdpBroadcast,
    homeDir: ctx.config.homeDir,
  });
  let sweepTimer: NodeJS.Timeout | undefined;
  let sweepInFlight = false;

  if (ctx.pool) setDbLogger(app.log);

  await registerHealthRoutes(app, runner, ctx.pool);
  await registerV1Routes(app, {
    runner,
    ledger: ctx.ledger,
    host,
    cfg: ctx.pipeline,
    events,
    clock,
  });

  async function runSweepCycle(source: string): Promise<void> {
    if (sweepInFlight) return;
    sweepInFlight = true;
    try {
      const report = await runner.cleanup.runSweeps(clock.now());
      if (report.purged.length || report.orphans_removed.length || report.errors.length) {
        app.log.info(
          {
            source,
            purged: report.purged.length,
            orphans_removed: report.orphans_removed.length,
            temp_manifests_removed: report.temp_manifests_removed.length,
            errors: report.errors,
          },
          "cleanup sweep completed",
        );
      }
    } catch (err) {
      app.log.error({ source, message: toErrorMessage(err) }, "cleanup sweep failed");
    } finally {
      sweepInFlight = false;
    }
  }

  app.addHook("onReady", async () => {
    if (ctx.pipeline.cleanup.startup_cleanup) {
      await runSweepCycle("startup_cleanup");
    }
    if (!ctx.config.cleanupSweepEnabled) return;
    sweepTimer = setInterval(() => {
      void runSweepCycle("cleanup_sweep");
    }, ctx.config.cleanupSweepIntervalMs);
    app.log.info({ interval_ms: ctx.config.cleanupSweepIntervalMs }, "cleanup sweep enabled");
  });

  // Keep process lifecycle explicit.
  app.addHook("onClose", async () => {
    if (sweepTimer) {
      clearInterval(sweepTimer);
      sweepTimer = undefined;
    }
    await runner.close();
    await host.close();
    await ctx.pool?.end();
  });

  return { app, runner, events };
}
