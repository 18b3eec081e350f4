import type { FastifyInstance } from "fastify";

import { isBatchId } from "@photorelay/shared";

import type { PipelineEventLog } from "../../pipeline/events.js";
import type { BatchRunner } from "../../pipeline/runBatch.js";
import type { Clock } from "../../pipeline/types.js";
import { buildErrorPayload, sendError } from "../errors.js";

export interface PipelineRouteDeps {
  runner: BatchRunner;
  events: PipelineEventLog;
  clock: Clock;
}

export async function registerPipelineRoutes(app: FastifyInstance, deps: PipelineRouteDeps): Promise<void> {
  app.get<{ Querystring: { after?: string; limit?: string } }>("/v1/pipeline/events", async (req, reply) => {
    let limit = 200;
    if (req.query.limit) {
      const n = Number(req.query.limit);
      if (!Number.isInteger(n) || n <= 0) {
        return sendError(reply, buildErrorPayload("invalid_request", { field: "limit" }));
      }
      limit = n;
    }
    const after = req.query.after?.trim() || undefined;
    const events = deps.events.list(after, limit);
    const last = events[events.length - 1];
    return { events, next_after: last ? last.event_id : (after ?? null) };
  });

  app.post<{ Body: { batch_id?: unknown } | undefined }>("/v1/pipeline/cancel", async (req, reply) => {
    const raw = req.body?.batch_id;
    let batchId: string | undefined;
    if (raw !== undefined) {
      if (typeof raw !== "string" || !isBatchId(raw)) {
        return sendError(reply, buildErrorPayload("invalid_request", { field: "batch_id" }));
      }
      batchId = raw;
    }
    const cancelled = deps.runner.cancel(batchId);
    return { cancelled };
  });

  app.post("/v1/pipeline/cleanup", async () => {
    const report = await deps.runner.cleanup.runSweeps(deps.clock.now());
    return { report };
  });
}
