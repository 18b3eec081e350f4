import type { FastifyInstance } from "fastify";

import type { DbPool } from "../db/pool.js";
import type { BatchRunner } from "../pipeline/runBatch.js";

export async function registerHealthRoutes(
  app: FastifyInstance,
  runner: BatchRunner,
  pool?: DbPool,
): Promise<void> {
  app.get("/health", async () => {
    if (pool) await pool.query("SELECT 1");
    return {
      ok: true,
      runner: { active: runner.activeCount, queued: runner.queuedCount },
    };
  });
}
