import type { FastifyInstance } from "fastify";

import { registerBatchRoutes, type BatchRouteDeps } from "./batches.js";
import { registerPipelineRoutes, type PipelineRouteDeps } from "./pipeline.js";

export type V1RouteDeps = BatchRouteDeps & PipelineRouteDeps;

export async function registerV1Routes(app: FastifyInstance, deps: V1RouteDeps): Promise<void> {
  await registerBatchRoutes(app, deps);
  await registerPipelineRoutes(app, deps);
}
