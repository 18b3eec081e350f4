import type { FastifyReply } from "fastify";

import {
  BatchIdConflictError,
  BatchNotFoundError,
  InvalidBatchTransitionError,
  TransferError,
  isPipelineError,
} from "@photorelay/shared";

export type ReasonCode =
  | "invalid_request"
  | "batch_id_conflict"
  | "batch_not_found"
  | "invalid_batch_transition"
  | "no_files_staged"
  | "destination_error";

export interface ErrorPayload {
  error: true;
  reason_code: ReasonCode;
  reason: string;
  details: Record<string, unknown>;
}

const REASON_CODE_TO_HTTP: Record<ReasonCode, number> = {
  invalid_request: 400,
  batch_id_conflict: 409,
  batch_not_found: 404,
  invalid_batch_transition: 409,
  no_files_staged: 422,
  destination_error: 502,
};

export function buildErrorPayload(
  reason_code: ReasonCode,
  details?: Record<string, unknown>,
  reason?: string,
): ErrorPayload {
  return {
    error: true,
    reason_code,
    reason: reason ?? reason_code,
    details: details ?? {},
  };
}

export function sendError(reply: FastifyReply, payload: ErrorPayload): FastifyReply {
  return reply.code(REASON_CODE_TO_HTTP[payload.reason_code]).send(payload);
}

/** Maps pipeline errors onto reason codes; anything else is rethrown for Fastify's 500. */
export function sendPipelineError(reply: FastifyReply, err: unknown): FastifyReply {
  if (err instanceof BatchIdConflictError) {
    return sendError(reply, buildErrorPayload("batch_id_conflict", { batch_id: err.batchId }, err.message));
  }
  if (err instanceof BatchNotFoundError) {
    return sendError(reply, buildErrorPayload("batch_not_found", { batch_id: err.batchId }, err.message));
  }
  if (err instanceof InvalidBatchTransitionError) {
    return sendError(
      reply,
      buildErrorPayload("invalid_batch_transition", { batch_id: err.batchId, from: err.from, to: err.to }, err.message),
    );
  }
  if (err instanceof TransferError) {
    return sendError(reply, buildErrorPayload("no_files_staged", {}, err.message));
  }
  if (isPipelineError(err)) {
    return sendError(reply, buildErrorPayload("destination_error", { kind: err.kind, retryable: err.retryable }, err.message));
  }
  throw err;
}
