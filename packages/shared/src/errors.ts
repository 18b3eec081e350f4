export type PipelineErrorKind =
  | "connectivity"
  | "transfer"
  | "protocol_violation"
  | "reconciliation"
  | "configuration"
  | "conflict"
  | "not_found";

export class PipelineError extends Error {
  public readonly kind: PipelineErrorKind;
  public readonly retryable: boolean;

  constructor(kind: PipelineErrorKind, message: string, retryable: boolean) {
    super(message);
    this.name = "PipelineError";
    this.kind = kind;
    this.retryable = retryable;
  }
}

/** Destination asleep or unreachable. */
export class ConnectivityError extends PipelineError {
  constructor(message = "could not reach destination", retryable = true) {
    super("connectivity", message, retryable);
    this.name = "ConnectivityError";
  }
}

export class TransferError extends PipelineError {
  public readonly file?: string;
  public readonly attempts?: number;

  constructor(message: string, opts: { file?: string; attempts?: number } = {}) {
    super("transfer", message, true);
    this.name = "TransferError";
    this.file = opts.file;
    this.attempts = opts.attempts;
  }
}

export type TransferAbortReason = "timeout" | "cancelled";

/** Raised from an abort signal mid-transfer; the batch stays retryable. */
export class TransferAbortedError extends TransferError {
  public readonly reason: TransferAbortReason;

  constructor(reason: TransferAbortReason) {
    super(`transfer aborted: ${reason}`);
    this.name = "TransferAbortedError";
    this.reason = reason;
  }
}

export class ProtocolViolationError extends PipelineError {
  public readonly batchId?: string;

  constructor(message: string, batchId?: string) {
    super("protocol_violation", message, false);
    this.name = "ProtocolViolationError";
    this.batchId = batchId;
  }
}

export class ReconciliationError extends PipelineError {
  public readonly batchId?: string;

  constructor(message: string, batchId?: string) {
    super("reconciliation", message, false);
    this.name = "ReconciliationError";
    this.batchId = batchId;
  }
}

export class ConfigurationError extends PipelineError {
  constructor(message: string) {
    super("configuration", message, false);
    this.name = "ConfigurationError";
  }
}

export class BatchIdConflictError extends PipelineError {
  constructor(public readonly batchId: string) {
    super("conflict", `batch_id_conflict:${batchId}`, false);
    this.name = "BatchIdConflictError";
  }
}

export class BatchNotFoundError extends PipelineError {
  constructor(public readonly batchId: string) {
    super("not_found", `batch_not_found:${batchId}`, false);
    this.name = "BatchNotFoundError";
  }
}

export class InvalidBatchTransitionError extends PipelineError {
  constructor(
    public readonly batchId: string,
    public readonly from: string,
    public readonly to: string,
  ) {
    super("conflict", `invalid_batch_transition:${batchId}:${from}->${to}`, false);
    this.name = "InvalidBatchTransitionError";
  }
}

export function isPipelineError(err: unknown): err is PipelineError {
  return err instanceof PipelineError;
}

export function toErrorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}
