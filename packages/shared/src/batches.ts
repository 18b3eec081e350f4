import type { BatchId } from "./ids.js";

export const BatchStatus = {
  Staged: "staged",
  Transferring: "transferring",
  AwaitingImport: "awaiting_import",
  Imported: "imported",
  Processed: "processed",
  Purged: "purged",
  Failed: "failed",
  Pending: "pending",
} as const;

export type BatchStatus = (typeof BatchStatus)[keyof typeof BatchStatus];

export const BATCH_STATUSES: readonly BatchStatus[] = Object.values(BatchStatus);

const TRANSITIONS: Record<BatchStatus, readonly BatchStatus[]> = {
  staged: ["transferring", "failed"],
  // A transfer aborted by timeout or shutdown returns the batch to staged.
  transferring: ["awaiting_import", "failed", "staged"],
  awaiting_import: ["imported", "pending"],
  pending: ["imported", "purged"],
  imported: ["processed", "purged"],
  processed: ["purged"],
  failed: ["purged"],
  purged: [],
};

export function isBatchStatus(raw: unknown): raw is BatchStatus {
  return typeof raw === "string" && BATCH_STATUSES.some((status) => status === raw);
}

export function canTransitionBatch(from: BatchStatus, to: BatchStatus): boolean {
  return TRANSITIONS[from].includes(to);
}

export type BatchOutcome = "success" | "failed" | "pending";

export function outcomeForStatus(status: BatchStatus): BatchOutcome | null {
  switch (status) {
    case "imported":
    case "processed":
      return "success";
    case "failed":
      return "failed";
    case "pending":
      return "pending";
    default:
      return null;
  }
}

export interface BatchRecord {
  batch_id: BatchId;
  status: BatchStatus;
  file_count: number;
  staged_dir: string;
  timeout_sec: number;
  imported_count: number | null;
  warnings: string[];
  last_error: string | null;
  created_at: string;
  updated_at: string;
}

export const RemoteBatchState = {
  Absent: "absent",
  Transferring: "transferring",
  AwaitingImport: "awaiting_import",
  ProtocolViolation: "protocol_violation",
  Imported: "imported",
  Processed: "processed",
} as const;

export type RemoteBatchState = (typeof RemoteBatchState)[keyof typeof RemoteBatchState];

export interface RemoteBatchFacts {
  incomingDirExists: boolean;
  readyMarkerExists: boolean;
  transferManifestExists: boolean;
  completionManifestExists: boolean;
  processedDirExists: boolean;
}

/**
 * Destination state from presence checks only. The completion manifest wins
 * over everything else: once it exists the batch has been imported, whatever
 * is left in incoming.
 */
export function deriveRemoteBatchState(facts: RemoteBatchFacts): RemoteBatchState {
  if (facts.completionManifestExists) {
    if (facts.incomingDirExists) return "imported";
    if (facts.processedDirExists) return "processed";
    return "imported";
  }
  if (!facts.incomingDirExists) return "absent";
  if (!facts.readyMarkerExists) return "transferring";
  if (!facts.transferManifestExists) return "protocol_violation";
  return "awaiting_import";
}
