import {
  READY_MARKER_NAME,
  TRANSFER_MANIFEST_NAME,
  TransferAbortedError,
  TransferError,
  formatManifestTimestamp,
  toErrorMessage,
  type BatchId,
  type PipelineConfig,
  type TransferManifest,
} from "@photorelay/shared";

import { abortError, joinRemote, type RemoteHost } from "../remote/remoteHost.js";
import type { StagedFile } from "./staging.js";
import type { Clock, LoggerLike } from "./types.js";

export interface TransferInput {
  batchId: BatchId;
  files: StagedFile[];
  cfg: Readonly<PipelineConfig>;
  host: RemoteHost;
  clock: Clock;
  log: LoggerLike;
  signal?: AbortSignal;
  onBytes?: (bytes: number) => void;
}

export interface TransferResult {
  remote_dir: string;
  transferred: number;
  resumed: number;
  bytes: number;
}

type FileOutcome = "uploaded" | "resumed";

function throwIfAborted(signal: AbortSignal | undefined): void {
  if (signal?.aborted) throw abortError(signal);
}

async function sendFile(input: TransferInput, file: StagedFile, remotePath: string): Promise<FileOutcome> {
  const existing = await input.host.stat(remotePath);
  if (existing && !existing.isDirectory) {
    if (existing.size === file.size) return "resumed";
    // Partial or stale copy from an earlier attempt.
    await input.host.remove(remotePath);
  }
  await input.host.upload(file.local_path, remotePath, {
    chunkSize: input.cfg.transfer.chunk_size,
    signal: input.signal,
    onChunk: input.onBytes,
  });
  return "uploaded";
}

/**
 * Delivers a staged batch into `remote_incoming/<batchId>/`. The transfer
 * manifest is written only after every file arrived, and the ready marker
 * only after the manifest.
 */
export async function transferBatch(input: TransferInput): Promise<TransferResult> {
  const { batchId, cfg, host, log, clock, signal } = input;
  const remoteDir = joinRemote(cfg.paths.remote_incoming, batchId);
  const retryCount = cfg.transfer.retry_count;
  const retryDelayMs = cfg.transfer.retry_delay * 1000;

  throwIfAborted(signal);
  await host.mkdirp(remoteDir);

  let transferred = 0;
  let resumed = 0;
  let bytes = 0;
  const entries: TransferManifest["files"] = [];

  for (const file of input.files) {
    const remotePath = joinRemote(remoteDir, file.name);
    let attempt = 0;
    while (true) {
      throwIfAborted(signal);
      attempt += 1;
      try {
        const outcome = await sendFile(input, file, remotePath);
        if (outcome === "resumed") {
          resumed += 1;
          input.onBytes?.(file.size);
        } else {
          transferred += 1;
        }
        bytes += file.size;
        break;
      } catch (err) {
        if (err instanceof TransferAbortedError) throw err;
        if (attempt > retryCount) {
          log.error({ event: "transfer.file.failed", batch_id: batchId, file: file.name, attempts: attempt });
          throw new TransferError(`failed to transfer ${file.name}: ${toErrorMessage(err)}`, {
            file: file.name,
            attempts: attempt,
          });
        }
        log.warn({
          event: "transfer.file.retry",
          batch_id: batchId,
          file: file.name,
          attempt,
          message: toErrorMessage(err),
        });
        await clock.sleep(retryDelayMs, signal);
      }
    }
    entries.push({ remote_path: remotePath, original_path: file.original_path });
  }

  throwIfAborted(signal);
  const manifest: TransferManifest & { batch_id: BatchId; timestamp: string } = {
    batch_id: batchId,
    timestamp: formatManifestTimestamp(new Date(clock.now())),
    files: entries,
  };
  await host.writeText(joinRemote(remoteDir, TRANSFER_MANIFEST_NAME), `${JSON.stringify(manifest, null, 2)}\n`);
  throwIfAborted(signal);
  await host.writeText(joinRemote(remoteDir, READY_MARKER_NAME), "");

  try {
    await host.touch(cfg.paths.remote_incoming);
  } catch (err) {
    log.warn({ event: "transfer.nudge_failed", batch_id: batchId, message: toErrorMessage(err) });
  }

  return { remote_dir: remoteDir, transferred, resumed, bytes };
}
