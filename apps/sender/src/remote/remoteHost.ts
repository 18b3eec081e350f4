import { open } from "node:fs/promises";

import { TransferAbortedError } from "@photorelay/shared";

export interface RemoteEntry {
  name: string;
  isDirectory: boolean;
  size: number;
  mtimeMs: number;
}

export interface RemoteStat {
  isDirectory: boolean;
  size: number;
  mtimeMs: number;
}

export interface UploadOptions {
  chunkSize: number;
  signal?: AbortSignal;
  onChunk?: (bytes: number) => void;
}

/**
 * The destination machine as seen from the sender. Paths are the configured
 * `remote_*` forms, where a leading `~` means the destination user's home.
 */
export interface RemoteHost {
  readonly kind: "ssh" | "local";
  /**
   * Resolves when the destination answers. A name that cannot be resolved
   * rejects with a non-retryable ConnectivityError; other failures yield false.
   */
  testConnection(): Promise<boolean>;
  mkdirp(remotePath: string): Promise<void>;
  stat(remotePath: string): Promise<RemoteStat | null>;
  list(remoteDir: string): Promise<RemoteEntry[]>;
  /** Null when the file does not exist. */
  readText(remotePath: string): Promise<string | null>;
  writeText(remotePath: string, content: string): Promise<void>;
  /** Removes a file or a whole tree; missing paths are not an error. */
  remove(remotePath: string): Promise<void>;
  touch(remotePath: string): Promise<void>;
  upload(localPath: string, remotePath: string, opts: UploadOptions): Promise<void>;
  close(): Promise<void>;
}

export function joinRemote(...parts: string[]): string {
  return parts
    .filter((p) => p.length > 0)
    .map((p, idx) => (idx === 0 ? p.replace(/\/+$/, "") : p.replace(/^\/+|\/+$/g, "")))
    .join("/");
}

export function abortError(signal: AbortSignal): TransferAbortedError {
  return signal.reason instanceof TransferAbortedError ? signal.reason : new TransferAbortedError("cancelled");
}

/** Reads a local file in fixed-size chunks, checking the signal between chunks. */
export async function* readChunks(localPath: string, chunkSize: number, signal?: AbortSignal): AsyncGenerator<Buffer> {
  const handle = await open(localPath, "r");
  try {
    while (true) {
      if (signal?.aborted) throw abortError(signal);
      const buf = Buffer.alloc(chunkSize);
      const { bytesRead } = await handle.read(buf, 0, chunkSize, null);
      if (bytesRead === 0) return;
      yield bytesRead === chunkSize ? buf : buf.subarray(0, bytesRead);
    }
  } finally {
    await handle.close();
  }
}
