import { execFile } from "node:child_process";

import { toErrorMessage, type BatchId } from "@photorelay/shared";

export type ImportResult =
  | { ok: true; duration_ms: number }
  | { ok: false; duration_ms: number; reason: string; timed_out: boolean };

/** Hands a validated batch directory to the photo library. */
export type ImportTrigger = (batchId: BatchId, batchDir: string) => Promise<ImportResult>;

/**
 * Runs `command` with the batch directory appended as the last argument.
 * A non-zero exit or a timeout is a failed import, never a thrown error.
 */
export function commandImportTrigger(command: readonly string[], timeoutSeconds: number): ImportTrigger {
  const [file, ...args] = command;
  if (!file) throw new Error("import command must not be empty");

  return (_batchId, batchDir) =>
    new Promise((resolve) => {
      const startedAt = Date.now();
      execFile(
        file,
        [...args, batchDir],
        { timeout: timeoutSeconds * 1000, killSignal: "SIGTERM" },
        (err, _stdout, stderr) => {
          const duration_ms = Date.now() - startedAt;
          if (!err) {
            resolve({ ok: true, duration_ms });
            return;
          }
          const timedOut = "killed" in err && err.killed === true;
          const detail = stderr.trim();
          resolve({
            ok: false,
            duration_ms,
            timed_out: timedOut,
            reason: timedOut ? "import_timeout" : detail || toErrorMessage(err),
          });
        },
      );
    });
}
