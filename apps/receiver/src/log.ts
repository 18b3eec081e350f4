import { appendFile, mkdir } from "node:fs/promises";
import path from "node:path";

import { IMPORT_LOG_NAME, formatImportLogLine, toErrorMessage } from "@photorelay/shared";

export interface ReceiverLog {
  /** Structured line on stdout. */
  event(phase: string, batchId: string, extra?: Record<string, unknown>): void;
  /** Human-readable line in `reports/import.log`. */
  importLog(message: string): Promise<void>;
}

export function createReceiverLog(reportsDir: string, now: () => Date = () => new Date()): ReceiverLog {
  const event = (phase: string, batchId: string, extra?: Record<string, unknown>): void => {
    const payload = {
      ts: now().toISOString(),
      batch_id: batchId,
      phase,
      ...(extra ?? {}),
    };
    // eslint-disable-next-line no-console
    console.log(`[receiver] ${JSON.stringify(payload)}`);
  };

  return {
    event,
    importLog: async (message) => {
      try {
        await mkdir(reportsDir, { recursive: true });
        await appendFile(path.join(reportsDir, IMPORT_LOG_NAME), formatImportLogLine(message, now()), "utf8");
      } catch (err) {
        event("import_log_failed", "-", { reason: toErrorMessage(err) });
      }
    },
  };
}
