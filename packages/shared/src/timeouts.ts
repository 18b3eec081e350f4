export interface TransferTimeoutSettings {
  timeout_seconds: number;
  timeout_per_photo: number;
}

export function dynamicTimeoutSec(fileCount: number, cfg: TransferTimeoutSettings): number {
  const count = Math.max(1, Math.floor(fileCount));
  return Math.min(cfg.timeout_seconds, cfg.timeout_per_photo * count);
}

/** Poll interval while waiting for a completion manifest. */
export function pollBackoffMs(elapsedMs: number): number {
  if (elapsedMs < 5_000) return 1_000;
  if (elapsedMs < 15_000) return 2_000;
  return 5_000;
}

export async function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  if (signal?.aborted) return;
  await new Promise<void>((resolve) => {
    const timer = setTimeout(done, ms);
    function done(): void {
      clearTimeout(timer);
      signal?.removeEventListener("abort", done);
      resolve();
    }
    signal?.addEventListener("abort", done, { once: true });
  });
}
