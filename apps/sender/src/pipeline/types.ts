import { sleep } from "@photorelay/shared";

export type LoggerLike = {
  info(obj: object, msg?: string): void;
  warn(obj: object, msg?: string): void;
  error(obj: object, msg?: string): void;
};

export interface Clock {
  now(): number;
  /** Resolves early, without throwing, when the signal aborts. */
  sleep(ms: number, signal?: AbortSignal): Promise<void>;
}

export const systemClock: Clock = {
  now: () => Date.now(),
  sleep: (ms, signal) => sleep(ms, signal),
};

/** Structured console lines for the CLI scripts, which run without Fastify. */
export function consoleLogger(source: string): LoggerLike {
  const write = (level: string, obj: object, msg?: string): void => {
    // eslint-disable-next-line no-console
    console.error(JSON.stringify({ level, source, ...obj, ...(msg ? { msg } : {}) }));
  };
  return {
    info: (obj, msg) => write("info", obj, msg),
    warn: (obj, msg) => write("warn", obj, msg),
    error: (obj, msg) => write("error", obj, msg),
  };
}
