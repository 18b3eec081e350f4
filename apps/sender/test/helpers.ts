import { mkdir, mkdtemp, writeFile } from "node:fs/promises";
import os from "node:os";
import path from "node:path";

import { parsePipelineConfig, type PipelineConfig } from "@photorelay/shared";

import type { Clock, LoggerLike } from "../src/pipeline/types.js";

/** Virtual time: sleeping advances the clock instead of waiting. */
export class FakeClock implements Clock {
  readonly sleeps: number[] = [];

  constructor(public current: number = Date.UTC(2026, 2, 14, 9, 30, 0)) {}

  now(): number {
    return this.current;
  }

  async sleep(ms: number, signal?: AbortSignal): Promise<void> {
    if (signal?.aborted) return;
    this.sleeps.push(ms);
    this.current += ms;
    await new Promise<void>((resolve) => setImmediate(resolve));
  }
}

export type LogLine = { level: "info" | "warn" | "error"; obj: Record<string, unknown> };

export class MemoryLog implements LoggerLike {
  readonly lines: LogLine[] = [];

  info(obj: object): void {
    this.lines.push({ level: "info", obj: Object.fromEntries(Object.entries(obj)) });
  }

  warn(obj: object): void {
    this.lines.push({ level: "warn", obj: Object.fromEntries(Object.entries(obj)) });
  }

  error(obj: object): void {
    this.lines.push({ level: "error", obj: Object.fromEntries(Object.entries(obj)) });
  }

  events(): unknown[] {
    return this.lines.map((l) => l.obj.event);
  }
}

/** A `local` transport config; the remote and staging paths all live under `~`. */
export function testConfig(overrides: Record<string, Record<string, unknown>> = {}): Readonly<PipelineConfig> {
  return parsePipelineConfig({
    ...overrides,
    destination: { transport: "local", mac_address: "00:11:22:33:44:55", ...overrides.destination },
    transfer: { retry_delay: 1, ...overrides.transfer },
  });
}

export async function makeHome(prefix: string): Promise<string> {
  return mkdtemp(path.join(os.tmpdir(), `photorelay-${prefix}-`));
}

export async function writePhoto(dir: string, name: string, content: string): Promise<string> {
  await mkdir(dir, { recursive: true });
  const p = path.join(dir, name);
  await writeFile(p, content);
  return p;
}
