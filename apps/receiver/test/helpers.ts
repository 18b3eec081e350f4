import { mkdir, mkdtemp, writeFile } from "node:fs/promises";
import os from "node:os";
import path from "node:path";

import {
  READY_MARKER_NAME,
  TRANSFER_MANIFEST_NAME,
  parsePipelineConfig,
  type PipelineConfig,
  type TransferManifestEntry,
} from "@photorelay/shared";

import { resolveReceiverPaths, type ReceiverPaths } from "../src/incoming.js";
import type { ReceiverLog } from "../src/log.js";

export const IMPORT_TIME = "2026-03-14T09:31:00Z";
export const fixedNow = (): Date => new Date(IMPORT_TIME);

export class MemoryReceiverLog implements ReceiverLog {
  readonly lines: string[] = [];
  readonly phases: { phase: string; batchId: string; extra?: Record<string, unknown> }[] = [];

  event(phase: string, batchId: string, extra?: Record<string, unknown>): void {
    this.phases.push({ phase, batchId, extra });
  }

  async importLog(message: string): Promise<void> {
    this.lines.push(message);
  }
}

export type ReceiverFixture = { home: string; cfg: Readonly<PipelineConfig>; paths: ReceiverPaths };

export async function makeReceiver(prefix: string): Promise<ReceiverFixture> {
  const home = await mkdtemp(path.join(os.tmpdir(), `photorelay-rx-${prefix}-`));
  const cfg = parsePipelineConfig({});
  const paths = resolveReceiverPaths(cfg, home);
  for (const dir of [paths.incoming, paths.processed, paths.reports]) {
    await mkdir(dir, { recursive: true });
  }
  return { home, cfg, paths };
}

export interface BatchSetup {
  files: string[];
  /** Defaults to one entry per image, mapped under `/Users/test/Pictures/trip/`. */
  manifest?: TransferManifestEntry[] | null;
  ready?: boolean;
}

/** Lays out a delivered batch the way the sender leaves it. */
export async function writeBatch(fx: ReceiverFixture, batchId: string, setup: BatchSetup): Promise<string> {
  const dir = path.join(fx.paths.incoming, batchId);
  await mkdir(dir, { recursive: true });
  for (const name of setup.files) {
    await writeFile(path.join(dir, name), `bytes-of-${name}`);
  }
  const entries =
    setup.manifest === undefined
      ? setup.files.map((name) => ({
          remote_path: `~/IncomingPhotos/${batchId}/${name}`,
          original_path: `/Users/test/Pictures/trip/${name}`,
        }))
      : setup.manifest;
  if (entries !== null) {
    await writeFile(
      path.join(dir, TRANSFER_MANIFEST_NAME),
      JSON.stringify({ batch_id: batchId, timestamp: "2026-03-14T09:30:30Z", files: entries }),
    );
  }
  if (setup.ready ?? true) {
    await writeFile(path.join(dir, READY_MARKER_NAME), "");
  }
  return dir;
}
