import { mkdir, readFile, readdir, rename } from "node:fs/promises";
import path from "node:path";

import {
  buildPathLookup,
  fileExists,
  hasImageExtension,
  parseTransferManifest,
  reconcileImportedFiles,
  writeJsonAtomic,
} from "@photorelay/shared";

import { abortError, type UploadOptions } from "../src/remote/remoteHost.js";
import { LocalRemoteHost } from "../src/remote/localRemoteHost.js";

export const IMPORT_TIME = "2026-03-14T09:31:00Z";

/**
 * A local destination that imports a ready batch the first time the sender
 * polls for its completion manifest, the way the receiver would.
 */
export class FakeReceiverHost extends LocalRemoteHost {
  imports = 0;
  failUploads = false;
  blockUploads = false;
  private notifyUploadStarted: (() => void) | null = null;

  constructor(private readonly home: string) {
    super(home);
  }

  /** Resolves once the next blocked upload has begun. */
  uploadStarted(): Promise<void> {
    return new Promise<void>((resolve) => {
      this.notifyUploadStarted = resolve;
    });
  }

  override async upload(localPath: string, remotePath: string, opts: UploadOptions): Promise<void> {
    if (this.failUploads) throw new Error("disk full");
    if (this.blockUploads) {
      const signal = opts.signal;
      this.notifyUploadStarted?.();
      await new Promise<void>((resolve) => {
        if (!signal || signal.aborted) resolve();
        else signal.addEventListener("abort", () => resolve(), { once: true });
      });
      if (signal) throw abortError(signal);
    }
    await super.upload(localPath, remotePath, opts);
  }

  override async readText(remotePath: string): Promise<string | null> {
    const match = /manifest_(\d{8}_\d{6})\.json$/.exec(remotePath);
    if (match?.[1]) await this.importIfReady(match[1]);
    return super.readText(remotePath);
  }

  private async importIfReady(batchId: string): Promise<void> {
    const dir = path.join(this.home, "IncomingPhotos", batchId);
    const manifestPath = path.join(this.home, "ImportReports", `manifest_${batchId}.json`);
    if (!(await fileExists(path.join(dir, ".ready"))) || (await fileExists(manifestPath))) return;

    const transfer = parseTransferManifest(JSON.parse(await readFile(path.join(dir, "transfer_manifest.json"), "utf8")));
    const lookup = buildPathLookup(transfer, this.home);
    const images = (await readdir(dir))
      .filter((name) => hasImageExtension(name, ["heic", "jpg", "jpeg"]))
      .sort()
      .map((name) => path.join(dir, name));
    const { records, warnings } = reconcileImportedFiles(images, lookup, IMPORT_TIME);
    await mkdir(path.dirname(manifestPath), { recursive: true });
    await writeJsonAtomic(manifestPath, {
      batch_id: batchId,
      timestamp: IMPORT_TIME,
      count: records.length,
      files: records,
      warnings,
    });
    await mkdir(path.join(this.home, "ProcessedPhotos"), { recursive: true });
    await rename(dir, path.join(this.home, "ProcessedPhotos", batchId));
    this.imports += 1;
  }
}
