import fs from "node:fs/promises";
import path from "node:path";

import { errnoCode, expandHome } from "@photorelay/shared";

import { readChunks, type RemoteEntry, type RemoteHost, type RemoteStat, type UploadOptions } from "./remoteHost.js";

/**
 * Destination directories on the same machine. `~` expands to `homeDir`,
 * which tests point at a temp directory.
 */
export class LocalRemoteHost implements RemoteHost {
  readonly kind = "local" as const;

  constructor(private readonly homeDir: string) {}

  resolve(remotePath: string): string {
    return path.resolve(expandHome(remotePath, this.homeDir));
  }

  async testConnection(): Promise<boolean> {
    try {
      await fs.access(this.homeDir);
      return true;
    } catch {
      return false;
    }
  }

  async mkdirp(remotePath: string): Promise<void> {
    await fs.mkdir(this.resolve(remotePath), { recursive: true });
  }

  async stat(remotePath: string): Promise<RemoteStat | null> {
    try {
      const st = await fs.stat(this.resolve(remotePath));
      return { isDirectory: st.isDirectory(), size: st.size, mtimeMs: st.mtimeMs };
    } catch (err) {
      if (errnoCode(err) === "ENOENT") return null;
      throw err;
    }
  }

  async list(remoteDir: string): Promise<RemoteEntry[]> {
    const dir = this.resolve(remoteDir);
    let names: string[];
    try {
      names = await fs.readdir(dir);
    } catch (err) {
      if (errnoCode(err) === "ENOENT") return [];
      throw err;
    }
    const entries: RemoteEntry[] = [];
    for (const name of names) {
      try {
        const st = await fs.stat(path.join(dir, name));
        entries.push({ name, isDirectory: st.isDirectory(), size: st.size, mtimeMs: st.mtimeMs });
      } catch (err) {
        // Removed between readdir and stat.
        if (errnoCode(err) !== "ENOENT") throw err;
      }
    }
    return entries.sort((a, b) => a.name.localeCompare(b.name));
  }

  async readText(remotePath: string): Promise<string | null> {
    try {
      return await fs.readFile(this.resolve(remotePath), "utf8");
    } catch (err) {
      if (errnoCode(err) === "ENOENT") return null;
      throw err;
    }
  }

  async writeText(remotePath: string, content: string): Promise<void> {
    await fs.writeFile(this.resolve(remotePath), content, "utf8");
  }

  async remove(remotePath: string): Promise<void> {
    await fs.rm(this.resolve(remotePath), { recursive: true, force: true });
  }

  async touch(remotePath: string): Promise<void> {
    const now = new Date();
    await fs.utimes(this.resolve(remotePath), now, now);
  }

  async upload(localPath: string, remotePath: string, opts: UploadOptions): Promise<void> {
    const handle = await fs.open(this.resolve(remotePath), "w");
    try {
      for await (const chunk of readChunks(localPath, opts.chunkSize, opts.signal)) {
        await handle.write(chunk, 0, chunk.length, null);
        opts.onChunk?.(chunk.length);
      }
      await handle.sync();
    } finally {
      await handle.close();
    }
  }

  async close(): Promise<void> {
    // Nothing held open between calls.
  }
}
