import { chmod, readFile, stat as statLocal } from "node:fs/promises";

import ssh2 from "ssh2";
import type { Client as SshClient, SFTPWrapper } from "ssh2";

import {
  ConfigurationError,
  ConnectivityError,
  errnoCode,
  expandHome,
  type DestinationConfig,
} from "@photorelay/shared";

import type { LoggerLike } from "../pipeline/types.js";
import { decideHostKey, fingerprintOf, hostKeyId, loadKnownHosts, saveKnownHosts } from "./knownHosts.js";
import { joinRemote, readChunks, type RemoteEntry, type RemoteHost, type RemoteStat, type UploadOptions } from "./remoteHost.js";

const { Client } = ssh2;

const SFTP_NO_SUCH_FILE = 2;
const S_IFMT = 0o170000;
const S_IFDIR = 0o040000;
const READY_TIMEOUT_MS = 10_000;

type Session = { client: SshClient; sftp: SFTPWrapper };

function isNoSuchFile(err: unknown): boolean {
  return !!err && typeof err === "object" && "code" in err && err.code === SFTP_NO_SUCH_FILE;
}

/** `~/X` is relative to the SFTP session's starting directory, the user's home. */
export function toSftpPath(remotePath: string): string {
  if (remotePath === "~") return ".";
  if (remotePath.startsWith("~/")) return remotePath.slice(2) || ".";
  return remotePath;
}

export function parseDestinationHost(raw: string): { username: string; hostname: string } {
  const at = raw.lastIndexOf("@");
  if (at <= 0 || at === raw.length - 1) {
    throw new ConfigurationError("destination.host must look like user@hostname");
  }
  return { username: raw.slice(0, at), hostname: raw.slice(at + 1) };
}

/**
 * Private key must exist; a key readable by group or others is tightened to
 * 0600 with a warning, as ssh itself would refuse it.
 */
export async function checkPrivateKey(keyPath: string, log: LoggerLike): Promise<Buffer> {
  let mode: number;
  try {
    mode = (await statLocal(keyPath)).mode;
  } catch (err) {
    if (errnoCode(err) === "ENOENT") throw new ConfigurationError(`ssh key not found: ${keyPath}`);
    throw err;
  }
  if ((mode & 0o077) !== 0) {
    log.warn({ event: "ssh.key.permissions_fixed", key_path: keyPath, mode: (mode & 0o777).toString(8) });
    await chmod(keyPath, 0o600);
  }
  return readFile(keyPath);
}

export class SshRemoteHost implements RemoteHost {
  readonly kind = "ssh" as const;
  private session: Session | null = null;
  private connecting: Promise<Session> | null = null;

  constructor(
    private readonly dest: DestinationConfig,
    private readonly localHome: string,
    private readonly log: LoggerLike,
  ) {}

  private async openSession(): Promise<Session> {
    const { username, hostname } = parseDestinationHost(this.dest.host);
    const privateKey = await checkPrivateKey(expandHome(this.dest.ssh_key_path, this.localHome), this.log);
    const knownHostsPath = expandHome(this.dest.known_hosts_path, this.localHome);
    const known = await loadKnownHosts(knownHostsPath);
    const id = hostKeyId(hostname, this.dest.port);
    const verdict: { rejection: ConfigurationError | null; recordFingerprint: string | null } = {
      rejection: null,
      recordFingerprint: null,
    };

    const client = new Client();
    client.on("close", () => {
      if (this.session?.client === client) this.session = null;
    });
    client.on("error", (err: Error) => {
      this.log.warn({ event: "ssh.connection.error", message: err.message });
    });
    await new Promise<void>((resolve, reject) => {
      client.once("ready", () => resolve());
      client.once("error", (err: Error) => reject(verdict.rejection ?? err));
      client.connect({
        host: hostname,
        port: this.dest.port,
        username,
        privateKey,
        readyTimeout: READY_TIMEOUT_MS,
        hostVerifier: (key: Buffer): boolean => {
          const fingerprint = fingerprintOf(key);
          const decision = decideHostKey(this.dest.host_key_policy, known, id, fingerprint);
          if (!decision.ok) {
            verdict.rejection = new ConfigurationError(`host key rejected for ${id}: ${decision.reason}`);
            return false;
          }
          if (decision.record) verdict.recordFingerprint = fingerprint;
          return true;
        },
      });
    });

    const recorded = verdict.recordFingerprint;
    if (recorded) {
      await saveKnownHosts(knownHostsPath, { ...known, [id]: recorded });
      this.log.info({ event: "ssh.host_key.recorded", host: id, fingerprint: recorded });
    }

    const sftp = await new Promise<SFTPWrapper>((resolve, reject) => {
      client.sftp((err: Error | undefined, channel: SFTPWrapper) => (err ? reject(err) : resolve(channel)));
    });
    return { client, sftp };
  }

  private async sftp(): Promise<SFTPWrapper> {
    if (this.session) return this.session.sftp;
    if (!this.connecting) {
      this.connecting = this.openSession().finally(() => {
        this.connecting = null;
      });
    }
    const session = await this.connecting;
    this.session = session;
    return session.sftp;
  }

  async testConnection(): Promise<boolean> {
    try {
      const sftp = await this.sftp();
      await new Promise<void>((resolve, reject) => {
        sftp.realpath(".", (err: Error | undefined | null) => (err ? reject(err) : resolve()));
      });
      return true;
    } catch (err) {
      if (err instanceof ConfigurationError) throw err;
      if (errnoCode(err) === "ENOTFOUND") {
        throw new ConnectivityError(`destination host not found: ${this.dest.host}`, false);
      }
      this.session = null;
      return false;
    }
  }

  async mkdirp(remotePath: string): Promise<void> {
    const target = toSftpPath(remotePath);
    const absolute = target.startsWith("/");
    const parts = target.split("/").filter((p) => p.length > 0 && p !== ".");
    let current = absolute ? "" : ".";
    for (const part of parts) {
      current = `${current}/${part}`;
      const existing = await this.stat(current);
      if (existing?.isDirectory) continue;
      const sftp = await this.sftp();
      await new Promise<void>((resolve, reject) => {
        sftp.mkdir(current, (err?: Error | null) => (err ? reject(err) : resolve()));
      });
    }
  }

  async stat(remotePath: string): Promise<RemoteStat | null> {
    const sftp = await this.sftp();
    return new Promise<RemoteStat | null>((resolve, reject) => {
      sftp.stat(toSftpPath(remotePath), (err: Error | undefined | null, st) => {
        if (err) {
          if (isNoSuchFile(err)) resolve(null);
          else reject(err);
          return;
        }
        resolve({ isDirectory: st.isDirectory(), size: st.size, mtimeMs: st.mtime * 1000 });
      });
    });
  }

  async list(remoteDir: string): Promise<RemoteEntry[]> {
    const sftp = await this.sftp();
    const entries = await new Promise<RemoteEntry[]>((resolve, reject) => {
      sftp.readdir(toSftpPath(remoteDir), (err: Error | undefined | null, list) => {
        if (err) {
          if (isNoSuchFile(err)) resolve([]);
          else reject(err);
          return;
        }
        resolve(
          list.map((entry) => ({
            name: entry.filename,
            isDirectory: (entry.attrs.mode & S_IFMT) === S_IFDIR,
            size: entry.attrs.size,
            mtimeMs: entry.attrs.mtime * 1000,
          })),
        );
      });
    });
    return entries.filter((e) => e.name !== "." && e.name !== "..").sort((a, b) => a.name.localeCompare(b.name));
  }

  async readText(remotePath: string): Promise<string | null> {
    const sftp = await this.sftp();
    return new Promise<string | null>((resolve, reject) => {
      sftp.readFile(toSftpPath(remotePath), (err: Error | undefined | null, data: Buffer) => {
        if (err) {
          if (isNoSuchFile(err)) resolve(null);
          else reject(err);
          return;
        }
        resolve(data.toString("utf8"));
      });
    });
  }

  async writeText(remotePath: string, content: string): Promise<void> {
    const sftp = await this.sftp();
    await new Promise<void>((resolve, reject) => {
      sftp.writeFile(toSftpPath(remotePath), content, (err?: Error | null) => (err ? reject(err) : resolve()));
    });
  }

  async remove(remotePath: string): Promise<void> {
    const st = await this.stat(remotePath);
    if (!st) return;
    const sftp = await this.sftp();
    const target = toSftpPath(remotePath);
    if (!st.isDirectory) {
      await new Promise<void>((resolve, reject) => {
        sftp.unlink(target, (err?: Error | null) => (err && !isNoSuchFile(err) ? reject(err) : resolve()));
      });
      return;
    }
    for (const entry of await this.list(remotePath)) {
      await this.remove(joinRemote(remotePath, entry.name));
    }
    await new Promise<void>((resolve, reject) => {
      sftp.rmdir(target, (err?: Error | null) => (err && !isNoSuchFile(err) ? reject(err) : resolve()));
    });
  }

  async touch(remotePath: string): Promise<void> {
    const sftp = await this.sftp();
    const now = new Date();
    await new Promise<void>((resolve, reject) => {
      sftp.utimes(toSftpPath(remotePath), now, now, (err?: Error | null) => (err ? reject(err) : resolve()));
    });
  }

  async upload(localPath: string, remotePath: string, opts: UploadOptions): Promise<void> {
    const sftp = await this.sftp();
    const handle = await new Promise<Buffer>((resolve, reject) => {
      sftp.open(toSftpPath(remotePath), "w", (err: Error | undefined | null, h: Buffer) =>
        err ? reject(err) : resolve(h),
      );
    });
    let position = 0;
    try {
      for await (const chunk of readChunks(localPath, opts.chunkSize, opts.signal)) {
        await new Promise<void>((resolve, reject) => {
          sftp.write(handle, chunk, 0, chunk.length, position, (err?: Error | null) => (err ? reject(err) : resolve()));
        });
        position += chunk.length;
        opts.onChunk?.(chunk.length);
      }
    } finally {
      await new Promise<void>((resolve) => {
        sftp.close(handle, () => resolve());
      });
    }
  }

  async close(): Promise<void> {
    const session = this.session;
    this.session = null;
    session?.client.end();
  }
}
