import { createHash } from "node:crypto";
import { mkdir, readFile } from "node:fs/promises";
import path from "node:path";

import { ConfigurationError, errnoCode, writeJsonAtomic, type HostKeyPolicy } from "@photorelay/shared";

export type KnownHosts = Record<string, string>;

export type HostKeyDecision =
  | { ok: true; record: boolean }
  | { ok: false; reason: "unknown_host" | "fingerprint_mismatch" };

export function hostKeyId(host: string, port: number): string {
  return `${host}:${port}`;
}

export function fingerprintOf(key: Buffer): string {
  return `SHA256:${createHash("sha256").update(key).digest("base64").replace(/=+$/, "")}`;
}

export function decideHostKey(
  policy: HostKeyPolicy,
  known: KnownHosts,
  id: string,
  fingerprint: string,
): HostKeyDecision {
  const recorded = known[id];
  if (recorded === undefined) {
    if (policy === "strict") return { ok: false, reason: "unknown_host" };
    return { ok: true, record: true };
  }
  if (recorded !== fingerprint) return { ok: false, reason: "fingerprint_mismatch" };
  return { ok: true, record: false };
}

export async function loadKnownHosts(filePath: string): Promise<KnownHosts> {
  let text: string;
  try {
    text = await readFile(filePath, "utf8");
  } catch (err) {
    if (errnoCode(err) === "ENOENT") return {};
    throw err;
  }
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch {
    throw new ConfigurationError(`known hosts file ${filePath} is not valid JSON`);
  }
  if (!raw || typeof raw !== "object" || Array.isArray(raw)) {
    throw new ConfigurationError(`known hosts file ${filePath} must be a JSON object`);
  }
  const out: KnownHosts = {};
  for (const [id, value] of Object.entries(raw)) {
    if (typeof value === "string") out[id] = value;
  }
  return out;
}

export async function saveKnownHosts(filePath: string, known: KnownHosts): Promise<void> {
  await mkdir(path.dirname(filePath), { recursive: true });
  await writeJsonAtomic(filePath, known);
}
