import { randomUUID, createHash } from "node:crypto";
import { constants as fsConstants, createReadStream, createWriteStream } from "node:fs";
import fs from "node:fs/promises";
import { pipeline } from "node:stream/promises";

export function errnoCode(err: unknown): string | undefined {
  if (!err || typeof err !== "object" || !("code" in err)) return undefined;
  return typeof err.code === "string" ? err.code : undefined;
}

export async function fileExists(p: string): Promise<boolean> {
  try {
    await fs.access(p, fsConstants.F_OK);
    return true;
  } catch {
    return false;
  }
}

export async function fsyncPath(filePath: string): Promise<void> {
  const fd = await fs.open(filePath, "r");
  try {
    await fd.sync();
  } finally {
    await fd.close();
  }
}

export async function safeMove(src: string, dst: string): Promise<void> {
  try {
    await fs.rename(src, dst);
    return;
  } catch (err) {
    if (errnoCode(err) !== "EXDEV") throw err;
  }

  const tmpDst = `${dst}.tmp-${randomUUID()}`;
  await pipeline(createReadStream(src), createWriteStream(tmpDst, { flags: "wx" }));
  await fsyncPath(tmpDst);
  await fs.rename(tmpDst, dst);
  await fs.unlink(src);
}

/**
 * Writes through a sibling temp file and renames it into place, so readers
 * only ever see the previous content or the complete new one.
 */
export async function writeFileAtomic(
  target: string,
  content: string,
  opts: { tmpPath?: string } = {},
): Promise<void> {
  const tmp = opts.tmpPath ?? `${target}.tmp-${randomUUID()}`;
  await fs.writeFile(tmp, content, "utf8");
  try {
    await fsyncPath(tmp);
    await fs.rename(tmp, target);
  } catch (err) {
    await fs.rm(tmp, { force: true });
    throw err;
  }
}

/**
 * Publishes `content` at `target` only when nothing is there yet. The temp
 * file is hard-linked into place, so a concurrent writer that loses the race
 * gets `false` and the first file stays untouched.
 */
export async function writeFileOnce(target: string, content: string, tmpPath: string): Promise<boolean> {
  await fs.writeFile(tmpPath, content, { encoding: "utf8", flag: "wx" });
  try {
    await fsyncPath(tmpPath);
    await fs.link(tmpPath, target);
    return true;
  } catch (err) {
    if (errnoCode(err) === "EEXIST") return false;
    throw err;
  } finally {
    await fs.rm(tmpPath, { force: true });
  }
}

export async function writeJsonAtomic(
  target: string,
  value: unknown,
  opts: { tmpPath?: string } = {},
): Promise<void> {
  await writeFileAtomic(target, `${JSON.stringify(value, null, 2)}\n`, opts);
}

export async function sha256File(filePath: string): Promise<string> {
  const hash = createHash("sha256");
  const stream = createReadStream(filePath);
  for await (const chunk of stream) {
    hash.update(chunk);
  }
  return hash.digest("hex");
}
