import fs from "node:fs/promises";
import path from "node:path";

import { TransferError, sha256File, toErrorMessage, writeJsonAtomic, type BatchId } from "@photorelay/shared";

export interface StageInput {
  path: string;
  sha256?: string;
}

export interface StagedFile {
  name: string;
  local_path: string;
  original_path: string;
  size: number;
}

export interface StagingFailure {
  path: string;
  reason: string;
}

export interface StageResult {
  batch_id: BatchId;
  staged_dir: string;
  staged: StagedFile[];
  failures: StagingFailure[];
}

const MAX_COLLISION_SUFFIX = 999;

/** `IMG.heic` -> `IMG_001.heic` .. `IMG_999.heic`; null once exhausted. */
export function uniqueStagedName(name: string, taken: Set<string>): string | null {
  if (!taken.has(name.toLowerCase())) return name;
  const ext = path.extname(name);
  const stem = name.slice(0, name.length - ext.length);
  for (let counter = 1; counter <= MAX_COLLISION_SUFFIX; counter += 1) {
    const candidate = `${stem}_${String(counter).padStart(3, "0")}${ext}`;
    if (!taken.has(candidate.toLowerCase())) return candidate;
  }
  return null;
}

async function stageOne(input: StageInput, stagedDir: string, taken: Set<string>): Promise<StagedFile> {
  const source = path.resolve(input.path);
  const st = await fs.stat(source);
  if (!st.isFile()) throw new Error("not_a_regular_file");
  await fs.access(source, fs.constants.R_OK);

  const name = uniqueStagedName(path.basename(source), taken);
  if (!name) throw new Error("name_collisions_exhausted");
  const target = path.join(stagedDir, name);
  taken.add(name.toLowerCase());

  try {
    await fs.copyFile(source, target, fs.constants.COPYFILE_EXCL);
    const copied = await fs.stat(target);
    if (copied.size !== st.size) throw new Error(`size_mismatch:${copied.size}!=${st.size}`);
    if (input.sha256) {
      const digest = await sha256File(target);
      if (digest !== input.sha256.toLowerCase()) throw new Error("sha256_mismatch");
    }
  } catch (err) {
    taken.delete(name.toLowerCase());
    await fs.rm(target, { force: true });
    throw err;
  }

  return { name, local_path: target, original_path: source, size: st.size };
}

/**
 * Copies each readable source file into `<stagingRoot>/<batchId>/`. Files that
 * cannot be staged are reported rather than thrown; a batch with nothing
 * staged fails.
 */
export async function stageFiles(input: {
  batchId: BatchId;
  stagingRoot: string;
  files: StageInput[];
  batchSizeLimit: number | null;
}): Promise<StageResult> {
  const stagedDir = path.join(input.stagingRoot, input.batchId);
  await fs.mkdir(stagedDir, { recursive: true });

  const taken = new Set<string>();
  const staged: StagedFile[] = [];
  const failures: StagingFailure[] = [];

  for (const [idx, file] of input.files.entries()) {
    if (input.batchSizeLimit !== null && idx >= input.batchSizeLimit) {
      failures.push({ path: file.path, reason: "batch_size_limit" });
      continue;
    }
    try {
      staged.push(await stageOne(file, stagedDir, taken));
    } catch (err) {
      failures.push({ path: file.path, reason: toErrorMessage(err) });
    }
  }

  if (staged.length === 0) {
    throw new TransferError(`no files staged for batch ${input.batchId}`);
  }
  await writeJsonAtomic(stagingRecordPath(stagedDir), staged);
  return { batch_id: input.batchId, staged_dir: stagedDir, staged, failures };
}

export function stagingRecordPath(stagedDir: string): string {
  return `${stagedDir}.staged.json`;
}

/** Staged files with their original paths, read back for a re-run. */
export async function loadStagedFiles(stagedDir: string): Promise<StagedFile[]> {
  const raw: unknown = JSON.parse(await fs.readFile(stagingRecordPath(stagedDir), "utf8"));
  if (!Array.isArray(raw)) throw new TransferError(`staging record for ${stagedDir} is malformed`);
  const out: StagedFile[] = [];
  for (const item of raw) {
    if (
      !item ||
      typeof item !== "object" ||
      typeof item.name !== "string" ||
      typeof item.original_path !== "string" ||
      typeof item.size !== "number"
    ) {
      throw new TransferError(`staging record for ${stagedDir} is malformed`);
    }
    out.push({
      name: item.name,
      local_path: path.join(stagedDir, item.name),
      original_path: item.original_path,
      size: item.size,
    });
  }
  return out;
}
