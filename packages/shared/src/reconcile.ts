import path from "node:path";

import type { CompletionRecord, TransferManifest } from "./manifests.js";

export const UNMAPPED_RECORD_WARNING = "Could not map to original path";

export interface PathLookup {
  /** Expanded remote_path -> original_path. */
  exact: Map<string, string>;
  /** Basename -> original_path candidates in manifest order. */
  byBasename: Map<string, string[]>;
}

export interface ReconcileResult {
  records: CompletionRecord[];
  warnings: string[];
}

export function expandHome(p: string, homeDir: string): string {
  if (!p.startsWith("~")) return p;
  return `${homeDir}${p.slice(1)}`;
}

export function buildPathLookup(manifest: TransferManifest, homeDir: string): PathLookup {
  const exact = new Map<string, string>();
  const byBasename = new Map<string, string[]>();

  for (const entry of manifest.files) {
    const remotePath = expandHome(entry.remote_path, homeDir);
    exact.set(remotePath, entry.original_path);

    const base = path.posix.basename(remotePath);
    const candidates = byBasename.get(base);
    if (candidates) candidates.push(entry.original_path);
    else byBasename.set(base, [entry.original_path]);
  }

  return { exact, byBasename };
}

/**
 * Every imported file yields exactly one record. An exact path hit always
 * wins; a basename hit with several candidates takes the first one; a total
 * miss maps the file onto itself. The last two add warnings.
 */
export function reconcileImportedFiles(
  importedPaths: readonly string[],
  lookup: PathLookup,
  importTime: string,
): ReconcileResult {
  const records: CompletionRecord[] = [];
  const warnings: string[] = [];

  for (const filePath of importedPaths) {
    const filename = path.posix.basename(filePath);

    const exactHit = lookup.exact.get(filePath);
    if (exactHit !== undefined) {
      records.push({ filename, original_path: exactHit, import_time: importTime });
      continue;
    }

    const candidates = lookup.byBasename.get(filename);
    const first = candidates?.[0];
    if (candidates && first !== undefined) {
      if (candidates.length === 1) {
        records.push({ filename, original_path: first, import_time: importTime });
      } else {
        const warning = `Multiple candidates for ${filename}, using ${first}`;
        warnings.push(warning);
        records.push({ filename, original_path: first, import_time: importTime, warning });
      }
      continue;
    }

    warnings.push(`No mapping found for ${filePath}`);
    records.push({
      filename,
      original_path: filePath,
      import_time: importTime,
      warning: UNMAPPED_RECORD_WARNING,
    });
  }

  return { records, warnings };
}

export function hasImageExtension(fileName: string, extensions: readonly string[]): boolean {
  if (fileName.startsWith(".")) return false;
  const ext = path.posix.extname(fileName).slice(1).toLowerCase();
  if (!ext) return false;
  return extensions.some((e) => e.toLowerCase() === ext);
}
