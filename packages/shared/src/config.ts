import { readFile } from "node:fs/promises";

import { ConfigurationError } from "./errors.js";
import { errnoCode } from "./fsAtomic.js";

export type DestinationTransport = "ssh" | "local";
export type HostKeyPolicy = "trust_on_first_use" | "strict";

export interface DestinationConfig {
  transport: DestinationTransport;
  host: string;
  port: number;
  mac_address: string;
  broadcast_address: string;
  ssh_key_path: string;
  host_key_policy: HostKeyPolicy;
  known_hosts_path: string;
  wake_wait_time: number;
  connection_timeout: number;
}

export interface TransferConfig {
  batch_size_limit: number | null;
  timeout_seconds: number;
  timeout_per_photo: number;
  retry_count: number;
  retry_delay: number;
  chunk_size: number;
  max_concurrent_batches: number;
}

export interface PathsConfig {
  staging_dir: string;
  remote_incoming: string;
  remote_processed: string;
  remote_reports: string;
  local_reports: string;
}

export interface CleanupConfig {
  keep_successful_days: number;
  keep_failed_days: number;
  clean_import_log: boolean;
  clean_incoming_after_hours: number;
  startup_cleanup: boolean;
}

export interface ImportConfig {
  command: string[] | null;
  timeout_seconds: number;
  image_extensions: string[];
}

export interface PipelineConfig {
  destination: DestinationConfig;
  transfer: TransferConfig;
  paths: PathsConfig;
  cleanup: CleanupConfig;
  import: ImportConfig;
}

export const PLACEHOLDER_MAC_ADDRESS = "XX:XX:XX:XX:XX:XX";

export function defaultPipelineConfig(): PipelineConfig {
  return {
    destination: {
      transport: "ssh",
      host: "pipeline@photo-dest.local",
      port: 22,
      mac_address: PLACEHOLDER_MAC_ADDRESS,
      broadcast_address: "255.255.255.255",
      ssh_key_path: "~/.ssh/pipeline_key",
      host_key_policy: "trust_on_first_use",
      known_hosts_path: "~/.photo-relay/known_hosts.json",
      wake_wait_time: 10,
      connection_timeout: 60,
    },
    transfer: {
      batch_size_limit: null,
      timeout_seconds: 300,
      timeout_per_photo: 30,
      retry_count: 2,
      retry_delay: 5,
      chunk_size: 65536,
      max_concurrent_batches: 1,
    },
    paths: {
      staging_dir: "~/ToSend",
      remote_incoming: "~/IncomingPhotos",
      remote_processed: "~/ProcessedPhotos",
      remote_reports: "~/ImportReports",
      local_reports: "~/reports",
    },
    cleanup: {
      keep_successful_days: 0,
      keep_failed_days: 0,
      clean_import_log: true,
      clean_incoming_after_hours: 0.25,
      startup_cleanup: true,
    },
    import: {
      command: null,
      timeout_seconds: 600,
      image_extensions: ["heic", "jpg", "jpeg"],
    },
  };
}

type RawSection = Record<string, unknown>;

function section(raw: Record<string, unknown>, name: string): RawSection {
  const value = raw[name];
  if (value === undefined || value === null) return {};
  if (typeof value !== "object" || Array.isArray(value)) {
    throw new ConfigurationError(`${name} must be an object`);
  }
  return Object.fromEntries(Object.entries(value));
}

function str(sec: RawSection, key: string, name: string, fallback: string): string {
  const value = sec[key];
  if (value === undefined) return fallback;
  if (typeof value !== "string" || !value.trim()) {
    throw new ConfigurationError(`${name}.${key} must be a non-empty string`);
  }
  return value.trim();
}

function num(
  sec: RawSection,
  key: string,
  name: string,
  fallback: number,
  opts: { min?: number; integer?: boolean } = {},
): number {
  const value = sec[key];
  if (value === undefined) return fallback;
  if (typeof value !== "number" || !Number.isFinite(value)) {
    throw new ConfigurationError(`${name}.${key} must be a number`);
  }
  if (opts.integer && !Number.isInteger(value)) {
    throw new ConfigurationError(`${name}.${key} must be an integer`);
  }
  if (opts.min !== undefined && value < opts.min) {
    throw new ConfigurationError(`${name}.${key} must be >= ${opts.min}`);
  }
  return value;
}

function bool(sec: RawSection, key: string, name: string, fallback: boolean): boolean {
  const value = sec[key];
  if (value === undefined) return fallback;
  if (typeof value !== "boolean") {
    throw new ConfigurationError(`${name}.${key} must be a boolean`);
  }
  return value;
}

function oneOf<T extends string>(
  sec: RawSection,
  key: string,
  name: string,
  allowed: readonly T[],
  fallback: T,
): T {
  const value = sec[key];
  if (value === undefined) return fallback;
  const match = allowed.find((a) => a === value);
  if (match === undefined) {
    throw new ConfigurationError(`${name}.${key} must be one of ${allowed.join("/")}`);
  }
  return match;
}

function stringList(sec: RawSection, key: string, name: string): string[] | undefined {
  const value = sec[key];
  if (value === undefined || value === null) return undefined;
  if (!Array.isArray(value) || value.length === 0) {
    throw new ConfigurationError(`${name}.${key} must be a non-empty array of strings`);
  }
  const out: string[] = [];
  for (const item of value) {
    if (typeof item !== "string" || !item.trim()) {
      throw new ConfigurationError(`${name}.${key} must be a non-empty array of strings`);
    }
    out.push(item.trim());
  }
  return out;
}

function deepFreeze<T extends object>(obj: T): Readonly<T> {
  for (const value of Object.values(obj)) {
    if (value && typeof value === "object" && !Object.isFrozen(value)) deepFreeze(value);
  }
  return Object.freeze(obj);
}

/** Merges a parsed JSON document over the defaults and validates every key. */
export function parsePipelineConfig(raw: unknown): Readonly<PipelineConfig> {
  if (raw !== undefined && raw !== null && (typeof raw !== "object" || Array.isArray(raw))) {
    throw new ConfigurationError("pipeline config must be a JSON object");
  }
  const root: Record<string, unknown> =
    raw && typeof raw === "object" ? Object.fromEntries(Object.entries(raw)) : {};
  const d = defaultPipelineConfig();

  const dest = section(root, "destination");
  const transfer = section(root, "transfer");
  const paths = section(root, "paths");
  const cleanup = section(root, "cleanup");
  const imp = section(root, "import");

  const batchSizeLimit = transfer.batch_size_limit;
  if (
    batchSizeLimit !== undefined &&
    batchSizeLimit !== null &&
    (typeof batchSizeLimit !== "number" || !Number.isInteger(batchSizeLimit) || batchSizeLimit <= 0)
  ) {
    throw new ConfigurationError("transfer.batch_size_limit must be a positive integer or null");
  }

  const config: PipelineConfig = {
    destination: {
      transport: oneOf(dest, "transport", "destination", ["ssh", "local"], d.destination.transport),
      host: str(dest, "host", "destination", d.destination.host),
      port: num(dest, "port", "destination", d.destination.port, { min: 1, integer: true }),
      mac_address: str(dest, "mac_address", "destination", d.destination.mac_address),
      broadcast_address: str(dest, "broadcast_address", "destination", d.destination.broadcast_address),
      ssh_key_path: str(dest, "ssh_key_path", "destination", d.destination.ssh_key_path),
      host_key_policy: oneOf(
        dest,
        "host_key_policy",
        "destination",
        ["trust_on_first_use", "strict"],
        d.destination.host_key_policy,
      ),
      known_hosts_path: str(dest, "known_hosts_path", "destination", d.destination.known_hosts_path),
      wake_wait_time: num(dest, "wake_wait_time", "destination", d.destination.wake_wait_time, { min: 0 }),
      connection_timeout: num(dest, "connection_timeout", "destination", d.destination.connection_timeout, {
        min: 1,
      }),
    },
    transfer: {
      batch_size_limit: typeof batchSizeLimit === "number" ? batchSizeLimit : null,
      timeout_seconds: num(transfer, "timeout_seconds", "transfer", d.transfer.timeout_seconds, { min: 1 }),
      timeout_per_photo: num(transfer, "timeout_per_photo", "transfer", d.transfer.timeout_per_photo, {
        min: 1,
      }),
      retry_count: num(transfer, "retry_count", "transfer", d.transfer.retry_count, { min: 0, integer: true }),
      retry_delay: num(transfer, "retry_delay", "transfer", d.transfer.retry_delay, { min: 0 }),
      chunk_size: num(transfer, "chunk_size", "transfer", d.transfer.chunk_size, { min: 1, integer: true }),
      max_concurrent_batches: num(
        transfer,
        "max_concurrent_batches",
        "transfer",
        d.transfer.max_concurrent_batches,
        { min: 1, integer: true },
      ),
    },
    paths: {
      staging_dir: str(paths, "staging_dir", "paths", d.paths.staging_dir),
      remote_incoming: str(paths, "remote_incoming", "paths", d.paths.remote_incoming),
      remote_processed: str(paths, "remote_processed", "paths", d.paths.remote_processed),
      remote_reports: str(paths, "remote_reports", "paths", d.paths.remote_reports),
      local_reports: str(paths, "local_reports", "paths", d.paths.local_reports),
    },
    cleanup: {
      keep_successful_days: num(cleanup, "keep_successful_days", "cleanup", d.cleanup.keep_successful_days, {
        min: 0,
      }),
      keep_failed_days: num(cleanup, "keep_failed_days", "cleanup", d.cleanup.keep_failed_days, { min: 0 }),
      clean_import_log: bool(cleanup, "clean_import_log", "cleanup", d.cleanup.clean_import_log),
      clean_incoming_after_hours: num(
        cleanup,
        "clean_incoming_after_hours",
        "cleanup",
        d.cleanup.clean_incoming_after_hours,
      ),
      startup_cleanup: bool(cleanup, "startup_cleanup", "cleanup", d.cleanup.startup_cleanup),
    },
    import: {
      command: stringList(imp, "command", "import") ?? d.import.command,
      timeout_seconds: num(imp, "timeout_seconds", "import", d.import.timeout_seconds, { min: 1 }),
      image_extensions: (stringList(imp, "image_extensions", "import") ?? d.import.image_extensions).map((e) =>
        e.replace(/^\./, "").toLowerCase(),
      ),
    },
  };

  return deepFreeze(config);
}

/**
 * Reads the JSON config file once. A missing file yields the defaults; an
 * unreadable or malformed one is a configuration error.
 */
export async function loadPipelineConfig(filePath: string | undefined): Promise<Readonly<PipelineConfig>> {
  if (!filePath) return parsePipelineConfig({});

  let text: string;
  try {
    text = await readFile(filePath, "utf8");
  } catch (err) {
    if (errnoCode(err) === "ENOENT") return parsePipelineConfig({});
    throw new ConfigurationError(`cannot read pipeline config ${filePath}: ${errnoCode(err) ?? "unknown"}`);
  }

  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch {
    throw new ConfigurationError(`pipeline config ${filePath} is not valid JSON`);
  }
  return parsePipelineConfig(raw);
}
