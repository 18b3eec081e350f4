import os from "node:os";

export interface ReceiverConfig {
  pipelineConfigPath?: string;
  homeDir: string;
  rescanMs: number;
  stabilityMs: number;
  runOnce: boolean;
}

function readIntEnv(name: string, fallback: number): number {
  const raw = process.env[name];
  if (!raw) return fallback;
  const n = Number(raw);
  if (!Number.isFinite(n) || n <= 0) return fallback;
  return Math.floor(n);
}

function readBoolEnv(name: string, fallback: boolean): boolean {
  const raw = process.env[name];
  if (!raw) return fallback;
  const v = raw.trim().toLowerCase();
  if (v === "1" || v === "true" || v === "yes" || v === "on") return true;
  if (v === "0" || v === "false" || v === "no" || v === "off") return false;
  return fallback;
}

function readOptionalStringEnv(name: string): string | undefined {
  const raw = process.env[name];
  if (!raw) return undefined;
  const trimmed = raw.trim();
  return trimmed.length > 0 ? trimmed : undefined;
}

export function loadReceiverConfig(): ReceiverConfig {
  return {
    pipelineConfigPath: readOptionalStringEnv("PIPELINE_CONFIG_PATH"),
    homeDir: readOptionalStringEnv("PHOTO_RELAY_HOME") ?? os.homedir(),
    rescanMs: readIntEnv("RECEIVER_RESCAN_MS", 30_000),
    stabilityMs: readIntEnv("RECEIVER_STABILITY_MS", 500),
    runOnce: readBoolEnv("RECEIVER_RUN_ONCE", false),
  };
}
