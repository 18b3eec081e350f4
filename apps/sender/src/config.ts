import os from "node:os";

export interface AppConfig {
  port: number;
  databaseUrl: string;
  pipelineConfigPath?: string;
  homeDir: string;
  cleanupSweepEnabled: boolean;
  cleanupSweepIntervalMs: number;
}

function parsePort(raw: string | undefined): number {
  if (!raw) return 3000;
  const n = Number(raw);
  if (!Number.isInteger(n) || n <= 0 || n > 65535) {
    throw new Error("PORT must be an integer between 1 and 65535");
  }
  return n;
}

function requireEnv(name: string): string {
  const value = process.env[name];
  if (!value) throw new Error(`${name} is required`);
  return value;
}

export function parseBoolean(raw: string | undefined, defaultValue: boolean): boolean {
  if (!raw) return defaultValue;
  const value = raw.trim().toLowerCase();
  if (value === "1" || value === "true" || value === "yes" || value === "on") return true;
  if (value === "0" || value === "false" || value === "no" || value === "off") return false;
  throw new Error("Boolean env value must be one of 1/0/true/false/yes/no/on/off");
}

export function parsePositiveInt(raw: string | undefined, name: string, defaultValue: number): number {
  if (!raw) return defaultValue;
  const n = Number(raw);
  if (!Number.isInteger(n) || n <= 0) {
    throw new Error(`${name} must be a positive integer`);
  }
  return n;
}

function parseOptionalPath(raw: string | undefined): string | undefined {
  if (!raw) return undefined;
  const v = raw.trim();
  return v.length ? v : undefined;
}

export function loadConfig(): AppConfig {
  return {
    port: parsePort(process.env.PORT),
    databaseUrl: requireEnv("DATABASE_URL"),
    pipelineConfigPath: parseOptionalPath(process.env.PIPELINE_CONFIG_PATH),
    homeDir: parseOptionalPath(process.env.PHOTO_RELAY_HOME) ?? os.homedir(),
    cleanupSweepEnabled: parseBoolean(process.env.CLEANUP_SWEEP_ENABLED, true),
    cleanupSweepIntervalMs: parsePositiveInt(
      process.env.CLEANUP_SWEEP_INTERVAL_MS,
      "CLEANUP_SWEEP_INTERVAL_MS",
      60 * 60 * 1000,
    ),
  };
}
