import { readFile, readdir } from "node:fs/promises";
import path from "node:path";
import { fileURLToPath } from "node:url";

import pg from "pg";

const { Client } = pg;

const MIGRATIONS_DIR = fileURLToPath(new URL("../migrations/", import.meta.url));

function requireEnv(name: string): string {
  const value = process.env[name];
  if (!value) {
    // Avoid printing secrets or full env dumps.
    throw new Error(`${name} is required`);
  }
  return value;
}

async function listMigrationFiles(): Promise<string[]> {
  return (await readdir(MIGRATIONS_DIR)).filter((f) => f.endsWith(".sql")).sort((a, b) => a.localeCompare(b));
}

async function main(): Promise<void> {
  const databaseUrl = requireEnv("DATABASE_URL");
  const statusOnly = process.argv.includes("--status");
  const files = await listMigrationFiles();

  const client = new Client({ connectionString: databaseUrl });
  await client.connect();

  try {
    await client.query(
      `CREATE TABLE IF NOT EXISTS schema_migrations (
        version TEXT PRIMARY KEY,
        applied_at TIMESTAMPTZ NOT NULL DEFAULT now()
      );`,
    );

    const applied = await client.query<{ version: string }>("SELECT version FROM schema_migrations");
    const appliedSet = new Set(applied.rows.map((r) => r.version));
    const pending = files.filter((f) => !appliedSet.has(f));

    if (statusOnly) {
      // eslint-disable-next-line no-console
      console.log(JSON.stringify({ applied: appliedSet.size, pending }));
      return;
    }

    for (const file of pending) {
      const sql = await readFile(path.join(MIGRATIONS_DIR, file), "utf8");
      await client.query("BEGIN");
      try {
        await client.query(sql);
        await client.query("INSERT INTO schema_migrations (version) VALUES ($1)", [file]);
        await client.query("COMMIT");
        // eslint-disable-next-line no-console
        console.log(`applied ${file}`);
      } catch (err) {
        await client.query("ROLLBACK");
        throw err;
      }
    }
  } finally {
    await client.end();
  }
}

main().catch((err) => {
  // eslint-disable-next-line no-console
  console.error(err instanceof Error ? err.message : err);
  process.exitCode = 1;
});
