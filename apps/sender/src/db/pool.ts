import pg from "pg";

const { Pool } = pg;

export type DbPool = pg.Pool;
export type DbClient = pg.PoolClient;

type LoggerLike = {
  warn(obj: object, msg?: string): void;
  error(obj: object, msg?: string): void;
};

const SLOW_QUERY_THRESHOLD_MS = 200;
const POOL_STARVATION_THRESHOLD_MS = 200;

let dbLogger: LoggerLike | undefined;

function durationMs(startNs: bigint): number {
  return Number((process.hrtime.bigint() - startNs) / 1000000n);
}

export function setDbLogger(logger: LoggerLike): void {
  dbLogger = logger;
}

export function createPool(databaseUrl: string): DbPool {
  const pool = new Pool({ connectionString: databaseUrl });
  pool.on("error", (err) => {
    dbLogger?.error({ event: "db.pool.error", message: err.message });
  });
  return pool;
}

export async function timedQuery<R extends pg.QueryResultRow>(
  client: DbClient,
  text: string,
  values: unknown[] = [],
): Promise<pg.QueryResult<R>> {
  const startNs = process.hrtime.bigint();
  try {
    return await client.query<R>(text, values);
  } finally {
    const query_ms = durationMs(startNs);
    if (query_ms >= SLOW_QUERY_THRESHOLD_MS) {
      dbLogger?.warn({ event: "db.query.slow", query_ms });
    }
  }
}

export async function withClient<T>(pool: DbPool, fn: (client: DbClient) => Promise<T>): Promise<T> {
  const startNs = process.hrtime.bigint();
  const client = await pool.connect();
  const acquire_ms = durationMs(startNs);
  if (acquire_ms >= POOL_STARVATION_THRESHOLD_MS) {
    dbLogger?.warn({ event: "db.pool.starvation", acquire_ms });
  }
  try {
    return await fn(client);
  } finally {
    client.release();
  }
}

export async function withTransaction<T>(pool: DbPool, fn: (client: DbClient) => Promise<T>): Promise<T> {
  return withClient(pool, async (client) => {
    await client.query("BEGIN");
    try {
      const result = await fn(client);
      await client.query("COMMIT");
      return result;
    } catch (err) {
      await client.query("ROLLBACK");
      throw err;
    }
  });
}
