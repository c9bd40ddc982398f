import pg from "pg";

let pool: pg.Pool | null = null;
let consecutiveFailures = 0;
const MAX_FAILURES_BEFORE_RESET = 3;

// Anything that can run a parameterized statement: the pool-level `query`
// below, or a PoolClient checked out inside `transaction()`.
export interface Queryable {
  query<T extends pg.QueryResultRow = pg.QueryResultRow>(
    text: string,
    params?: unknown[],
  ): Promise<pg.QueryResult<T>>;
}

function buildPoolConfig(): pg.PoolConfig {
  const connectionString = process.env.DATABASE_URL;
  if (!connectionString) {
    throw new Error("DATABASE_URL is not set. Check .env at the project root.");
  }

  return {
    connectionString,
    connectionTimeoutMillis: 5000,
    max: 20,
    ssl: false,
  };
}

function getPool(): pg.Pool {
  if (!pool) {
    pool = new pg.Pool(buildPoolConfig());
    pool.on("error", (err) => {
      console.error("Unexpected PG pool error:", err);
    });
  }
  return pool;
}

/** Destroy and recreate the pool (e.g. after repeated connection failures). */
export async function resetPool(): Promise<void> {
  if (pool) {
    const closing = pool;
    pool = null;
    try {
      await closing.end();
    } catch (err) {
      console.warn("DB pool: error while ending broken pool:", err);
    }
  }
  consecutiveFailures = 0;
}

/**
 * Record a query success/failure. After MAX_FAILURES_BEFORE_RESET consecutive
 * failures, the pool is destroyed and recreated on the next call.
 */
export function recordSuccess(): void {
  consecutiveFailures = 0;
}

export async function recordFailure(): Promise<void> {
  consecutiveFailures++;
  if (consecutiveFailures >= MAX_FAILURES_BEFORE_RESET) {
    console.warn(
      `DB pool: ${consecutiveFailures} consecutive failures, resetting pool`,
    );
    await resetPool();
  }
}

const CONNECTION_ERROR_CODES = new Set([
  "ECONNREFUSED",
  "ECONNRESET",
  "ETIMEDOUT",
  "ENOTFOUND",
  "57P01", // admin_shutdown
  "57P03", // cannot_connect_now
  "08000",
  "08001",
  "08003",
  "08006",
]);

/** True when the error means the database could not be reached at all. */
export function isConnectionError(err: unknown): boolean {
  if (!(err instanceof Error)) return false;
  const code = "code" in err && typeof err.code === "string" ? err.code : null;
  if (code && CONNECTION_ERROR_CODES.has(code)) return true;
  return /timeout exceeded when trying to connect|Connection terminated/i.test(err.message);
}

export async function query<T extends pg.QueryResultRow = pg.QueryResultRow>(
  text: string,
  params?: unknown[],
): Promise<pg.QueryResult<T>> {
  return getPool().query<T>(text, params);
}

export async function transaction<T>(
  fn: (client: pg.PoolClient) => Promise<T>,
): Promise<T> {
  const client = await getPool().connect();
  // Set when the connection can no longer be trusted; release() then destroys it.
  let broken: Error | undefined;
  try {
    await client.query("BEGIN");
    const result = await fn(client);
    await client.query("COMMIT");
    return result;
  } catch (err) {
    try {
      await client.query("ROLLBACK");
    } catch (rollbackErr) {
      console.warn("DB: rollback failed, discarding connection:", rollbackErr);
      broken = rollbackErr instanceof Error ? rollbackErr : new Error(String(rollbackErr));
    }
    throw err;
  } finally {
    client.release(broken);
  }
}

export async function close(): Promise<void> {
  if (pool) {
    await pool.end();
    pool = null;
  }
}
