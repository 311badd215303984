import { Pool } from "pg";
import type { DatabaseSettings } from "./config";
import type { Logger } from "./logger";

/**
 * The one query method the stores and the schema bootstrap need.
 * `Pool` satisfies it; tests hand in a stub.
 */
export interface Queryable {
  query(text: string, values?: unknown[]): Promise<{ rows: unknown[] }>;
}

export interface PoolOptions {
  max?: number;
}

// ─── Database Pool ────────────────────────────────────────
// Owned by the process for its whole lifetime. pool.query() checks a client
// out per statement and hands it back on success and on failure alike.
export function createPool(
  settings: DatabaseSettings,
  logger: Logger,
  options: PoolOptions = {},
): Pool {
  const pool = new Pool({
    connectionString: settings.connectionString,
    max: options.max ?? 10,
    idleTimeoutMillis: 30_000,
    connectionTimeoutMillis: 5_000,
  });

  pool.on("error", (err) => logger.error({ err }, "Idle pool client error"));
  return pool;
}

export async function pingDatabase(db: Queryable): Promise<void> {
  await db.query("SELECT 1");
}
