// ═══════════════════════════════════════════════════════════════
// @edgeline/db — PostgreSQL connection pool
// ═══════════════════════════════════════════════════════════════
// node-postgres (pg) pool, configured from DATABASE_URL.
// ═══════════════════════════════════════════════════════════════

import { Pool } from "pg";

let pool: Pool | null = null;

/**
 * What the repositories need from pg: a Pool, a PoolClient or a
 * test stand-in. Rows come back untyped and are parsed by the caller.
 */
export interface Queryable {
  query(text: string, values?: unknown[]): Promise<{ rows: unknown[]; rowCount: number | null }>;
}

/**
 * Singleton pool, created on first use from DATABASE_URL.
 */
export function getPool(): Pool {
  if (!pool) {
    const connectionString = process.env.DATABASE_URL;
    if (!connectionString) {
      throw new Error(
        "@edgeline/db: DATABASE_URL is not set. " +
        "Configure it before using the Postgres store."
      );
    }
    pool = new Pool({
      connectionString,
      max: 10,
      idleTimeoutMillis: 30_000,
      connectionTimeoutMillis: 5_000,
    });
  }
  return pool;
}

/**
 * Ends the pool. Called on graceful shutdown.
 */
export async function closePool(): Promise<void> {
  if (pool) {
    await pool.end();
    pool = null;
  }
}
