// ---------------------------------------------------------------------------
// PostgreSQL data store backed by a pg connection pool.
// ---------------------------------------------------------------------------

import pg from "pg";
import type pino from "pino";
import type { DataStore, StoreConfig } from "../core/types.js";
import type { MetricsCollector } from "../metrics/metrics-collector.js";

/**
 * Create the pg pool.  When `metrics` is given, the number of checked-out
 * clients is published as the `store` connections gauge.
 */
export function createPool(
  config: StoreConfig,
  logger: pino.Logger,
  metrics?: MetricsCollector,
): pg.Pool {
  const pool = new pg.Pool({
    host: config.host,
    port: config.port,
    database: config.database,
    user: config.user,
    password: config.password,
    min: config.poolMin,
    max: config.poolMax,
    statement_timeout: config.statementTimeoutMs,
    connectionTimeoutMillis: config.statementTimeoutMs,
  });

  // Idle clients that die are dropped and replaced by the pool.
  pool.on("error", (err) => {
    logger.warn({ err: err.message }, "postgres pool background error");
  });

  if (metrics) {
    let active = 0;
    metrics.recordConnections("store", active);
    pool.on("acquire", () => {
      active++;
      metrics.recordConnections("store", active);
    });
    pool.on("release", () => {
      active = Math.max(0, active - 1);
      metrics.recordConnections("store", active);
    });
  }

  return pool;
}

/**
 * {@link DataStore} over `pg.Pool`.  Every query acquires a pooled client
 * and releases it when the query settles.
 */
export class PostgresStore implements DataStore {
  constructor(private readonly pool: pg.Pool) {}

  async query<R extends Record<string, unknown>>(
    statement: string,
    params: unknown[] = [],
  ): Promise<R[]> {
    const result = await this.pool.query<R>(statement, params);
    return result.rows;
  }

  async ping(): Promise<void> {
    await this.pool.query("SELECT 1");
  }

  async read(key: string): Promise<string | null> {
    const rows = await this.query<{ value: string | null }>(
      "SELECT value FROM system_info WHERE key = $1",
      [key],
    );
    return rows[0]?.value ?? null;
  }

  async close(): Promise<void> {
    await this.pool.end();
  }
}
