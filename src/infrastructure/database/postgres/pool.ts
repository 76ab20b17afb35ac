import pg from "pg";
import type { Logger } from "../../../core/ports/logger.js";

const { Pool } = pg;

/**
 * Narrow query contract the gateway and migration runner are written
 * against. Rows come back untyped; the gateway validates them.
 */
export type SqlExecutor = (
  text: string,
  values?: readonly unknown[],
) => Promise<{ readonly rows: readonly unknown[]; readonly rowCount: number | null }>;

export interface PgDatabase {
  readonly exec: SqlExecutor;
  /** Run `fn` inside BEGIN/COMMIT on a single pooled connection */
  transaction<T>(fn: (tx: SqlExecutor) => Promise<T>): Promise<T>;
  close(): Promise<void>;
}

export interface PgPoolOptions {
  readonly url: string;
  readonly poolMax: number;
  readonly statementTimeoutMs: number;
}

type RawQuery = (text: string, values: unknown[]) => Promise<pg.QueryResult>;

const toExecutor =
  (query: RawQuery): SqlExecutor =>
  async (text, values = []) => {
    const result = await query(text, [...values]);
    return { rows: result.rows, rowCount: result.rowCount };
  };

/**
 * Connection pool shared by every request. `statement_timeout` bounds how
 * long a statement keeps running server-side after its caller gave up.
 */
export const createPgDatabase = (options: PgPoolOptions, logger: Logger): PgDatabase => {
  const pool = new Pool({
    connectionString: options.url,
    max: options.poolMax,
    statement_timeout: options.statementTimeoutMs,
    idleTimeoutMillis: 30_000,
    connectionTimeoutMillis: 5_000,
  });

  // Idle client errors (e.g. server restart) must not crash the process
  pool.on("error", (e: Error) => {
    logger.error("Unexpected database pool error", { error: e.message });
  });

  return {
    exec: toExecutor((text, values) => pool.query(text, values)),

    async transaction<T>(fn: (tx: SqlExecutor) => Promise<T>): Promise<T> {
      const client = await pool.connect();
      try {
        await client.query("BEGIN");
        const result = await fn(toExecutor((text, values) => client.query(text, values)));
        await client.query("COMMIT");
        return result;
      } catch (e: unknown) {
        await client.query("ROLLBACK");
        throw e;
      } finally {
        client.release();
      }
    },

    close: () => pool.end(),
  };
};
