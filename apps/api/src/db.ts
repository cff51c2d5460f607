import { Pool, QueryResultRow } from "pg";
import type { DbConfig } from "./config";
import type { Logger } from "./logger";

export interface Queryable {
  query<R extends QueryResultRow>(text: string, values?: unknown[]): Promise<R[]>;
}

// The slice of the store the repositories and the migration runner use.
export interface Database extends Queryable {
  /** Runs `fn` on one connection inside BEGIN/COMMIT; rolls back if it throws. */
  transaction<T>(fn: (tx: Queryable) => Promise<T>): Promise<T>;
  ping(): Promise<void>;
  close(): Promise<void>;
}

// ─── DB Pool ──────────────────────────────────────────────
export function createPool(config: DbConfig, logger: Logger): Pool {
  const pool = new Pool({
    host:     config.host,
    port:     config.port,
    database: config.database,
    user:     config.user,
    password: config.password,

    max: config.max,
    idleTimeoutMillis: 30_000,
    connectionTimeoutMillis: 5_000,
    statement_timeout: config.statementTimeoutMs,
  });

  pool.on("error", (err) => logger.error({ err }, "Idle pool client error"));
  return pool;
}

export class PgDatabase implements Database {
  constructor(private readonly pool: Pool) {}

  async query<R extends QueryResultRow>(text: string, values: unknown[] = []): Promise<R[]> {
    const { rows } = await this.pool.query<R>(text, values);
    return rows;
  }

  async transaction<T>(fn: (tx: Queryable) => Promise<T>): Promise<T> {
    const client = await this.pool.connect();
    let broken: Error | undefined;
    try {
      await client.query("BEGIN");
      const result = await fn({
        query: async <R extends QueryResultRow>(text: string, values: unknown[] = []) => {
          const { rows } = await client.query<R>(text, values);
          return rows;
        },
      });
      await client.query("COMMIT");
      return result;
    } catch (err) {
      // a client that cannot roll back is discarded, not returned to the pool
      await client.query("ROLLBACK").catch((rollbackErr: unknown) => {
        broken = rollbackErr instanceof Error ? rollbackErr : new Error(String(rollbackErr));
      });
      throw err;
    } finally {
      client.release(broken);
    }
  }

  async ping(): Promise<void> {
    await this.pool.query("SELECT 1");
  }

  async close(): Promise<void> {
    await this.pool.end();
  }
}
