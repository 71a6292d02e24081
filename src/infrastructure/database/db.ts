/**
 * PostgreSQL connection pool factory.
 *
 * The pool is built once by the composition root and handed to the
 * repository; nothing reaches for it as module state. Several concurrent
 * requests can each hold a connection, up to `max`.
 */
import type { AppConfig } from "@config/index";
import type { LoggerPort } from "@infra/logging/Logger";
import { Pool } from "pg";

/** The slice of a pg client the repositories need. */
export interface SqlClient {
  query(text: string, values?: unknown[]): Promise<{ rows: unknown[] }>;
}

export function createPool(db: AppConfig["db"], logger: LoggerPort): Pool {
  const pool = new Pool({
    connectionString: db.url,
    max: db.max,
    idleTimeoutMillis: db.idleTimeoutMs,
    connectionTimeoutMillis: db.connectionTimeoutMs,
  });

  pool.on("error", (err) => {
    logger.log("error", "Unexpected PG pool error", {
      message: err.message,
    });
  });

  return pool;
}

export function toSqlClient(pool: Pool): SqlClient {
  return {
    query: (text, values) => pool.query(text, values),
  };
}
