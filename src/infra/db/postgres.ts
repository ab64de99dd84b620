import { Pool } from "pg";

/** `timeoutMs` bounds each statement on the server and each query on the client. */
export function createPostgresPool(databaseUrl: string, timeoutMs: number): Pool {
  return new Pool({
    connectionString: databaseUrl,
    max: 10,
    idleTimeoutMillis: 30_000,
    connectionTimeoutMillis: Math.min(timeoutMs, 10_000),
    statement_timeout: timeoutMs,
    query_timeout: timeoutMs,
  });
}
