/**
 * PostgreSQL connection pool management for relaywatch.
 *
 * Uses the `postgres` (postgres.js) driver. This module creates the pool;
 * reachability is checked through the Device Store by the health probe.
 *
 * SECURITY: Connection strings are never logged (they contain credentials).
 * Only host and port are extracted for diagnostic logging.
 */

import postgres from "postgres";
import type { Logger } from "pino";
import { StorageError } from "@relaywatch/shared";

/** Default connection pool settings */
const POOL_DEFAULTS = {
  /** Maximum number of connections in the pool */
  max: 10,
  /** Close idle connections after this many seconds */
  idle_timeout: 20,
  /** Abort connection attempts after this many seconds */
  connect_timeout: 10,
} as const;

/**
 * Create a postgres.js client with connection pooling.
 *
 * @param connectionString - Full Postgres connection URI
 * @param logger           - Where to report the (credential-free) pool target
 * @param options          - Override default pool settings
 *
 * @throws {StorageError} If connectionString is empty (code: STORAGE_DB_URL_MISSING)
 */
export function createDb(
  connectionString: string | undefined,
  logger: Logger,
  options?: { max?: number },
): postgres.Sql {
  if (!connectionString || connectionString.trim() === "") {
    throw new StorageError(
      "DATABASE_URL is required for the Postgres device store.",
      "STORAGE_DB_URL_MISSING",
    );
  }

  // Extract host and port for safe diagnostic logging (never log the full URL)
  let target = "unknown";
  try {
    const url = new URL(connectionString);
    target = `${url.hostname}:${url.port || 5432}`;
  } catch {
    // postgres.js reports the real problem on first connect
    target = "invalid-url";
  }

  const max = options?.max ?? POOL_DEFAULTS.max;
  const sql = postgres(connectionString, {
    max,
    idle_timeout: POOL_DEFAULTS.idle_timeout,
    connect_timeout: POOL_DEFAULTS.connect_timeout,
  });

  logger.info({ target, max }, "Postgres pool created");

  return sql;
}
