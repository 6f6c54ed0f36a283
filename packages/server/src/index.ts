/**
 * Server entry point for relaywatch.
 *
 * Startup sequence (order matters):
 *   1. Load env vars (dotenv) and validate them
 *   2. Pick the Device Store: Postgres when DATABASE_URL is set, else in-memory
 *   3. Run database migrations — abort if they fail
 *   4. Create Express app and start the HTTP server
 *
 * Graceful shutdown on SIGTERM/SIGINT:
 *   1. Stop accepting new connections
 *   2. Close the Postgres pool
 *   3. Exit 0 (or force exit after 30s)
 */

import "dotenv/config";
import { createServer } from "node:http";
import { fileURLToPath } from "node:url";
import type postgres from "postgres";
import { createMemoryDeviceStore, type DeviceStore } from "@relaywatch/core";
import { loadServerConfig, type ServerConfig } from "./config.js";
import { createDb } from "./db/postgres.js";
import { runMigrations } from "./db/migrator.js";
import { createPostgresDeviceStore } from "./db/postgres-device-store.js";
import { createApp } from "./app.js";
import { logger, LOG_DIR_PATH } from "./logger.js";

/** Graceful shutdown timeout — force exit if cleanup takes longer than this */
const SHUTDOWN_TIMEOUT_MS = 30_000;

const MIGRATIONS_DIR = fileURLToPath(new URL("./db/migrations", import.meta.url));

/**
 * Load config, or log why it is invalid and exit.
 */
function loadConfigOrExit(): ServerConfig {
  try {
    return loadServerConfig();
  } catch (err) {
    logger.fatal({ err }, "Invalid configuration — aborting startup");
    process.exit(1);
  }
}

/**
 * Build the Device Store. With a DATABASE_URL this connects and migrates;
 * without one it falls back to a non-durable in-memory store.
 */
async function openStore(
  config: ServerConfig,
): Promise<{ store: DeviceStore; sql?: postgres.Sql }> {
  if (!config.databaseUrl) {
    logger.warn("DATABASE_URL not set — using in-memory device store (state is lost on restart)");
    return { store: createMemoryDeviceStore() };
  }

  const sql = createDb(config.databaseUrl, logger);

  const migrationResult = await runMigrations(sql, MIGRATIONS_DIR, logger);
  logger.info(
    {
      applied: migrationResult.applied.length,
      skipped: migrationResult.skipped.length,
      errors: migrationResult.errors.length,
    },
    "Migrations complete",
  );

  // If any migration failed the schema is inconsistent — abort
  if (migrationResult.errors.length > 0) {
    logger.fatal({ errors: migrationResult.errors }, "Migration errors detected — aborting startup");
    process.exit(1);
  }

  return { store: createPostgresDeviceStore(sql), sql };
}

async function main(): Promise<void> {
  const startMs = performance.now();

  const config = loadConfigOrExit();
  const { store, sql } = await openStore(config);

  const app = createApp({ store, config });
  const httpServer = createServer(app);

  httpServer.listen(config.port, config.host, () => {
    const elapsedMs = Math.round(performance.now() - startMs);
    logger.info(
      {
        elapsed_ms: elapsedMs,
        host: config.host,
        port: config.port,
        store: sql ? "postgres" : "memory",
        offline_timeout_seconds: config.monitor.offlineTimeoutSeconds,
        log_dir: LOG_DIR_PATH,
      },
      `Server started in ${elapsedMs}ms on ${config.host}:${config.port}`,
    );
  });

  // --- Graceful shutdown ---
  let isShuttingDown = false;

  const shutdown = async (signal: string): Promise<void> => {
    if (isShuttingDown) return;
    isShuttingDown = true;

    logger.info({ signal }, "Shutting down...");

    const forceExitTimer = setTimeout(() => {
      logger.error("Graceful shutdown timed out — forcing exit");
      process.exit(1);
    }, SHUTDOWN_TIMEOUT_MS);
    forceExitTimer.unref();

    try {
      await new Promise<void>((resolve, reject) => {
        httpServer.close((err) => (err ? reject(err) : resolve()));
      });

      await sql?.end();

      logger.info("Shutdown complete");
      process.exit(0);
    } catch (err) {
      logger.error({ err }, "Error during shutdown");
      process.exit(1);
    }
  };

  process.on("SIGTERM", () => void shutdown("SIGTERM"));
  process.on("SIGINT", () => void shutdown("SIGINT"));
}

main().catch((err) => {
  logger.fatal({ err }, "Unhandled startup error");
  process.exit(1);
});
