/**
 * Centralized pino logger factory for the relaywatch server.
 *
 * Multi-transport logging: pretty-printed to stdout (dev) or JSON to stdout
 * (production), plus JSON to a log file (always).
 *
 * Log files are written to {project_root}/logs/:
 *   - server.log — Express server, routes, ingestion, startup/shutdown
 *
 * Configuration:
 *   - LOG_LEVEL env var controls the log level (default: "info")
 *   - NODE_ENV=production disables pretty printing (JSON only)
 *   - NODE_ENV=test returns a silent logger with no transports
 *   - LOG_DIR env var overrides the default log directory
 */

import { pino, type Logger } from "pino";
import { fileURLToPath } from "node:url";
import { resolve, join } from "node:path";

const isProduction = process.env.NODE_ENV === "production";
const isTest = process.env.NODE_ENV === "test";

const LOG_LEVEL = process.env.LOG_LEVEL || "info";

/**
 * Log directory: defaults to {project_root}/logs/, three levels above
 * packages/server/src/.
 */
const SOURCE_DIR = fileURLToPath(new URL(".", import.meta.url));
const PROJECT_ROOT = resolve(SOURCE_DIR, "..", "..", "..");
const LOG_DIR = process.env.LOG_DIR || join(PROJECT_ROOT, "logs");

/**
 * Create a pino logger that writes to stdout and to a JSON log file.
 *
 * The file transport uses pino/file with mkdir:true, so the logs/ directory
 * is created on first write. Under test, transports are skipped entirely so
 * no worker threads outlive the test run.
 *
 * @param name     - Logger name (appears in log entries)
 * @param filename - Log filename (e.g. "server.log"), written to LOG_DIR
 */
export function createLogger(name: string, filename: string): Logger {
  if (isTest) {
    return pino({ name, level: "silent" });
  }

  const filePath = join(LOG_DIR, filename);

  return pino({
    name,
    level: LOG_LEVEL,
    transport: {
      targets: [
        isProduction
          ? {
              target: "pino/file",
              options: { destination: 1 },
              level: LOG_LEVEL,
            }
          : {
              target: "pino-pretty",
              options: {
                colorize: true,
                translateTime: "HH:MM:ss",
                ignore: "pid,hostname",
              },
              level: LOG_LEVEL,
            },
        {
          target: "pino/file",
          options: { destination: filePath, mkdir: true },
          level: LOG_LEVEL,
        },
      ],
    },
  });
}

/** Default server logger, used by routes, middleware and startup code */
export const logger = createLogger("server", "server.log");

/** Expose the computed log directory for use by other modules */
export const LOG_DIR_PATH = LOG_DIR;
