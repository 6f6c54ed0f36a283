/**
 * Server configuration loader for relaywatch.
 *
 * Reads settings from environment variables, validates them with zod and
 * returns an explicit struct that is passed into every component. Only the
 * logger (LOG_LEVEL, LOG_DIR, NODE_ENV) and the error handler (NODE_ENV)
 * read process.env themselves, at module load.
 *
 * Environment variables:
 *   - PORT                     (default: 21114)
 *   - HOST                     (default: "0.0.0.0")
 *   - DATABASE_URL             (optional) Postgres URL; unset means in-memory store
 *   - OFFLINE_TIMEOUT_SECONDS  (default: 90) presence timeout, must be > 0
 *   - HEALTH_CHECK_TIMEOUT_MS  (default: 5000) bound on the health probe
 *   - CORS_ORIGIN              (optional) allowed origin for a browser dashboard
 *   - TRUST_PROXY              (default: "true") honour X-Forwarded-For
 *
 * Empty strings count as unset.
 */

import { z } from "zod";
import { ConfigError } from "@relaywatch/shared";
import { DEFAULT_MONITOR_CONFIG, describeIssues, type MonitorConfig } from "@relaywatch/core";

const envSchema = z.object({
  PORT: z.coerce.number().int().min(1).max(65535).default(21114),
  HOST: z.string().default("0.0.0.0"),
  DATABASE_URL: z.string().optional(),
  OFFLINE_TIMEOUT_SECONDS: z.coerce
    .number()
    .positive()
    .default(DEFAULT_MONITOR_CONFIG.offlineTimeoutSeconds),
  HEALTH_CHECK_TIMEOUT_MS: z.coerce
    .number()
    .int()
    .positive()
    .default(DEFAULT_MONITOR_CONFIG.healthCheckTimeoutMs),
  CORS_ORIGIN: z.string().optional(),
  TRUST_PROXY: z
    .enum(["true", "false"])
    .default("true")
    .transform((value) => value === "true"),
});

/** Validated server configuration */
export interface ServerConfig {
  port: number;
  host: string;
  /** Postgres connection string; undefined selects the in-memory store */
  databaseUrl?: string;
  /** Allowed CORS origin; undefined disables CORS */
  corsOrigin?: string;
  /** Whether req.ip honours X-Forwarded-For */
  trustProxy: boolean;
  /** Settings for the presence engine */
  monitor: MonitorConfig;
}

/**
 * Load and validate configuration.
 *
 * @param env - Environment to read (defaults to process.env)
 * @throws {ConfigError} if any value is out of range (code: CONFIG_INVALID)
 */
export function loadServerConfig(
  env: NodeJS.ProcessEnv = process.env,
): ServerConfig {
  const present = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value.trim() !== ""),
  );

  const parsed = envSchema.safeParse(present);
  if (!parsed.success) {
    throw new ConfigError(
      `Invalid configuration: ${describeIssues(parsed.error)}`,
      "CONFIG_INVALID",
      { issues: parsed.error.issues },
    );
  }

  const values = parsed.data;
  return {
    port: values.PORT,
    host: values.HOST,
    databaseUrl: values.DATABASE_URL,
    corsOrigin: values.CORS_ORIGIN,
    trustProxy: values.TRUST_PROXY,
    monitor: {
      offlineTimeoutSeconds: values.OFFLINE_TIMEOUT_SECONDS,
      healthCheckTimeoutMs: values.HEALTH_CHECK_TIMEOUT_MS,
    },
  };
}
