/**
 * Express application factory for relaywatch.
 *
 * Separated from index.ts so integration tests can create an app instance
 * via createApp() and listen on an ephemeral port without the startup
 * sequence (config, Postgres, migrations).
 *
 * Middleware stack (order matters):
 *   1. trust proxy  — req.ip honours X-Forwarded-For when configured
 *   2. helmet()     — security headers
 *   3. cors()       — only the configured dashboard origin, if any
 *   4. pino-http    — request/response logging (not for /health)
 *   5. Routes       — /health, /api/heartbeat, /api/sysinfo, /api/devices, /api/device/note
 *   6. 404 fallback — logs unknown endpoints
 *   7. Error handler — must be last
 *
 * JSON bodies are parsed inside each router with a route-specific limit.
 */

import express from "express";
import cors from "cors";
import helmet from "helmet";
import { pinoHttp } from "pino-http";
import type { Logger } from "pino";

import type { Clock, DeviceStore } from "@relaywatch/core";
import type { ServerConfig } from "./config.js";
import { logger as defaultLogger } from "./logger.js";
import { errorHandler } from "./middleware/error-handler.js";
import { createUnknownRouteHandler } from "./middleware/unknown-route.js";
import { createHealthRouter } from "./routes/health.js";
import { createReportsRouter } from "./routes/reports.js";
import { createDevicesRouter } from "./routes/devices.js";

/** Dependencies injected into createApp for testability */
export interface AppDeps {
  /** Device Store (Postgres in production, in-memory in tests) */
  store: DeviceStore;
  /** Validated server configuration */
  config: Pick<ServerConfig, "monitor" | "corsOrigin" | "trustProxy">;
  /** Defaults to the server logger */
  logger?: Logger;
  /** Defaults to the system clock; tests pin it */
  clock?: Clock;
}

/**
 * True for any URL Express would route to the health router: the query
 * string, trailing slashes and letter case do not matter.
 */
export function isHealthCheckUrl(url: string | undefined): boolean {
  const path = url?.split("?")[0] ?? "";
  return path.replace(/\/+$/, "").toLowerCase() === "/health";
}

/**
 * Create and configure the Express app with the full middleware stack.
 */
export function createApp(deps: AppDeps): express.Express {
  const app = express();
  const logger = deps.logger ?? defaultLogger;
  const { monitor } = deps.config;

  app.set("trust proxy", deps.config.trustProxy);

  app.use(helmet());
  app.use(cors({ origin: deps.config.corsOrigin ?? false }));

  app.use(
    pinoHttp({
      logger,
      autoLogging: {
        ignore: (req) => isHealthCheckUrl(req.url),
      },
    }),
  );

  app.use("/health", createHealthRouter(deps.store, monitor));

  const routeDeps = { store: deps.store, config: monitor, logger, clock: deps.clock };
  app.use("/api", createReportsRouter(routeDeps));
  app.use("/api", createDevicesRouter(routeDeps));

  app.use(createUnknownRouteHandler(logger));
  app.use(errorHandler);

  return app;
}
