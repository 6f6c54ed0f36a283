/**
 * Global Express error handler for relaywatch.
 *
 * Catches all errors thrown or passed via next(err) in the middleware chain
 * and maps them to HTTP responses:
 *
 *   - ZodError              → 400 with validation details
 *   - RelayWatchError       → HTTP status based on error code prefix
 *   - body-parser errors    → their own status (400 bad JSON, 413 too large)
 *   - Everything else       → 500 Internal Server Error
 *
 * Every error is scoped to its request; nothing here ends the process.
 * Stack traces are never sent to clients in production.
 */

import type { Request, Response, NextFunction } from "express";
import { ZodError } from "zod";
import { RelayWatchError } from "@relaywatch/shared";
import { logger } from "../logger.js";

const isProduction = process.env.NODE_ENV === "production";

/**
 * Map a RelayWatchError code prefix to an HTTP status code.
 *
 * @param code - The machine-readable error code (e.g., "NOT_FOUND_DEVICE")
 */
export function mapErrorCodeToStatus(code: string): number {
  if (code.startsWith("VALIDATION_")) return 400;
  if (code.startsWith("NOT_FOUND")) return 404;
  if (code.startsWith("STORAGE_")) return 503;
  if (code.startsWith("CONFIG_")) return 500;
  return 500;
}

/**
 * Status carried by http-errors style errors (body-parser sets `status` and
 * `expose` on malformed JSON and oversized bodies). Only 4xx is trusted.
 */
function clientErrorStatus(err: Error): number | undefined {
  if ("status" in err && typeof err.status === "number" && err.status >= 400 && err.status < 500) {
    return err.status;
  }
  return undefined;
}

/**
 * Express error-handling middleware (must have 4 parameters for Express to recognize it).
 */
export function errorHandler(
  err: Error,
  _req: Request,
  res: Response,
  _next: NextFunction,
): void {
  // --- Zod validation errors → 400 with structured details ---
  if (err instanceof ZodError) {
    logger.warn({ issues: err.issues }, "Request validation failed");
    res.status(400).json({
      status: "error",
      error: "Validation failed",
      details: err.issues,
    });
    return;
  }

  // --- RelayWatchError → HTTP status based on code prefix ---
  if (err instanceof RelayWatchError) {
    const status = mapErrorCodeToStatus(err.code);
    const log = status >= 500 ? logger.error.bind(logger) : logger.warn.bind(logger);
    log({ err, code: err.code, context: err.context }, `Request error: ${err.message}`);

    res.status(status).json({
      status: "error",
      error: err.message,
      code: err.code,
    });
    return;
  }

  // --- body-parser / http-errors → pass their 4xx status through ---
  const clientStatus = clientErrorStatus(err);
  if (clientStatus !== undefined) {
    logger.warn({ err }, `Rejected request body: ${err.message}`);
    res.status(clientStatus).json({
      status: "error",
      error: clientStatus === 413 ? "Request body too large" : "Malformed request body",
    });
    return;
  }

  // --- Unknown/unexpected errors → 500 ---
  logger.error({ err }, `Unhandled request error: ${err.message}`);
  res.status(500).json({
    status: "error",
    error: "Internal server error",
    ...(isProduction ? {} : { stack: err.stack }),
  });
}
