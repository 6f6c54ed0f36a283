/**
 * Health check endpoint for relaywatch.
 *
 * GET /health — reports whether the Device Store answers a trivial read
 * within the configured timeout:
 *   - "ok"    → HTTP 200, with device_count and latency
 *   - "error" → HTTP 503, with the underlying cause in `detail`
 *
 * Never mutates state.
 */

import { Router } from "express";
import { probeHealth, type DeviceStore, type MonitorConfig } from "@relaywatch/core";

/** The server version reported in health check responses */
export const VERSION = "1.0.0";

/** Timestamp when the server process started (for uptime calculation) */
const startTime = Date.now();

/**
 * Create the health check router.
 *
 * @param store  - Device Store to probe
 * @param config - Supplies the probe timeout and the reported offline timeout
 */
export function createHealthRouter(store: DeviceStore, config: MonitorConfig): Router {
  const router = Router();

  router.get("/", async (_req, res) => {
    const health = await probeHealth(store, config.healthCheckTimeoutMs);

    res.status(health.status === "ok" ? 200 : 503).json({
      ...health,
      offline_timeout_seconds: config.offlineTimeoutSeconds,
      uptime_seconds: Math.floor((Date.now() - startTime) / 1000),
      version: VERSION,
    });
  });

  return router;
}
