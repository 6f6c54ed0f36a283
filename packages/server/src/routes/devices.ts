/**
 * Device API endpoints for relaywatch.
 *
 *   - GET  /devices      — every device with computed status; ?q= search,
 *                          ?status=, ?limit=, ?offset=
 *   - POST /device/note  — replace one device's note: {device_id, note}
 *
 * The list endpoint always answers 200 (an empty list when nothing matches)
 * unless the query string is invalid or the store is down. The note endpoint
 * answers 404 for a device that has never reported.
 */

import express, { Router } from "express";
import type { Request, Response, NextFunction } from "express";
import type { Logger } from "pino";
import { deviceListQuerySchema } from "@relaywatch/shared";
import {
  listDevices,
  updateDeviceNote,
  type Clock,
  type DeviceStore,
  type MonitorConfig,
} from "@relaywatch/core";

/** Notes are capped at 500 characters, so a small body limit suffices */
const NOTE_BODY_LIMIT = "10kb";

/** Dependencies injected into the devices router for testability */
export interface DevicesRouterDeps {
  store: DeviceStore;
  config: MonitorConfig;
  logger: Logger;
  clock?: Clock;
}

/**
 * Create the devices router with injected dependencies.
 */
export function createDevicesRouter(deps: DevicesRouterDeps): Router {
  const router = Router();

  // =========================================================================
  // GET /devices — list with live status
  // =========================================================================
  router.get(
    "/devices",
    async (req: Request, res: Response, next: NextFunction) => {
      try {
        // ZodError falls through to the error handler as a 400
        const query = deviceListQuerySchema.parse(req.query);
        const listing = await listDevices(deps, query);
        res.json(listing);
      } catch (err) {
        next(err);
      }
    },
  );

  // =========================================================================
  // POST /device/note — edit a device's note
  // =========================================================================
  router.post(
    "/device/note",
    express.json({ limit: NOTE_BODY_LIMIT }),
    async (req: Request, res: Response, next: NextFunction) => {
      try {
        const ack = await updateDeviceNote(deps, req.body);
        res.json(ack);
      } catch (err) {
        next(err);
      }
    },
  );

  return router;
}
