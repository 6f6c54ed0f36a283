/**
 * Report ingestion endpoints for relaywatch.
 *
 *   - POST /heartbeat — liveness ping: {device_id, timestamp?}
 *   - POST /sysinfo   — liveness + telemetry: {device_id, timestamp?, hostname?, ...}
 *
 * Both answer 200 with an acknowledgment, 400 on a malformed body, 413 on an
 * oversized one, and 503 when the Device Store is unreachable.
 *
 * Bodies are parsed per route (not globally) so each endpoint gets its own
 * size limit: heartbeats are tiny, sysinfo reports carry free text.
 */

import express, { Router } from "express";
import type { Request, Response, NextFunction } from "express";
import type { Logger } from "pino";
import {
  ingestHeartbeat,
  ingestSysinfo,
  type Clock,
  type DeviceStore,
  type MonitorConfig,
} from "@relaywatch/core";

/** Body size limit for heartbeat reports */
const HEARTBEAT_BODY_LIMIT = "10kb";

/** Body size limit for sysinfo reports */
const SYSINFO_BODY_LIMIT = "50kb";

/** Dependencies injected into the reports router for testability */
export interface ReportsRouterDeps {
  store: DeviceStore;
  config: MonitorConfig;
  logger: Logger;
  clock?: Clock;
}

/**
 * Create the reports router.
 *
 * @returns Express Router with POST /heartbeat and POST /sysinfo
 */
export function createReportsRouter(deps: ReportsRouterDeps): Router {
  const router = Router();

  router.post(
    "/heartbeat",
    express.json({ limit: HEARTBEAT_BODY_LIMIT }),
    async (req: Request, res: Response, next: NextFunction) => {
      try {
        const ack = await ingestHeartbeat(deps, req.body);
        res.json(ack);
      } catch (err) {
        next(err);
      }
    },
  );

  router.post(
    "/sysinfo",
    express.json({ limit: SYSINFO_BODY_LIMIT }),
    async (req: Request, res: Response, next: NextFunction) => {
      try {
        const ack = await ingestSysinfo(deps, req.body, { remoteAddress: req.ip });
        res.json(ack);
      } catch (err) {
        next(err);
      }
    },
  );

  return router;
}
