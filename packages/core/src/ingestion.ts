/**
 * Ingestion Gateway: the heartbeat and sysinfo write paths.
 *
 * Each report goes validate → upsert → acknowledge. Nothing is retried
 * here; a failed write propagates to the caller, and the client's next
 * periodic report is the retry.
 *
 * Replaying an old report leaves last_seen_at untouched, but a replayed
 * sysinfo report still rewrites telemetry fields. That split is deliberate:
 * liveness must be monotonic, telemetry is last-write-wins.
 */

import type { Logger } from "pino";
import type { ReportAck } from "@relaywatch/shared";
import type { DeviceStore, RecordResult } from "./device-store.js";
import { systemClock, type Clock, type MonitorConfig } from "./monitor-config.js";
import { validateHeartbeat, validateSysinfo } from "./report-validator.js";
import { computePresence } from "./presence.js";

/** Dependencies injected into the ingestion operations */
export interface IngestionDeps {
  store: DeviceStore;
  config: MonitorConfig;
  logger: Logger;
  /** Defaults to the system clock */
  clock?: Clock;
}

/** Transport details the HTTP layer knows about a report */
export interface ReportContext {
  /** Requester address; becomes ip_address when a sysinfo body has no `ip` */
  remoteAddress?: string;
}

/**
 * Record a heartbeat.
 *
 * @throws {MalformedReportError} on an unusable body (no state change)
 * @throws {StorageError} if the store write fails
 */
export async function ingestHeartbeat(
  deps: IngestionDeps,
  payload: unknown,
): Promise<ReportAck> {
  const now = (deps.clock ?? systemClock)();
  const report = validateHeartbeat(payload, now);

  const result = await deps.store.recordHeartbeat(report.device_id, report.timestamp);
  logTransition(deps, result, now, "heartbeat");

  return acknowledge(result, now);
}

/**
 * Record a sysinfo report: liveness as for a heartbeat, plus telemetry.
 *
 * @throws {MalformedReportError} on an unusable body (no state change)
 * @throws {StorageError} if the store write fails
 */
export async function ingestSysinfo(
  deps: IngestionDeps,
  payload: unknown,
  context: ReportContext = {},
): Promise<ReportAck> {
  const now = (deps.clock ?? systemClock)();
  const report = validateSysinfo(payload, now, context.remoteAddress);

  const result = await deps.store.recordSysinfo(
    report.device_id,
    report.timestamp,
    report.fields,
  );
  logTransition(deps, result, now, "sysinfo");

  deps.logger.debug(
    { device_id: report.device_id, fields: Object.keys(report.fields) },
    "Telemetry updated",
  );

  return acknowledge(result, now);
}

function acknowledge(result: RecordResult, now: Date): ReportAck {
  return {
    status: "ok",
    device_id: result.device.device_id,
    last_seen_at: result.device.last_seen_at,
    received_at: now,
  };
}

/**
 * Log a device's first report, and reports that bring an offline device
 * back online. Status itself is never written anywhere.
 */
function logTransition(
  deps: IngestionDeps,
  result: RecordResult,
  now: Date,
  kind: "heartbeat" | "sysinfo",
): void {
  const { device, created, previous_last_seen_at: previous } = result;
  const timeout = deps.config.offlineTimeoutSeconds;

  if (created) {
    deps.logger.info(
      { device_id: device.device_id, kind },
      `New device registered: ${device.device_id}`,
    );
    return;
  }
  // Lost an insert race to another first report: nothing to compare against
  if (previous === null) return;

  const wasOnline = computePresence(previous, now, timeout) === "online";
  const isOnline = computePresence(device.last_seen_at, now, timeout) === "online";
  if (!wasOnline && isOnline) {
    deps.logger.info(
      { device_id: device.device_id, kind, offline_since: previous },
      `Device back online: ${device.device_id}`,
    );
  }
}
