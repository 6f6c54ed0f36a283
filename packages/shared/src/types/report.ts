/**
 * Normalized report types produced by the Report Validator, and the
 * acknowledgment bodies returned by the ingestion and note endpoints.
 */

import type { DeviceView, TelemetryUpdate } from "./device.js";

/** A validated heartbeat: identity and the accepted timestamp */
export interface HeartbeatReport {
  device_id: string;
  /** Client timestamp if present and parseable, otherwise server time */
  timestamp: Date;
}

/** A validated sysinfo report: a heartbeat plus the telemetry keys sent */
export interface SysinfoReport extends HeartbeatReport {
  fields: TelemetryUpdate;
}

/** Body of a successful heartbeat or sysinfo response */
export interface ReportAck {
  status: "ok";
  device_id: string;
  /** Stored last_seen_at after the report was applied */
  last_seen_at: Date;
  /** Server time at which the report was processed */
  received_at: Date;
}

/** Body of a successful note update */
export interface NoteAck {
  status: "ok";
  device_id: string;
  note: string;
}

/** Body of GET /api/devices */
export interface DeviceListing {
  /** Number of devices matching the search, before status filter and paging */
  total: number;
  /** Matching devices currently online */
  online: number;
  /** Matching devices currently offline */
  offline: number;
  devices: DeviceView[];
}
