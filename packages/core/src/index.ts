/**
 * @relaywatch/core: presence-tracking and telemetry-aggregation engine.
 *
 * Every operation takes its collaborators (store, config, logger, clock)
 * by injection. No HTTP, no environment access, no connection ownership.
 */

// Settings and clock
export {
  DEFAULT_MONITOR_CONFIG,
  systemClock,
  type Clock,
  type MonitorConfig,
} from "./monitor-config.js";

// Report Validator: raw body -> normalized report
export {
  validateHeartbeat,
  validateSysinfo,
  parseReportTimestamp,
  resolveReportTimestamp,
  describeIssues,
} from "./report-validator.js";

// Presence Tracker: derived online/offline
export { computePresence, withPresence } from "./presence.js";

// Device Store contract and in-memory implementation
export type { DeviceStore, RecordResult } from "./device-store.js";
export { createMemoryDeviceStore, compareByFirstSeen } from "./memory-device-store.js";

// Ingestion Gateway
export {
  ingestHeartbeat,
  ingestSysinfo,
  type IngestionDeps,
  type ReportContext,
} from "./ingestion.js";

// Query Service
export {
  listDevices,
  matchesSearch,
  SEARCHABLE_FIELDS,
  type QueryDeps,
  type DeviceListOptions,
} from "./device-query.js";

// Note Editor
export { updateDeviceNote, type NoteEditorDeps } from "./note-editor.js";

// Health Probe
export { probeHealth, type HealthReport } from "./health-probe.js";
