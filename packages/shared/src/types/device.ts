/**
 * Device type definitions.
 *
 * A Device is one remote-access client that reports heartbeats and system
 * info to the monitor. Rows are created on the first report and never
 * deleted. Presence (online/offline) is never stored: it is derived from
 * `last_seen_at` at read time.
 */

/** Derived presence of a device at query time */
export type DeviceStatus = "online" | "offline";

/** Every presence value, for query-string validation */
export const DEVICE_STATUSES = ["online", "offline"] as const satisfies readonly DeviceStatus[];

/**
 * Descriptive telemetry carried by sysinfo reports.
 * Each field is overwritten wholesale by any report that includes it.
 */
export interface TelemetryFields {
  hostname: string | null;
  username: string | null;
  /** Operating system description (`os` on the wire) */
  os_info: string | null;
  /** CPU description (`cpu` on the wire) */
  cpu_info: string | null;
  /** Memory description (`memory` on the wire) */
  memory_info: string | null;
  /** Reported or observed address of the client (`ip` on the wire) */
  ip_address: string | null;
  /** Client software version (`version` on the wire) */
  client_version: string | null;
  /** Client installation UUID (`uuid` on the wire) */
  client_uuid: string | null;
}

/** Names of the telemetry columns, in storage order */
export const TELEMETRY_FIELDS = [
  "hostname",
  "username",
  "os_info",
  "cpu_info",
  "memory_info",
  "ip_address",
  "client_version",
  "client_uuid",
] as const satisfies readonly (keyof TelemetryFields)[];

/** Telemetry carried by one sysinfo report: only the keys the client sent */
export type TelemetryUpdate = Partial<Record<keyof TelemetryFields, string>>;

/**
 * Device interface: maps to the `devices` Postgres table.
 */
export interface Device extends TelemetryFields {
  /** Client-assigned identifier, primary key */
  device_id: string;
  /** User-authored note, only changed by the note endpoint */
  note: string;
  /** Timestamp of the first accepted report; immutable */
  first_seen_at: Date;
  /** Latest accepted report timestamp; never moves backward */
  last_seen_at: Date;
}

/** A device as returned by the query endpoint, with presence computed */
export interface DeviceView extends Device {
  status: DeviceStatus;
}
