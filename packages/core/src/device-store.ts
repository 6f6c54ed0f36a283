/**
 * Device Store contract.
 *
 * One row per device_id. Implementations must make every mutation of a
 * single row atomic with respect to other mutations of that row; different
 * rows are independent. Two implementations exist:
 *   - createMemoryDeviceStore() in this package (tests, no-database mode)
 *   - createPostgresDeviceStore() in @relaywatch/server
 *
 * Liveness and telemetry follow different rules and must stay separate:
 *   - last_seen_at only ever moves forward (max of stored and reported)
 *   - telemetry fields are last-write-wins regardless of timestamp order
 */

import type { Device, TelemetryUpdate } from "@relaywatch/shared";

/** Outcome of a heartbeat or sysinfo upsert */
export interface RecordResult {
  /** The row after the report was applied */
  device: Device;
  /** True only for the write that inserted the row */
  created: boolean;
  /**
   * last_seen_at before the report. Null when the row was just created, and
   * also when a concurrent first report for the same device won the insert:
   * read `created` to tell a new device apart.
   */
  previous_last_seen_at: Date | null;
}

export interface DeviceStore {
  /**
   * Create the row if absent (telemetry null, note empty) and advance
   * last_seen_at to max(stored, timestamp).
   */
  recordHeartbeat(deviceId: string, timestamp: Date): Promise<RecordResult>;

  /**
   * Same upsert and monotonic rule as recordHeartbeat, then overwrite every
   * telemetry field present in `fields`. Absent fields keep their value.
   */
  recordSysinfo(
    deviceId: string,
    timestamp: Date,
    fields: TelemetryUpdate,
  ): Promise<RecordResult>;

  /**
   * Replace the note of an existing device.
   *
   * @throws {DeviceNotFoundError} if the device has never reported; no row is created
   */
  setNote(deviceId: string, note: string): Promise<Device>;

  /** Every row, ordered by first_seen_at then device_id */
  listAll(): Promise<Device[]>;

  /** Number of rows. Used as the health probe's trivial read. */
  countDevices(): Promise<number>;
}
