/**
 * In-memory Device Store.
 *
 * Each operation reads and replaces a row without awaiting in between, so
 * on Node's single event loop two mutations of the same row can never
 * interleave. Rows are replaced, never mutated, which makes the objects
 * returned by listAll() safe to hand out.
 *
 * Not durable: state is lost on restart. The server only falls back to it
 * when no DATABASE_URL is configured.
 */

import { DeviceNotFoundError, TELEMETRY_FIELDS } from "@relaywatch/shared";
import type { Device, TelemetryUpdate } from "@relaywatch/shared";
import type { DeviceStore, RecordResult } from "./device-store.js";

/** Ordering used by listAll(): oldest first, device_id breaks ties */
export function compareByFirstSeen(a: Device, b: Device): number {
  const diff = a.first_seen_at.getTime() - b.first_seen_at.getTime();
  if (diff !== 0) return diff;
  return a.device_id < b.device_id ? -1 : a.device_id > b.device_id ? 1 : 0;
}

/** Build a fresh row for a device's first report */
function newDevice(deviceId: string, timestamp: Date): Device {
  return {
    device_id: deviceId,
    hostname: null,
    username: null,
    os_info: null,
    cpu_info: null,
    memory_info: null,
    ip_address: null,
    client_version: null,
    client_uuid: null,
    note: "",
    first_seen_at: timestamp,
    last_seen_at: timestamp,
  };
}

/** Liveness rule: last_seen_at never regresses */
function advanceLastSeen(device: Device, timestamp: Date): Device {
  if (timestamp.getTime() <= device.last_seen_at.getTime()) return device;
  return { ...device, last_seen_at: timestamp };
}

/** Telemetry rule: present keys overwrite unconditionally */
function applyTelemetry(device: Device, fields: TelemetryUpdate): Device {
  const next: Device = { ...device };
  for (const key of TELEMETRY_FIELDS) {
    const value = fields[key];
    if (value !== undefined) next[key] = value;
  }
  return next;
}

export function createMemoryDeviceStore(seed: Device[] = []): DeviceStore {
  const rows = new Map<string, Device>(seed.map((d) => [d.device_id, d]));

  function touch(deviceId: string, timestamp: Date): RecordResult {
    const existing = rows.get(deviceId);
    const device = existing
      ? advanceLastSeen(existing, timestamp)
      : newDevice(deviceId, timestamp);
    rows.set(deviceId, device);
    return {
      device,
      created: existing === undefined,
      previous_last_seen_at: existing?.last_seen_at ?? null,
    };
  }

  return {
    async recordHeartbeat(deviceId, timestamp) {
      return touch(deviceId, timestamp);
    },

    async recordSysinfo(deviceId, timestamp, fields) {
      const result = touch(deviceId, timestamp);
      const device = applyTelemetry(result.device, fields);
      rows.set(deviceId, device);
      return { ...result, device };
    },

    async setNote(deviceId, note) {
      const existing = rows.get(deviceId);
      if (!existing) throw new DeviceNotFoundError(deviceId);
      const device = { ...existing, note };
      rows.set(deviceId, device);
      return device;
    },

    async listAll() {
      return [...rows.values()].sort(compareByFirstSeen);
    },

    async countDevices() {
      return rows.size;
    },
  };
}
