/**
 * Query Service: list devices with live-computed presence.
 *
 * Reads every row, computes status against the server clock, filters by a
 * case-insensitive substring, and counts online/offline among the matches.
 * The optional status filter and limit/offset paging only shape the
 * returned `devices` array; the counts always describe the full match set.
 *
 * Side-effect free.
 */

import type { Device, DeviceListing, DeviceStatus } from "@relaywatch/shared";
import type { DeviceStore } from "./device-store.js";
import { systemClock, type Clock, type MonitorConfig } from "./monitor-config.js";
import { withPresence } from "./presence.js";

/** Fields the `q` search parameter is matched against */
export const SEARCHABLE_FIELDS = [
  "device_id",
  "hostname",
  "username",
  "ip_address",
  "note",
] as const satisfies readonly (keyof Device)[];

export interface QueryDeps {
  store: DeviceStore;
  config: MonitorConfig;
  clock?: Clock;
}

export interface DeviceListOptions {
  q?: string;
  status?: DeviceStatus;
  limit?: number;
  offset?: number;
}

/**
 * True when any searchable field contains `query`, ignoring case.
 * A blank query matches everything.
 */
export function matchesSearch(device: Device, query: string): boolean {
  const needle = query.trim().toLowerCase();
  if (needle === "") return true;

  return SEARCHABLE_FIELDS.some((field) => {
    const value = device[field];
    return value !== null && value.toLowerCase().includes(needle);
  });
}

export async function listDevices(
  deps: QueryDeps,
  options: DeviceListOptions = {},
): Promise<DeviceListing> {
  const now = (deps.clock ?? systemClock)();
  const rows = await deps.store.listAll();

  const matches = rows
    .filter((device) => matchesSearch(device, options.q ?? ""))
    .map((device) => withPresence(device, now, deps.config.offlineTimeoutSeconds));

  const online = matches.filter((d) => d.status === "online").length;

  const filtered = options.status
    ? matches.filter((d) => d.status === options.status)
    : matches;

  const offset = options.offset ?? 0;
  const devices = options.limit === undefined
    ? filtered.slice(offset)
    : filtered.slice(offset, offset + options.limit);

  return {
    total: matches.length,
    online,
    offline: matches.length - online,
    devices,
  };
}
