/**
 * Presence Tracker.
 *
 * Status is derived, never stored: a device is online while the gap between
 * the server's clock and its last accepted report is within the timeout.
 * Recomputing at read time means no sweep job, timer or expiry pass.
 */

import type { Device, DeviceStatus, DeviceView } from "@relaywatch/shared";

/**
 * Classify a last-seen timestamp. The boundary (gap == timeout) is online.
 */
export function computePresence(
  lastSeenAt: Date,
  now: Date,
  offlineTimeoutSeconds: number,
): DeviceStatus {
  const gapMs = now.getTime() - lastSeenAt.getTime();
  return gapMs <= offlineTimeoutSeconds * 1000 ? "online" : "offline";
}

/** Attach the computed status to a stored device */
export function withPresence(
  device: Device,
  now: Date,
  offlineTimeoutSeconds: number,
): DeviceView {
  return {
    ...device,
    status: computePresence(device.last_seen_at, now, offlineTimeoutSeconds),
  };
}
