/**
 * Zod schemas for inbound device reports.
 *
 * These schemas only check shape. Normalization that depends on the server
 * (identity fallback, timestamp defaulting and clamping) lives in the core
 * Report Validator, which runs these first.
 *
 * Unknown keys are stripped, not rejected, so newer clients that send extra
 * fields keep working against an older server.
 *
 * Used by:
 *   - POST /api/heartbeat
 *   - POST /api/sysinfo
 */

import { z } from "zod";

/** Maximum stored length per text field; longer values are truncated */
export const FIELD_LIMITS = {
  device_id: 255,
  hostname: 255,
  username: 255,
  os: 500,
  cpu: 500,
  memory: 100,
  ip: 45,
  version: 50,
  uuid: 255,
  note: 500,
} as const;

/**
 * A free-text value that clients may send as a string or a number.
 * Numbers are stored as their decimal string; the result is clipped to `max`.
 */
export function boundedText(max: number) {
  return z
    .union([z.string(), z.number()])
    .transform((value) => String(value).slice(0, max));
}

/** Device identity: trimmed, clipped, may still be empty (checked by the validator) */
const deviceIdSchema = z
  .union([z.string(), z.number()])
  .transform((value) => String(value).trim().slice(0, FIELD_LIMITS.device_id));

/**
 * Schema for a heartbeat body.
 *
 * `device_id` is the documented key; `id` is what relay clients send and is
 * used when `device_id` is absent. `timestamp` is left unchecked here since
 * an unparseable value falls back to server time instead of failing.
 */
export const heartbeatReportSchema = z.object({
  device_id: deviceIdSchema.nullish(),
  id: deviceIdSchema.nullish(),
  timestamp: z.unknown().optional(),
});

/** Inferred type for a parsed heartbeat body */
export type HeartbeatReportBody = z.infer<typeof heartbeatReportSchema>;

/**
 * Schema for a sysinfo body: a heartbeat plus optional telemetry.
 * `null` is treated the same as an omitted key.
 */
export const sysinfoReportSchema = heartbeatReportSchema.extend({
  hostname: boundedText(FIELD_LIMITS.hostname).nullish(),
  username: boundedText(FIELD_LIMITS.username).nullish(),
  os: boundedText(FIELD_LIMITS.os).nullish(),
  cpu: boundedText(FIELD_LIMITS.cpu).nullish(),
  memory: boundedText(FIELD_LIMITS.memory).nullish(),
  ip: boundedText(FIELD_LIMITS.ip).nullish(),
  version: boundedText(FIELD_LIMITS.version).nullish(),
  uuid: boundedText(FIELD_LIMITS.uuid).nullish(),
});

/** Inferred type for a parsed sysinfo body */
export type SysinfoReportBody = z.infer<typeof sysinfoReportSchema>;

/**
 * Schema for POST /api/device/note.
 * `note` defaults to empty, which clears the note.
 */
export const noteUpdateSchema = z.object({
  device_id: deviceIdSchema.pipe(z.string().min(1, "device_id is required")),
  note: boundedText(FIELD_LIMITS.note).nullish().transform((note) => note ?? ""),
});

/** Inferred type for a parsed note update */
export type NoteUpdate = z.infer<typeof noteUpdateSchema>;
