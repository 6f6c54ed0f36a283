/**
 * Report Validator: turns a loosely-typed heartbeat or sysinfo body into a
 * normalized report, or throws MalformedReportError.
 *
 * Rules:
 *   - device_id is required and non-empty (legacy key `id` accepted)
 *   - timestamp defaults to server time when missing or unparseable, and is
 *     clamped to server time when it lies in the future
 *   - unknown keys are ignored
 *
 * Pure: no I/O, no logging.
 */

import type { ZodError, ZodTypeAny, z } from "zod";
import {
  heartbeatReportSchema,
  sysinfoReportSchema,
  FIELD_LIMITS,
  MalformedReportError,
} from "@relaywatch/shared";
import type {
  HeartbeatReport,
  SysinfoReport,
  TelemetryUpdate,
} from "@relaywatch/shared";

/** Digits with an optional fraction: Unix seconds sent as a string */
const UNIX_SECONDS_REGEX = /^\d+(\.\d+)?$/;

/**
 * Parse a client-supplied timestamp.
 *
 * Numbers and digit strings are Unix seconds; other strings go through
 * Date.parse (ISO-8601). Returns null for anything unusable.
 */
export function parseReportTimestamp(raw: unknown): Date | null {
  if (typeof raw === "number") {
    if (!Number.isFinite(raw) || raw < 0) return null;
    return validDateOrNull(new Date(Math.round(raw * 1000)));
  }

  if (typeof raw === "string") {
    const text = raw.trim();
    if (text === "") return null;
    if (UNIX_SECONDS_REGEX.test(text)) return parseReportTimestamp(Number(text));

    return validDateOrNull(new Date(Date.parse(text)));
  }

  return null;
}

/** Seconds beyond the Date range (about 8.64e12) yield an Invalid Date */
function validDateOrNull(date: Date): Date | null {
  return Number.isNaN(date.getTime()) ? null : date;
}

/**
 * Pick the timestamp a report is recorded at: the client's if usable,
 * never later than `now`.
 */
export function resolveReportTimestamp(raw: unknown, now: Date): Date {
  const parsed = parseReportTimestamp(raw);
  if (!parsed || parsed.getTime() > now.getTime()) return now;
  return parsed;
}

/**
 * Validate a heartbeat body.
 *
 * @throws {MalformedReportError} if the body is not an object or has no device_id
 */
export function validateHeartbeat(payload: unknown, now: Date): HeartbeatReport {
  const body = parseOrThrow(heartbeatReportSchema, payload, "heartbeat");
  return {
    device_id: requireDeviceId(body.device_id, body.id, "heartbeat"),
    timestamp: resolveReportTimestamp(body.timestamp, now),
  };
}

/**
 * Validate a sysinfo body.
 *
 * `fallbackIp` (the requester's address) is used when the body carries no
 * `ip`. Only keys the client actually sent end up in `fields`.
 *
 * @throws {MalformedReportError} on a non-object body, missing device_id or
 *   a telemetry value that is not a string or number
 */
export function validateSysinfo(
  payload: unknown,
  now: Date,
  fallbackIp?: string,
): SysinfoReport {
  const body = parseOrThrow(sysinfoReportSchema, payload, "sysinfo");

  const fields: TelemetryUpdate = {};
  assignIfPresent(fields, "hostname", body.hostname);
  assignIfPresent(fields, "username", body.username);
  assignIfPresent(fields, "os_info", body.os);
  assignIfPresent(fields, "cpu_info", body.cpu);
  assignIfPresent(fields, "memory_info", body.memory);
  assignIfPresent(fields, "ip_address", body.ip ?? fallbackIp?.slice(0, FIELD_LIMITS.ip));
  assignIfPresent(fields, "client_version", body.version);
  assignIfPresent(fields, "client_uuid", body.uuid);

  return {
    device_id: requireDeviceId(body.device_id, body.id, "sysinfo"),
    timestamp: resolveReportTimestamp(body.timestamp, now),
    fields,
  };
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function parseOrThrow<S extends ZodTypeAny>(
  schema: S,
  payload: unknown,
  kind: string,
): z.output<S> {
  const result = schema.safeParse(payload);
  if (!result.success) {
    throw new MalformedReportError(
      `Malformed ${kind} report: ${describeIssues(result.error)}`,
      { issues: result.error.issues },
    );
  }
  return result.data;
}

/** Render zod issues as "path: message; path: message" */
export function describeIssues(error: ZodError): string {
  return error.issues
    .map((issue) =>
      issue.path.length > 0
        ? `${issue.path.join(".")}: ${issue.message}`
        : issue.message,
    )
    .join("; ");
}

function requireDeviceId(
  deviceId: string | null | undefined,
  legacyId: string | null | undefined,
  kind: string,
): string {
  const id = deviceId || legacyId;
  if (!id) {
    throw new MalformedReportError(
      `Malformed ${kind} report: device_id is required`,
    );
  }
  return id;
}

function assignIfPresent(
  fields: TelemetryUpdate,
  key: keyof TelemetryUpdate,
  value: string | null | undefined,
): void {
  if (value !== null && value !== undefined) {
    fields[key] = value;
  }
}
