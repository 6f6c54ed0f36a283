/**
 * Postgres-backed Device Store.
 *
 * Every mutation is a single statement, so Postgres row locks serialize
 * concurrent writers to the same device_id while different devices proceed
 * independently:
 *   - heartbeat/sysinfo: INSERT ... ON CONFLICT DO UPDATE
 *   - note:              UPDATE ... RETURNING (no row → DeviceNotFoundError)
 *
 * last_seen_at uses GREATEST(stored, reported) so it never regresses.
 * Telemetry columns use COALESCE(reported, stored): a key the client sent
 * overwrites, a key it omitted keeps the old value. The two rules are kept
 * in separate SET clauses on purpose.
 *
 * `xmax = 0` on the returned row marks the statement that inserted it. The
 * `previous` CTE reads the statement snapshot, so a writer that loses an
 * insert race sees no previous row but still reports created = false.
 *
 * Driver failures are translated: connection-class errors become
 * StoreUnavailableError, anything else StorageError.
 */

import type { Sql } from "postgres";
import {
  DeviceNotFoundError,
  RelayWatchError,
  StorageError,
  StoreUnavailableError,
} from "@relaywatch/shared";
import type { Device, TelemetryUpdate } from "@relaywatch/shared";
import type { DeviceStore, RecordResult } from "@relaywatch/core";

// ---------------------------------------------------------------------------
// Row types
// ---------------------------------------------------------------------------

/** A `devices` row as returned by postgres.js (timestamptz → Date) */
type DeviceRow = Device;

/** An upsert row, carrying the insert flag and last_seen_at before the statement */
interface RecordRow extends DeviceRow {
  created: boolean;
  previous_last_seen_at: Date | null;
}

// ---------------------------------------------------------------------------
// Error translation
// ---------------------------------------------------------------------------

/** Driver and socket codes meaning the database could not be reached */
const CONNECTION_ERROR_CODES = new Set([
  "ECONNREFUSED",
  "ECONNRESET",
  "ENOTFOUND",
  "ETIMEDOUT",
  "EHOSTUNREACH",
  "CONNECT_TIMEOUT",
  "CONNECTION_CLOSED",
  "CONNECTION_ENDED",
  "CONNECTION_DESTROYED",
]);

function errorCode(err: unknown): string | undefined {
  if (typeof err === "object" && err !== null && "code" in err && typeof err.code === "string") {
    return err.code;
  }
  return undefined;
}

/**
 * True for failures that mean "the store is unreachable" rather than "the
 * query was wrong": socket errors, postgres.js connection codes, and SQLSTATE
 * classes 08 (connection exception) and 57P (server shutting down).
 */
export function isConnectionError(err: unknown): boolean {
  const code = errorCode(err);
  if (!code) return false;
  return CONNECTION_ERROR_CODES.has(code) || code.startsWith("08") || code.startsWith("57P");
}

async function run<T>(operation: string, query: () => Promise<T>): Promise<T> {
  try {
    return await query();
  } catch (err) {
    if (err instanceof RelayWatchError) throw err;

    const cause = err instanceof Error ? err.message : String(err);
    const context = { operation, cause, pgCode: errorCode(err) };
    if (isConnectionError(err)) {
      throw new StoreUnavailableError("Device store is unavailable", context);
    }
    throw new StorageError(`Device store ${operation} failed`, "STORAGE_QUERY_FAILED", context);
  }
}

/** Strip the bookkeeping column off an upsert row */
function toRecordResult(row: RecordRow | undefined, operation: string): RecordResult {
  if (!row) {
    throw new StorageError("Upsert returned no row", "STORAGE_QUERY_FAILED", { operation });
  }
  const { created, previous_last_seen_at, ...device } = row;
  return { device, created, previous_last_seen_at };
}

// ---------------------------------------------------------------------------
// Store factory
// ---------------------------------------------------------------------------

/**
 * Create a Device Store over a postgres.js client.
 * The `devices` table comes from migrations/001_devices.sql.
 */
export function createPostgresDeviceStore(sql: Sql): DeviceStore {
  return {
    recordHeartbeat(deviceId, timestamp) {
      return run("recordHeartbeat", async () => {
        const [row] = await sql<RecordRow[]>`
          WITH previous AS (
            SELECT last_seen_at FROM devices WHERE device_id = ${deviceId}
          )
          INSERT INTO devices (device_id, first_seen_at, last_seen_at)
          VALUES (${deviceId}, ${timestamp}, ${timestamp})
          ON CONFLICT (device_id) DO UPDATE SET
            last_seen_at = GREATEST(devices.last_seen_at, EXCLUDED.last_seen_at)
          RETURNING
            devices.*,
            (devices.xmax = 0) AS created,
            (SELECT last_seen_at FROM previous) AS previous_last_seen_at
        `;
        return toRecordResult(row, "recordHeartbeat");
      });
    },

    recordSysinfo(deviceId, timestamp, fields: TelemetryUpdate) {
      return run("recordSysinfo", async () => {
        const [row] = await sql<RecordRow[]>`
          WITH previous AS (
            SELECT last_seen_at FROM devices WHERE device_id = ${deviceId}
          )
          INSERT INTO devices (
            device_id, hostname, username, os_info, cpu_info, memory_info,
            ip_address, client_version, client_uuid, first_seen_at, last_seen_at
          )
          VALUES (
            ${deviceId}, ${fields.hostname ?? null}, ${fields.username ?? null},
            ${fields.os_info ?? null}, ${fields.cpu_info ?? null}, ${fields.memory_info ?? null},
            ${fields.ip_address ?? null}, ${fields.client_version ?? null}, ${fields.client_uuid ?? null},
            ${timestamp}, ${timestamp}
          )
          ON CONFLICT (device_id) DO UPDATE SET
            last_seen_at = GREATEST(devices.last_seen_at, EXCLUDED.last_seen_at),
            hostname = COALESCE(EXCLUDED.hostname, devices.hostname),
            username = COALESCE(EXCLUDED.username, devices.username),
            os_info = COALESCE(EXCLUDED.os_info, devices.os_info),
            cpu_info = COALESCE(EXCLUDED.cpu_info, devices.cpu_info),
            memory_info = COALESCE(EXCLUDED.memory_info, devices.memory_info),
            ip_address = COALESCE(EXCLUDED.ip_address, devices.ip_address),
            client_version = COALESCE(EXCLUDED.client_version, devices.client_version),
            client_uuid = COALESCE(EXCLUDED.client_uuid, devices.client_uuid)
          RETURNING
            devices.*,
            (devices.xmax = 0) AS created,
            (SELECT last_seen_at FROM previous) AS previous_last_seen_at
        `;
        return toRecordResult(row, "recordSysinfo");
      });
    },

    setNote(deviceId, note) {
      return run("setNote", async () => {
        const [row] = await sql<DeviceRow[]>`
          UPDATE devices SET note = ${note}
          WHERE device_id = ${deviceId}
          RETURNING *
        `;
        if (!row) throw new DeviceNotFoundError(deviceId);
        return row;
      });
    },

    listAll() {
      return run("listAll", async () => {
        const rows = await sql<DeviceRow[]>`
          SELECT * FROM devices ORDER BY first_seen_at ASC, device_id ASC
        `;
        return [...rows];
      });
    },

    countDevices() {
      return run("countDevices", async () => {
        const [row] = await sql<{ count: number }[]>`
          SELECT count(*)::int AS count FROM devices
        `;
        return row?.count ?? 0;
      });
    },
  };
}
