/**
 * Structured error hierarchy for relaywatch.
 *
 * All relaywatch errors extend RelayWatchError, which adds:
 *   - `code`: Machine-readable error code (e.g., "VALIDATION_MALFORMED_REPORT")
 *   - `context`: Arbitrary metadata for debugging (logged, not shown to clients)
 *   - JSON serialization via toJSON()
 *
 * The code prefix decides the HTTP status in the server's error handler:
 *   - VALIDATION_*  → 400
 *   - NOT_FOUND_*   → 404
 *   - STORAGE_*     → 503
 *   - CONFIG_*      → 500
 */

/**
 * Base error class for all relaywatch errors.
 */
export class RelayWatchError extends Error {
  /** Machine-readable error code (e.g., "STORAGE_UNAVAILABLE") */
  readonly code: string;
  /** Structured debugging context, never exposed to clients */
  readonly context: Record<string, unknown>;

  constructor(
    message: string,
    code: string,
    context: Record<string, unknown> = {},
  ) {
    super(message);
    this.name = "RelayWatchError";
    this.code = code;
    this.context = context;
  }

  /** Serialize to a plain object for JSON logging */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      context: this.context,
    };
  }
}

/**
 * Configuration errors: missing or out-of-range environment values.
 * Code prefix: CONFIG_*
 *
 * @example
 *   throw new ConfigError("OFFLINE_TIMEOUT_SECONDS must be positive", "CONFIG_INVALID")
 */
export class ConfigError extends RelayWatchError {
  constructor(
    message: string,
    code: string = "CONFIG_ERROR",
    context: Record<string, unknown> = {},
  ) {
    super(message, code, context);
    this.name = "ConfigError";
  }
}

/**
 * Validation errors: a request body or query string that cannot be used.
 * Code prefix: VALIDATION_*
 */
export class ValidationError extends RelayWatchError {
  constructor(
    message: string,
    code: string = "VALIDATION_ERROR",
    context: Record<string, unknown> = {},
  ) {
    super(message, code, context);
    this.name = "ValidationError";
  }
}

/**
 * Lookup errors: the request referenced an entity that does not exist.
 * Code prefix: NOT_FOUND_*
 */
export class NotFoundError extends RelayWatchError {
  constructor(
    message: string,
    code: string = "NOT_FOUND",
    context: Record<string, unknown> = {},
  ) {
    super(message, code, context);
    this.name = "NotFoundError";
  }
}

/**
 * Storage errors: Device Store operation failures.
 * Code prefix: STORAGE_*
 *
 * @example
 *   throw new StorageError("Upsert returned no row", "STORAGE_QUERY_FAILED", { operation: "recordHeartbeat" })
 */
export class StorageError extends RelayWatchError {
  constructor(
    message: string,
    code: string = "STORAGE_ERROR",
    context: Record<string, unknown> = {},
  ) {
    super(message, code, context);
    this.name = "StorageError";
  }
}

// ---------------------------------------------------------------------------
// Domain errors raised by the presence engine
// ---------------------------------------------------------------------------

/** A heartbeat, sysinfo or note payload that cannot be used. No state changes. */
export class MalformedReportError extends ValidationError {
  constructor(message: string, context: Record<string, unknown> = {}) {
    super(message, "VALIDATION_MALFORMED_REPORT", context);
    this.name = "MalformedReportError";
  }
}

/** The referenced device has never reported. */
export class DeviceNotFoundError extends NotFoundError {
  readonly deviceId: string;

  constructor(deviceId: string) {
    super(`Device not found: ${deviceId}`, "NOT_FOUND_DEVICE", { deviceId });
    this.name = "DeviceNotFoundError";
    this.deviceId = deviceId;
  }
}

/** The Device Store cannot be reached (connection refused, dropped, timed out). */
export class StoreUnavailableError extends StorageError {
  constructor(message: string, context: Record<string, unknown> = {}) {
    super(message, "STORAGE_UNAVAILABLE", context);
    this.name = "StoreUnavailableError";
  }
}
