import { describe, expect, test } from "vitest";
import {
  RelayWatchError,
  ValidationError,
  NotFoundError,
  StorageError,
  MalformedReportError,
  DeviceNotFoundError,
  StoreUnavailableError,
  ConfigError,
} from "../errors.js";

describe("error hierarchy", () => {
  test("domain errors carry their codes and parent classes", () => {
    const malformed = new MalformedReportError("bad body");
    expect(malformed).toBeInstanceOf(ValidationError);
    expect(malformed).toBeInstanceOf(RelayWatchError);
    expect(malformed.code).toBe("VALIDATION_MALFORMED_REPORT");

    const missing = new DeviceNotFoundError("dev-9");
    expect(missing).toBeInstanceOf(NotFoundError);
    expect(missing.code).toBe("NOT_FOUND_DEVICE");
    expect(missing.message).toBe("Device not found: dev-9");
    expect(missing.deviceId).toBe("dev-9");

    const down = new StoreUnavailableError("store down", { operation: "listAll" });
    expect(down).toBeInstanceOf(StorageError);
    expect(down.code).toBe("STORAGE_UNAVAILABLE");
  });

  test("base classes fall back to default codes", () => {
    expect(new ConfigError("x").code).toBe("CONFIG_ERROR");
    expect(new StorageError("x").code).toBe("STORAGE_ERROR");
    expect(new NotFoundError("x").code).toBe("NOT_FOUND");
  });

  test("toJSON includes name, code, message and context", () => {
    const err = new DeviceNotFoundError("dev-9");
    expect(err.toJSON()).toEqual({
      name: "DeviceNotFoundError",
      code: "NOT_FOUND_DEVICE",
      message: "Device not found: dev-9",
      context: { deviceId: "dev-9" },
    });
  });
});
