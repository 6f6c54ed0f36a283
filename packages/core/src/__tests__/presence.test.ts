import { describe, expect, test } from "vitest";
import type { Device } from "@relaywatch/shared";
import { computePresence, withPresence } from "../presence.js";

const seconds = (s: number) => new Date(s * 1000);

describe("computePresence", () => {
  test("online within the timeout, offline after it", () => {
    expect(computePresence(seconds(1000), seconds(1050), 90)).toBe("online");
    expect(computePresence(seconds(1000), seconds(1089), 90)).toBe("online");
    expect(computePresence(seconds(1000), seconds(1091), 90)).toBe("offline");
    expect(computePresence(seconds(1000), seconds(1200), 90)).toBe("offline");
  });

  test("the exact boundary counts as online", () => {
    expect(computePresence(seconds(1000), seconds(1090), 90)).toBe("online");
    expect(computePresence(new Date(1_000_000), new Date(1_090_001), 90)).toBe("offline");
  });

  test("a last_seen_at ahead of now is online", () => {
    expect(computePresence(seconds(1100), seconds(1000), 90)).toBe("online");
  });
});

describe("withPresence", () => {
  test("copies the device and adds status", () => {
    const device: Device = {
      device_id: "dev-1",
      hostname: "alice-pc",
      username: null,
      os_info: null,
      cpu_info: null,
      memory_info: null,
      ip_address: null,
      client_version: null,
      client_uuid: null,
      note: "",
      first_seen_at: seconds(900),
      last_seen_at: seconds(1000),
    };

    const view = withPresence(device, seconds(1200), 90);

    expect(view).toEqual({ ...device, status: "offline" });
    expect(device).not.toHaveProperty("status");
  });
});
