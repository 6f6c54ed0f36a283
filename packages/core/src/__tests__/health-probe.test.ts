import { describe, expect, test } from "vitest";
import type { DeviceStore } from "../device-store.js";
import { createMemoryDeviceStore } from "../memory-device-store.js";
import { probeHealth } from "../health-probe.js";

function storeWithCount(countDevices: DeviceStore["countDevices"]): DeviceStore {
  return { ...createMemoryDeviceStore(), countDevices };
}

describe("probeHealth", () => {
  test("reports ok with the device count", async () => {
    const store = createMemoryDeviceStore();
    await store.recordHeartbeat("dev-1", new Date(1_000_000));
    await store.recordHeartbeat("dev-2", new Date(1_000_000));

    const report = await probeHealth(store, 1000);

    expect(report.status).toBe("ok");
    expect(report.device_count).toBe(2);
    expect(report.detail).toBeUndefined();
    expect(report.latency_ms).toBeGreaterThanOrEqual(0);
  });

  test("reports the failure when the store read rejects", async () => {
    const store = storeWithCount(async () => {
      throw new Error("connection refused");
    });

    const report = await probeHealth(store, 1000);

    expect(report.status).toBe("error");
    expect(report.detail).toBe("connection refused");
    expect(report.device_count).toBeUndefined();
  });

  test("times out a hung store", async () => {
    const store = storeWithCount(() => new Promise<number>(() => {}));

    const report = await probeHealth(store, 20);

    expect(report).toMatchObject({
      status: "error",
      detail: "Device store did not answer within 20ms",
    });
  });
});
