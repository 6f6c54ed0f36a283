/**
 * Tests for the in-memory Device Store.
 *
 * Verifies the store contract that the Postgres store also follows:
 *   - upsert on first report with empty telemetry and note
 *   - last_seen_at never moves backward
 *   - sysinfo overwrites present fields and keeps absent ones
 *   - setNote on an unknown device fails and creates nothing
 *   - listAll ordering is stable
 */

import { describe, expect, test } from "vitest";
import { DeviceNotFoundError } from "@relaywatch/shared";
import { createMemoryDeviceStore } from "../memory-device-store.js";

const seconds = (s: number) => new Date(s * 1000);

describe("recordHeartbeat", () => {
  test("creates a row with empty telemetry on first report", async () => {
    const store = createMemoryDeviceStore();

    const result = await store.recordHeartbeat("dev-1", seconds(1000));

    expect(result.created).toBe(true);
    expect(result.previous_last_seen_at).toBeNull();
    expect(result.device).toEqual({
      device_id: "dev-1",
      hostname: null,
      username: null,
      os_info: null,
      cpu_info: null,
      memory_info: null,
      ip_address: null,
      client_version: null,
      client_uuid: null,
      note: "",
      first_seen_at: seconds(1000),
      last_seen_at: seconds(1000),
    });
  });

  test("advances last_seen_at and reports the previous value", async () => {
    const store = createMemoryDeviceStore();
    await store.recordHeartbeat("dev-1", seconds(1000));

    const result = await store.recordHeartbeat("dev-1", seconds(1060));

    expect(result.created).toBe(false);
    expect(result.previous_last_seen_at).toEqual(seconds(1000));
    expect(result.device.last_seen_at).toEqual(seconds(1060));
    expect(result.device.first_seen_at).toEqual(seconds(1000));
  });

  test("an older timestamp never decreases last_seen_at", async () => {
    const store = createMemoryDeviceStore();
    await store.recordHeartbeat("dev-1", seconds(1000));

    const result = await store.recordHeartbeat("dev-1", seconds(500));

    expect(result.device.last_seen_at).toEqual(seconds(1000));
  });

  test("concurrent out-of-order heartbeats settle on the newest", async () => {
    const store = createMemoryDeviceStore();
    const timestamps = [1040, 1010, 1090, 1000, 1070, 1020];

    await Promise.all(timestamps.map((t) => store.recordHeartbeat("dev-1", seconds(t))));

    const [device] = await store.listAll();
    expect(device?.last_seen_at).toEqual(seconds(1090));
    expect(device?.first_seen_at).toEqual(seconds(1040));
  });
});

describe("recordSysinfo", () => {
  test("overwrites present fields and keeps absent ones", async () => {
    const store = createMemoryDeviceStore();
    await store.recordSysinfo("dev-1", seconds(1000), {
      hostname: "alice-pc",
      username: "alice",
      os_info: "linux",
    });

    const result = await store.recordSysinfo("dev-1", seconds(1010), { hostname: "alice-laptop" });

    expect(result.device.hostname).toBe("alice-laptop");
    expect(result.device.username).toBe("alice");
    expect(result.device.os_info).toBe("linux");
    expect(result.device.last_seen_at).toEqual(seconds(1010));
  });

  test("a stale report still overwrites fields but not last_seen_at", async () => {
    const store = createMemoryDeviceStore();
    await store.recordSysinfo("dev-1", seconds(1100), { hostname: "newer-name" });

    const result = await store.recordSysinfo("dev-1", seconds(1000), { hostname: "older-name" });

    expect(result.device.hostname).toBe("older-name");
    expect(result.device.last_seen_at).toEqual(seconds(1100));
  });

  test("leaves the note alone", async () => {
    const store = createMemoryDeviceStore();
    await store.recordHeartbeat("dev-1", seconds(1000));
    await store.setNote("dev-1", "test laptop");

    const result = await store.recordSysinfo("dev-1", seconds(1010), { hostname: "alice-pc" });

    expect(result.device.note).toBe("test laptop");
  });
});

describe("setNote", () => {
  test("replaces the note of an existing device", async () => {
    const store = createMemoryDeviceStore();
    await store.recordHeartbeat("dev-1", seconds(1000));

    const device = await store.setNote("dev-1", "front desk");

    expect(device.note).toBe("front desk");
    expect(device.last_seen_at).toEqual(seconds(1000));
  });

  test("fails for an unknown device and creates no row", async () => {
    const store = createMemoryDeviceStore();

    await expect(store.setNote("ghost", "x")).rejects.toBeInstanceOf(DeviceNotFoundError);
    expect(await store.countDevices()).toBe(0);
    expect(await store.listAll()).toEqual([]);
  });
});

describe("listAll", () => {
  test("orders by first_seen_at, then device_id", async () => {
    const store = createMemoryDeviceStore();
    await store.recordHeartbeat("dev-c", seconds(1000));
    await store.recordHeartbeat("dev-b", seconds(1000));
    await store.recordHeartbeat("dev-a", seconds(1050));

    const first = (await store.listAll()).map((d) => d.device_id);
    const second = (await store.listAll()).map((d) => d.device_id);

    expect(first).toEqual(["dev-b", "dev-c", "dev-a"]);
    expect(second).toEqual(first);
  });

  test("counts rows", async () => {
    const store = createMemoryDeviceStore();
    await store.recordHeartbeat("dev-1", seconds(1000));
    await store.recordHeartbeat("dev-2", seconds(1000));
    await store.recordHeartbeat("dev-1", seconds(1010));

    expect(await store.countDevices()).toBe(2);
  });
});
