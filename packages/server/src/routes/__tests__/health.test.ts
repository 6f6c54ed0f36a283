import { describe, test, expect } from "vitest";
import type { Server } from "node:http";
import express from "express";
import { createMemoryDeviceStore, type DeviceStore } from "@relaywatch/core";
import { createHealthRouter, VERSION } from "../health.js";

const MONITOR = { offlineTimeoutSeconds: 90, healthCheckTimeoutMs: 50 };

/** Mount the health router alone and GET it once */
async function probe(store: DeviceStore): Promise<{ status: number; body: unknown }> {
  const app = express();
  app.use("/health", createHealthRouter(store, MONITOR));

  const server = await new Promise<Server>((resolve) => {
    const s = app.listen(0, () => resolve(s));
  });

  try {
    const addr = server.address();
    const port = addr && typeof addr === "object" ? addr.port : 0;
    const res = await fetch(`http://127.0.0.1:${port}/health`);
    return { status: res.status, body: await res.json() };
  } finally {
    await new Promise<void>((resolve) => {
      server.close(() => resolve());
    });
  }
}

describe("GET /health", () => {
  test("200 with the device count when the store answers", async () => {
    const store = createMemoryDeviceStore();
    await store.recordHeartbeat("dev-1", new Date(1_000_000));

    const res = await probe(store);

    expect(res.status).toBe(200);
    expect(res.body).toMatchObject({
      status: "ok",
      device_count: 1,
      offline_timeout_seconds: 90,
      version: VERSION,
    });
  });

  test("503 with the cause when the store read fails", async () => {
    const store: DeviceStore = {
      ...createMemoryDeviceStore(),
      async countDevices() {
        throw new Error("connection refused");
      },
    };

    const res = await probe(store);

    expect(res.status).toBe(503);
    expect(res.body).toMatchObject({ status: "error", detail: "connection refused" });
  });

  test("503 when the store does not answer in time", async () => {
    const store: DeviceStore = {
      ...createMemoryDeviceStore(),
      countDevices: () => new Promise<number>(() => {}),
    };

    const res = await probe(store);

    expect(res.status).toBe(503);
    expect(res.body).toMatchObject({
      status: "error",
      detail: "Device store did not answer within 50ms",
    });
  });
});
