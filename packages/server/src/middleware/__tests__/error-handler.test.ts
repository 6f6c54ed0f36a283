/**
 * Tests for the global error handler and the unknown-route fallback.
 *
 * A throwaway Express app mounts one route per error kind so the handler
 * is exercised the way Express calls it, through next(err).
 */

import { describe, test, expect, beforeAll, afterAll } from "vitest";
import type { Server } from "node:http";
import express from "express";
import type { Request } from "express";
import { z } from "zod";
import {
  ConfigError,
  DeviceNotFoundError,
  MalformedReportError,
  StoreUnavailableError,
} from "@relaywatch/shared";
import { errorHandler, mapErrorCodeToStatus } from "../error-handler.js";
import { loggableHeaders } from "../unknown-route.js";

describe("mapErrorCodeToStatus", () => {
  test("maps code prefixes to HTTP statuses", () => {
    expect(mapErrorCodeToStatus("VALIDATION_MALFORMED_REPORT")).toBe(400);
    expect(mapErrorCodeToStatus("NOT_FOUND_DEVICE")).toBe(404);
    expect(mapErrorCodeToStatus("STORAGE_UNAVAILABLE")).toBe(503);
    expect(mapErrorCodeToStatus("CONFIG_INVALID")).toBe(500);
    expect(mapErrorCodeToStatus("SOMETHING_ELSE")).toBe(500);
  });
});

describe("errorHandler", () => {
  let server: Server;
  let baseUrl: string;

  beforeAll(async () => {
    const app = express();
    app.get("/malformed", () => {
      throw new MalformedReportError("Malformed heartbeat report: device_id is required");
    });
    app.get("/missing", () => {
      throw new DeviceNotFoundError("dev-9");
    });
    app.get("/down", () => {
      throw new StoreUnavailableError("Device store is unavailable", { operation: "listAll" });
    });
    app.get("/config", () => {
      throw new ConfigError("bad setting", "CONFIG_INVALID");
    });
    app.get("/zod", () => {
      z.object({ limit: z.number() }).parse({ limit: "x" });
    });
    app.get("/boom", () => {
      throw new Error("unexpected");
    });
    app.use(errorHandler);

    await new Promise<void>((resolve) => {
      server = app.listen(0, () => {
        const addr = server.address();
        if (addr && typeof addr === "object") {
          baseUrl = `http://127.0.0.1:${addr.port}`;
        }
        resolve();
      });
    });
  });

  afterAll(async () => {
    await new Promise<void>((resolve) => {
      server.close(() => resolve());
    });
  });

  async function get(path: string): Promise<{ status: number; body: unknown }> {
    const res = await fetch(`${baseUrl}${path}`);
    return { status: res.status, body: await res.json() };
  }

  test("MalformedReportError → 400 with code", async () => {
    expect(await get("/malformed")).toEqual({
      status: 400,
      body: {
        status: "error",
        error: "Malformed heartbeat report: device_id is required",
        code: "VALIDATION_MALFORMED_REPORT",
      },
    });
  });

  test("DeviceNotFoundError → 404", async () => {
    expect(await get("/missing")).toEqual({
      status: 404,
      body: { status: "error", error: "Device not found: dev-9", code: "NOT_FOUND_DEVICE" },
    });
  });

  test("StoreUnavailableError → 503 without its context", async () => {
    expect(await get("/down")).toEqual({
      status: 503,
      body: { status: "error", error: "Device store is unavailable", code: "STORAGE_UNAVAILABLE" },
    });
  });

  test("ConfigError → 500", async () => {
    const { status } = await get("/config");
    expect(status).toBe(500);
  });

  test("ZodError → 400 with details", async () => {
    const { status, body } = await get("/zod");

    expect(status).toBe(400);
    expect(body).toMatchObject({
      status: "error",
      error: "Validation failed",
      details: [{ path: ["limit"] }],
    });
  });

  test("unknown errors → 500 Internal server error", async () => {
    const { status, body } = await get("/boom");

    expect(status).toBe(500);
    expect(body).toMatchObject({ status: "error", error: "Internal server error" });
  });
});

describe("loggableHeaders", () => {
  test("drops credentials and clips long values", () => {
    const req = {
      headers: {
        "user-agent": "relay-client/1.3",
        authorization: "Bearer test-secret",
        cookie: "session=test",
        "x-long": "v".repeat(300),
        accept: undefined,
      },
    } satisfies Pick<Request, "headers">;

    const headers = loggableHeaders(req);

    expect(headers).toEqual({
      "user-agent": "relay-client/1.3",
      "x-long": "v".repeat(200),
    });
  });
});
