/**
 * Health Probe: a bounded read against the Device Store.
 *
 * Never mutates state. The store read is raced against a timeout so a hung
 * connection reports "error" instead of blocking the probe.
 */

import type { DeviceStore } from "./device-store.js";

/** Result of a health probe */
export interface HealthReport {
  status: "ok" | "error";
  /** Round-trip time of the store read */
  latency_ms: number;
  /** Row count, present when the read succeeded */
  device_count?: number;
  /** Underlying cause, present on error */
  detail?: string;
}

export async function probeHealth(
  store: DeviceStore,
  timeoutMs: number,
): Promise<HealthReport> {
  const start = performance.now();
  let timer: NodeJS.Timeout | undefined;

  try {
    const deviceCount = await Promise.race([
      store.countDevices(),
      new Promise<never>((_, reject) => {
        timer = setTimeout(
          () => reject(new Error(`Device store did not answer within ${timeoutMs}ms`)),
          timeoutMs,
        );
      }),
    ]);

    return {
      status: "ok",
      latency_ms: Math.round(performance.now() - start),
      device_count: deviceCount,
    };
  } catch (err) {
    return {
      status: "error",
      latency_ms: Math.round(performance.now() - start),
      detail: err instanceof Error ? err.message : "Unknown health check failure",
    };
  } finally {
    clearTimeout(timer);
  }
}
