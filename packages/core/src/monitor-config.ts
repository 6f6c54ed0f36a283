/**
 * Runtime settings for the presence engine.
 *
 * Passed explicitly into every core operation so tests can inject any
 * timeout and clock. Loading and validating these values from the
 * environment is the server's job.
 */

/** Source of "now". Always the server's clock, never the client's. */
export type Clock = () => Date;

/** Wall-clock time */
export const systemClock: Clock = () => new Date();

export interface MonitorConfig {
  /** A device is online while now - last_seen_at <= this many seconds */
  offlineTimeoutSeconds: number;
  /** Upper bound on the health probe's store read */
  healthCheckTimeoutMs: number;
}

/** Defaults used by the relay monitor this engine replaces */
export const DEFAULT_MONITOR_CONFIG: MonitorConfig = {
  offlineTimeoutSeconds: 90,
  healthCheckTimeoutMs: 5_000,
};
