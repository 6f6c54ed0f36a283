/**
 * Barrel re-export for all type definitions.
 */
export * from "./device.js";
export * from "./report.js";
