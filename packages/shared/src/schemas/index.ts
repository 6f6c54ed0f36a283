/**
 * Barrel re-export for all Zod schemas.
 */
export * from "./report.js";
export * from "./device-query.js";
