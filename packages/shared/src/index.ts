/**
 * @relaywatch/shared: the contract layer for the relaywatch monorepo.
 *
 * Every other package imports from here. Contains:
 *   - TypeScript types for devices, normalized reports and API bodies
 *   - Zod validation schemas for every inbound payload
 *   - Structured error hierarchy
 */

// Type definitions for devices and report payloads
export * from "./types/index.js";

// Zod schemas for request validation
export * from "./schemas/index.js";

// Structured error classes
export * from "./errors.js";
