/**
 * Zod validation schema for GET /api/devices query parameters.
 *
 * All fields are optional. `limit` and `offset` are coerced from strings
 * since Express query params are always strings.
 */

import { z } from "zod";
import { DEVICE_STATUSES } from "../types/device.js";

export const deviceListQuerySchema = z.object({
  /** Case-insensitive substring matched against the searchable fields */
  q: z.string().optional(),
  /** Keep only devices with this computed presence */
  status: z.enum(DEVICE_STATUSES).optional(),
  /** Page size (max 500); omitted means every match */
  limit: z.coerce.number().int().min(1).max(500).optional(),
  /** Number of matches to skip */
  offset: z.coerce.number().int().min(0).default(0),
});

/** Inferred type for parsed device list query parameters */
export type DeviceListQuery = z.infer<typeof deviceListQuerySchema>;
