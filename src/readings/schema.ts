/**
 * Readings Module - Schemas and Types
 *
 * Sensor readings are append-only facts posted by field devices.
 */
import { z } from "zod";

export const ReadingCreateSchema = z.object({
  zone_name: z
    .string()
    .trim()
    .min(1, "zone_name is required")
    .describe("Zone the sensor sits in (by name)"),
  metric: z
    .string()
    .trim()
    .min(1, "metric is required")
    .max(64)
    .describe('Metric name, e.g. "moisture"'),
  value: z.number().finite().describe("Measured value"),
  ts: z
    .string()
    .datetime({ offset: true })
    .optional()
    .describe("When the reading was taken; defaults to receipt time"),
});

export type ReadingCreate = z.infer<typeof ReadingCreateSchema>;

export const ReadingsQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(1000).default(50),
});

export const ReadingOutSchema = z.object({
  id: z.number().int(),
  zone_name: z.string(),
  metric: z.string(),
  value: z.number(),
  ts: z.string(),
});

export type ReadingOut = z.infer<typeof ReadingOutSchema>;
