/**
 * Zones Module - Schemas and Types
 *
 * Request shapes accepted at the HTTP boundary.
 */
import { z } from "zod";

export const ZoneCreateSchema = z.object({
  name: z
    .string()
    .trim()
    .min(1, "Zone name is required")
    .max(100, "Zone name too long")
    .describe("Unique zone name, also used to tag readings and runs"),
  description: z
    .string()
    .max(500, "Description too long")
    .nullish()
    .transform((val) => val ?? "")
    .describe("Free-text description"),
});

export type ZoneCreate = z.infer<typeof ZoneCreateSchema>;

/**
 * Numeric path parameter, e.g. /zones/:id
 */
export const IdParamSchema = z.coerce.number().int().positive();
