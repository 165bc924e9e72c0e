/**
 * Schedules Module - Schemas and Types
 *
 * Request and response shapes for schedules. Validation happens here, at
 * the boundary; the scheduler only ever sees well-formed schedules.
 */
import { z } from "zod";

import { durationLimits } from "../config.js";
import { ALL_DAYS } from "../store/index.js";
import { START_TIME_PATTERN, normalizeDaysOfWeek } from "./transform.js";

export const DEFAULT_MOISTURE_LOOKBACK_MINUTES = 120;
export const MAX_MOISTURE_LOOKBACK_MINUTES = 1440;

// =============================================================================
// Field Schemas
// =============================================================================

const startTime = z
  .string()
  .regex(START_TIME_PATTERN, "start_time must be HH:MM between 00:00 and 23:59")
  .describe("Local minute of day the schedule fires at");

const durationMinutes = z
  .number()
  .int()
  .min(1)
  .max(durationLimits.maxMinutes)
  .describe("Run length in minutes");

const daysOfWeek = z
  .union([z.string(), z.array(z.string())])
  .transform((val, ctx) => {
    const normalized = normalizeDaysOfWeek(val);
    if (normalized.isErr()) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: normalized.error });
      return z.NEVER;
    }
    return normalized.value;
  })
  .describe('"*" for every day, or weekdays such as "mon,wed,fri"');

const skipIfMoistureOver = z
  .number()
  .min(0)
  .max(100)
  .nullable()
  .describe("Skip when the latest moisture reading is at or above this value");

const moistureLookbackMinutes = z
  .number()
  .int()
  .min(1)
  .max(MAX_MOISTURE_LOOKBACK_MINUTES)
  .describe("How far back a moisture reading still counts");

// =============================================================================
// Requests
// =============================================================================

export const ScheduleCreateSchema = z.object({
  zone_id: z.number().int().positive(),
  start_time: startTime,
  duration_minutes: durationMinutes,
  enabled: z.boolean().default(true),
  days_of_week: daysOfWeek.default(ALL_DAYS),
  skip_if_moisture_over: skipIfMoistureOver.optional().transform((val) => val ?? null),
  moisture_lookback_minutes: moistureLookbackMinutes.default(
    DEFAULT_MOISTURE_LOOKBACK_MINUTES,
  ),
});

export type ScheduleCreate = z.infer<typeof ScheduleCreateSchema>;

export const ScheduleUpdateSchema = z
  .object({
    start_time: startTime,
    duration_minutes: durationMinutes,
    enabled: z.boolean(),
    days_of_week: daysOfWeek,
    skip_if_moisture_over: skipIfMoistureOver,
    moisture_lookback_minutes: moistureLookbackMinutes,
  })
  .partial()
  .strict()
  .refine((patch) => Object.keys(patch).length > 0, {
    message: "At least one field must be provided",
  });

export type ScheduleUpdate = z.infer<typeof ScheduleUpdateSchema>;

// =============================================================================
// Response
// =============================================================================

export const ScheduleOutSchema = z.object({
  id: z.number().int(),
  zone_id: z.number().int(),
  start_time: z.string(),
  duration_minutes: z.number().int(),
  enabled: z.boolean(),
  days_of_week: z.string(),
  skip_if_moisture_over: z.number().nullable(),
  moisture_lookback_minutes: z.number().int(),
  last_run_minute: z.string().nullable(),
  last_run_date: z.string().nullable(),
});

export type ScheduleOut = z.infer<typeof ScheduleOutSchema>;
