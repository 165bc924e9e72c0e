/**
 * Irrigation Module - Schemas and Types
 *
 * Run requests, run sources and the HTTP query shapes for manual runs and
 * run history.
 */
import { z } from "zod";

import { durationLimits } from "../config.js";
import type { TriggerMarker } from "../store/index.js";

// =============================================================================
// Run Source
// =============================================================================

export const MANUAL_SOURCE = "manual";
export const SCHEDULE_SOURCE_PREFIX = "schedule:";

/**
 * Source label of a run the scheduler started. Manual callers may label
 * their runs freely but never with this prefix.
 */
export type ScheduleSource = `${typeof SCHEDULE_SOURCE_PREFIX}${number}`;

// =============================================================================
// Run Request
// =============================================================================

/**
 * Marker to persist together with the run, so a scheduled run and its
 * "handled this minute" record commit or fail as one.
 */
export type TriggerMark = Readonly<{
  scheduleId: number;
  marker: TriggerMarker;
}>;

export type RunRequest = Readonly<{
  zoneName: string;
  /** Requested length; anything but a positive integer falls back */
  minutes: number;
  /** "manual", another caller's label, or a ScheduleSource */
  source: string;
  trigger?: TriggerMark;
}>;

// =============================================================================
// HTTP Queries
// =============================================================================

export const ManualRunQuerySchema = z.object({
  minutes: z.coerce
    .number()
    .int()
    .min(0)
    .max(durationLimits.maxMinutes)
    .default(durationLimits.manualDefaultMinutes)
    .describe("Run length; 0 means the configured fallback"),
  source: z
    .string()
    .trim()
    .min(1)
    .max(64)
    .refine((val) => !val.startsWith(SCHEDULE_SOURCE_PREFIX), {
      message: `source must not start with "${SCHEDULE_SOURCE_PREFIX}"`,
    })
    .default(MANUAL_SOURCE)
    .describe("Who asked for the run; scheduled sources are reserved"),
});

export const RunsQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(1000).default(100),
  zone_name: z.string().trim().min(1).optional(),
});

export const RunOutSchema = z.object({
  id: z.number().int(),
  zone_name: z.string(),
  duration_minutes: z.number().int(),
  source: z.string(),
  ts: z.string(),
});

export type RunOut = z.infer<typeof RunOutSchema>;
