/**
 * Store Module - Schemas and Types
 *
 * Canonical shapes of the four persisted entities and the raw SQLite rows
 * they are read from. Schemas are the source of truth - types derived with
 * z.infer<>.
 */
import { z } from "zod";

// =============================================================================
// Domain Entities
// =============================================================================

/**
 * "*" means every day; otherwise a comma-joined, Monday-first list such
 * as "mon,wed,fri".
 */
export const ALL_DAYS = "*";

export const ZoneSchema = z.object({
  id: z.number().int(),
  name: z.string(),
  description: z.string(),
});

export type Zone = z.infer<typeof ZoneSchema>;

export const ScheduleSchema = z.object({
  id: z.number().int(),
  zoneId: z.number().int(),
  /** Minute of day, "HH:MM" */
  startTime: z.string(),
  durationMinutes: z.number().int(),
  enabled: z.boolean(),
  daysOfWeek: z.string(),
  /** Moisture gate threshold; null disables the gate */
  skipIfMoistureOver: z.number().nullable(),
  moistureLookbackMinutes: z.number().int(),
  /** Trigger marker - the "HH:MM" this schedule was last handled at */
  lastRunMinute: z.string().nullable(),
  /** Local date ("yyyy-MM-dd") of that minute */
  lastRunDate: z.string().nullable(),
});

export type Schedule = z.infer<typeof ScheduleSchema>;

export const SensorReadingSchema = z.object({
  id: z.number().int(),
  zoneName: z.string(),
  metric: z.string(),
  value: z.number(),
  /** UTC ISO-8601 */
  ts: z.string(),
});

export type SensorReading = z.infer<typeof SensorReadingSchema>;

export const IrrigationRunSchema = z.object({
  id: z.number().int(),
  zoneName: z.string(),
  durationMinutes: z.number().int(),
  /** "manual" or "schedule:<id>" */
  source: z.string(),
  /** UTC ISO-8601 */
  ts: z.string(),
});

export type IrrigationRun = z.infer<typeof IrrigationRunSchema>;

// =============================================================================
// Store Inputs
// =============================================================================

export type NewZone = Readonly<{ name: string; description: string }>;

export type NewSchedule = Readonly<{
  zoneId: number;
  startTime: string;
  durationMinutes: number;
  enabled: boolean;
  daysOfWeek: string;
  skipIfMoistureOver: number | null;
  moistureLookbackMinutes: number;
}>;

/**
 * Fields that may be changed after creation. The trigger marker is owned
 * by the scheduler and is not part of this patch.
 */
export type SchedulePatch = Partial<Omit<NewSchedule, "zoneId">>;

export type NewReading = Readonly<{
  zoneName: string;
  metric: string;
  value: number;
  ts: string;
}>;

export type NewRun = Readonly<{
  zoneName: string;
  durationMinutes: number;
  source: string;
  ts: string;
}>;

/**
 * The local minute a schedule was handled at. The date makes a daily
 * schedule due again tomorrow at the same "HH:MM".
 */
export type TriggerMarker = Readonly<{
  date: string;
  minute: string;
}>;

export type RunQuery = Readonly<{
  limit: number;
  zoneName?: string;
}>;

// =============================================================================
// SQLite Rows
// =============================================================================

/**
 * Raw schedules row. SQLite has no boolean type, so `enabled` is 0/1.
 */
export const ScheduleRowSchema = z.object({
  id: z.number().int(),
  zone_id: z.number().int(),
  start_time: z.string(),
  duration_minutes: z.number().int(),
  enabled: z.number().int(),
  days_of_week: z.string(),
  skip_if_moisture_over: z.number().nullable(),
  moisture_lookback_minutes: z.number().int(),
  last_run_minute: z.string().nullable(),
  last_run_date: z.string().nullable(),
});

export const ZoneRowSchema = ZoneSchema;

export const SensorReadingRowSchema = z.object({
  id: z.number().int(),
  zone_name: z.string(),
  metric: z.string(),
  value: z.number(),
  ts: z.string(),
});

export const IrrigationRunRowSchema = z.object({
  id: z.number().int(),
  zone_name: z.string(),
  duration_minutes: z.number().int(),
  source: z.string(),
  ts: z.string(),
});
