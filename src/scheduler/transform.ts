/**
 * Scheduler Module - Pure Transformations
 *
 * Minute/day matching, the trigger-marker guard and the moisture decision.
 * No side effects, no I/O - just data in, data out.
 */
import { DateTime } from "luxon";

import { WEEKDAYS, expandDaysOfWeek } from "../schedules/index.js";
import type { Schedule, SensorReading, TriggerMarker } from "../store/index.js";
import type {
  LocalTime,
  MoistureDecision,
  TickOutcome,
  TickStatus,
  WallClock,
} from "./schema.js";

const WALL_CLOCK_FORMAT = "yyyy-MM-dd HH:mm:ss";

// =============================================================================
// Day/Time Matcher
// =============================================================================

/**
 * Resolve an instant to local minute and weekday in `timezone`.
 */
export function toLocalTime(now: Date, timezone: string): LocalTime {
  const local = DateTime.fromJSDate(now, { zone: timezone });
  return {
    date: local.toFormat("yyyy-MM-dd"),
    minute: local.toFormat("HH:mm"),
    // luxon weekdays run 1 (Monday) to 7 (Sunday)
    weekday: WEEKDAYS[local.weekday - 1],
    iso: local.toISO() ?? now.toISOString(),
  };
}

export function describeNow(now: Date, timezone: string): WallClock {
  const local = DateTime.fromJSDate(now, { zone: timezone });
  return {
    timezone,
    local: local.toFormat(WALL_CLOCK_FORMAT),
    utc: DateTime.fromJSDate(now, { zone: "utc" }).toFormat(WALL_CLOCK_FORMAT),
    weekday: WEEKDAYS[local.weekday - 1],
    minute: local.toFormat("HH:mm"),
  };
}

/**
 * True when the schedule's start minute is exactly the current local
 * minute and today is one of its days. Minutes that were missed are not
 * caught up later.
 */
export function matchesTrigger(schedule: Schedule, local: LocalTime): boolean {
  if (schedule.startTime !== local.minute) {
    return false;
  }
  return expandDaysOfWeek(schedule.daysOfWeek).includes(local.weekday);
}

// =============================================================================
// Duplicate-Run Guard
// =============================================================================

/**
 * True when this schedule already ran, or was skipped for moisture, in
 * this local minute of this local day.
 */
export function isAlreadyHandled(schedule: Schedule, local: LocalTime): boolean {
  return schedule.lastRunMinute === local.minute && schedule.lastRunDate === local.date;
}

/**
 * Marker recording that `local` has been handled.
 */
export function triggerMarkerFor(local: LocalTime): TriggerMarker {
  return { date: local.date, minute: local.minute };
}

// =============================================================================
// Moisture Gate
// =============================================================================

/**
 * Oldest reading timestamp (UTC ISO) that still counts for the gate.
 */
export function moistureLookbackStart(now: Date, lookbackMinutes: number): string {
  return new Date(now.getTime() - lookbackMinutes * 60_000).toISOString();
}

/**
 * Decide the gate from the latest in-window reading.
 * No reading means irrigate: missing sensors must not starve the plants.
 */
export function decideMoisture(
  threshold: number | null,
  reading: SensorReading | null,
): MoistureDecision {
  if (threshold === null) {
    return { skip: false, reason: "no_gate" };
  }
  if (reading === null) {
    return { skip: false, reason: "no_reading", threshold };
  }
  if (reading.value >= threshold) {
    return { skip: true, reason: "at_or_above_threshold", threshold, reading: reading.value };
  }
  return { skip: false, reason: "below_threshold", threshold, reading: reading.value };
}

// =============================================================================
// Reporting
// =============================================================================

/**
 * Count outcomes by status, for the tick summary log line.
 */
export function summarizeOutcomes(
  outcomes: ReadonlyArray<TickOutcome>,
): Record<TickStatus, number> {
  const summary: Record<TickStatus, number> = {
    not_due: 0,
    already_handled: 0,
    zone_missing: 0,
    skipped_moisture: 0,
    ran: 0,
    failed: 0,
  };
  for (const outcome of outcomes) {
    summary[outcome.status] += 1;
  }
  return summary;
}
