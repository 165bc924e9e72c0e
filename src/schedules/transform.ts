/**
 * Schedules Module - Pure Transformations
 *
 * Normalization of the user-facing trigger fields and the API view of a
 * schedule. No side effects, no I/O.
 */
import { type Result, err, ok } from "neverthrow";

import { ALL_DAYS, type Schedule } from "../store/index.js";
import type { ScheduleOut } from "./schema.js";

/**
 * Weekday abbreviations, Monday first (ISO order).
 */
export const WEEKDAYS = ["mon", "tue", "wed", "thu", "fri", "sat", "sun"] as const;

export type Weekday = (typeof WEEKDAYS)[number];

/**
 * 24-hour "HH:MM", 00:00 through 23:59.
 */
export const START_TIME_PATTERN = /^([01]\d|2[0-3]):[0-5]\d$/;

const isWeekday = (value: string): value is Weekday =>
  WEEKDAYS.some((day) => day === value);

/**
 * Normalize a days-of-week value to its stored form.
 *
 * Accepts "*" (or "all"), a comma-separated string, or an array of
 * abbreviations. Returns "*" or a deduplicated, Monday-first list such
 * as "mon,wed,fri".
 */
export const normalizeDaysOfWeek = (
  input: string | ReadonlyArray<string>,
): Result<string, string> => {
  const tokens = (typeof input === "string" ? input.split(",") : input)
    .map((token) => token.trim().toLowerCase())
    .filter((token) => token.length > 0);

  if (tokens.length === 0) {
    return err("days_of_week must not be empty");
  }

  if (tokens.length === 1 && (tokens[0] === ALL_DAYS || tokens[0] === "all")) {
    return ok(ALL_DAYS);
  }

  const unknown = tokens.filter((token) => !isWeekday(token));
  if (unknown.length > 0) {
    return err(`Unknown weekday: ${unknown.join(", ")}`);
  }

  return ok(WEEKDAYS.filter((day) => tokens.includes(day)).join(","));
};

/**
 * Weekdays a stored days-of-week value allows.
 */
export const expandDaysOfWeek = (daysOfWeek: string): ReadonlyArray<Weekday> =>
  daysOfWeek === ALL_DAYS
    ? WEEKDAYS
    : daysOfWeek.split(",").filter(isWeekday);

/**
 * API view of a schedule (snake_case, as clients expect).
 */
export const toScheduleOut = (schedule: Schedule): ScheduleOut => ({
  id: schedule.id,
  zone_id: schedule.zoneId,
  start_time: schedule.startTime,
  duration_minutes: schedule.durationMinutes,
  enabled: schedule.enabled,
  days_of_week: schedule.daysOfWeek,
  skip_if_moisture_over: schedule.skipIfMoistureOver,
  moisture_lookback_minutes: schedule.moistureLookbackMinutes,
  last_run_minute: schedule.lastRunMinute,
  last_run_date: schedule.lastRunDate,
});
