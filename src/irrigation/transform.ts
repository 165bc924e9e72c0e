/**
 * Irrigation Module - Pure Transformations
 */
import type { IrrigationRun } from "../store/index.js";
import {
  type RunOut,
  SCHEDULE_SOURCE_PREFIX,
  type ScheduleSource,
} from "./schema.js";

export const scheduleSource = (scheduleId: number): ScheduleSource =>
  `${SCHEDULE_SOURCE_PREFIX}${scheduleId}`;

/**
 * Schedule id of a "schedule:<id>" source, or null for anything else.
 */
export const parseScheduleSource = (source: string): number | null => {
  if (!source.startsWith(SCHEDULE_SOURCE_PREFIX)) {
    return null;
  }
  const id = Number(source.slice(SCHEDULE_SOURCE_PREFIX.length));
  return Number.isInteger(id) && id > 0 ? id : null;
};

/**
 * A run never has a zero or negative length. Requests that are not a
 * positive integer get the fallback instead.
 */
export const resolveRunMinutes = (
  requested: number,
  fallbackMinutes: number,
): Readonly<{ minutes: number; substituted: boolean }> =>
  Number.isInteger(requested) && requested > 0
    ? { minutes: requested, substituted: false }
    : { minutes: fallbackMinutes, substituted: true };

export const toRunOut = (run: IrrigationRun): RunOut => ({
  id: run.id,
  zone_name: run.zoneName,
  duration_minutes: run.durationMinutes,
  source: run.source,
  ts: run.ts,
});
