/**
 * Schedules Module - Public API
 */
export type { ScheduleError } from "./errors.js";
export type { ScheduleCreate, ScheduleOut, ScheduleUpdate } from "./schema.js";
export type { Weekday } from "./transform.js";

export { formatScheduleError } from "./errors.js";
export {
  DEFAULT_MOISTURE_LOOKBACK_MINUTES,
  ScheduleCreateSchema,
  ScheduleUpdateSchema,
} from "./schema.js";
export {
  createSchedule,
  deleteSchedule,
  getSchedule,
  listSchedules,
  updateSchedule,
} from "./service.js";
export {
  expandDaysOfWeek,
  normalizeDaysOfWeek,
  START_TIME_PATTERN,
  toScheduleOut,
  WEEKDAYS,
} from "./transform.js";
