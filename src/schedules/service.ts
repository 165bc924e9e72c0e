/**
 * Schedules Module - Service Layer
 *
 * CRUD for schedules. The trigger marker is never written here; it belongs
 * to the scheduler.
 */
import { type Result, err, ok } from "neverthrow";

import { createLogger } from "../logger.js";
import type { Schedule, SchedulePatch, Store } from "../store/index.js";
import { IdParamSchema } from "../zones/index.js";
import {
  type ScheduleError,
  scheduleNotFound,
  storeFailed,
  validationError,
  zoneNotFound,
} from "./errors.js";
import {
  ScheduleCreateSchema,
  type ScheduleUpdate,
  ScheduleUpdateSchema,
} from "./schema.js";

const log = createLogger("schedules");

/**
 * Create a schedule for an existing zone.
 */
export function createSchedule(
  store: Store,
  rawInput: unknown,
  requestId: string,
): Result<Schedule, ScheduleError> {
  const parsed = ScheduleCreateSchema.safeParse(rawInput);
  if (!parsed.success) {
    log.warn(
      { operation: "createSchedule", requestId, issues: parsed.error.issues },
      "  ↳ Validation failed",
    );
    return err(validationError(parsed.error.issues));
  }

  const input = parsed.data;

  const zone = store.getZone(input.zone_id);
  if (zone.isErr()) {
    return err(storeFailed(zone.error));
  }
  if (!zone.value) {
    return err(zoneNotFound(input.zone_id));
  }

  const inserted = store.insertSchedule({
    zoneId: input.zone_id,
    startTime: input.start_time,
    durationMinutes: input.duration_minutes,
    enabled: input.enabled,
    daysOfWeek: input.days_of_week,
    skipIfMoistureOver: input.skip_if_moisture_over,
    moistureLookbackMinutes: input.moisture_lookback_minutes,
  });
  if (inserted.isErr()) {
    return err(storeFailed(inserted.error));
  }

  log.info(
    {
      requestId,
      scheduleId: inserted.value.id,
      zone: zone.value.name,
      startTime: inserted.value.startTime,
      daysOfWeek: inserted.value.daysOfWeek,
    },
    "Schedule created",
  );
  return ok(inserted.value);
}

export function listSchedules(store: Store): Result<Schedule[], ScheduleError> {
  return store.listSchedules().mapErr(storeFailed);
}

export function getSchedule(
  store: Store,
  rawId: unknown,
): Result<Schedule, ScheduleError> {
  const id = IdParamSchema.safeParse(rawId);
  if (!id.success) {
    return err(validationError(id.error.issues));
  }

  const scheduleId = id.data;
  return store
    .findScheduleById(scheduleId)
    .mapErr(storeFailed)
    .andThen((schedule) =>
      schedule ? ok(schedule) : err(scheduleNotFound(scheduleId)),
    );
}

/**
 * Map the validated request body onto store columns.
 */
const toPatch = (update: ScheduleUpdate): SchedulePatch => ({
  startTime: update.start_time,
  durationMinutes: update.duration_minutes,
  enabled: update.enabled,
  daysOfWeek: update.days_of_week,
  skipIfMoistureOver: update.skip_if_moisture_over,
  moistureLookbackMinutes: update.moisture_lookback_minutes,
});

/**
 * Partially update a schedule.
 */
export function updateSchedule(
  store: Store,
  rawId: unknown,
  rawInput: unknown,
  requestId: string,
): Result<Schedule, ScheduleError> {
  const id = IdParamSchema.safeParse(rawId);
  if (!id.success) {
    return err(validationError(id.error.issues));
  }

  const parsed = ScheduleUpdateSchema.safeParse(rawInput);
  if (!parsed.success) {
    log.warn(
      { operation: "updateSchedule", requestId, issues: parsed.error.issues },
      "  ↳ Validation failed",
    );
    return err(validationError(parsed.error.issues));
  }

  const updated = store.updateSchedule(id.data, toPatch(parsed.data));
  if (updated.isErr()) {
    return err(storeFailed(updated.error));
  }
  if (!updated.value) {
    return err(scheduleNotFound(id.data));
  }

  log.info(
    { requestId, scheduleId: id.data, fields: Object.keys(parsed.data) },
    "Schedule updated",
  );
  return ok(updated.value);
}

export function deleteSchedule(
  store: Store,
  rawId: unknown,
  requestId: string,
): Result<number, ScheduleError> {
  const id = IdParamSchema.safeParse(rawId);
  if (!id.success) {
    return err(validationError(id.error.issues));
  }

  const deleted = store.deleteSchedule(id.data);
  if (deleted.isErr()) {
    return err(storeFailed(deleted.error));
  }
  if (!deleted.value) {
    return err(scheduleNotFound(id.data));
  }

  log.info({ requestId, scheduleId: id.data }, "Schedule deleted");
  return ok(id.data);
}
