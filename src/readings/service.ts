/**
 * Readings Module - Service Layer
 */
import { type Result, err } from "neverthrow";

import { createLogger } from "../logger.js";
import type { SensorReading, Store } from "../store/index.js";
import { type ReadingError, storeFailed, validationError } from "./errors.js";
import { ReadingCreateSchema, type ReadingOut, ReadingsQuerySchema } from "./schema.js";

const log = createLogger("readings");

/**
 * Append a sensor reading. Timestamps are stored in UTC.
 */
export function addReading(
  store: Store,
  rawInput: unknown,
  requestId: string,
  now: Date,
): Result<SensorReading, ReadingError> {
  const parsed = ReadingCreateSchema.safeParse(rawInput);
  if (!parsed.success) {
    log.warn(
      { operation: "addReading", requestId, issues: parsed.error.issues },
      "  ↳ Validation failed",
    );
    return err(validationError(parsed.error.issues));
  }

  const { zone_name, metric, value, ts } = parsed.data;
  const takenAt = ts === undefined ? now : new Date(ts);

  return store
    .insertReading({ zoneName: zone_name, metric, value, ts: takenAt.toISOString() })
    .mapErr(storeFailed)
    .map((reading) => {
      log.debug({ requestId, zone: zone_name, metric, value }, "Reading stored");
      return reading;
    });
}

/**
 * Newest readings first.
 */
export function listReadings(
  store: Store,
  rawQuery: unknown,
): Result<SensorReading[], ReadingError> {
  const query = ReadingsQuerySchema.safeParse(rawQuery);
  if (!query.success) {
    return err(validationError(query.error.issues));
  }

  return store.listReadings(query.data.limit).mapErr(storeFailed);
}

export const toReadingOut = (reading: SensorReading): ReadingOut => ({
  id: reading.id,
  zone_name: reading.zoneName,
  metric: reading.metric,
  value: reading.value,
  ts: reading.ts,
});
