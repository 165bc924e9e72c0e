/**
 * Scheduler Module - Moisture Skip Evaluator
 *
 * Reads the latest in-window reading for a zone and applies the gate.
 * Schedules without a threshold never touch the store.
 */
import { type Result, ok } from "neverthrow";

import type { Schedule, Store, StoreError } from "../store/index.js";
import type { MoistureDecision } from "./schema.js";
import { decideMoisture, moistureLookbackStart } from "./transform.js";

export function evaluateMoistureGate(
  store: Store,
  schedule: Schedule,
  zoneName: string,
  now: Date,
  metric: string,
): Result<MoistureDecision, StoreError> {
  const threshold = schedule.skipIfMoistureOver;
  if (threshold === null) {
    return ok(decideMoisture(null, null));
  }

  const since = moistureLookbackStart(now, schedule.moistureLookbackMinutes);
  return store
    .latestSensorReading(zoneName, metric, since)
    .map((reading) => decideMoisture(threshold, reading));
}

/**
 * Convenience form of the gate: true when the run should be skipped.
 */
export function shouldSkipForMoisture(
  store: Store,
  schedule: Schedule,
  zoneName: string,
  now: Date,
  metric: string,
): Result<boolean, StoreError> {
  return evaluateMoistureGate(store, schedule, zoneName, now, metric).map(
    (decision) => decision.skip,
  );
}
