/**
 * Store Module - Pure Transformations
 *
 * Row-to-entity mapping. Rows come back from the driver untyped; each one
 * is validated against its row schema before it becomes a domain value,
 * so a drifted table fails loudly instead of leaking odd shapes.
 */
import {
  type IrrigationRun,
  IrrigationRunRowSchema,
  type Schedule,
  type SchedulePatch,
  ScheduleRowSchema,
  type SensorReading,
  SensorReadingRowSchema,
  type Zone,
  ZoneRowSchema,
} from "./schema.js";

export function toZone(row: unknown): Zone {
  return ZoneRowSchema.parse(row);
}

export function toSchedule(row: unknown): Schedule {
  const r = ScheduleRowSchema.parse(row);
  return {
    id: r.id,
    zoneId: r.zone_id,
    startTime: r.start_time,
    durationMinutes: r.duration_minutes,
    enabled: r.enabled === 1,
    daysOfWeek: r.days_of_week,
    skipIfMoistureOver: r.skip_if_moisture_over,
    moistureLookbackMinutes: r.moisture_lookback_minutes,
    lastRunMinute: r.last_run_minute,
    lastRunDate: r.last_run_date,
  };
}

export function toSensorReading(row: unknown): SensorReading {
  const r = SensorReadingRowSchema.parse(row);
  return {
    id: r.id,
    zoneName: r.zone_name,
    metric: r.metric,
    value: r.value,
    ts: r.ts,
  };
}

export function toIrrigationRun(row: unknown): IrrigationRun {
  const r = IrrigationRunRowSchema.parse(row);
  return {
    id: r.id,
    zoneName: r.zone_name,
    durationMinutes: r.duration_minutes,
    source: r.source,
    ts: r.ts,
  };
}

/**
 * Column assignments for a schedule patch, in a fixed order.
 * Only keys present in the patch produce an assignment.
 */
export function schedulePatchColumns(
  patch: SchedulePatch,
): ReadonlyArray<readonly [column: string, value: string | number | null]> {
  const columns: Array<readonly [string, string | number | null]> = [];

  if (patch.startTime !== undefined) {
    columns.push(["start_time", patch.startTime]);
  }
  if (patch.durationMinutes !== undefined) {
    columns.push(["duration_minutes", patch.durationMinutes]);
  }
  if (patch.enabled !== undefined) {
    columns.push(["enabled", patch.enabled ? 1 : 0]);
  }
  if (patch.daysOfWeek !== undefined) {
    columns.push(["days_of_week", patch.daysOfWeek]);
  }
  if (patch.skipIfMoistureOver !== undefined) {
    columns.push(["skip_if_moisture_over", patch.skipIfMoistureOver]);
  }
  if (patch.moistureLookbackMinutes !== undefined) {
    columns.push(["moisture_lookback_minutes", patch.moistureLookbackMinutes]);
  }

  return columns;
}
