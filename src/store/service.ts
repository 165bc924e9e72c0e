/**
 * Store Module - Service Layer
 *
 * SQLite-backed data store for zones, schedules, sensor readings and runs.
 * better-sqlite3 is synchronous, so every operation completes (or fails)
 * before it returns, and writes from the API and the scheduler are
 * serialized by the single connection.
 *
 * Uses Result types for explicit error handling.
 */
import type Database from "better-sqlite3";
import { type Result, err, ok } from "neverthrow";

import { createLogger } from "../logger.js";
import { type StoreError, fromDriverError } from "./errors.js";
import type {
  IrrigationRun,
  NewReading,
  NewRun,
  NewSchedule,
  NewZone,
  RunQuery,
  Schedule,
  SchedulePatch,
  SensorReading,
  TriggerMarker,
  Zone,
} from "./schema.js";
import {
  schedulePatchColumns,
  toIrrigationRun,
  toSchedule,
  toSensorReading,
  toZone,
} from "./transform.js";

const log = createLogger("store");

/**
 * Read/write contract of the data store.
 * Lookups that find nothing return ok(null) rather than an error.
 */
export interface Store {
  /** Cheap round trip used by the health check. */
  ping(): Result<true, StoreError>;

  /**
   * Run `work` atomically. An err result or a thrown driver error rolls
   * back every write made inside it.
   */
  transaction<T>(work: () => Result<T, StoreError>): Result<T, StoreError>;

  // Zones
  insertZone(zone: NewZone): Result<Zone, StoreError>;
  listZones(): Result<Zone[], StoreError>;
  getZone(id: number): Result<Zone | null, StoreError>;
  findZoneByName(name: string): Result<Zone | null, StoreError>;
  deleteZone(id: number): Result<boolean, StoreError>;

  // Schedules
  insertSchedule(schedule: NewSchedule): Result<Schedule, StoreError>;
  listSchedules(): Result<Schedule[], StoreError>;
  listEnabledSchedules(): Result<Schedule[], StoreError>;
  findScheduleById(id: number): Result<Schedule | null, StoreError>;
  updateSchedule(
    id: number,
    patch: SchedulePatch,
  ): Result<Schedule | null, StoreError>;
  updateScheduleTriggerMarker(
    scheduleId: number,
    marker: TriggerMarker,
  ): Result<boolean, StoreError>;
  deleteSchedule(id: number): Result<boolean, StoreError>;

  // Sensor readings
  insertReading(reading: NewReading): Result<SensorReading, StoreError>;
  listReadings(limit: number): Result<SensorReading[], StoreError>;
  latestSensorReading(
    zoneName: string,
    metric: string,
    sinceUtc: string,
  ): Result<SensorReading | null, StoreError>;

  // Runs
  insertRun(run: NewRun): Result<IrrigationRun, StoreError>;
  listRuns(query: RunQuery): Result<IrrigationRun[], StoreError>;
}

/**
 * Carries an err result out of a better-sqlite3 transaction callback,
 * which only rolls back when the callback throws.
 */
class RollbackSignal extends Error {
  constructor(readonly storeError: StoreError) {
    super(`Transaction rolled back: ${storeError.type}`);
    this.name = "RollbackSignal";
  }
}

/**
 * Run a driver call, turning anything it throws into a StoreError.
 */
function attempt<T>(operation: string, fn: () => T): Result<T, StoreError> {
  try {
    return ok(fn());
  } catch (error) {
    const storeError = fromDriverError(operation, error);
    log.error({ operation, error: storeError.message }, "Store operation failed");
    return err(storeError);
  }
}

/**
 * Create a store bound to an open, migrated database.
 */
export function createStore(db: Database.Database): Store {
  return {
    ping() {
      return attempt("ping", () => {
        db.prepare("SELECT 1").get();
        return true as const;
      });
    },

    transaction<T>(work: () => Result<T, StoreError>): Result<T, StoreError> {
      try {
        const value = db.transaction(() => {
          const result = work();
          if (result.isErr()) {
            throw new RollbackSignal(result.error);
          }
          return result.value;
        })();
        return ok(value);
      } catch (error) {
        if (error instanceof RollbackSignal) {
          log.warn({ error: error.storeError.type }, "Transaction rolled back");
          return err(error.storeError);
        }
        return err(fromDriverError("transaction", error));
      }
    },

    // =========================================================================
    // Zones
    // =========================================================================

    insertZone(zone) {
      return attempt("insertZone", () => {
        const info = db
          .prepare("INSERT INTO zones (name, description) VALUES (?, ?)")
          .run(zone.name, zone.description);
        return toZone(
          db.prepare("SELECT * FROM zones WHERE id = ?").get(info.lastInsertRowid),
        );
      });
    },

    listZones() {
      return attempt("listZones", () =>
        db.prepare("SELECT * FROM zones ORDER BY id").all().map(toZone),
      );
    },

    getZone(id) {
      return attempt("getZone", () => {
        const row = db.prepare("SELECT * FROM zones WHERE id = ?").get(id);
        return row === undefined ? null : toZone(row);
      });
    },

    findZoneByName(name) {
      return attempt("findZoneByName", () => {
        const row = db.prepare("SELECT * FROM zones WHERE name = ?").get(name);
        return row === undefined ? null : toZone(row);
      });
    },

    deleteZone(id) {
      return attempt("deleteZone", () => {
        const info = db.prepare("DELETE FROM zones WHERE id = ?").run(id);
        return info.changes > 0;
      });
    },

    // =========================================================================
    // Schedules
    // =========================================================================

    insertSchedule(schedule) {
      return attempt("insertSchedule", () => {
        const info = db
          .prepare(
            `INSERT INTO schedules (
               zone_id, start_time, duration_minutes, enabled, days_of_week,
               skip_if_moisture_over, moisture_lookback_minutes
             ) VALUES (?, ?, ?, ?, ?, ?, ?)`,
          )
          .run(
            schedule.zoneId,
            schedule.startTime,
            schedule.durationMinutes,
            schedule.enabled ? 1 : 0,
            schedule.daysOfWeek,
            schedule.skipIfMoistureOver,
            schedule.moistureLookbackMinutes,
          );
        return toSchedule(
          db
            .prepare("SELECT * FROM schedules WHERE id = ?")
            .get(info.lastInsertRowid),
        );
      });
    },

    listSchedules() {
      return attempt("listSchedules", () =>
        db.prepare("SELECT * FROM schedules ORDER BY id").all().map(toSchedule),
      );
    },

    listEnabledSchedules() {
      return attempt("listEnabledSchedules", () =>
        db
          .prepare("SELECT * FROM schedules WHERE enabled = 1 ORDER BY id")
          .all()
          .map(toSchedule),
      );
    },

    findScheduleById(id) {
      return attempt("findScheduleById", () => {
        const row = db.prepare("SELECT * FROM schedules WHERE id = ?").get(id);
        return row === undefined ? null : toSchedule(row);
      });
    },

    updateSchedule(id, patch) {
      return attempt("updateSchedule", () => {
        const columns = schedulePatchColumns(patch);
        if (columns.length > 0) {
          const assignments = columns.map(([column]) => `${column} = ?`).join(", ");
          db.prepare(`UPDATE schedules SET ${assignments} WHERE id = ?`).run(
            ...columns.map(([, value]) => value),
            id,
          );
        }
        const row = db.prepare("SELECT * FROM schedules WHERE id = ?").get(id);
        return row === undefined ? null : toSchedule(row);
      });
    },

    updateScheduleTriggerMarker(scheduleId, marker) {
      return attempt("updateScheduleTriggerMarker", () => {
        const info = db
          .prepare(
            "UPDATE schedules SET last_run_minute = ?, last_run_date = ? WHERE id = ?",
          )
          .run(marker.minute, marker.date, scheduleId);
        return info.changes > 0;
      });
    },

    deleteSchedule(id) {
      return attempt("deleteSchedule", () => {
        const info = db.prepare("DELETE FROM schedules WHERE id = ?").run(id);
        return info.changes > 0;
      });
    },

    // =========================================================================
    // Sensor Readings
    // =========================================================================

    insertReading(reading) {
      return attempt("insertReading", () => {
        const info = db
          .prepare(
            "INSERT INTO sensor_readings (zone_name, metric, value, ts) VALUES (?, ?, ?, ?)",
          )
          .run(reading.zoneName, reading.metric, reading.value, reading.ts);
        return toSensorReading(
          db
            .prepare("SELECT * FROM sensor_readings WHERE id = ?")
            .get(info.lastInsertRowid),
        );
      });
    },

    listReadings(limit) {
      return attempt("listReadings", () =>
        db
          .prepare("SELECT * FROM sensor_readings ORDER BY ts DESC, id DESC LIMIT ?")
          .all(limit)
          .map(toSensorReading),
      );
    },

    latestSensorReading(zoneName, metric, sinceUtc) {
      return attempt("latestSensorReading", () => {
        const row = db
          .prepare(
            `SELECT * FROM sensor_readings
             WHERE zone_name = ? AND metric = ? AND ts >= ?
             ORDER BY ts DESC, id DESC
             LIMIT 1`,
          )
          .get(zoneName, metric, sinceUtc);
        return row === undefined ? null : toSensorReading(row);
      });
    },

    // =========================================================================
    // Runs
    // =========================================================================

    insertRun(run) {
      return attempt("insertRun", () => {
        const info = db
          .prepare(
            "INSERT INTO irrigation_runs (zone_name, duration_minutes, source, ts) VALUES (?, ?, ?, ?)",
          )
          .run(run.zoneName, run.durationMinutes, run.source, run.ts);
        return toIrrigationRun(
          db
            .prepare("SELECT * FROM irrigation_runs WHERE id = ?")
            .get(info.lastInsertRowid),
        );
      });
    },

    listRuns(query) {
      return attempt("listRuns", () => {
        const rows =
          query.zoneName === undefined
            ? db
                .prepare(
                  "SELECT * FROM irrigation_runs ORDER BY ts DESC, id DESC LIMIT ?",
                )
                .all(query.limit)
            : db
                .prepare(
                  "SELECT * FROM irrigation_runs WHERE zone_name = ? ORDER BY ts DESC, id DESC LIMIT ?",
                )
                .all(query.zoneName, query.limit);
        return rows.map(toIrrigationRun);
      });
    },
  };
}
