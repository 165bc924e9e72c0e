/**
 * Store Module - Database lifecycle and schema
 *
 * Opens the SQLite database and brings the schema up to date. Both steps
 * report failure as STARTUP_FAILED so the caller can keep the HTTP surface
 * up while refusing to start the scheduler.
 */
import fs from "node:fs";
import path from "node:path";
import Database from "better-sqlite3";
import { type Result, err, ok } from "neverthrow";
import { z } from "zod";

import { createLogger } from "../logger.js";
import { type StoreError, startupFailed } from "./errors.js";

const log = createLogger("store");

export const SCHEMA_VERSION = 1;

const SCHEMA_V1 = `
  CREATE TABLE IF NOT EXISTS zones (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    name TEXT NOT NULL UNIQUE,
    description TEXT NOT NULL DEFAULT ''
  );

  CREATE TABLE IF NOT EXISTS schedules (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    zone_id INTEGER NOT NULL REFERENCES zones(id) ON DELETE CASCADE,
    start_time TEXT NOT NULL,
    duration_minutes INTEGER NOT NULL,
    enabled INTEGER NOT NULL DEFAULT 1,
    days_of_week TEXT NOT NULL DEFAULT '*',
    skip_if_moisture_over REAL,
    moisture_lookback_minutes INTEGER NOT NULL DEFAULT 120,
    last_run_minute TEXT,
    last_run_date TEXT
  );

  CREATE TABLE IF NOT EXISTS sensor_readings (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    zone_name TEXT NOT NULL,
    metric TEXT NOT NULL,
    value REAL NOT NULL,
    ts TEXT NOT NULL
  );

  CREATE TABLE IF NOT EXISTS irrigation_runs (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    zone_name TEXT NOT NULL,
    duration_minutes INTEGER NOT NULL,
    source TEXT NOT NULL,
    ts TEXT NOT NULL
  );

  CREATE INDEX IF NOT EXISTS idx_schedules_zone ON schedules(zone_id);
  CREATE INDEX IF NOT EXISTS idx_schedules_enabled ON schedules(enabled);
  CREATE INDEX IF NOT EXISTS idx_sensor_readings_lookup ON sensor_readings(zone_name, metric, ts);
  CREATE INDEX IF NOT EXISTS idx_sensor_readings_ts ON sensor_readings(ts);
  CREATE INDEX IF NOT EXISTS idx_irrigation_runs_zone ON irrigation_runs(zone_name, ts);
  CREATE INDEX IF NOT EXISTS idx_irrigation_runs_source ON irrigation_runs(source);
  CREATE INDEX IF NOT EXISTS idx_irrigation_runs_ts ON irrigation_runs(ts);
`;

/**
 * Columns added to `schedules` after its first release. A table created
 * before them is patched in place; CREATE TABLE IF NOT EXISTS leaves it
 * untouched otherwise.
 */
const SCHEDULE_COLUMN_PATCHES: ReadonlyArray<readonly [column: string, ddl: string]> = [
  ["days_of_week", "ALTER TABLE schedules ADD COLUMN days_of_week TEXT NOT NULL DEFAULT '*'"],
  ["skip_if_moisture_over", "ALTER TABLE schedules ADD COLUMN skip_if_moisture_over REAL"],
  [
    "moisture_lookback_minutes",
    "ALTER TABLE schedules ADD COLUMN moisture_lookback_minutes INTEGER NOT NULL DEFAULT 120",
  ],
  ["last_run_minute", "ALTER TABLE schedules ADD COLUMN last_run_minute TEXT"],
  ["last_run_date", "ALTER TABLE schedules ADD COLUMN last_run_date TEXT"],
];

const TableInfoSchema = z.array(z.object({ name: z.string() }));

/**
 * Add whichever patch columns the schedules table lacks. Returns the
 * names it added.
 */
function patchScheduleColumns(db: Database.Database): string[] {
  const present = new Set(
    TableInfoSchema.parse(db.prepare("PRAGMA table_info(schedules)").all()).map(
      (column) => column.name,
    ),
  );

  const added: string[] = [];
  for (const [column, ddl] of SCHEDULE_COLUMN_PATCHES) {
    if (!present.has(column)) {
      db.exec(ddl);
      added.push(column);
    }
  }
  return added;
}

/**
 * Open (or create) the database file. ":memory:" gives a private
 * in-process database.
 */
export function openDatabase(
  dbPath: string,
): Result<Database.Database, StoreError> {
  try {
    if (dbPath !== ":memory:") {
      fs.mkdirSync(path.dirname(path.resolve(dbPath)), { recursive: true });
    }

    const db = new Database(dbPath);
    if (dbPath !== ":memory:") {
      db.pragma("journal_mode = WAL");
    }
    db.pragma("foreign_keys = ON");

    log.info({ dbPath }, "Database opened");
    return ok(db);
  } catch (error) {
    const cause = error instanceof Error ? error : new Error(String(error));
    return err(startupFailed(`Cannot open database at ${dbPath}`, cause));
  }
}

/**
 * Read the schema version recorded in the database header.
 */
export function getSchemaVersion(db: Database.Database): number {
  const version = db.pragma("user_version", { simple: true });
  return typeof version === "number" ? version : 0;
}

/**
 * Create missing tables and indexes, add columns an older schedules table
 * lacks, then stamp the schema version. Idempotent; runs inside one
 * transaction so a failure leaves no partial schema behind.
 */
export function ensureSchema(db: Database.Database): Result<number, StoreError> {
  const current = getSchemaVersion(db);

  if (current > SCHEMA_VERSION) {
    return err(
      startupFailed(
        `Database schema version ${current} is newer than supported version ${SCHEMA_VERSION}`,
      ),
    );
  }

  let patched: string[];
  try {
    patched = db.transaction(() => {
      db.exec(SCHEMA_V1);
      const added = patchScheduleColumns(db);
      db.pragma(`user_version = ${SCHEMA_VERSION}`);
      return added;
    })();
  } catch (error) {
    const cause = error instanceof Error ? error : new Error(String(error));
    return err(startupFailed("Schema migration failed", cause));
  }

  if (patched.length > 0) {
    log.info({ columns: patched }, "Added missing schedules columns");
  }

  if (current !== SCHEMA_VERSION) {
    log.info({ from: current, to: SCHEMA_VERSION }, "Schema migrated");
  } else {
    log.debug({ version: SCHEMA_VERSION }, "Schema up to date");
  }

  return ok(SCHEMA_VERSION);
}
