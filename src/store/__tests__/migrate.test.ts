/**
 * Schema Migration Tests
 */
import Database from "better-sqlite3";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

vi.mock("../../logger.js", () => ({
  createLogger: () => ({
    info: vi.fn(),
    debug: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    trace: vi.fn(),
    fatal: vi.fn(),
  }),
}));

import { SCHEMA_VERSION, ensureSchema, getSchemaVersion } from "../migrate.js";
import { createStore } from "../service.js";

// Tables as the first release created them, before the moisture gate and
// the trigger marker existed
const LEGACY_SCHEMA = `
  CREATE TABLE zones (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    name TEXT NOT NULL UNIQUE,
    description TEXT NOT NULL DEFAULT ''
  );
  CREATE TABLE schedules (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    zone_id INTEGER NOT NULL REFERENCES zones(id) ON DELETE CASCADE,
    start_time TEXT NOT NULL,
    duration_minutes INTEGER NOT NULL,
    enabled INTEGER NOT NULL DEFAULT 1
  );
  INSERT INTO zones (name, description) VALUES ('veggie-bed', '');
  INSERT INTO schedules (zone_id, start_time, duration_minutes, enabled) VALUES (1, '06:30', 15, 1);
`;

let db: Database.Database;

beforeEach(() => {
  db = new Database(":memory:");
});

afterEach(() => {
  db.close();
});

describe("ensureSchema", () => {
  it("creates the schema and stamps the version", () => {
    expect(ensureSchema(db)._unsafeUnwrap()).toBe(SCHEMA_VERSION);
    expect(getSchemaVersion(db)).toBe(SCHEMA_VERSION);
  });

  it("is idempotent", () => {
    ensureSchema(db)._unsafeUnwrap();

    expect(ensureSchema(db)._unsafeUnwrap()).toBe(SCHEMA_VERSION);
  });

  it("refuses a schema newer than it knows", () => {
    db.pragma(`user_version = ${SCHEMA_VERSION + 1}`);

    expect(ensureSchema(db)._unsafeUnwrapErr().type).toBe("STARTUP_FAILED");
  });

  describe("with a schedules table from an older release", () => {
    beforeEach(() => {
      db.exec(LEGACY_SCHEMA);
    });

    it("adds the missing columns with their defaults", () => {
      expect(ensureSchema(db).isOk()).toBe(true);

      expect(createStore(db).listEnabledSchedules()._unsafeUnwrap()).toEqual([
        {
          id: 1,
          zoneId: 1,
          startTime: "06:30",
          durationMinutes: 15,
          enabled: true,
          daysOfWeek: "*",
          skipIfMoistureOver: null,
          moistureLookbackMinutes: 120,
          lastRunMinute: null,
          lastRunDate: null,
        },
      ]);
    });

    it("lets the trigger marker be written afterwards", () => {
      ensureSchema(db)._unsafeUnwrap();
      const store = createStore(db);

      store.updateScheduleTriggerMarker(1, { date: "2026-03-03", minute: "06:30" })._unsafeUnwrap();

      expect(store.findScheduleById(1)._unsafeUnwrap()).toMatchObject({
        lastRunMinute: "06:30",
        lastRunDate: "2026-03-03",
      });
    });

    it("leaves a column that already exists untouched", () => {
      db.exec("ALTER TABLE schedules ADD COLUMN days_of_week TEXT NOT NULL DEFAULT 'mon'");

      ensureSchema(db)._unsafeUnwrap();

      expect(createStore(db).findScheduleById(1)._unsafeUnwrap()?.daysOfWeek).toBe("mon");
    });
  });
});
