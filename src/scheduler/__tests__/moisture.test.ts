/**
 * Moisture Skip Evaluator Tests
 */
import type Database from "better-sqlite3";
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

import type { Schedule, Store } from "../../store/index.js";
import { createMemoryStore } from "../../store/testing.js";
import { evaluateMoistureGate, shouldSkipForMoisture } from "../moisture.js";

const NOW = new Date("2026-03-02T19:30:05.000Z");

const schedule = (skipIfMoistureOver: number | null): Schedule => ({
  id: 1,
  zoneId: 1,
  startTime: "06:30",
  durationMinutes: 15,
  enabled: true,
  daysOfWeek: "*",
  skipIfMoistureOver,
  moistureLookbackMinutes: 120,
  lastRunMinute: null,
  lastRunDate: null,
});

let db: Database.Database;
let store: Store;

beforeEach(() => {
  ({ db, store } = createMemoryStore());
});

afterEach(() => {
  db.close();
});

function seedMoisture(value: number, ts: string) {
  store.insertReading({ zoneName: "veggie-bed", metric: "moisture", value, ts })._unsafeUnwrap();
}

describe("shouldSkipForMoisture", () => {
  it("skips when the latest reading in the window is at the threshold", () => {
    seedMoisture(20, "2026-03-02T18:00:00.000Z");
    seedMoisture(40, "2026-03-02T19:00:00.000Z");

    expect(
      shouldSkipForMoisture(store, schedule(40), "veggie-bed", NOW, "moisture")._unsafeUnwrap(),
    ).toBe(true);
  });

  it("runs when the latest reading is below the threshold", () => {
    seedMoisture(55, "2026-03-02T18:00:00.000Z");
    seedMoisture(35, "2026-03-02T19:00:00.000Z");

    expect(
      shouldSkipForMoisture(store, schedule(40), "veggie-bed", NOW, "moisture")._unsafeUnwrap(),
    ).toBe(false);
  });

  it("runs when there is no reading in the window", () => {
    seedMoisture(90, "2026-03-02T17:00:00.000Z");

    expect(
      shouldSkipForMoisture(store, schedule(40), "veggie-bed", NOW, "moisture")._unsafeUnwrap(),
    ).toBe(false);
  });

  it("passes a store failure through", () => {
    db.close();

    expect(
      shouldSkipForMoisture(store, schedule(40), "veggie-bed", NOW, "moisture")._unsafeUnwrapErr()
        .type,
    ).toBe("PERSISTENCE_FAILED");
  });
});

describe("evaluateMoistureGate", () => {
  it("does not read the store when the schedule has no threshold", () => {
    const latestSensorReading = vi.fn(store.latestSensorReading);
    const watched: Store = { ...store, latestSensorReading };

    const decision = evaluateMoistureGate(watched, schedule(null), "veggie-bed", NOW, "moisture");

    expect(decision._unsafeUnwrap()).toEqual({ skip: false, reason: "no_gate" });
    expect(latestSensorReading).not.toHaveBeenCalled();
  });

  it("reads from the start of the lookback window", () => {
    const latestSensorReading = vi.fn(store.latestSensorReading);
    const watched: Store = { ...store, latestSensorReading };

    evaluateMoistureGate(watched, schedule(40), "veggie-bed", NOW, "soil_vwc");

    expect(latestSensorReading).toHaveBeenCalledWith(
      "veggie-bed",
      "soil_vwc",
      "2026-03-02T17:30:05.000Z",
    );
  });
});
