/**
 * Readings Service Tests
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

import type { Store } from "../../store/index.js";
import { createMemoryStore } from "../../store/testing.js";
import { addReading, listReadings, toReadingOut } from "../service.js";

const requestId = "test-request-id";
const NOW = new Date("2026-03-02T19:30:05.000Z");

let db: Database.Database;
let store: Store;

beforeEach(() => {
  ({ db, store } = createMemoryStore());
});

afterEach(() => {
  db.close();
});

describe("addReading", () => {
  it("stamps a reading with the receipt time when ts is missing", () => {
    const reading = addReading(
      store,
      { zone_name: "veggie-bed", metric: "moisture", value: 38.5 },
      requestId,
      NOW,
    )._unsafeUnwrap();

    expect(toReadingOut(reading)).toEqual({
      id: 1,
      zone_name: "veggie-bed",
      metric: "moisture",
      value: 38.5,
      ts: "2026-03-02T19:30:05.000Z",
    });
  });

  it("stores a given timestamp in UTC", () => {
    const reading = addReading(
      store,
      {
        zone_name: "veggie-bed",
        metric: "moisture",
        value: 41,
        ts: "2026-03-03T06:00:00+11:00",
      },
      requestId,
      NOW,
    )._unsafeUnwrap();

    expect(reading.ts).toBe("2026-03-02T19:00:00.000Z");
  });

  it("does not require the zone to exist", () => {
    expect(
      addReading(store, { zone_name: "orchard", metric: "temperature", value: 21 }, requestId, NOW)
        .isOk(),
    ).toBe(true);
  });

  it.each([
    { metric: "moisture", value: 40 },
    { zone_name: "veggie-bed", metric: "", value: 40 },
    { zone_name: "veggie-bed", metric: "moisture", value: "40" },
    { zone_name: "veggie-bed", metric: "moisture", value: 40, ts: "yesterday" },
  ])("rejects %j", (input) => {
    expect(addReading(store, input, requestId, NOW)._unsafeUnwrapErr().type).toBe(
      "VALIDATION_FAILED",
    );
  });
});

describe("listReadings", () => {
  beforeEach(() => {
    for (const [value, ts] of [
      [30, "2026-03-02T17:00:00.000Z"],
      [35, "2026-03-02T19:00:00.000Z"],
      [33, "2026-03-02T18:00:00.000Z"],
    ] as const) {
      store.insertReading({ zoneName: "veggie-bed", metric: "moisture", value, ts })._unsafeUnwrap();
    }
  });

  it("returns the newest readings first", () => {
    expect(listReadings(store, {})._unsafeUnwrap().map((reading) => reading.value)).toEqual([
      35, 33, 30,
    ]);
  });

  it("applies the limit", () => {
    expect(listReadings(store, { limit: "2" })._unsafeUnwrap()).toHaveLength(2);
  });

  it("rejects a limit over 1000", () => {
    expect(listReadings(store, { limit: "1001" })._unsafeUnwrapErr().type).toBe(
      "VALIDATION_FAILED",
    );
  });
});
