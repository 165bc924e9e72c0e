/**
 * Schedules transform tests - days-of-week normalization and the API view.
 */
import { describe, expect, it } from "vitest";

import {
  START_TIME_PATTERN,
  expandDaysOfWeek,
  normalizeDaysOfWeek,
  toScheduleOut,
} from "../transform.js";

describe("normalizeDaysOfWeek", () => {
  it.each([
    ["*", "*"],
    ["all", "*"],
    [" ALL ", "*"],
    ["mon,wed,fri", "mon,wed,fri"],
    ["fri, Mon ,wed", "mon,wed,fri"],
    ["sun,sun,sat", "sat,sun"],
  ])("normalizes %j to %j", (input, expected) => {
    expect(normalizeDaysOfWeek(input)._unsafeUnwrap()).toBe(expected);
  });

  it("accepts an array", () => {
    expect(normalizeDaysOfWeek(["thu", "tue"])._unsafeUnwrap()).toBe("tue,thu");
  });

  it("rejects an empty value", () => {
    expect(normalizeDaysOfWeek(" , ")._unsafeUnwrapErr()).toBe(
      "days_of_week must not be empty",
    );
  });

  it("rejects unknown day names", () => {
    expect(normalizeDaysOfWeek("mon,funday")._unsafeUnwrapErr()).toBe(
      "Unknown weekday: funday",
    );
  });

  it("does not treat '*' inside a list as every day", () => {
    expect(normalizeDaysOfWeek("mon,*").isErr()).toBe(true);
  });
});

describe("expandDaysOfWeek", () => {
  it("expands '*' to the whole week", () => {
    expect(expandDaysOfWeek("*")).toEqual(["mon", "tue", "wed", "thu", "fri", "sat", "sun"]);
  });

  it("splits a stored list", () => {
    expect(expandDaysOfWeek("mon,wed,fri")).toEqual(["mon", "wed", "fri"]);
  });
});

describe("START_TIME_PATTERN", () => {
  it.each(["00:00", "06:30", "23:59"])("accepts %s", (value) => {
    expect(START_TIME_PATTERN.test(value)).toBe(true);
  });

  it.each(["24:00", "6:30", "06:60", "06:30:00", "0630"])("rejects %s", (value) => {
    expect(START_TIME_PATTERN.test(value)).toBe(false);
  });
});

describe("toScheduleOut", () => {
  it("renames fields for the API", () => {
    expect(
      toScheduleOut({
        id: 1,
        zoneId: 2,
        startTime: "06:30",
        durationMinutes: 15,
        enabled: true,
        daysOfWeek: "*",
        skipIfMoistureOver: 40,
        moistureLookbackMinutes: 120,
        lastRunMinute: "06:30",
        lastRunDate: "2026-03-03",
      }),
    ).toEqual({
      id: 1,
      zone_id: 2,
      start_time: "06:30",
      duration_minutes: 15,
      enabled: true,
      days_of_week: "*",
      skip_if_moisture_over: 40,
      moisture_lookback_minutes: 120,
      last_run_minute: "06:30",
      last_run_date: "2026-03-03",
    });
  });
});
