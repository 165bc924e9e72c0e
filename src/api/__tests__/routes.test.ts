/**
 * API Routes Integration Tests
 *
 * Drives the real app (middleware, error boundary, routes) through
 * Hono's app.request() against an in-memory store and a pinned clock.
 */
import type Database from "better-sqlite3";
import type { Hono } from "hono";
import { type Result, ok } from "neverthrow";
import { afterEach, beforeEach, describe, expect, test, vi } from "vitest";

// Mock logger to prevent pino initialization in tests
vi.mock("../../logger.js", () => ({
  createLogger: () => ({
    info: vi.fn(),
    debug: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    trace: vi.fn(),
    fatal: vi.fn(),
  }),
  logOperationStart: vi.fn(),
  logOperationComplete: vi.fn(),
  logOperationFailed: vi.fn(),
}));

import { fixedClock } from "../../clock.js";
import {
  type ActuatorError,
  type RunExecutor,
  createRunExecutor,
} from "../../irrigation/index.js";
import { createScheduler } from "../../scheduler/index.js";
import type { Store } from "../../store/index.js";
import { createMemoryStore } from "../../store/testing.js";
import { createApp } from "../app.js";
import type { AppDeps } from "../routes.js";

// Tuesday 06:30:05 in Melbourne (UTC+11)
const NOW = "2026-03-02T19:30:05.000Z";
const REQUEST_ID = "test-request-id";
const TIMEZONE = "Australia/Melbourne";

let db: Database.Database;
let store: Store;
let executor: RunExecutor;
let app: Hono;

function buildApp(overrides: Partial<AppDeps> = {}): Hono {
  return createApp({
    appName: "IrrigationController",
    clock: fixedClock(NOW),
    timezone: TIMEZONE,
    dbReady: true,
    data: { store, executor },
    scheduler: null,
    ...overrides,
  });
}

function send(method: string, path: string, body?: unknown) {
  return app.request(path, {
    method,
    headers: { "content-type": "application/json", "x-request-id": REQUEST_ID },
    body: body === undefined ? undefined : JSON.stringify(body),
  });
}

const get = (path: string) => send("GET", path);

async function seedZone(name = "veggie-bed", description = "Raised beds") {
  const res = await send("POST", "/zones", { name, description });
  expect(res.status).toBe(201);
}

beforeEach(() => {
  ({ db, store } = createMemoryStore());
  executor = createRunExecutor({
    store,
    actuator: {
      start: async (): Promise<Result<void, ActuatorError>> => ok(undefined),
    },
    clock: fixedClock(NOW),
    fallbackMinutes: 1,
  });
  app = buildApp();
});

afterEach(() => {
  db.close();
});

// =============================================================================
// Health, Time and Middleware
// =============================================================================

describe("GET /health", () => {
  test("reports a ready store and an idle scheduler", async () => {
    const res = await get("/health");

    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({
      ok: true,
      ts: NOW,
      app: "IrrigationController",
      db_ready: true,
      scheduler: { running: false, tick_count: 0, last_tick_at: null },
      requestId: REQUEST_ID,
    });
  });

  test("reports scheduler progress", async () => {
    const clock = fixedClock(NOW);
    const scheduler = createScheduler(
      { store, executor, clock },
      { timezone: TIMEZONE, intervalMs: 20_000, moistureMetric: "moisture" },
    );
    await scheduler.tick();
    app = buildApp({ scheduler });

    const body = await (await get("/health")).json();

    expect(body).toMatchObject({
      scheduler: { running: false, tick_count: 1, last_tick_at: NOW },
    });
  });

  test("reports db_ready false when the schema is not ready", async () => {
    app = buildApp({ dbReady: false });

    expect(await (await get("/health")).json()).toMatchObject({ ok: true, db_ready: false });
  });
});

describe("GET /now", () => {
  test("returns local and UTC wall-clock time", async () => {
    const res = await get("/now");

    expect(await res.json()).toEqual({
      timezone: TIMEZONE,
      local: "2026-03-03 06:30:05",
      utc: "2026-03-02 19:30:05",
      weekday: "tue",
      minute: "06:30",
      requestId: REQUEST_ID,
    });
  });
});

describe("middleware", () => {
  test("echoes a client request id", async () => {
    const res = await get("/health");

    expect(res.headers.get("x-request-id")).toBe(REQUEST_ID);
  });

  test("generates a request id when none is sent", async () => {
    const res = await app.request("/health");

    expect(res.headers.get("x-request-id")).toMatch(
      /^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/,
    );
  });

  test("replaces a request id that does not look like one", async () => {
    const res = await app.request("/health", {
      headers: { "x-request-id": "not a valid id" },
    });

    expect(res.headers.get("x-request-id")).not.toBe("not a valid id");
  });

  test("allows any origin", async () => {
    const res = await app.request("/health", {
      headers: { Origin: "http://garden.test" },
    });

    expect(res.headers.get("access-control-allow-origin")).toBe("*");
  });

  test("turns an unexpected throw into a 500 JSON body", async () => {
    const throwing: Store = {
      ...store,
      listZones: () => {
        throw new Error("boom");
      },
    };
    app = buildApp({ data: { store: throwing, executor } });

    const res = await get("/zones");

    expect(res.status).toBe(500);
    expect(await res.json()).toEqual({ error: "boom", requestId: REQUEST_ID });
  });
});

describe("without a database", () => {
  beforeEach(() => {
    app = buildApp({ data: null, dbReady: false });
  });

  test("health still answers", async () => {
    const res = await get("/health");

    expect(res.status).toBe(200);
    expect(await res.json()).toMatchObject({ ok: true, db_ready: false });
  });

  test("data routes answer 503", async () => {
    const res = await get("/zones");

    expect(res.status).toBe(503);
    expect(await res.json()).toEqual({
      error: "Data store unavailable",
      requestId: REQUEST_ID,
    });
  });
});

// =============================================================================
// Zones
// =============================================================================

describe("zones", () => {
  test("POST /zones creates a zone", async () => {
    const res = await send("POST", "/zones", { name: "veggie-bed", description: "Raised beds" });

    expect(res.status).toBe(201);
    expect(await res.json()).toEqual({ id: 1, name: "veggie-bed", description: "Raised beds" });
  });

  test("POST /zones rejects a duplicate name with 409", async () => {
    await seedZone();
    const res = await send("POST", "/zones", { name: "veggie-bed" });

    expect(res.status).toBe(409);
    expect(await res.json()).toEqual({
      error: "Zone name already exists: veggie-bed",
      requestId: REQUEST_ID,
    });
  });

  test("POST /zones lists validation issues", async () => {
    const res = await send("POST", "/zones", { name: "" });

    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({
      error: "name: Zone name is required",
      issues: [{ path: "name", message: "Zone name is required" }],
      requestId: REQUEST_ID,
    });
  });

  test("POST /zones rejects malformed JSON", async () => {
    const res = await app.request("/zones", {
      method: "POST",
      headers: { "content-type": "application/json", "x-request-id": REQUEST_ID },
      body: "{not json",
    });

    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({ error: "Malformed JSON body", requestId: REQUEST_ID });
  });

  test("GET /zones and GET /zones/:id", async () => {
    await seedZone();
    await seedZone("lawn", "");

    expect(await (await get("/zones")).json()).toEqual([
      { id: 1, name: "veggie-bed", description: "Raised beds" },
      { id: 2, name: "lawn", description: "" },
    ]);
    expect(await (await get("/zones/2")).json()).toEqual({
      id: 2,
      name: "lawn",
      description: "",
    });
  });

  test("GET /zones/:id answers 404 and 400", async () => {
    const missing = await get("/zones/99");
    expect(missing.status).toBe(404);
    expect(await missing.json()).toEqual({ error: "Zone not found: 99", requestId: REQUEST_ID });

    expect((await get("/zones/abc")).status).toBe(400);
  });

  test("DELETE /zones/:id removes the zone and its schedules", async () => {
    await seedZone();
    await send("POST", "/schedules", { zone_id: 1, start_time: "06:30", duration_minutes: 15 });

    const res = await send("DELETE", "/zones/1");

    expect(res.status).toBe(204);
    expect(await (await get("/schedules")).json()).toEqual([]);
    expect((await send("DELETE", "/zones/1")).status).toBe(404);
  });
});

// =============================================================================
// Schedules
// =============================================================================

describe("schedules", () => {
  beforeEach(async () => {
    await seedZone();
  });

  test("POST /schedules creates a schedule in snake_case", async () => {
    const res = await send("POST", "/schedules", {
      zone_id: 1,
      start_time: "06:30",
      duration_minutes: 15,
      days_of_week: "fri,mon,wed",
      skip_if_moisture_over: 40,
    });

    expect(res.status).toBe(201);
    expect(await res.json()).toEqual({
      id: 1,
      zone_id: 1,
      start_time: "06:30",
      duration_minutes: 15,
      enabled: true,
      days_of_week: "mon,wed,fri",
      skip_if_moisture_over: 40,
      moisture_lookback_minutes: 120,
      last_run_minute: null,
      last_run_date: null,
    });
  });

  test("POST /schedules answers 404 for an unknown zone", async () => {
    const res = await send("POST", "/schedules", {
      zone_id: 7,
      start_time: "06:30",
      duration_minutes: 15,
    });

    expect(res.status).toBe(404);
    expect(await res.json()).toEqual({ error: "Zone not found: 7", requestId: REQUEST_ID });
  });

  test("POST /schedules answers 400 for a malformed start time", async () => {
    const res = await send("POST", "/schedules", {
      zone_id: 1,
      start_time: "6:30",
      duration_minutes: 15,
    });

    expect(res.status).toBe(400);
    expect(await res.json()).toMatchObject({
      issues: [
        { path: "start_time", message: "start_time must be HH:MM between 00:00 and 23:59" },
      ],
    });
  });

  test("PATCH, GET and DELETE /schedules/:id", async () => {
    await send("POST", "/schedules", { zone_id: 1, start_time: "06:30", duration_minutes: 15 });

    const patched = await send("PATCH", "/schedules/1", { enabled: false, start_time: "07:00" });
    expect(patched.status).toBe(200);
    expect(await patched.json()).toMatchObject({ id: 1, enabled: false, start_time: "07:00" });

    expect(await (await get("/schedules/1")).json()).toMatchObject({
      enabled: false,
      start_time: "07:00",
      duration_minutes: 15,
    });

    expect((await send("DELETE", "/schedules/1")).status).toBe(204);
    expect((await get("/schedules/1")).status).toBe(404);
  });

  test("PATCH /schedules/:id answers 404 for an unknown schedule", async () => {
    const res = await send("PATCH", "/schedules/5", { enabled: false });

    expect(res.status).toBe(404);
    expect(await res.json()).toEqual({ error: "Schedule not found: 5", requestId: REQUEST_ID });
  });
});

// =============================================================================
// Runs
// =============================================================================

describe("runs", () => {
  beforeEach(async () => {
    await seedZone();
  });

  test("POST /run/:zone records a manual run", async () => {
    const res = await send("POST", "/run/veggie-bed?minutes=5");

    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({
      id: 1,
      zone_name: "veggie-bed",
      duration_minutes: 5,
      source: "manual",
      ts: NOW,
    });
  });

  test("POST /run/:zone uses the default and the fallback lengths", async () => {
    expect(await (await send("POST", "/run/veggie-bed")).json()).toMatchObject({
      duration_minutes: 10,
    });
    expect(await (await send("POST", "/run/veggie-bed?minutes=0")).json()).toMatchObject({
      duration_minutes: 1,
    });
  });

  test("POST /run/:zone answers 404 for an unknown zone", async () => {
    const res = await send("POST", "/run/orchard");

    expect(res.status).toBe(404);
    expect(await res.json()).toEqual({ error: "Zone not found: orchard", requestId: REQUEST_ID });
  });

  test("POST /run/:zone records the source label", async () => {
    const res = await send("POST", "/run/veggie-bed?minutes=2&source=hose-timer");

    expect(await res.json()).toMatchObject({ duration_minutes: 2, source: "hose-timer" });
    expect((await send("POST", "/run/veggie-bed?source=schedule:9")).status).toBe(400);
  });

  test("POST /run/:zone answers 400 for negative minutes", async () => {
    expect((await send("POST", "/run/veggie-bed?minutes=-2")).status).toBe(400);
  });

  test("GET /runs filters by zone name", async () => {
    await seedZone("lawn", "");
    await send("POST", "/run/veggie-bed?minutes=5");
    await send("POST", "/run/lawn?minutes=3");

    const all = await (await get("/runs")).json();
    const lawn = await (await get("/runs?zone_name=lawn")).json();

    expect(all).toHaveLength(2);
    expect(lawn).toEqual([
      { id: 2, zone_name: "lawn", duration_minutes: 3, source: "manual", ts: NOW },
    ]);
  });
});

// =============================================================================
// Readings
// =============================================================================

describe("readings", () => {
  test("POST /readings stores a reading stamped with now", async () => {
    const res = await send("POST", "/readings", {
      zone_name: "veggie-bed",
      metric: "moisture",
      value: 38,
    });

    expect(res.status).toBe(201);
    expect(await res.json()).toEqual({
      id: 1,
      zone_name: "veggie-bed",
      metric: "moisture",
      value: 38,
      ts: NOW,
    });
  });

  test("GET /readings returns the newest first", async () => {
    await send("POST", "/readings", {
      zone_name: "veggie-bed",
      metric: "moisture",
      value: 30,
      ts: "2026-03-02T18:00:00.000Z",
    });
    await send("POST", "/readings", { zone_name: "veggie-bed", metric: "moisture", value: 38 });

    expect(await (await get("/readings?limit=1")).json()).toEqual([
      { id: 2, zone_name: "veggie-bed", metric: "moisture", value: 38, ts: NOW },
    ]);
  });

  test("POST /readings answers 400 for a non-numeric value", async () => {
    const res = await send("POST", "/readings", {
      zone_name: "veggie-bed",
      metric: "moisture",
      value: "wet",
    });

    expect(res.status).toBe(400);
  });
});

// =============================================================================
// Dashboard
// =============================================================================

describe("GET /", () => {
  test("renders zones, schedules and runs", async () => {
    await seedZone();
    await send("POST", "/schedules", { zone_id: 1, start_time: "06:30", duration_minutes: 15 });
    await send("POST", "/run/veggie-bed?minutes=5");

    const res = await get("/");
    const html = await res.text();

    expect(res.status).toBe(200);
    expect(res.headers.get("content-type")).toContain("text/html");
    expect(html).toContain("<td>veggie-bed</td>");
    expect(html).toContain("<td>06:30</td>");
    expect(html).toContain("<td>manual</td>");
    expect(html).toContain("2026-03-03 06:30:05");
  });

  test("names the schedule behind a scheduled run", async () => {
    await seedZone();
    store
      .insertRun({ zoneName: "veggie-bed", durationMinutes: 15, source: "schedule:1", ts: NOW })
      ._unsafeUnwrap();

    const html = await (await get("/")).text();

    expect(html).toContain("<td>schedule #1</td>");
  });
});
