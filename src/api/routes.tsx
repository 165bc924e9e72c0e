/**
 * API routes for the irrigation controller.
 *
 * Routes are organized by domain:
 * - /health, /now - liveness, store readiness and wall-clock time
 * - /zones, /schedules - CRUD
 * - /run/:zone, /runs - manual runs and run history
 * - /readings - sensor ingestion
 * - / - Dashboard UI
 *
 * Handlers only translate HTTP to service calls and Results back to HTTP.
 */
import { Hono } from "hono";

import type { Clock } from "../clock.js";
import {
  type RunExecutor,
  formatIrrigationError,
  listRuns,
  runZoneNow,
  toRunOut,
} from "../irrigation/index.js";
import { createLogger } from "../logger.js";
import {
  addReading,
  formatReadingError,
  listReadings,
  toReadingOut,
} from "../readings/index.js";
import { type Scheduler, describeNow } from "../scheduler/index.js";
import {
  createSchedule,
  deleteSchedule,
  formatScheduleError,
  getSchedule,
  listSchedules,
  toScheduleOut,
  updateSchedule,
} from "../schedules/index.js";
import { type Store, formatStoreError } from "../store/index.js";
import { Dashboard, type DashboardData } from "../ui/pages/Dashboard.js";
import {
  createZone,
  deleteZone,
  formatZoneError,
  getZone,
  listZones,
} from "../zones/index.js";
import { readJsonBody, sendError, sendMalformedBody } from "./responses.js";

const log = createLogger("api");

const DASHBOARD_ROWS = 20;

/**
 * Collaborators the routes need. `data` is null when the database could
 * not be opened at all; the data routes are then not mounted.
 */
export type AppDeps = Readonly<{
  appName: string;
  clock: Clock;
  timezone: string;
  /** Schema migrated and the store usable */
  dbReady: boolean;
  data: DataDeps | null;
  /** Null when the scheduler was not started */
  scheduler: Scheduler | null;
}>;

export type DataDeps = Readonly<{
  store: Store;
  executor: RunExecutor;
}>;

// =============================================================================
// Health and Time
// =============================================================================

export function createSystemRoutes(deps: AppDeps): Hono {
  const routes = new Hono();

  /**
   * Health endpoint - liveness plus store and scheduler status.
   */
  routes.get("/health", (c) => {
    const requestId = c.get("requestId");
    const storeReachable = deps.data?.store.ping().isOk() ?? false;
    const scheduler = deps.scheduler?.getState() ?? null;

    log.debug({ requestId }, "Health check");

    return c.json({
      ok: true,
      ts: deps.clock.now().toISOString(),
      app: deps.appName,
      db_ready: deps.dbReady && storeReachable,
      scheduler: {
        running: scheduler?.running ?? false,
        tick_count: scheduler?.tickCount ?? 0,
        last_tick_at: scheduler?.lastTickAt ?? null,
      },
      requestId,
    });
  });

  /**
   * Wall-clock time as the scheduler sees it.
   */
  routes.get("/now", (c) =>
    c.json({
      ...describeNow(deps.clock.now(), deps.timezone),
      requestId: c.get("requestId"),
    }),
  );

  return routes;
}

// =============================================================================
// Data Routes
// =============================================================================

export function createDataRoutes(deps: AppDeps, data: DataDeps): Hono {
  const { store, executor } = data;
  const routes = new Hono();

  // ---------------------------------------------------------------------------
  // Zones
  // ---------------------------------------------------------------------------

  routes.post("/zones", async (c) => {
    const requestId = c.get("requestId");
    const body = await readJsonBody(c);
    if (body.isErr()) {
      return sendMalformedBody(c, body.error);
    }

    const result = createZone(store, body.value, requestId);
    if (result.isErr()) {
      return sendError(c, result.error, formatZoneError(result.error));
    }
    return c.json(result.value, 201);
  });

  routes.get("/zones", (c) => {
    const result = listZones(store);
    if (result.isErr()) {
      return sendError(c, result.error, formatZoneError(result.error));
    }
    return c.json(result.value);
  });

  routes.get("/zones/:id", (c) => {
    const result = getZone(store, c.req.param("id"));
    if (result.isErr()) {
      return sendError(c, result.error, formatZoneError(result.error));
    }
    return c.json(result.value);
  });

  routes.delete("/zones/:id", (c) => {
    const result = deleteZone(store, c.req.param("id"), c.get("requestId"));
    if (result.isErr()) {
      return sendError(c, result.error, formatZoneError(result.error));
    }
    return c.body(null, 204);
  });

  // ---------------------------------------------------------------------------
  // Schedules
  // ---------------------------------------------------------------------------

  routes.post("/schedules", async (c) => {
    const requestId = c.get("requestId");
    const body = await readJsonBody(c);
    if (body.isErr()) {
      return sendMalformedBody(c, body.error);
    }

    const result = createSchedule(store, body.value, requestId);
    if (result.isErr()) {
      return sendError(c, result.error, formatScheduleError(result.error));
    }
    return c.json(toScheduleOut(result.value), 201);
  });

  routes.get("/schedules", (c) => {
    const result = listSchedules(store);
    if (result.isErr()) {
      return sendError(c, result.error, formatScheduleError(result.error));
    }
    return c.json(result.value.map(toScheduleOut));
  });

  routes.get("/schedules/:id", (c) => {
    const result = getSchedule(store, c.req.param("id"));
    if (result.isErr()) {
      return sendError(c, result.error, formatScheduleError(result.error));
    }
    return c.json(toScheduleOut(result.value));
  });

  routes.patch("/schedules/:id", async (c) => {
    const requestId = c.get("requestId");
    const body = await readJsonBody(c);
    if (body.isErr()) {
      return sendMalformedBody(c, body.error);
    }

    const result = updateSchedule(store, c.req.param("id"), body.value, requestId);
    if (result.isErr()) {
      return sendError(c, result.error, formatScheduleError(result.error));
    }
    return c.json(toScheduleOut(result.value));
  });

  routes.delete("/schedules/:id", (c) => {
    const result = deleteSchedule(store, c.req.param("id"), c.get("requestId"));
    if (result.isErr()) {
      return sendError(c, result.error, formatScheduleError(result.error));
    }
    return c.body(null, 204);
  });

  // ---------------------------------------------------------------------------
  // Runs
  // ---------------------------------------------------------------------------

  /**
   * Manual run: POST /run/:zone?minutes=N
   */
  routes.post("/run/:zone", async (c) => {
    const requestId = c.get("requestId");
    const zoneName = c.req.param("zone");
    log.info({ requestId, zone: zoneName }, "POST /run/:zone");

    const result = await runZoneNow(store, executor, zoneName, c.req.query(), requestId);
    if (result.isErr()) {
      return sendError(c, result.error, formatIrrigationError(result.error));
    }
    return c.json(toRunOut(result.value));
  });

  routes.get("/runs", (c) => {
    const result = listRuns(store, c.req.query());
    if (result.isErr()) {
      return sendError(c, result.error, formatIrrigationError(result.error));
    }
    return c.json(result.value.map(toRunOut));
  });

  // ---------------------------------------------------------------------------
  // Sensor Readings
  // ---------------------------------------------------------------------------

  routes.post("/readings", async (c) => {
    const requestId = c.get("requestId");
    const body = await readJsonBody(c);
    if (body.isErr()) {
      return sendMalformedBody(c, body.error);
    }

    const result = addReading(store, body.value, requestId, deps.clock.now());
    if (result.isErr()) {
      return sendError(c, result.error, formatReadingError(result.error));
    }
    return c.json(toReadingOut(result.value), 201);
  });

  routes.get("/readings", (c) => {
    const result = listReadings(store, c.req.query());
    if (result.isErr()) {
      return sendError(c, result.error, formatReadingError(result.error));
    }
    return c.json(result.value.map(toReadingOut));
  });

  // ---------------------------------------------------------------------------
  // Dashboard UI
  // ---------------------------------------------------------------------------

  /**
   * Main dashboard page - server-rendered HTML.
   */
  routes.get("/", (c) => {
    const snapshot = store.listZones().andThen((zones) =>
      store.listSchedules().andThen((schedules) =>
        store.listRuns({ limit: DASHBOARD_ROWS }).andThen((runs) =>
          store.listReadings(DASHBOARD_ROWS).map(
            (readings): DashboardData => ({ zones, schedules, runs, readings }),
          ),
        ),
      ),
    );

    if (snapshot.isErr()) {
      log.error(
        { requestId: c.get("requestId"), error: formatStoreError(snapshot.error) },
        "Dashboard data unavailable",
      );
      return c.text("Data store unavailable", 500);
    }

    return c.html(
      <Dashboard
        appName={deps.appName}
        now={describeNow(deps.clock.now(), deps.timezone)}
        dbReady={deps.dbReady}
        scheduler={deps.scheduler?.getState() ?? null}
        data={snapshot.value}
      />,
    );
  });

  return routes;
}
