/**
 * Irrigation Controller - Application Entry Point
 *
 * Sets up the Hono server with:
 * - Zone, schedule, run and reading routes
 * - Request ID tracing and the global error handler
 * - The schedule tick timer, started only once the store is ready
 */
import { serve } from "@hono/node-server";
import type Database from "better-sqlite3";

import { createApp } from "./api/app.js";
import type { DataDeps } from "./api/routes.js";
import { systemClock } from "./clock.js";
import { config, durationLimits, getSchedulerConfig } from "./config.js";
import { createLoggingActuator, createRunExecutor } from "./irrigation/index.js";
import { createLogger, logOperationFailed } from "./logger.js";
import { type Scheduler, createScheduler } from "./scheduler/index.js";
import {
  createStore,
  ensureSchema,
  formatStoreError,
  openDatabase,
} from "./store/index.js";

const log = createLogger("api");

// =============================================================================
// APPLICATION STARTUP BANNER
// =============================================================================

console.log("");
console.log("========================================");
console.log("  IRRIGATION CONTROLLER");
console.log("========================================");
console.log("");

const schedulerConfig = getSchedulerConfig();

log.info(
  {
    port: config.PORT,
    env: config.NODE_ENV,
    dbPath: config.DB_PATH,
    timezone: config.TIMEZONE,
    moistureMetric: config.MOISTURE_METRIC,
    fallbackMinutes: durationLimits.fallbackMinutes,
    manualDefaultMinutes: durationLimits.manualDefaultMinutes,
  },
  "Configuration loaded",
);

// =============================================================================
// DATA STORE
// =============================================================================

let db: Database.Database | null = null;
let data: DataDeps | null = null;
let dbReady = false;

const opened = openDatabase(config.DB_PATH);
if (opened.isErr()) {
  log.error({ error: formatStoreError(opened.error) }, "Database unavailable - data routes disabled");
} else {
  db = opened.value;

  const migrated = ensureSchema(db);
  if (migrated.isErr()) {
    log.error(
      { error: formatStoreError(migrated.error) },
      "Schema not ready - scheduler will NOT start",
    );
  } else {
    dbReady = true;
    log.info({ schemaVersion: migrated.value }, "Database ready");
  }

  const store = createStore(db);
  data = {
    store,
    executor: createRunExecutor({
      store,
      actuator: createLoggingActuator(),
      clock: systemClock,
      fallbackMinutes: durationLimits.fallbackMinutes,
    }),
  };
}

// =============================================================================
// SCHEDULER
// =============================================================================

let scheduler: Scheduler | null = null;

if (!schedulerConfig) {
  log.info("Schedule tick timer: DISABLED");
} else if (!data || !dbReady) {
  log.warn("Schedule tick timer: NOT STARTED (store not ready)");
} else {
  scheduler = createScheduler(
    { store: data.store, executor: data.executor, clock: systemClock },
    schedulerConfig,
  );
  scheduler.start();
}

// =============================================================================
// HONO SERVER
// =============================================================================

const app = createApp({
  appName: config.APP_NAME,
  clock: systemClock,
  timezone: config.TIMEZONE,
  dbReady,
  data,
  scheduler,
});

const server = serve(
  {
    fetch: app.fetch,
    port: config.PORT,
    hostname: "0.0.0.0",
  },
  (info) => {
    log.info(
      { port: info.port, env: config.NODE_ENV, appName: config.APP_NAME },
      `🚀 ${config.APP_NAME} listening on port ${info.port}`,
    );
  },
);

// =============================================================================
// GRACEFUL SHUTDOWN
// =============================================================================

let shuttingDown = false;

const shutdown = async (signal: string): Promise<void> => {
  if (shuttingDown) {
    return;
  }
  shuttingDown = true;
  log.info({ signal }, `${signal} received. Shutting down gracefully...`);

  // Let an in-flight tick commit before the connection goes away
  if (scheduler) {
    await scheduler.stop();
  }

  await new Promise<void>((resolve) => {
    server.close(() => resolve());
  });

  if (db) {
    db.close();
  }

  log.info("Shutdown complete");
  process.exit(0);
};

const onSignal = (signal: NodeJS.Signals) => {
  shutdown(signal).catch((error: unknown) => {
    logOperationFailed(log, "shutdown", error);
    process.exit(1);
  });
};

process.on("SIGTERM", onSignal);
process.on("SIGINT", onSignal);
