/**
 * Irrigation Module - Service Layer
 *
 * The run executor: resolve the duration, persist the run (together with
 * the schedule's trigger marker when there is one), then tell the valves.
 * Side effects happen here; Result types carry every failure.
 */
import { type Result, ResultAsync, err, ok } from "neverthrow";

import type { Clock } from "../clock.js";
import { createLogger } from "../logger.js";
import type { IrrigationRun, Store } from "../store/index.js";
import type { Actuator } from "./actuator.js";
import {
  type ActuatorError,
  type IrrigationError,
  actuatorFailed,
  storeFailed,
  validationError,
  zoneNotFound,
} from "./errors.js";
import {
  ManualRunQuerySchema,
  type RunRequest,
  RunsQuerySchema,
} from "./schema.js";
import { resolveRunMinutes } from "./transform.js";

const log = createLogger("irrigation");

export type RunExecutorDeps = Readonly<{
  store: Store;
  actuator: Actuator;
  clock: Clock;
  /** Minutes used in place of a non-positive request */
  fallbackMinutes: number;
}>;

export interface RunExecutor {
  executeRun(request: RunRequest): Promise<Result<IrrigationRun, IrrigationError>>;
}

export function createRunExecutor(deps: RunExecutorDeps): RunExecutor {
  const { store, actuator, clock, fallbackMinutes } = deps;

  return {
    async executeRun(request) {
      const { zoneName, source, trigger } = request;
      const { minutes, substituted } = resolveRunMinutes(
        request.minutes,
        fallbackMinutes,
      );

      if (substituted) {
        log.warn(
          { zone: zoneName, source, requested: request.minutes, minutes },
          "Non-positive run length replaced by fallback",
        );
      }

      // Run row and trigger marker commit together or not at all
      const persisted = store.transaction(() =>
        store
          .insertRun({
            zoneName,
            durationMinutes: minutes,
            source,
            ts: clock.now().toISOString(),
          })
          .andThen((run) =>
            trigger
              ? store
                  .updateScheduleTriggerMarker(trigger.scheduleId, trigger.marker)
                  .map(() => run)
              : ok(run),
          ),
      );

      if (persisted.isErr()) {
        log.error(
          { zone: zoneName, source, error: persisted.error.message },
          "Run not recorded",
        );
        return err(storeFailed(persisted.error));
      }

      const run = persisted.value;
      log.info(
        { runId: run.id, zone: zoneName, minutes, source },
        `💧 Run recorded: ${zoneName} for ${minutes} min`,
      );

      // The log is the truth: an actuator failure never rolls the run back,
      // whether it comes back as an err or as a throw
      const started = await ResultAsync.fromPromise(
        // A synchronous throw inside the Promise constructor becomes a rejection
        new Promise<Result<void, ActuatorError>>((resolve) => {
          resolve(actuator.start(zoneName, minutes));
        }),
        (error) =>
          error instanceof Error
            ? actuatorFailed(zoneName, error.message, error)
            : actuatorFailed(zoneName, String(error)),
      ).andThen((result) => result);
      if (started.isErr()) {
        log.warn(
          { runId: run.id, zone: zoneName, error: started.error.message },
          "Actuator did not accept the run",
        );
      }

      return ok(run);
    },
  };
}

/**
 * Manual run for a zone by name: POST /run/:zone?minutes=N&source=label
 */
export async function runZoneNow(
  store: Store,
  executor: RunExecutor,
  zoneName: string,
  rawQuery: unknown,
  requestId: string,
): Promise<Result<IrrigationRun, IrrigationError>> {
  const query = ManualRunQuerySchema.safeParse(rawQuery);
  if (!query.success) {
    return err(validationError(query.error.issues));
  }

  const zone = store.findZoneByName(zoneName);
  if (zone.isErr()) {
    return err(storeFailed(zone.error));
  }
  if (!zone.value) {
    log.warn({ requestId, zone: zoneName }, "Manual run for unknown zone");
    return err(zoneNotFound(zoneName));
  }

  const { minutes, source } = query.data;
  log.info({ requestId, zone: zoneName, minutes, source }, "Manual run requested");

  return executor.executeRun({ zoneName: zone.value.name, minutes, source });
}

/**
 * Run history, newest first, optionally for one zone.
 */
export function listRuns(
  store: Store,
  rawQuery: unknown,
): Result<IrrigationRun[], IrrigationError> {
  const query = RunsQuerySchema.safeParse(rawQuery);
  if (!query.success) {
    return err(validationError(query.error.issues));
  }

  return store
    .listRuns({ limit: query.data.limit, zoneName: query.data.zone_name })
    .mapErr(storeFailed);
}
