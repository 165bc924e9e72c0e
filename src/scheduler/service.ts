/**
 * Scheduler Module - Service Layer
 *
 * The schedule tick orchestrator. Every tick:
 *   local time → enabled schedules → for each schedule:
 *   day/time match → trigger-marker guard → zone → moisture gate → run
 *
 * Each schedule is evaluated on its own; a failure is recorded as that
 * schedule's outcome and the batch carries on. Ticks never overlap and the
 * timer keeps firing until stop().
 */
import type { Clock } from "../clock.js";
import { type RunExecutor, scheduleSource } from "../irrigation/index.js";
import {
  createLogger,
  logOperationComplete,
  logOperationFailed,
  logOperationStart,
} from "../logger.js";
import { type Schedule, type Store, formatStoreError } from "../store/index.js";
import { evaluateMoistureGate } from "./moisture.js";
import {
  INITIAL_SCHEDULER_STATE,
  type LocalTime,
  type SchedulerOptions,
  type SchedulerState,
  type TickOutcome,
  type TickReport,
  type TickStage,
} from "./schema.js";
import {
  isAlreadyHandled,
  matchesTrigger,
  summarizeOutcomes,
  toLocalTime,
  triggerMarkerFor,
} from "./transform.js";

const log = createLogger("scheduler");

export type SchedulerDeps = Readonly<{
  store: Store;
  executor: RunExecutor;
  clock: Clock;
}>;

export interface Scheduler {
  /** Arm the timer. Ticks once immediately, then every interval. */
  start(): void;
  /** Disarm the timer and wait for an in-flight tick to finish. */
  stop(): Promise<void>;
  /**
   * Evaluate all enabled schedules once. While a tick is in flight, callers
   * get that tick's report instead of starting a second one.
   */
  tick(): Promise<TickReport>;
  getState(): SchedulerState;
}

const failed = (
  scheduleId: number,
  stage: TickStage,
  message: string,
): TickOutcome => ({ scheduleId, status: "failed", stage, message });

export function createScheduler(
  deps: SchedulerDeps,
  options: SchedulerOptions,
): Scheduler {
  const { store, executor, clock } = deps;

  let state: SchedulerState = INITIAL_SCHEDULER_STATE;
  let timer: ReturnType<typeof setTimeout> | null = null;
  let inFlight: Promise<TickReport> | null = null;
  // Bumped by every start(); a timer chain from an earlier start stops re-arming
  let generation = 0;

  // ===========================================================================
  // Per-Schedule Pipeline
  // ===========================================================================

  async function evaluateSchedule(
    schedule: Schedule,
    local: LocalTime,
    now: Date,
  ): Promise<TickOutcome> {
    const scheduleId = schedule.id;

    // 1. Day/time match
    if (!matchesTrigger(schedule, local)) {
      return { scheduleId, status: "not_due" };
    }

    // 2. Already handled this minute (ran or skipped)
    if (isAlreadyHandled(schedule, local)) {
      return { scheduleId, status: "already_handled" };
    }

    // 3. Owning zone; an orphaned schedule is inert
    const zone = store.getZone(schedule.zoneId);
    if (zone.isErr()) {
      return failed(scheduleId, "zone_lookup", formatStoreError(zone.error));
    }
    if (!zone.value) {
      return { scheduleId, status: "zone_missing", zoneId: schedule.zoneId };
    }
    const zoneName = zone.value.name;

    // 4. Moisture gate; a skip still marks the minute as handled
    const gate = evaluateMoistureGate(
      store,
      schedule,
      zoneName,
      now,
      options.moistureMetric,
    );
    if (gate.isErr()) {
      return failed(scheduleId, "moisture_gate", formatStoreError(gate.error));
    }
    const decision = gate.value;
    if (decision.skip) {
      const marked = store.updateScheduleTriggerMarker(
        scheduleId,
        triggerMarkerFor(local),
      );
      if (marked.isErr()) {
        return failed(scheduleId, "trigger_marker", formatStoreError(marked.error));
      }
      return {
        scheduleId,
        status: "skipped_moisture",
        zoneName,
        reading: decision.reading,
        threshold: decision.threshold,
      };
    }

    // 5. Run; the marker is written in the same transaction as the run
    const startedAt = Date.now();
    logOperationStart(log, "scheduledRun", { scheduleId, zone: zoneName, minute: local.minute });
    const run = await executor.executeRun({
      zoneName,
      minutes: schedule.durationMinutes,
      source: scheduleSource(scheduleId),
      trigger: { scheduleId, marker: triggerMarkerFor(local) },
    });
    if (run.isErr()) {
      const message =
        run.error.type === "STORE_FAILED"
          ? formatStoreError(run.error.error)
          : run.error.type;
      return failed(scheduleId, "run", message);
    }
    logOperationComplete(log, "scheduledRun", startedAt, { scheduleId, runId: run.value.id });

    return {
      scheduleId,
      status: "ran",
      zoneName,
      runId: run.value.id,
      minutes: run.value.durationMinutes,
    };
  }

  function logOutcome(outcome: TickOutcome, local: LocalTime): void {
    switch (outcome.status) {
      case "not_due":
      case "already_handled":
        return;
      case "zone_missing":
        log.warn(
          { scheduleId: outcome.scheduleId, zoneId: outcome.zoneId },
          "Schedule matched but its zone no longer exists",
        );
        return;
      case "skipped_moisture":
        log.info(
          {
            scheduleId: outcome.scheduleId,
            zone: outcome.zoneName,
            reading: outcome.reading,
            threshold: outcome.threshold,
            minute: local.minute,
          },
          `Skipped ${outcome.zoneName}: moisture ${outcome.reading} ≥ ${outcome.threshold}`,
        );
        return;
      case "ran":
        log.info(
          {
            scheduleId: outcome.scheduleId,
            zone: outcome.zoneName,
            runId: outcome.runId,
            minutes: outcome.minutes,
            minute: local.minute,
          },
          `Schedule ${outcome.scheduleId} started ${outcome.zoneName}`,
        );
        return;
      case "failed":
        logOperationFailed(log, "evaluateSchedule", outcome.message, {
          scheduleId: outcome.scheduleId,
          stage: outcome.stage,
          minute: local.minute,
        });
        return;
    }
  }

  // ===========================================================================
  // Tick
  // ===========================================================================

  async function runTick(): Promise<TickReport> {
    const now = clock.now();
    const local = toLocalTime(now, options.timezone);

    const schedules = store.listEnabledSchedules();
    if (schedules.isErr()) {
      const message = formatStoreError(schedules.error);
      logOperationFailed(log, "tick", message, { minute: local.minute });
      return {
        at: now.toISOString(),
        localMinute: local.minute,
        weekday: local.weekday,
        loadError: message,
        outcomes: [],
      };
    }

    const outcomes: TickOutcome[] = [];
    for (const schedule of schedules.value) {
      let outcome: TickOutcome;
      try {
        outcome = await evaluateSchedule(schedule, local, now);
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        outcome = failed(schedule.id, "unexpected", message);
      }
      logOutcome(outcome, local);
      outcomes.push(outcome);
    }

    log.debug(
      { minute: local.minute, weekday: local.weekday, ...summarizeOutcomes(outcomes) },
      "Tick complete",
    );

    return {
      at: now.toISOString(),
      localMinute: local.minute,
      weekday: local.weekday,
      loadError: null,
      outcomes,
    };
  }

  function tick(): Promise<TickReport> {
    if (inFlight) {
      log.debug("Tick already in progress, joining it");
      return inFlight;
    }

    state = { ...state, ticking: true };
    const current = runTick()
      .then((report) => {
        state = {
          ...state,
          tickCount: state.tickCount + 1,
          lastTickAt: report.at,
          lastReport: report,
        };
        return report;
      })
      .finally(() => {
        state = { ...state, ticking: false };
        inFlight = null;
      });

    inFlight = current;
    return current;
  }

  // ===========================================================================
  // Timer Lifecycle
  // ===========================================================================

  /**
   * Arm the next tick. The next one is only armed after the previous one
   * settled, so ticks cannot pile up behind a slow one.
   */
  function armTimer(delayMs: number, chain: number): void {
    if (!state.running || chain !== generation) {
      return;
    }
    timer = setTimeout(() => {
      timer = null;
      void tick()
        .catch((error: unknown) => {
          logOperationFailed(log, "tick", error);
        })
        .finally(() => armTimer(options.intervalMs, chain));
    }, delayMs);
  }

  function start(): void {
    if (state.running) {
      log.warn("Scheduler already running");
      return;
    }

    log.info(
      { timezone: options.timezone, intervalMs: options.intervalMs },
      "Starting schedule tick timer",
    );
    state = { ...state, running: true };
    generation += 1;
    armTimer(0, generation);
  }

  async function stop(): Promise<void> {
    if (!state.running) {
      return;
    }

    log.info("Stopping schedule tick timer...");
    state = { ...state, running: false };
    if (timer) {
      clearTimeout(timer);
      timer = null;
    }

    if (inFlight) {
      await inFlight.catch((error: unknown) => {
        logOperationFailed(log, "tick", error);
      });
    }
    log.info("Schedule tick timer stopped");
  }

  return {
    start,
    stop,
    tick,
    getState: () => state,
  };
}
