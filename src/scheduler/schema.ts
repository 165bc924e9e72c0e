/**
 * Scheduler Module - Schemas and Types
 *
 * Shapes of one tick: the local wall-clock view it evaluates against, the
 * outcome per schedule, and the report the orchestrator keeps.
 */
import type { Weekday } from "../schedules/index.js";

// =============================================================================
// Local Time
// =============================================================================

/**
 * "Now" as seen in the configured timezone, reduced to what schedules
 * match on.
 */
export type LocalTime = Readonly<{
  /** "yyyy-MM-dd" */
  date: string;
  /** "HH:MM" */
  minute: string;
  weekday: Weekday;
  /** ISO timestamp with the zone's offset, for logs */
  iso: string;
}>;

/**
 * Human-readable "now" for the /now endpoint and the dashboard.
 */
export type WallClock = Readonly<{
  timezone: string;
  /** "yyyy-MM-dd HH:mm:ss" in the configured timezone */
  local: string;
  /** "yyyy-MM-dd HH:mm:ss" in UTC */
  utc: string;
  weekday: Weekday;
  minute: string;
}>;

// =============================================================================
// Moisture Gate
// =============================================================================

export type MoistureDecision = Readonly<
  | { skip: false; reason: "no_gate" }
  | { skip: false; reason: "no_reading"; threshold: number }
  | { skip: false; reason: "below_threshold"; threshold: number; reading: number }
  | { skip: true; reason: "at_or_above_threshold"; threshold: number; reading: number }
>;

// =============================================================================
// Tick Outcomes
// =============================================================================

/**
 * Where in the per-schedule pipeline a failure happened.
 */
export type TickStage = "zone_lookup" | "moisture_gate" | "trigger_marker" | "run" | "unexpected";

export type TickOutcome = Readonly<
  | { scheduleId: number; status: "not_due" }
  | { scheduleId: number; status: "already_handled" }
  | { scheduleId: number; status: "zone_missing"; zoneId: number }
  | {
      scheduleId: number;
      status: "skipped_moisture";
      zoneName: string;
      reading: number;
      threshold: number;
    }
  | {
      scheduleId: number;
      status: "ran";
      zoneName: string;
      runId: number;
      minutes: number;
    }
  | { scheduleId: number; status: "failed"; stage: TickStage; message: string }
>;

export type TickStatus = TickOutcome["status"];

export type TickReport = Readonly<{
  /** UTC instant the tick evaluated */
  at: string;
  localMinute: string;
  weekday: Weekday;
  /** Set when the enabled schedules could not be loaded at all */
  loadError: string | null;
  outcomes: ReadonlyArray<TickOutcome>;
}>;

// =============================================================================
// Scheduler State
// =============================================================================

export type SchedulerOptions = Readonly<{
  timezone: string;
  intervalMs: number;
  moistureMetric: string;
}>;

export type SchedulerState = Readonly<{
  /** Timer armed (between start() and stop()) */
  running: boolean;
  /** A tick is executing right now */
  ticking: boolean;
  tickCount: number;
  lastTickAt: string | null;
  lastReport: TickReport | null;
}>;

export const INITIAL_SCHEDULER_STATE: SchedulerState = {
  running: false,
  ticking: false,
  tickCount: 0,
  lastTickAt: null,
  lastReport: null,
};
