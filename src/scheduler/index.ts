/**
 * Scheduler Module - Public API
 *
 * @example
 * const scheduler = createScheduler({ store, executor, clock: systemClock }, {
 *   timezone: "Australia/Melbourne",
 *   intervalMs: 20_000,
 *   moistureMetric: "moisture",
 * });
 * scheduler.start();
 */

// Types
export type {
  LocalTime,
  MoistureDecision,
  SchedulerOptions,
  SchedulerState,
  TickOutcome,
  TickReport,
  TickStatus,
  WallClock,
} from "./schema.js";
export type { Scheduler, SchedulerDeps } from "./service.js";

// Service
export { createScheduler } from "./service.js";
export { evaluateMoistureGate, shouldSkipForMoisture } from "./moisture.js";

// Pure transformations
export {
  decideMoisture,
  describeNow,
  isAlreadyHandled,
  matchesTrigger,
  moistureLookbackStart,
  summarizeOutcomes,
  toLocalTime,
  triggerMarkerFor,
} from "./transform.js";
