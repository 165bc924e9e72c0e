/**
 * Irrigation Module - Public API
 *
 * Exports only what's needed by other modules.
 */

// Types
export type { Actuator } from "./actuator.js";
export type { ActuatorError, IrrigationError } from "./errors.js";
export type { RunOut, RunRequest, ScheduleSource, TriggerMark } from "./schema.js";
export type { RunExecutor, RunExecutorDeps } from "./service.js";

// Error utilities
export { actuatorFailed, formatIrrigationError } from "./errors.js";

// Service functions (side effects)
export { createLoggingActuator } from "./actuator.js";
export { createRunExecutor, listRuns, runZoneNow } from "./service.js";

// Pure transformations
export {
  parseScheduleSource,
  resolveRunMinutes,
  scheduleSource,
  toRunOut,
} from "./transform.js";
