/**
 * Store Module - Public API
 *
 * Exports only what's needed by other modules.
 * Internal implementation details stay hidden.
 */

// Types
export type {
  IrrigationRun,
  NewReading,
  NewRun,
  NewSchedule,
  NewZone,
  RunQuery,
  Schedule,
  SchedulePatch,
  SensorReading,
  TriggerMarker,
  Zone,
} from "./schema.js";
export type { StoreError } from "./errors.js";
export type { Store } from "./service.js";

export { ALL_DAYS } from "./schema.js";

// Error utilities
export { formatStoreError } from "./errors.js";

// Lifecycle
export {
  ensureSchema,
  getSchemaVersion,
  openDatabase,
  SCHEMA_VERSION,
} from "./migrate.js";

// Service
export { createStore } from "./service.js";
