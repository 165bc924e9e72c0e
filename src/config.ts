/**
 * Typed configuration - all config lives in .env, parsed with Zod at startup.
 * App crashes immediately on invalid config - fail fast.
 *
 * Irrigation controller configuration covering:
 * - Server settings
 * - SQLite data store
 * - Schedule tick timing and timezone
 * - Run duration limits and fallbacks
 */
import { IANAZone } from "luxon";
import { z } from "zod";

/**
 * Custom boolean parser for environment variables.
 * z.coerce.boolean() doesn't work with string "false" (it's truthy).
 */
const envBoolean = (defaultValue: boolean) =>
  z
    .string()
    .optional()
    .transform((val) =>
      val === undefined ? defaultValue : val.toLowerCase() === "true",
    );

const ConfigSchema = z.object({
  // ==========================================================================
  // Server Configuration
  // ==========================================================================
  PORT: z.coerce.number().int().positive().default(8000).describe("HTTP server port"),
  NODE_ENV: z
    .enum(["development", "production", "test"])
    .default("development")
    .describe("Runtime environment"),
  APP_NAME: z
    .string()
    .default("IrrigationController")
    .describe("Application name"),
  LOG_LEVEL: z
    .enum(["trace", "debug", "info", "warn", "error", "fatal", "silent"])
    .default("info")
    .describe("Pino log level"),

  // ==========================================================================
  // Data Store
  // ==========================================================================
  DB_PATH: z
    .string()
    .min(1)
    .default("./data/irrigation.db")
    .describe("SQLite database file (':memory:' for an in-process database)"),

  // ==========================================================================
  // Scheduler
  // ==========================================================================
  TIMEZONE: z
    .string()
    .default("Australia/Melbourne")
    .refine((zone) => IANAZone.isValidZone(zone), "Unknown IANA timezone")
    .describe("Timezone schedules are matched in"),
  SCHEDULER_ENABLED: envBoolean(true).describe(
    "Start the schedule tick timer once the store is ready",
  ),
  SCHEDULER_INTERVAL_MS: z.coerce
    .number()
    .int()
    .min(1000)
    .max(30000)
    .default(20000)
    .describe("Milliseconds between schedule ticks; at most 30s so every minute is seen"),
  MOISTURE_METRIC: z
    .string()
    .min(1)
    .default("moisture")
    .describe("Sensor metric consulted by the moisture gate"),

  // ==========================================================================
  // Run Durations
  // ==========================================================================
  RUN_FALLBACK_MINUTES: z.coerce
    .number()
    .int()
    .positive()
    .default(1)
    .describe("Minutes used when a run is requested with a non-positive duration"),
  MANUAL_RUN_DEFAULT_MINUTES: z.coerce
    .number()
    .int()
    .positive()
    .default(10)
    .describe("Minutes for a manual run when none are given"),
  MAX_DURATION_MINUTES: z.coerce
    .number()
    .int()
    .positive()
    .default(1440)
    .describe("Upper bound for schedule and manual run durations"),
});

// Parse at startup - crashes immediately if invalid
const parsed = ConfigSchema.safeParse(process.env);

if (!parsed.success) {
  console.error("❌ Invalid configuration:");
  console.error(parsed.error.format());
  process.exit(1);
}

export const config = parsed.data;

// Type export for use elsewhere
export type Config = z.infer<typeof ConfigSchema>;

// =============================================================================
// Derived Configuration Objects
// =============================================================================

/**
 * Scheduler settings for the tick orchestrator.
 * Returns null if the scheduler is switched off.
 */
export function getSchedulerConfig(): Readonly<{
  timezone: string;
  intervalMs: number;
  moistureMetric: string;
}> | null {
  if (!config.SCHEDULER_ENABLED) {
    return null;
  }

  return {
    timezone: config.TIMEZONE,
    intervalMs: config.SCHEDULER_INTERVAL_MS,
    moistureMetric: config.MOISTURE_METRIC,
  };
}

/**
 * Duration limits shared by schedule validation and the run executor.
 */
export const durationLimits = {
  fallbackMinutes: config.RUN_FALLBACK_MINUTES,
  manualDefaultMinutes: config.MANUAL_RUN_DEFAULT_MINUTES,
  maxMinutes: config.MAX_DURATION_MINUTES,
} as const;
