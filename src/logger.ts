/**
 * Module-scoped color-coded loggers for the irrigation controller.
 *
 * Each module gets its own named logger with an assigned color for
 * easy visual identification in development logs.
 */
import { type Logger, pino } from "pino";
import { config } from "./config.js";

/**
 * Module color assignments for visual log differentiation.
 * Colors use ANSI escape codes.
 */
const MODULE_COLORS = {
  // Core modules
  api: "\x1b[34m", // blue
  middleware: "\x1b[90m", // gray
  scheduler: "\x1b[33m", // yellow

  // Domain modules
  irrigation: "\x1b[36m", // cyan
  zones: "\x1b[32m", // green
  schedules: "\x1b[35m", // magenta
  readings: "\x1b[94m", // bright blue
  actuator: "\x1b[95m", // bright magenta

  // Infrastructure
  store: "\x1b[91m", // bright red
  config: "\x1b[90m", // gray
} as const;

const RESET = "\x1b[0m";

/**
 * Valid module names for type safety.
 */
export type ModuleName = keyof typeof MODULE_COLORS;

/**
 * Create a module-scoped logger with color-coded output.
 *
 * @param module - The module name (must be one of the predefined modules)
 * @returns A pino logger instance configured for the module
 *
 * @example
 * const log = createLogger('scheduler');
 * log.info({ scheduleId }, 'Schedule triggered');
 */
export function createLogger(module: ModuleName): Logger {
  const color = MODULE_COLORS[module];

  const isDevelopment = config.NODE_ENV === "development";

  if (isDevelopment) {
    // Pretty printing for development
    return pino({
      name: module,
      level: config.LOG_LEVEL,
      transport: {
        target: "pino-pretty",
        options: {
          colorize: true,
          messageFormat: `${color}[{name}]${RESET} {msg}`,
          ignore: "pid,hostname",
          translateTime: "HH:MM:ss",
        },
      },
    });
  }

  // Structured JSON for production
  return pino({
    name: module,
    level: config.LOG_LEVEL,
  });
}

/**
 * Log operation entry with consistent format.
 */
export function logOperationStart(
  logger: Logger,
  operation: string,
  context: Record<string, unknown> = {},
): void {
  logger.info({ operation, ...context }, `→ ${operation} started`);
}

/**
 * Log operation completion with duration.
 */
export function logOperationComplete(
  logger: Logger,
  operation: string,
  startTime: number,
  context: Record<string, unknown> = {},
): void {
  const durationMs = Date.now() - startTime;
  logger.info(
    { operation, durationMs, ...context },
    `✓ ${operation} completed (${durationMs}ms)`,
  );
}

/**
 * Log operation failure with error details.
 */
export function logOperationFailed(
  logger: Logger,
  operation: string,
  error: unknown,
  context: Record<string, unknown> = {},
): void {
  const errorMessage = error instanceof Error ? error.message : String(error);
  logger.error(
    { operation, error: errorMessage, ...context },
    `✗ ${operation} failed: ${errorMessage}`,
  );
}
