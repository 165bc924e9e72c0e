/**
 * Store Module - Error Types
 *
 * Typed error unions for data store operations.
 * Errors are values, not exceptions.
 */

/**
 * Errors that can occur while reading or writing the data store.
 */
export type StoreError =
  | {
      readonly type: "PERSISTENCE_FAILED";
      readonly operation: string;
      readonly message: string;
      readonly cause?: Error;
    }
  | {
      readonly type: "CONSTRAINT_VIOLATION";
      readonly operation: string;
      readonly message: string;
    }
  | {
      readonly type: "STARTUP_FAILED";
      readonly message: string;
      readonly cause?: Error;
    };

/**
 * Create a PERSISTENCE_FAILED error.
 */
export function persistenceFailed(
  operation: string,
  message: string,
  cause?: Error,
): StoreError {
  if (cause) {
    return { type: "PERSISTENCE_FAILED", operation, message, cause };
  }
  return { type: "PERSISTENCE_FAILED", operation, message };
}

/**
 * Create a CONSTRAINT_VIOLATION error (unique or foreign key).
 */
export function constraintViolation(
  operation: string,
  message: string,
): StoreError {
  return { type: "CONSTRAINT_VIOLATION", operation, message };
}

/**
 * Create a STARTUP_FAILED error.
 */
export function startupFailed(message: string, cause?: Error): StoreError {
  if (cause) {
    return { type: "STARTUP_FAILED", message, cause };
  }
  return { type: "STARTUP_FAILED", message };
}

/**
 * Map anything thrown by the SQLite driver to a StoreError.
 * better-sqlite3 reports constraint failures with a SQLITE_CONSTRAINT* code.
 */
export function fromDriverError(operation: string, error: unknown): StoreError {
  const cause = error instanceof Error ? error : new Error(String(error));
  const code = "code" in cause && typeof cause.code === "string" ? cause.code : "";

  if (code.startsWith("SQLITE_CONSTRAINT")) {
    return constraintViolation(operation, cause.message);
  }
  return persistenceFailed(operation, cause.message, cause);
}

/**
 * Format a StoreError for logging.
 */
export function formatStoreError(error: StoreError): string {
  switch (error.type) {
    case "PERSISTENCE_FAILED":
      return `${error.operation} failed: ${error.message}`;
    case "CONSTRAINT_VIOLATION":
      return `${error.operation} violated a constraint: ${error.message}`;
    case "STARTUP_FAILED":
      return `Store startup failed: ${error.message}`;
  }
}
