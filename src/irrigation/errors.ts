/**
 * Irrigation Module - Error Types
 *
 * Typed error unions for run execution and the valve actuator.
 */
import type { ZodIssue } from "zod";
import type { StoreError } from "../store/index.js";

export type IrrigationError =
  | {
      readonly type: "VALIDATION_FAILED";
      readonly issues: ReadonlyArray<ZodIssue>;
    }
  | {
      readonly type: "ZONE_NOT_FOUND";
      readonly zone: string;
    }
  | {
      readonly type: "STORE_FAILED";
      readonly error: StoreError;
    };

/**
 * Failures of the physical side. These never undo a recorded run.
 */
export type ActuatorError = {
  readonly type: "ACTUATOR_FAILED";
  readonly zoneName: string;
  readonly message: string;
  readonly cause?: Error;
};

export const validationError = (
  issues: ReadonlyArray<ZodIssue>,
): IrrigationError => ({ type: "VALIDATION_FAILED", issues });

export const zoneNotFound = (zone: string): IrrigationError => ({
  type: "ZONE_NOT_FOUND",
  zone,
});

export const storeFailed = (error: StoreError): IrrigationError => ({
  type: "STORE_FAILED",
  error,
});

export function actuatorFailed(
  zoneName: string,
  message: string,
  cause?: Error,
): ActuatorError {
  if (cause) {
    return { type: "ACTUATOR_FAILED", zoneName, message, cause };
  }
  return { type: "ACTUATOR_FAILED", zoneName, message };
}

export function formatIrrigationError(error: IrrigationError): string {
  switch (error.type) {
    case "VALIDATION_FAILED":
      return error.issues
        .map((issue) => `${issue.path.join(".") || "query"}: ${issue.message}`)
        .join("; ");
    case "ZONE_NOT_FOUND":
      return `Zone not found: ${error.zone}`;
    case "STORE_FAILED":
      return "Data store unavailable";
  }
}
