/**
 * Zones Module - Error Types
 *
 * Typed error unions for zone operations.
 */
import type { ZodIssue } from "zod";
import type { StoreError } from "../store/index.js";

export type ZoneError =
  | {
      readonly type: "VALIDATION_FAILED";
      readonly issues: ReadonlyArray<ZodIssue>;
    }
  | {
      readonly type: "ZONE_NOT_FOUND";
      readonly zone: number | string;
    }
  | {
      readonly type: "ZONE_NAME_TAKEN";
      readonly name: string;
    }
  | {
      readonly type: "STORE_FAILED";
      readonly error: StoreError;
    };

export const validationError = (
  issues: ReadonlyArray<ZodIssue>,
): ZoneError => ({ type: "VALIDATION_FAILED", issues });

export const zoneNotFound = (zone: number | string): ZoneError => ({
  type: "ZONE_NOT_FOUND",
  zone,
});

export const zoneNameTaken = (name: string): ZoneError => ({
  type: "ZONE_NAME_TAKEN",
  name,
});

export const storeFailed = (error: StoreError): ZoneError => ({
  type: "STORE_FAILED",
  error,
});

/**
 * Format a ZoneError for logging and API responses.
 */
export function formatZoneError(error: ZoneError): string {
  switch (error.type) {
    case "VALIDATION_FAILED":
      return error.issues
        .map((issue) => `${issue.path.join(".") || "body"}: ${issue.message}`)
        .join("; ");
    case "ZONE_NOT_FOUND":
      return `Zone not found: ${error.zone}`;
    case "ZONE_NAME_TAKEN":
      return `Zone name already exists: ${error.name}`;
    case "STORE_FAILED":
      return "Data store unavailable";
  }
}
