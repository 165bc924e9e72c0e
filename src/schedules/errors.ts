/**
 * Schedules Module - Error Types
 */
import type { ZodIssue } from "zod";
import type { StoreError } from "../store/index.js";

export type ScheduleError =
  | {
      readonly type: "VALIDATION_FAILED";
      readonly issues: ReadonlyArray<ZodIssue>;
    }
  | {
      readonly type: "ZONE_NOT_FOUND";
      readonly zone: number;
    }
  | {
      readonly type: "SCHEDULE_NOT_FOUND";
      readonly scheduleId: number;
    }
  | {
      readonly type: "STORE_FAILED";
      readonly error: StoreError;
    };

export const validationError = (
  issues: ReadonlyArray<ZodIssue>,
): ScheduleError => ({ type: "VALIDATION_FAILED", issues });

export const zoneNotFound = (zone: number): ScheduleError => ({
  type: "ZONE_NOT_FOUND",
  zone,
});

export const scheduleNotFound = (scheduleId: number): ScheduleError => ({
  type: "SCHEDULE_NOT_FOUND",
  scheduleId,
});

export const storeFailed = (error: StoreError): ScheduleError => ({
  type: "STORE_FAILED",
  error,
});

export function formatScheduleError(error: ScheduleError): string {
  switch (error.type) {
    case "VALIDATION_FAILED":
      return error.issues
        .map((issue) => `${issue.path.join(".") || "body"}: ${issue.message}`)
        .join("; ");
    case "ZONE_NOT_FOUND":
      return `Zone not found: ${error.zone}`;
    case "SCHEDULE_NOT_FOUND":
      return `Schedule not found: ${error.scheduleId}`;
    case "STORE_FAILED":
      return "Data store unavailable";
  }
}
