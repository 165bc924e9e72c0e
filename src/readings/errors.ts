/**
 * Readings Module - Error Types
 */
import type { ZodIssue } from "zod";
import type { StoreError } from "../store/index.js";

export type ReadingError =
  | {
      readonly type: "VALIDATION_FAILED";
      readonly issues: ReadonlyArray<ZodIssue>;
    }
  | {
      readonly type: "STORE_FAILED";
      readonly error: StoreError;
    };

export const validationError = (
  issues: ReadonlyArray<ZodIssue>,
): ReadingError => ({ type: "VALIDATION_FAILED", issues });

export const storeFailed = (error: StoreError): ReadingError => ({
  type: "STORE_FAILED",
  error,
});

export function formatReadingError(error: ReadingError): string {
  switch (error.type) {
    case "VALIDATION_FAILED":
      return error.issues
        .map((issue) => `${issue.path.join(".") || "body"}: ${issue.message}`)
        .join("; ");
    case "STORE_FAILED":
      return "Data store unavailable";
  }
}
