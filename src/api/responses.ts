/**
 * Mapping from domain error unions to HTTP responses.
 *
 * Every module returns its own typed error; they share the discriminants
 * below, so one table decides the status code for all of them.
 */
import type { Context } from "hono";
import { type Result, err, ok } from "neverthrow";

import type { IrrigationError } from "../irrigation/index.js";
import { createLogger } from "../logger.js";
import type { ReadingError } from "../readings/index.js";
import type { ScheduleError } from "../schedules/index.js";
import { formatStoreError } from "../store/index.js";
import type { ZoneError } from "../zones/index.js";

const log = createLogger("api");

export type DomainError = ZoneError | ScheduleError | ReadingError | IrrigationError;

export type ErrorStatus = 400 | 404 | 409 | 500;

export function statusFor(error: DomainError): ErrorStatus {
  switch (error.type) {
    case "VALIDATION_FAILED":
      return 400;
    case "ZONE_NOT_FOUND":
    case "SCHEDULE_NOT_FOUND":
      return 404;
    case "ZONE_NAME_TAKEN":
      return 409;
    case "STORE_FAILED":
      return 500;
  }
}

/**
 * Answer with the status for `error` and `message` as the body's error.
 * Validation failures also list their issues by field path.
 */
export function sendError(c: Context, error: DomainError, message: string) {
  const requestId = c.get("requestId");
  const status = statusFor(error);

  if (error.type === "STORE_FAILED") {
    log.error(
      { requestId, method: c.req.method, path: c.req.path, error: formatStoreError(error.error) },
      "Request failed in the data store",
    );
    return c.json({ error: message, requestId }, status);
  }

  if (error.type === "VALIDATION_FAILED") {
    return c.json(
      {
        error: message,
        issues: error.issues.map((issue) => ({
          path: issue.path.join("."),
          message: issue.message,
        })),
        requestId,
      },
      status,
    );
  }

  return c.json({ error: message, requestId }, status);
}

/**
 * Read the request body as JSON. A body that does not parse is the
 * client's mistake, reported as an err with the parser's message.
 */
export async function readJsonBody(c: Context): Promise<Result<unknown, string>> {
  try {
    return ok(await c.req.json<unknown>());
  } catch (error) {
    return err(error instanceof Error ? error.message : String(error));
  }
}

export function sendMalformedBody(c: Context, detail: string) {
  const requestId = c.get("requestId");
  log.warn({ requestId, path: c.req.path, error: detail }, "Malformed JSON body");
  return c.json({ error: "Malformed JSON body", requestId }, 400);
}
