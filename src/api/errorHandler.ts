/**
 * Global error boundary - catches everything a route did not turn into a
 * Result. Logs with the request ID and answers with a JSON body.
 */
import type { ErrorHandler } from "hono";
import { HTTPException } from "hono/http-exception";
import { config } from "../config.js";
import { createLogger } from "../logger.js";

const log = createLogger("api");

export const errorHandler: ErrorHandler = (err, c) => {
  const requestId = c.get("requestId");

  // Thrown on purpose by Hono or a middleware; it already carries a status
  if (err instanceof HTTPException) {
    log.warn(
      { requestId, status: err.status, path: c.req.path, error: err.message },
      "Request rejected",
    );
    return err.getResponse();
  }

  log.error(
    {
      operation: "unhandledError",
      requestId,
      error: err.message,
      stack: err.stack,
      path: c.req.path,
      method: c.req.method,
    },
    "❌ Unhandled error",
  );

  // Internal messages stay out of production responses
  const message =
    config.NODE_ENV === "production" ? "Internal server error" : err.message;

  return c.json({ error: message, requestId }, 500);
};
