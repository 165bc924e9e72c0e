/**
 * Request ID middleware - generates or propagates a request ID for tracing.
 * Every request gets an ID that flows through the service log calls and is
 * echoed back in the x-request-id response header.
 */
import { randomUUID } from "node:crypto";
import type { MiddlewareHandler } from "hono";
import { createLogger } from "../../logger.js";

const log = createLogger("middleware");

const REQUEST_ID_HEADER = "x-request-id";

/**
 * Client-supplied IDs are only trusted when they look like an ID, so a
 * hostile header cannot flood the logs.
 */
const ACCEPTABLE_REQUEST_ID = /^[A-Za-z0-9._-]{1,128}$/;

export const requestIdMiddleware: MiddlewareHandler = async (c, next) => {
  const incoming = c.req.header(REQUEST_ID_HEADER);
  const requestId =
    incoming !== undefined && ACCEPTABLE_REQUEST_ID.test(incoming)
      ? incoming
      : randomUUID();

  c.set("requestId", requestId);
  c.header(REQUEST_ID_HEADER, requestId);

  log.debug({ requestId, method: c.req.method, path: c.req.path }, "→ Request started");

  const start = Date.now();
  await next();

  log.debug(
    {
      requestId,
      method: c.req.method,
      path: c.req.path,
      status: c.res.status,
      durationMs: Date.now() - start,
    },
    "✓ Request completed",
  );
};

// Type augmentation for Hono context
declare module "hono" {
  interface ContextVariableMap {
    requestId: string;
  }
}
