/**
 * Hono application factory.
 *
 * Global middleware, the error boundary and the route groups. When the
 * database never opened, every data route answers 503 while /health and
 * /now keep working.
 */
import { Hono } from "hono";
import { cors } from "hono/cors";

import { errorHandler } from "./errorHandler.js";
import { requestIdMiddleware } from "./middleware/requestId.js";
import { type AppDeps, createDataRoutes, createSystemRoutes } from "./routes.js";

export function createApp(deps: AppDeps): Hono {
  const app = new Hono();

  // Open to every origin, no credentials
  app.use("*", cors());
  app.use("*", requestIdMiddleware);

  app.onError(errorHandler);

  app.route("/", createSystemRoutes(deps));

  if (deps.data) {
    app.route("/", createDataRoutes(deps, deps.data));
  } else {
    app.all("*", (c) =>
      c.json({ error: "Data store unavailable", requestId: c.get("requestId") }, 503),
    );
  }

  return app;
}
