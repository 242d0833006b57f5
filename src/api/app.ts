/**
 * Hono application: request IDs, error boundary and the cooker routes.
 */
import { Hono } from "hono";

import type { CookerControl } from "../cooker/index.js";
import { errorHandler } from "./errorHandler.js";
import { requestIdMiddleware } from "./middleware/requestId.js";
import { createRoutes } from "./routes.js";
import type { MonitorView } from "./schema.js";

export function createApp(client: CookerControl, monitor: MonitorView): Hono {
  const app = new Hono();

  // Global middleware
  app.use("*", requestIdMiddleware);

  // Error handler
  app.onError(errorHandler);

  // Mount routes
  app.route("/", createRoutes(client, monitor));

  return app;
}
