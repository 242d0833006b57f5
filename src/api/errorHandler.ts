/**
 * Last-resort handler for a throw escaping a route. Cooker failures are
 * answered by the routes themselves (400/502); anything reaching here is
 * a bug or a transport exception and becomes a logged 500.
 */
import type { ErrorHandler } from "hono";

import { config } from "../config.js";
import { createLogger } from "../logger.js";

const log = createLogger("api");

export const errorHandler: ErrorHandler = (err, c) => {
  const requestId = c.get("requestId") ?? "unknown";

  log.error(
    {
      operation: "unhandledError",
      requestId,
      error: err.message,
      stack: err.stack,
      path: c.req.path,
      method: c.req.method,
    },
    "Unhandled error",
  );

  const message =
    config.NODE_ENV === "production" ? "Internal server error" : err.message;

  return c.json(
    {
      error: message,
      requestId,
    },
    500,
  );
};
