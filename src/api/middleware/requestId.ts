/**
 * Tags each API call with an id (the caller's x-request-id, or a fresh
 * UUID) and logs its duration, so a slow cooker command can be traced
 * from the HTTP line to the BLE exchange.
 */
import { randomUUID } from "node:crypto";

import type { MiddlewareHandler } from "hono";

import { createLogger } from "../../logger.js";

const log = createLogger("middleware");

export const requestIdMiddleware: MiddlewareHandler = async (c, next) => {
  const requestId = c.req.header("x-request-id") ?? randomUUID();
  c.set("requestId", requestId);
  c.header("x-request-id", requestId);

  const { method, path } = c.req;
  const start = Date.now();
  await next();

  log.debug(
    { requestId, method, path, status: c.res.status, durationMs: Date.now() - start },
    `${method} ${path} ${c.res.status}`,
  );
};

declare module "hono" {
  interface ContextVariableMap {
    requestId: string;
  }
}
