/**
 * API routes for the Anova BLE bridge.
 *
 * Routes are organized by domain:
 * - /api/health, /api/version - Liveness
 * - /api/status - Cached and fresh cooker status
 * - /api/connect, /api/disconnect - Link control
 * - /api/temperature, /api/timer, /api/unit, /api/start, /api/stop - Commands
 * - /api/devices - Discovery scan
 */
import { type Context, Hono } from "hono";
import type { z } from "zod";

import type { CookerControl } from "../cooker/index.js";
import { createLogger } from "../logger.js";
import {
  APP_VERSION,
  ConnectBodySchema,
  DevicesQuerySchema,
  type MonitorView,
  TemperatureBodySchema,
  TimerBodySchema,
  UnitBodySchema,
} from "./schema.js";

const log = createLogger("api");

type BodyResult<T> = { success: true; data: T } | { success: false; error: string };

/**
 * Parse and validate a JSON body. An empty body counts as `{}`.
 */
async function parseBody<T>(
  c: Context,
  schema: z.ZodType<T>,
): Promise<BodyResult<T>> {
  const raw = await c.req.text();

  let json: unknown = {};
  if (raw.trim() !== "") {
    try {
      json = JSON.parse(raw);
    } catch {
      return { success: false, error: "Request body is not valid JSON" };
    }
  }

  const parsed = schema.safeParse(json);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(
      (issue) => `${issue.path.join(".") || "body"}: ${issue.message}`,
    );
    return { success: false, error: issues.join("; ") };
  }
  return { success: true, data: parsed.data };
}

/**
 * Build the API routes for one cooker.
 */
export function createRoutes(client: CookerControl, monitor: MonitorView): Hono {
  const routes = new Hono();

  /**
   * Answer a write command: 200 with the refreshed status, or 502.
   */
  async function commandResponse(
    c: Context,
    operation: string,
    run: () => Promise<boolean>,
  ) {
    const requestId = c.get("requestId");
    log.info({ requestId, operation }, `POST ${c.req.path}`);

    const accepted = await run();
    if (!accepted) {
      log.warn({ requestId, operation }, "Cooker command failed");
      return c.json(
        {
          success: false,
          error: `Cooker did not acknowledge ${operation}`,
          requestId,
        },
        502,
      );
    }

    return c.json({ success: true, status: client.status, requestId });
  }

  function validationError(c: Context, error: string) {
    const requestId = c.get("requestId");
    log.warn({ requestId, error, path: c.req.path }, "Invalid request");
    return c.json({ success: false, error, requestId }, 400);
  }

  // ===========================================================================
  // Health Check
  // ===========================================================================

  /**
   * Health endpoint - returns bridge and link status.
   */
  routes.get("/api/health", (c) => {
    const requestId = c.get("requestId");
    log.debug({ requestId }, "Health check");

    const monitoring = monitor.getState();

    return c.json({
      status: "ok",
      timestamp: new Date().toISOString(),
      requestId,
      version: APP_VERSION,
      device: client.identity,
      connection: client.connectionState,
      monitoring: {
        isRunning: monitoring.isRunning,
        lastPollTime: monitoring.lastPollTime,
      },
    });
  });

  routes.get("/api/version", (c) => {
    return c.json({ version: APP_VERSION });
  });

  // ===========================================================================
  // Status
  // ===========================================================================

  /**
   * Last known status, without touching the link.
   */
  routes.get("/api/status", (c) => {
    const requestId = c.get("requestId");

    return c.json({
      status: client.status,
      isConnected: client.isConnected,
      lastPollTime: monitor.getState().lastPollTime,
      requestId,
    });
  });

  /**
   * Fresh status; falls back to the last known one when unreachable.
   */
  routes.post("/api/status/refresh", async (c) => {
    const requestId = c.get("requestId");
    log.info({ requestId }, "POST /api/status/refresh");

    const status = await client.getStatus();

    return c.json({
      status,
      isConnected: client.isConnected,
      requestId,
    });
  });

  // ===========================================================================
  // Link Control
  // ===========================================================================

  routes.post("/api/connect", async (c) => {
    const requestId = c.get("requestId");
    const body = await parseBody(c, ConnectBodySchema);
    if (!body.success) return validationError(c, body.error);

    log.info({ requestId, ...body.data }, "POST /api/connect");
    const connected = await client.connect(body.data.attempts, body.data.timeoutMs);

    if (!connected) {
      return c.json(
        { success: false, error: "Could not connect to cooker", requestId },
        502,
      );
    }
    return c.json({ success: true, status: client.status, requestId });
  });

  routes.post("/api/disconnect", async (c) => {
    const requestId = c.get("requestId");
    log.info({ requestId }, "POST /api/disconnect");

    await client.disconnect();
    return c.json({ success: true, requestId });
  });

  // ===========================================================================
  // Commands
  // ===========================================================================

  routes.post("/api/temperature", async (c) => {
    const body = await parseBody(c, TemperatureBodySchema);
    if (!body.success) return validationError(c, body.error);

    return commandResponse(c, "setTemperature", () =>
      client.setTemperature(body.data.celsius),
    );
  });

  routes.post("/api/timer", async (c) => {
    const body = await parseBody(c, TimerBodySchema);
    if (!body.success) return validationError(c, body.error);

    return commandResponse(c, "setTimer", () => client.setTimer(body.data.minutes));
  });

  routes.post("/api/unit", async (c) => {
    const body = await parseBody(c, UnitBodySchema);
    if (!body.success) return validationError(c, body.error);

    return commandResponse(c, "setUnit", () => client.setUnit(body.data.unit));
  });

  routes.post("/api/start", (c) => commandResponse(c, "start", () => client.start()));

  routes.post("/api/stop", (c) => commandResponse(c, "stop", () => client.stop()));

  // ===========================================================================
  // Discovery
  // ===========================================================================

  routes.get("/api/devices", async (c) => {
    const requestId = c.get("requestId");
    const query = DevicesQuerySchema.safeParse(c.req.query());
    if (!query.success) {
      return validationError(c, "timeoutMs must be a positive number of milliseconds");
    }

    log.info({ requestId, timeoutMs: query.data.timeoutMs }, "GET /api/devices");
    const devices = await client.discover(query.data.timeoutMs);

    return c.json({ devices, requestId });
  });

  return routes;
}
