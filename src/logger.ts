/**
 * Per-module pino loggers. Pretty and colored in development, JSON
 * otherwise.
 */
import pino from "pino";
import { config } from "./config.js";
import { toError } from "./utils/timing.js";

// BLE stack in warm colors, host surface in cool ones
const MODULE_COLORS = {
  transport: "\x1b[91m",
  connection: "\x1b[35m",
  exchange: "\x1b[33m",
  discovery: "\x1b[93m",
  cooker: "\x1b[36m",
  monitoring: "\x1b[32m",
  api: "\x1b[34m",
  middleware: "\x1b[94m",
} as const;

const RESET = "\x1b[0m";

export type ModuleName = keyof typeof MODULE_COLORS;

export type Logger = pino.Logger;

/**
 * @example
 * const log = createLogger("connection");
 * log.info({ address }, "Connecting to cooker...");
 */
export function createLogger(module: ModuleName): Logger {
  const color = MODULE_COLORS[module];

  if (config.NODE_ENV === "development") {
    return pino({
      name: module,
      level: config.LOG_LEVEL,
      transport: {
        target: "pino-pretty",
        options: {
          colorize: true,
          messageFormat: `${color}[{name}]${RESET} {msg}`,
          ignore: "pid,hostname",
          translateTime: "HH:MM:ss",
        },
      },
    });
  }

  return pino({
    name: module,
    level: config.LOG_LEVEL,
  });
}

// Cooker commands log through these three so their lines share one shape

export function logOperationStart(
  logger: Logger,
  operation: string,
  context: Record<string, unknown> = {},
): void {
  logger.info({ operation, ...context }, `→ ${operation} started`);
}

export function logOperationComplete(
  logger: Logger,
  operation: string,
  startTime: number,
  context: Record<string, unknown> = {},
): void {
  const durationMs = Date.now() - startTime;
  logger.info(
    { operation, durationMs, ...context },
    `✓ ${operation} completed (${durationMs}ms)`,
  );
}

export function logOperationFailed(
  logger: Logger,
  operation: string,
  error: unknown,
  context: Record<string, unknown> = {},
): void {
  const errorMessage = toError(error).message;
  logger.error(
    { operation, error: errorMessage, ...context },
    `✗ ${operation} failed: ${errorMessage}`,
  );
}
