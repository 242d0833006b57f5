/**
 * API Module - Request Schemas
 */
import { z } from "zod";

import {
  TemperatureSetpointSchema,
  TemperatureUnitSchema,
  TimerMinutesSchema,
} from "../protocol/index.js";

export const APP_VERSION = "1.0.0";

/** Upper bound for a scan requested over HTTP */
export const MAX_SCAN_TIMEOUT_MS = 60_000;

export const ConnectBodySchema = z.object({
  attempts: z.number().int().min(1).max(10).optional(),
  timeoutMs: z.number().int().positive().max(60_000).optional(),
});

export const TemperatureBodySchema = z.object({
  celsius: TemperatureSetpointSchema,
});

export const TimerBodySchema = z.object({
  minutes: TimerMinutesSchema,
});

export const UnitBodySchema = z.object({
  unit: TemperatureUnitSchema,
});

export const DevicesQuerySchema = z.object({
  timeoutMs: z.coerce
    .number()
    .int()
    .positive()
    .max(MAX_SCAN_TIMEOUT_MS)
    .optional(),
});

/**
 * What the API needs from the status monitor.
 */
export type MonitorView = Readonly<{
  getState(): Readonly<{ isRunning: boolean; lastPollTime: number }>;
}>;
