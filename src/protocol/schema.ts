/**
 * Protocol Module - Schemas and Types
 *
 * The cooker speaks short carriage-return terminated text commands over a
 * single characteristic. Replies are bare values ("running", "55.5", "c").
 */
import { z } from "zod";

// =============================================================================
// Status
// =============================================================================

export const TemperatureUnitSchema = z.enum(["C", "F"]);
export type TemperatureUnit = z.infer<typeof TemperatureUnitSchema>;

/**
 * Last known cooker state. Temperatures are always Celsius; `unit` is the
 * cooker's display unit and decides how raw readings are converted.
 */
export type DeviceStatus = Readonly<{
  currentTemperature?: number;
  targetTemperature?: number;
  timerMinutes?: number;
  isRunning?: boolean;
  unit?: TemperatureUnit;
}>;

// =============================================================================
// Commands
// =============================================================================

export const COMMAND_TERMINATOR = "\r";

/** Query text per status field */
export const STATUS_QUERIES = {
  unit: "read unit",
  runState: "status",
  targetTemperature: "read set temp",
  currentTemperature: "read temp",
  timer: "read timer",
} as const;

export type StatusField = keyof typeof STATUS_QUERIES;

/**
 * Round trips of one refresh cycle, in order. The unit comes first so the
 * temperature readings after it are converted correctly.
 */
export const REFRESH_SEQUENCE: ReadonlyArray<StatusField> = [
  "unit",
  "runState",
  "targetTemperature",
  "currentTemperature",
];

export const START_COMMAND = "start";
export const STOP_COMMAND = "stop";

// =============================================================================
// Input Limits
// =============================================================================

export const TEMPERATURE_MIN_C = 0;
export const TEMPERATURE_MAX_C = 100;
export const TIMER_MAX_MINUTES = 999;

export const TemperatureSetpointSchema = z
  .number()
  .finite()
  .min(TEMPERATURE_MIN_C)
  .max(TEMPERATURE_MAX_C);

export const TimerMinutesSchema = z.number().int().min(0).max(TIMER_MAX_MINUTES);

// =============================================================================
// Write Outcomes
// =============================================================================

/**
 * How the cooker answered a write command.
 * Only Acknowledged counts as success.
 */
export type AcknowledgementOutcome =
  | { kind: "Acknowledged"; reply: string }
  | { kind: "NoReply" }
  | { kind: "Malformed"; reply: string };
