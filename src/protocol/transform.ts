/**
 * Protocol Module - Pure Transformations
 *
 * Command encoding and reply decoding. No side effects, no I/O.
 * Decoders return undefined for replies they cannot interpret; the caller
 * leaves the field as it was.
 */
import { type Result, err, ok } from "neverthrow";

import { type ProtocolError, outOfRange } from "./errors.js";
import {
  type AcknowledgementOutcome,
  COMMAND_TERMINATOR,
  type DeviceStatus,
  type StatusField,
  TemperatureSetpointSchema,
  type TemperatureUnit,
  TimerMinutesSchema,
} from "./schema.js";

// =============================================================================
// Unit Conversion
// =============================================================================

export function celsiusToFahrenheit(celsius: number): number {
  return (celsius * 9) / 5 + 32;
}

export function fahrenheitToCelsius(fahrenheit: number): number {
  return ((fahrenheit - 32) * 5) / 9;
}

// =============================================================================
// Encoding
// =============================================================================

/**
 * Wire form of a command.
 *
 * @example
 * encodeCommand("read temp") // "read temp\r"
 */
export function encodeCommand(command: string): string {
  return `${command}${COMMAND_TERMINATOR}`;
}

/**
 * Setpoint command in the cooker's display unit, one decimal place.
 *
 * @example
 * setTemperatureCommand(60, "F") // "set temp 140.0"
 */
export function setTemperatureCommand(
  celsius: number,
  unit: TemperatureUnit | undefined,
): string {
  const value = unit === "F" ? celsiusToFahrenheit(celsius) : celsius;
  return `set temp ${value.toFixed(1)}`;
}

export function setTimerCommand(minutes: number): string {
  return `set timer ${minutes}`;
}

export function setUnitCommand(unit: TemperatureUnit): string {
  return `set units ${unit}`;
}

// =============================================================================
// Input Validation
// =============================================================================

export function validateTemperature(
  celsius: number,
): Result<number, ProtocolError> {
  const parsed = TemperatureSetpointSchema.safeParse(celsius);
  return parsed.success
    ? ok(parsed.data)
    : err(outOfRange("temperature", celsius, "must be between 0 and 100 °C"));
}

export function validateTimer(minutes: number): Result<number, ProtocolError> {
  const parsed = TimerMinutesSchema.safeParse(minutes);
  return parsed.success
    ? ok(parsed.data)
    : err(outOfRange("timer", minutes, "must be whole minutes between 0 and 999"));
}

// =============================================================================
// Decoding
// =============================================================================

/**
 * "running" anywhere in the reply wins over "stopped"; neither leaves the
 * run state unknown.
 */
export function decodeRunState(reply: string): boolean | undefined {
  const normalized = reply.toLowerCase();
  if (normalized.includes("running")) return true;
  if (normalized.includes("stopped")) return false;
  return undefined;
}

export function decodeUnit(reply: string): TemperatureUnit {
  return reply.toLowerCase().includes("f") ? "F" : "C";
}

/**
 * Parse a temperature reading and normalize it to Celsius.
 *
 * @param unit - Unit known before this reading; "F" readings are converted
 */
export function decodeTemperature(
  reply: string,
  unit: TemperatureUnit | undefined,
): number | undefined {
  const stripped = reply.replace(/[^0-9.-]/g, "");
  if (stripped === "") return undefined;

  const value = Number(stripped);
  if (!Number.isFinite(value)) return undefined;

  return unit === "F" ? fahrenheitToCelsius(value) : value;
}

/**
 * Parse the minutes from a "read timer" reply such as "42 running".
 */
export function decodeTimer(reply: string): number | undefined {
  const match = /\d+/.exec(reply);
  return match ? Number.parseInt(match[0], 10) : undefined;
}

/**
 * Apply one status reply to a draft. Undecodable replies leave the draft
 * unchanged.
 */
export function applyStatusReply(
  draft: DeviceStatus,
  field: StatusField,
  reply: string,
): DeviceStatus {
  switch (field) {
    case "unit":
      return { ...draft, unit: decodeUnit(reply) };
    case "runState": {
      const isRunning = decodeRunState(reply);
      return isRunning === undefined ? draft : { ...draft, isRunning };
    }
    case "targetTemperature": {
      const targetTemperature = decodeTemperature(reply, draft.unit);
      return targetTemperature === undefined
        ? draft
        : { ...draft, targetTemperature };
    }
    case "currentTemperature": {
      const currentTemperature = decodeTemperature(reply, draft.unit);
      return currentTemperature === undefined
        ? draft
        : { ...draft, currentTemperature };
    }
    case "timer": {
      const timerMinutes = decodeTimer(reply);
      return timerMinutes === undefined ? draft : { ...draft, timerMinutes };
    }
  }
}

/**
 * Classify the reply to a write command.
 *
 * @param reply - Decoded reply, or null when nothing came back
 */
export function classifyAcknowledgement(
  reply: Readonly<{ text: string; wellFormed: boolean }> | null,
): AcknowledgementOutcome {
  if (reply === null || reply.text.trim() === "") {
    return { kind: "NoReply" };
  }
  if (!reply.wellFormed) {
    return { kind: "Malformed", reply: reply.text };
  }
  return { kind: "Acknowledged", reply: reply.text };
}
