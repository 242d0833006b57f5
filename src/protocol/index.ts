/**
 * Protocol Module - Public API
 */

// Types
export type {
  AcknowledgementOutcome,
  DeviceStatus,
  StatusField,
  TemperatureUnit,
} from "./schema.js";
export {
  REFRESH_SEQUENCE,
  START_COMMAND,
  STATUS_QUERIES,
  STOP_COMMAND,
  TEMPERATURE_MAX_C,
  TEMPERATURE_MIN_C,
  TIMER_MAX_MINUTES,
  TemperatureSetpointSchema,
  TemperatureUnitSchema,
  TimerMinutesSchema,
} from "./schema.js";

// Errors
export type { ProtocolError } from "./errors.js";
export { formatProtocolError } from "./errors.js";

// Transformations
export {
  applyStatusReply,
  celsiusToFahrenheit,
  classifyAcknowledgement,
  decodeRunState,
  decodeTemperature,
  decodeTimer,
  decodeUnit,
  encodeCommand,
  fahrenheitToCelsius,
  setTemperatureCommand,
  setTimerCommand,
  setUnitCommand,
  validateTemperature,
  validateTimer,
} from "./transform.js";
