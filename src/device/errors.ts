/**
 * Device Module - Error Types
 *
 * Typed error union for identity validation.
 */

export type DeviceError = {
  readonly type: "INVALID_ADDRESS";
  readonly input: string;
  readonly message: string;
};

export function invalidAddress(input: string, message: string): DeviceError {
  return { type: "INVALID_ADDRESS", input, message };
}

/**
 * Format error for logging/display.
 */
export function formatDeviceError(error: DeviceError): string {
  return `Invalid address "${error.input}": ${error.message}`;
}
