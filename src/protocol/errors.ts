/**
 * Protocol Module - Error Types
 */

export type ProtocolError = {
  type: "OUT_OF_RANGE";
  field: "temperature" | "timer";
  value: number;
  message: string;
};

export function outOfRange(
  field: "temperature" | "timer",
  value: number,
  message: string,
): ProtocolError {
  return { type: "OUT_OF_RANGE", field, value, message };
}

/**
 * Format error for logging/display.
 */
export function formatProtocolError(error: ProtocolError): string {
  switch (error.type) {
    case "OUT_OF_RANGE":
      return `Invalid ${error.field} ${error.value}: ${error.message}`;
  }
}
