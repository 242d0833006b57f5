/**
 * Connection Module - Error Types
 *
 * Typed error union for link operations. Transport exceptions are caught
 * at this boundary and never propagate further.
 */

export type ConnectionError =
  | { type: "NOT_CONNECTED"; message: string }
  | { type: "LINK_TIMEOUT"; message: string; timeoutMs: number }
  | { type: "LINK_FAILED"; message: string; cause?: Error }
  | { type: "ATTEMPTS_EXHAUSTED"; message: string; attempts: number }
  | { type: "WRITE_FAILED"; message: string; cause?: Error }
  | { type: "READ_FAILED"; message: string; cause?: Error };

// =============================================================================
// Error Factory Functions
// =============================================================================

export function notConnected(message = "Cooker not connected"): ConnectionError {
  return { type: "NOT_CONNECTED", message };
}

export function linkTimeout(message: string, timeoutMs: number): ConnectionError {
  return { type: "LINK_TIMEOUT", message, timeoutMs };
}

export function linkFailed(message: string, cause?: Error): ConnectionError {
  return cause !== undefined
    ? { type: "LINK_FAILED", message, cause }
    : { type: "LINK_FAILED", message };
}

export function attemptsExhausted(
  attempts: number,
  last: ConnectionError | null,
): ConnectionError {
  const detail = last ? `: ${formatConnectionError(last)}` : "";
  return {
    type: "ATTEMPTS_EXHAUSTED",
    message: `Failed after ${attempts} attempt(s)${detail}`,
    attempts,
  };
}

export function writeFailed(message: string, cause?: Error): ConnectionError {
  return cause !== undefined
    ? { type: "WRITE_FAILED", message, cause }
    : { type: "WRITE_FAILED", message };
}

export function readFailed(message: string, cause?: Error): ConnectionError {
  return cause !== undefined
    ? { type: "READ_FAILED", message, cause }
    : { type: "READ_FAILED", message };
}

/**
 * Format error for logging/display.
 */
export function formatConnectionError(error: ConnectionError): string {
  switch (error.type) {
    case "NOT_CONNECTED":
      return error.message;
    case "LINK_TIMEOUT":
      return `Timeout after ${error.timeoutMs}ms: ${error.message}`;
    case "LINK_FAILED":
      return `Link failed: ${error.message}`;
    case "ATTEMPTS_EXHAUSTED":
      return error.message;
    case "WRITE_FAILED":
      return `Write failed: ${error.message}`;
    case "READ_FAILED":
      return `Read failed: ${error.message}`;
  }
}
