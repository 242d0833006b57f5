/**
 * Exchange Module - Error Types
 *
 * Typed error union for command exchanges.
 */

export type ExchangeError =
  | { type: "NOT_CONNECTED"; command: string; message: string }
  | { type: "WRITE_FAILED"; command: string; message: string }
  | { type: "NO_REPLY"; command: string; message: string; timeoutMs: number }
  | { type: "DISCONNECTED"; command: string; message: string };

// =============================================================================
// Error Factory Functions
// =============================================================================

export function notConnected(command: string): ExchangeError {
  return {
    type: "NOT_CONNECTED",
    command,
    message: "Cooker not connected and reconnect failed",
  };
}

export function writeFailed(command: string, message: string): ExchangeError {
  return { type: "WRITE_FAILED", command, message };
}

export function noReply(command: string, timeoutMs: number): ExchangeError {
  return {
    type: "NO_REPLY",
    command,
    message: `No reply within ${timeoutMs}ms`,
    timeoutMs,
  };
}

export function disconnected(command: string): ExchangeError {
  return {
    type: "DISCONNECTED",
    command,
    message: "Link lost during exchange; reply discarded",
  };
}

/**
 * Format error for logging/display.
 */
export function formatExchangeError(error: ExchangeError): string {
  const command = JSON.stringify(error.command);
  switch (error.type) {
    case "NOT_CONNECTED":
      return `${command}: ${error.message}`;
    case "WRITE_FAILED":
      return `${command}: write failed: ${error.message}`;
    case "NO_REPLY":
      return `${command}: ${error.message}`;
    case "DISCONNECTED":
      return `${command}: ${error.message}`;
  }
}
