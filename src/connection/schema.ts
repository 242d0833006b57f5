/**
 * Connection Module - Schemas and Types
 */

/**
 * Link state. Only ConnectionManager performs transitions.
 */
export type ConnectionState = "disconnected" | "connecting" | "connected";

export type ConnectionStateListener = (
  state: ConnectionState,
  previous: ConnectionState,
) => void;

/**
 * Timing knobs for connection establishment.
 */
export type ConnectionOptions = Readonly<{
  /** Direct address lookup bound before falling back to a scan */
  lookupTimeoutMs: number;
  /** Fallback scan bound */
  scanTimeoutMs: number;
  /** The BLE stack needs at least this long to open a link */
  linkTimeoutFloorMs: number;
  /** Fixed wait between failed attempts */
  backoffMs: number;
  /** Bound for subscribe/unsubscribe/disconnect calls */
  gattTimeoutMs: number;
}>;

export const DEFAULT_CONNECT_ATTEMPTS = 3;
export const DEFAULT_CONNECT_TIMEOUT_MS = 10_000;

/** Single-attempt reconnect used before a command or refresh */
export const RECONNECT_ATTEMPTS = 1;
export const RECONNECT_TIMEOUT_MS = 5_000;

export const DEFAULT_CONNECTION_OPTIONS: ConnectionOptions = {
  lookupTimeoutMs: 2_000,
  scanTimeoutMs: 5_000,
  linkTimeoutFloorMs: 10_000,
  backoffMs: 2_000,
  gattTimeoutMs: 5_000,
};
