/**
 * Connection Module - Public API
 */

// Types
export type {
  ConnectionOptions,
  ConnectionState,
  ConnectionStateListener,
} from "./schema.js";
export {
  DEFAULT_CONNECT_ATTEMPTS,
  DEFAULT_CONNECT_TIMEOUT_MS,
  DEFAULT_CONNECTION_OPTIONS,
  RECONNECT_ATTEMPTS,
  RECONNECT_TIMEOUT_MS,
} from "./schema.js";

// Errors
export type { ConnectionError } from "./errors.js";
export { formatConnectionError } from "./errors.js";

// Service
export { ConnectionManager } from "./service.js";
