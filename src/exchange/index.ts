/**
 * Exchange Module - Public API
 */

// Types
export type {
  CommandClass,
  CompletionPolicies,
  CompletionPolicy,
  ExchangeReply,
  ReplySource,
} from "./schema.js";
export {
  DEFAULT_COMPLETION_POLICIES,
  DIRECT_READ_TIMEOUT_MS,
} from "./schema.js";

// Errors
export type { ExchangeError } from "./errors.js";
export { formatExchangeError } from "./errors.js";

// Components
export { type DecodedReply, ResponseAccumulator, decodeReply } from "./accumulator.js";
export { CommandSerializer } from "./serializer.js";
