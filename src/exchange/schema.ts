/**
 * Exchange Module - Schemas and Types
 *
 * The cooker's replies carry no terminator or length, so a reply is
 * considered complete by timing alone. The thresholds live here as named,
 * per-class policies.
 */

/**
 * Reads arrive as several notifications; writes are acknowledged with one.
 */
export type CommandClass = "status" | "acknowledge";

/**
 * When an exchange's reply is considered complete.
 */
export type CompletionPolicy = Readonly<{
  /** Quiet time after the last fragment that ends the reply */
  silenceWindowMs: number;
  /** Earliest completion, measured from the start of the exchange */
  minimumWaitMs: number;
  /** Hard bound on the whole exchange */
  timeoutMs: number;
}>;

export type CompletionPolicies = Readonly<Record<CommandClass, CompletionPolicy>>;

export const DEFAULT_COMPLETION_POLICIES: CompletionPolicies = {
  status: { silenceWindowMs: 3_000, minimumWaitMs: 1_500, timeoutMs: 8_000 },
  acknowledge: { silenceWindowMs: 1_000, minimumWaitMs: 500, timeoutMs: 5_000 },
};

/** Bound on the direct characteristic read used when no fragment arrived */
export const DIRECT_READ_TIMEOUT_MS = 2_000;

/**
 * How a reply was obtained.
 * - silence: completion policy satisfied
 * - partial-timeout: hard timeout hit with some fragments buffered
 * - direct-read: no notifications; value read from the characteristic
 */
export type ReplySource = "silence" | "partial-timeout" | "direct-read";

/**
 * The assembled reply of one exchange.
 */
export type ExchangeReply = Readonly<{
  command: string;
  /** Decoded and trimmed reply text */
  text: string;
  /** False when the bytes were not valid UTF-8 */
  wellFormed: boolean;
  fragmentCount: number;
  source: ReplySource;
  /** Connection generation the reply was received on */
  generation: number;
}>;
