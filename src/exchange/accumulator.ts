/**
 * Exchange Module - Response Accumulator
 *
 * Collects the notification fragments of one exchange and decides, from
 * arrival times alone, when the reply is complete. Holds no timers; the
 * caller passes the clock in, so arrival sequences can be replayed in tests.
 */
import type { CompletionPolicy } from "./schema.js";

const strictDecoder = new TextDecoder("utf-8", { fatal: true });
const lenientDecoder = new TextDecoder("utf-8");

/**
 * Decoded reply text. `wellFormed` is false when the bytes were not UTF-8.
 */
export type DecodedReply = Readonly<{ text: string; wellFormed: boolean }>;

/**
 * Decode reply bytes, trimming surrounding whitespace and line endings.
 */
export function decodeReply(bytes: Uint8Array): DecodedReply {
  try {
    return { text: strictDecoder.decode(bytes).trim(), wellFormed: true };
  } catch {
    return { text: lenientDecoder.decode(bytes).trim(), wellFormed: false };
  }
}

function fragmentKey(fragment: Uint8Array): string {
  return Buffer.from(fragment).toString("hex");
}

export class ResponseAccumulator {
  private fragments: Uint8Array[] = [];
  private seen = new Set<string>();
  private lastArrival: number | null = null;

  constructor(
    readonly policy: CompletionPolicy,
    readonly startedAt: number,
  ) {}

  /**
   * Add a fragment. Empty fragments and exact repeats of an earlier
   * fragment are ignored.
   *
   * @returns true when the fragment was buffered
   */
  push(fragment: Uint8Array, now: number): boolean {
    if (fragment.length === 0) return false;

    const key = fragmentKey(fragment);
    if (this.seen.has(key)) return false;

    this.seen.add(key);
    this.fragments.push(fragment.slice());
    this.lastArrival = now;
    return true;
  }

  get fragmentCount(): number {
    return this.fragments.length;
  }

  get lastArrivalAt(): number | null {
    return this.lastArrival;
  }

  /**
   * Earliest time the reply counts as complete: the silence window after
   * the last fragment, but never before the minimum wait. Null until the
   * first fragment arrives.
   */
  completesAt(): number | null {
    if (this.lastArrival === null) return null;
    return Math.max(
      this.lastArrival + this.policy.silenceWindowMs,
      this.startedAt + this.policy.minimumWaitMs,
    );
  }

  isComplete(now: number): boolean {
    const at = this.completesAt();
    return at !== null && now >= at;
  }

  /** Fragments concatenated in arrival order */
  bytes(): Uint8Array {
    return Buffer.concat(this.fragments);
  }

  assemble(): DecodedReply {
    return decodeReply(this.bytes());
  }

  /** Drop all buffered state */
  clear(): void {
    this.fragments = [];
    this.seen = new Set();
    this.lastArrival = null;
  }
}
