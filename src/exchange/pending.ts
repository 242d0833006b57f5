/**
 * Exchange Module - Pending Exchange
 *
 * One command's wait for its reply. Owns the accumulator and the two
 * timers (completion check, hard deadline); settles exactly once.
 */
import { createLogger } from "../logger.js";
import { type DecodedReply, ResponseAccumulator } from "./accumulator.js";
import type { CompletionPolicy } from "./schema.js";

const log = createLogger("exchange");

export type ExchangeOutcome =
  | {
      kind: "reply";
      source: "silence" | "partial-timeout";
      reply: DecodedReply;
      fragmentCount: number;
    }
  | { kind: "empty" }
  | { kind: "aborted"; reason: string };

export class PendingExchange {
  readonly outcome: Promise<ExchangeOutcome>;

  private readonly accumulator: ResponseAccumulator;
  private completionTimer: ReturnType<typeof setTimeout> | null = null;
  private deadlineTimer: ReturnType<typeof setTimeout> | null = null;
  private settled = false;
  private resolveOutcome: (outcome: ExchangeOutcome) => void = () => {};

  constructor(
    readonly command: string,
    readonly policy: CompletionPolicy,
  ) {
    this.accumulator = new ResponseAccumulator(policy, Date.now());
    this.outcome = new Promise<ExchangeOutcome>((resolve) => {
      this.resolveOutcome = resolve;
    });
    this.deadlineTimer = setTimeout(this.handleDeadline, policy.timeoutMs);
  }

  get isSettled(): boolean {
    return this.settled;
  }

  /**
   * Feed one notification payload into the exchange.
   */
  deliver(fragment: Uint8Array): void {
    if (this.settled) {
      log.debug({ command: this.command }, "Late fragment ignored");
      return;
    }

    const now = Date.now();
    if (!this.accumulator.push(fragment, now)) {
      log.debug({ command: this.command }, "Duplicate or empty fragment ignored");
      return;
    }

    log.debug(
      { command: this.command, fragments: this.accumulator.fragmentCount },
      "Fragment buffered",
    );
    this.armCompletionCheck(now);
  }

  /**
   * Settle immediately without a reply (link lost).
   */
  abort(reason: string): void {
    if (this.settled) return;
    log.debug({ command: this.command, reason }, "Exchange aborted");
    this.settle({ kind: "aborted", reason });
  }

  /**
   * Release timers and buffered fragments. Safe to call more than once.
   */
  dispose(): void {
    this.settled = true;
    this.clearTimers();
    this.accumulator.clear();
  }

  private armCompletionCheck(now: number): void {
    const completesAt = this.accumulator.completesAt();
    if (completesAt === null) return;

    if (this.completionTimer) clearTimeout(this.completionTimer);
    this.completionTimer = setTimeout(
      this.handleCompletionCheck,
      Math.max(0, completesAt - now),
    );
  }

  private readonly handleCompletionCheck = (): void => {
    this.completionTimer = null;
    if (this.settled) return;

    const now = Date.now();
    if (this.accumulator.isComplete(now)) {
      this.settleWithReply("silence");
    } else {
      this.armCompletionCheck(now);
    }
  };

  private readonly handleDeadline = (): void => {
    this.deadlineTimer = null;
    if (this.settled) return;

    if (this.accumulator.fragmentCount > 0) {
      log.debug(
        { command: this.command, fragments: this.accumulator.fragmentCount },
        "Deadline reached with partial reply",
      );
      this.settleWithReply("partial-timeout");
    } else {
      log.debug({ command: this.command }, "Deadline reached with no fragments");
      this.settle({ kind: "empty" });
    }
  };

  private settleWithReply(source: "silence" | "partial-timeout"): void {
    this.settle({
      kind: "reply",
      source,
      reply: this.accumulator.assemble(),
      fragmentCount: this.accumulator.fragmentCount,
    });
  }

  private settle(outcome: ExchangeOutcome): void {
    this.settled = true;
    this.clearTimers();
    this.resolveOutcome(outcome);
  }

  private clearTimers(): void {
    if (this.completionTimer) {
      clearTimeout(this.completionTimer);
      this.completionTimer = null;
    }
    if (this.deadlineTimer) {
      clearTimeout(this.deadlineTimer);
      this.deadlineTimer = null;
    }
  }
}
