/**
 * Exchange Module - Command Serializer
 *
 * One command in flight per cooker. Callers queue FIFO; each exchange
 * writes its command, collects the reply through the notification sink
 * and always runs its cleanup before the next caller proceeds.
 */
import { type Result, err, ok } from "neverthrow";

import {
  type ConnectionManager,
  RECONNECT_ATTEMPTS,
  RECONNECT_TIMEOUT_MS,
} from "../connection/index.js";
import { createLogger } from "../logger.js";
import { decodeReply } from "./accumulator.js";
import {
  type ExchangeError,
  disconnected,
  formatExchangeError,
  noReply,
  notConnected,
  writeFailed,
} from "./errors.js";
import { FifoLock } from "./lock.js";
import { PendingExchange } from "./pending.js";
import {
  type CommandClass,
  type CompletionPolicies,
  type CompletionPolicy,
  DEFAULT_COMPLETION_POLICIES,
  DIRECT_READ_TIMEOUT_MS,
  type ExchangeReply,
} from "./schema.js";

const log = createLogger("exchange");

const encoder = new TextEncoder();

export class CommandSerializer {
  private readonly lock = new FifoLock();
  private current: PendingExchange | null = null;

  constructor(
    private readonly connection: ConnectionManager,
    private readonly policies: CompletionPolicies = DEFAULT_COMPLETION_POLICIES,
  ) {
    connection.setNotificationSink(this.handleNotification);
    connection.onStateChange((state) => {
      if (state === "disconnected") {
        this.current?.abort("link lost");
      }
    });
  }

  /** Callers holding or waiting for the exchange slot */
  get queueLength(): number {
    return this.lock.queueLength;
  }

  private readonly handleNotification = (data: Uint8Array): void => {
    const exchange = this.current;
    if (!exchange || exchange.isSettled) {
      log.debug({ bytes: data.length }, "Notification outside an exchange dropped");
      return;
    }
    exchange.deliver(data);
  };

  /**
   * Send one encoded command and wait for its reply.
   *
   * @param command - Wire text, terminator included
   * @param commandClass - Selects the completion policy
   * @param timeoutMs - Overrides the policy's overall timeout
   */
  execute(
    command: string,
    commandClass: CommandClass,
    timeoutMs?: number,
  ): Promise<Result<ExchangeReply, ExchangeError>> {
    const base = this.policies[commandClass];
    const policy: CompletionPolicy =
      timeoutMs === undefined ? base : { ...base, timeoutMs };

    return this.lock.run(() => this.runExchange(command, policy));
  }

  private async runExchange(
    command: string,
    policy: CompletionPolicy,
  ): Promise<Result<ExchangeReply, ExchangeError>> {
    const label = command.trim();

    const ready = await this.ensureConnected(label);
    if (ready.isErr()) return err(ready.error);

    const generation = this.connection.generation;
    const exchange = new PendingExchange(label, policy);
    this.current = exchange;

    try {
      const result = await this.exchangeOnce(command, exchange, generation);
      if (result.isErr()) {
        log.debug({ error: formatExchangeError(result.error) }, "Exchange failed");
      } else {
        log.debug(
          {
            command: label,
            reply: result.value.text,
            source: result.value.source,
            fragments: result.value.fragmentCount,
          },
          "Exchange complete",
        );
      }
      return result;
    } finally {
      exchange.dispose();
      if (this.current === exchange) {
        this.current = null;
      }
    }
  }

  private async ensureConnected(
    label: string,
  ): Promise<Result<void, ExchangeError>> {
    if (this.connection.verifyLink()) return ok(undefined);

    log.info({ command: label }, "Link down, reconnecting before command");
    const reconnected = await this.connection.connect(
      RECONNECT_ATTEMPTS,
      RECONNECT_TIMEOUT_MS,
    );
    return reconnected.isOk() ? ok(undefined) : err(notConnected(label));
  }

  private linkChanged(generation: number): boolean {
    return (
      !this.connection.isConnected || this.connection.generation !== generation
    );
  }

  private async exchangeOnce(
    command: string,
    exchange: PendingExchange,
    generation: number,
  ): Promise<Result<ExchangeReply, ExchangeError>> {
    const label = exchange.command;
    const { timeoutMs } = exchange.policy;

    const written = await this.connection.write(encoder.encode(command), timeoutMs);
    if (written.isErr()) {
      return err(
        this.linkChanged(generation)
          ? disconnected(label)
          : writeFailed(label, written.error.message),
      );
    }

    const outcome = await exchange.outcome;

    if (outcome.kind === "aborted") {
      return err(disconnected(label));
    }

    let reply: ExchangeReply;
    if (outcome.kind === "empty") {
      const read = await this.connection.readDirect(DIRECT_READ_TIMEOUT_MS);
      if (read.isErr()) {
        return err(
          this.linkChanged(generation)
            ? disconnected(label)
            : noReply(label, timeoutMs),
        );
      }
      const decoded = decodeReply(read.value);
      reply = {
        command: label,
        text: decoded.text,
        wellFormed: decoded.wellFormed,
        fragmentCount: 0,
        source: "direct-read",
        generation,
      };
    } else {
      reply = {
        command: label,
        text: outcome.reply.text,
        wellFormed: outcome.reply.wellFormed,
        fragmentCount: outcome.fragmentCount,
        source: outcome.source,
        generation,
      };
    }

    if (this.linkChanged(generation)) {
      return err(disconnected(label));
    }
    if (reply.text === "") {
      return err(noReply(label, timeoutMs));
    }
    return ok(reply);
  }
}
