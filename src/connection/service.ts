/**
 * Connection Module - Service Layer
 *
 * Owns the BLE link to one cooker: connect with retry, teardown,
 * link-loss handling and notification routing. Every transport call is
 * bounded and its failure converted to a ConnectionError.
 */
import { type Result, err, ok } from "neverthrow";

import type { DeviceIdentity } from "../device/index.js";
import { createLogger } from "../logger.js";
import {
  ANOVA_CHARACTERISTIC_UUID,
  type BleTransport,
  type NotificationListener,
} from "../transport/index.js";
import { TimeoutError, sleep, toError, withTimeout } from "../utils/timing.js";
import {
  type ConnectionError,
  attemptsExhausted,
  formatConnectionError,
  linkFailed,
  linkTimeout,
  notConnected,
  readFailed,
  writeFailed,
} from "./errors.js";
import {
  type ConnectionOptions,
  type ConnectionState,
  type ConnectionStateListener,
  DEFAULT_CONNECT_ATTEMPTS,
  DEFAULT_CONNECT_TIMEOUT_MS,
  DEFAULT_CONNECTION_OPTIONS,
} from "./schema.js";

const log = createLogger("connection");

export class ConnectionManager {
  private readonly options: ConnectionOptions;
  private readonly listeners = new Set<ConnectionStateListener>();

  private currentState: ConnectionState = "disconnected";
  private currentGeneration = 0;
  private subscribed = false;
  private notificationSink: NotificationListener | null = null;
  private inFlightConnect: Promise<Result<true, ConnectionError>> | null = null;
  private cancelRequested = false;

  constructor(
    private readonly transport: BleTransport,
    readonly identity: DeviceIdentity,
    options: Partial<ConnectionOptions> = {},
  ) {
    this.options = { ...DEFAULT_CONNECTION_OPTIONS, ...options };
    this.transport.onDisconnect(this.handleLinkLost);
  }

  // ===========================================================================
  // State
  // ===========================================================================

  get state(): ConnectionState {
    return this.currentState;
  }

  /**
   * Incremented on every successful connect. Results tagged with an older
   * generation belong to a link that no longer exists.
   */
  get generation(): number {
    return this.currentGeneration;
  }

  get isConnected(): boolean {
    return this.currentState === "connected" && this.transport.isConnected();
  }

  /**
   * Re-check the transport's own view of the link; drop to disconnected if
   * it closed without telling us.
   */
  verifyLink(): boolean {
    if (this.currentState === "connected" && !this.transport.isConnected()) {
      log.warn("Transport reports closed link; marking disconnected");
      this.transition("disconnected");
    }
    return this.isConnected;
  }

  onStateChange(listener: ConnectionStateListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  /**
   * Route notifications to a single consumer (the command serializer).
   */
  setNotificationSink(sink: NotificationListener | null): void {
    this.notificationSink = sink;
  }

  private transition(next: ConnectionState): void {
    const previous = this.currentState;
    if (previous === next) return;
    this.currentState = next;
    log.info({ from: previous, to: next }, `Connection ${previous} → ${next}`);
    for (const listener of [...this.listeners]) {
      listener(next, previous);
    }
  }

  private readonly handleLinkLost = (): void => {
    this.subscribed = false;
    if (this.currentState !== "connected") return;
    log.warn({ address: this.identity.address }, "Link lost");
    this.transition("disconnected");
  };

  private readonly handleNotification = (data: Uint8Array): void => {
    if (this.notificationSink) {
      this.notificationSink(data);
    } else {
      log.debug({ bytes: data.length }, "Notification with no consumer dropped");
    }
  };

  // ===========================================================================
  // Connect / Disconnect
  // ===========================================================================

  /**
   * Connect with retry. Concurrent callers share one in-flight attempt.
   *
   * @param maxAttempts - Attempts before giving up
   * @param timeoutMs - Per-attempt link timeout (never below the stack floor)
   */
  connect(
    maxAttempts = DEFAULT_CONNECT_ATTEMPTS,
    timeoutMs = DEFAULT_CONNECT_TIMEOUT_MS,
  ): Promise<Result<true, ConnectionError>> {
    if (this.verifyLink()) {
      return Promise.resolve(ok(true));
    }
    if (!this.inFlightConnect) {
      this.inFlightConnect = this.connectWithRetry(maxAttempts, timeoutMs).finally(
        () => {
          this.inFlightConnect = null;
        },
      );
    }
    return this.inFlightConnect;
  }

  private async connectWithRetry(
    maxAttempts: number,
    timeoutMs: number,
  ): Promise<Result<true, ConnectionError>> {
    const attempts = Math.max(1, Math.floor(maxAttempts));
    const { address } = this.identity;
    let lastError: ConnectionError | null = null;

    this.cancelRequested = false;
    this.transition("connecting");

    for (let attempt = 1; attempt <= attempts; attempt++) {
      if (this.cancelRequested) break;
      log.info({ address, attempt, attempts }, "Connecting to cooker...");

      const result = await this.attemptOnce(timeoutMs);
      if (result.isOk()) {
        if (this.cancelRequested) {
          await this.releaseLink();
          break;
        }
        this.currentGeneration += 1;
        this.transition("connected");
        log.info(
          { address, attempt, generation: this.currentGeneration },
          "Connected to cooker",
        );
        return ok(true);
      }

      lastError = result.error;
      log.warn(
        { address, attempt, attempts, error: formatConnectionError(result.error) },
        "Connection attempt failed",
      );

      if (attempt < attempts && !this.cancelRequested) {
        await sleep(this.options.backoffMs);
      }
    }

    this.subscribed = false;
    this.transition("disconnected");

    if (this.cancelRequested) {
      log.info({ address }, "Connect cancelled by disconnect");
      return err(notConnected("Connect cancelled by disconnect"));
    }

    const failure = attemptsExhausted(attempts, lastError);
    log.error({ address, error: failure.message }, "Giving up on connection");
    return err(failure);
  }

  /**
   * One link attempt. A failed attempt closes whatever part of the link
   * it managed to open.
   */
  private async attemptOnce(
    timeoutMs: number,
  ): Promise<Result<void, ConnectionError>> {
    const result = await this.openLink(timeoutMs);
    if (result.isErr()) {
      await this.releaseLink();
    }
    return result;
  }

  private async openLink(
    timeoutMs: number,
  ): Promise<Result<void, ConnectionError>> {
    await this.resolveDevice();

    const linkTimeoutMs = Math.max(timeoutMs, this.options.linkTimeoutFloorMs);
    try {
      await withTimeout(
        this.transport.connect(this.identity.address, linkTimeoutMs),
        linkTimeoutMs,
        "Link open",
      );
    } catch (error) {
      return err(
        error instanceof TimeoutError
          ? linkTimeout(error.message, linkTimeoutMs)
          : linkFailed(toError(error).message, toError(error)),
      );
    }

    if (!this.transport.isConnected()) {
      return err(linkFailed("Transport reports closed link after connect"));
    }

    await this.subscribeNotifications();

    if (!this.transport.isConnected()) {
      return err(linkFailed("Link dropped during setup"));
    }
    return ok(undefined);
  }

  /**
   * Direct lookup first, then a broader scan. A miss is only a warning:
   * the link attempt goes ahead anyway.
   */
  private async resolveDevice(): Promise<void> {
    const { address } = this.identity;
    const { lookupTimeoutMs, scanTimeoutMs } = this.options;

    try {
      const found = await withTimeout(
        this.transport.findDevice(address, lookupTimeoutMs),
        lookupTimeoutMs + 1_000,
        "Direct lookup",
      );
      if (found) return;
    } catch (error) {
      log.debug({ error: toError(error).message }, "Direct lookup failed");
    }

    try {
      const seen = await withTimeout(
        this.transport.scan(scanTimeoutMs),
        scanTimeoutMs + 1_000,
        "Fallback scan",
      );
      const target = address.replace(/:/g, "");
      const present = seen.some(
        (p) => p.address.toUpperCase().replace(/[:-]/g, "") === target,
      );
      if (present) return;
      log.warn({ address }, "Cooker not found in scan, trying direct connection anyway");
    } catch (error) {
      log.warn(
        { address, error: toError(error).message },
        "Fallback scan failed, trying direct connection anyway",
      );
    }
  }

  private async subscribeNotifications(): Promise<void> {
    try {
      await withTimeout(
        this.transport.subscribe(ANOVA_CHARACTERISTIC_UUID, this.handleNotification),
        this.options.gattTimeoutMs,
        "Subscribe",
      );
      this.subscribed = true;
    } catch (error) {
      this.subscribed = false;
      log.warn(
        { error: toError(error).message },
        "Could not enable notifications; replies will come from direct reads",
      );
    }
  }

  private async releaseLink(): Promise<void> {
    this.subscribed = false;
    try {
      await withTimeout(
        this.transport.disconnect(),
        this.options.gattTimeoutMs,
        "Release",
      );
    } catch (error) {
      log.debug({ error: toError(error).message }, "Release after failed attempt failed");
    }
  }

  /**
   * Best-effort teardown. Always ends disconnected; a no-op when already
   * disconnected. A connect in flight is cancelled and awaited first.
   */
  async disconnect(): Promise<void> {
    const pending = this.inFlightConnect;
    if (pending) {
      this.cancelRequested = true;
      await pending;
    }

    if (this.currentState === "disconnected" && !this.transport.isConnected()) {
      return;
    }

    const { gattTimeoutMs } = this.options;

    if (this.subscribed) {
      try {
        await withTimeout(
          this.transport.unsubscribe(ANOVA_CHARACTERISTIC_UUID),
          gattTimeoutMs,
          "Unsubscribe",
        );
      } catch (error) {
        log.debug({ error: toError(error).message }, "Unsubscribe failed, ignoring");
      }
    }

    try {
      await withTimeout(this.transport.disconnect(), gattTimeoutMs, "Disconnect");
    } catch (error) {
      log.warn({ error: toError(error).message }, "Transport disconnect failed");
    }

    this.subscribed = false;
    this.transition("disconnected");
    log.info({ address: this.identity.address }, "Disconnected from cooker");
  }

  // ===========================================================================
  // Characteristic I/O
  // ===========================================================================

  /**
   * Acknowledged write to the cooker characteristic.
   */
  async write(
    data: Uint8Array,
    timeoutMs: number,
  ): Promise<Result<void, ConnectionError>> {
    if (!this.verifyLink()) return err(notConnected());

    try {
      await withTimeout(
        this.transport.write(ANOVA_CHARACTERISTIC_UUID, data, true),
        timeoutMs,
        "Write",
      );
      return ok(undefined);
    } catch (error) {
      this.verifyLink();
      return err(writeFailed(toError(error).message, toError(error)));
    }
  }

  /**
   * Read the characteristic value directly, bypassing notifications.
   */
  async readDirect(
    timeoutMs: number,
  ): Promise<Result<Uint8Array, ConnectionError>> {
    if (!this.verifyLink()) return err(notConnected());

    try {
      const data = await withTimeout(
        this.transport.read(ANOVA_CHARACTERISTIC_UUID),
        timeoutMs,
        "Direct read",
      );
      return ok(data);
    } catch (error) {
      this.verifyLink();
      return err(readFailed(toError(error).message, toError(error)));
    }
  }
}
