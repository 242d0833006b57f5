/**
 * Cooker Module - Service Layer
 *
 * AnovaClient composes the connection manager, the command serializer and
 * the status protocol into the host-facing contract. One instance per
 * cooker; nothing here is shared between instances.
 */
import {
  ConnectionManager,
  type ConnectionState,
  DEFAULT_CONNECT_ATTEMPTS,
  DEFAULT_CONNECT_TIMEOUT_MS,
  RECONNECT_ATTEMPTS,
  RECONNECT_TIMEOUT_MS,
  formatConnectionError,
} from "../connection/index.js";
import type { DeviceIdentity } from "../device/index.js";
import { discoverDevices } from "../discovery/index.js";
import {
  CommandSerializer,
  DEFAULT_COMPLETION_POLICIES,
  formatExchangeError,
} from "../exchange/index.js";
import {
  createLogger,
  logOperationComplete,
  logOperationFailed,
  logOperationStart,
} from "../logger.js";
import {
  type AcknowledgementOutcome,
  type DeviceStatus,
  REFRESH_SEQUENCE,
  START_COMMAND,
  STATUS_QUERIES,
  STOP_COMMAND,
  type StatusField,
  type TemperatureUnit,
  applyStatusReply,
  classifyAcknowledgement,
  encodeCommand,
  formatProtocolError,
  setTemperatureCommand,
  setTimerCommand,
  setUnitCommand,
  validateTemperature,
  validateTimer,
} from "../protocol/index.js";
import type { BleTransport } from "../transport/index.js";
import { sleep } from "../utils/timing.js";
import {
  type AnovaClientOptions,
  type ConnectOptions,
  type CookerControl,
  DEFAULT_COMMAND_DELAY_MS,
} from "./schema.js";

const log = createLogger("cooker");

export class AnovaClient implements CookerControl {
  private readonly connection: ConnectionManager;
  private readonly serializer: CommandSerializer;
  private readonly commandDelayMs: number;
  private readonly refreshSequence: ReadonlyArray<StatusField>;

  private cached: DeviceStatus = {};
  private inFlightRefresh: Promise<boolean> | null = null;

  constructor(
    private readonly transport: BleTransport,
    readonly identity: DeviceIdentity,
    options: AnovaClientOptions = {},
  ) {
    this.connection = new ConnectionManager(transport, identity, options.connection);
    this.serializer = new CommandSerializer(
      this.connection,
      options.policies ?? DEFAULT_COMPLETION_POLICIES,
    );
    this.commandDelayMs = options.commandDelayMs ?? DEFAULT_COMMAND_DELAY_MS;
    this.refreshSequence = options.readTimer
      ? [...REFRESH_SEQUENCE, "timer"]
      : REFRESH_SEQUENCE;
  }

  /**
   * Scan for cookers without creating a client.
   */
  static discoverDevices(
    transport: BleTransport,
    timeoutMs?: number,
  ): Promise<DeviceIdentity[]> {
    return discoverDevices(transport, timeoutMs);
  }

  // ===========================================================================
  // State
  // ===========================================================================

  get isConnected(): boolean {
    return this.connection.isConnected;
  }

  get connectionState(): ConnectionState {
    return this.connection.state;
  }

  get status(): DeviceStatus {
    return this.cached;
  }

  // ===========================================================================
  // Link
  // ===========================================================================

  async connect(
    maxAttempts = DEFAULT_CONNECT_ATTEMPTS,
    timeoutMs = DEFAULT_CONNECT_TIMEOUT_MS,
    options: ConnectOptions = {},
  ): Promise<boolean> {
    if (this.connection.verifyLink()) return true;

    const result = await this.connection.connect(maxAttempts, timeoutMs);
    if (result.isErr()) {
      log.warn(
        { address: this.identity.address, error: formatConnectionError(result.error) },
        "Could not connect to cooker",
      );
      return false;
    }

    if (options.refresh ?? true) {
      const refreshed = await this.refreshStatus();
      if (!refreshed) {
        log.warn("Initial status refresh failed; staying connected");
      }
    }
    return true;
  }

  disconnect(): Promise<void> {
    return this.connection.disconnect();
  }

  discover(timeoutMs?: number): Promise<DeviceIdentity[]> {
    return discoverDevices(this.transport, timeoutMs);
  }

  // ===========================================================================
  // Status
  // ===========================================================================

  async getStatus(): Promise<DeviceStatus> {
    if (!this.connection.verifyLink()) {
      const reconnected = await this.connection.connect(
        RECONNECT_ATTEMPTS,
        RECONNECT_TIMEOUT_MS,
      );
      if (reconnected.isErr()) {
        log.warn("Cooker unreachable; returning last known status");
        return this.cached;
      }
    }

    await this.refreshStatus();
    return this.cached;
  }

  /**
   * Run one refresh cycle. Concurrent callers share the cycle in flight.
   *
   * @returns true when the cached status was updated
   */
  refreshStatus(): Promise<boolean> {
    if (!this.inFlightRefresh) {
      this.inFlightRefresh = this.runRefresh().finally(() => {
        this.inFlightRefresh = null;
      });
    }
    return this.inFlightRefresh;
  }

  /**
   * Refresh with a cycle that starts after this call. A cycle already in
   * flight may have read its fields before a write landed, so it is
   * awaited and then followed by a fresh one.
   */
  private async refreshAfterWrite(): Promise<boolean> {
    const stale = this.inFlightRefresh;
    if (stale) {
      await stale;
    }
    return this.refreshStatus();
  }

  private async runRefresh(): Promise<boolean> {
    const startTime = Date.now();
    let draft: DeviceStatus = { ...this.cached };
    let generation: number | null = null;
    let answered = 0;

    for (const [index, field] of this.refreshSequence.entries()) {
      if (index > 0 && this.commandDelayMs > 0) {
        await sleep(this.commandDelayMs);
      }

      const result = await this.serializer.execute(
        encodeCommand(STATUS_QUERIES[field]),
        "status",
      );

      if (result.isErr()) {
        const { type } = result.error;
        if (type === "DISCONNECTED" || type === "NOT_CONNECTED") {
          log.warn(
            { field, error: formatExchangeError(result.error) },
            "Refresh abandoned; keeping last known status",
          );
          return false;
        }
        log.debug({ field, error: formatExchangeError(result.error) }, "Status read failed");
        continue;
      }

      const reply = result.value;
      if (generation === null) {
        generation = reply.generation;
      } else if (reply.generation !== generation) {
        log.warn({ field }, "Link changed during refresh; discarding draft");
        return false;
      }

      if (!reply.wellFormed) {
        log.debug({ field, reply: reply.text }, "Malformed status reply ignored");
        continue;
      }

      draft = applyStatusReply(draft, field, reply.text);
      answered += 1;
    }

    if (
      answered === 0 ||
      generation !== this.connection.generation ||
      !this.connection.isConnected
    ) {
      log.warn({ answered }, "Refresh incomplete; keeping last known status");
      return false;
    }

    this.cached = draft;
    log.info(
      { status: draft, durationMs: Date.now() - startTime },
      "Status refreshed",
    );
    return true;
  }

  // ===========================================================================
  // Commands
  // ===========================================================================

  async setTemperature(celsius: number): Promise<boolean> {
    const valid = validateTemperature(celsius);
    if (valid.isErr()) {
      log.warn(formatProtocolError(valid.error));
      return false;
    }
    return this.sendWrite(
      "setTemperature",
      setTemperatureCommand(valid.value, this.cached.unit),
    );
  }

  async setTimer(minutes: number): Promise<boolean> {
    const valid = validateTimer(minutes);
    if (valid.isErr()) {
      log.warn(formatProtocolError(valid.error));
      return false;
    }
    return this.sendWrite("setTimer", setTimerCommand(valid.value));
  }

  start(): Promise<boolean> {
    return this.sendWrite("start", START_COMMAND);
  }

  stop(): Promise<boolean> {
    return this.sendWrite("stop", STOP_COMMAND);
  }

  setUnit(unit: TemperatureUnit): Promise<boolean> {
    return this.sendWrite("setUnit", setUnitCommand(unit));
  }

  /**
   * Send a write command; on acknowledgement resynchronize the cache.
   */
  private async sendWrite(operation: string, command: string): Promise<boolean> {
    const startTime = Date.now();
    logOperationStart(log, operation, { command });

    const result = await this.serializer.execute(encodeCommand(command), "acknowledge");

    let outcome: AcknowledgementOutcome;
    if (result.isOk()) {
      outcome = classifyAcknowledgement(result.value);
    } else if (result.error.type === "NO_REPLY") {
      outcome = classifyAcknowledgement(null);
    } else {
      logOperationFailed(log, operation, formatExchangeError(result.error), { command });
      return false;
    }

    if (outcome.kind !== "Acknowledged") {
      logOperationFailed(log, operation, `cooker answered ${outcome.kind}`, { command });
      return false;
    }

    logOperationComplete(log, operation, startTime, { reply: outcome.reply });

    if (this.commandDelayMs > 0) {
      await sleep(this.commandDelayMs);
    }
    await this.refreshAfterWrite();
    return true;
  }
}
