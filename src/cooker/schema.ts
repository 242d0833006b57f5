/**
 * Cooker Module - Schemas and Types
 *
 * The upward contract consumed by the HTTP API and the status monitor.
 */
import type { ConnectionOptions, ConnectionState } from "../connection/index.js";
import type { DeviceIdentity } from "../device/index.js";
import type { CompletionPolicies } from "../exchange/index.js";
import type { DeviceStatus, TemperatureUnit } from "../protocol/index.js";

export type ConnectOptions = Readonly<{
  /** Run one best-effort status refresh after a new link opens */
  refresh?: boolean;
}>;

/**
 * Everything the host needs from one cooker. Methods never throw; failure
 * is reported as false or as the last known status.
 */
export interface CookerControl {
  readonly identity: DeviceIdentity;
  readonly isConnected: boolean;
  readonly connectionState: ConnectionState;
  /** Last known status, without touching the link */
  readonly status: DeviceStatus;

  connect(
    maxAttempts?: number,
    timeoutMs?: number,
    options?: ConnectOptions,
  ): Promise<boolean>;
  disconnect(): Promise<void>;
  /** Fresh status when reachable, otherwise the last known one */
  getStatus(): Promise<DeviceStatus>;
  setTemperature(celsius: number): Promise<boolean>;
  setTimer(minutes: number): Promise<boolean>;
  start(): Promise<boolean>;
  stop(): Promise<boolean>;
  setUnit(unit: TemperatureUnit): Promise<boolean>;
  discover(timeoutMs?: number): Promise<DeviceIdentity[]>;
}

export type AnovaClientOptions = Readonly<{
  connection?: Partial<ConnectionOptions>;
  policies?: CompletionPolicies;
  /** Pause between the round trips of one refresh cycle */
  commandDelayMs?: number;
  /** Add a "read timer" round trip to every refresh cycle */
  readTimer?: boolean;
}>;

export const DEFAULT_COMMAND_DELAY_MS = 250;
