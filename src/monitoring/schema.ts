/**
 * Monitoring Module - Schemas and Types
 *
 * State of the periodic status refresh loop.
 */
import type { DeviceStatus } from "../protocol/index.js";

// =============================================================================
// Monitoring State
// =============================================================================

export type MonitoringState = Readonly<{
  /** Status from the latest poll (last known when the cooker was away) */
  status: DeviceStatus;
  /** Link state observed at the end of the latest poll */
  isConnected: boolean;
  /** Whether the loop is running */
  isRunning: boolean;
  /** Timestamp of the latest completed poll, 0 before the first */
  lastPollTime: number;
  /** Polls in a row that ended without a link */
  consecutiveFailures: number;
}>;

export const INITIAL_MONITORING_STATE: MonitoringState = {
  status: {},
  isConnected: false,
  isRunning: false,
  lastPollTime: 0,
  consecutiveFailures: 0,
};

export const DEFAULT_POLLING_INTERVAL_MS = 10_000;
