/**
 * Monitoring Module - Service Layer
 *
 * Periodic status refresh for one cooker, the host-side scheduler the
 * client itself does not have.
 */
import type { CookerControl } from "../cooker/index.js";
import { createLogger } from "../logger.js";
import {
  DEFAULT_POLLING_INTERVAL_MS,
  INITIAL_MONITORING_STATE,
  type MonitoringState,
} from "./schema.js";

const log = createLogger("monitoring");

export class StatusMonitor {
  private state: MonitoringState = INITIAL_MONITORING_STATE;
  private stopRequested = false;
  private waitTimer: ReturnType<typeof setTimeout> | null = null;
  private wake: (() => void) | null = null;

  constructor(
    private readonly client: CookerControl,
    private readonly intervalMs = DEFAULT_POLLING_INTERVAL_MS,
  ) {}

  getState(): MonitoringState {
    return this.state;
  }

  /**
   * Single poll cycle.
   */
  async pollOnce(): Promise<MonitoringState> {
    const status = await this.client.getStatus();
    const isConnected = this.client.isConnected;

    if (isConnected !== this.state.isConnected) {
      log.info({ isConnected }, isConnected ? "Cooker reachable" : "Cooker unreachable");
    }
    if (status.isRunning !== this.state.status.isRunning) {
      log.info({ isRunning: status.isRunning }, "Run state changed");
    }

    this.state = {
      ...this.state,
      status,
      isConnected,
      lastPollTime: Date.now(),
      consecutiveFailures: isConnected ? 0 : this.state.consecutiveFailures + 1,
    };
    return this.state;
  }

  /**
   * Run the polling loop until stop() is called. Resolves once the loop
   * has exited.
   */
  async start(): Promise<void> {
    if (this.state.isRunning) {
      log.warn("Monitoring loop already running");
      return;
    }

    log.info({ intervalMs: this.intervalMs }, "Starting status monitoring loop...");
    this.state = { ...this.state, isRunning: true };
    this.stopRequested = false;

    while (!this.stopRequested) {
      try {
        await this.pollOnce();
      } catch (error) {
        const message = error instanceof Error ? error.message : "Unknown error";
        log.error({ error: message }, "Error in poll cycle");
      }

      if (this.stopRequested) break;
      await this.waitForNextPoll();
    }

    log.info("Monitoring loop stopped");
    this.state = { ...this.state, isRunning: false };
  }

  /**
   * Ask the loop to exit; a pending wait ends immediately.
   */
  stop(): void {
    if (!this.state.isRunning) {
      log.warn("Monitoring loop not running");
      return;
    }

    log.info("Stopping monitoring loop...");
    this.stopRequested = true;
    if (this.waitTimer) {
      clearTimeout(this.waitTimer);
      this.waitTimer = null;
    }
    this.wake?.();
  }

  private waitForNextPoll(): Promise<void> {
    return new Promise((resolve) => {
      this.wake = () => {
        this.wake = null;
        resolve();
      };
      this.waitTimer = setTimeout(() => {
        this.waitTimer = null;
        this.wake?.();
      }, this.intervalMs);
    });
  }
}
