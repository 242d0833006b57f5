/**
 * Status Monitor Tests
 */
import { afterEach, beforeEach, describe, expect, test, vi } from "vitest";

// Mock logger to reduce noise in tests
vi.mock("../../logger.js", () => ({
  createLogger: () => ({
    info: vi.fn(),
    debug: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  }),
}));

// Import after mocks
import { FakeCooker } from "../../testing/fake-cooker.js";
import { StatusMonitor } from "../service.js";

describe("StatusMonitor", () => {
  let cooker: FakeCooker;
  let monitor: StatusMonitor;

  beforeEach(() => {
    vi.useFakeTimers();
    cooker = new FakeCooker();
    monitor = new StatusMonitor(cooker, 10_000);
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  describe("pollOnce", () => {
    test("stores the status and link state", async () => {
      // Arrange
      cooker.status = { isRunning: true, currentTemperature: 56.1 };

      // Act
      const state = await monitor.pollOnce();

      // Assert
      expect(state.status).toEqual({ isRunning: true, currentTemperature: 56.1 });
      expect(state.isConnected).toBe(true);
      expect(state.lastPollTime).toBe(Date.now());
      expect(monitor.getState()).toBe(state);
    });

    test("counts polls that end without a link", async () => {
      // Arrange
      cooker.isConnected = false;

      // Act
      await monitor.pollOnce();
      const state = await monitor.pollOnce();

      // Assert
      expect(state.consecutiveFailures).toBe(2);

      // Act - link back
      cooker.isConnected = true;
      const recovered = await monitor.pollOnce();

      // Assert
      expect(recovered.consecutiveFailures).toBe(0);
    });
  });

  describe("loop", () => {
    test("polls immediately and then once per interval", async () => {
      // Act
      const loop = monitor.start();
      await vi.advanceTimersByTimeAsync(25_000);

      // Assert - polls at 0, 10s and 20s
      expect(cooker.calls).toEqual(["getStatus", "getStatus", "getStatus"]);
      expect(monitor.getState().isRunning).toBe(true);

      monitor.stop();
      await loop;
      expect(monitor.getState().isRunning).toBe(false);
    });

    test("stop ends a pending wait immediately", async () => {
      // Arrange
      const loop = monitor.start();
      await vi.advanceTimersByTimeAsync(1_000);

      // Act
      monitor.stop();
      await loop;

      // Assert
      expect(cooker.calls).toEqual(["getStatus"]);
      expect(vi.getTimerCount()).toBe(0);
    });

    test("keeps running after a failed poll", async () => {
      // Arrange
      cooker.statusError = new Error("boom");

      // Act
      const loop = monitor.start();
      await vi.advanceTimersByTimeAsync(1_000);
      cooker.statusError = null;
      cooker.status = { isRunning: false };
      await vi.advanceTimersByTimeAsync(10_000);
      monitor.stop();
      await loop;

      // Assert
      expect(cooker.calls).toEqual(["getStatus", "getStatus"]);
      expect(monitor.getState().status).toEqual({ isRunning: false });
    });

    test("a second start is ignored while running", async () => {
      // Arrange
      const loop = monitor.start();

      // Act
      await monitor.start();
      monitor.stop();
      await loop;

      // Assert
      expect(cooker.calls).toEqual(["getStatus"]);
    });
  });
});
