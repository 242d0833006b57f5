/**
 * Connection Manager Tests
 *
 * Drives ConnectionManager against the in-process FakeTransport with
 * fake timers, so retry backoff and link timeouts run instantly.
 */
import { afterEach, beforeEach, describe, expect, test, vi } from "vitest";

// Mock logger to reduce noise in tests
vi.mock("../../logger.js", () => ({
  createLogger: () => ({
    info: vi.fn(),
    debug: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    trace: vi.fn(),
    fatal: vi.fn(),
  }),
}));

// Import after mocks
import { DEFAULT_FAKE_ADDRESS, FakeTransport } from "../../testing/fake-transport.js";
import { ConnectionManager } from "../service.js";

const identity = { address: DEFAULT_FAKE_ADDRESS, name: "Test Cooker" };

describe("ConnectionManager", () => {
  let transport: FakeTransport;
  let manager: ConnectionManager;

  beforeEach(() => {
    vi.useFakeTimers();
    transport = new FakeTransport();
    manager = new ConnectionManager(transport, identity);
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  // ===========================================================================
  // connect
  // ===========================================================================

  describe("connect", () => {
    test("connects on the first attempt and subscribes", async () => {
      // Act
      const result = await manager.connect(3, 10_000);

      // Assert
      expect(result.isOk()).toBe(true);
      expect(manager.state).toBe("connected");
      expect(manager.isConnected).toBe(true);
      expect(manager.generation).toBe(1);
      expect(transport.connectCalls).toHaveLength(1);
      expect(transport.connectCalls[0]?.address).toBe(DEFAULT_FAKE_ADDRESS);
    });

    test("retries after a timeout with one 2s backoff", async () => {
      // Arrange
      transport.injectConnectTimeout();
      const startedAt = Date.now();

      // Act
      const pending = manager.connect(2, 10_000);
      await vi.advanceTimersByTimeAsync(12_000);
      const result = await pending;

      // Assert - attempt 1 times out at 10s, attempt 2 starts 2s later
      expect(result.isOk()).toBe(true);
      expect(manager.state).toBe("connected");
      expect(transport.connectCalls.map((c) => c.at - startedAt)).toEqual([
        0, 12_000,
      ]);
    });

    test("never uses a link timeout below the 10s floor", async () => {
      // Act
      await manager.connect(1, 3_000);

      // Assert
      expect(transport.connectCalls[0]?.timeoutMs).toBe(10_000);
    });

    test("keeps a larger caller timeout", async () => {
      // Act
      await manager.connect(1, 15_000);

      // Assert
      expect(transport.connectCalls[0]?.timeoutMs).toBe(15_000);
    });

    test("fails after exhausting attempts and stays disconnected", async () => {
      // Arrange
      transport.injectConnectError("le-connection-abort-by-local", 3);

      // Act
      const pending = manager.connect(3, 10_000);
      await vi.advanceTimersByTimeAsync(4_000);
      const result = await pending;

      // Assert
      expect(result.isErr()).toBe(true);
      expect(result._unsafeUnwrapErr()).toMatchObject({
        type: "ATTEMPTS_EXHAUSTED",
        attempts: 3,
      });
      expect(manager.state).toBe("disconnected");
      expect(transport.connectCalls).toHaveLength(3);
    });

    test("closes the link after a failed attempt", async () => {
      // Arrange
      transport.injectConnectTimeout();

      // Act
      const pending = manager.connect(1, 10_000);
      await vi.advanceTimersByTimeAsync(10_000);
      const result = await pending;

      // Assert
      expect(result.isErr()).toBe(true);
      expect(transport.disconnectCount).toBe(1);
      expect(manager.state).toBe("disconnected");
    });

    test("does not wait after the final failed attempt", async () => {
      // Arrange
      transport.injectConnectError();

      // Act - no timers advanced
      const result = await manager.connect(1, 10_000);

      // Assert
      expect(result.isErr()).toBe(true);
    });

    test("is a no-op when already connected", async () => {
      // Arrange
      await manager.connect();

      // Act
      const result = await manager.connect();

      // Assert
      expect(result.isOk()).toBe(true);
      expect(transport.connectCalls).toHaveLength(1);
      expect(manager.generation).toBe(1);
    });

    test("shares one attempt between concurrent callers", async () => {
      // Act
      const [first, second] = await Promise.all([
        manager.connect(),
        manager.connect(),
      ]);

      // Assert
      expect(first.isOk()).toBe(true);
      expect(second.isOk()).toBe(true);
      expect(transport.connectCalls).toHaveLength(1);
    });

    test("stays connected when notifications cannot be enabled", async () => {
      // Arrange
      transport.injectSubscribeError();

      // Act
      const result = await manager.connect();

      // Assert
      expect(result.isOk()).toBe(true);
      expect(manager.isConnected).toBe(true);
    });

    test("falls back to a scan when the direct lookup misses", async () => {
      // Arrange
      transport.directLookupWorks = false;

      // Act
      await manager.connect();

      // Assert
      expect(transport.scanCalls).toEqual([5_000]);
      expect(manager.isConnected).toBe(true);
    });

    test("uses the configured fallback scan duration", async () => {
      // Arrange
      const tuned = new ConnectionManager(transport, identity, { scanTimeoutMs: 8_000 });
      transport.directLookupWorks = false;

      // Act
      await tuned.connect();

      // Assert
      expect(transport.scanCalls).toEqual([8_000]);
    });

    test("still attempts the link when the cooker is absent from the scan", async () => {
      // Arrange
      transport.directLookupWorks = false;
      transport.peripherals = [];

      // Act
      const result = await manager.connect();

      // Assert
      expect(result.isOk()).toBe(true);
      expect(transport.connectCalls).toHaveLength(1);
    });
  });

  // ===========================================================================
  // disconnect
  // ===========================================================================

  describe("disconnect", () => {
    test("is a no-op when already disconnected", async () => {
      // Act
      await manager.disconnect();
      await manager.disconnect();

      // Assert
      expect(manager.state).toBe("disconnected");
      expect(transport.disconnectCount).toBe(0);
      expect(transport.unsubscribeCount).toBe(0);
    });

    test("unsubscribes and closes the link", async () => {
      // Arrange
      await manager.connect();

      // Act
      await manager.disconnect();

      // Assert
      expect(manager.state).toBe("disconnected");
      expect(manager.isConnected).toBe(false);
      expect(transport.unsubscribeCount).toBe(1);
      expect(transport.disconnectCount).toBe(1);
    });

    test("cancels a connect in flight and ends disconnected", async () => {
      // Act
      const connecting = manager.connect(1, 10_000);
      await manager.disconnect();
      const result = await connecting;

      // Assert
      expect(result._unsafeUnwrapErr().type).toBe("NOT_CONNECTED");
      expect(manager.state).toBe("disconnected");
      expect(manager.generation).toBe(0);
      expect(transport.isConnected()).toBe(false);
      expect(transport.disconnectCount).toBe(1);
    });

    test("skips unsubscribe when notifications were never enabled", async () => {
      // Arrange
      transport.injectSubscribeError();
      await manager.connect();

      // Act
      await manager.disconnect();

      // Assert
      expect(transport.unsubscribeCount).toBe(0);
      expect(manager.state).toBe("disconnected");
    });
  });

  // ===========================================================================
  // Link loss
  // ===========================================================================

  describe("link loss", () => {
    test("flips to disconnected and notifies listeners", async () => {
      // Arrange
      await manager.connect();
      const transitions: string[] = [];
      manager.onStateChange((state, previous) => {
        transitions.push(`${previous}->${state}`);
      });

      // Act
      transport.simulateDisconnect();

      // Assert
      expect(manager.state).toBe("disconnected");
      expect(transitions).toEqual(["connected->disconnected"]);
    });

    test("reconnecting starts a new generation", async () => {
      // Arrange
      await manager.connect();
      transport.simulateDisconnect();

      // Act
      await manager.connect();

      // Assert
      expect(manager.generation).toBe(2);
    });
  });

  // ===========================================================================
  // Characteristic I/O
  // ===========================================================================

  describe("write and readDirect", () => {
    test("write fails without touching the transport when disconnected", async () => {
      // Act
      const result = await manager.write(new TextEncoder().encode("status\r"), 1_000);

      // Assert
      expect(result._unsafeUnwrapErr().type).toBe("NOT_CONNECTED");
      expect(transport.writes).toEqual([]);
    });

    test("write converts transport errors", async () => {
      // Arrange
      await manager.connect();
      transport.injectWriteError("GATT write failed");

      // Act
      const result = await manager.write(new TextEncoder().encode("stop\r"), 1_000);

      // Assert
      expect(result._unsafeUnwrapErr()).toMatchObject({
        type: "WRITE_FAILED",
        message: "GATT write failed",
      });
    });

    test("readDirect returns the characteristic value", async () => {
      // Arrange
      await manager.connect();
      transport.readValue = new TextEncoder().encode("stopped");

      // Act
      const result = await manager.readDirect(2_000);

      // Assert
      expect(new TextDecoder().decode(result._unsafeUnwrap())).toBe("stopped");
      expect(transport.readCount).toBe(1);
    });

    test("routes notifications to the sink", async () => {
      // Arrange
      const received: string[] = [];
      manager.setNotificationSink((data) => {
        received.push(new TextDecoder().decode(data));
      });
      await manager.connect();

      // Act
      transport.notify("running");

      // Assert
      expect(received).toEqual(["running"]);
    });
  });
});
