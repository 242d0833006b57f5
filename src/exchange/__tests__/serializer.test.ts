/**
 * Command Serializer Tests
 *
 * Runs exchanges end to end over ConnectionManager and the in-process
 * FakeTransport. Fake timers drive the completion policy.
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
import { ConnectionManager } from "../../connection/index.js";
import { DEFAULT_FAKE_ADDRESS, FakeTransport } from "../../testing/fake-transport.js";
import { CommandSerializer } from "../serializer.js";

const identity = { address: DEFAULT_FAKE_ADDRESS, name: "Test Cooker" };

describe("CommandSerializer", () => {
  let transport: FakeTransport;
  let manager: ConnectionManager;
  let serializer: CommandSerializer;

  beforeEach(async () => {
    vi.useFakeTimers();
    transport = new FakeTransport();
    manager = new ConnectionManager(transport, identity);
    serializer = new CommandSerializer(manager);
    await manager.connect();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  // ===========================================================================
  // Completion
  // ===========================================================================

  describe("completion", () => {
    test("status reply completes after the silence window", async () => {
      // Arrange
      transport.cooker.running = true;
      let settled = false;

      // Act
      const pending = serializer.execute("status\r", "status");
      void pending.then(() => {
        settled = true;
      });
      await vi.advanceTimersByTimeAsync(3_049);
      const settledBeforeWindow = settled;
      await vi.advanceTimersByTimeAsync(500);
      const result = await pending;

      // Assert - fragment at 50ms, silence window 3000ms
      expect(settledBeforeWindow).toBe(false);
      expect(result._unsafeUnwrap()).toMatchObject({
        command: "status",
        text: "running",
        wellFormed: true,
        fragmentCount: 1,
        source: "silence",
        generation: 1,
      });
      expect(transport.writes).toEqual(["status\r"]);
    });

    test("joins a reply split across notifications", async () => {
      // Arrange
      transport.injectReply([
        { text: "5", afterMs: 50 },
        { text: "5.", afterMs: 200 },
        { text: "5", afterMs: 200 },
      ]);

      // Act
      const pending = serializer.execute("read set temp\r", "status");
      await vi.advanceTimersByTimeAsync(4_000);
      const result = await pending;

      // Assert - the third fragment repeats the first and is dropped
      expect(result._unsafeUnwrap().text).toBe("55.");
      expect(result._unsafeUnwrap().fragmentCount).toBe(2);
    });

    test("resolves with a partial reply at the overall timeout", async () => {
      // Arrange - fragments keep arriving inside the silence window
      transport.injectReply([
        { text: "ru", afterMs: 50 },
        { text: "nn", afterMs: 2_000 },
        { text: "ing", afterMs: 2_000 },
        { text: "x", afterMs: 2_000 },
      ]);

      // Act
      const pending = serializer.execute("status\r", "status");
      await vi.advanceTimersByTimeAsync(8_100);
      const result = await pending;

      // Assert
      expect(result._unsafeUnwrap()).toMatchObject({
        text: "runningx",
        source: "partial-timeout",
        fragmentCount: 4,
      });
    });

    test("falls back to a direct read when no fragment arrives", async () => {
      // Arrange
      transport.injectSilence();
      transport.readValue = new TextEncoder().encode("stopped");

      // Act
      const pending = serializer.execute("status\r", "status");
      await vi.advanceTimersByTimeAsync(8_100);
      const result = await pending;

      // Assert
      expect(result._unsafeUnwrap()).toMatchObject({
        text: "stopped",
        source: "direct-read",
        fragmentCount: 0,
      });
      expect(transport.readCount).toBe(1);
    });

    test("fails with NO_REPLY when the direct read is empty too", async () => {
      // Arrange
      transport.injectSilence();

      // Act
      const pending = serializer.execute("status\r", "status");
      await vi.advanceTimersByTimeAsync(8_100);
      const result = await pending;

      // Assert
      expect(result._unsafeUnwrapErr()).toMatchObject({
        type: "NO_REPLY",
        command: "status",
        timeoutMs: 8_000,
      });
    });

    test("honours a per-call timeout", async () => {
      // Arrange
      transport.injectSilence();

      // Act
      const pending = serializer.execute("start\r", "acknowledge", 2_000);
      await vi.advanceTimersByTimeAsync(2_100);
      const result = await pending;

      // Assert
      expect(result._unsafeUnwrapErr()).toMatchObject({
        type: "NO_REPLY",
        timeoutMs: 2_000,
      });
    });
  });

  // ===========================================================================
  // Isolation between exchanges
  // ===========================================================================

  describe("isolation", () => {
    test("a fragment after completion never reaches the next exchange", async () => {
      // Arrange
      transport.injectReply([
        { text: "stopped", afterMs: 50 },
        { text: "late", afterMs: 4_000 },
      ]);
      const first = serializer.execute("status\r", "status");
      await vi.advanceTimersByTimeAsync(3_100);
      const firstResult = await first;

      // Act - the late fragment lands at 4050ms with no exchange active
      await vi.advanceTimersByTimeAsync(2_000);
      transport.notify("stray");
      const second = serializer.execute("read temp\r", "status");
      await vi.advanceTimersByTimeAsync(3_100);
      const secondResult = await second;

      // Assert
      expect(firstResult._unsafeUnwrap().text).toBe("stopped");
      expect(secondResult._unsafeUnwrap().text).toBe("23.4");
      expect(secondResult._unsafeUnwrap().fragmentCount).toBe(1);
    });

    test("runs queued commands one at a time in call order", async () => {
      // Act
      const first = serializer.execute("read unit\r", "status");
      const second = serializer.execute("status\r", "status");
      const third = serializer.execute("start\r", "acknowledge");
      await vi.advanceTimersByTimeAsync(10);
      const writesWhileFirstPending = [...transport.writes];
      const queued = serializer.queueLength;
      await vi.advanceTimersByTimeAsync(20_000);
      const results = await Promise.all([first, second, third]);

      // Assert
      expect(writesWhileFirstPending).toEqual(["read unit\r"]);
      expect(queued).toBe(3);
      expect(transport.writes).toEqual(["read unit\r", "status\r", "start\r"]);
      expect(results.map((r) => r._unsafeUnwrap().text)).toEqual([
        "c",
        "stopped",
        "start",
      ]);
      expect(serializer.queueLength).toBe(0);
    });

    test("releases the slot after a failed write", async () => {
      // Arrange
      transport.injectWriteError("GATT busy");

      // Act
      const failed = await serializer.execute("stop\r", "acknowledge");
      const next = serializer.execute("stop\r", "acknowledge");
      await vi.advanceTimersByTimeAsync(1_100);
      const result = await next;

      // Assert
      expect(failed._unsafeUnwrapErr()).toMatchObject({
        type: "WRITE_FAILED",
        message: "GATT busy",
      });
      expect(result._unsafeUnwrap().text).toBe("stop");
    });
  });

  // ===========================================================================
  // Link handling
  // ===========================================================================

  describe("link handling", () => {
    test("a disconnect before any fragment fails the exchange", async () => {
      // Arrange
      transport.injectSilence();

      // Act
      const pending = serializer.execute("status\r", "status");
      await vi.advanceTimersByTimeAsync(100);
      transport.simulateDisconnect();
      const result = await pending;

      // Assert
      expect(result._unsafeUnwrapErr().type).toBe("DISCONNECTED");
      expect(manager.state).toBe("disconnected");
      expect(transport.readCount).toBe(0);
    });

    test("reconnects once before writing when the link is down", async () => {
      // Arrange
      await manager.disconnect();

      // Act
      const pending = serializer.execute("status\r", "status");
      await vi.advanceTimersByTimeAsync(3_100);
      const result = await pending;

      // Assert
      expect(result._unsafeUnwrap().text).toBe("stopped");
      expect(result._unsafeUnwrap().generation).toBe(2);
      expect(transport.connectCalls).toHaveLength(2);
    });

    test("fails without writing when the reconnect fails", async () => {
      // Arrange
      await manager.disconnect();
      transport.injectConnectError();

      // Act
      const result = await serializer.execute("start\r", "acknowledge");

      // Assert
      expect(result._unsafeUnwrapErr().type).toBe("NOT_CONNECTED");
      expect(transport.writes).toEqual([]);
      expect(transport.connectCalls).toHaveLength(2);
    });
  });
});
