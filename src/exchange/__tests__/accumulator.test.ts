/**
 * Response Accumulator Tests
 *
 * Pure timing logic: the clock is passed in, so no timers are involved.
 */
import { describe, expect, test } from "vitest";

import { ResponseAccumulator, decodeReply } from "../accumulator.js";
import { DEFAULT_COMPLETION_POLICIES } from "../schema.js";

const text = (value: string) => new TextEncoder().encode(value);
const statusPolicy = DEFAULT_COMPLETION_POLICIES.status;
const ackPolicy = DEFAULT_COMPLETION_POLICIES.acknowledge;

describe("decodeReply", () => {
  test("trims whitespace and line endings", () => {
    expect(decodeReply(text("  running\r\n"))).toEqual({
      text: "running",
      wellFormed: true,
    });
  });

  test("flags bytes that are not UTF-8", () => {
    // Act
    const decoded = decodeReply(new Uint8Array([0x6f, 0x6b, 0xff, 0xfe]));

    // Assert
    expect(decoded.wellFormed).toBe(false);
    expect(decoded.text.startsWith("ok")).toBe(true);
  });
});

describe("ResponseAccumulator", () => {
  // ===========================================================================
  // Buffering
  // ===========================================================================

  describe("push", () => {
    test("joins fragments in arrival order", () => {
      // Arrange
      const acc = new ResponseAccumulator(statusPolicy, 0);

      // Act
      acc.push(text("run"), 10);
      acc.push(text("ning"), 20);

      // Assert
      expect(acc.assemble().text).toBe("running");
      expect(acc.fragmentCount).toBe(2);
    });

    test("a repeated fragment gives the same text as a single one", () => {
      // Arrange
      const once = new ResponseAccumulator(statusPolicy, 0);
      const twice = new ResponseAccumulator(statusPolicy, 0);

      // Act
      once.push(text("55.5"), 10);
      twice.push(text("55.5"), 10);
      const accepted = twice.push(text("55.5"), 20);

      // Assert
      expect(accepted).toBe(false);
      expect(twice.assemble()).toEqual(once.assemble());
      expect(twice.lastArrivalAt).toBe(10);
    });

    test("ignores empty fragments", () => {
      // Arrange
      const acc = new ResponseAccumulator(statusPolicy, 0);

      // Act
      const accepted = acc.push(new Uint8Array(), 10);

      // Assert
      expect(accepted).toBe(false);
      expect(acc.fragmentCount).toBe(0);
      expect(acc.completesAt()).toBeNull();
    });

    test("keeps a copy so callers may reuse their buffer", () => {
      // Arrange
      const acc = new ResponseAccumulator(statusPolicy, 0);
      const buffer = text("stop");

      // Act
      acc.push(buffer, 10);
      buffer.fill(0x20);

      // Assert
      expect(acc.assemble().text).toBe("stop");
    });
  });

  // ===========================================================================
  // Completion
  // ===========================================================================

  describe("completion", () => {
    test("completes one silence window after the last fragment", () => {
      // Arrange
      const acc = new ResponseAccumulator(statusPolicy, 0);
      acc.push(text("running"), 2_000);

      // Assert
      expect(acc.completesAt()).toBe(5_000);
      expect(acc.isComplete(4_999)).toBe(false);
      expect(acc.isComplete(5_000)).toBe(true);
    });

    test("never completes before the minimum wait", () => {
      // Arrange
      const acc = new ResponseAccumulator(ackPolicy, 1_000);
      acc.push(text("start"), 1_000);

      // Assert - silence would end at 2000, minimum wait at 1500
      expect(acc.completesAt()).toBe(2_000);

      // Arrange - a zero-length silence window exposes the minimum wait
      const eager = new ResponseAccumulator(
        { silenceWindowMs: 0, minimumWaitMs: 500, timeoutMs: 5_000 },
        1_000,
      );
      eager.push(text("start"), 1_010);

      // Assert
      expect(eager.completesAt()).toBe(1_500);
    });

    test("a later fragment pushes completion out", () => {
      // Arrange
      const acc = new ResponseAccumulator(statusPolicy, 0);
      acc.push(text("2"), 100);

      // Act
      acc.push(text("3.4"), 2_500);

      // Assert
      expect(acc.completesAt()).toBe(5_500);
    });

    test("is never complete without fragments", () => {
      const acc = new ResponseAccumulator(statusPolicy, 0);
      expect(acc.isComplete(60_000)).toBe(false);
    });
  });

  test("clear drops everything", () => {
    // Arrange
    const acc = new ResponseAccumulator(statusPolicy, 0);
    acc.push(text("running"), 10);

    // Act
    acc.clear();

    // Assert
    expect(acc.fragmentCount).toBe(0);
    expect(acc.lastArrivalAt).toBeNull();
    expect(acc.assemble().text).toBe("");
    expect(acc.push(text("running"), 20)).toBe(true);
  });
});
