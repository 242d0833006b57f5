/**
 * Discovery Module - Service Layer
 *
 * One-shot scan for cookers. Keeps no state between scans.
 */
import type { DeviceIdentity } from "../device/index.js";
import {
  createLogger,
  logOperationComplete,
  logOperationFailed,
  logOperationStart,
} from "../logger.js";
import type { BleTransport, DiscoveredPeripheral } from "../transport/index.js";
import { withTimeout } from "../utils/timing.js";
import { isAnovaCandidate, toDeviceIdentity } from "./transform.js";

const log = createLogger("discovery");

export const DEFAULT_DISCOVERY_TIMEOUT_MS = 15_000;

/**
 * Scan once and return the cookers seen. A failed scan yields an empty
 * list.
 */
export async function discoverDevices(
  transport: BleTransport,
  timeoutMs = DEFAULT_DISCOVERY_TIMEOUT_MS,
): Promise<DeviceIdentity[]> {
  const startTime = Date.now();
  logOperationStart(log, "discoverDevices", { timeoutMs });

  let peripherals: ReadonlyArray<DiscoveredPeripheral>;
  try {
    peripherals = await withTimeout(
      transport.scan(timeoutMs),
      timeoutMs + 5_000,
      "Discovery scan",
    );
  } catch (error) {
    logOperationFailed(log, "discoverDevices", error, { timeoutMs });
    return [];
  }

  const devices = new Map<string, DeviceIdentity>();
  for (const peripheral of peripherals) {
    if (!isAnovaCandidate(peripheral)) continue;

    const identity = toDeviceIdentity(peripheral);
    if (identity.isErr()) {
      log.debug(
        { address: peripheral.address, reason: identity.error.message },
        "Skipping cooker with unusable address",
      );
      continue;
    }
    if (!devices.has(identity.value.address)) {
      devices.set(identity.value.address, identity.value);
    }
  }

  const found = [...devices.values()];
  logOperationComplete(log, "discoverDevices", startTime, {
    scanned: peripherals.length,
    found: found.length,
  });
  return found;
}
