/**
 * Discovery Module - Pure Transformations
 *
 * Deciding which scanned peripherals are cookers.
 */
import type { Result } from "neverthrow";

import {
  type DeviceError,
  type DeviceIdentity,
  canonicalizeAddress,
  fallbackDeviceName,
} from "../device/index.js";
import {
  ANOVA_SERVICE_UUID,
  type DiscoveredPeripheral,
  normalizeUuid,
} from "../transport/index.js";

const NAME_MARKER = "anova";
const SERVICE_KEY = normalizeUuid(ANOVA_SERVICE_UUID);

/**
 * A peripheral is a candidate when its name mentions Anova or it
 * advertises the cooker service.
 */
export function isAnovaCandidate(peripheral: DiscoveredPeripheral): boolean {
  if (peripheral.name?.toLowerCase().includes(NAME_MARKER)) {
    return true;
  }
  return peripheral.serviceUuids.some((uuid) => normalizeUuid(uuid) === SERVICE_KEY);
}

/**
 * Identity for a discovered cooker; unnamed ones get a name from their
 * address.
 */
export function toDeviceIdentity(
  peripheral: DiscoveredPeripheral,
): Result<DeviceIdentity, DeviceError> {
  return canonicalizeAddress(peripheral.address).map((address) => {
    const name = peripheral.name?.trim();
    return {
      address,
      name: name && name !== "" ? name : fallbackDeviceName(address),
    };
  });
}
