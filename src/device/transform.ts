/**
 * Device Module - Pure Transformations
 *
 * Address canonicalization and identity construction.
 * No side effects, no I/O.
 */
import { type Result, err, ok } from "neverthrow";

import { type DeviceError, invalidAddress } from "./errors.js";
import {
  DEFAULT_DEVICE_NAME,
  type DeviceIdentity,
  PLACEHOLDER_ADDRESSES,
} from "./schema.js";

const SEPARATORS = /[:\-\s]/g;
const HEX_12 = /^[0-9A-F]{12}$/;

/**
 * Canonicalize a BLE address.
 *
 * Accepts colon, dash, space or no separators in any case.
 * Idempotent: canonicalizing a canonical address returns it unchanged.
 *
 * @example
 * canonicalizeAddress("01-23-45-67-89-ab") // ok("01:23:45:67:89:AB")
 */
export function canonicalizeAddress(
  input: string,
): Result<string, DeviceError> {
  const compact = input.trim().toUpperCase().replace(SEPARATORS, "");

  if (compact.length !== 12) {
    return err(
      invalidAddress(input, `expected 12 hex digits, got ${compact.length}`),
    );
  }

  if (!HEX_12.test(compact)) {
    return err(invalidAddress(input, "contains non-hex characters"));
  }

  const octets = compact.match(/.{2}/g) ?? [];
  return ok(octets.join(":"));
}

/**
 * Whether a canonical address is one of the documentation placeholders.
 */
export function isPlaceholderAddress(address: string): boolean {
  return PLACEHOLDER_ADDRESSES.includes(address);
}

/**
 * Name used for a cooker that advertises none.
 */
export function fallbackDeviceName(address: string): string {
  return `Anova ${address.slice(-5)}`;
}

/**
 * Build a validated identity from raw address and optional name.
 */
export function createDeviceIdentity(
  address: string,
  name?: string | null,
): Result<DeviceIdentity, DeviceError> {
  return canonicalizeAddress(address).map((canonical) => {
    const trimmed = name?.trim();
    return {
      address: canonical,
      name: trimmed && trimmed !== "" ? trimmed : DEFAULT_DEVICE_NAME,
    };
  });
}
