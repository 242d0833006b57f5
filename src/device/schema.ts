/**
 * Device Module - Schemas and Types
 *
 * Identity of a cooker on the BLE link.
 */

/** Default display name when the user or the advertisement gives none. */
export const DEFAULT_DEVICE_NAME = "Anova Precision Cooker";

/** Addresses shipped in examples; accepted but almost certainly wrong. */
export const PLACEHOLDER_ADDRESSES: ReadonlyArray<string> = [
  "AA:BB:CC:DD:EE:FF",
  "00:00:00:00:00:00",
];

/**
 * A cooker the bridge can talk to.
 */
export type DeviceIdentity = Readonly<{
  /** Canonical address, e.g. "01:23:45:67:89:AB" */
  address: string;
  /** Display name */
  name: string;
}>;
