/**
 * Transport Module - Public API
 *
 * The noble-backed implementation is exported from ./noble.js on its own so
 * that importing the contract never loads the native BLE bindings.
 */

export type {
  BleTransport,
  DiscoveredPeripheral,
  NotificationListener,
} from "./schema.js";

export {
  ANOVA_CHARACTERISTIC_UUID,
  ANOVA_SERVICE_UUID,
  normalizeUuid,
} from "./schema.js";
