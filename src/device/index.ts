/**
 * Device Module - Public API
 */

// Types
export type { DeviceIdentity } from "./schema.js";
export { DEFAULT_DEVICE_NAME, PLACEHOLDER_ADDRESSES } from "./schema.js";

// Errors
export type { DeviceError } from "./errors.js";
export { formatDeviceError, invalidAddress } from "./errors.js";

// Transformations
export {
  canonicalizeAddress,
  createDeviceIdentity,
  fallbackDeviceName,
  isPlaceholderAddress,
} from "./transform.js";
