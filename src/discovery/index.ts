/**
 * Discovery Module - Public API
 */

export { DEFAULT_DISCOVERY_TIMEOUT_MS, discoverDevices } from "./service.js";
export { isAnovaCandidate, toDeviceIdentity } from "./transform.js";
