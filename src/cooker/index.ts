/**
 * Cooker Module - Public API
 */

export type { AnovaClientOptions, ConnectOptions, CookerControl } from "./schema.js";
export { DEFAULT_COMMAND_DELAY_MS } from "./schema.js";
export { AnovaClient } from "./service.js";
