/**
 * Monitoring Module - Public API
 */

// Types
export type { MonitoringState } from "./schema.js";
export { DEFAULT_POLLING_INTERVAL_MS, INITIAL_MONITORING_STATE } from "./schema.js";

// Service
export { StatusMonitor } from "./service.js";
