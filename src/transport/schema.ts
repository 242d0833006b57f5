/**
 * Transport Module - Schemas and Types
 *
 * The BLE transport is a supplied capability. The core only ever talks to
 * it through BleTransport; NobleTransport is the Node.js implementation.
 */

// =============================================================================
// GATT Identifiers
// =============================================================================

/** Service exposing the cooker's text protocol */
export const ANOVA_SERVICE_UUID = "0000ffe0-0000-1000-8000-00805f9b34fb";

/** Single read/write/notify characteristic carrying commands and replies */
export const ANOVA_CHARACTERISTIC_UUID = "0000ffe1-0000-1000-8000-00805f9b34fb";

/** Bluetooth base UUID suffix used to expand 16/32-bit short forms */
const BASE_UUID_SUFFIX = "00001000800000805f9b34fb";

/**
 * Normalize a UUID to 32 lowercase hex digits without dashes.
 * Short 16-bit ("ffe0") and 32-bit forms are expanded against the base UUID.
 */
export function normalizeUuid(uuid: string): string {
  const compact = uuid.toLowerCase().replace(/-/g, "");
  if (compact.length === 4) {
    return `0000${compact}${BASE_UUID_SUFFIX}`;
  }
  if (compact.length === 8) {
    return `${compact}${BASE_UUID_SUFFIX}`;
  }
  return compact;
}

// =============================================================================
// Transport Contract
// =============================================================================

/**
 * A peripheral seen during a scan.
 */
export type DiscoveredPeripheral = Readonly<{
  /** Address as reported by the stack (any case/separator) */
  address: string;
  /** Advertised local name, if any */
  name: string | null;
  /** Advertised service UUIDs, in whatever form the stack reports */
  serviceUuids: ReadonlyArray<string>;
  rssi?: number;
}>;

export type NotificationListener = (data: Uint8Array) => void;

/**
 * Downward interface to the BLE stack.
 *
 * Methods may throw or reject; the connection layer converts every failure
 * into a typed error.
 */
export interface BleTransport {
  /** Look for one address; resolves null when not seen within the timeout */
  findDevice(
    address: string,
    timeoutMs: number,
  ): Promise<DiscoveredPeripheral | null>;
  /** Scan for the full duration and return everything seen */
  scan(timeoutMs: number): Promise<ReadonlyArray<DiscoveredPeripheral>>;
  /** Open the GATT link and resolve the cooker characteristic */
  connect(address: string, timeoutMs: number): Promise<void>;
  disconnect(): Promise<void>;
  /** Whether the underlying link is open right now */
  isConnected(): boolean;
  write(
    characteristicUuid: string,
    data: Uint8Array,
    withResponse: boolean,
  ): Promise<void>;
  subscribe(
    characteristicUuid: string,
    listener: NotificationListener,
  ): Promise<void>;
  unsubscribe(characteristicUuid: string): Promise<void>;
  read(characteristicUuid: string): Promise<Uint8Array>;
  /** Register a link-loss listener; returns an unregister function */
  onDisconnect(listener: () => void): () => void;
}
