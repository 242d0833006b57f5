/**
 * Transport Module - Noble Implementation
 *
 * BleTransport backed by @abandonware/noble (HCI socket on Linux,
 * CoreBluetooth on macOS). One instance drives one peripheral.
 */
import type { Characteristic, Peripheral } from "@abandonware/noble";
import noble from "@abandonware/noble";

import { createLogger } from "../logger.js";
import { toError, withTimeout } from "../utils/timing.js";
import {
  ANOVA_CHARACTERISTIC_UUID,
  ANOVA_SERVICE_UUID,
  type BleTransport,
  type DiscoveredPeripheral,
  type NotificationListener,
  normalizeUuid,
} from "./schema.js";

const log = createLogger("transport");

const POWERED_ON = "poweredOn";

/**
 * Noble reports UUIDs lowercase without dashes, and uses the 16-bit form
 * for anything on the Bluetooth base UUID.
 */
export function toNobleUuid(uuid: string): string {
  const normalized = normalizeUuid(uuid);
  const short = /^0000([0-9a-f]{4})00001000800000805f9b34fb$/.exec(normalized);
  return short?.[1] ?? normalized;
}

function addressKey(address: string): string {
  return address.toUpperCase().replace(/-/g, ":");
}

function describePeripheral(peripheral: Peripheral): DiscoveredPeripheral {
  return {
    address: peripheral.address,
    name: peripheral.advertisement.localName ?? null,
    serviceUuids: peripheral.advertisement.serviceUuids ?? [],
    rssi: peripheral.rssi,
  };
}

export class NobleTransport implements BleTransport {
  /** Every peripheral seen by any scan, keyed by uppercase address */
  private readonly seen = new Map<string, Peripheral>();
  private readonly disconnectListeners = new Set<() => void>();
  private readonly dataHandlers = new Map<
    string,
    (data: Buffer, isNotification: boolean) => void
  >();

  private peripheral: Peripheral | null = null;
  private characteristics = new Map<string, Characteristic>();

  // ===========================================================================
  // Scanning
  // ===========================================================================

  async scan(timeoutMs: number): Promise<ReadonlyArray<DiscoveredPeripheral>> {
    const found = await this.runScan(timeoutMs, () => false);
    return found.map(describePeripheral);
  }

  async findDevice(
    address: string,
    timeoutMs: number,
  ): Promise<DiscoveredPeripheral | null> {
    const key = addressKey(address);
    const found = await this.runScan(
      timeoutMs,
      (peripheral) => addressKey(peripheral.address) === key,
    );
    const match = found.find((p) => addressKey(p.address) === key);
    return match ? describePeripheral(match) : null;
  }

  /**
   * Scan until the timeout elapses or `stopWhen` matches a peripheral.
   */
  private async runScan(
    timeoutMs: number,
    stopWhen: (peripheral: Peripheral) => boolean,
  ): Promise<Peripheral[]> {
    await this.waitForPoweredOn(timeoutMs);

    const found = new Map<string, Peripheral>();

    await new Promise<void>((resolve, reject) => {
      let settled = false;

      const finish = () => {
        if (settled) return;
        settled = true;
        clearTimeout(timer);
        noble.removeListener("discover", onDiscover);
        noble
          .stopScanningAsync()
          .then(() => resolve())
          .catch(reject);
      };

      const onDiscover = (peripheral: Peripheral) => {
        const key = addressKey(peripheral.address);
        found.set(key, peripheral);
        this.seen.set(key, peripheral);
        log.trace(
          { address: peripheral.address, name: peripheral.advertisement.localName },
          "Peripheral discovered",
        );
        if (stopWhen(peripheral)) {
          finish();
        }
      };

      const timer = setTimeout(finish, timeoutMs);

      noble.on("discover", onDiscover);
      noble.startScanningAsync([], false).catch((error: unknown) => {
        settled = true;
        clearTimeout(timer);
        noble.removeListener("discover", onDiscover);
        reject(error);
      });
    });

    log.debug({ count: found.size, timeoutMs }, "Scan finished");
    return [...found.values()];
  }

  private async waitForPoweredOn(timeoutMs: number): Promise<void> {
    if (noble.state === POWERED_ON) return;

    let markPoweredOn: () => void = () => {};
    const poweredOn = new Promise<void>((resolve) => {
      markPoweredOn = resolve;
    });
    const listener = (state: string) => {
      if (state === POWERED_ON) markPoweredOn();
    };

    noble.on("stateChange", listener);
    try {
      await withTimeout(poweredOn, timeoutMs, "Bluetooth adapter power-on");
    } finally {
      noble.removeListener("stateChange", listener);
    }
  }

  // ===========================================================================
  // Link
  // ===========================================================================

  async connect(address: string, timeoutMs: number): Promise<void> {
    const key = addressKey(address);
    let peripheral = this.seen.get(key);
    if (!peripheral) {
      await this.findDevice(address, timeoutMs);
      peripheral = this.seen.get(key);
    }
    if (!peripheral) {
      throw new Error(`Peripheral ${key} has not been seen by any scan`);
    }

    try {
      await withTimeout(peripheral.connectAsync(), timeoutMs, "GATT connect");

      const { characteristics } = await withTimeout(
        peripheral.discoverSomeServicesAndCharacteristicsAsync(
          [toNobleUuid(ANOVA_SERVICE_UUID)],
          [toNobleUuid(ANOVA_CHARACTERISTIC_UUID)],
        ),
        timeoutMs,
        "GATT discovery",
      );

      this.characteristics = new Map(
        characteristics.map((c): [string, Characteristic] => [
          toNobleUuid(c.uuid),
          c,
        ]),
      );
      if (this.characteristics.size === 0) {
        throw new Error("Cooker characteristic not found");
      }
    } catch (error) {
      this.characteristics = new Map();
      await this.release(peripheral, timeoutMs);
      throw error;
    }

    this.peripheral = peripheral;
    const connected = peripheral;
    peripheral.once("disconnect", () => {
      if (this.peripheral !== connected) return;
      log.warn({ address: key }, "Link lost");
      this.peripheral = null;
      this.characteristics = new Map();
      this.dataHandlers.clear();
      for (const listener of this.disconnectListeners) {
        listener();
      }
    });
  }

  /**
   * Close a link that opened but never finished setup.
   */
  private async release(peripheral: Peripheral, timeoutMs: number): Promise<void> {
    try {
      await withTimeout(peripheral.disconnectAsync(), timeoutMs, "Release");
    } catch (error) {
      log.warn(
        { address: peripheral.address, error: toError(error).message },
        "Could not close half-open link",
      );
    }
  }

  async disconnect(): Promise<void> {
    const peripheral = this.peripheral;
    if (!peripheral) return;
    await peripheral.disconnectAsync();
  }

  isConnected(): boolean {
    return this.peripheral?.state === "connected";
  }

  onDisconnect(listener: () => void): () => void {
    this.disconnectListeners.add(listener);
    return () => {
      this.disconnectListeners.delete(listener);
    };
  }

  // ===========================================================================
  // Characteristic I/O
  // ===========================================================================

  private characteristic(uuid: string): Characteristic {
    const characteristic = this.characteristics.get(toNobleUuid(uuid));
    if (!characteristic) {
      throw new Error(`Characteristic ${uuid} not available`);
    }
    return characteristic;
  }

  async write(
    characteristicUuid: string,
    data: Uint8Array,
    withResponse: boolean,
  ): Promise<void> {
    await this.characteristic(characteristicUuid).writeAsync(
      Buffer.from(data),
      !withResponse,
    );
  }

  async subscribe(
    characteristicUuid: string,
    listener: NotificationListener,
  ): Promise<void> {
    const characteristic = this.characteristic(characteristicUuid);
    const key = toNobleUuid(characteristicUuid);

    const previous = this.dataHandlers.get(key);
    if (previous) characteristic.removeListener("data", previous);

    const handler = (data: Buffer) => {
      listener(new Uint8Array(data));
    };
    this.dataHandlers.set(key, handler);
    characteristic.on("data", handler);
    await characteristic.subscribeAsync();
  }

  async unsubscribe(characteristicUuid: string): Promise<void> {
    const characteristic = this.characteristic(characteristicUuid);
    const key = toNobleUuid(characteristicUuid);
    const handler = this.dataHandlers.get(key);
    if (handler) {
      characteristic.removeListener("data", handler);
      this.dataHandlers.delete(key);
    }
    await characteristic.unsubscribeAsync();
  }

  async read(characteristicUuid: string): Promise<Uint8Array> {
    const data = await this.characteristic(characteristicUuid).readAsync();
    return new Uint8Array(data);
  }
}
