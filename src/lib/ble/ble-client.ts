import { EventEmitter } from "node:events";
EventEmitter.defaultMaxListeners = 20;

import noble from "@abandonware/noble";
import type { Peripheral, Characteristic } from "@abandonware/noble";
import type { BLEConfig } from "../protocol/index.ts";
import { BleTransport } from "./ble-transport.ts";
import {
  ConnectionError,
  DeviceNotFoundError,
  describeError,
} from "../utils/errors.ts";
import { logger, LogEventType } from "../utils/logger.ts";

/**
 * A device seen during a scan
 */
export interface DiscoveredDevice {
  address: string;
  name: string;
  rssi: number;
}

/**
 * Scans for devices and opens byte-stream transports to them
 */
export class BleClient {
  private isInitialized: boolean = false;
  private peripherals: Map<string, Peripheral> = new Map();

  constructor(private bleConfig: BLEConfig) {}

  /**
   * Initialize Bluetooth adapter and wait for powered on state
   */
  private async initBluetooth(): Promise<void> {
    if (this.isInitialized) {
      return;
    }

    if (noble._state === "poweredOn") {
      this.isInitialized = true;
      return;
    }

    return new Promise((resolve, reject) => {
      const timeout = setTimeout(() => {
        noble.removeListener("stateChange", checkState);
        reject(new ConnectionError("Bluetooth adapter initialization timeout"));
      }, 10000);

      const settle = (error?: ConnectionError) => {
        clearTimeout(timeout);
        noble.removeListener("stateChange", checkState);
        if (error) {
          reject(error);
        } else {
          this.isInitialized = true;
          resolve();
        }
      };

      const checkState = (state: string) => {
        if (state === "poweredOn") {
          settle();
        } else if (state === "poweredOff") {
          settle(new ConnectionError("Bluetooth adapter is not powered on"));
        } else if (state === "unsupported") {
          settle(
            new ConnectionError("Bluetooth is not supported on this device"),
          );
        } else if (state === "unauthorized") {
          settle(new ConnectionError("Bluetooth access not authorized"));
        }
      };

      noble.on("stateChange", checkState);
    });
  }

  /**
   * Normalize UUID for comparison
   * Handles both full 128-bit UUIDs and short 16/32-bit UUIDs
   * Short UUIDs use the Bluetooth Base UUID: 00000000-0000-1000-8000-00805f9b34fb
   */
  public static normalizeUUID(uuid: string): string {
    const cleaned = uuid.replace(/-/g, "").toLowerCase();

    const bluetoothBasePattern = /^0000([0-9a-f]{4})00001000800000805f9b34fb$/;
    const match = cleaned.match(bluetoothBasePattern);
    if (match && match[1]) {
      return match[1];
    }

    return cleaned;
  }

  private static addressOf(peripheral: Peripheral): string {
    return peripheral.address || peripheral.id;
  }

  /**
   * Scan until `matches` returns true or the scan timeout elapses.
   * Every peripheral seen is remembered for a later `openTransport`.
   * @returns The matching peripheral, or null when the scan timed out
   */
  private async scan(
    matches: (peripheral: Peripheral) => boolean,
  ): Promise<Peripheral | null> {
    await this.initBluetooth();

    return new Promise((resolve, reject) => {
      let done = false;

      const finish = (match: Peripheral | null, error?: ConnectionError) => {
        if (done) {
          return;
        }
        done = true;
        clearTimeout(timeoutId);
        noble.removeListener("discover", onDiscover);
        const settle = () => (error ? reject(error) : resolve(match));
        noble.stopScanningAsync().then(settle, (stopError: unknown) => {
          logger.debug(`Stop scanning failed: ${describeError(stopError)}`);
          settle();
        });
      };

      const onDiscover = (peripheral: Peripheral) => {
        const address = BleClient.addressOf(peripheral);
        this.peripherals.set(address.toLowerCase(), peripheral);
        if (matches(peripheral)) {
          finish(peripheral);
        }
      };

      const timeoutId = setTimeout(
        () => finish(null),
        this.bleConfig.scanTimeout * 1000,
      );

      noble.on("discover", onDiscover);
      noble.startScanningAsync([], false).catch((err: unknown) => {
        finish(null, new ConnectionError(`Scan error: ${describeError(err)}`));
      });
    });
  }

  /**
   * Scan for the full scan timeout and return every device seen
   */
  public async listDevices(): Promise<DiscoveredDevice[]> {
    logger.info("Script is looking for devices...", LogEventType.SCAN_START);

    const devices = new Map<string, DiscoveredDevice>();
    await this.scan((peripheral) => {
      const address = BleClient.addressOf(peripheral);
      devices.set(address, {
        address,
        name: peripheral.advertisement.localName ?? "",
        rssi: peripheral.rssi,
      });
      return false;
    });

    logger.info(`Found ${devices.size} devices`);
    return [...devices.values()];
  }

  /**
   * Find the first device whose advertised name contains `substring`
   * @returns Device address or null if not found
   */
  public async findByName(substring: string): Promise<string | null> {
    logger.info(
      `Finding device with name '${substring}'...`,
      LogEventType.SCAN_START,
    );

    const match = await this.scan((peripheral) => {
      const name = peripheral.advertisement.localName;
      return Boolean(name && name.includes(substring));
    });
    if (!match) {
      return null;
    }

    const address = BleClient.addressOf(match);
    const name = match.advertisement.localName;
    logger.info(`Found device: ${name} (${address})`, LogEventType.DEVICE_FOUND, {
      name,
      address,
    });
    return address;
  }

  private async findByAddress(address: string): Promise<Peripheral> {
    const known = this.peripherals.get(address.toLowerCase());
    if (known) {
      return known;
    }

    logger.info("Scanning for device by address...", LogEventType.SCAN_START);
    const found = await this.scan(
      (peripheral) =>
        BleClient.addressOf(peripheral).toLowerCase() === address.toLowerCase(),
    );

    if (!found) {
      throw new DeviceNotFoundError(
        `Could not find device with address '${address}'`,
      );
    }
    logger.info(`Found device: ${address}`, LogEventType.DEVICE_FOUND, {
      address,
    });
    return found;
  }

  /**
   * Connect to `address` and open a transport over its UART characteristics
   */
  public async openTransport(address: string): Promise<BleTransport> {
    const peripheral = await this.findByAddress(address);

    logger.info("Connecting to device...", LogEventType.CONNECT_START);
    await peripheral.connectAsync();
    logger.info("Connected to device", LogEventType.CONNECTED);

    try {
      const { writeCharacteristic, notifyCharacteristic } =
        await this.discoverCharacteristics(peripheral);
      return await BleTransport.open(
        peripheral,
        writeCharacteristic,
        notifyCharacteristic,
        this.bleConfig.maxWriteSize,
      );
    } catch (error) {
      await peripheral.disconnectAsync().catch((disconnectError: unknown) => {
        logger.debug(
          `Disconnect after failed setup: ${describeError(disconnectError)}`,
        );
      });
      throw error instanceof ConnectionError
        ? error
        : new ConnectionError(`Connection error: ${describeError(error)}`);
    }
  }

  /**
   * Discover required characteristics on the device
   */
  private async discoverCharacteristics(peripheral: Peripheral): Promise<{
    writeCharacteristic: Characteristic;
    notifyCharacteristic: Characteristic;
  }> {
    const { characteristics } =
      await peripheral.discoverAllServicesAndCharacteristicsAsync();

    const writeUuid = BleClient.normalizeUUID(
      this.bleConfig.writeCharacteristicUUID,
    );
    const notifyUuid = BleClient.normalizeUUID(
      this.bleConfig.notifyCharacteristicUUID,
    );

    let writeCharacteristic: Characteristic | undefined;
    let notifyCharacteristic: Characteristic | undefined;

    for (const char of characteristics) {
      const normalized = BleClient.normalizeUUID(char.uuid);
      logger.debug(`  Characteristic: ${char.uuid} (normalized: ${normalized})`);

      if (normalized === writeUuid) {
        writeCharacteristic = char;
      }
      if (normalized === notifyUuid) {
        notifyCharacteristic = char;
      }
    }

    if (!writeCharacteristic || !notifyCharacteristic) {
      throw new ConnectionError("Could not find required characteristics");
    }

    logger.info("Found UART characteristics", LogEventType.DISCOVER_CHAR, {
      write: writeCharacteristic.uuid,
      notify: notifyCharacteristic.uuid,
    });
    return { writeCharacteristic, notifyCharacteristic };
  }

  /**
   * Stop scanning and drop adapter listeners
   */
  public async shutdown(): Promise<void> {
    noble.removeAllListeners("discover");
    noble.removeAllListeners("stateChange");
    try {
      await noble.stopScanningAsync();
    } catch (error) {
      logger.warning(`Error during shutdown: ${describeError(error)}`);
    }
  }
}
