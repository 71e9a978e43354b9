import type { BLEConfig } from "./config.ts";
import { MAX_PACKET_SIZE } from "../constants.ts";

/**
 * Default BLE configuration
 *
 * Uses the Nordic UART Service layout that most ESP32 serial bridges expose:
 * - writeCharacteristicUUID: 6e400002 (RX on the device side)
 * - notifyCharacteristicUUID: 6e400003 (TX on the device side)
 * - maxWriteSize: 20 bytes, the payload that fits the default 23-byte ATT MTU
 */
export const DEFAULT_BLE_CONFIG: BLEConfig = {
  writeCharacteristicUUID: "6e400002-b5a3-f393-e0a9-e50e24dcca9e",
  notifyCharacteristicUUID: "6e400003-b5a3-f393-e0a9-e50e24dcca9e",
  scanTimeout: 10.0,
  maxWriteSize: 20,
};

export const DEFAULT_MAX_ATTEMPTS = 3;

export const DEFAULT_PACKET_SIZE = MAX_PACKET_SIZE;

export const DEFAULT_RESPONSE_TIMEOUT_MS = 1000;
