import type { Characteristic, Peripheral } from "@abandonware/noble";
import type { Transport } from "../transport/transport.ts";
import { ReceiveBuffer } from "../transport/receive-buffer.ts";
import { ConnectionError, describeError } from "../utils/errors.ts";
import { logger } from "../utils/logger.ts";

/**
 * Byte stream over a pair of BLE characteristics
 *
 * Writes go to the write characteristic in slices of `maxWriteSize`;
 * notifications from the notify characteristic feed a `ReceiveBuffer`.
 */
export class BleTransport implements Transport {
  private readonly buffer = new ReceiveBuffer();
  private closed = false;
  private released = false;
  private readonly onData = (data: Buffer): void => {
    logger.debug(
      `[RECV] Bytes: ${data.length} | Hex: ${data.toString("hex")}`,
    );
    this.buffer.push(data);
  };
  private readonly onDisconnect = (): void => {
    logger.warning("Device disconnected");
    this.closed = true;
    this.buffer.close();
  };

  private constructor(
    private readonly peripheral: Peripheral,
    private readonly writeCharacteristic: Characteristic,
    private readonly notifyCharacteristic: Characteristic,
    private readonly maxWriteSize: number,
  ) {}

  /**
   * Subscribe to notifications and return a ready transport
   */
  public static async open(
    peripheral: Peripheral,
    writeCharacteristic: Characteristic,
    notifyCharacteristic: Characteristic,
    maxWriteSize: number,
  ): Promise<BleTransport> {
    const transport = new BleTransport(
      peripheral,
      writeCharacteristic,
      notifyCharacteristic,
      maxWriteSize,
    );
    notifyCharacteristic.on("data", transport.onData);
    peripheral.once("disconnect", transport.onDisconnect);
    await notifyCharacteristic.subscribeAsync();
    return transport;
  }

  public async send(data: Uint8Array): Promise<void> {
    if (this.closed) {
      throw new ConnectionError("BLE transport is closed");
    }

    const packet = Buffer.from(data);
    logger.debug(
      `[SEND] Bytes: ${packet.length} | Hex: ${packet.toString("hex")}`,
    );

    for (
      let offset = 0;
      offset < packet.length;
      offset += this.maxWriteSize
    ) {
      // Write without response
      await this.writeCharacteristic.writeAsync(
        packet.subarray(offset, offset + this.maxWriteSize),
        true,
      );
    }
  }

  public receive(length: number, timeoutMs: number): Promise<Buffer | null> {
    return this.buffer.read(length, timeoutMs);
  }

  public async close(): Promise<void> {
    if (this.released) {
      return;
    }
    this.released = true;
    this.closed = true;
    this.buffer.close();

    this.notifyCharacteristic.removeListener("data", this.onData);
    this.peripheral.removeListener("disconnect", this.onDisconnect);
    if (this.peripheral.state === "disconnected") {
      return;
    }

    try {
      await this.notifyCharacteristic.unsubscribeAsync();
    } catch (error) {
      logger.debug(`Unsubscribe failed: ${describeError(error)}`);
    }
    await this.peripheral.disconnectAsync();
    logger.info("Disconnected from device");
  }
}
