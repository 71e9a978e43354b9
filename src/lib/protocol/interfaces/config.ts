/**
 * Bluetooth Low Energy (BLE) connection configuration
 *
 * The device exposes its byte stream as a write characteristic (host to
 * device) and a notify characteristic (device to host).
 */
export interface BLEConfig {
  /**
   * UUID of the characteristic the host writes frames and markers to
   */
  writeCharacteristicUUID: string;

  /**
   * UUID of the characteristic the device sends response bytes on
   */
  notifyCharacteristicUUID: string;

  /**
   * Maximum time (in seconds) to scan for devices
   */
  scanTimeout: number;

  /**
   * Largest number of bytes passed to a single characteristic write.
   * Larger packets are split; the device reassembles them from the stream.
   */
  maxWriteSize: number;
}

/**
 * Validated, immutable settings for one transfer session
 */
export interface SessionConfig {
  /**
   * Number of times a frame is sent before the transfer gives up (> 0)
   */
  readonly maxAttemptsPerFrame: number;

  /**
   * Payload bytes per frame: requested packet size minus the 6-byte overhead
   */
  readonly chunkPayloadSize: number;

  /**
   * How long (in milliseconds) to wait for each response byte
   */
  readonly responseTimeoutMs: number;
}

/**
 * Raw values accepted by `createSessionConfig`, usually straight from the CLI
 */
export interface SessionConfigInput {
  maxAttempts?: number;
  packetSize?: number;
  responseTimeoutMs?: number;
}
