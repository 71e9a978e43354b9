/**
 * A connected, ordered byte channel to the device
 *
 * Implementations own the underlying link. A transport is used by exactly
 * one session and is closed by it on every exit path.
 */
export interface Transport {
  /**
   * Write `data` to the device in order.
   */
  send(data: Uint8Array): Promise<void>;

  /**
   * Read exactly `length` bytes.
   *
   * @returns The bytes, or null when they did not all arrive within `timeoutMs`
   */
  receive(length: number, timeoutMs: number): Promise<Buffer | null>;

  /**
   * Release the link. Safe to call more than once.
   */
  close(): Promise<void>;
}

/**
 * Opens a transport. Rejects when the device cannot be reached.
 */
export type TransportProvider = () => Promise<Transport>;
