interface PendingRead {
  length: number;
  resolve: (data: Buffer | null) => void;
  timer: ReturnType<typeof setTimeout>;
}

/**
 * Collects notification payloads and serves them as fixed-size reads
 *
 * Notifications arrive whenever the device sends them; `read()` waits until
 * enough bytes are queued or the timeout fires. Bytes that arrive after a
 * read timed out stay queued for the next read.
 */
export class ReceiveBuffer {
  private queued: Buffer = Buffer.alloc(0);
  private pending: PendingRead | null = null;
  private closed = false;

  /**
   * Append bytes received from the device
   */
  public push(data: Uint8Array): void {
    if (this.closed || data.length === 0) {
      return;
    }
    this.queued = Buffer.concat([this.queued, data]);
    this.settle();
  }

  /**
   * Wait for `length` bytes.
   *
   * @returns The bytes, or null on timeout or when the buffer is closed
   */
  public read(length: number, timeoutMs: number): Promise<Buffer | null> {
    if (this.pending) {
      return Promise.reject(
        new Error("A read is already waiting on this buffer"),
      );
    }
    if (this.queued.length >= length) {
      return Promise.resolve(this.take(length));
    }
    if (this.closed) {
      return Promise.resolve(null);
    }

    return new Promise((resolve) => {
      const timer = setTimeout(() => {
        this.pending = null;
        resolve(null);
      }, timeoutMs);
      this.pending = { length, resolve, timer };
    });
  }

  /**
   * Number of bytes received but not yet read
   */
  public get available(): number {
    return this.queued.length;
  }

  /**
   * Drop queued bytes and fail any waiting read with null
   */
  public close(): void {
    this.closed = true;
    this.queued = Buffer.alloc(0);
    if (this.pending) {
      clearTimeout(this.pending.timer);
      const { resolve } = this.pending;
      this.pending = null;
      resolve(null);
    }
  }

  private settle(): void {
    if (!this.pending || this.queued.length < this.pending.length) {
      return;
    }
    const { length, resolve, timer } = this.pending;
    clearTimeout(timer);
    this.pending = null;
    resolve(this.take(length));
  }

  private take(length: number): Buffer {
    const out = Buffer.from(this.queued.subarray(0, length));
    this.queued = this.queued.subarray(length);
    return out;
  }
}
