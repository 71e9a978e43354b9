import { ReceiverResponse } from "../control-bytes.ts";

/**
 * What the sender should do with a response read from the device
 *
 * - `ack`: accepted
 * - `abort`: stop immediately, do not retry
 * - `retry`: explicit NACK_RETRY
 * - `unknown`: any other byte, handled like `retry`
 * - `timeout`: nothing arrived in time, handled like `retry`
 */
export type ResponseKind = "ack" | "abort" | "retry" | "unknown" | "timeout";

/**
 * Parser for single-byte responses received from the device
 */
export class ResponseParser {
  /**
   * Reads the response byte out of a `receive(1)` result.
   *
   * @param data Bytes returned by the transport, or null on timeout
   * @returns The first byte, or null when nothing was received
   */
  public static parse(data: Uint8Array | null): number | null {
    if (data === null || data.length === 0) {
      return null;
    }
    return data[0] ?? null;
  }

  public static classify(response: number | null): ResponseKind {
    if (response === null) {
      return "timeout";
    }
    switch (response) {
      case ReceiverResponse.ACK:
        return "ack";
      case ReceiverResponse.NACK_ABORT:
        return "abort";
      case ReceiverResponse.NACK_RETRY:
        return "retry";
      default:
        return "unknown";
    }
  }

  public static isAck(response: number | null): boolean {
    return response === ReceiverResponse.ACK;
  }

  /**
   * Short text for logs, e.g. `0xee (retry)` or `timeout`
   */
  public static describe(response: number | null): string {
    if (response === null) {
      return "timeout";
    }
    const hex = `0x${response.toString(16).padStart(2, "0")}`;
    return `${hex} (${ResponseParser.classify(response)})`;
  }
}
