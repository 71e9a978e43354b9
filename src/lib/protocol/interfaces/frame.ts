/**
 * One checksummed, length-prefixed chunk of firmware as sent on the wire
 */
export interface Frame {
  /**
   * Payload length, written as uint16 little-endian
   */
  readonly length: number;

  /**
   * CRC-32 of the payload, written as uint32 little-endian
   */
  readonly checksum: number;

  /**
   * Firmware bytes carried by this frame, a view into `bytes`
   */
  readonly payload: Buffer;

  /**
   * Full wire representation: length || checksum || payload
   */
  readonly bytes: Buffer;
}
