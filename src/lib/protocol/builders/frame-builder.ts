/**
 * Frame builder
 *
 * Every frame is `FRAME_OVERHEAD + payload` bytes:
 * - Length: payload length (2 bytes, little-endian)
 * - Checksum: CRC-32 of the payload (4 bytes, little-endian)
 * - Payload: 1..chunkPayloadSize firmware bytes
 */
import type { Frame } from "../interfaces/frame.ts";
import {
  CHECKSUM_FIELD_SIZE,
  FRAME_OVERHEAD,
  LENGTH_FIELD_SIZE,
  MAX_PAYLOAD_LENGTH,
} from "../constants.ts";
import { crc32 } from "./crc32.ts";
import { ConfigurationError, EmptyInputError } from "../../utils/errors.ts";

export class FrameBuilder {
  /**
   * Build a single frame around `payload`. The payload is copied.
   *
   * The frame object is frozen but its buffers are not; `payload` is a view
   * into `bytes`, so writing to either changes what goes on the wire.
   */
  static build(payload: Uint8Array): Frame {
    if (payload.length === 0 || payload.length > MAX_PAYLOAD_LENGTH) {
      throw new ConfigurationError(
        `Frame payload must hold 1..${MAX_PAYLOAD_LENGTH} bytes, got ${payload.length}`,
      );
    }

    const bytes = Buffer.alloc(FRAME_OVERHEAD + payload.length);
    const checksum = crc32(payload);

    bytes.writeUInt16LE(payload.length, 0);
    bytes.writeUInt32LE(checksum, LENGTH_FIELD_SIZE);
    bytes.set(payload, LENGTH_FIELD_SIZE + CHECKSUM_FIELD_SIZE);

    return Object.freeze({
      length: payload.length,
      checksum,
      payload: bytes.subarray(FRAME_OVERHEAD),
      bytes,
    });
  }

  /**
   * Split `source` into frames of `chunkPayloadSize` bytes; the last frame
   * carries the remainder.
   *
   * @throws ConfigurationError when `chunkPayloadSize` is not in 1..65535
   * @throws EmptyInputError when `source` has no bytes
   */
  static buildAll(source: Uint8Array, chunkPayloadSize: number): Frame[] {
    if (
      !Number.isInteger(chunkPayloadSize) ||
      chunkPayloadSize <= 0 ||
      chunkPayloadSize > MAX_PAYLOAD_LENGTH
    ) {
      throw new ConfigurationError(
        `Chunk payload size must be an integer in 1..${MAX_PAYLOAD_LENGTH}, got ${chunkPayloadSize}`,
      );
    }
    if (source.length === 0) {
      throw new EmptyInputError();
    }

    const frames: Frame[] = [];
    for (let offset = 0; offset < source.length; offset += chunkPayloadSize) {
      frames.push(
        FrameBuilder.build(source.subarray(offset, offset + chunkPayloadSize)),
      );
    }
    return frames;
  }
}

/**
 * Total payload bytes carried by `frames`
 */
export function totalPayloadBytes(frames: readonly Frame[]): number {
  return frames.reduce((sum, frame) => sum + frame.length, 0);
}

/**
 * Total bytes `frames` occupy on the wire, headers included
 */
export function totalWireBytes(frames: readonly Frame[]): number {
  return frames.reduce((sum, frame) => sum + frame.bytes.length, 0);
}
