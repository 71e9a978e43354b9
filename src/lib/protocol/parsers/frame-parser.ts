import type { Frame } from "../interfaces/frame.ts";
import {
  CHECKSUM_FIELD_SIZE,
  FRAME_OVERHEAD,
  LENGTH_FIELD_SIZE,
} from "../constants.ts";
import { crc32 } from "../builders/crc32.ts";
import { FrameDecodeError } from "../../utils/errors.ts";

/**
 * Decoder for the frame wire format, the receiving side of `FrameBuilder`
 */
export class FrameParser {
  /**
   * Decode the frame at the start of `data`.
   *
   * @returns The frame and the number of bytes it occupied
   * @throws FrameDecodeError on truncation, a zero length or a checksum mismatch
   */
  public static parse(data: Buffer): { frame: Frame; consumed: number } {
    if (data.length < FRAME_OVERHEAD) {
      throw new FrameDecodeError(
        `Frame header needs ${FRAME_OVERHEAD} bytes, got ${data.length}`,
      );
    }

    const length = data.readUInt16LE(0);
    const checksum = data.readUInt32LE(LENGTH_FIELD_SIZE);

    if (length === 0) {
      throw new FrameDecodeError("Frame declares an empty payload");
    }

    const consumed = FRAME_OVERHEAD + length;
    if (data.length < consumed) {
      throw new FrameDecodeError(
        `Frame declares ${length} payload bytes but only ${data.length - FRAME_OVERHEAD} follow`,
      );
    }

    const payload = data.subarray(
      LENGTH_FIELD_SIZE + CHECKSUM_FIELD_SIZE,
      consumed,
    );
    const actual = crc32(payload);
    if (actual !== checksum) {
      throw new FrameDecodeError(
        `Checksum mismatch: header 0x${checksum.toString(16).padStart(8, "0")}, payload 0x${actual.toString(16).padStart(8, "0")}`,
      );
    }

    return {
      frame: Object.freeze({
        length,
        checksum,
        payload,
        bytes: data.subarray(0, consumed),
      }),
      consumed,
    };
  }

  /**
   * Decode back-to-back frames until `data` is exhausted.
   */
  public static parseAll(data: Buffer): Frame[] {
    const frames: Frame[] = [];
    let offset = 0;
    while (offset < data.length) {
      const { frame, consumed } = FrameParser.parse(data.subarray(offset));
      frames.push(frame);
      offset += consumed;
    }
    return frames;
  }

  /**
   * Concatenate the payloads of `frames` in order
   */
  public static reassemble(frames: readonly Frame[]): Buffer {
    return Buffer.concat(frames.map((frame) => frame.payload));
  }
}
