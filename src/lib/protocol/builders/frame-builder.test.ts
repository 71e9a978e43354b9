import { describe, test, expect } from "vitest";
import {
  FrameBuilder,
  totalPayloadBytes,
  totalWireBytes,
} from "./frame-builder.ts";
import { ConfigurationError, EmptyInputError } from "../../utils/errors.ts";
import { createTestFirmware, expectHex } from "../../../../__tests__/utils/test-helpers.ts";

describe("FrameBuilder", () => {
  describe("build()", () => {
    test("writes little-endian length and checksum before the payload", () => {
      const frame = FrameBuilder.build(Buffer.from("123456789", "ascii"));

      expect(frame.length).toBe(9);
      expect(frame.checksum).toBe(0xcbf43926);
      expectHex(frame.bytes, "0900 2639f4cb 313233343536373839");
    });

    test("payload view matches the input", () => {
      const frame = FrameBuilder.build(Buffer.from([0xde, 0xad]));
      expectHex(frame.payload, "dead");
      expect(frame.bytes.length).toBe(8);
    });

    test("copies the payload", () => {
      const source = Buffer.from([1, 2, 3]);
      const frame = FrameBuilder.build(source);
      source[0] = 9;
      expectHex(frame.payload, "010203");
    });

    test("returns a frozen frame", () => {
      expect(Object.isFrozen(FrameBuilder.build(Buffer.from([1])))).toBe(true);
    });

    test("payload is a view into the wire bytes", () => {
      const frame = FrameBuilder.build(Buffer.from([1, 2]));
      expect(frame.payload.buffer).toBe(frame.bytes.buffer);
      expect(frame.payload.byteOffset).toBe(frame.bytes.byteOffset + 6);
    });

    test("rejects an empty payload", () => {
      expect(() => FrameBuilder.build(Buffer.alloc(0))).toThrow(ConfigurationError);
    });

    test("rejects a payload longer than the length field can hold", () => {
      expect(() => FrameBuilder.build(Buffer.alloc(0x10000))).toThrow(
        "Frame payload must hold 1..65535 bytes, got 65536",
      );
    });
  });

  describe("buildAll()", () => {
    test("splits into full chunks and a remainder", () => {
      const frames = FrameBuilder.buildAll(createTestFirmware(10), 4);

      expect(frames.map((frame) => frame.length)).toEqual([4, 4, 2]);
      expectHex(frames[0]?.payload ?? Buffer.alloc(0), "00010203");
      expectHex(frames[1]?.payload ?? Buffer.alloc(0), "04050607");
      expectHex(frames[2]?.payload ?? Buffer.alloc(0), "0809");
    });

    test("exact multiple has no short frame", () => {
      const frames = FrameBuilder.buildAll(createTestFirmware(8), 4);
      expect(frames.map((frame) => frame.length)).toEqual([4, 4]);
    });

    test("input shorter than a chunk gives one frame", () => {
      const frames = FrameBuilder.buildAll(createTestFirmware(3), 506);
      expect(frames).toHaveLength(1);
      expect(frames[0]?.length).toBe(3);
    });

    test("payloads concatenate back to the input", () => {
      const source = createTestFirmware(1300);
      const frames = FrameBuilder.buildAll(source, 506);

      expect(frames).toHaveLength(3);
      expect(Buffer.concat(frames.map((frame) => frame.payload))).toEqual(source);
    });

    test.each([0, -1, 1.5, 65536])("rejects chunk size %d", (size) => {
      expect(() => FrameBuilder.buildAll(createTestFirmware(4), size)).toThrow(
        ConfigurationError,
      );
    });

    test("chunk size error message", () => {
      expect(() => FrameBuilder.buildAll(createTestFirmware(4), 0)).toThrow(
        "Chunk payload size must be an integer in 1..65535, got 0",
      );
    });

    test("rejects empty input", () => {
      expect(() => FrameBuilder.buildAll(Buffer.alloc(0), 4)).toThrow(EmptyInputError);
    });

    test("checks chunk size before emptiness", () => {
      expect(() => FrameBuilder.buildAll(Buffer.alloc(0), 0)).toThrow(
        ConfigurationError,
      );
    });
  });

  describe("totals", () => {
    test("payload and wire byte counts", () => {
      const frames = FrameBuilder.buildAll(createTestFirmware(10), 4);
      expect(totalPayloadBytes(frames)).toBe(10);
      expect(totalWireBytes(frames)).toBe(10 + 3 * 6);
    });
  });
});
