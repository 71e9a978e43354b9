import { describe, test, expect, vi, beforeAll, afterAll } from "vitest";
import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { FirmwareUploader, type DeviceDirectory } from "./firmware-uploader.ts";
import { createSessionConfig } from "../protocol/index.ts";
import {
  DeviceNotFoundError,
  FirmwareUpdateError,
  InvalidFirmwareFileError,
} from "../utils/errors.ts";
import {
  ScriptedTransport,
  createTestFirmware,
} from "../../../__tests__/utils/test-helpers.ts";

const ADDRESS = "aa:bb:cc:dd:ee:01";

function createDirectory(
  found: string | null,
  transport: ScriptedTransport = new ScriptedTransport([], 0xff),
) {
  return {
    findByName: vi.fn(async (_substring: string) => found),
    openTransport: vi.fn(async (_address: string) => transport),
  } satisfies DeviceDirectory;
}

describe("FirmwareUploader", () => {
  const config = createSessionConfig({ packetSize: 10 });

  describe("resolveTarget()", () => {
    test("uses an explicit address without scanning", async () => {
      const devices = createDirectory(null);
      const uploader = new FirmwareUploader(devices, config);

      const target = await uploader.resolveTarget({ address: ADDRESS });

      expect(target).toEqual({ address: ADDRESS, advisories: [] });
      expect(devices.findByName).not.toHaveBeenCalled();
    });

    test("prefers the device found by name", async () => {
      const devices = createDirectory("11:22:33:44:55:66");
      const uploader = new FirmwareUploader(devices, config);

      const target = await uploader.resolveTarget({
        address: ADDRESS,
        name: "Bootloader",
      });

      expect(target).toEqual({ address: "11:22:33:44:55:66", advisories: [] });
      expect(devices.findByName).toHaveBeenCalledWith("Bootloader");
    });

    test("falls back to the address with an advisory", async () => {
      const uploader = new FirmwareUploader(createDirectory(null), config);

      const target = await uploader.resolveTarget({
        address: ADDRESS,
        name: "Bootloader",
      });

      expect(target.address).toBe(ADDRESS);
      expect(target.advisories).toHaveLength(1);
      const advisory = target.advisories[0];
      expect(advisory).toBeInstanceOf(DeviceNotFoundError);
      expect(advisory?.required).toBe(false);
      expect(advisory?.message).toBe(
        `No device name contains 'Bootloader', using address ${ADDRESS}`,
      );
    });

    test("fails when the name is not found and there is no address", async () => {
      const uploader = new FirmwareUploader(createDirectory(null), config);

      await expect(uploader.resolveTarget({ name: "Bootloader" })).rejects.toThrow(
        "No device name contains 'Bootloader'",
      );
    });

    test("requires an address or a name", async () => {
      const uploader = new FirmwareUploader(createDirectory(null), config);

      await expect(uploader.resolveTarget({})).rejects.toThrow(
        FirmwareUpdateError,
      );
      await expect(uploader.resolveTarget({})).rejects.toThrow(
        "Target address or name must be specified",
      );
    });
  });

  describe("upload()", () => {
    let dir: string;
    let firmwarePath: string;

    beforeAll(async () => {
      dir = await mkdtemp(join(tmpdir(), "bfu-uploader-"));
      firmwarePath = join(dir, "app.bin");
      await writeFile(firmwarePath, createTestFirmware(10));
    });

    afterAll(async () => {
      await rm(dir, { recursive: true, force: true });
    });

    test("reads the file and transfers it to the address", async () => {
      const transport = new ScriptedTransport([], 0xff);
      const devices = createDirectory(null, transport);
      const uploader = new FirmwareUploader(devices, config);

      const result = await uploader.upload({ address: ADDRESS, firmwarePath });

      expect(result.ok).toBe(true);
      if (!result.ok) return;
      expect(result.metrics.totalBytes).toBe(10);
      expect(devices.openTransport).toHaveBeenCalledWith(ADDRESS);
      expect(transport.closeCount).toBe(1);
    });

    test("forwards progress updates", async () => {
      const onProgress = vi.fn();
      const uploader = new FirmwareUploader(createDirectory(null), config);

      await uploader.upload({ address: ADDRESS, firmwarePath, onProgress });

      expect(onProgress).toHaveBeenCalledTimes(3);
    });

    test("rejects an unreadable file before connecting", async () => {
      const devices = createDirectory(null);
      const uploader = new FirmwareUploader(devices, config);

      await expect(
        uploader.upload({ address: ADDRESS, firmwarePath: join(dir, "missing.bin") }),
      ).rejects.toThrow(InvalidFirmwareFileError);
      expect(devices.openTransport).not.toHaveBeenCalled();
    });
  });
});
