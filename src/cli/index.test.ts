import { describe, test, expect } from "vitest";
import { CommanderError } from "commander";
import { setupCLI } from "./index.tsx";

function createProgram() {
  return setupCLI()
    .exitOverride()
    .configureOutput({ writeErr: () => {}, writeOut: () => {} });
}

describe("setupCLI()", () => {
  test("requires a target address or name", async () => {
    await expect(
      createProgram().parseAsync(["node", "bfuctl", "app.bin"]),
    ).rejects.toThrow("error: target address or name must be specified!");
  });

  test("requires a firmware path", async () => {
    await expect(
      createProgram().parseAsync(["node", "bfuctl", "-t", "aa:bb:cc:dd:ee:01"]),
    ).rejects.toThrow("error: missing required argument 'path'");
  });

  test("reports a missing firmware file", async () => {
    await expect(
      createProgram().parseAsync([
        "node",
        "bfuctl",
        "-t",
        "aa:bb:cc:dd:ee:01",
        "missing-firmware.bin",
      ]),
    ).rejects.toThrow("error: The file missing-firmware.bin does not exist!");
  });

  test("rejects an invalid packet size", async () => {
    await expect(
      createProgram().parseAsync(["node", "bfuctl", "-p", "4", "-t", "x", "a.bin"]),
    ).rejects.toBeInstanceOf(CommanderError);
  });
});
