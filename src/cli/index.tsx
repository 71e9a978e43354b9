import { Command } from "commander";
import { logger } from "../lib/utils/logger.ts";
import { FirmwareUpdateError } from "../lib/utils/errors.ts";
import {
  DEFAULT_BLE_CONFIG,
  DEFAULT_MAX_ATTEMPTS,
  DEFAULT_PACKET_SIZE,
  DEFAULT_RESPONSE_TIMEOUT_MS,
  createSessionConfig,
} from "../lib/protocol/index.ts";
import type { SessionConfig } from "../lib/protocol/index.ts";
import {
  checkFirmwareFile,
  increaseVerbosity,
  parseAttempts,
  parsePacketSize,
  parseTimeout,
} from "./validation.ts";
import type { CliOptions } from "./types.ts";

export function setupCLI() {
  const program: Command = new Command();

  program
    .name("bfuctl")
    .description("Uploads firmware to a device over Bluetooth")
    .version("0.1.0")
    .option(
      "-a, --attempts <count>",
      "number of attempts to resend packet",
      parseAttempts,
      DEFAULT_MAX_ATTEMPTS,
    )
    .option(
      "-p, --packsize <bytes>",
      "packet size in bytes, 6-byte header included",
      parsePacketSize,
      DEFAULT_PACKET_SIZE,
    )
    .option(
      "--timeout <ms>",
      "how long to wait for each device response",
      parseTimeout,
      DEFAULT_RESPONSE_TIMEOUT_MS,
    )
    .option(
      "-v, --verbose",
      "verbose output level (repeat for packet dumps)",
      increaseVerbosity,
      0,
    )
    .option("-l, --list", "print list of available devices", false)
    .option("-t, --target <address>", "target device address")
    .option("-n, --name <substring>", "target device name")
    .argument("[path]", "path to firmware binary file")
    .action(async (path: string | undefined, options: CliOptions) => {
      logger.setVerbosity(options.verbose);

      if (options.list) {
        const { DeviceListApp } = await import("../components/DeviceListApp.tsx");
        const { render } = await import("ink");
        render(<DeviceListApp options={{ bleConfig: DEFAULT_BLE_CONFIG }} />);
        return;
      }

      if (!options.target && !options.name) {
        program.error("error: target address or name must be specified!");
      }
      if (!path) {
        program.error("error: missing required argument 'path'");
      }

      let sessionConfig: SessionConfig;
      try {
        await checkFirmwareFile(path);
        sessionConfig = createSessionConfig({
          maxAttempts: options.attempts,
          packetSize: options.packsize,
          responseTimeoutMs: options.timeout,
        });
      } catch (error) {
        if (error instanceof FirmwareUpdateError) {
          program.error(`error: ${error.message}`);
        }
        throw error;
      }

      const { App } = await import("../components/App.tsx");
      const { render } = await import("ink");
      render(
        <App
          options={{
            firmwarePath: path,
            target: { address: options.target, name: options.name },
            sessionConfig,
            bleConfig: DEFAULT_BLE_CONFIG,
          }}
        />,
      );
    });

  return program;
}
