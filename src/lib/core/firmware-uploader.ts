import { readFile } from "node:fs/promises";
import type { SessionConfig } from "../protocol/index.ts";
import type { Transport } from "../transport/transport.ts";
import {
  TransferSession,
  type ProgressSink,
  type TransferResult,
} from "./transfer-session.ts";
import {
  DeviceNotFoundError,
  FirmwareUpdateError,
  InvalidFirmwareFileError,
  describeError,
} from "../utils/errors.ts";
import { logger } from "../utils/logger.ts";

/**
 * Where devices are found and connected; `BleClient` in production
 */
export interface DeviceDirectory {
  findByName(substring: string): Promise<string | null>;
  openTransport(address: string): Promise<Transport>;
}

/**
 * How the user picked the device
 */
export interface TargetSelector {
  address?: string;
  name?: string;
}

export interface ResolvedTarget {
  address: string;
  /**
   * Non-fatal problems met while resolving, e.g. a name lookup that fell
   * back to the explicit address
   */
  advisories: FirmwareUpdateError[];
}

export interface UploadOptions {
  address: string;
  firmwarePath: string;
  onProgress?: ProgressSink;
}

/**
 * Main uploader class
 */
export class FirmwareUploader {
  constructor(
    private readonly devices: DeviceDirectory,
    private readonly sessionConfig: SessionConfig,
  ) {}

  /**
   * Turn an address and/or name substring into a device address.
   *
   * The name lookup runs first when given. If it misses and an address was
   * also given, the miss is an advisory and the address is used.
   *
   * @throws DeviceNotFoundError when nothing matches and there is no fallback
   * @throws FirmwareUpdateError when neither address nor name is given
   */
  public async resolveTarget(selector: TargetSelector): Promise<ResolvedTarget> {
    const { address, name } = selector;

    if (name === undefined) {
      if (address === undefined) {
        throw new FirmwareUpdateError("Target address or name must be specified");
      }
      return { address, advisories: [] };
    }

    const found = await this.devices.findByName(name);
    if (found) {
      logger.info(`Device address: ${found}`);
      return { address: found, advisories: [] };
    }

    if (address === undefined) {
      throw new DeviceNotFoundError(`No device name contains '${name}'`);
    }

    const advisory = new DeviceNotFoundError(
      `No device name contains '${name}', using address ${address}`,
      { required: false },
    );
    logger.warning(advisory.message);
    return { address, advisories: [advisory] };
  }

  /**
   * Read the firmware image and run one transfer session against `address`
   */
  public async upload(options: UploadOptions): Promise<TransferResult> {
    const firmware = await this.loadFirmware(options.firmwarePath);
    logger.info(`Loaded ${firmware.length} bytes from ${options.firmwarePath}`);

    const session = new TransferSession(
      () => this.devices.openTransport(options.address),
      firmware,
      this.sessionConfig,
      options.onProgress,
    );
    return session.run();
  }

  private async loadFirmware(path: string): Promise<Buffer> {
    try {
      return await readFile(path);
    } catch (error) {
      throw new InvalidFirmwareFileError(
        `Cannot read firmware file ${path}: ${describeError(error)}`,
      );
    }
  }
}
