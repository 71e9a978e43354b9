import type { Stats } from "node:fs";
import { stat } from "node:fs/promises";
import { InvalidArgumentError } from "commander";
import { FRAME_OVERHEAD, MAX_PACKET_SIZE } from "../lib/protocol/index.ts";
import { FirmwareDetector } from "../lib/processing/firmware-detector.ts";
import {
  EmptyInputError,
  InvalidFirmwareFileError,
} from "../lib/utils/errors.ts";

function parseInteger(value: string): number {
  if (!/^[+-]?\d+$/.test(value.trim())) {
    throw new InvalidArgumentError("Not an integer.");
  }
  return Number.parseInt(value, 10);
}

export function parseAttempts(value: string): number {
  const attempts = parseInteger(value);
  if (attempts <= 0) {
    throw new InvalidArgumentError("Attempts must be positive!");
  }
  return attempts;
}

export function parsePacketSize(value: string): number {
  const size = parseInteger(value);
  if (size <= 0) {
    throw new InvalidArgumentError("Size must be positive!");
  }
  if (size > MAX_PACKET_SIZE) {
    throw new InvalidArgumentError(
      `Size must be no more than ${MAX_PACKET_SIZE}!`,
    );
  }
  if (size <= FRAME_OVERHEAD) {
    throw new InvalidArgumentError(
      `Size must be more than the ${FRAME_OVERHEAD}-byte packet header!`,
    );
  }
  return size;
}

export function parseTimeout(value: string): number {
  const timeout = parseInteger(value);
  if (timeout <= 0) {
    throw new InvalidArgumentError("Timeout must be positive!");
  }
  return timeout;
}

/**
 * Accumulator for a repeatable `-v`
 */
export function increaseVerbosity(_value: string, previous: number): number {
  return previous + 1;
}

/**
 * Check that `path` exists, is a regular file, is a generic binary and is
 * not empty.
 *
 * @throws InvalidFirmwareFileError describing the first failed check
 * @throws EmptyInputError for a zero-byte file
 */
export async function checkFirmwareFile(path: string): Promise<void> {
  let stats: Stats;
  try {
    stats = await stat(path);
  } catch {
    throw new InvalidFirmwareFileError(`The file ${path} does not exist!`);
  }

  if (!stats.isFile()) {
    throw new InvalidFirmwareFileError(`${path} is not a file!`);
  }

  const info = await FirmwareDetector.detectFromFile(path);
  if (!FirmwareDetector.isGenericBinary(info)) {
    throw new InvalidFirmwareFileError(
      `The file ${path} is of the wrong type${info.mimeType ? ` (${info.mimeType})` : ""}!`,
    );
  }

  if (stats.size === 0) {
    throw new EmptyInputError(`The file ${path} is empty!`);
  }
}
