/**
 * Category shown in front of a failure message
 */
export type ErrorCategory =
  | "general"
  | "connection"
  | "configuration"
  | "input"
  | "protocol"
  | "handshake"
  | "transfer"
  | "teardown";

export interface FirmwareUpdateErrorOptions {
  /**
   * Whether the condition ends the run. Advisory errors (`false`) are
   * reported as warnings only.
   */
  required?: boolean;
}

/**
 * Base error class for all firmware update errors
 */
export class FirmwareUpdateError extends Error {
  public readonly required: boolean;
  public readonly category: ErrorCategory;

  constructor(
    message: string,
    category: ErrorCategory = "general",
    options: FirmwareUpdateErrorOptions = {},
  ) {
    super(message);
    this.name = "FirmwareUpdateError";
    this.category = category;
    this.required = options.required ?? true;
    Object.setPrototypeOf(this, FirmwareUpdateError.prototype);
  }
}

/**
 * Error thrown when the device or its transport cannot be reached
 */
export class ConnectionError extends FirmwareUpdateError {
  constructor(
    message: string = "Connection failed",
    options: FirmwareUpdateErrorOptions = {},
  ) {
    super(message, "connection", options);
    this.name = "ConnectionError";
    Object.setPrototypeOf(this, ConnectionError.prototype);
  }
}

/**
 * Error thrown when a device cannot be found during a scan
 */
export class DeviceNotFoundError extends ConnectionError {
  constructor(
    message: string = "Device not found",
    options: FirmwareUpdateErrorOptions = {},
  ) {
    super(message, options);
    this.name = "DeviceNotFoundError";
    Object.setPrototypeOf(this, DeviceNotFoundError.prototype);
  }
}

/**
 * Error thrown when packet size, attempt count or timeout are invalid.
 * Always raised before any I/O takes place.
 */
export class ConfigurationError extends FirmwareUpdateError {
  constructor(message: string) {
    super(message, "configuration");
    this.name = "ConfigurationError";
    Object.setPrototypeOf(this, ConfigurationError.prototype);
  }
}

/**
 * Error thrown when the firmware image contains no bytes
 */
export class EmptyInputError extends FirmwareUpdateError {
  constructor(message: string = "Firmware image is empty") {
    super(message, "input");
    this.name = "EmptyInputError";
    Object.setPrototypeOf(this, EmptyInputError.prototype);
  }
}

/**
 * Error thrown when the firmware path is missing, not a file or not a binary
 */
export class InvalidFirmwareFileError extends FirmwareUpdateError {
  constructor(message: string) {
    super(message, "input");
    this.name = "InvalidFirmwareFileError";
    Object.setPrototypeOf(this, InvalidFirmwareFileError.prototype);
  }
}

/**
 * Error thrown when bytes on the wire are not a well-formed frame
 */
export class FrameDecodeError extends FirmwareUpdateError {
  constructor(message: string) {
    super(message, "protocol");
    this.name = "FrameDecodeError";
    Object.setPrototypeOf(this, FrameDecodeError.prototype);
  }
}

/**
 * Error thrown when the device does not agree to start the transfer
 */
export class HandshakeRejectedError extends FirmwareUpdateError {
  constructor(message: string = "Transfer did not begin") {
    super(message, "handshake");
    this.name = "HandshakeRejectedError";
    Object.setPrototypeOf(this, HandshakeRejectedError.prototype);
  }
}

/**
 * Why a frame could not be delivered
 */
export type FrameFailureReason = "aborted" | "exhausted";

/**
 * Error thrown when a frame is aborted by the device or runs out of attempts.
 * `frameIndex` is zero-based.
 */
export class TransferAbortedError extends FirmwareUpdateError {
  constructor(
    public readonly frameIndex: number,
    public readonly frameCount: number,
    public readonly reason: FrameFailureReason,
    public readonly attempts: number,
  ) {
    super(
      reason === "aborted"
        ? `Packet ${frameIndex + 1}/${frameCount} aborted by device after ${attempts} attempt(s)`
        : `Packet ${frameIndex + 1}/${frameCount} send error: no acknowledgment after ${attempts} attempt(s)`,
      "transfer",
    );
    this.name = "TransferAbortedError";
    Object.setPrototypeOf(this, TransferAbortedError.prototype);
  }
}

/**
 * Error thrown when the device does not confirm the end of the transfer
 */
export class TeardownRejectedError extends FirmwareUpdateError {
  constructor(message: string = "Transfer did not end") {
    super(message, "teardown");
    this.name = "TeardownRejectedError";
    Object.setPrototypeOf(this, TeardownRejectedError.prototype);
  }
}

/**
 * Readable text for anything caught in a `catch` clause
 */
export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message.length > 0 ? error.message : error.name;
  }
  return String(error);
}
