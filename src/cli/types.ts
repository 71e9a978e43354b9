import type { BLEConfig, SessionConfig } from "../lib/protocol/index.ts";
import type { TargetSelector } from "../lib/core/firmware-uploader.ts";

/**
 * Options as commander hands them to the action
 */
export interface CliOptions {
  attempts: number;
  packsize: number;
  timeout: number;
  verbose: number;
  list: boolean;
  target?: string;
  name?: string;
}

/**
 * Validated input for the upload screen
 */
export interface UploadOptions {
  firmwarePath: string;
  target: TargetSelector;
  sessionConfig: SessionConfig;
  bleConfig: BLEConfig;
}

export interface ListOptions {
  bleConfig: BLEConfig;
}
