import { useState, useEffect } from "react";
import { BleClient } from "../lib/ble/ble-client.ts";
import { FirmwareUploader } from "../lib/core/firmware-uploader.ts";
import type {
  ProgressUpdate,
  SessionMetrics,
} from "../lib/core/transfer-session.ts";
import { logger } from "../lib/utils/logger.ts";
import { FirmwareUpdateError, describeError } from "../lib/utils/errors.ts";
import type { ConnectionStep, UploadStatus } from "../components/index.ts";
import {
  applyLogEvent,
  createUploadSteps,
  failActiveSteps,
  formatFailure,
} from "../utils/app-utils.ts";
import type { UploadOptions } from "../cli/types.ts";

export function useUpload(options: UploadOptions) {
  const [status, setStatus] = useState<UploadStatus>("connecting");
  const [message, setMessage] = useState<string>("Initializing...");
  const [progress, setProgress] = useState<ProgressUpdate | null>(null);
  const [metrics, setMetrics] = useState<SessionMetrics | null>(null);
  const [warnings, setWarnings] = useState<string[]>([]);
  const [steps, setSteps] = useState<ConnectionStep[]>(createUploadSteps);

  useEffect(() => {
    const unsubscribe = logger.onLog((entry) => {
      setSteps((prev) => applyLogEvent(prev, entry.eventType));
    });

    return unsubscribe;
  }, []);

  useEffect(() => {
    const client = new BleClient(options.bleConfig);
    const uploader = new FirmwareUploader(client, options.sessionConfig);

    const fail = (text: string) => {
      setSteps((prev) => failActiveSteps(prev, text));
      setStatus("error");
      setMessage(text);
    };

    const runUpload = async () => {
      try {
        setMessage("Looking for target device...");
        const { address, advisories } = await uploader.resolveTarget(
          options.target,
        );
        setWarnings(advisories.map(formatFailure));

        setMessage(`Uploading firmware to ${address}...`);
        setStatus("uploading");

        const result = await uploader.upload({
          address,
          firmwarePath: options.firmwarePath,
          onProgress: setProgress,
        });

        if (result.ok) {
          setMetrics(result.metrics);
          setStatus("success");
          setMessage("Firmware uploaded successfully!");
        } else {
          fail(formatFailure(result.error));
        }
      } catch (error) {
        fail(
          error instanceof FirmwareUpdateError
            ? formatFailure(error)
            : `Upload failed: ${describeError(error)}`,
        );
      } finally {
        await client.shutdown();
      }
    };

    void runUpload();
  }, [options]);

  return { status, message, progress, metrics, warnings, steps };
}
