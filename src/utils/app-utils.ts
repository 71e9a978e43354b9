import type { ConnectionStep } from "../components/index.ts";
import type { DiscoveredDevice } from "../lib/ble/ble-client.ts";
import type {
  ProgressUpdate,
  SessionMetrics,
} from "../lib/core/transfer-session.ts";
import type { FirmwareUpdateError } from "../lib/utils/errors.ts";
import { LogEventType } from "../lib/utils/logger.ts";

type StepStatus = ConnectionStep["status"];

export function createUploadSteps(): ConnectionStep[] {
  return [
    { id: "scan", label: "Looking for device", status: "pending" },
    { id: "prepare", label: "Preparing packets", status: "pending" },
    { id: "connect", label: "Connecting to device", status: "pending" },
    { id: "discover", label: "Discovering characteristics", status: "pending" },
    { id: "handshake", label: "Starting transaction", status: "pending" },
    { id: "transfer", label: "Sending packets", status: "pending" },
    { id: "teardown", label: "Ending transaction", status: "pending" },
  ];
}

export function updateStepStatus(
  steps: ConnectionStep[],
  stepId: string,
  status: StepStatus,
  nextStepId?: string,
): ConnectionStep[] {
  return steps.map((step) => {
    if (step.id === stepId) return { ...step, status };
    if (nextStepId && step.id === nextStepId)
      return { ...step, status: "active" };
    return step;
  });
}

/**
 * Advance the step list for one logged event. Unrelated events leave it unchanged.
 */
export function applyLogEvent(
  steps: ConnectionStep[],
  eventType: LogEventType | undefined,
): ConnectionStep[] {
  switch (eventType) {
    case LogEventType.SCAN_START:
      return updateStepStatus(steps, "scan", "active");
    case LogEventType.DEVICE_FOUND:
      return updateStepStatus(steps, "scan", "complete");
    case LogEventType.FRAMES_BUILT:
      return updateStepStatus(steps, "prepare", "complete");
    case LogEventType.CONNECT_START:
      return updateStepStatus(steps, "connect", "active");
    case LogEventType.CONNECTED:
      return updateStepStatus(steps, "connect", "complete", "discover");
    case LogEventType.DISCOVER_CHAR:
      return updateStepStatus(steps, "discover", "complete");
    case LogEventType.HANDSHAKE_START:
      return updateStepStatus(steps, "handshake", "active");
    case LogEventType.HANDSHAKE_COMPLETE:
      return updateStepStatus(steps, "handshake", "complete");
    case LogEventType.TRANSFER_START:
      return updateStepStatus(steps, "transfer", "active");
    case LogEventType.TRANSFER_COMPLETE:
      return updateStepStatus(steps, "transfer", "complete");
    case LogEventType.TEARDOWN_START:
      return updateStepStatus(steps, "teardown", "active");
    case LogEventType.TEARDOWN_COMPLETE:
      return updateStepStatus(steps, "teardown", "complete");
    default:
      return steps;
  }
}

/**
 * Mark every active step as failed
 */
export function failActiveSteps(
  steps: ConnectionStep[],
  error: string,
): ConnectionStep[] {
  return steps.map((step) =>
    step.status === "active" ? { ...step, status: "error", error } : step,
  );
}

const CATEGORY_LABELS: Record<FirmwareUpdateError["category"], string> = {
  general: "Error",
  connection: "Connection",
  configuration: "Configuration",
  input: "Firmware file",
  protocol: "Protocol",
  handshake: "Handshake",
  transfer: "Transfer",
  teardown: "Teardown",
};

/**
 * Categorized one-line message, e.g. `Handshake: Transfer did not begin`
 */
export function formatFailure(error: FirmwareUpdateError): string {
  return `${CATEGORY_LABELS[error.category]}: ${error.message}`;
}

/**
 * Whole-number percentage of frames resolved
 */
export function progressPercent(update: ProgressUpdate): number {
  if (update.total <= 0) {
    return 0;
  }
  return Math.floor((update.completed * 100) / update.total);
}

/**
 * Summary lines printed after a completed transfer
 */
export function formatSummary(metrics: SessionMetrics): string[] {
  const seconds = metrics.elapsedMs / 1000;
  const lines = [
    `Full size: ${metrics.totalBytes} bytes`,
    `Loading time: ${seconds.toFixed(2)} s`,
  ];
  if (seconds > 0) {
    lines.push(
      `Average speed: ${(metrics.totalBytes / seconds / 1024).toFixed(2)} KB/s`,
    );
  }
  return lines;
}

export function formatDeviceLine(index: number, device: DiscoveredDevice): string {
  return `Device ${index} => ${device.address} \t ${device.name || "(unnamed)"}`;
}
