import React from "react";
import { Box, Text } from "ink";
import Spinner from "ink-spinner";
import type { ProgressUpdate } from "../lib/core/transfer-session.ts";
import { progressPercent } from "../utils/app-utils.ts";

export type UploadStatus = "connecting" | "uploading" | "success" | "error";

interface UploadProgressProps {
  status: UploadStatus;
  message?: string;
  progress: ProgressUpdate | null;
}

const ProgressBar: React.FC<{ progress: ProgressUpdate }> = ({ progress }) => {
  const percentage = progressPercent(progress);
  const barLength = 30;
  const filledLength = Math.floor((percentage / 100) * barLength);
  const filled = "█".repeat(filledLength);
  const empty = "░".repeat(barLength - filledLength);
  const seconds = Math.floor(progress.elapsedMs / 1000);

  return (
    <Box marginTop={1}>
      <Text color="dim">[</Text>
      <Text color={percentage < 100 ? "cyan" : "green"}>{filled + empty}</Text>
      <Text color="dim">
        ] {String(percentage).padStart(3)}% {String(seconds).padStart(3)} s{" "}
        ({progress.completed}/{progress.total})
      </Text>
    </Box>
  );
};

export const UploadProgress: React.FC<UploadProgressProps> = ({
  status,
  message,
  progress,
}) => {
  const getStatusColor = () => {
    switch (status) {
      case "connecting":
        return "cyan";
      case "uploading":
        return "blue";
      case "success":
        return "green";
      case "error":
        return "red";
    }
  };

  const statusIcon =
    status === "success" ? "✓" : status === "error" ? "✗" : null;

  return (
    <Box flexDirection="column" paddingY={1}>
      <Box>
        {statusIcon ? (
          <Text color={getStatusColor()}>{statusIcon}</Text>
        ) : (
          <Text color={getStatusColor()}>
            <Spinner type="dots" />
          </Text>
        )}
        <Box marginLeft={1}>
          <Text color={getStatusColor()} bold>
            {message || status.toUpperCase()}
          </Text>
        </Box>
      </Box>
      {progress && <ProgressBar progress={progress} />}
    </Box>
  );
};
