import { Box, Text } from "ink";
import type React from "react";
import type { SessionMetrics } from "../lib/core/transfer-session.ts";
import { formatSummary } from "../utils/app-utils.ts";

interface TransferSummaryProps {
  metrics: SessionMetrics;
}

export const TransferSummary: React.FC<TransferSummaryProps> = ({
  metrics,
}) => {
  return (
    <Box flexDirection="column" marginTop={1}>
      {formatSummary(metrics).map((line) => (
        <Text key={line} color="white">
          {line}
        </Text>
      ))}
    </Box>
  );
};
