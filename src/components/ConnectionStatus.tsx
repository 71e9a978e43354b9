import { Box, Text } from "ink";
import type React from "react";

export interface ConnectionStep {
  id: string;
  label: string;
  status: "pending" | "active" | "complete" | "error";
  error?: string;
}

interface ConnectionStatusProps {
  steps: ConnectionStep[];
}

const STEP_ICONS: Record<ConnectionStep["status"], string> = {
  pending: "·",
  active: "›",
  complete: "✓",
  error: "✗",
};

const STEP_COLORS: Record<ConnectionStep["status"], string> = {
  pending: "gray",
  active: "cyan",
  complete: "green",
  error: "red",
};

/**
 * Every step with its state, in order
 */
export const ConnectionStatus: React.FC<ConnectionStatusProps> = ({
  steps,
}) => {
  return (
    <Box flexDirection="column" marginTop={1}>
      {steps.map((step) => (
        <Box key={step.id}>
          <Text color={STEP_COLORS[step.status]}>
            {STEP_ICONS[step.status]} {step.label}
            {step.status === "active" ? "..." : ""}
          </Text>
          {step.error && <Text color="dim"> ({step.error})</Text>}
        </Box>
      ))}
    </Box>
  );
};
