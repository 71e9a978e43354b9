import { useEffect } from "react";
import type React from "react";
import { Box, Text, useApp } from "ink";
import {
  Header,
  UploadProgress,
  ConnectionStatus,
  TransferSummary,
} from "./index.ts";
import { useUpload } from "../hooks/useUpload.ts";
import type { UploadOptions } from "../cli/types.ts";

export interface AppProps {
  options: UploadOptions;
}

export const App: React.FC<AppProps> = ({ options }) => {
  const { exit } = useApp();
  const { status, message, progress, metrics, warnings, steps } =
    useUpload(options);

  // Exit the app when done
  useEffect(() => {
    if (status === "success" || status === "error") {
      const timer = setTimeout(() => {
        exit();
        // Force exit since noble keeps handles open
        process.exit(status === "error" ? 1 : 0);
      }, 100);
      return () => clearTimeout(timer);
    }
  }, [status, exit]);

  return (
    <Box flexDirection="column" padding={1}>
      <Header />

      {warnings.map((warning) => (
        <Text key={warning} color="yellow">
          [WARN] {warning}
        </Text>
      ))}

      <UploadProgress status={status} message={message} progress={progress} />
      <ConnectionStatus steps={steps} />

      {metrics && <TransferSummary metrics={metrics} />}

      {status === "error" && (
        <Box marginTop={1}>
          <Text color="red">Exiting...</Text>
        </Box>
      )}
    </Box>
  );
};
