import { useEffect } from "react";
import type React from "react";
import { Box, Text, useApp } from "ink";
import Spinner from "ink-spinner";
import { Header } from "./index.ts";
import { useDeviceList } from "../hooks/useDeviceList.ts";
import { formatDeviceLine } from "../utils/app-utils.ts";
import type { ListOptions } from "../cli/types.ts";

export interface DeviceListAppProps {
  options: ListOptions;
}

export const DeviceListApp: React.FC<DeviceListAppProps> = ({ options }) => {
  const { exit } = useApp();
  const { status, devices, error } = useDeviceList(options);

  useEffect(() => {
    if (status === "done" || status === "error") {
      const timer = setTimeout(() => {
        exit();
        process.exit(status === "error" ? 1 : 0);
      }, 100);
      return () => clearTimeout(timer);
    }
  }, [status, exit]);

  return (
    <Box flexDirection="column" padding={1}>
      <Header />

      {status === "scanning" && (
        <Box>
          <Text color="cyan">
            <Spinner type="dots" />
          </Text>
          <Text color="cyan" bold>
            {" "}
            Looking for devices...
          </Text>
        </Box>
      )}

      {status === "done" && (
        <Box flexDirection="column">
          <Text color="green" bold>
            Found {devices.length} devices
          </Text>
          {devices.map((device, index) => (
            <Text key={device.address}>{formatDeviceLine(index, device)}</Text>
          ))}
        </Box>
      )}

      {status === "error" && <Text color="red">Scan failed: {error}</Text>}
    </Box>
  );
};
