import { useState, useEffect } from "react";
import { BleClient, type DiscoveredDevice } from "../lib/ble/ble-client.ts";
import { describeError } from "../lib/utils/errors.ts";
import type { ListOptions } from "../cli/types.ts";

export function useDeviceList(options: ListOptions) {
  const [status, setStatus] = useState<"scanning" | "done" | "error">(
    "scanning",
  );
  const [devices, setDevices] = useState<DiscoveredDevice[]>([]);
  const [error, setError] = useState<string | null>(null);

  useEffect(() => {
    const client = new BleClient(options.bleConfig);

    const runScan = async () => {
      try {
        setDevices(await client.listDevices());
        setStatus("done");
      } catch (scanError) {
        setError(describeError(scanError));
        setStatus("error");
      } finally {
        await client.shutdown();
      }
    };

    void runScan();
  }, [options]);

  return { status, devices, error };
}
