export type { BLEConfig, SessionConfig, SessionConfigInput } from "./config.ts";
export {
  DEFAULT_BLE_CONFIG,
  DEFAULT_MAX_ATTEMPTS,
  DEFAULT_PACKET_SIZE,
  DEFAULT_RESPONSE_TIMEOUT_MS,
} from "./defaults.ts";
export type { Frame } from "./frame.ts";
