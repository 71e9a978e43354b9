// Constants
export * from "./constants.ts";

// Enums
export * from "./control-bytes.ts";

// Interfaces and configs
export * from "./interfaces/index.ts";
export { createSessionConfig } from "./session-config.ts";

// Builders
export { crc32 } from "./builders/crc32.ts";
export {
  FrameBuilder,
  totalPayloadBytes,
  totalWireBytes,
} from "./builders/frame-builder.ts";

// Parsers
export { FrameParser } from "./parsers/frame-parser.ts";
export { ResponseParser, type ResponseKind } from "./parsers/response-parser.ts";
