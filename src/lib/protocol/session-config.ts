import type { SessionConfig, SessionConfigInput } from "./interfaces/config.ts";
import {
  DEFAULT_MAX_ATTEMPTS,
  DEFAULT_PACKET_SIZE,
  DEFAULT_RESPONSE_TIMEOUT_MS,
} from "./interfaces/defaults.ts";
import {
  FRAME_OVERHEAD,
  MAX_ATTEMPTS_LIMIT,
  MAX_PACKET_SIZE,
} from "./constants.ts";
import { ConfigurationError } from "../utils/errors.ts";

/**
 * Build a session configuration, filling defaults for missing fields.
 *
 * @throws ConfigurationError when a field is out of range
 */
export function createSessionConfig(
  input: SessionConfigInput = {},
): SessionConfig {
  const maxAttempts = input.maxAttempts ?? DEFAULT_MAX_ATTEMPTS;
  const packetSize = input.packetSize ?? DEFAULT_PACKET_SIZE;
  const responseTimeoutMs =
    input.responseTimeoutMs ?? DEFAULT_RESPONSE_TIMEOUT_MS;

  if (!Number.isInteger(maxAttempts) || maxAttempts <= 0) {
    throw new ConfigurationError(
      `Attempts must be a positive integer (got ${maxAttempts})`,
    );
  }
  if (maxAttempts > MAX_ATTEMPTS_LIMIT) {
    throw new ConfigurationError(
      `Attempts must be no more than ${MAX_ATTEMPTS_LIMIT} (got ${maxAttempts})`,
    );
  }

  if (!Number.isInteger(packetSize) || packetSize <= 0) {
    throw new ConfigurationError(
      `Packet size must be a positive integer (got ${packetSize})`,
    );
  }
  if (packetSize > MAX_PACKET_SIZE) {
    throw new ConfigurationError(
      `Packet size must be no more than ${MAX_PACKET_SIZE} (got ${packetSize})`,
    );
  }
  if (packetSize <= FRAME_OVERHEAD) {
    throw new ConfigurationError(
      `Packet size must exceed the ${FRAME_OVERHEAD}-byte frame overhead (got ${packetSize})`,
    );
  }

  if (!Number.isFinite(responseTimeoutMs) || responseTimeoutMs <= 0) {
    throw new ConfigurationError(
      `Response timeout must be a positive number of milliseconds (got ${responseTimeoutMs})`,
    );
  }

  return Object.freeze({
    maxAttemptsPerFrame: maxAttempts,
    chunkPayloadSize: packetSize - FRAME_OVERHEAD,
    responseTimeoutMs,
  });
}
