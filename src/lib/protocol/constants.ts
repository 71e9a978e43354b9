/**
 * Operation announcement sent before `BEGIN`
 *
 * The device answers it with a single byte whose value is not checked.
 */
export const OPERATION_IDENTIFIER = "firmware_update";

/**
 * Size of the little-endian payload length field (2 bytes)
 */
export const LENGTH_FIELD_SIZE = 2;

/**
 * Size of the little-endian CRC-32 field (4 bytes)
 */
export const CHECKSUM_FIELD_SIZE = 4;

/**
 * Bytes every frame adds on top of its payload
 */
export const FRAME_OVERHEAD = LENGTH_FIELD_SIZE + CHECKSUM_FIELD_SIZE;

/**
 * Largest packet (frame overhead + payload) the device accepts
 */
export const MAX_PACKET_SIZE = 512;

/**
 * Upper bound of the 16-bit length field
 */
export const MAX_PAYLOAD_LENGTH = 0xffff;

/**
 * Upper bound of the 32-bit attempt counter
 */
export const MAX_ATTEMPTS_LIMIT = 0xffffffff;
