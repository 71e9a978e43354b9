/**
 * Single-byte markers written by the sender
 *
 * ## Wire exchange
 *
 * ```
 * sender   -> "firmware_update"
 * receiver <- 1 byte (liveness, ignored)
 * sender   -> BEGIN
 * receiver <- ACK
 * sender   -> frame ... (each answered by one ReceiverResponse byte)
 * sender   -> END          (after every frame is acknowledged)
 * receiver <- ACK
 * ```
 *
 * `ERROR` replaces `END` when a frame ultimately fails.
 *
 * `END` and `ReceiverResponse.ACK` share the value 0xFF. They travel in
 * opposite directions; keeping them in separate enums makes the compiler
 * reject any comparison between the two.
 */
export enum SessionMarker {
  BEGIN = 0xaa,
  ERROR = 0xee,
  END = 0xff,
}

/**
 * Single-byte responses read from the receiver
 */
export enum ReceiverResponse {
  /**
   * Accepted; move on
   */
  ACK = 0xff,

  /**
   * Frame rejected and transfer should stop without further retries
   */
  NACK_ABORT = 0xaa,

  /**
   * Frame rejected; resend the same bytes. Unknown bytes are treated the same way.
   */
  NACK_RETRY = 0xee,
}
