import type { Frame, SessionConfig } from "../protocol/index.ts";
import {
  FrameBuilder,
  OPERATION_IDENTIFIER,
  ResponseParser,
  SessionMarker,
  totalPayloadBytes,
  totalWireBytes,
} from "../protocol/index.ts";
import type { Transport, TransportProvider } from "../transport/transport.ts";
import {
  ConnectionError,
  FirmwareUpdateError,
  HandshakeRejectedError,
  TeardownRejectedError,
  TransferAbortedError,
  describeError,
} from "../utils/errors.ts";
import { logger, LogEventType } from "../utils/logger.ts";

export type SessionState =
  | "connecting"
  | "handshaking"
  | "transferring"
  | "finalizing"
  | "completed"
  | "failed";

/**
 * One progress update, emitted after each frame is resolved
 */
export interface ProgressUpdate {
  completed: number;
  total: number;
  elapsedMs: number;
}

/**
 * Receives progress updates. Its return value is ignored.
 */
export type ProgressSink = (update: ProgressUpdate) => void;

/**
 * Figures recorded once every frame has been acknowledged
 */
export interface SessionMetrics {
  /**
   * Firmware bytes delivered
   */
  totalBytes: number;
  /**
   * Bytes written for frames, headers included, retries excluded
   */
  wireBytes: number;
  frameCount: number;
  elapsedMs: number;
}

export type TransferResult =
  | { ok: true; state: "completed"; metrics: SessionMetrics }
  | {
      ok: false;
      state: "failed";
      /**
       * State the session was in when it failed
       */
      failedDuring: SessionState;
      error: FirmwareUpdateError;
    };

/**
 * Result of the per-frame retry loop
 */
export type FrameOutcome =
  | { status: "acked"; attempts: number }
  | { status: "aborted"; attempts: number }
  | { status: "exhausted"; attempts: number };

/**
 * Drives one firmware transfer: connect, handshake, send every frame with
 * retries, then tear down.
 *
 * A session runs once. The transport it opens is closed on every exit path.
 */
export class TransferSession {
  private currentState: SessionState = "connecting";
  private started = false;
  private sessionMetrics: SessionMetrics | null = null;

  constructor(
    private readonly openTransport: TransportProvider,
    private readonly firmware: Uint8Array,
    private readonly config: SessionConfig,
    private readonly onProgress?: ProgressSink,
  ) {}

  public get state(): SessionState {
    return this.currentState;
  }

  /**
   * Metrics of a completed transfer phase, null until then
   */
  public get metrics(): SessionMetrics | null {
    return this.sessionMetrics;
  }

  public async run(): Promise<TransferResult> {
    if (this.started) {
      throw new FirmwareUpdateError("Transfer session has already run");
    }
    this.started = true;

    let frames: Frame[];
    try {
      frames = FrameBuilder.buildAll(
        this.firmware,
        this.config.chunkPayloadSize,
      );
    } catch (error) {
      return this.fail(error);
    }
    logger.info(
      `Prepared ${frames.length} packets (${totalWireBytes(frames)} bytes on the wire)`,
      LogEventType.FRAMES_BUILT,
      { frameCount: frames.length, totalBytes: totalPayloadBytes(frames) },
    );

    let transport: Transport;
    try {
      transport = await this.openTransport();
    } catch (error) {
      return this.fail(
        error instanceof FirmwareUpdateError
          ? error
          : new ConnectionError(`Could not connect: ${describeError(error)}`),
      );
    }

    try {
      await this.handshake(transport);
      const metrics = await this.transfer(transport, frames);
      await this.finalize(transport);
      this.currentState = "completed";
      return { ok: true, state: "completed", metrics };
    } catch (error) {
      return this.fail(error);
    } finally {
      await this.release(transport);
    }
  }

  private async handshake(transport: Transport): Promise<void> {
    this.currentState = "handshaking";
    logger.info("Starting transaction...", LogEventType.HANDSHAKE_START);

    await transport.send(Buffer.from(OPERATION_IDENTIFIER, "ascii"));
    const liveness = await this.readResponse(transport);
    if (liveness === null) {
      throw new HandshakeRejectedError(
        "Device did not answer the update request",
      );
    }
    logger.debug(`Liveness byte: ${ResponseParser.describe(liveness)}`);

    await transport.send(Buffer.from([SessionMarker.BEGIN]));
    const response = await this.readResponse(transport);
    if (!ResponseParser.isAck(response)) {
      throw new HandshakeRejectedError(
        `Transfer did not begin (response: ${ResponseParser.describe(response)})`,
      );
    }

    logger.info("Transaction started", LogEventType.HANDSHAKE_COMPLETE);
  }

  private async transfer(
    transport: Transport,
    frames: readonly Frame[],
  ): Promise<SessionMetrics> {
    this.currentState = "transferring";
    logger.info(
      `Sending ${frames.length} packets...`,
      LogEventType.TRANSFER_START,
      { total: frames.length },
    );

    const startedAt = Date.now();
    for (const [index, frame] of frames.entries()) {
      const outcome = await this.sendFrame(transport, frame, index, frames.length);
      this.onProgress?.({
        completed: index + 1,
        total: frames.length,
        elapsedMs: Date.now() - startedAt,
      });

      if (outcome.status !== "acked") {
        await this.signalError(transport);
        throw new TransferAbortedError(
          index,
          frames.length,
          outcome.status,
          outcome.attempts,
        );
      }
    }

    const metrics: SessionMetrics = {
      totalBytes: totalPayloadBytes(frames),
      wireBytes: totalWireBytes(frames),
      frameCount: frames.length,
      elapsedMs: Date.now() - startedAt,
    };
    this.sessionMetrics = metrics;

    logger.info(
      `Full size: ${metrics.totalBytes} bytes`,
      LogEventType.TRANSFER_COMPLETE,
      metrics,
    );
    return metrics;
  }

  /**
   * Per-frame retry protocol: resend the identical bytes on NACK_RETRY, an
   * unknown byte or a timeout; stop at once on ACK or NACK_ABORT.
   */
  private async sendFrame(
    transport: Transport,
    frame: Frame,
    index: number,
    total: number,
  ): Promise<FrameOutcome> {
    const maxAttempts = this.config.maxAttemptsPerFrame;

    for (let attempt = 1; attempt <= maxAttempts; attempt++) {
      await transport.send(frame.bytes);
      const response = await this.readResponse(transport);

      if (ResponseParser.isAck(response)) {
        logger.debug(
          `Packet ${index + 1}/${total} acknowledged (attempt ${attempt})`,
        );
        return { status: "acked", attempts: attempt };
      }

      if (ResponseParser.classify(response) === "abort") {
        logger.error(`Packet ${index + 1}/${total} aborted by device`);
        return { status: "aborted", attempts: attempt };
      }

      logger.warning(
        `Packet ${index + 1}/${total} attempt ${attempt}/${maxAttempts} failed: ${ResponseParser.describe(response)}`,
        LogEventType.FRAME_RETRY,
        { index, attempt, response },
      );
    }

    return { status: "exhausted", attempts: maxAttempts };
  }

  /**
   * Tell the device the transfer is abandoned. A failed write only gets
   * logged; the frame failure is what gets reported.
   */
  private async signalError(transport: Transport): Promise<void> {
    try {
      await transport.send(Buffer.from([SessionMarker.ERROR]));
    } catch (error) {
      logger.warning(`Could not send error marker: ${describeError(error)}`);
    }
  }

  private async finalize(transport: Transport): Promise<void> {
    this.currentState = "finalizing";
    logger.info("Ending transaction...", LogEventType.TEARDOWN_START);

    await transport.send(Buffer.from([SessionMarker.END]));
    const response = await this.readResponse(transport);
    if (!ResponseParser.isAck(response)) {
      throw new TeardownRejectedError(
        `Transfer did not end (response: ${ResponseParser.describe(response)})`,
      );
    }

    logger.info("Transaction ended", LogEventType.TEARDOWN_COMPLETE);
  }

  private async readResponse(transport: Transport): Promise<number | null> {
    const data = await transport.receive(1, this.config.responseTimeoutMs);
    return ResponseParser.parse(data);
  }

  private async release(transport: Transport): Promise<void> {
    try {
      await transport.close();
    } catch (error) {
      logger.warning(`Error while closing transport: ${describeError(error)}`);
    }
  }

  private fail(error: unknown): TransferResult {
    const failedDuring = this.currentState;
    this.currentState = "failed";

    const typed =
      error instanceof FirmwareUpdateError
        ? error
        : new ConnectionError(
            `Transport failed while ${failedDuring}: ${describeError(error)}`,
          );

    logger.error(typed.message);
    return { ok: false, state: "failed", failedDuring, error: typed };
  }
}
