import { describe, test, expect, vi } from "vitest";
import { TransferSession, type ProgressUpdate } from "./transfer-session.ts";
import {
  createSessionConfig,
  FrameBuilder,
  SessionMarker,
} from "../protocol/index.ts";
import {
  ConnectionError,
  DeviceNotFoundError,
  EmptyInputError,
  HandshakeRejectedError,
  TeardownRejectedError,
  TransferAbortedError,
} from "../utils/errors.ts";
import {
  ScriptedTransport,
  createTestFirmware,
} from "../../../__tests__/utils/test-helpers.ts";

const ACK = 0xff;
const ABORT = 0xaa;
const RETRY = 0xee;

const IDENTIFIER_HEX = Buffer.from("firmware_update", "ascii").toString("hex");

// 10 bytes split into 4, 4 and 2 byte payloads
const config = createSessionConfig({ packetSize: 10, responseTimeoutMs: 250 });
const firmware = createTestFirmware(10);
const frameHex = FrameBuilder.buildAll(firmware, 4).map((frame) =>
  frame.bytes.toString("hex"),
);

function createSession(
  transport: ScriptedTransport,
  onProgress?: (update: ProgressUpdate) => void,
  image: Uint8Array = firmware,
) {
  return new TransferSession(async () => transport, image, config, onProgress);
}

describe("TransferSession", () => {
  test("completes when every byte is acknowledged", async () => {
    const transport = new ScriptedTransport([], ACK);

    const result = await createSession(transport).run();

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.state).toBe("completed");
    expect(result.metrics.totalBytes).toBe(10);
    expect(result.metrics.wireBytes).toBe(28);
    expect(result.metrics.frameCount).toBe(3);
    expect(transport.sentHex).toEqual([
      IDENTIFIER_HEX,
      "aa",
      ...frameHex,
      "ff",
    ]);
    expect(transport.closeCount).toBe(1);
  });

  test("aborts on NACK_ABORT and sends one ERROR byte", async () => {
    const transport = new ScriptedTransport([ACK, ACK, ABORT], ACK);

    const result = await createSession(transport).run();

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.failedDuring).toBe("transferring");
    expect(result.error).toBeInstanceOf(TransferAbortedError);
    expect(result.error.message).toBe(
      "Packet 1/3 aborted by device after 1 attempt(s)",
    );
    expect(transport.sentHex).toEqual([IDENTIFIER_HEX, "aa", frameHex[0], "ee"]);
    expect(transport.closeCount).toBe(1);
  });

  test("reports the aborted frame when the ERROR byte cannot be sent", async () => {
    class DroppingTransport extends ScriptedTransport {
      override async send(data: Uint8Array): Promise<void> {
        if (data.length === 1 && data[0] === SessionMarker.ERROR) {
          throw new ConnectionError("BLE transport is closed");
        }
        await super.send(data);
      }
    }
    const transport = new DroppingTransport([ACK, ACK, ABORT], ACK);

    const result = await createSession(transport).run();

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.failedDuring).toBe("transferring");
    expect(result.error).toBeInstanceOf(TransferAbortedError);
    expect(result.error.message).toBe(
      "Packet 1/3 aborted by device after 1 attempt(s)",
    );
    expect(transport.sentHex).toEqual([IDENTIFIER_HEX, "aa", frameHex[0]]);
    expect(transport.closeCount).toBe(1);
  });

  test("fails the handshake when BEGIN is not answered", async () => {
    const transport = new ScriptedTransport([ACK, null]);

    const result = await createSession(transport).run();

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.failedDuring).toBe("handshaking");
    expect(result.error).toBeInstanceOf(HandshakeRejectedError);
    expect(result.error.message).toBe(
      "Transfer did not begin (response: timeout)",
    );
    expect(transport.sentHex).toEqual([IDENTIFIER_HEX, "aa"]);
    expect(transport.closeCount).toBe(1);
  });

  test("fails the handshake when the update request is not answered", async () => {
    const transport = new ScriptedTransport([null]);

    const result = await createSession(transport).run();

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error).toBeInstanceOf(HandshakeRejectedError);
    expect(result.error.message).toBe("Device did not answer the update request");
    expect(transport.sentHex).toEqual([IDENTIFIER_HEX]);
  });

  test("ignores the value of the liveness byte", async () => {
    const transport = new ScriptedTransport([0x00], ACK);

    const result = await createSession(transport).run();

    expect(result.ok).toBe(true);
  });

  test("fails the teardown when END is not acknowledged", async () => {
    const transport = new ScriptedTransport([ACK, ACK, ACK, ACK, ACK, RETRY]);
    const session = createSession(transport);

    const result = await session.run();

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.failedDuring).toBe("finalizing");
    expect(result.error).toBeInstanceOf(TeardownRejectedError);
    expect(result.error.message).toBe(
      "Transfer did not end (response: 0xee (retry))",
    );
    expect(session.metrics?.totalBytes).toBe(10);
    expect(session.state).toBe("failed");
    expect(transport.closeCount).toBe(1);
  });

  test("resends the identical frame after a retry request", async () => {
    const transport = new ScriptedTransport([ACK, ACK, RETRY], ACK);

    const result = await createSession(transport).run();

    expect(result.ok).toBe(true);
    expect(transport.sentHex).toEqual([
      IDENTIFIER_HEX,
      "aa",
      frameHex[0],
      frameHex[0],
      frameHex[1],
      frameHex[2],
      "ff",
    ]);
  });

  test("gives up after the attempt limit with timeouts and unknown bytes", async () => {
    const transport = new ScriptedTransport([ACK, ACK, RETRY, null, 0x42], ACK);

    const result = await createSession(transport).run();

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error).toBeInstanceOf(TransferAbortedError);
    expect(result.error.message).toBe(
      "Packet 1/3 send error: no acknowledgment after 3 attempt(s)",
    );
    expect(transport.sentHex).toEqual([
      IDENTIFIER_HEX,
      "aa",
      frameHex[0],
      frameHex[0],
      frameHex[0],
      "ee",
    ]);
  });

  test("stops retrying when the device aborts a later attempt", async () => {
    const transport = new ScriptedTransport([ACK, ACK, ACK, RETRY, ABORT], ACK);

    const result = await createSession(transport).run();

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error).toBeInstanceOf(TransferAbortedError);
    expect(result.error.message).toBe(
      "Packet 2/3 aborted by device after 2 attempt(s)",
    );
    expect(transport.sentHex).toEqual([
      IDENTIFIER_HEX,
      "aa",
      frameHex[0],
      frameHex[1],
      frameHex[1],
      "ee",
    ]);
  });

  test("reads every response with the configured timeout", async () => {
    const transport = new ScriptedTransport([], ACK);
    const receive = vi.spyOn(transport, "receive");

    await createSession(transport).run();

    expect(receive).toHaveBeenCalledTimes(6);
    for (const call of receive.mock.calls) {
      expect(call).toEqual([1, 250]);
    }
  });

  describe("progress", () => {
    test("reports once per frame in increasing order", async () => {
      const updates: ProgressUpdate[] = [];
      const transport = new ScriptedTransport([], ACK);

      await createSession(transport, (update) => updates.push(update)).run();

      expect(updates.map((update) => update.completed)).toEqual([1, 2, 3]);
      expect(updates.every((update) => update.total === 3)).toBe(true);
    });

    test("reports the failing frame before stopping", async () => {
      const updates: ProgressUpdate[] = [];
      const transport = new ScriptedTransport([ACK, ACK, ACK, ABORT]);

      await createSession(transport, (update) => updates.push(update)).run();

      expect(updates.map((update) => update.completed)).toEqual([1, 2]);
    });
  });

  describe("failures outside the exchange", () => {
    test("rejects empty firmware before connecting", async () => {
      const openTransport = vi.fn(async () => new ScriptedTransport());
      const session = new TransferSession(
        openTransport,
        Buffer.alloc(0),
        config,
      );

      const result = await session.run();

      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.error).toBeInstanceOf(EmptyInputError);
      expect(result.failedDuring).toBe("connecting");
      expect(openTransport).not.toHaveBeenCalled();
    });

    test("wraps an unexpected connection failure", async () => {
      const session = new TransferSession(
        async () => {
          throw new Error("adapter off");
        },
        firmware,
        config,
      );

      const result = await session.run();

      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.error).toBeInstanceOf(ConnectionError);
      expect(result.error.message).toBe("Could not connect: adapter off");
      expect(result.failedDuring).toBe("connecting");
    });

    test("keeps a typed connection failure", async () => {
      const notFound = new DeviceNotFoundError("no such device");
      const session = new TransferSession(
        async () => {
          throw notFound;
        },
        firmware,
        config,
      );

      const result = await session.run();

      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.error).toBe(notFound);
    });

    test("closes the transport when a send fails", async () => {
      const transport = new ScriptedTransport([], ACK);
      vi.spyOn(transport, "send").mockRejectedValueOnce(new Error("link lost"));

      const result = await createSession(transport).run();

      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.error).toBeInstanceOf(ConnectionError);
      expect(result.error.message).toBe(
        "Transport failed while handshaking: link lost",
      );
      expect(transport.closeCount).toBe(1);
    });

    test("a failing close does not change a successful result", async () => {
      const transport = new ScriptedTransport([], ACK);
      vi.spyOn(transport, "close").mockRejectedValueOnce(new Error("already gone"));

      const result = await createSession(transport).run();

      expect(result.ok).toBe(true);
    });
  });

  test("a session runs only once", async () => {
    const session = createSession(new ScriptedTransport([], ACK));
    await session.run();

    await expect(session.run()).rejects.toThrow(
      "Transfer session has already run",
    );
  });
});
