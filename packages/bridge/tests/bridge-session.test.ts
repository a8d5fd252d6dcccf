import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";

import {
  AgentError,
  BridgeTimeoutError,
  InvalidInputError,
  NoBridgeConnectedError,
  RequestInProgressError,
  UnsupportedOperationError,
  createLogger,
  deriveKeys,
  emptyImage,
  errorMessage,
  statusMessage,
  tagDataMessage,
  tagDetectedMessage,
  writeResultMessage,
  type BridgeCommand,
} from "@spooltag/shared";

import { BridgeSession } from "../src/session/bridge-session.js";
import type { AgentLink } from "../src/session/agent-link.js";

const UID = new Uint8Array([0xde, 0xad, 0xbe, 0xef]);
const ZERO_BLOCK = "AAAAAAAAAAAAAAAAAAAAAA==";

class FakeLink implements AgentLink {
  sent: BridgeCommand[] = [];
  closes: { code?: number; reason?: string }[] = [];
  failSend = false;

  constructor(readonly id: string) {}

  send(command: BridgeCommand): void {
    if (this.failSend) {
      throw new Error("socket closed");
    }
    this.sent.push(command);
  }

  close(code?: number, reason?: string): void {
    this.closes.push({ code, reason });
  }
}

function imageWithUid(uid: Uint8Array): Uint8Array[] {
  const image = emptyImage();
  image[0].set(uid);
  return image;
}

describe("BridgeSession", () => {
  let session: BridgeSession;
  let link: FakeLink;
  let counter: number;

  beforeEach(() => {
    counter = 0;
    session = new BridgeSession({
      requestTimeoutMs: 1000,
      logger: createLogger("test", "error"),
      generateRequestId: () => `req-${++counter}`,
    });
    link = new FakeLink("link-1");
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  describe("transport", () => {
    it("rejects requests while no agent is attached", async () => {
      await expect(session.requestRead()).rejects.toBeInstanceOf(NoBridgeConnectedError);
      expect(session.getStatus().connected).toBe(false);
    });

    it("records the device announced by STATUS", () => {
      session.attach(link);
      session.handleAgentMessage("link-1", JSON.stringify(statusMessage("Pixel 7")));

      expect(session.getStatus()).toMatchObject({ connected: true, device: "Pixel 7", state: "idle" });
    });

    it("emits tagDetected and remembers the uid", () => {
      const onDetected = vi.fn();
      session.on("tagDetected", onDetected);
      session.attach(link);

      session.handleAgentMessage("link-1", JSON.stringify(tagDetectedMessage(UID)));

      expect(onDetected).toHaveBeenCalledWith({ uid: "DEADBEEF" });
      expect(session.getStatus().lastUid).toBe("DEADBEEF");
    });

    it("fails the pending request when the agent detaches", async () => {
      session.attach(link);
      const pending = session.requestRead();

      expect(session.detach("link-1")).toBe(true);

      await expect(pending).rejects.toBeInstanceOf(NoBridgeConnectedError);
      expect(session.getStatus()).toMatchObject({ connected: false, state: "idle", failed: 1 });
    });

    it("ignores a late detach of a replaced link", () => {
      session.attach(link);
      const next = new FakeLink("link-2");
      session.attach(next);

      expect(link.closes).toEqual([{ code: 1000, reason: "Replaced by a newer agent connection" }]);
      expect(session.detach("link-1")).toBe(false);
      expect(session.isConnected()).toBe(true);
    });

    it("fails the pending request when the link is replaced", async () => {
      session.attach(link);
      const pending = session.requestRead();

      session.attach(new FakeLink("link-2"));

      await expect(pending).rejects.toThrow("Agent connection was replaced");
    });

    it("ignores messages from an inactive link", () => {
      session.attach(link);
      session.handleAgentMessage("link-9", "not json");

      expect(session.getStatus().protocolViolations).toBe(0);
    });

    it("fails the request when the command cannot be sent", async () => {
      link.failSend = true;
      session.attach(link);

      await expect(session.requestRead()).rejects.toThrow("Failed to send request to the agent");
      expect(session.getStatus().state).toBe("idle");
    });
  });

  describe("read", () => {
    it("sends READ_TAG without keys and resolves on the matching TAG_DATA", async () => {
      session.attach(link);
      const pending = session.requestRead();

      expect(link.sent).toEqual([{ action: "READ_TAG", request_id: "req-1" }]);
      expect(session.getStatus()).toMatchObject({ state: "awaiting_tag", pendingRequestId: "req-1" });

      session.handleAgentMessage(
        "link-1",
        JSON.stringify(tagDataMessage("req-1", UID, imageWithUid(UID), 0b1111_1111_1101_1011)),
      );
      const result = await pending;

      expect(result.requestId).toBe("req-1");
      expect(result.uid).toBe("DEADBEEF");
      expect(result.image).toHaveLength(64);
      expect(result.readableSectors).toBe(0xffdb);
      expect(Array.from(result.record.uid)).toEqual([0xde, 0xad, 0xbe, 0xef]);
      expect(session.getStatus()).toMatchObject({ state: "idle", completed: 1, lastUid: "DEADBEEF" });
    });

    it("infers readability from the image when the agent reports none", async () => {
      session.attach(link);
      const pending = session.requestRead();

      session.handleAgentMessage("link-1", JSON.stringify(tagDataMessage("req-1", UID, imageWithUid(UID))));

      expect((await pending).readableSectors).toBe(0b1);
    });

    it("carries derived keys when a uid is given", async () => {
      session.attach(link);
      const pending = session.requestRead({ uid: UID });

      await vi.waitFor(() => expect(link.sent).toHaveLength(1));
      const command = link.sent[0];
      expect(command.action === "READ_TAG" ? command.keys?.[15] : undefined).toBe("46CF8B20C176");

      session.handleAgentMessage("link-1", JSON.stringify(tagDataMessage("req-1", UID, imageWithUid(UID))));
      await expect(pending).resolves.toMatchObject({ uid: "DEADBEEF" });
    });

    it("rejects a second request while one is pending", async () => {
      session.attach(link);
      const first = session.requestRead();

      await expect(session.requestRead()).rejects.toBeInstanceOf(RequestInProgressError);
      expect(session.getStatus().pendingRequestId).toBe("req-1");
      expect(link.sent).toHaveLength(1);

      session.handleAgentMessage("link-1", JSON.stringify(tagDataMessage("req-1", UID, imageWithUid(UID))));
      await expect(first).resolves.toMatchObject({ requestId: "req-1" });
    });

    it("holds the slot while read keys are being derived", async () => {
      session.attach(link);
      const first = session.requestRead({ uid: UID });

      expect(session.getStatus()).toMatchObject({ state: "awaiting_tag", pendingRequestId: "req-1" });
      await expect(session.requestRead()).rejects.toBeInstanceOf(RequestInProgressError);

      await vi.waitFor(() => expect(link.sent).toHaveLength(1));
      const command = link.sent[0];
      if (command.action !== "READ_TAG") throw new Error(`unexpected ${command.action}`);
      expect(command.request_id).toBe("req-1");
      expect(command.keys?.[0]).toBe("045C6DC690E9");

      session.handleAgentMessage("link-1", JSON.stringify(tagDataMessage("req-1", UID, imageWithUid(UID))));
      await expect(first).resolves.toMatchObject({ requestId: "req-1" });
    });

    it("releases the slot when key derivation fails", async () => {
      session.attach(link);

      await expect(session.requestRead({ uid: new Uint8Array(0) })).rejects.toBeInstanceOf(
        InvalidInputError,
      );
      expect(link.sent).toHaveLength(0);
      expect(session.getStatus()).toMatchObject({ state: "idle", pendingRequestId: null, failed: 0 });

      void session.requestRead().catch(() => undefined);
      expect(link.sent).toEqual([{ action: "READ_TAG", request_id: "req-2" }]);
    });

    it("counts a response with an unknown id as a protocol violation", () => {
      session.attach(link);
      void session.requestRead().catch(() => undefined);

      session.handleAgentMessage("link-1", JSON.stringify(tagDataMessage("req-99", UID, imageWithUid(UID))));

      expect(session.getStatus()).toMatchObject({
        pendingRequestId: "req-1",
        protocolViolations: 1,
      });
    });

    it("counts a response of the wrong kind as a protocol violation", () => {
      session.attach(link);
      void session.requestRead().catch(() => undefined);

      session.handleAgentMessage(
        "link-1",
        JSON.stringify(writeResultMessage({ requestId: "req-1", success: true, blocksWritten: 47 })),
      );

      expect(session.getStatus()).toMatchObject({
        pendingRequestId: "req-1",
        protocolViolations: 1,
      });
    });

    it("counts a malformed envelope as a protocol violation", () => {
      session.attach(link);
      session.handleAgentMessage("link-1", "{\"action\":\"TAG_DATA\",\"uid\":\"XYZ\"}");
      session.handleAgentMessage("link-1", "not json");

      expect(session.getStatus().protocolViolations).toBe(2);
    });

    it("emits unsolicited TAG_DATA as tagRead", () => {
      const onRead = vi.fn();
      session.on("tagRead", onRead);
      session.attach(link);

      session.handleAgentMessage("link-1", JSON.stringify(tagDataMessage(undefined, UID, imageWithUid(UID))));

      expect(onRead).toHaveBeenCalledTimes(1);
      expect(onRead.mock.calls[0][0]).toMatchObject({ uid: "DEADBEEF" });
      expect(session.getStatus().completed).toBe(0);
    });
  });

  describe("timeout", () => {
    it("rejects with BridgeTimeout, cancels and discards the late response", async () => {
      vi.useFakeTimers();
      session.attach(link);
      const pending = session.requestRead();
      const outcome = expect(pending).rejects.toBeInstanceOf(BridgeTimeoutError);

      vi.advanceTimersByTime(1000);
      await outcome;

      expect(link.sent[1]).toEqual({ action: "CANCEL", request_id: "req-1" });
      expect(session.getStatus()).toMatchObject({ state: "idle", pendingRequestId: null, failed: 1 });

      session.handleAgentMessage("link-1", JSON.stringify(tagDataMessage("req-1", UID, imageWithUid(UID))));
      expect(session.getStatus()).toMatchObject({ discardedResponses: 1, protocolViolations: 0 });
    });

    it("accepts a new request after a timeout", async () => {
      vi.useFakeTimers();
      session.attach(link);
      const first = session.requestRead({ timeoutMs: 50 });
      const outcome = expect(first).rejects.toBeInstanceOf(BridgeTimeoutError);
      vi.advanceTimersByTime(50);
      await outcome;

      const second = session.requestRead();
      session.handleAgentMessage("link-1", JSON.stringify(tagDataMessage("req-1", UID, imageWithUid(UID))));
      expect(session.getStatus().pendingRequestId).toBe("req-2");

      session.handleAgentMessage("link-1", JSON.stringify(tagDataMessage("req-2", UID, imageWithUid(UID))));
      await expect(second).resolves.toMatchObject({ requestId: "req-2" });
    });

    it("does not fire once the response arrived", async () => {
      vi.useFakeTimers();
      session.attach(link);
      const pending = session.requestRead();
      session.handleAgentMessage("link-1", JSON.stringify(tagDataMessage("req-1", UID, imageWithUid(UID))));
      await pending;

      vi.advanceTimersByTime(5000);

      expect(link.sent).toHaveLength(1);
      expect(session.getStatus().failed).toBe(0);
    });
  });

  describe("write", () => {
    it("derives keys from the uid in block 0", async () => {
      session.attach(link);
      const pending = session.requestWrite(imageWithUid(UID));

      await vi.waitFor(() => expect(link.sent).toHaveLength(1));
      const command = link.sent[0];
      if (command.action !== "WRITE_TAG") throw new Error(`unexpected ${command.action}`);
      expect(command.keys[0]).toBe("045C6DC690E9");
      expect(command.blocks).toHaveLength(64);
      expect(command.uid).toBeUndefined();

      session.handleAgentMessage(
        "link-1",
        JSON.stringify(writeResultMessage({ requestId: "req-1", success: true, blocksWritten: 47, uid: UID })),
      );
      await expect(pending).resolves.toEqual({
        requestId: "req-1",
        success: true,
        blocksWritten: 47,
        expectedBlocks: 47,
        uid: "DEADBEEF",
        error: undefined,
      });
    });

    it("holds the slot while write keys are being derived", async () => {
      session.attach(link);
      const pending = session.requestWrite(imageWithUid(UID));

      await expect(session.requestClone(UID, imageWithUid(UID))).rejects.toBeInstanceOf(
        RequestInProgressError,
      );
      expect(session.getStatus()).toMatchObject({ pendingRequestId: "req-1", pendingKind: "WRITE" });

      await vi.waitFor(() => expect(link.sent).toHaveLength(1));
      session.handleAgentMessage(
        "link-1",
        JSON.stringify(writeResultMessage({ requestId: "req-1", success: true, blocksWritten: 47 })),
      );
      await expect(pending).resolves.toMatchObject({ requestId: "req-1", expectedBlocks: 47 });
    });

    it("rejects an image without a uid and no keys", async () => {
      session.attach(link);

      await expect(session.requestWrite(emptyImage())).rejects.toBeInstanceOf(InvalidInputError);
      expect(link.sent).toHaveLength(0);
    });

    it("counts only sectors that have a key as expected blocks", async () => {
      const keys: (Uint8Array | null)[] = [...(await deriveKeys(UID))];
      keys[4] = null;
      session.attach(link);

      const pending = session.requestWrite(imageWithUid(UID), { keys });
      session.handleAgentMessage(
        "link-1",
        JSON.stringify(writeResultMessage({ requestId: "req-1", success: true, blocksWritten: 41 })),
      );

      await expect(pending).resolves.toMatchObject({ blocksWritten: 41, expectedBlocks: 44 });
    });

    it("fails the write with AgentError on a matching ERROR", async () => {
      session.attach(link);
      const keys = await deriveKeys(UID);
      const pending = session.requestWrite(imageWithUid(UID), { keys });

      session.handleAgentMessage(
        "link-1",
        JSON.stringify(errorMessage("Tag lost", { requestId: "req-1" })),
      );

      await expect(pending).rejects.toBeInstanceOf(AgentError);
      await expect(pending).rejects.toThrow("Tag lost");
    });

    it("ignores an ERROR for another request", async () => {
      session.attach(link);
      const keys = await deriveKeys(UID);
      void session.requestWrite(imageWithUid(UID), { keys }).catch(() => undefined);

      session.handleAgentMessage("link-1", JSON.stringify(errorMessage("stale", { requestId: "req-0" })));

      expect(session.getStatus().pendingRequestId).toBe("req-1");
    });
  });

  describe("clone", () => {
    it("sends only the payload, keyed by the source uid", async () => {
      const source = imageWithUid(UID);
      source[3].fill(0xff);
      source[4].fill(0x11);
      session.attach(link);

      const pending = session.requestClone(UID, source);
      await vi.waitFor(() => expect(link.sent).toHaveLength(1));
      const command = link.sent[0];
      if (command.action !== "WRITE_TAG") throw new Error(`unexpected ${command.action}`);
      expect(command.blocks[0]).toBe(ZERO_BLOCK);
      expect(command.blocks[3]).toBe(ZERO_BLOCK);
      expect(command.blocks[4]).toBe("EREREREREREREREREREREQ==");
      expect(command.keys[15]).toBe("46CF8B20C176");
      expect(command.uid).toBeUndefined();

      session.handleAgentMessage(
        "link-1",
        JSON.stringify(writeResultMessage({ requestId: "req-1", success: true, blocksWritten: 47 })),
      );
      await expect(pending).resolves.toMatchObject({ success: true, blocksWritten: 47 });
    });

    it("surfaces a refused uid rewrite as UnsupportedOperation", async () => {
      session.attach(link);
      const pending = session.requestClone(UID, imageWithUid(UID), { rewriteUid: true });

      await vi.waitFor(() => expect(link.sent).toHaveLength(1));
      const command = link.sent[0];
      expect(command.action === "WRITE_TAG" ? command.uid : undefined).toBe("DEADBEEF");

      session.handleAgentMessage(
        "link-1",
        JSON.stringify(
          writeResultMessage({
            requestId: "req-1",
            success: false,
            blocksWritten: 0,
            error: "Tag cannot change its uid",
            errorCode: "UNSUPPORTED_OPERATION",
          }),
        ),
      );

      await expect(pending).rejects.toBeInstanceOf(UnsupportedOperationError);
      expect(session.getStatus().state).toBe("idle");
    });

    it("rejects a source uid that is not 4 bytes", async () => {
      session.attach(link);

      await expect(
        session.requestClone(new Uint8Array([1, 2, 3]), imageWithUid(UID)),
      ).rejects.toBeInstanceOf(InvalidInputError);
    });
  });
});
