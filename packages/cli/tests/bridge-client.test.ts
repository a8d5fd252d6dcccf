import { describe, it, expect, beforeEach, vi } from "vitest";

import {
  RequestInProgressError,
  BridgeTimeoutError,
  emptyImage,
  imageToBase64Blocks,
} from "@spooltag/shared";

const mockFetch = vi.hoisted(() => vi.fn());
vi.mock("undici", () => ({
  fetch: mockFetch,
  Agent: class {
    constructor(readonly options: unknown) {}
  },
}));

import { BridgeClient, errorFromResponse } from "../src/lib/bridge-client.js";

function mkResponse(ok: boolean, status: number, body: unknown) {
  return {
    ok,
    status,
    async json() {
      return body;
    },
  };
}

function tagImage(): Uint8Array[] {
  const image = emptyImage();
  image[0].set([0xde, 0xad, 0xbe, 0xef, 0x22]);
  image[1].set([0x41, 0x30, 0x30]);
  return image;
}

describe("BridgeClient", () => {
  let client: BridgeClient;

  beforeEach(() => {
    mockFetch.mockReset();
    client = new BridgeClient({ bridgeUrl: "http://bridge.test:8000/" });
  });

  it("maps the status body", async () => {
    mockFetch.mockResolvedValueOnce(
      mkResponse(true, 200, {
        running: true,
        connected: true,
        device: "Pixel",
        state: "awaiting_tag",
        pending_request_id: "req-1",
        pending_kind: "read",
        last_uid: null,
        subscribers: 2,
        completed: 5,
        failed: 1,
        protocol_violations: 0,
        discarded_responses: 0,
      }),
    );

    const status = await client.getStatus();

    expect(mockFetch.mock.calls[0][0]).toBe("http://bridge.test:8000/api/bridge/status");
    expect(mockFetch.mock.calls[0][1].method).toBe("GET");
    expect(status).toEqual({
      running: true,
      connected: true,
      device: "Pixel",
      state: "awaiting_tag",
      pendingRequestId: "req-1",
      lastUid: null,
      subscribers: 2,
      completed: 5,
      failed: 1,
    });
  });

  it("reads a tag and decodes the blocks locally", async () => {
    mockFetch.mockResolvedValueOnce(
      mkResponse(true, 200, {
        request_id: "req-7",
        uid: "DEADBEEF",
        filament: {},
        blocks: imageToBase64Blocks(tagImage()),
        readable_sectors: [0, 1, 3],
        unreadable_sectors: [2],
      }),
    );

    const result = await client.read({ timeoutMs: 5000 });

    const [url, init] = mockFetch.mock.calls[0];
    expect(url).toBe("http://bridge.test:8000/api/tags/read");
    expect(init.method).toBe("POST");
    expect(JSON.parse(init.body)).toEqual({ timeout_ms: 5000 });
    expect(result.requestId).toBe("req-7");
    expect(result.uid).toBe("DEADBEEF");
    expect(result.image).toHaveLength(64);
    expect(Array.from(result.record.uid)).toEqual([0xde, 0xad, 0xbe, 0xef]);
    expect(result.record.materialVariantId).toBe("A00");
    expect(result.readableSectors).toEqual([0, 1, 3]);
    expect(result.unreadableSectors).toEqual([2]);
  });

  it("waits on tag requests without undici's header and body deadlines", async () => {
    mockFetch.mockResolvedValueOnce(
      mkResponse(false, 504, { error: { code: "TIMEOUT", message: "No tag presented" } }),
    );

    await expect(client.read({ timeoutMs: 600_000 })).rejects.toBeInstanceOf(BridgeTimeoutError);

    const [, init] = mockFetch.mock.calls[0];
    expect(JSON.parse(init.body)).toEqual({ timeout_ms: 600_000 });
    expect(init.dispatcher.options).toEqual({ headersTimeout: 0, bodyTimeout: 0 });
  });

  it("sends write blocks as base64", async () => {
    mockFetch.mockResolvedValueOnce(
      mkResponse(true, 200, {
        request_id: "req-2",
        success: false,
        blocks_written: 44,
        expected_blocks: 47,
        uid: "DEADBEEF",
        error: "Authentication failed for sectors 3",
      }),
    );

    const result = await client.write(tagImage(), { uid: "DEADBEEF" });

    const body = JSON.parse(mockFetch.mock.calls[0][1].body);
    expect(mockFetch.mock.calls[0][0]).toBe("http://bridge.test:8000/api/tags/write");
    expect(body.uid).toBe("DEADBEEF");
    expect(body.blocks).toHaveLength(64);
    expect(body.blocks[0]).toBe("3q2+7yIAAAAAAAAAAAAAAA==");
    expect(result).toEqual({
      requestId: "req-2",
      success: false,
      blocksWritten: 44,
      expectedBlocks: 47,
      uid: "DEADBEEF",
      error: "Authentication failed for sectors 3",
    });
  });

  it("sends clone options in snake_case", async () => {
    mockFetch.mockResolvedValueOnce(
      mkResponse(true, 200, {
        request_id: "req-3",
        success: true,
        blocks_written: 47,
        expected_blocks: 47,
        uid: null,
        error: null,
      }),
    );

    const result = await client.clone(tagImage(), { sourceUid: "DEADBEEF", rewriteUid: false });

    const body = JSON.parse(mockFetch.mock.calls[0][1].body);
    expect(mockFetch.mock.calls[0][0]).toBe("http://bridge.test:8000/api/tags/clone");
    expect(body.source_uid).toBe("DEADBEEF");
    expect(body.rewrite_uid).toBe(false);
    expect(result.success).toBe(true);
    expect(result.uid).toBeNull();
  });

  it("rebuilds typed errors from error bodies", async () => {
    mockFetch.mockResolvedValueOnce(
      mkResponse(false, 409, { error: { code: "REQUEST_IN_PROGRESS", message: "Busy with req-1" } }),
    );

    const error = await client.read().catch((err: unknown) => err);

    expect(error).toBeInstanceOf(RequestInProgressError);
    expect(error).toHaveProperty("message", "Busy with req-1");
  });

  it("keeps the timeout code", async () => {
    mockFetch.mockResolvedValueOnce(
      mkResponse(false, 408, { error: { code: "TIMEOUT", message: "Timed out" } }),
    );

    await expect(client.read()).rejects.toBeInstanceOf(BridgeTimeoutError);
  });

  it("reports non-JSON failures by status", async () => {
    mockFetch.mockResolvedValueOnce({
      ok: false,
      status: 502,
      async json() {
        throw new SyntaxError("Unexpected token < in JSON");
      },
    });

    await expect(client.getStatus()).rejects.toThrow("Bridge request failed: 502");
  });

  it("wraps connection failures", async () => {
    mockFetch.mockRejectedValueOnce(new Error("connect ECONNREFUSED 127.0.0.1:8000"));

    await expect(client.getStatus()).rejects.toThrow(
      "Failed to connect to bridge at http://bridge.test:8000: connect ECONNREFUSED 127.0.0.1:8000",
    );
  });

  it("rejects a malformed success body", async () => {
    mockFetch.mockResolvedValueOnce(mkResponse(true, 200, { connected: "yes" }));

    await expect(client.getStatus()).rejects.toThrow("Unexpected bridge response: running is not a boolean");
  });
});

describe("errorFromResponse", () => {
  it("keeps the message of an unknown code", () => {
    const error = errorFromResponse(500, {
      error: { code: "INTERNAL_ERROR", message: "Internal server error" },
    });

    expect(error.message).toBe("Bridge request failed: 500 - Internal server error");
  });

  it("falls back to the status", () => {
    expect(errorFromResponse(404, "Not found").message).toBe("Bridge request failed: 404");
  });
});
