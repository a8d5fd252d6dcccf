import { describe, it, expect, beforeEach, vi } from "vitest";

import { AuthenticationFailedError, createLogger, parseHexToBytes } from "@spooltag/shared";

const mockFetch = vi.hoisted(() => vi.fn());
vi.mock("undici", () => ({
  fetch: mockFetch,
}));

import { NfcAgentTagPlatform } from "../src/lib/nfc-agent-platform.js";
import { TagLostError } from "../src/lib/platform.js";

function mkResponse(ok: boolean, status: number, body: unknown) {
  return {
    ok,
    status,
    async json() {
      return body;
    },
  };
}

const KEY = parseHexToBytes("045C6DC690E9");
const BLOCK_HEX = "00112233445566778899AABBCCDDEEFF";

describe("NfcAgentTagPlatform", () => {
  let platform: NfcAgentTagPlatform;

  beforeEach(() => {
    mockFetch.mockReset();
    platform = new NfcAgentTagPlatform({
      baseUrl: "http://nfc.test:32145/",
      pollIntervalMs: 1,
      logger: createLogger("test", "error"),
    });
  });

  it("polls until a card is present", async () => {
    mockFetch
      .mockResolvedValueOnce(mkResponse(false, 404, { error: "no card present" }))
      .mockResolvedValueOnce(mkResponse(true, 200, { uid: "deadbeef", type: "MIFARE Classic 1K" }));

    const tag = await platform.waitForTag(new AbortController().signal);

    expect(Array.from(tag.uid)).toEqual([0xde, 0xad, 0xbe, 0xef]);
    expect(mockFetch).toHaveBeenCalledTimes(2);
    expect(mockFetch.mock.calls[0][0]).toBe("http://nfc.test:32145/v1/readers/0/card");
  });

  it("ignores cards with 7-byte uids", async () => {
    mockFetch
      .mockResolvedValueOnce(mkResponse(true, 200, { uid: "04112233445566" }))
      .mockResolvedValueOnce(mkResponse(true, 200, { uid: "DEADBEEF" }));

    const tag = await platform.waitForTag(new AbortController().signal);

    expect(Array.from(tag.uid)).toEqual([0xde, 0xad, 0xbe, 0xef]);
  });

  it("stops polling when aborted", async () => {
    mockFetch.mockResolvedValue(mkResponse(false, 404, { error: "no card present" }));
    const controller = new AbortController();

    const waiting = platform.waitForTag(controller.signal);
    controller.abort();

    await expect(waiting).rejects.toMatchObject({ name: "AbortError" });
  });

  it("authenticates by reading the first block with the key", async () => {
    mockFetch.mockResolvedValueOnce(mkResponse(true, 200, { uid: "DEADBEEF" }));
    const tag = await platform.waitForTag(new AbortController().signal);
    mockFetch.mockResolvedValueOnce(mkResponse(true, 200, { block: 4, data: BLOCK_HEX }));

    await expect(tag.authenticate(1, KEY, "A")).resolves.toBe(true);
    expect(mockFetch.mock.calls[1][0]).toBe(
      "http://nfc.test:32145/v1/readers/0/mifare/4?key=045C6DC690E9&keyType=A",
    );
  });

  it("reads and writes blocks of an authenticated sector", async () => {
    mockFetch.mockResolvedValueOnce(mkResponse(true, 200, { uid: "DEADBEEF" }));
    const tag = await platform.waitForTag(new AbortController().signal);
    mockFetch
      .mockResolvedValueOnce(mkResponse(true, 200, { block: 4, data: BLOCK_HEX }))
      .mockResolvedValueOnce(mkResponse(true, 200, { block: 5, data: BLOCK_HEX }))
      .mockResolvedValueOnce(mkResponse(true, 200, { success: true }));

    await tag.authenticate(1, KEY, "B");
    const data = await tag.readBlock(5);
    await tag.writeBlock(6, new Uint8Array(16).fill(0xab));

    expect(data[15]).toBe(0xff);
    const [url, init] = mockFetch.mock.calls[3];
    expect(url).toBe("http://nfc.test:32145/v1/readers/0/mifare/6");
    expect(init.method).toBe("POST");
    expect(JSON.parse(init.body)).toEqual({
      data: "ABABABABABABABABABABABABABABABAB",
      key: "045C6DC690E9",
      keyType: "B",
    });
  });

  it("treats a refused key as an authentication failure", async () => {
    mockFetch.mockResolvedValueOnce(mkResponse(true, 200, { uid: "DEADBEEF" }));
    const tag = await platform.waitForTag(new AbortController().signal);
    mockFetch.mockResolvedValueOnce(mkResponse(false, 401, { error: "authentication failed" }));

    await expect(tag.authenticate(2, KEY, "A")).resolves.toBe(false);
    await expect(tag.readBlock(8)).rejects.toBeInstanceOf(AuthenticationFailedError);
  });

  it("treats a missing card as a lost tag", async () => {
    mockFetch.mockResolvedValueOnce(mkResponse(true, 200, { uid: "DEADBEEF" }));
    const tag = await platform.waitForTag(new AbortController().signal);
    mockFetch.mockResolvedValueOnce(mkResponse(false, 404, { error: "no card present" }));

    await expect(tag.authenticate(0, KEY, "A")).rejects.toThrow("Tag was removed from the reader");
  });

  it("tells a lost tag from a failed block read", async () => {
    mockFetch.mockResolvedValueOnce(mkResponse(true, 200, { uid: "DEADBEEF" }));
    const tag = await platform.waitForTag(new AbortController().signal);
    mockFetch
      .mockResolvedValueOnce(mkResponse(true, 200, { block: 4, data: BLOCK_HEX }))
      .mockResolvedValueOnce(mkResponse(false, 500, { error: "reader busy" }))
      .mockResolvedValueOnce(mkResponse(false, 404, { error: "no card present" }));

    await tag.authenticate(1, KEY, "A");
    const failed = await tag.readBlock(5).catch((err: unknown) => err);
    expect(failed).not.toBeInstanceOf(TagLostError);
    expect(failed).toHaveProperty("message", "Read of block 5 failed: reader busy");
    await expect(tag.readBlock(6)).rejects.toBeInstanceOf(TagLostError);
  });

  it("wraps connection failures", async () => {
    mockFetch.mockRejectedValueOnce(new Error("ECONNREFUSED"));

    await expect(platform.waitForTag(new AbortController().signal)).rejects.toThrow(
      "Failed to connect to nfc-agent at http://nfc.test:32145: ECONNREFUSED",
    );
  });
});
