/**
 * Tag REST Routes
 * Offline codec endpoints (derive-keys, decode, encode) and the tag
 * operations that go through the agent (read, write, clone).
 */

import { Hono } from "hono";
import {
  InvalidInputError,
  bytesToHex,
  decodeTag,
  deriveKeysFromHex,
  detectDumpFormat,
  encodeTag,
  filamentFieldsFromJson,
  filamentRecordToJson,
  imageFromBase64Blocks,
  imageFromBinary,
  imageFromHexBlocks,
  imageToBase64Blocks,
  imageToHex,
  imageToProxmarkDump,
  mergeImage,
  parseDump,
  readableSectors,
  uidOfImage,
  unreadableSectors,
} from "@spooltag/shared";

import type { Bridge } from "../../bridge.js";
import { parseUid, type WriteResult } from "../../session/bridge-session.js";
import { errorResponse, readJsonObject } from "./http-errors.js";

const MAX_TIMEOUT_MS = 10 * 60_000;

function optionalString(body: object, key: string): string | undefined {
  const value: unknown = Reflect.get(body, key);
  if (value === undefined || value === null) return undefined;
  if (typeof value !== "string") {
    throw new InvalidInputError(`${key} must be a string`);
  }
  return value;
}

function requireString(body: object, key: string): string {
  const value = optionalString(body, key);
  if (value === undefined) {
    throw new InvalidInputError(`${key} required`);
  }
  return value;
}

function optionalBoolean(body: object, key: string): boolean | undefined {
  const value: unknown = Reflect.get(body, key);
  if (value === undefined || value === null) return undefined;
  if (typeof value !== "boolean") {
    throw new InvalidInputError(`${key} must be a boolean`);
  }
  return value;
}

function optionalTimeout(body: object): number | undefined {
  const value: unknown = Reflect.get(body, "timeout_ms");
  if (value === undefined || value === null) return undefined;
  if (typeof value !== "number" || !Number.isInteger(value) || value <= 0 || value > MAX_TIMEOUT_MS) {
    throw new InvalidInputError(`timeout_ms must be an integer between 1 and ${MAX_TIMEOUT_MS}`);
  }
  return value;
}

function stringArray(body: object, key: string): string[] | undefined {
  const value: unknown = Reflect.get(body, key);
  if (value === undefined || value === null) return undefined;
  if (!Array.isArray(value) || !value.every((item): item is string => typeof item === "string")) {
    throw new InvalidInputError(`${key} must be an array of strings`);
  }
  return value;
}

function requireBlocks(body: object, key = "blocks"): Uint8Array[] {
  const blocks = stringArray(body, key);
  if (!blocks) {
    throw new InvalidInputError(`${key} required`);
  }
  return imageFromBase64Blocks(blocks);
}

function writeResultJson(result: WriteResult) {
  return {
    request_id: result.requestId,
    success: result.success,
    blocks_written: result.blocksWritten,
    expected_blocks: result.expectedBlocks,
    uid: result.uid ?? null,
    error: result.error ?? null,
  };
}

export function createTagRoutes(bridge: Bridge): Hono {
  const app = new Hono();

  /**
   * POST /api/tags/derive-keys
   * Request: { uid }
   * Response: { uid, keys[16] }
   */
  app.post("/api/tags/derive-keys", async (c) => {
    try {
      const body = await readJsonObject(c);
      const uid = parseUid(requireString(body, "uid"));
      const keys = await deriveKeysFromHex(bytesToHex(uid));
      return c.json({ uid: bytesToHex(uid), keys });
    } catch (error) {
      return errorResponse(c, error);
    }
  });

  /**
   * POST /api/tags/decode
   * Request: { dump } in hex, base64 or Proxmark3 text form
   * Response: { format, filament }
   */
  app.post("/api/tags/decode", async (c) => {
    try {
      const body = await readJsonObject(c);
      const dump = requireString(body, "dump");
      const image = parseDump(dump);
      return c.json({
        format: detectDumpFormat(dump),
        filament: filamentRecordToJson(decodeTag(image)),
      });
    } catch (error) {
      return errorResponse(c, error);
    }
  });

  /**
   * POST /api/tags/decode/blocks
   * Request: { blocks[64], encoding?: "base64" | "hex" }
   */
  app.post("/api/tags/decode/blocks", async (c) => {
    try {
      const body = await readJsonObject(c);
      const encoding = optionalString(body, "encoding") ?? "base64";
      if (encoding !== "base64" && encoding !== "hex") {
        throw new InvalidInputError("encoding must be base64 or hex");
      }
      const blocks = stringArray(body, "blocks");
      if (!blocks) {
        throw new InvalidInputError("blocks required");
      }
      const image = encoding === "hex" ? imageFromHexBlocks(blocks) : imageFromBase64Blocks(blocks);
      return c.json({ filament: filamentRecordToJson(decodeTag(image)) });
    } catch (error) {
      return errorResponse(c, error);
    }
  });

  /**
   * POST /api/tags/decode/binary
   * Request: raw 1024-byte dump (application/octet-stream)
   */
  app.post("/api/tags/decode/binary", async (c) => {
    try {
      const data = new Uint8Array(await c.req.arrayBuffer());
      return c.json({ filament: filamentRecordToJson(decodeTag(imageFromBinary(data))) });
    } catch (error) {
      return errorResponse(c, error);
    }
  });

  /**
   * POST /api/tags/encode
   * Request: filament fields (snake_case) and optional source_blocks[64]
   * whose block 0, trailers and uncontrolled payload are kept
   * Response: { blocks, hex, proxmark3, filament }
   */
  app.post("/api/tags/encode", async (c) => {
    try {
      const body = await readJsonObject(c);
      const fields = filamentFieldsFromJson(body);
      const source = stringArray(body, "source_blocks");
      const base = source ? imageFromBase64Blocks(source) : undefined;
      const payload = encodeTag(fields, { base });
      const image = base ? mergeImage(payload, base) : payload;
      return c.json({
        blocks: imageToBase64Blocks(image),
        hex: imageToHex(image),
        proxmark3: imageToProxmarkDump(image),
        filament: filamentRecordToJson(decodeTag(image)),
      });
    } catch (error) {
      return errorResponse(c, error);
    }
  });

  /**
   * POST /api/tags/read
   * Request: { timeout_ms?, uid? }
   * Waits for the agent to read the next tag touched.
   */
  app.post("/api/tags/read", async (c) => {
    try {
      const body = await readJsonObject(c);
      const uidText = optionalString(body, "uid");
      const result = await bridge.session.requestRead({
        timeoutMs: optionalTimeout(body),
        uid: uidText ? parseUid(uidText) : undefined,
      });
      return c.json({
        request_id: result.requestId,
        uid: result.uid,
        filament: filamentRecordToJson(result.record),
        blocks: imageToBase64Blocks(result.image),
        readable_sectors: readableSectors(result.readableSectors),
        unreadable_sectors: unreadableSectors(result.readableSectors),
      });
    } catch (error) {
      return errorResponse(c, error);
    }
  });

  /**
   * POST /api/tags/write
   * Request: { blocks[64], uid?, timeout_ms? }
   * Keys are derived from `uid`, or from the uid in block 0.
   */
  app.post("/api/tags/write", async (c) => {
    try {
      const body = await readJsonObject(c);
      const image = requireBlocks(body);
      const uidText = optionalString(body, "uid");
      const result = await bridge.session.requestWrite(image, {
        timeoutMs: optionalTimeout(body),
        uid: uidText ? parseUid(uidText) : undefined,
      });
      return c.json(writeResultJson(result));
    } catch (error) {
      return errorResponse(c, error);
    }
  });

  /**
   * POST /api/tags/clone
   * Request: { blocks[64], source_uid?, rewrite_uid?, timeout_ms? }
   * `source_uid` defaults to the uid in block 0 of `blocks`.
   */
  app.post("/api/tags/clone", async (c) => {
    try {
      const body = await readJsonObject(c);
      const image = requireBlocks(body);
      const uidText = optionalString(body, "source_uid");
      const sourceUid = uidText ? parseUid(uidText) : uidOfImage(image);
      if (sourceUid.every((b) => b === 0)) {
        throw new InvalidInputError("source_uid required: block 0 of the dump carries no uid");
      }
      const result = await bridge.session.requestClone(sourceUid, image, {
        timeoutMs: optionalTimeout(body),
        rewriteUid: optionalBoolean(body, "rewrite_uid"),
      });
      return c.json(writeResultJson(result));
    } catch (error) {
      return errorResponse(c, error);
    }
  });

  return app;
}
