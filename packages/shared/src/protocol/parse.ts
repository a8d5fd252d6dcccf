/**
 * Runtime validation of wire envelopes. Every malformed envelope throws
 * ProtocolViolationError naming the offending field.
 */

import { ProtocolViolationError } from "../errors.js";
import { isBase64 } from "../utils/encoding.js";
import { BLOCK_COUNT, SECTOR_COUNT, isValidSectorMask } from "../tag/layout.js";
import type {
  AgentMessage,
  BridgeCommand,
  BridgeEvent,
} from "./messages.js";

const KEY_PATTERN = /^[0-9a-fA-F]{12}$/;
const UID_PATTERN = /^[0-9a-fA-F]{8}$/;
// base64 of exactly 16 bytes
const BLOCK_PATTERN = /^[A-Za-z0-9+/]{21}[AQgw]==$/;

function toObject(raw: unknown): object {
  let value = raw;
  if (typeof raw === "string") {
    try {
      value = JSON.parse(raw);
    } catch {
      throw new ProtocolViolationError("Envelope is not valid JSON");
    }
  }
  if (typeof value !== "object" || value === null || Array.isArray(value)) {
    throw new ProtocolViolationError("Envelope must be a JSON object");
  }
  return value;
}

function requireString(obj: object, key: string): string {
  const value: unknown = Reflect.get(obj, key);
  if (typeof value !== "string") {
    throw new ProtocolViolationError(`${key} must be a string`);
  }
  return value;
}

function optionalString(obj: object, key: string): string | undefined {
  const value: unknown = Reflect.get(obj, key);
  if (value === undefined || value === null) return undefined;
  if (typeof value !== "string") {
    throw new ProtocolViolationError(`${key} must be a string`);
  }
  return value;
}

function requireRequestId(obj: object): string {
  const id = requireString(obj, "request_id");
  if (id.length === 0) {
    throw new ProtocolViolationError("request_id must not be empty");
  }
  return id;
}

function requireBoolean(obj: object, key: string): boolean {
  const value: unknown = Reflect.get(obj, key);
  if (typeof value !== "boolean") {
    throw new ProtocolViolationError(`${key} must be a boolean`);
  }
  return value;
}

function requireCount(obj: object, key: string): number {
  const value: unknown = Reflect.get(obj, key);
  if (typeof value !== "number" || !Number.isInteger(value) || value < 0) {
    throw new ProtocolViolationError(`${key} must be a non-negative integer`);
  }
  return value;
}

function requireUid(obj: object, key = "uid"): string {
  const uid = requireString(obj, key);
  if (!UID_PATTERN.test(uid)) {
    throw new ProtocolViolationError(`${key} must be 8 hex characters`);
  }
  return uid.toUpperCase();
}

function optionalUid(obj: object, key = "uid"): string | undefined {
  const value: unknown = Reflect.get(obj, key);
  return value === undefined || value === null ? undefined : requireUid(obj, key);
}

function requireArray(obj: object, key: string, length: number): unknown[] {
  const value: unknown = Reflect.get(obj, key);
  if (!Array.isArray(value)) {
    throw new ProtocolViolationError(`${key} must be an array`);
  }
  if (value.length !== length) {
    throw new ProtocolViolationError(`${key} must have ${length} entries, got ${value.length}`);
  }
  return value;
}

function requireBlocks(obj: object): string[] {
  return requireArray(obj, "blocks", BLOCK_COUNT).map((block, i) => {
    if (typeof block !== "string" || !BLOCK_PATTERN.test(block) || !isBase64(block)) {
      throw new ProtocolViolationError(`blocks[${i}] must be base64 of 16 bytes`);
    }
    return block;
  });
}

function requireKeys(obj: object): string[] {
  return requireArray(obj, "keys", SECTOR_COUNT).map((key, i) => {
    if (typeof key !== "string" || !KEY_PATTERN.test(key)) {
      throw new ProtocolViolationError(`keys[${i}] must be 12 hex characters`);
    }
    return key.toUpperCase();
  });
}

function requireNullableKeys(obj: object): (string | null)[] {
  return requireArray(obj, "keys", SECTOR_COUNT).map((key, i) => {
    if (key === null) return null;
    if (typeof key !== "string" || !KEY_PATTERN.test(key)) {
      throw new ProtocolViolationError(`keys[${i}] must be 12 hex characters or null`);
    }
    return key.toUpperCase();
  });
}

/**
 * Validate an envelope sent by the agent (JSON text or parsed object).
 */
export function parseAgentMessage(raw: unknown): AgentMessage {
  const obj = toObject(raw);
  const action: unknown = Reflect.get(obj, "action");

  switch (action) {
    case "STATUS":
      return {
        action: "STATUS",
        connected: requireBoolean(obj, "connected"),
        device: requireString(obj, "device"),
      };
    case "TAG_DETECTED":
      return { action: "TAG_DETECTED", uid: requireUid(obj) };
    case "TAG_DATA": {
      const mask: unknown = Reflect.get(obj, "readable_sectors");
      if (mask !== undefined && mask !== null && !isValidSectorMask(mask)) {
        throw new ProtocolViolationError("readable_sectors must be a 16-bit sector mask");
      }
      return {
        action: "TAG_DATA",
        uid: requireUid(obj),
        blocks: requireBlocks(obj),
        request_id: optionalString(obj, "request_id"),
        readable_sectors: isValidSectorMask(mask) ? mask : undefined,
      };
    }
    case "WRITE_RESULT":
      return {
        action: "WRITE_RESULT",
        success: requireBoolean(obj, "success"),
        blocks_written: requireCount(obj, "blocks_written"),
        error: optionalString(obj, "error"),
        error_code: optionalString(obj, "error_code"),
        uid: optionalUid(obj),
        request_id: optionalString(obj, "request_id"),
      };
    case "ERROR":
      return {
        action: "ERROR",
        message: requireString(obj, "message"),
        request_id: optionalString(obj, "request_id"),
        code: optionalString(obj, "code"),
      };
    default:
      throw new ProtocolViolationError(`Unknown agent action: ${String(action)}`);
  }
}

/**
 * Validate an envelope sent by the bridge (JSON text or parsed object).
 */
export function parseBridgeCommand(raw: unknown): BridgeCommand {
  const obj = toObject(raw);
  const action: unknown = Reflect.get(obj, "action");

  switch (action) {
    case "READ_TAG": {
      const keys: unknown = Reflect.get(obj, "keys");
      return {
        action: "READ_TAG",
        request_id: requireRequestId(obj),
        keys: keys === undefined || keys === null ? undefined : requireKeys(obj),
      };
    }
    case "WRITE_TAG":
      return {
        action: "WRITE_TAG",
        request_id: requireRequestId(obj),
        keys: requireNullableKeys(obj),
        blocks: requireBlocks(obj),
        uid: optionalUid(obj),
      };
    case "CANCEL":
      return { action: "CANCEL", request_id: requireRequestId(obj) };
    default:
      throw new ProtocolViolationError(`Unknown bridge action: ${String(action)}`);
  }
}

/**
 * Validate a message from the bridge event feed.
 */
export function parseBridgeEvent(raw: unknown): BridgeEvent {
  const obj = toObject(raw);
  const type: unknown = Reflect.get(obj, "type");

  switch (type) {
    case "tag_detected":
      return { type: "tag_detected", uid: requireUid(obj) };
    case "bridge_status": {
      const rawState: unknown = Reflect.get(obj, "state");
      if (rawState !== "idle" && rawState !== "awaiting_tag") {
        throw new ProtocolViolationError("state must be idle or awaiting_tag");
      }
      const state = rawState === "idle" ? "idle" : "awaiting_tag";
      return {
        type: "bridge_status",
        connected: requireBoolean(obj, "connected"),
        device: optionalString(obj, "device") ?? null,
        state,
        pending_request_id: optionalString(obj, "pending_request_id") ?? null,
        last_uid: optionalString(obj, "last_uid") ?? null,
      };
    }
    default:
      throw new ProtocolViolationError(`Unknown event type: ${String(type)}`);
  }
}
