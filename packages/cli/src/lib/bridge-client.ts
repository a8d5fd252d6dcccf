/**
 * Bridge Client
 * HTTP client of the bridge REST API. Error bodies are turned back into
 * the typed errors the bridge raised.
 */

import { Agent, fetch, type Response } from "undici";
import {
  createLogger,
  decodeTag,
  errorFromCode,
  imageFromBase64Blocks,
  imageToBase64Blocks,
  isSpoolTagErrorCode,
  toError,
  type FilamentRecord,
  type Logger,
  type TagImage,
} from "@spooltag/shared";

export const DEFAULT_BRIDGE_URL = "http://localhost:8000";

// Tag requests hold the response until a tag is touched, bounded by the
// bridge's own timeout_ms (up to 600 s). Undici's 300 s defaults would cut
// them short.
const bridgeDispatcher = new Agent({ headersTimeout: 0, bodyTimeout: 0 });

export interface BridgeClientConfig {
  bridgeUrl: string;
  logger?: Logger;
}

export interface BridgeStatus {
  running: boolean;
  connected: boolean;
  device: string | null;
  state: string;
  pendingRequestId: string | null;
  lastUid: string | null;
  subscribers: number;
  completed: number;
  failed: number;
}

export interface TagReadResponse {
  requestId: string;
  uid: string;
  image: Uint8Array[];
  /** Decoded from `image` on this side. */
  record: FilamentRecord;
  readableSectors: number[];
  unreadableSectors: number[];
}

export interface TagWriteResponse {
  requestId: string;
  success: boolean;
  blocksWritten: number;
  expectedBlocks: number;
  uid: string | null;
  error: string | null;
}

export interface ReadOptions {
  uid?: string;
  timeoutMs?: number;
}

export interface WriteOptions {
  uid?: string;
  timeoutMs?: number;
}

export interface CloneOptions {
  sourceUid?: string;
  rewriteUid?: boolean;
  timeoutMs?: number;
}

// ── response field readers ──

function field(source: object, key: string): unknown {
  return Reflect.get(source, key);
}

function str(source: object, key: string): string {
  const value = field(source, key);
  if (typeof value !== "string") {
    throw new Error(`Unexpected bridge response: ${key} is not a string`);
  }
  return value;
}

function nullableStr(source: object, key: string): string | null {
  const value = field(source, key);
  if (value === null || value === undefined) return null;
  return str(source, key);
}

function num(source: object, key: string): number {
  const value = field(source, key);
  if (typeof value !== "number") {
    throw new Error(`Unexpected bridge response: ${key} is not a number`);
  }
  return value;
}

function bool(source: object, key: string): boolean {
  const value = field(source, key);
  if (typeof value !== "boolean") {
    throw new Error(`Unexpected bridge response: ${key} is not a boolean`);
  }
  return value;
}

function numbers(source: object, key: string): number[] {
  const value = field(source, key);
  if (!Array.isArray(value) || !value.every((item): item is number => typeof item === "number")) {
    throw new Error(`Unexpected bridge response: ${key} is not a number array`);
  }
  return value;
}

function strings(source: object, key: string): string[] {
  const value = field(source, key);
  if (!Array.isArray(value) || !value.every((item): item is string => typeof item === "string")) {
    throw new Error(`Unexpected bridge response: ${key} is not a string array`);
  }
  return value;
}

function isObject(value: unknown): value is object {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Typed error from a `{ error: { code, message } }` body, or a plain
 * Error carrying the status when the body is anything else.
 */
export function errorFromResponse(status: number, payload: unknown): Error {
  const error = isObject(payload) ? field(payload, "error") : undefined;
  if (isObject(error)) {
    const code = field(error, "code");
    const message = field(error, "message");
    if (typeof code === "string" && typeof message === "string") {
      return isSpoolTagErrorCode(code)
        ? errorFromCode(code, message)
        : new Error(`Bridge request failed: ${status} - ${message}`);
    }
  }
  return new Error(`Bridge request failed: ${status}`);
}

function toWriteResponse(body: object): TagWriteResponse {
  return {
    requestId: str(body, "request_id"),
    success: bool(body, "success"),
    blocksWritten: num(body, "blocks_written"),
    expectedBlocks: num(body, "expected_blocks"),
    uid: nullableStr(body, "uid"),
    error: nullableStr(body, "error"),
  };
}

export class BridgeClient {
  private readonly baseUrl: string;
  private readonly logger: Logger;

  constructor(config: BridgeClientConfig) {
    this.baseUrl = config.bridgeUrl.replace(/\/$/, "");
    this.logger = config.logger ?? createLogger("cli:client", "warn");
  }

  getBaseUrl(): string {
    return this.baseUrl;
  }

  async getStatus(): Promise<BridgeStatus> {
    const body = await this.request("GET", "/api/bridge/status");
    return {
      running: bool(body, "running"),
      connected: bool(body, "connected"),
      device: nullableStr(body, "device"),
      state: str(body, "state"),
      pendingRequestId: nullableStr(body, "pending_request_id"),
      lastUid: nullableStr(body, "last_uid"),
      subscribers: num(body, "subscribers"),
      completed: num(body, "completed"),
      failed: num(body, "failed"),
    };
  }

  /**
   * Ask the agent to read the next tag. Resolves once a tag was read or
   * rejects with the bridge's error (TIMEOUT, NO_BRIDGE_CONNECTED, ...).
   */
  async read(options: ReadOptions = {}): Promise<TagReadResponse> {
    const body = await this.request("POST", "/api/tags/read", {
      uid: options.uid,
      timeout_ms: options.timeoutMs,
    });
    const image = imageFromBase64Blocks(strings(body, "blocks"));
    return {
      requestId: str(body, "request_id"),
      uid: str(body, "uid"),
      image,
      record: decodeTag(image),
      readableSectors: numbers(body, "readable_sectors"),
      unreadableSectors: numbers(body, "unreadable_sectors"),
    };
  }

  async write(image: TagImage, options: WriteOptions = {}): Promise<TagWriteResponse> {
    const body = await this.request("POST", "/api/tags/write", {
      blocks: imageToBase64Blocks(image),
      uid: options.uid,
      timeout_ms: options.timeoutMs,
    });
    return toWriteResponse(body);
  }

  async clone(image: TagImage, options: CloneOptions = {}): Promise<TagWriteResponse> {
    const body = await this.request("POST", "/api/tags/clone", {
      blocks: imageToBase64Blocks(image),
      source_uid: options.sourceUid,
      rewrite_uid: options.rewriteUid,
      timeout_ms: options.timeoutMs,
    });
    return toWriteResponse(body);
  }

  private async request(method: "GET" | "POST", path: string, payload?: object): Promise<object> {
    const url = `${this.baseUrl}${path}`;
    this.logger.debug("Bridge request", { method, path });

    let response: Response;
    try {
      response = await fetch(url, {
        method,
        headers: payload ? { "Content-Type": "application/json" } : undefined,
        body: payload ? JSON.stringify(payload) : undefined,
        dispatcher: bridgeDispatcher,
      });
    } catch (error) {
      throw new Error(`Failed to connect to bridge at ${this.baseUrl}: ${toError(error).message}`);
    }

    const body: unknown = await response.json().catch(() => undefined);
    if (!response.ok) {
      const error = errorFromResponse(response.status, body);
      this.logger.debug("Bridge request failed", { method, path, status: response.status });
      throw error;
    }
    if (!isObject(body)) {
      throw new Error(`Unexpected bridge response from ${path}`);
    }
    return body;
  }
}
