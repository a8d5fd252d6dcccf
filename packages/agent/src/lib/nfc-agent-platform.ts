/**
 * nfc-agent Tag Platform
 * Drives a PC/SC reader through a local nfc-agent service
 * (http://127.0.0.1:32145). The service authenticates on every block
 * request, so a sector "authentication" here is a keyed read of the
 * sector's first block whose key is then remembered for the sector.
 */

import { setTimeout as sleep } from "node:timers/promises";

import { fetch } from "undici";
import {
  AuthenticationFailedError,
  BLOCK_SIZE,
  UID_LENGTH,
  bytesToHex,
  createLogger,
  firstBlockOfSector,
  parseHexToBytes,
  sectorOfBlock,
  toError,
  type Logger,
} from "@spooltag/shared";

import {
  TagLostError,
  abortError,
  type KeyType,
  type TagConnection,
  type TagPlatform,
} from "./platform.js";

export const DEFAULT_NFC_AGENT_URL = "http://127.0.0.1:32145";

export interface NfcAgentPlatformOptions {
  baseUrl?: string;
  readerIndex?: number;
  /** Delay between card presence polls. */
  pollIntervalMs?: number;
  requestTimeoutMs?: number;
  logger?: Logger;
}

interface AgentResponse {
  ok: boolean;
  status: number;
  body: unknown;
}

function errorText(response: AgentResponse): string {
  const body = response.body;
  if (typeof body === "object" && body !== null) {
    const error: unknown = Reflect.get(body, "error");
    if (typeof error === "string") return error;
  }
  return `HTTP ${response.status}`;
}

function blockData(response: AgentResponse, block: number): Uint8Array {
  const body = response.body;
  const data: unknown = typeof body === "object" && body !== null ? Reflect.get(body, "data") : undefined;
  if (typeof data !== "string") {
    throw new Error(`nfc-agent returned no data for block ${block}`);
  }
  const bytes = parseHexToBytes(data, `block ${block} data`);
  if (bytes.length !== BLOCK_SIZE) {
    throw new Error(`nfc-agent returned ${bytes.length} bytes for block ${block}`);
  }
  return bytes;
}

export class NfcAgentTagPlatform implements TagPlatform {
  readonly deviceName: string;
  private readonly baseUrl: string;
  private readonly readerIndex: number;
  private readonly pollIntervalMs: number;
  private readonly requestTimeoutMs: number;
  private readonly logger: Logger;

  constructor(options: NfcAgentPlatformOptions = {}) {
    this.baseUrl = (options.baseUrl ?? DEFAULT_NFC_AGENT_URL).replace(/\/$/, "");
    this.readerIndex = options.readerIndex ?? 0;
    this.pollIntervalMs = options.pollIntervalMs ?? 500;
    this.requestTimeoutMs = options.requestTimeoutMs ?? 5000;
    this.logger = options.logger ?? createLogger("agent:nfc-agent");
    this.deviceName = `nfc-agent reader ${this.readerIndex}`;
  }

  async waitForTag(signal: AbortSignal): Promise<TagConnection> {
    for (;;) {
      if (signal.aborted) {
        throw abortError(signal);
      }
      const response = await this.request(`/v1/readers/${this.readerIndex}/card`, {}, signal);
      if (response.ok) {
        const uid = this.cardUid(response.body);
        if (uid) {
          this.logger.debug("Card present", { uid: bytesToHex(uid) });
          return new NfcAgentTagConnection(this, uid);
        }
      }
      try {
        await sleep(this.pollIntervalMs, undefined, { signal });
      } catch {
        throw abortError(signal);
      }
    }
  }

  async close(): Promise<void> {
    this.logger.debug("nfc-agent platform closed");
  }

  /** @internal */
  async request(
    path: string,
    init: { method?: "GET" | "POST"; body?: string } = {},
    signal?: AbortSignal,
  ): Promise<AgentResponse> {
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), this.requestTimeoutMs);
    const forward = (): void => controller.abort();
    signal?.addEventListener("abort", forward, { once: true });

    try {
      const response = await fetch(`${this.baseUrl}${path}`, {
        method: init.method ?? "GET",
        headers: { "Content-Type": "application/json" },
        body: init.body,
        signal: controller.signal,
      });
      const body: unknown = await response.json().catch(() => null);
      return { ok: response.ok, status: response.status, body };
    } catch (err) {
      if (signal?.aborted) {
        throw abortError(signal);
      }
      if (controller.signal.aborted) {
        throw new Error(`nfc-agent request timed out: ${path}`);
      }
      throw new Error(`Failed to connect to nfc-agent at ${this.baseUrl}: ${toError(err).message}`);
    } finally {
      clearTimeout(timer);
      signal?.removeEventListener("abort", forward);
    }
  }

  /** @internal */
  blockPath(block: number): string {
    return `/v1/readers/${this.readerIndex}/mifare/${block}`;
  }

  private cardUid(body: unknown): Uint8Array | null {
    if (typeof body !== "object" || body === null) return null;
    const uid: unknown = Reflect.get(body, "uid");
    if (typeof uid !== "string") return null;
    const bytes = parseHexToBytes(uid, "card uid");
    if (bytes.length !== UID_LENGTH) {
      this.logger.debug("Ignoring card with unsupported uid length", { length: bytes.length });
      return null;
    }
    return bytes;
  }
}

interface SectorCredentials {
  key: string;
  keyType: KeyType;
}

class NfcAgentTagConnection implements TagConnection {
  private readonly credentials = new Map<number, SectorCredentials>();

  constructor(
    private readonly platform: NfcAgentTagPlatform,
    readonly uid: Uint8Array,
  ) {}

  async authenticate(sector: number, key: Uint8Array, keyType: KeyType): Promise<boolean> {
    const credentials: SectorCredentials = { key: bytesToHex(key), keyType };
    const response = await this.platform.request(this.readPath(firstBlockOfSector(sector), credentials));
    if (response.status === 404) {
      throw new TagLostError();
    }
    if (!response.ok) {
      this.credentials.delete(sector);
      return false;
    }
    this.credentials.set(sector, credentials);
    return true;
  }

  async readBlock(block: number): Promise<Uint8Array> {
    const response = await this.platform.request(this.readPath(block, this.credentialsFor(block)));
    if (response.status === 404) {
      throw new TagLostError();
    }
    if (!response.ok) {
      throw new Error(`Read of block ${block} failed: ${errorText(response)}`);
    }
    return blockData(response, block);
  }

  async writeBlock(block: number, data: Uint8Array): Promise<void> {
    const credentials = this.credentialsFor(block);
    const response = await this.platform.request(this.platform.blockPath(block), {
      method: "POST",
      body: JSON.stringify({ data: bytesToHex(data), key: credentials.key, keyType: credentials.keyType }),
    });
    if (!response.ok) {
      throw new Error(`Write of block ${block} failed: ${errorText(response)}`);
    }
  }

  async close(): Promise<void> {
    this.credentials.clear();
  }

  private credentialsFor(block: number): SectorCredentials {
    const sector = sectorOfBlock(block);
    const credentials = this.credentials.get(sector);
    if (!credentials) {
      throw new AuthenticationFailedError(sector);
    }
    return credentials;
  }

  private readPath(block: number, credentials: SectorCredentials): string {
    const params = new URLSearchParams({ key: credentials.key, keyType: credentials.keyType });
    return `${this.platform.blockPath(block)}?${params.toString()}`;
  }
}
