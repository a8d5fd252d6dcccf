/**
 * BridgeSession
 *
 * Coordinates one physical tag operation at a time between request
 * initiators (HTTP API, CLI) and the NFC agent connected over the agent
 * WebSocket. Each request gets a correlation id, a deadline and exactly
 * one outcome; responses that do not match the pending id never touch it.
 *
 * State: idle -> awaiting_tag(kind, id) -> idle.
 */

import { randomBytes } from "node:crypto";

import {
  AgentError,
  DEFAULT_KDF_CONFIG,
  InvalidInputError,
  NoBridgeConnectedError,
  ProtocolViolationError,
  RequestInProgressError,
  BridgeTimeoutError,
  SECTOR_COUNT,
  TypedEmitter,
  UnsupportedOperationError,
  assertTagImage,
  blocksOfSector,
  bytesToHex,
  cancelCommand,
  createLogger,
  decodeTag,
  deriveKeys,
  errorFromCode,
  imageFromBase64Blocks,
  inferSectorMask,
  isPayloadBlock,
  parseAgentMessage,
  parseHexToBytes,
  payloadOnly,
  readTagCommand,
  toError,
  uidOfImage,
  writeTagCommand,
  type AgentMessage,
  type BridgeCommand,
  type ErrorMessage,
  type FilamentRecord,
  type KdfConfig,
  type KeySet,
  type Logger,
  type SectorMask,
  type TagDataMessage,
  type TagImage,
  type WriteResultMessage,
} from "@spooltag/shared";

import type { AgentLink } from "./agent-link.js";

export type RequestKind = "READ" | "WRITE";
export type SessionState = "idle" | "awaiting_tag";

export interface ReadOptions {
  timeoutMs?: number;
  /** Derive read keys from this uid instead of letting the agent derive them. */
  uid?: Uint8Array;
  keys?: KeySet;
}

export interface WriteOptions {
  timeoutMs?: number;
  /** Derive write keys from this uid instead of the uid in block 0. */
  uid?: Uint8Array;
  /** Sixteen keys; a null entry skips that sector. */
  keys?: readonly (Uint8Array | null)[];
}

export interface CloneOptions {
  timeoutMs?: number;
  /** Ask the agent to give the target tag the source uid. */
  rewriteUid?: boolean;
}

export interface ReadResult {
  requestId: string;
  uid: string;
  image: Uint8Array[];
  readableSectors: SectorMask;
  record: FilamentRecord;
}

export interface WriteResult {
  requestId: string;
  success: boolean;
  blocksWritten: number;
  /** Payload blocks in the sectors that had a key. */
  expectedBlocks: number;
  uid?: string;
  error?: string;
}

export interface BridgeStatus {
  connected: boolean;
  device: string | null;
  state: SessionState;
  pendingRequestId: string | null;
  pendingKind: RequestKind | null;
  lastUid: string | null;
  protocolViolations: number;
  discardedResponses: number;
  completed: number;
  failed: number;
}

export interface BridgeSessionEvents {
  tagDetected: { uid: string };
  status: BridgeStatus;
  tagRead: { uid: string; image: Uint8Array[]; requestId?: string };
  connection: { connected: boolean; linkId: string; device: string | null };
}

export interface BridgeSessionOptions {
  requestTimeoutMs?: number;
  kdf?: KdfConfig;
  logger?: Logger;
  /** How many timed-out ids are remembered for late-response discarding. */
  timedOutHistory?: number;
  generateRequestId?: () => string;
}

type AgentResponse = TagDataMessage | WriteResultMessage;
type WriteKeys = readonly (Uint8Array | null)[];
type CommandBuilder = (requestId: string) => BridgeCommand;

interface PendingRequest {
  id: string;
  kind: RequestKind;
  startedAt: number;
  timer: ReturnType<typeof setTimeout>;
  resolve: (response: AgentResponse) => void;
  reject: (error: Error) => void;
}

const DEFAULT_TIMEOUT_MS = 30_000;
const DEFAULT_TIMED_OUT_HISTORY = 64;

export class BridgeSession extends TypedEmitter<BridgeSessionEvents> {
  private link: AgentLink | null = null;
  private device: string | null = null;
  private pending: PendingRequest | null = null;
  private lastUid: string | null = null;
  private readonly timedOut = new Set<string>();
  private counter = 0;

  private protocolViolations = 0;
  private discardedResponses = 0;
  private completed = 0;
  private failed = 0;

  private readonly requestTimeoutMs: number;
  private readonly kdf: KdfConfig;
  private readonly logger: Logger;
  private readonly timedOutHistory: number;
  private readonly generateRequestId: () => string;

  constructor(options: BridgeSessionOptions = {}) {
    const logger = options.logger ?? createLogger("bridge:session");
    super(logger);
    this.logger = logger;
    this.requestTimeoutMs = options.requestTimeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.kdf = options.kdf ?? DEFAULT_KDF_CONFIG;
    this.timedOutHistory = options.timedOutHistory ?? DEFAULT_TIMED_OUT_HISTORY;
    this.generateRequestId =
      options.generateRequestId ??
      (() => `req-${++this.counter}-${randomBytes(4).toString("hex")}`);
  }

  // ── transport ──

  /**
   * Make `link` the active agent connection. A previous link is closed and
   * its pending request fails with NoBridgeConnected.
   */
  attach(link: AgentLink): void {
    const previous = this.link;
    if (previous) {
      this.logger.info("Agent connection replaced", { previous: previous.id, linkId: link.id });
      this.failPending(new NoBridgeConnectedError("Agent connection was replaced"));
      this.link = null;
      try {
        previous.close(1000, "Replaced by a newer agent connection");
      } catch (err) {
        this.logger.warn("Failed to close replaced agent link", { error: toError(err).message });
      }
    }

    this.link = link;
    this.device = null;
    this.logger.info("Agent attached", { linkId: link.id, remote: link.remoteAddress });
    this.emit("connection", { connected: true, linkId: link.id, device: null });
    this.emitStatus();
  }

  /**
   * Drop the link with id `linkId` if it is still the active one. A pending
   * request fails immediately rather than waiting for its deadline.
   */
  detach(linkId: string): boolean {
    if (!this.link || this.link.id !== linkId) {
      this.logger.debug("Ignoring detach of inactive link", { linkId });
      return false;
    }
    this.link = null;
    this.device = null;
    this.logger.info("Agent detached", { linkId });
    this.failPending(new NoBridgeConnectedError("Agent disconnected"));
    this.emit("connection", { connected: false, linkId, device: null });
    this.emitStatus();
    return true;
  }

  isConnected(): boolean {
    return this.link !== null;
  }

  /**
   * Entry point for every frame received on an agent link.
   */
  handleAgentMessage(linkId: string, raw: unknown): void {
    if (!this.link || this.link.id !== linkId) {
      this.logger.debug("Ignoring message from inactive link", { linkId });
      return;
    }

    let message: AgentMessage;
    try {
      message = parseAgentMessage(raw);
    } catch (err) {
      this.recordViolation(toError(err).message);
      return;
    }

    switch (message.action) {
      case "STATUS":
        this.device = message.device;
        this.logger.info("Agent status", { device: message.device, connected: message.connected });
        this.emitStatus();
        return;
      case "TAG_DETECTED":
        this.lastUid = message.uid;
        this.logger.info("Tag detected", { uid: message.uid });
        this.emit("tagDetected", { uid: message.uid });
        return;
      case "TAG_DATA":
        if (message.request_id === undefined) {
          this.emitUnsolicitedRead(message);
          return;
        }
        this.routeResponse(message.request_id, message);
        return;
      case "WRITE_RESULT":
        if (message.request_id === undefined) {
          this.recordViolation("WRITE_RESULT without request_id");
          return;
        }
        this.routeResponse(message.request_id, message);
        return;
      case "ERROR":
        this.handleAgentError(message);
        return;
    }
  }

  // ── requests ──

  async requestRead(options: ReadOptions = {}): Promise<ReadResult> {
    const { keys, uid } = options;
    if (keys && keys.length !== SECTOR_COUNT) {
      throw new InvalidInputError(`Expected ${SECTOR_COUNT} sector keys, got ${keys.length}`);
    }

    const commandFor =
      (readKeys?: KeySet): CommandBuilder =>
      (id) =>
        readTagCommand(id, readKeys);
    const response = await this.exchange("READ", options.timeoutMs, () =>
      !keys && uid ? deriveKeys(uid, this.kdf).then(commandFor) : commandFor(keys),
    );
    if (response.action !== "TAG_DATA") {
      throw new ProtocolViolationError(`Expected TAG_DATA, got ${response.action}`);
    }

    const image = imageFromBase64Blocks(response.blocks);
    const readableSectors = response.readable_sectors ?? inferSectorMask(image);
    return {
      requestId: response.request_id ?? "",
      uid: response.uid,
      image,
      readableSectors,
      record: decodeTag(image),
    };
  }

  /**
   * Write the payload blocks of `image`. Keys come from `options.keys`, or
   * are derived from `options.uid`, or from the uid stored in block 0.
   */
  async requestWrite(image: TagImage, options: WriteOptions = {}): Promise<WriteResult> {
    assertTagImage(image);
    if (options.keys) {
      return this.write(image, options.keys, options.timeoutMs);
    }

    const source = options.uid ?? uidOfImage(image);
    if (source.every((b) => b === 0)) {
      throw new InvalidInputError("Write needs a uid or keys: block 0 of the image carries no uid");
    }
    return this.write(image, () => deriveKeys(source, this.kdf), options.timeoutMs);
  }

  /**
   * Copy the payload of `sourceImage` onto the next tag touched. Block 0 and
   * trailers are never sent. Keys are derived from `sourceUid`.
   */
  async requestClone(
    sourceUid: Uint8Array,
    sourceImage: TagImage,
    options: CloneOptions = {},
  ): Promise<WriteResult> {
    assertTagImage(sourceImage);
    if (sourceUid.length !== 4) {
      throw new InvalidInputError(`Source uid must be 4 bytes, got ${sourceUid.length}`);
    }
    return this.write(
      payloadOnly(sourceImage),
      () => deriveKeys(sourceUid, this.kdf),
      options.timeoutMs,
      options.rewriteUid ? sourceUid : undefined,
    );
  }

  getStatus(): BridgeStatus {
    return {
      connected: this.link !== null,
      device: this.device,
      state: this.pending ? "awaiting_tag" : "idle",
      pendingRequestId: this.pending?.id ?? null,
      pendingKind: this.pending?.kind ?? null,
      lastUid: this.lastUid,
      protocolViolations: this.protocolViolations,
      discardedResponses: this.discardedResponses,
      completed: this.completed,
      failed: this.failed,
    };
  }

  /**
   * Fail any pending request and drop the link. Used on server shutdown.
   */
  shutdown(): void {
    this.failPending(new NoBridgeConnectedError("Bridge shutting down"));
    const link = this.link;
    this.link = null;
    if (link) {
      try {
        link.close(1001, "Bridge shutting down");
      } catch (err) {
        this.logger.warn("Failed to close agent link", { error: toError(err).message });
      }
    }
  }

  // ── internals ──

  private requireIdleLink(): AgentLink {
    if (!this.link) {
      throw new NoBridgeConnectedError();
    }
    if (this.pending) {
      throw new RequestInProgressError(this.pending.id);
    }
    return this.link;
  }

  /**
   * Keys are either given or derived lazily, once the request owns the slot.
   */
  private async write(
    image: TagImage,
    keys: WriteKeys | (() => Promise<WriteKeys>),
    timeoutMs?: number,
    targetUid?: Uint8Array,
  ): Promise<WriteResult> {
    if (typeof keys !== "function" && keys.length !== SECTOR_COUNT) {
      throw new InvalidInputError(`Expected ${SECTOR_COUNT} sector keys, got ${keys.length}`);
    }

    let expectedBlocks = 0;
    const commandFor = (writeKeys: WriteKeys): CommandBuilder => {
      expectedBlocks = writeKeys.reduce(
        (sum, key, sector) =>
          key ? sum + blocksOfSector(sector).filter((b) => isPayloadBlock(b)).length : sum,
        0,
      );
      return (id) => writeTagCommand(id, image, writeKeys, targetUid);
    };
    const response = await this.exchange("WRITE", timeoutMs, () =>
      typeof keys === "function" ? keys().then(commandFor) : commandFor(keys),
    );
    if (response.action !== "WRITE_RESULT") {
      throw new ProtocolViolationError(`Expected WRITE_RESULT, got ${response.action}`);
    }
    if (response.error_code === "UNSUPPORTED_OPERATION") {
      throw new UnsupportedOperationError(
        response.error ?? "The agent cannot rewrite the tag identifier",
      );
    }

    return {
      requestId: response.request_id ?? "",
      success: response.success,
      blocksWritten: response.blocks_written,
      expectedBlocks,
      uid: response.uid,
      error: response.error,
    };
  }

  /**
   * Claim the slot, send the command and wait for the correlated response.
   *
   * The slot is claimed before `prepare` runs, so a request whose keys are
   * still being derived already excludes every other request.
   */
  private exchange(
    kind: RequestKind,
    timeoutMs: number | undefined,
    prepare: () => CommandBuilder | Promise<CommandBuilder>,
  ): Promise<AgentResponse> {
    this.requireIdleLink();
    const id = this.generateRequestId();
    const deadline = timeoutMs ?? this.requestTimeoutMs;

    const response = new Promise<AgentResponse>((resolve, reject) => {
      const timer = setTimeout(() => this.expire(id), deadline);
      this.pending = { id, kind, startedAt: Date.now(), timer, resolve, reject };
    });
    this.emitStatus();

    let build: CommandBuilder | Promise<CommandBuilder>;
    try {
      build = prepare();
    } catch (err) {
      this.release(id, toError(err));
      return response;
    }

    if (build instanceof Promise) {
      void build.then(
        (ready) => this.dispatch(id, deadline, ready),
        (err: unknown) => this.release(id, toError(err)),
      );
    } else {
      this.dispatch(id, deadline, build);
    }
    return response;
  }

  private dispatch(requestId: string, deadline: number, build: CommandBuilder): void {
    const pending = this.pending;
    const link = this.link;
    if (!pending || pending.id !== requestId || !link) {
      // Timed out or failed while the command was being prepared
      this.logger.debug("Request ended before it was sent", { requestId });
      return;
    }

    let command: BridgeCommand;
    try {
      command = build(requestId);
    } catch (err) {
      this.release(requestId, toError(err));
      return;
    }

    try {
      link.send(command);
    } catch (err) {
      this.logger.warn("Failed to send request", { requestId, error: toError(err).message });
      this.failPending(new NoBridgeConnectedError("Failed to send request to the agent"));
      return;
    }
    this.logger.info("Request sent", { requestId, kind: pending.kind, timeoutMs: deadline });
  }

  /**
   * Give up a claimed slot whose command never reached the agent. Not
   * counted as a failed request.
   */
  private release(requestId: string, error: Error): void {
    const pending = this.pending;
    if (!pending || pending.id !== requestId) return;
    this.pending = null;
    clearTimeout(pending.timer);
    this.logger.warn("Request abandoned before sending", { requestId, error: error.message });
    pending.reject(error);
    this.emitStatus();
  }

  private routeResponse(requestId: string, response: AgentResponse): void {
    const pending = this.pending;
    if (pending && pending.id === requestId) {
      const expected = pending.kind === "READ" ? "TAG_DATA" : "WRITE_RESULT";
      if (response.action !== expected) {
        this.recordViolation(`Expected ${expected} for ${requestId}, got ${response.action}`);
        return;
      }
      this.pending = null;
      clearTimeout(pending.timer);
      this.completed++;
      if (response.action === "TAG_DATA") {
        this.lastUid = response.uid;
        this.emit("tagRead", {
          uid: response.uid,
          image: imageFromBase64Blocks(response.blocks),
          requestId,
        });
      }
      this.logger.info("Request completed", {
        requestId,
        kind: pending.kind,
        elapsedMs: Date.now() - pending.startedAt,
      });
      pending.resolve(response);
      this.emitStatus();
      return;
    }

    if (this.timedOut.has(requestId)) {
      this.discardedResponses++;
      this.logger.debug("Discarding late response", { requestId, action: response.action });
      return;
    }

    this.recordViolation(`Response for unknown request ${requestId}`);
  }

  private handleAgentError(message: ErrorMessage): void {
    const pending = this.pending;
    const requestId = message.request_id;

    if (requestId !== undefined && this.timedOut.has(requestId)) {
      this.discardedResponses++;
      this.logger.debug("Discarding late error", { requestId });
      return;
    }
    if (!pending || (requestId !== undefined && requestId !== pending.id)) {
      this.logger.warn("Agent error outside a request", {
        requestId,
        agentMessage: message.message,
      });
      return;
    }

    const error =
      message.code !== undefined && message.code !== "AGENT_ERROR"
        ? errorFromCode(message.code, message.message)
        : new AgentError(message.message);
    this.failPending(error);
  }

  private emitUnsolicitedRead(message: TagDataMessage): void {
    this.lastUid = message.uid;
    this.logger.debug("Unsolicited tag data", { uid: message.uid });
    this.emit("tagRead", { uid: message.uid, image: imageFromBase64Blocks(message.blocks) });
  }

  private expire(requestId: string): void {
    const pending = this.pending;
    if (!pending || pending.id !== requestId) {
      return;
    }
    this.pending = null;
    this.failed++;
    this.rememberTimedOut(requestId);
    this.logger.warn("Request timed out", { requestId, kind: pending.kind });

    // Best effort: the agent may still be waiting for a touch
    if (this.link) {
      try {
        this.link.send(cancelCommand(requestId));
      } catch (err) {
        this.logger.debug("Failed to send cancel", { requestId, error: toError(err).message });
      }
    }

    pending.reject(new BridgeTimeoutError());
    this.emitStatus();
  }

  private failPending(error: Error): void {
    const pending = this.pending;
    if (!pending) return;
    this.pending = null;
    clearTimeout(pending.timer);
    this.failed++;
    this.logger.warn("Request failed", { requestId: pending.id, error: error.message });
    pending.reject(error);
    this.emitStatus();
  }

  private rememberTimedOut(requestId: string): void {
    this.timedOut.add(requestId);
    while (this.timedOut.size > this.timedOutHistory) {
      const oldest = this.timedOut.values().next();
      if (oldest.done) break;
      this.timedOut.delete(oldest.value);
    }
  }

  private recordViolation(reason: string): void {
    this.protocolViolations++;
    this.logger.warn("Protocol violation", { reason });
  }

  private emitStatus(): void {
    this.emit("status", this.getStatus());
  }
}

/** Parse a uid given as hex text in an API request. */
export function parseUid(text: string): Uint8Array {
  const uid = parseHexToBytes(text, "uid");
  if (uid.length !== 4) {
    throw new InvalidInputError(`uid must be 4 bytes (8 hex characters), got ${uid.length}`);
  }
  return uid;
}

export function formatUid(uid: Uint8Array): string {
  return bytesToHex(uid);
}
