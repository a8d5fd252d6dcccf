/**
 * Agent Service - Core Library
 * Holds the agent link to the bridge, turns READ_TAG / WRITE_TAG / CANCEL
 * commands into tag jobs and reports their outcome with the request id.
 */

import {
  DEFAULT_KDF_CONFIG,
  ReconnectingSocket,
  createLogger,
  deriveKeys,
  errorMessage,
  imageFromBase64Blocks,
  isSpoolTagError,
  keySetFromHex,
  parseBridgeCommand,
  parseHexToBytes,
  parseSectorKey,
  statusMessage,
  tagDataMessage,
  tagDetectedMessage,
  toError,
  toWebSocketUrl,
  writeResultMessage,
  type AgentMessage,
  type BridgeCommand,
  type KdfConfig,
  type Logger,
  type ReadTagCommand,
  type SocketLike,
  type WriteTagCommand,
} from "@spooltag/shared";

import type { TagConnection, TagPlatform } from "./platform.js";
import { DEFAULT_CANDIDATE_KEYS, parseCandidateKeys, readSectors, writeSectors } from "./tag-operations.js";
import { TagWorker, type WorkerStage } from "./tag-worker.js";

export interface AgentServiceConfig {
  bridgeUrl: string;
  platform: TagPlatform;
  deviceName?: string;
  candidateKeys?: readonly string[];
  reconnectDelayMs?: number;
  kdf?: KdfConfig;
  /** Socket factory; defaults to a `ws` client. */
  createSocket?: (url: string) => SocketLike;
  logger?: Logger;
}

export class AgentService {
  private readonly socket: ReconnectingSocket;
  private readonly worker: TagWorker;
  private readonly platform: TagPlatform;
  private readonly deviceName: string;
  private readonly candidateKeys: Uint8Array[];
  private readonly kdf: KdfConfig;
  private readonly logger: Logger;

  constructor(config: AgentServiceConfig) {
    this.platform = config.platform;
    this.deviceName = config.deviceName ?? config.platform.deviceName;
    this.candidateKeys = parseCandidateKeys(config.candidateKeys ?? DEFAULT_CANDIDATE_KEYS);
    this.kdf = config.kdf ?? DEFAULT_KDF_CONFIG;
    this.logger = config.logger ?? createLogger("agent:service");

    this.worker = new TagWorker(this.platform, {
      logger: this.logger.child({ component: "agent:worker" }),
      onTagDetected: (uid) => {
        this.send(tagDetectedMessage(uid));
      },
    });

    this.socket = new ReconnectingSocket(
      {
        url: toWebSocketUrl(config.bridgeUrl, "/ws/agent"),
        reconnectDelayMs: config.reconnectDelayMs ?? 5000,
        createSocket: config.createSocket,
        logger: this.logger,
      },
      {
        onOpen: () => {
          this.logger.info("Connected to bridge", { device: this.deviceName });
          this.send(statusMessage(this.deviceName));
        },
        onMessage: (text) => this.handleMessage(text),
        onClose: (code) => {
          this.logger.warn("Bridge connection lost", { code });
        },
      },
    );
  }

  start(): void {
    this.socket.start();
  }

  async stop(): Promise<void> {
    this.socket.stop();
    await this.worker.stop();
    await this.platform.close();
  }

  isConnected(): boolean {
    return this.socket.isOpen();
  }

  getStage(): WorkerStage {
    return this.worker.getStage();
  }

  /** Resolves once the current tag job (if any) has finished. */
  whenIdle(): Promise<void> {
    return this.worker.whenIdle();
  }

  handleMessage(text: string): void {
    const command = this.parseCommand(text);
    if (!command) {
      return;
    }

    switch (command.action) {
      case "READ_TAG":
        this.submit(command, "READ", (tag) => this.read(command, tag));
        return;
      case "WRITE_TAG":
        this.submit(command, "WRITE", (tag) => this.write(command, tag));
        return;
      case "CANCEL":
        this.worker.cancel(command.request_id);
        return;
    }
  }

  private parseCommand(text: string): BridgeCommand | null {
    try {
      return parseBridgeCommand(text);
    } catch (err) {
      this.logger.warn("Ignoring malformed command", { error: toError(err).message });
      return null;
    }
  }

  private submit(
    command: ReadTagCommand | WriteTagCommand,
    kind: "READ" | "WRITE",
    run: (tag: TagConnection) => Promise<void>,
  ): void {
    const requestId = command.request_id;
    try {
      this.worker.submit({
        requestId,
        kind,
        run,
        onError: (error) => {
          this.send(
            errorMessage(error.message, {
              requestId,
              code: isSpoolTagError(error) ? error.code : "AGENT_ERROR",
            }),
          );
        },
      });
    } catch (err) {
      const error = toError(err);
      this.send(
        errorMessage(error.message, {
          requestId,
          code: isSpoolTagError(error) ? error.code : "AGENT_ERROR",
        }),
      );
    }
  }

  private async read(command: ReadTagCommand, tag: TagConnection): Promise<void> {
    const keys = command.keys ? keySetFromHex(command.keys) : await deriveKeys(tag.uid, this.kdf);
    const { blocks, readableSectors } = await readSectors(tag, keys, this.candidateKeys);
    this.logger.info("Tag read", {
      requestId: command.request_id,
      readableSectors: readableSectors.toString(16),
    });
    this.send(tagDataMessage(command.request_id, tag.uid, blocks, readableSectors));
  }

  private async write(command: WriteTagCommand, tag: TagConnection): Promise<void> {
    const requestId = command.request_id;
    const targetUid = command.uid !== undefined ? parseHexToBytes(command.uid, "uid") : undefined;

    if (targetUid && !tag.rewriteUid) {
      this.send(
        writeResultMessage({
          requestId,
          success: false,
          blocksWritten: 0,
          uid: tag.uid,
          error: "This tag cannot change its uid",
          errorCode: "UNSUPPORTED_OPERATION",
        }),
      );
      return;
    }

    const image = imageFromBase64Blocks(command.blocks);
    const keys = command.keys.map((key, sector) => (key === null ? null : parseSectorKey(key, sector)));
    const result = await writeSectors(tag, image, keys);
    const failedSectors = result.skippedSectors.filter((sector) => keys[sector] !== null);

    let uid = tag.uid;
    if (targetUid && tag.rewriteUid) {
      await tag.rewriteUid(targetUid);
      uid = targetUid;
    }

    const success = failedSectors.length === 0;
    this.logger.info("Tag written", { requestId, blocksWritten: result.blocksWritten, success });
    this.send(
      writeResultMessage({
        requestId,
        success,
        blocksWritten: result.blocksWritten,
        uid,
        error: success ? undefined : `Authentication failed for sectors ${failedSectors.join(", ")}`,
        errorCode: success ? undefined : "TAG_ERROR",
      }),
    );
  }

  private send(message: AgentMessage): void {
    if (!this.socket.send(message)) {
      this.logger.warn("Bridge not connected; message dropped", { action: message.action });
    }
  }
}
