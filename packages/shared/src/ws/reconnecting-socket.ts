import { WebSocket } from "ws";
import { createLogger, type Logger } from "../utils/logger.js";
import { rawDataToString } from "./raw-data.js";

/**
 * The subset of a `ws` client socket the reconnecting wrapper drives.
 */
export interface SocketLike {
  readonly readyState: number;
  send(data: string): void;
  close(code?: number, reason?: string): void;
  on(event: string, listener: (...args: never[]) => void): unknown;
}

export interface ReconnectingSocketOptions {
  url: string;
  /** Fixed delay between a close and the next connection attempt. */
  reconnectDelayMs: number;
  createSocket?: (url: string) => SocketLike;
  logger?: Logger;
}

export interface ReconnectingSocketHandlers {
  onOpen?: () => void;
  onMessage?: (text: string) => void;
  onClose?: (code: number, reason: string) => void;
}

const OPEN = WebSocket.OPEN;

/**
 * Client WebSocket that reconnects after every unexpected close, with a
 * fixed delay and no retry limit. At most one reconnect timer is pending
 * at any time; `stop()` cancels it and closes without reconnecting.
 */
export class ReconnectingSocket {
  private socket: SocketLike | null = null;
  private reconnectTimer: ReturnType<typeof setTimeout> | null = null;
  private running = false;
  private attempts = 0;
  private readonly createSocket: (url: string) => SocketLike;
  private readonly logger: Logger;

  constructor(
    private readonly options: ReconnectingSocketOptions,
    private readonly handlers: ReconnectingSocketHandlers = {},
  ) {
    this.createSocket = options.createSocket ?? ((url) => new WebSocket(url));
    this.logger = (options.logger ?? createLogger("ws:client")).child({ url: options.url });
  }

  start(): void {
    if (this.running) return;
    this.running = true;
    this.connect();
  }

  stop(): void {
    this.running = false;
    if (this.reconnectTimer) {
      clearTimeout(this.reconnectTimer);
      this.reconnectTimer = null;
    }
    const socket = this.socket;
    this.socket = null;
    if (socket) {
      socket.close(1000, "client stopped");
    }
  }

  isOpen(): boolean {
    return this.socket?.readyState === OPEN;
  }

  isReconnectPending(): boolean {
    return this.reconnectTimer !== null;
  }

  getAttempts(): number {
    return this.attempts;
  }

  /**
   * Send a JSON message. Returns false when the socket is not open.
   */
  send(message: unknown): boolean {
    const socket = this.socket;
    if (!socket || socket.readyState !== OPEN) {
      return false;
    }
    socket.send(JSON.stringify(message));
    return true;
  }

  private connect(): void {
    this.attempts++;
    let socket: SocketLike;
    try {
      socket = this.createSocket(this.options.url);
    } catch (err) {
      this.logger.warn("Failed to create socket", {
        error: err instanceof Error ? err.message : String(err),
      });
      this.scheduleReconnect();
      return;
    }
    this.socket = socket;

    socket.on("open", () => {
      if (this.socket !== socket) return;
      this.logger.info("Connected", { attempt: this.attempts });
      this.attempts = 0;
      this.handlers.onOpen?.();
    });

    socket.on("message", (data: unknown) => {
      if (this.socket !== socket) return;
      this.handlers.onMessage?.(rawDataToString(data));
    });

    socket.on("error", (err: Error) => {
      // A close event always follows
      this.logger.warn("Socket error", { error: err.message });
    });

    socket.on("close", (code: number, reason: unknown) => {
      if (this.socket !== socket) return;
      this.socket = null;
      const reasonText = rawDataToString(reason ?? "");
      this.logger.info("Disconnected", { code, reason: reasonText });
      this.handlers.onClose?.(code, reasonText);
      this.scheduleReconnect();
    });
  }

  private scheduleReconnect(): void {
    if (!this.running || this.reconnectTimer) {
      return;
    }
    this.logger.debug("Reconnect scheduled", { delayMs: this.options.reconnectDelayMs });
    this.reconnectTimer = setTimeout(() => {
      this.reconnectTimer = null;
      if (this.running) {
        this.connect();
      }
    }, this.options.reconnectDelayMs);
  }
}
