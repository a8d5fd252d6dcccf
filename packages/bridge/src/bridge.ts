/**
 * Bridge - Main Application
 * Owns the BridgeSession and fans its events out to event subscribers.
 * Can be used as a library or started as a standalone server.
 */

import { createLogger, toError, type BridgeEvent, type BridgeStatusEvent, type Logger } from "@spooltag/shared";

import { DEFAULT_BRIDGE_CONFIG, type BridgeConfig } from "./config.js";
import { SubscriberRepository, type EventSubscriber } from "./repository/subscriber-repository.js";
import { BridgeSession, type BridgeStatus } from "./session/bridge-session.js";

export function toStatusEvent(status: BridgeStatus): BridgeStatusEvent {
  return {
    type: "bridge_status",
    connected: status.connected,
    device: status.device,
    state: status.state,
    pending_request_id: status.pendingRequestId,
    last_uid: status.lastUid,
  };
}

export class Bridge {
  public readonly session: BridgeSession;
  private readonly subscribers = new SubscriberRepository();
  private readonly logger: Logger;
  private unsubscribers: (() => void)[] = [];
  private running = false;

  constructor(readonly config: BridgeConfig = DEFAULT_BRIDGE_CONFIG) {
    this.logger = createLogger("bridge", config.logLevel);
    this.session = new BridgeSession({
      requestTimeoutMs: config.requestTimeoutMs,
      logger: createLogger("bridge:session", config.logLevel),
    });
  }

  start(): void {
    if (this.running) {
      throw new Error("Bridge already running");
    }
    this.unsubscribers = [
      this.session.on("status", (status) => this.broadcast(toStatusEvent(status))),
      this.session.on("tagDetected", ({ uid }) => this.broadcast({ type: "tag_detected", uid })),
    ];
    this.running = true;
  }

  stop(): void {
    if (!this.running) {
      return;
    }
    for (const unsubscribe of this.unsubscribers) {
      unsubscribe();
    }
    this.unsubscribers = [];
    this.session.shutdown();
    for (const subscriber of this.subscribers.all()) {
      subscriber.close(1001, "Bridge shutting down");
    }
    this.subscribers.clear();
    this.running = false;
  }

  isRunning(): boolean {
    return this.running;
  }

  /**
   * Register an event feed connection and send it the current status.
   */
  addSubscriber(subscriber: EventSubscriber): void {
    this.subscribers.add(subscriber);
    this.deliver(subscriber, toStatusEvent(this.session.getStatus()));
  }

  removeSubscriber(id: string): void {
    this.subscribers.remove(id);
  }

  getStats(): BridgeStatus & { running: boolean; subscribers: number } {
    return {
      running: this.running,
      subscribers: this.subscribers.count(),
      ...this.session.getStatus(),
    };
  }

  private broadcast(event: BridgeEvent): void {
    for (const subscriber of this.subscribers.all()) {
      this.deliver(subscriber, event);
    }
  }

  private deliver(subscriber: EventSubscriber, event: BridgeEvent): void {
    try {
      subscriber.send(event);
    } catch (err) {
      this.logger.warn("Dropping event subscriber", {
        subscriberId: subscriber.id,
        error: toError(err).message,
      });
      this.subscribers.remove(subscriber.id);
    }
  }
}
