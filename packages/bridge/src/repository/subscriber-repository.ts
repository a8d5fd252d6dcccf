/**
 * Subscriber Repository
 * Tracks the event feed connections (/ws/events) of initiator UIs.
 */

import type { BridgeEvent } from "@spooltag/shared";

export interface EventSubscriber {
  id: string;
  connectedAt: Date;
  send: (event: BridgeEvent) => void;
  close: (code?: number, reason?: string) => void;
}

export class SubscriberRepository {
  private subscribers = new Map<string, EventSubscriber>();

  add(subscriber: EventSubscriber): void {
    this.subscribers.set(subscriber.id, subscriber);
  }

  get(id: string): EventSubscriber | undefined {
    return this.subscribers.get(id);
  }

  remove(id: string): boolean {
    return this.subscribers.delete(id);
  }

  all(): EventSubscriber[] {
    return [...this.subscribers.values()];
  }

  count(): number {
    return this.subscribers.size;
  }

  clear(): void {
    this.subscribers.clear();
  }
}
