import type { Logger } from "./logger.js";

export type EventListener<T> = (event: T) => void;

type ListenerMap<E> = { [K in keyof E]?: Set<EventListener<E[K]>> };

/**
 * Minimal typed event emitter keyed by an event map
 * (`{ tagDetected: { uid: string }; ... }`). A throwing listener is logged
 * and does not stop delivery to the others.
 */
export class TypedEmitter<E> {
  private readonly listeners: ListenerMap<E> = {};

  constructor(private readonly emitterLogger?: Logger) {}

  /** Returns an unsubscribe function. */
  on<K extends keyof E>(type: K, listener: EventListener<E[K]>): () => void {
    let set = this.listeners[type];
    if (!set) {
      set = new Set();
      this.listeners[type] = set;
    }
    set.add(listener);
    return () => this.off(type, listener);
  }

  off<K extends keyof E>(type: K, listener: EventListener<E[K]>): void {
    this.listeners[type]?.delete(listener);
  }

  listenerCount<K extends keyof E>(type: K): number {
    return this.listeners[type]?.size ?? 0;
  }

  protected emit<K extends keyof E>(type: K, event: E[K]): void {
    const set = this.listeners[type];
    if (!set) return;
    for (const listener of [...set]) {
      try {
        listener(event);
      } catch (err) {
        this.emitterLogger?.warn("Event listener failed", {
          event: String(type),
          error: err instanceof Error ? err.message : String(err),
        });
      }
    }
  }
}
