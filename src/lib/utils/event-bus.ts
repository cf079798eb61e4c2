import { createLogger } from './logger';

type EventCallback<T> = (payload: T) => void;

const log = createLogger('EventBus');

export class EventBus<Events extends object> {
  private listeners: { [K in keyof Events]?: Set<EventCallback<Events[K]>> } = {};

  on<K extends keyof Events>(event: K, callback: EventCallback<Events[K]>): () => void {
    const callbacks = this.listeners[event] ?? new Set<EventCallback<Events[K]>>();
    callbacks.add(callback);
    this.listeners[event] = callbacks;

    return () => this.off(event, callback);
  }

  off<K extends keyof Events>(event: K, callback: EventCallback<Events[K]>): void {
    this.listeners[event]?.delete(callback);
  }

  /**
   * Listeners run after the write has committed, so a failing listener is
   * logged and does not reach the caller of the mutation.
   */
  emit<K extends keyof Events>(event: K, payload: Events[K]): void {
    const callbacks = this.listeners[event];
    if (!callbacks) return;

    for (const callback of callbacks) {
      try {
        callback(payload);
      } catch (err) {
        log.error(`Listener for "${String(event)}" failed`, err);
      }
    }
  }

  listenerCount<K extends keyof Events>(event: K): number {
    return this.listeners[event]?.size ?? 0;
  }

  clear(): void {
    this.listeners = {};
  }
}
