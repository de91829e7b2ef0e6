import { Logger } from './Logger';

const log = new Logger('EventEmitter');

type EventCallback<T = unknown> = (data: T) => void;

export interface EventMap {
  [event: string]: unknown;
}

/**
 * Typed synchronous event emitter.
 *
 * Listeners run in subscription order. A listener that throws is logged and
 * skipped so the remaining listeners (and the emitter's caller) keep running.
 */
export class EventEmitter<Events extends EventMap = EventMap> {
  private listeners = new Map<keyof Events, Set<EventCallback>>();

  on<K extends keyof Events>(event: K, callback: EventCallback<Events[K]>): () => void {
    let set = this.listeners.get(event);
    if (!set) {
      set = new Set();
      this.listeners.set(event, set);
    }
    set.add(callback as EventCallback);

    return () => this.off(event, callback);
  }

  off<K extends keyof Events>(event: K, callback: EventCallback<Events[K]>): void {
    this.listeners.get(event)?.delete(callback as EventCallback);
  }

  emit<K extends keyof Events>(event: K, data: Events[K]): void {
    const set = this.listeners.get(event);
    if (!set) return;
    // Snapshot so listeners may unsubscribe while being notified
    for (const callback of [...set]) {
      try {
        callback(data);
      } catch (err) {
        log.error(`Listener for "${String(event)}" threw`, err);
      }
    }
  }

  once<K extends keyof Events>(event: K, callback: EventCallback<Events[K]>): () => void {
    const wrapper: EventCallback<Events[K]> = (data) => {
      this.off(event, wrapper);
      callback(data);
    };
    return this.on(event, wrapper);
  }

  listenerCount(event: keyof Events): number {
    return this.listeners.get(event)?.size ?? 0;
  }

  removeAllListeners(event?: keyof Events): void {
    if (event) {
      this.listeners.delete(event);
    } else {
      this.listeners.clear();
    }
  }
}
