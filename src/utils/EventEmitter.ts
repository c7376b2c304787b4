import { Logger } from './Logger';

const log = new Logger('EventEmitter');

type EventCallback<T = unknown> = (data: T) => void;

export interface EventMap {
  [event: string]: unknown;
}

/**
 * Typed synchronous event emitter.
 *
 * Listener exceptions are caught and logged so that one faulty subscriber
 * cannot interrupt delivery to the others or unwind the emitting handler.
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
    const set = this.listeners.get(event);
    if (!set) return;
    set.delete(callback as EventCallback);
    if (set.size === 0) this.listeners.delete(event);
  }

  emit<K extends keyof Events>(event: K, data: Events[K]): void {
    const set = this.listeners.get(event);
    if (!set) return;
    // Snapshot so listeners may unsubscribe while being notified
    for (const callback of [...set]) {
      try {
        callback(data);
      } catch (err) {
        log.error(`Error in event listener for "${String(event)}":`, err);
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
    if (event !== undefined) {
      this.listeners.delete(event);
    } else {
      this.listeners.clear();
    }
  }
}
