import { describeError } from './errors';
import { logger } from '../observability/logger';

const log = logger.child('events');

export type Listener<T> = (payload: T) => void;

export class EventBus<Events extends object> {
  private listeners: { [K in keyof Events]?: Set<Listener<Events[K]>> } = {};

  on<K extends keyof Events>(type: K, listener: Listener<Events[K]>): () => void {
    const set = this.listeners[type] ?? new Set<Listener<Events[K]>>();
    this.listeners[type] = set;
    set.add(listener);
    return () => {
      set.delete(listener);
    };
  }

  emit<K extends keyof Events>(type: K, payload: Events[K]) {
    const set = this.listeners[type];
    if (!set) return;
    for (const listener of [...set]) {
      try {
        listener(payload);
      } catch (err) {
        log.warn('event listener failed', {
          event: String(type),
          error: describeError(err)
        });
      }
    }
  }

  listenerCount(type: keyof Events): number {
    return this.listeners[type]?.size ?? 0;
  }
}
