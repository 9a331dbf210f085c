import type { EventHandler, IEventBus } from '@selfwright/core';
import { createLogger, errorMessage } from '@selfwright/core';

const log = createLogger('EventBus');

/**
 * Synchronous in-process event bus. A throwing handler is logged and does
 * not prevent the remaining handlers from running.
 */
export class EventBus implements IEventBus {
  private readonly handlers = new Map<string, Set<EventHandler>>();

  emit(event: string, payload: unknown): void {
    const set = this.handlers.get(event);
    if (!set) return;

    // Copy so handlers may unsubscribe while being dispatched
    for (const handler of [...set]) {
      try {
        handler(payload);
      } catch (error) {
        log.error(`Handler for "${event}" threw: ${errorMessage(error)}`);
      }
    }
  }

  on(event: string, handler: EventHandler): () => void {
    let set = this.handlers.get(event);
    if (!set) {
      set = new Set();
      this.handlers.set(event, set);
    }
    set.add(handler);
    return () => this.off(event, handler);
  }

  once(event: string, handler: EventHandler): () => void {
    const wrapper: EventHandler = (payload) => {
      unsubscribe();
      handler(payload);
    };
    const unsubscribe = this.on(event, wrapper);
    return unsubscribe;
  }

  removeAllListeners(event?: string): void {
    if (event === undefined) {
      this.handlers.clear();
    } else {
      this.handlers.delete(event);
    }
  }

  listenerCount(event: string): number {
    return this.handlers.get(event)?.size ?? 0;
  }

  private off(event: string, handler: EventHandler): void {
    const set = this.handlers.get(event);
    if (!set) return;
    set.delete(handler);
    if (set.size === 0) this.handlers.delete(event);
  }
}
