/**
 * @module event-bus
 * Type-safe pub/sub emitter for session notifications.
 *
 * @see {@link @raster-edit/types#EventBus} for the interface contract
 * @see {@link @raster-edit/types#EventMap} for the event catalogue
 */

import type { EventBus, EventCallback, EventMap } from '@raster-edit/types';

type EventName = keyof EventMap;

/** Generic callback type used internally by the event bus. */
type Callback = (...args: unknown[]) => void;

/** Listener entry. `original` is the caller's callback, used by `off`. */
interface Listener {
  original: unknown;
  invoke: (...args: unknown[]) => void;
}

/**
 * Concrete implementation of {@link EventBus}.
 *
 * Listeners are kept per event in subscription order. `once` listeners
 * remember the caller's callback so `off` can remove them before they fire.
 */
export class EventBusImpl implements EventBus {
  private listeners = new Map<EventName, Listener[]>();

  /** @inheritdoc */
  on<K extends EventName>(event: K, callback: EventCallback<K>): () => void {
    this.add(event, {
      original: callback,
      invoke: (...args) => (callback as Callback)(...args),
    });
    return () => this.off(event, callback);
  }

  /** @inheritdoc */
  once<K extends EventName>(event: K, callback: EventCallback<K>): () => void {
    this.add(event, {
      original: callback,
      invoke: (...args) => {
        this.off(event, callback);
        (callback as Callback)(...args);
      },
    });
    return () => this.off(event, callback);
  }

  /** @inheritdoc */
  off<K extends EventName>(event: K, callback: EventCallback<K>): void {
    const list = this.listeners.get(event);
    if (!list) return;
    const index = list.findIndex((l) => l.original === callback);
    if (index === -1) return;
    list.splice(index, 1);
    if (list.length === 0) {
      this.listeners.delete(event);
    }
  }

  /** @inheritdoc */
  emit<K extends EventName>(
    event: K,
    ...args: EventMap[K] extends undefined ? [] : [EventMap[K]]
  ): void {
    const list = this.listeners.get(event);
    if (!list) return;
    // Snapshot so listeners may unsubscribe while we iterate.
    for (const listener of [...list]) {
      listener.invoke(...args);
    }
  }

  /** @inheritdoc */
  clear(): void {
    this.listeners.clear();
  }

  private add(event: EventName, listener: Listener): void {
    const list = this.listeners.get(event);
    if (list) {
      list.push(listener);
    } else {
      this.listeners.set(event, [listener]);
    }
  }
}
