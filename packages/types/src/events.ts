/**
 * @module events
 * Type-safe event bus definitions for edit session notifications.
 */

import type { FilterKind } from './filter';

/** Map of event names to their payload types. */
export interface EventMap {
  /** Fired when a new image replaces the session contents. */
  'image:loaded': { width: number; height: number };
  /** Fired after a filter result is committed. */
  'filter:applied': { kind: FilterKind };
  /** Fired after an undo step. */
  'history:undone': { undoDepth: number; redoDepth: number };
  /** Fired after a redo step. */
  'history:redone': { undoDepth: number; redoDepth: number };
  /** Fired when the current image is restored from the original. */
  'image:reset': undefined;
  /** Fired when the presentation layer reports a successful save. */
  'image:saved': undefined;
  /** Fired when a histogram could not be computed for the current image. */
  'histogram:unavailable': { reason: string };
}

/** Callback function type for event listeners. */
export type EventCallback<K extends keyof EventMap> = EventMap[K] extends undefined
  ? () => void
  : (payload: EventMap[K]) => void;

/** Type-safe event bus for pub/sub communication. */
export interface EventBus {
  /** Subscribe to an event. Returns an unsubscribe function. */
  on<K extends keyof EventMap>(event: K, callback: EventCallback<K>): () => void;
  /** Subscribe to an event for a single emission. */
  once<K extends keyof EventMap>(event: K, callback: EventCallback<K>): () => void;
  /** Unsubscribe a specific callback from an event. */
  off<K extends keyof EventMap>(event: K, callback: EventCallback<K>): void;
  /** Emit an event with an optional payload. */
  emit<K extends keyof EventMap>(
    event: K,
    ...args: EventMap[K] extends undefined ? [] : [EventMap[K]]
  ): void;
  /** Remove all listeners for all events. */
  clear(): void;
}
