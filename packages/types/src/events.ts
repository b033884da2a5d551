/**
 * @module events
 * Type-safe event definitions for mask edit sessions.
 */

import type { AlphaMask } from './mask';
import type { CutoutImage } from './raster';

/** Map of event names to their payload types. */
export interface EventMap {
  /** Fired after a paint, lasso, undo or cancel changed the mask. */
  'mask:changed': { sessionId: string; mask: AlphaMask };
  /** Fired when a new preview replaced the previous one. */
  'preview:updated': { sessionId: string; preview: CutoutImage; generation: number };
  /** Fired when a recomposite failed; the previous preview stays current. */
  'preview:failed': { sessionId: string; error: Error };
  /** Fired when a snapshot is pushed to the mask history. */
  'history:pushed': { sessionId: string; depth: number };
  /** Fired when undo restored a snapshot. */
  'history:undone': { sessionId: string; depth: number };
  /** Fired when a full history dropped its oldest snapshot. */
  'history:evicted': { sessionId: string };
  /** Fired when a session wrote its result into a layer. */
  'session:committed': { sessionId: string; layerId: string };
  /** Fired when a session was discarded. */
  'session:cancelled': { sessionId: string; layerId: string };
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
