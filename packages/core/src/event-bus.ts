/**
 * @module event-bus
 * Type-safe pub/sub emitter that edit sessions report mask, preview and
 * history changes through, as plain data.
 *
 * @see {@link @cutout-studio/types#EventBus} for the interface contract
 * @see {@link @cutout-studio/types#EventMap} for the event catalogue
 */

import type { EventBus, EventCallback, EventMap } from '@cutout-studio/types';

type Callback = (...args: unknown[]) => void;

/**
 * Concrete implementation of {@link EventBus}.
 *
 * Listeners live in a `Map<event, Set<Callback>>`, so iteration order matches
 * subscription order. `once` subscriptions are stored as wrappers and the
 * original callback is remembered so `off` can still find them.
 */
export class EventBusImpl implements EventBus {
  private listeners = new Map<keyof EventMap, Set<Callback>>();
  private onceWrappers = new Map<Callback, Callback>();

  /** @inheritdoc */
  on<K extends keyof EventMap>(event: K, callback: EventCallback<K>): () => void {
    this.setFor(event).add(callback as Callback);
    return () => this.off(event, callback);
  }

  /** @inheritdoc */
  once<K extends keyof EventMap>(event: K, callback: EventCallback<K>): () => void {
    const original = callback as Callback;
    const wrapper: Callback = (...args) => {
      this.off(event, callback);
      original(...args);
    };
    this.onceWrappers.set(original, wrapper);
    this.setFor(event).add(wrapper);
    return () => this.off(event, callback);
  }

  /** @inheritdoc */
  off<K extends keyof EventMap>(event: K, callback: EventCallback<K>): void {
    const set = this.listeners.get(event);
    if (!set) return;

    const original = callback as Callback;
    const wrapper = this.onceWrappers.get(original);
    if (!set.delete(original) && wrapper) {
      set.delete(wrapper);
    }
    this.onceWrappers.delete(original);
    if (set.size === 0) {
      this.listeners.delete(event);
    }
  }

  /** @inheritdoc */
  emit<K extends keyof EventMap>(
    event: K,
    ...args: EventMap[K] extends undefined ? [] : [EventMap[K]]
  ): void {
    const set = this.listeners.get(event);
    if (!set) return;
    // Snapshot: listeners may unsubscribe while being called.
    for (const fn of [...set]) {
      fn(...args);
    }
  }

  /** Number of listeners currently subscribed to `event`. */
  listenerCount(event: keyof EventMap): number {
    return this.listeners.get(event)?.size ?? 0;
  }

  /** @inheritdoc */
  clear(): void {
    this.listeners.clear();
    this.onceWrappers.clear();
  }

  private setFor(event: keyof EventMap): Set<Callback> {
    let set = this.listeners.get(event);
    if (!set) {
      set = new Set();
      this.listeners.set(event, set);
    }
    return set;
  }
}
