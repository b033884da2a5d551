/**
 * @module mask-history
 * Bounded undo stack of mask snapshots.
 *
 * A fixed-capacity ring buffer: pushing onto a full stack overwrites the
 * oldest snapshot, so only the newest `capacity` states are recoverable.
 * Snapshots are stored by reference; callers must treat them as immutable.
 */

import type { AlphaMask } from '@cutout-studio/types';
import { InvalidInputError } from '@cutout-studio/core';

/** Default number of snapshots retained. */
export const DEFAULT_HISTORY_CAPACITY = 15;

export class MaskHistory {
  readonly capacity: number;

  private slots: Array<AlphaMask | undefined>;
  /** Index of the oldest snapshot. */
  private head = 0;
  private count = 0;

  /**
   * @param capacity - Maximum snapshots kept. Must be an integer >= 1.
   * @throws {InvalidInputError} If the capacity is invalid.
   */
  constructor(capacity: number = DEFAULT_HISTORY_CAPACITY) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new InvalidInputError(`History capacity must be an integer >= 1, got ${capacity}`);
    }
    this.capacity = capacity;
    this.slots = new Array<AlphaMask | undefined>(capacity);
  }

  /** Number of snapshots currently held. */
  get depth(): number {
    return this.count;
  }

  get canUndo(): boolean {
    return this.count > 0;
  }

  /**
   * Push a snapshot.
   * @returns true if the oldest snapshot was evicted to make room.
   */
  push(mask: AlphaMask): boolean {
    if (this.count === this.capacity) {
      this.slots[this.head] = mask;
      this.head = (this.head + 1) % this.capacity;
      return true;
    }
    this.slots[(this.head + this.count) % this.capacity] = mask;
    this.count++;
    return false;
  }

  /** Remove and return the newest snapshot, or null when empty. */
  pop(): AlphaMask | null {
    if (this.count === 0) return null;
    const index = (this.head + this.count - 1) % this.capacity;
    const mask = this.slots[index] ?? null;
    this.slots[index] = undefined;
    this.count--;
    return mask;
  }

  /** The newest snapshot without removing it, or null when empty. */
  peek(): AlphaMask | null {
    if (this.count === 0) return null;
    return this.slots[(this.head + this.count - 1) % this.capacity] ?? null;
  }

  clear(): void {
    this.slots = new Array<AlphaMask | undefined>(this.capacity);
    this.head = 0;
    this.count = 0;
  }
}
