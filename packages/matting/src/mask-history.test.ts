import { describe, expect, it } from 'vitest';
import { InvalidInputError, createMask } from '@cutout-studio/core';
import { DEFAULT_HISTORY_CAPACITY, MaskHistory } from './mask-history';

const snapshot = (value: number) => createMask({ width: 1, height: 1 }, value);

describe('MaskHistory', () => {
  it('defaults to 15 entries', () => {
    expect(DEFAULT_HISTORY_CAPACITY).toBe(15);
    expect(new MaskHistory().capacity).toBe(15);
  });

  it('rejects capacities below one', () => {
    expect(() => new MaskHistory(0)).toThrow(InvalidInputError);
    expect(() => new MaskHistory(2.5)).toThrow(InvalidInputError);
  });

  it('pops in last-in, first-out order', () => {
    const history = new MaskHistory(5);
    const [a, b, c] = [snapshot(0.1), snapshot(0.2), snapshot(0.3)];
    history.push(a);
    history.push(b);
    history.push(c);
    expect(history.depth).toBe(3);
    expect(history.peek()).toBe(c);
    expect(history.pop()).toBe(c);
    expect(history.pop()).toBe(b);
    expect(history.pop()).toBe(a);
    expect(history.pop()).toBeNull();
    expect(history.canUndo).toBe(false);
  });

  it('evicts the oldest entry when full', () => {
    const history = new MaskHistory(3);
    const masks = [0, 1, 2, 3, 4].map(snapshot);
    const evictions = masks.map((m) => history.push(m));

    expect(evictions).toEqual([false, false, false, true, true]);
    expect(history.depth).toBe(3);
    expect(history.pop()).toBe(masks[4]);
    expect(history.pop()).toBe(masks[3]);
    expect(history.pop()).toBe(masks[2]);
    expect(history.pop()).toBeNull();
  });

  it('keeps working after wrapping around', () => {
    const history = new MaskHistory(2);
    const masks = [0, 1, 2].map(snapshot);
    masks.forEach((m) => history.push(m));
    expect(history.pop()).toBe(masks[2]);
    history.push(masks[0]);
    expect(history.pop()).toBe(masks[0]);
    expect(history.pop()).toBe(masks[1]);
  });

  it('clears all entries', () => {
    const history = new MaskHistory(2);
    history.push(snapshot(1));
    history.clear();
    expect(history.depth).toBe(0);
    expect(history.peek()).toBeNull();
  });
});
