import { describe, expect, it, vi } from 'vitest';
import { EventBusImpl } from './event-bus';

describe('EventBusImpl', () => {
  // ── on / emit ────────────────────────────────────────────────────────

  it('calls listener when event is emitted with payload', () => {
    const bus = new EventBusImpl();
    const cb = vi.fn();

    bus.on('history:pushed', cb);
    bus.emit('history:pushed', { sessionId: 's1', depth: 2 });

    expect(cb).toHaveBeenCalledOnce();
    expect(cb).toHaveBeenCalledWith({ sessionId: 's1', depth: 2 });
  });

  it('calls listeners in subscription order', () => {
    const bus = new EventBusImpl();
    const calls: string[] = [];

    bus.on('session:cancelled', () => calls.push('first'));
    bus.on('session:cancelled', () => calls.push('second'));
    bus.emit('session:cancelled', { sessionId: 's1', layerId: 'l1' });

    expect(calls).toEqual(['first', 'second']);
  });

  it('does not fire listeners of other events', () => {
    const bus = new EventBusImpl();
    const cb = vi.fn();

    bus.on('session:committed', cb);
    bus.emit('session:cancelled', { sessionId: 's1', layerId: 'l1' });

    expect(cb).not.toHaveBeenCalled();
  });

  // ── off ──────────────────────────────────────────────────────────────

  it('removes a listener via off()', () => {
    const bus = new EventBusImpl();
    const cb = vi.fn();

    bus.on('history:evicted', cb);
    bus.off('history:evicted', cb);
    bus.emit('history:evicted', { sessionId: 's1' });

    expect(cb).not.toHaveBeenCalled();
    expect(bus.listenerCount('history:evicted')).toBe(0);
  });

  it('does not throw when removing a listener that was never added', () => {
    const bus = new EventBusImpl();
    expect(() => bus.off('history:evicted', vi.fn())).not.toThrow();
  });

  it('returns an unsubscribe function from on()', () => {
    const bus = new EventBusImpl();
    const cb = vi.fn();

    const unsubscribe = bus.on('history:evicted', cb);
    unsubscribe();
    bus.emit('history:evicted', { sessionId: 's1' });

    expect(cb).not.toHaveBeenCalled();
  });

  // ── once ─────────────────────────────────────────────────────────────

  it('fires a once() listener only once', () => {
    const bus = new EventBusImpl();
    const cb = vi.fn();

    bus.once('history:undone', cb);
    bus.emit('history:undone', { sessionId: 's1', depth: 1 });
    bus.emit('history:undone', { sessionId: 's1', depth: 0 });

    expect(cb).toHaveBeenCalledOnce();
    expect(cb).toHaveBeenCalledWith({ sessionId: 's1', depth: 1 });
    expect(bus.listenerCount('history:undone')).toBe(0);
  });

  it('can remove a once() listener before it fires via off()', () => {
    const bus = new EventBusImpl();
    const cb = vi.fn();

    bus.once('history:evicted', cb);
    bus.off('history:evicted', cb);
    bus.emit('history:evicted', { sessionId: 's1' });

    expect(cb).not.toHaveBeenCalled();
    expect(bus.listenerCount('history:evicted')).toBe(0);
  });

  // ── clear ────────────────────────────────────────────────────────────

  it('removes all listeners via clear()', () => {
    const bus = new EventBusImpl();
    const cb1 = vi.fn();
    const cb2 = vi.fn();

    bus.on('history:evicted', cb1);
    bus.on('session:committed', cb2);
    bus.clear();
    bus.emit('history:evicted', { sessionId: 's1' });
    bus.emit('session:committed', { sessionId: 's1', layerId: 'l1' });

    expect(cb1).not.toHaveBeenCalled();
    expect(cb2).not.toHaveBeenCalled();
  });

  it('does not break when a listener removes itself during emission', () => {
    const bus = new EventBusImpl();
    const later = vi.fn();
    const selfRemoving = (): void => {
      bus.off('history:evicted', selfRemoving);
    };

    bus.on('history:evicted', selfRemoving);
    bus.on('history:evicted', later);
    bus.emit('history:evicted', { sessionId: 's1' });

    expect(later).toHaveBeenCalledOnce();
    expect(bus.listenerCount('history:evicted')).toBe(1);
  });
});
