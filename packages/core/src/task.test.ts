import { describe, expect, it, vi } from 'vitest';
import { TaskCancelledError } from './errors';
import { runTask, throwIfCancelled } from './task';

describe('runTask', () => {
  it('resolves with the result of the work', async () => {
    await expect(runTask(() => 42)).resolves.toBe(42);
  });

  it('does not run the work synchronously', async () => {
    const work = vi.fn(() => 'done');
    const pending = runTask(work);
    expect(work).not.toHaveBeenCalled();
    await pending;
    expect(work).toHaveBeenCalledOnce();
  });

  it('rejects without running when the signal already fired', async () => {
    const controller = new AbortController();
    controller.abort();
    const work = vi.fn(() => 1);
    await expect(runTask(work, controller.signal)).rejects.toBeInstanceOf(TaskCancelledError);
    expect(work).not.toHaveBeenCalled();
  });

  it('rejects when cancelled before the deferred work starts', async () => {
    const controller = new AbortController();
    const work = vi.fn(() => 1);
    const pending = runTask(work, controller.signal);
    controller.abort();
    await expect(pending).rejects.toBeInstanceOf(TaskCancelledError);
    expect(work).not.toHaveBeenCalled();
  });

  it('rejects when cancelled during the work', async () => {
    const controller = new AbortController();
    const pending = runTask(() => {
      controller.abort();
      return 1;
    }, controller.signal);
    await expect(pending).rejects.toBeInstanceOf(TaskCancelledError);
  });

  it('propagates errors from the work', async () => {
    await expect(
      runTask(() => {
        throw new RangeError('bad');
      }),
    ).rejects.toThrow('bad');
  });
});

describe('throwIfCancelled', () => {
  it('passes when there is no signal', () => {
    expect(() => throwIfCancelled()).not.toThrow();
  });

  it('carries the abort reason as cause', () => {
    const controller = new AbortController();
    controller.abort('user');
    try {
      throwIfCancelled(controller.signal);
      expect.unreachable();
    } catch (e) {
      expect(e).toBeInstanceOf(TaskCancelledError);
      expect(e instanceof TaskCancelledError && e.cause).toBe('user');
    }
  });
});
