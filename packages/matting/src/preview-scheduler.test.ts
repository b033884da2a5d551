import { describe, expect, it } from 'vitest';
import { PreviewScheduler } from './preview-scheduler';

describe('PreviewScheduler', () => {
  it('applies the result of the latest request', async () => {
    const scheduler = new PreviewScheduler();
    await expect(scheduler.schedule(() => 'preview')).resolves.toEqual({
      status: 'applied',
      generation: 1,
      value: 'preview',
    });
  });

  it('marks superseded requests as stale', async () => {
    const scheduler = new PreviewScheduler();
    const first = scheduler.schedule(() => 'old');
    const second = scheduler.schedule(() => 'new');
    expect(await first).toEqual({ status: 'stale', generation: 1 });
    expect(await second).toEqual({ status: 'applied', generation: 2, value: 'new' });
  });

  it('marks in-flight requests stale after invalidate()', async () => {
    const scheduler = new PreviewScheduler();
    const pending = scheduler.schedule(() => 1);
    expect(scheduler.invalidate()).toBe(2);
    expect(await pending).toEqual({ status: 'stale', generation: 1 });
    expect(scheduler.generation).toBe(2);
  });

  it('reports cancellation', async () => {
    const scheduler = new PreviewScheduler();
    const controller = new AbortController();
    const pending = scheduler.schedule(() => 1, controller.signal);
    controller.abort();
    expect(await pending).toEqual({ status: 'cancelled', generation: 1 });
  });

  it('reports failures of the latest request', async () => {
    const scheduler = new PreviewScheduler();
    const result = await scheduler.schedule(() => {
      throw new Error('resource exhausted');
    });
    expect(result.status).toBe('failed');
    expect(result.status === 'failed' && result.error.message).toBe('resource exhausted');
  });

  it('reports superseded failures as stale', async () => {
    const scheduler = new PreviewScheduler();
    const pending = scheduler.schedule(() => {
      throw new Error('resource exhausted');
    });
    scheduler.invalidate();
    expect(await pending).toEqual({ status: 'stale', generation: 1 });
  });
});
