import { describe, expect, it } from 'vitest';
import {
  CompositingFailedError,
  CutoutError,
  InvalidInputError,
  MultipleSubjectsError,
  TaskCancelledError,
  isCutoutError,
  toError,
} from './errors';

describe('errors', () => {
  it('sets name and kind on each subclass', () => {
    const err = new InvalidInputError('bad mask');
    expect(err).toBeInstanceOf(CutoutError);
    expect(err).toBeInstanceOf(Error);
    expect(err.name).toBe('InvalidInputError');
    expect(err.kind).toBe('InvalidInput');
    expect(err.message).toBe('bad mask');
  });

  it('keeps the original error as cause', () => {
    const root = new RangeError('offset out of range');
    const err = new CompositingFailedError('blend failed', { cause: root });
    expect(err.cause).toBe(root);
  });

  it('uses a default message for cancellation', () => {
    expect(new TaskCancelledError().message).toBe('Task was cancelled');
  });

  it('records the instance count on MultipleSubjectsError', () => {
    const err = new MultipleSubjectsError(3);
    expect(err.instanceCount).toBe(3);
    expect(err.kind).toBe('MultipleSubjects');
  });

  describe('isCutoutError', () => {
    it('narrows by kind', () => {
      const err: unknown = new TaskCancelledError();
      expect(isCutoutError(err)).toBe(true);
      expect(isCutoutError(err, 'Cancelled')).toBe(true);
      expect(isCutoutError(err, 'InvalidInput')).toBe(false);
    });

    it('rejects plain errors and non-errors', () => {
      expect(isCutoutError(new Error('x'))).toBe(false);
      expect(isCutoutError('InvalidInput')).toBe(false);
    });
  });

  it('toError wraps non-error values', () => {
    const existing = new Error('x');
    expect(toError(existing)).toBe(existing);
    expect(toError('boom').message).toBe('boom');
  });
});
