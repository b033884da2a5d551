/**
 * @module task
 * Cancellable background tasks for CPU-heavy stages.
 *
 * Work is deferred to a later turn of the event loop so the caller's
 * interactive code keeps running, and the signal is checked on both sides of
 * the work. A cancelled task never publishes a partial result.
 */

import { setImmediate as nextTurn } from 'node:timers/promises';
import { TaskCancelledError } from './errors';

/** Throw {@link TaskCancelledError} if the signal has fired. */
export function throwIfCancelled(signal?: AbortSignal): void {
  if (signal?.aborted) {
    throw new TaskCancelledError(undefined, { cause: signal.reason });
  }
}

/**
 * Run synchronous work as a cancellable task.
 *
 * @param work - The computation. Must not mutate caller-visible state.
 * @param signal - Aborts the task before or after the work runs.
 * @returns The work's result.
 * @throws {TaskCancelledError} If the signal fired.
 */
export async function runTask<T>(work: () => T, signal?: AbortSignal): Promise<T> {
  throwIfCancelled(signal);
  await nextTurn();
  throwIfCancelled(signal);
  const result = work();
  throwIfCancelled(signal);
  return result;
}
