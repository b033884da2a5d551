/**
 * @module preview-scheduler
 * Stale-result suppression for background recomposites.
 *
 * Every request takes the next generation number. A completion is only
 * reported as applied if no newer request (or {@link PreviewScheduler.invalidate})
 * happened while it ran.
 */

import { isCutoutError, runTask, toError } from '@cutout-studio/core';

/** Outcome of a scheduled preview computation. */
export type PreviewResult<T> =
  | { status: 'applied'; generation: number; value: T }
  | { status: 'stale'; generation: number }
  | { status: 'cancelled'; generation: number }
  | { status: 'failed'; generation: number; error: Error };

export class PreviewScheduler {
  private latest = 0;

  /** The most recently issued generation. */
  get generation(): number {
    return this.latest;
  }

  /**
   * Issue a new generation without scheduling work, making every in-flight
   * request stale.
   * @returns The new generation.
   */
  invalidate(): number {
    return ++this.latest;
  }

  /**
   * Run `work` as a background task tagged with a fresh generation.
   * Never rejects for cancellation or work errors; those resolve as
   * `cancelled` and `failed`. A superseded request resolves as `stale`,
   * whatever its work produced.
   */
  async schedule<T>(work: () => T, signal?: AbortSignal): Promise<PreviewResult<T>> {
    const generation = this.invalidate();
    try {
      const value = await runTask(work, signal);
      if (generation !== this.latest) {
        return { status: 'stale', generation };
      }
      return { status: 'applied', generation, value };
    } catch (error) {
      if (isCutoutError(error, 'Cancelled')) {
        return { status: 'cancelled', generation };
      }
      if (generation !== this.latest) {
        return { status: 'stale', generation };
      }
      return { status: 'failed', generation, error: toError(error) };
    }
  }
}
