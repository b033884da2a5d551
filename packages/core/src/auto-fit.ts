/**
 * @module auto-fit
 * Initial scale for a subject placed on a canvas.
 *
 * The subject is sized so its height covers a fraction of the canvas height.
 * If that makes it wider than the allowed fraction of the canvas width, the
 * width wins. The result is clamped so tiny subjects are not blown up past
 * natural size and huge ones do not vanish.
 */

import type { Composition, Layer, Size } from '@cutout-studio/types';
import { InvalidInputError } from './errors';
import { createLogger } from './logger';

const log = createLogger('auto-fit');

export interface AutoFitOptions {
  /** Target subject height as a fraction of the canvas height. */
  heightFraction: number;
  /** Maximum subject width as a fraction of the canvas width. */
  widthFraction: number;
  minScale: number;
  maxScale: number;
}

export const DEFAULT_AUTO_FIT_OPTIONS: Readonly<AutoFitOptions> = Object.freeze({
  heightFraction: 0.5,
  widthFraction: 0.85,
  minScale: 0.3,
  maxScale: 1.0,
});

/** Smallest scale change that {@link refitSubjectLayers} applies. */
export const DEFAULT_REFIT_THRESHOLD = 0.05;

function resolveOptions(options: Partial<AutoFitOptions>): AutoFitOptions {
  const merged = { ...DEFAULT_AUTO_FIT_OPTIONS, ...options };
  const { heightFraction, widthFraction, minScale, maxScale } = merged;
  if (!(heightFraction > 0) || !(widthFraction > 0) || !(minScale > 0) || !(maxScale >= minScale)) {
    throw new InvalidInputError(
      `Invalid auto-fit options: heightFraction=${heightFraction}, widthFraction=${widthFraction}, ` +
        `minScale=${minScale}, maxScale=${maxScale}`,
    );
  }
  return merged;
}

function isUsable(size: Size): boolean {
  return Number.isFinite(size.width) && Number.isFinite(size.height) && size.width > 0 && size.height > 0;
}

/**
 * Compute the scale at which a subject should first appear on a canvas.
 *
 * @returns A value in `[minScale, maxScale]`, or 1.0 when either size is degenerate.
 * @throws {InvalidInputError} If the options are inconsistent.
 *
 * @example
 * ```ts
 * computeScale({ width: 800, height: 600 }, { width: 3584, height: 2016 }); // 1.0
 * ```
 */
export function computeScale(subjectSize: Size, canvasSize: Size, options: Partial<AutoFitOptions> = {}): number {
  const opts = resolveOptions(options);
  if (!isUsable(subjectSize) || !isUsable(canvasSize)) {
    return 1.0;
  }

  let scale = (canvasSize.height * opts.heightFraction) / subjectSize.height;
  const maxWidth = canvasSize.width * opts.widthFraction;
  if (subjectSize.width * scale > maxWidth) {
    scale = maxWidth / subjectSize.width;
  }
  return Math.min(opts.maxScale, Math.max(opts.minScale, scale));
}

/**
 * Centers a layer on the canvas at its auto-fit scale. Rotation is kept.
 * Locked layers are left alone.
 *
 * @returns The scale applied, or null when the layer is locked.
 */
export function fitSubjectLayer(
  layer: Layer,
  canvasSize: Size,
  options: Partial<AutoFitOptions> = {},
): number | null {
  if (layer.locked) return null;
  const scale = computeScale({ width: layer.pixels.width, height: layer.pixels.height }, canvasSize, options);
  layer.transform = { ...layer.transform, offsetX: 0, offsetY: 0, scale };
  return scale;
}

export interface RefitOptions extends Partial<AutoFitOptions> {
  /** Minimum absolute scale difference before a layer is updated. */
  threshold?: number;
}

/**
 * Recomputes the scale of every unlocked subject layer, e.g. after the canvas
 * size changed. Position and rotation are kept; a layer is only touched when
 * its scale moves by more than `threshold`.
 *
 * @returns The number of layers updated.
 */
export function refitSubjectLayers(composition: Composition, options: RefitOptions = {}): number {
  const { threshold = DEFAULT_REFIT_THRESHOLD, ...fit } = options;
  let updated = 0;
  for (const layer of composition.layers) {
    if (layer.kind !== 'subject' || layer.locked) continue;
    const size = { width: layer.pixels.width, height: layer.pixels.height };
    const scale = computeScale(size, composition.canvasSize, fit);
    if (Math.abs(scale - layer.transform.scale) > threshold) {
      log.debug('Refit subject layer', { id: layer.id, from: layer.transform.scale, to: scale });
      layer.transform = { ...layer.transform, scale };
      updated++;
    }
  }
  if (updated > 0) {
    composition.updatedAt = Math.max(Date.now(), composition.updatedAt);
  }
  return updated;
}
