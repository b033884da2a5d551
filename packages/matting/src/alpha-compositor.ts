/**
 * @module alpha-compositor
 * Applies an alpha mask to a source image to produce a transparent cut-out.
 *
 * The mask is resampled to the image size with Lanczos-3, the image alpha is
 * multiplied by it (RGB is untouched), and a mild unsharp mask restores the
 * edge crispness lost to the refiner's blur.
 */

import type { AlphaMask, CutoutImage, SourceImage } from '@cutout-studio/types';
import {
  CompositingFailedError,
  InvalidInputError,
  isCutoutError,
  isValidMask,
  isValidRaster,
  resamplePlane,
  runTask,
  unsharpMask,
} from '@cutout-studio/core';

/** Tunables for {@link composite}. */
export interface CompositeOptions {
  /** Gaussian sigma of the unsharp mask. 0 disables sharpening. */
  sharpenRadius: number;
  /** Unsharp mask strength. 0 disables sharpening. */
  sharpenAmount: number;
}

export const DEFAULT_COMPOSITE_OPTIONS: Readonly<CompositeOptions> = Object.freeze({
  sharpenRadius: 0.6,
  sharpenAmount: 0.4,
});

function resolveOptions(options: Partial<CompositeOptions>): CompositeOptions {
  const merged = { ...DEFAULT_COMPOSITE_OPTIONS, ...options };
  if (!Number.isFinite(merged.sharpenRadius) || merged.sharpenRadius < 0) {
    throw new InvalidInputError(`sharpenRadius must be a finite number >= 0, got ${merged.sharpenRadius}`);
  }
  if (!Number.isFinite(merged.sharpenAmount) || merged.sharpenAmount < 0) {
    throw new InvalidInputError(`sharpenAmount must be a finite number >= 0, got ${merged.sharpenAmount}`);
  }
  return merged;
}

/**
 * Cut the masked subject out of `image`.
 * The output always has the image's dimensions, whatever the mask size.
 *
 * @param mask - Opacity map, any positive size.
 * @param image - Source photo. Not modified.
 * @throws {CompositingFailedError} If either buffer is empty or inconsistent, or blending fails.
 * @throws {InvalidInputError} If the options are invalid.
 */
export function composite(
  mask: AlphaMask,
  image: SourceImage,
  options: Partial<CompositeOptions> = {},
): CutoutImage {
  if (!isValidMask(mask)) {
    throw new CompositingFailedError(
      `Mask buffer is empty or inconsistent (${mask.size.width}x${mask.size.height}, ${mask.data.length} values)`,
    );
  }
  if (!isValidRaster(image)) {
    throw new CompositingFailedError(
      `Image buffer is empty or inconsistent (${image.width}x${image.height}, ${image.data.length} bytes)`,
    );
  }
  const opts = resolveOptions(options);

  try {
    const { width, height } = image;
    const alpha = resamplePlane(mask.data, mask.size, { width, height }, 'lanczos3');

    const masked = new Uint8ClampedArray(image.data);
    for (let i = 0; i < alpha.length; i++) {
      const m = alpha[i] < 0 ? 0 : alpha[i] > 1 ? 1 : alpha[i];
      masked[i * 4 + 3] = Math.round(image.data[i * 4 + 3] * m);
    }

    return unsharpMask({ width, height, data: masked }, opts.sharpenRadius, opts.sharpenAmount);
  } catch (error) {
    if (isCutoutError(error)) throw error;
    throw new CompositingFailedError('Failed to composite mask onto image', { cause: error });
  }
}

/**
 * Apply a manually edited mask. Same algorithm as {@link composite}; kept as a
 * separate entry point for the editor's commit path.
 */
export function applyExternalMask(
  mask: AlphaMask,
  image: SourceImage,
  options: Partial<CompositeOptions> = {},
): CutoutImage {
  return composite(mask, image, options);
}

/**
 * {@link composite} as a cancellable background task.
 *
 * @throws {TaskCancelledError} If `signal` fires before the result is ready.
 */
export function compositeAsync(
  mask: AlphaMask,
  image: SourceImage,
  options: Partial<CompositeOptions> = {},
  signal?: AbortSignal,
): Promise<CutoutImage> {
  return runTask(() => composite(mask, image, options), signal);
}
