/**
 * @module mask
 * Single-channel mask types for the cut-out pipeline.
 */

import type { Size } from './common';

/**
 * Unrefined foreground probability map produced by a segmentation oracle.
 * Float data is read as probabilities in [0, 1]; byte data as 0-255.
 * May be at a different resolution than the source image.
 */
export interface RawMask {
  /** Mask dimensions. */
  size: Size;
  /** `size.width * size.height` samples. */
  data: Float32Array | Uint8Array;
}

/** Refined, editable opacity map at source resolution. Values in [0, 1]. */
export interface AlphaMask {
  /** Mask dimensions. */
  size: Size;
  /** `size.width * size.height` opacity values. */
  data: Float32Array;
}
