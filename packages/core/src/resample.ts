/**
 * @module resample
 * Separable high-quality resampling of single-channel float planes.
 *
 * Filters are evaluated in source-pixel units; when shrinking, the kernel is
 * widened by the scale factor so every source pixel contributes. Taps past the
 * border repeat the edge sample, and weights are normalized per output pixel.
 */

import type { Size } from '@cutout-studio/types';

/** Reconstruction filter. */
export type ResampleFilter = 'bicubic' | 'lanczos3';

/** Keys cubic convolution with a = -0.5 (Catmull-Rom). Support 2. */
function cubic(x: number): number {
  const a = -0.5;
  const t = Math.abs(x);
  if (t < 1) return ((a + 2) * t - (a + 3)) * t * t + 1;
  if (t < 2) return ((a * t - 5 * a) * t + 8 * a) * t - 4 * a;
  return 0;
}

function sinc(x: number): number {
  if (x === 0) return 1;
  const px = Math.PI * x;
  return Math.sin(px) / px;
}

/** Lanczos windowed sinc with 3 lobes. Support 3. */
function lanczos3(x: number): number {
  return Math.abs(x) < 3 ? sinc(x) * sinc(x / 3) : 0;
}

const FILTERS: Record<ResampleFilter, { kernel: (x: number) => number; support: number }> = {
  bicubic: { kernel: cubic, support: 2 },
  lanczos3: { kernel: lanczos3, support: 3 },
};

/** Source taps contributing to each output sample along one axis. */
interface AxisWeights {
  /** Tap count per output sample. */
  taps: number;
  /** `dstLength * taps` source indices. */
  indices: Int32Array;
  /** `dstLength * taps` normalized weights. */
  weights: Float64Array;
}

function axisWeights(srcLength: number, dstLength: number, filter: ResampleFilter): AxisWeights {
  const { kernel, support } = FILTERS[filter];
  const scale = srcLength / dstLength;
  const filterScale = Math.max(1, scale);
  const reach = support * filterScale;
  const taps = Math.ceil(reach) * 2 + 1;
  const indices = new Int32Array(dstLength * taps);
  const weights = new Float64Array(dstLength * taps);

  for (let i = 0; i < dstLength; i++) {
    const center = (i + 0.5) * scale;
    const first = Math.floor(center - reach);
    let sum = 0;
    for (let t = 0; t < taps; t++) {
      const j = first + t;
      const w = kernel((j + 0.5 - center) / filterScale);
      indices[i * taps + t] = Math.max(0, Math.min(srcLength - 1, j));
      weights[i * taps + t] = w;
      sum += w;
    }
    if (sum !== 0) {
      for (let t = 0; t < taps; t++) {
        weights[i * taps + t] /= sum;
      }
    }
  }
  return { taps, indices, weights };
}

/**
 * Resample a single-channel plane to a new size.
 *
 * @param src - Source plane, `srcSize.width * srcSize.height` values.
 * @param srcSize - Source dimensions.
 * @param dstSize - Target dimensions.
 * @param filter - Reconstruction filter.
 * @returns New plane of `dstSize`. Same-size input is copied unchanged.
 */
export function resamplePlane(
  src: Float32Array,
  srcSize: Size,
  dstSize: Size,
  filter: ResampleFilter,
): Float32Array {
  if (srcSize.width === dstSize.width && srcSize.height === dstSize.height) {
    return new Float32Array(src);
  }

  const horizontal = axisWeights(srcSize.width, dstSize.width, filter);
  const vertical = axisWeights(srcSize.height, dstSize.height, filter);

  // Horizontal pass: srcSize.height rows of dstSize.width samples
  const temp = new Float32Array(dstSize.width * srcSize.height);
  for (let y = 0; y < srcSize.height; y++) {
    const srcRow = y * srcSize.width;
    for (let x = 0; x < dstSize.width; x++) {
      let acc = 0;
      const base = x * horizontal.taps;
      for (let t = 0; t < horizontal.taps; t++) {
        acc += src[srcRow + horizontal.indices[base + t]] * horizontal.weights[base + t];
      }
      temp[y * dstSize.width + x] = acc;
    }
  }

  // Vertical pass
  const result = new Float32Array(dstSize.width * dstSize.height);
  for (let y = 0; y < dstSize.height; y++) {
    const base = y * vertical.taps;
    for (let x = 0; x < dstSize.width; x++) {
      let acc = 0;
      for (let t = 0; t < vertical.taps; t++) {
        acc += temp[vertical.indices[base + t] * dstSize.width + x] * vertical.weights[base + t];
      }
      result[y * dstSize.width + x] = acc;
    }
  }

  return result;
}
