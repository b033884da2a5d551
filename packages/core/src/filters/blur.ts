/**
 * @module filters/blur
 * Gaussian blur on float planes and unsharp masking on RGBA rasters.
 * All functions return new buffers and do NOT modify the input.
 */

import type { RasterBuffer, Size } from '@cutout-studio/types';

/** Clamp 0-255. */
function clamp255(v: number): number {
  return v < 0 ? 0 : v > 255 ? 255 : Math.round(v);
}

/**
 * Build a normalized 1D Gaussian kernel.
 * The kernel extends `ceil(3 * sigma)` samples to each side of the center.
 *
 * @param sigma - Standard deviation in pixels. Must be > 0.
 */
export function gaussianKernel(sigma: number): Float64Array {
  const half = Math.max(1, Math.ceil(sigma * 3));
  const kernel = new Float64Array(half * 2 + 1);
  let sum = 0;
  for (let i = 0; i < kernel.length; i++) {
    const x = i - half;
    const value = Math.exp(-(x * x) / (2 * sigma * sigma));
    kernel[i] = value;
    sum += value;
  }
  for (let i = 0; i < kernel.length; i++) {
    kernel[i] /= sum;
  }
  return kernel;
}

/**
 * Separable Gaussian blur of a single-channel float plane.
 * Samples beyond the border repeat the edge value, so a flat plane stays flat.
 *
 * @param src - Source plane, `size.width * size.height` values.
 * @param size - Plane dimensions.
 * @param sigma - Standard deviation in pixels. Values <= 0 return a copy.
 */
export function gaussianBlurPlane(src: Float32Array, size: Size, sigma: number): Float32Array {
  if (!(sigma > 0)) {
    return new Float32Array(src);
  }

  const kernel = gaussianKernel(sigma);
  const half = (kernel.length - 1) / 2;
  const { width, height } = size;

  // Horizontal pass
  const temp = new Float32Array(width * height);
  for (let y = 0; y < height; y++) {
    const row = y * width;
    for (let x = 0; x < width; x++) {
      let acc = 0;
      for (let k = 0; k < kernel.length; k++) {
        const sx = Math.max(0, Math.min(width - 1, x - half + k));
        acc += src[row + sx] * kernel[k];
      }
      temp[row + x] = acc;
    }
  }

  // Vertical pass
  const result = new Float32Array(width * height);
  for (let y = 0; y < height; y++) {
    for (let x = 0; x < width; x++) {
      let acc = 0;
      for (let k = 0; k < kernel.length; k++) {
        const sy = Math.max(0, Math.min(height - 1, y - half + k));
        acc += temp[sy * width + x] * kernel[k];
      }
      result[y * width + x] = acc;
    }
  }

  return result;
}

/**
 * Sharpen an RGBA raster with an unsharp mask:
 * `out = v + (v - gaussian(v)) * amount` on every channel, alpha included.
 * A flat region is left unchanged.
 *
 * @param raster - Source raster.
 * @param radius - Gaussian sigma of the blurred copy.
 * @param amount - Strength (0 = no-op, 1 = add the full high-pass).
 * @returns New raster with sharpening applied.
 */
export function unsharpMask(raster: RasterBuffer, radius: number, amount: number): RasterBuffer {
  const { width, height, data } = raster;
  const out = new Uint8ClampedArray(data);
  if (!(radius > 0) || amount === 0) {
    return { width, height, data: out };
  }

  const pixelCount = width * height;
  const plane = new Float32Array(pixelCount);
  for (let c = 0; c < 4; c++) {
    for (let i = 0; i < pixelCount; i++) {
      plane[i] = data[i * 4 + c];
    }
    const blurred = gaussianBlurPlane(plane, raster, radius);
    for (let i = 0; i < pixelCount; i++) {
      const v = plane[i];
      out[i * 4 + c] = clamp255(v + (v - blurred[i]) * amount);
    }
  }
  return { width, height, data: out };
}
