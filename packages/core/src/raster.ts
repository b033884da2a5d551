/**
 * @module raster
 * Construction and validation helpers for RGBA rasters and single-channel masks.
 */

import type { AlphaMask, Color, RasterBuffer, RawMask, Size } from '@cutout-studio/types';
import { InvalidInputError } from './errors';

/** Whether both dimensions are positive finite integers. */
export function isPositiveSize(size: Size): boolean {
  return (
    Number.isInteger(size.width) &&
    Number.isInteger(size.height) &&
    size.width > 0 &&
    size.height > 0
  );
}

/**
 * Create a raster, optionally filled with one color.
 *
 * @param width - Width in pixels.
 * @param height - Height in pixels.
 * @param fill - Fill color. Defaults to fully transparent black.
 */
export function createRaster(width: number, height: number, fill?: Color): RasterBuffer {
  const data = new Uint8ClampedArray(width * height * 4);
  if (fill) {
    const a = Math.round(fill.a * 255);
    for (let i = 0; i < data.length; i += 4) {
      data[i] = fill.r;
      data[i + 1] = fill.g;
      data[i + 2] = fill.b;
      data[i + 3] = a;
    }
  }
  return { width, height, data };
}

/** Deep copy of a raster. */
export function cloneRaster(raster: RasterBuffer): RasterBuffer {
  return { width: raster.width, height: raster.height, data: new Uint8ClampedArray(raster.data) };
}

/** Whether a raster is non-empty and its buffer matches its dimensions. */
export function isValidRaster(raster: RasterBuffer): boolean {
  return (
    isPositiveSize(raster) &&
    raster.data.length === raster.width * raster.height * 4
  );
}

/**
 * Throw {@link InvalidInputError} unless the raster is usable.
 * @param label - Name used in the error message.
 */
export function assertValidRaster(raster: RasterBuffer, label = 'raster'): void {
  if (!isPositiveSize(raster)) {
    throw new InvalidInputError(`${label} has zero area (${raster.width}x${raster.height})`);
  }
  const expected = raster.width * raster.height * 4;
  if (raster.data.length !== expected) {
    throw new InvalidInputError(
      `${label} data length (${raster.data.length}) does not match ${raster.width}x${raster.height}x4 = ${expected}`,
    );
  }
}

/** Create an alpha mask filled with one value. */
export function createMask(size: Size, value = 0): AlphaMask {
  const data = new Float32Array(size.width * size.height);
  if (value !== 0) data.fill(value);
  return { size: { width: size.width, height: size.height }, data };
}

/** Deep copy of an alpha mask. */
export function cloneMask(mask: AlphaMask): AlphaMask {
  return { size: { width: mask.size.width, height: mask.size.height }, data: new Float32Array(mask.data) };
}

/** Whether a mask is non-empty and its buffer matches its dimensions. */
export function isValidMask(mask: RawMask | AlphaMask): boolean {
  return isPositiveSize(mask.size) && mask.data.length === mask.size.width * mask.size.height;
}

/**
 * Throw {@link InvalidInputError} unless the mask is usable.
 * @param label - Name used in the error message.
 */
export function assertValidMask(mask: RawMask | AlphaMask, label = 'mask'): void {
  const { width, height } = mask.size;
  if (!isPositiveSize(mask.size)) {
    throw new InvalidInputError(`${label} has zero area (${width}x${height})`);
  }
  if (mask.data.length !== width * height) {
    throw new InvalidInputError(
      `${label} data length (${mask.data.length}) does not match ${width}x${height} = ${width * height}`,
    );
  }
}

/**
 * Convert a raw probability map to floats in [0, 1].
 * Byte maps are divided by 255; NaN becomes 0 and out-of-range values are clamped.
 */
export function normalizeRawMask(raw: RawMask): Float32Array {
  const out = new Float32Array(raw.data.length);
  const scale = raw.data instanceof Uint8Array ? 1 / 255 : 1;
  for (let i = 0; i < raw.data.length; i++) {
    const v = raw.data[i] * scale;
    out[i] = v > 0 ? (v < 1 ? v : 1) : 0;
  }
  return out;
}

/** Extract the alpha channel of a raster as a mask. */
export function maskFromAlpha(raster: RasterBuffer): AlphaMask {
  const mask = createMask(raster);
  for (let i = 0; i < mask.data.length; i++) {
    mask.data[i] = raster.data[i * 4 + 3] / 255;
  }
  return mask;
}

/** Whether two masks have the same size and identical values. */
export function masksEqual(a: AlphaMask, b: AlphaMask): boolean {
  if (a.size.width !== b.size.width || a.size.height !== b.size.height) return false;
  for (let i = 0; i < a.data.length; i++) {
    if (a.data[i] !== b.data[i]) return false;
  }
  return true;
}
