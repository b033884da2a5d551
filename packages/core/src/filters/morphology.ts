/**
 * @module filters/morphology
 * Grayscale morphological minimum (erosion) and maximum (dilation) over a
 * disk-shaped structuring element.
 *
 * Only in-bounds neighbors are considered, so the border never pulls values
 * toward 0 or 1 on its own.
 */

import type { Size } from '@cutout-studio/types';

/** Offset within a structuring element. */
interface Offset {
  dx: number;
  dy: number;
}

/**
 * Offsets of every integer point within `radius` of the origin.
 * Fractional radii are allowed: 1.5 covers the full 3x3 neighborhood.
 */
export function diskOffsets(radius: number): Offset[] {
  const reach = Math.floor(radius);
  const r2 = radius * radius;
  const offsets: Offset[] = [];
  for (let dy = -reach; dy <= reach; dy++) {
    for (let dx = -reach; dx <= reach; dx++) {
      if (dx * dx + dy * dy <= r2) {
        offsets.push({ dx, dy });
      }
    }
  }
  return offsets;
}

function morph(src: Float32Array, size: Size, radius: number, pickMax: boolean): Float32Array {
  if (!(radius >= 1)) {
    return new Float32Array(src);
  }

  const { width, height } = size;
  const offsets = diskOffsets(radius);
  const result = new Float32Array(width * height);

  for (let y = 0; y < height; y++) {
    for (let x = 0; x < width; x++) {
      let best = src[y * width + x];
      for (const { dx, dy } of offsets) {
        const nx = x + dx;
        const ny = y + dy;
        if (nx < 0 || nx >= width || ny < 0 || ny >= height) continue;
        const v = src[ny * width + nx];
        if (pickMax ? v > best : v < best) best = v;
      }
      result[y * width + x] = best;
    }
  }
  return result;
}

/**
 * Morphological minimum. Pulls bright regions inward by `radius` pixels.
 * Radii below 1 return a copy.
 */
export function erodePlane(src: Float32Array, size: Size, radius: number): Float32Array {
  return morph(src, size, radius, false);
}

/**
 * Morphological maximum. Pushes bright regions outward by `radius` pixels.
 * Radii below 1 return a copy.
 */
export function dilatePlane(src: Float32Array, size: Size, radius: number): Float32Array {
  return morph(src, size, radius, true);
}
