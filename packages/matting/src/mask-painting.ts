/**
 * @module mask-painting
 * Pure pixel operations for interactive mask correction: brush dabs and
 * lasso fills. Functions return a new mask and never modify their input.
 *
 * Coordinates are in mask pixel space; pixel (x, y) covers the square from
 * (x, y) to (x + 1, y + 1) and is sampled at its center.
 */

import type { AlphaMask, Point } from '@cutout-studio/types';
import { InvalidInputError, cloneMask } from '@cutout-studio/core';

/** `add` paints toward fully opaque, `erase` toward fully transparent. */
export type PaintMode = 'add' | 'erase';

/** Lasso supersampling grid per pixel axis. */
const LASSO_SAMPLES = 4;

function blend(current: number, coverage: number, mode: PaintMode): number {
  return mode === 'add' ? current + (1 - current) * coverage : current * (1 - coverage);
}

function isFinitePoint(p: Point): boolean {
  return Number.isFinite(p.x) && Number.isFinite(p.y);
}

/**
 * Stamp an antialiased filled disk onto a mask.
 * Coverage falls off linearly over the one pixel straddling the rim.
 *
 * @param center - Disk center in mask pixels.
 * @param radius - Disk radius in mask pixels. Must be > 0.
 * @throws {InvalidInputError} On a non-finite center or non-positive radius.
 */
export function paintDisk(mask: AlphaMask, center: Point, radius: number, mode: PaintMode): AlphaMask {
  if (!isFinitePoint(center)) {
    throw new InvalidInputError(`Brush center must be finite, got (${center.x}, ${center.y})`);
  }
  if (!Number.isFinite(radius) || radius <= 0) {
    throw new InvalidInputError(`Brush radius must be > 0, got ${radius}`);
  }

  const result = cloneMask(mask);
  const { width, height } = mask.size;
  const reach = radius + 0.5;
  const x0 = Math.max(0, Math.floor(center.x - reach));
  const x1 = Math.min(width - 1, Math.ceil(center.x + reach));
  const y0 = Math.max(0, Math.floor(center.y - reach));
  const y1 = Math.min(height - 1, Math.ceil(center.y + reach));

  for (let y = y0; y <= y1; y++) {
    const dy = y + 0.5 - center.y;
    for (let x = x0; x <= x1; x++) {
      const dx = x + 0.5 - center.x;
      const coverage = Math.min(1, reach - Math.sqrt(dx * dx + dy * dy));
      if (coverage <= 0) continue;
      const idx = y * width + x;
      result.data[idx] = blend(result.data[idx], coverage, mode);
    }
  }
  return result;
}

/**
 * X positions where polygon edges cross the horizontal line at `y`, sorted.
 * An edge counts when exactly one endpoint lies below the line, so vertices
 * are never counted twice and the list length is always even.
 */
function scanlineCrossings(points: readonly Point[], y: number, out: number[]): void {
  out.length = 0;
  for (let i = 0, j = points.length - 1; i < points.length; j = i++) {
    const a = points[i];
    const b = points[j];
    if (a.y > y !== b.y > y) {
      out.push(((b.x - a.x) * (y - a.y)) / (b.y - a.y) + a.x);
    }
  }
  out.sort((p, q) => p - q);
}

/**
 * Fill a closed polygon on a mask using the even-odd rule.
 * Edge pixels get fractional coverage from a 4x4 subsample grid. Each
 * subsample row is filled as spans between consecutive edge crossings.
 * Fewer than three points describe no area and return the mask unchanged.
 *
 * @param points - Polygon vertices in mask pixels; the last connects back to the first.
 * @throws {InvalidInputError} If any vertex is not finite.
 */
export function fillLasso(mask: AlphaMask, points: readonly Point[], mode: PaintMode = 'erase'): AlphaMask {
  if (points.length < 3) {
    return mask;
  }
  if (!points.every(isFinitePoint)) {
    throw new InvalidInputError('Lasso points must be finite');
  }

  const result = cloneMask(mask);
  const { width, height } = mask.size;
  let minX = Infinity, minY = Infinity, maxX = -Infinity, maxY = -Infinity;
  for (const p of points) {
    minX = Math.min(minX, p.x);
    minY = Math.min(minY, p.y);
    maxX = Math.max(maxX, p.x);
    maxY = Math.max(maxY, p.y);
  }
  const x0 = Math.max(0, Math.floor(minX));
  const x1 = Math.min(width - 1, Math.ceil(maxX));
  const y0 = Math.max(0, Math.floor(minY));
  const y1 = Math.min(height - 1, Math.ceil(maxY));
  if (x0 > x1 || y0 > y1) {
    return result;
  }

  const total = LASSO_SAMPLES * LASSO_SAMPLES;
  // Subsample columns are indexed globally: column j is sampled at x = (j + 0.5) / LASSO_SAMPLES.
  const firstColumn = x0 * LASSO_SAMPLES;
  const endColumn = (x1 + 1) * LASSO_SAMPLES;
  const hits = new Uint8Array(x1 - x0 + 1);
  const crossings: number[] = [];

  for (let y = y0; y <= y1; y++) {
    hits.fill(0);
    for (let sy = 0; sy < LASSO_SAMPLES; sy++) {
      scanlineCrossings(points, y + (sy + 0.5) / LASSO_SAMPLES, crossings);
      for (let k = 0; k + 1 < crossings.length; k += 2) {
        // Samples with crossings[k] <= x < crossings[k + 1] are inside.
        const from = Math.max(firstColumn, Math.ceil(crossings[k] * LASSO_SAMPLES - 0.5));
        const to = Math.min(endColumn, Math.ceil(crossings[k + 1] * LASSO_SAMPLES - 0.5));
        for (let j = from; j < to; j++) {
          hits[Math.floor(j / LASSO_SAMPLES) - x0]++;
        }
      }
    }
    for (let x = x0; x <= x1; x++) {
      const count = hits[x - x0];
      if (count === 0) continue;
      const idx = y * width + x;
      result.data[idx] = blend(result.data[idx], count / total, mode);
    }
  }
  return result;
}
