/**
 * @module transform
 * 2D affine matrices for placing layers on the canvas.
 *
 * Matrices use the canvas convention `[a, b, c, d, tx, ty]`, mapping
 * `(x, y)` to `(a*x + c*y + tx, b*x + d*y + ty)`. With the y axis pointing
 * down, a positive rotation turns clockwise on screen.
 */

import type { Point, Rect } from '@cutout-studio/types';

/** 2D affine transform matrix [a, b, c, d, tx, ty]. */
export type Matrix2D = [number, number, number, number, number, number];

/** Returns the identity matrix. */
export function identityMatrix(): Matrix2D {
  return [1, 0, 0, 1, 0, 0];
}

/**
 * Multiply two 2D affine matrices.
 * @returns Product `a * b`, which applies `b` first, then `a`.
 */
export function multiplyMatrix(a: Matrix2D, b: Matrix2D): Matrix2D {
  return [
    a[0] * b[0] + a[2] * b[1],
    a[1] * b[0] + a[3] * b[1],
    a[0] * b[2] + a[2] * b[3],
    a[1] * b[2] + a[3] * b[3],
    a[0] * b[4] + a[2] * b[5] + a[4],
    a[1] * b[4] + a[3] * b[5] + a[5],
  ];
}

/**
 * Compose matrices left to right: `composeMatrices(A, B, C)` is `A * B * C`,
 * so `C` applies to a point first.
 */
export function composeMatrices(...matrices: Matrix2D[]): Matrix2D {
  return matrices.reduce((acc, m) => multiplyMatrix(acc, m), identityMatrix());
}

/**
 * Create a rotation matrix.
 * @param angle - Angle in degrees.
 */
export function rotateMatrix(angle: number): Matrix2D {
  const rad = (angle * Math.PI) / 180;
  const c = Math.cos(rad);
  const s = Math.sin(rad);
  return [c, s, -s, c, 0, 0];
}

/** Create a scale matrix. */
export function scaleMatrix(sx: number, sy: number = sx): Matrix2D {
  return [sx, 0, 0, sy, 0, 0];
}

/** Create a translation matrix. */
export function translateMatrix(tx: number, ty: number): Matrix2D {
  return [1, 0, 0, 1, tx, ty];
}

/**
 * Invert a 2D affine matrix.
 * @returns Inverted matrix, or null if singular.
 */
export function invertMatrix(m: Matrix2D): Matrix2D | null {
  const det = m[0] * m[3] - m[1] * m[2];
  if (Math.abs(det) < 1e-12) return null;
  const invDet = 1 / det;
  return [
    m[3] * invDet,
    -m[1] * invDet,
    -m[2] * invDet,
    m[0] * invDet,
    (m[2] * m[5] - m[3] * m[4]) * invDet,
    (m[1] * m[4] - m[0] * m[5]) * invDet,
  ];
}

/** Map a point through a matrix. */
export function transformPoint(m: Matrix2D, p: Point): Point {
  return {
    x: m[0] * p.x + m[2] * p.y + m[4],
    y: m[1] * p.x + m[3] * p.y + m[5],
  };
}

/**
 * Axis-aligned bounds of a `width x height` rectangle at the origin after
 * mapping it through `m`.
 */
export function transformedBounds(m: Matrix2D, width: number, height: number): Rect {
  const corners = [
    transformPoint(m, { x: 0, y: 0 }),
    transformPoint(m, { x: width, y: 0 }),
    transformPoint(m, { x: width, y: height }),
    transformPoint(m, { x: 0, y: height }),
  ];
  let minX = Infinity, minY = Infinity, maxX = -Infinity, maxY = -Infinity;
  for (const { x, y } of corners) {
    minX = Math.min(minX, x);
    minY = Math.min(minY, y);
    maxX = Math.max(maxX, x);
    maxY = Math.max(maxY, y);
  }
  return { x: minX, y: minY, width: maxX - minX, height: maxY - minY };
}
