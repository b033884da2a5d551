import { describe, expect, it } from 'vitest';
import {
  composeMatrices,
  invertMatrix,
  rotateMatrix,
  scaleMatrix,
  transformPoint,
  transformedBounds,
  translateMatrix,
} from './transform';

describe('transform', () => {
  it('applies the rightmost matrix first', () => {
    const m = composeMatrices(translateMatrix(10, 0), scaleMatrix(2));
    expect(transformPoint(m, { x: 1, y: 1 })).toEqual({ x: 12, y: 2 });
  });

  it('rotates clockwise on a y-down canvas', () => {
    const p = transformPoint(rotateMatrix(90), { x: 1, y: 0 });
    expect(p.x).toBeCloseTo(0, 12);
    expect(p.y).toBeCloseTo(1, 12);
  });

  it('inverts an affine matrix', () => {
    const m = composeMatrices(translateMatrix(5, -3), rotateMatrix(30), scaleMatrix(1.5));
    const inv = invertMatrix(m);
    expect(inv).not.toBeNull();
    if (!inv) return;
    const p = transformPoint(inv, transformPoint(m, { x: 7, y: 2 }));
    expect(p.x).toBeCloseTo(7, 10);
    expect(p.y).toBeCloseTo(2, 10);
  });

  it('returns null for a singular matrix', () => {
    expect(invertMatrix(scaleMatrix(0))).toBeNull();
  });

  it('computes bounds of a scaled, translated rectangle', () => {
    const m = composeMatrices(translateMatrix(1, 2), scaleMatrix(2));
    expect(transformedBounds(m, 3, 4)).toEqual({ x: 1, y: 2, width: 6, height: 8 });
  });
});
