import { describe, expect, it } from 'vitest';
import {
  DEFAULT_AUTO_FIT_OPTIONS,
  computeScale,
  fitSubjectLayer,
  refitSubjectLayers,
} from './auto-fit';
import { InvalidInputError } from './errors';
import { createComposition, createLayer } from './layer-factory';
import { appendLayer } from './layer-model';
import { createRaster } from './raster';

describe('computeScale', () => {
  it('caps a small subject on a large canvas at natural size', () => {
    expect(computeScale({ width: 800, height: 600 }, { width: 3584, height: 2016 })).toBe(1.0);
  });

  it('sizes by height when the width fits', () => {
    // 1000 * 0.5 / 1000 = 0.5; width 400 * 0.5 = 200 <= 850
    expect(computeScale({ width: 400, height: 1000 }, { width: 1000, height: 1000 })).toBe(0.5);
  });

  it('sizes by width when the height-driven width overflows', () => {
    // height scale 0.5 would give 1000px > 850px; width scale = 850 / 2000 = 0.425
    expect(computeScale({ width: 2000, height: 1000 }, { width: 1000, height: 1000 })).toBeCloseTo(0.425, 12);
  });

  it('clamps to the minimum scale', () => {
    expect(computeScale({ width: 100, height: 10000 }, { width: 1000, height: 1000 })).toBe(0.3);
  });

  it('returns 1.0 for degenerate sizes', () => {
    expect(computeScale({ width: 0, height: 600 }, { width: 100, height: 100 })).toBe(1.0);
    expect(computeScale({ width: 100, height: 100 }, { width: 100, height: Number.NaN })).toBe(1.0);
    expect(computeScale({ width: -5, height: 100 }, { width: 100, height: 100 })).toBe(1.0);
  });

  it('stays within bounds for a range of sizes', () => {
    const { minScale, maxScale } = DEFAULT_AUTO_FIT_OPTIONS;
    for (const w of [1, 50, 333, 4000, 12000]) {
      for (const h of [1, 77, 900, 5000]) {
        const scale = computeScale({ width: w, height: h }, { width: 1920, height: 1080 });
        expect(scale).toBeGreaterThanOrEqual(minScale);
        expect(scale).toBeLessThanOrEqual(maxScale);
      }
    }
  });

  it('honors overrides and rejects inconsistent options', () => {
    expect(computeScale({ width: 100, height: 100 }, { width: 1000, height: 1000 }, { maxScale: 4 })).toBe(4);
    expect(() => computeScale({ width: 1, height: 1 }, { width: 1, height: 1 }, { minScale: 2, maxScale: 1 })).toThrow(
      InvalidInputError,
    );
  });
});

describe('fitSubjectLayer', () => {
  it('centers the layer and applies the scale', () => {
    const layer = createLayer('subject', createRaster(400, 1000), {
      transform: { offsetX: 30, offsetY: -10, rotationDegrees: 15 },
    });
    expect(fitSubjectLayer(layer, { width: 1000, height: 1000 })).toBe(0.5);
    expect(layer.transform).toEqual({ offsetX: 0, offsetY: 0, scale: 0.5, rotationDegrees: 15 });
  });

  it('leaves locked layers alone', () => {
    const layer = createLayer('subject', createRaster(400, 1000), { locked: true });
    expect(fitSubjectLayer(layer, { width: 1000, height: 1000 })).toBeNull();
    expect(layer.transform.scale).toBe(1);
  });
});

describe('refitSubjectLayers', () => {
  it('updates only subject layers whose scale moved past the threshold', () => {
    const composition = createComposition('C', { width: 1000, height: 1000 });
    const far = createLayer('subject', createRaster(400, 1000), { transform: { scale: 1 } });
    const near = createLayer('subject', createRaster(400, 1000), { transform: { scale: 0.52, offsetX: 7 } });
    const image = createLayer('uploaded-image', createRaster(400, 1000));
    for (const layer of [far, near, image]) appendLayer(composition, layer);

    expect(refitSubjectLayers(composition)).toBe(1);
    expect(far.transform.scale).toBe(0.5);
    expect(near.transform.scale).toBe(0.52);
    expect(near.transform.offsetX).toBe(7);
    expect(image.transform.scale).toBe(1);
  });
});
