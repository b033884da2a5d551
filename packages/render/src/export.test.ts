import { describe, expect, it } from 'vitest';
import {
  appendLayer,
  createComposition,
  createLayer,
  createRaster,
  decodePng,
  isCutoutError,
} from '@cutout-studio/core';
import { renderComposition } from './composition-renderer';
import { exportCompositions, exportPng } from './export';

describe('exportPng', () => {
  it('encodes the rendered composition', () => {
    const composition = createComposition('Export', { width: 4, height: 3 });
    appendLayer(composition, createLayer('subject', createRaster(2, 1, { r: 10, g: 200, b: 30, a: 1 })));

    const decoded = decodePng(exportPng(composition));
    expect(decoded.width).toBe(4);
    expect(decoded.height).toBe(3);
    expect(Array.from(decoded.data)).toEqual(Array.from(renderComposition(composition).data));
  });
});

describe('exportCompositions', () => {
  it('exports oldest first and reports failures without aborting', () => {
    const newest = createComposition('Newest', { width: 2, height: 2 });
    const oldest = createComposition('Oldest', { width: 2, height: 2 });
    const broken = createComposition('Broken', { width: 2, height: 2 });
    newest.createdAt = 300;
    oldest.createdAt = 100;
    broken.createdAt = 200;
    broken.canvasSize = { width: 0, height: 2 };

    const result = exportCompositions([newest, broken, oldest]);

    expect(result.rendered.map((r) => r.name)).toEqual(['Oldest', 'Newest']);
    expect(result.failures).toHaveLength(1);
    expect(result.failures[0].compositionId).toBe(broken.id);
    expect(isCutoutError(result.failures[0].error, 'InvalidGeometry')).toBe(true);
  });
});
