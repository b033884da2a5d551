import { describe, expect, it } from 'vitest';
import { InvalidGeometryError } from './errors';
import { createComposition, createLayer, defaultLayerName } from './layer-factory';
import { appendLayer } from './layer-model';
import { createRaster } from './raster';

describe('createLayer', () => {
  it('fills in defaults', () => {
    const pixels = createRaster(4, 3);
    const layer = createLayer('uploaded-image', pixels);
    expect(layer.kind).toBe('uploaded-image');
    expect(layer.pixels).toBe(pixels);
    expect(layer.transform).toEqual({ offsetX: 0, offsetY: 0, scale: 1, rotationDegrees: 0 });
    expect(layer.opacity).toBe(1);
    expect(layer.visible).toBe(true);
    expect(layer.locked).toBe(false);
    expect(layer.id).toMatch(/^[0-9a-f-]{36}$/);
    expect(layer).not.toHaveProperty('mask');
  });

  it('merges a partial transform and metadata', () => {
    const layer = createLayer('text', createRaster(1, 1), {
      name: 'Title',
      transform: { scale: 2 },
      text: { content: 'Hello', fontName: 'Serif', fontSize: 32, color: '#ffffff', alignment: 'center' },
    });
    expect(layer.name).toBe('Title');
    expect(layer.transform.scale).toBe(2);
    expect(layer.transform.offsetX).toBe(0);
    expect(layer.text?.content).toBe('Hello');
  });

  it('clamps opacity and maps NaN to transparent', () => {
    expect(createLayer('subject', createRaster(1, 1), { opacity: 1.5 }).opacity).toBe(1);
    expect(createLayer('subject', createRaster(1, 1), { opacity: -0.2 }).opacity).toBe(0);
    expect(createLayer('subject', createRaster(1, 1), { opacity: Number.NaN }).opacity).toBe(0);
  });

  it('generates unique ids', () => {
    const a = createLayer('subject', createRaster(1, 1));
    const b = createLayer('subject', createRaster(1, 1));
    expect(a.id).not.toBe(b.id);
  });
});

describe('createComposition', () => {
  it('starts empty with no background', () => {
    const composition = createComposition('Beach', { width: 640, height: 480 });
    expect(composition.layers).toEqual([]);
    expect(composition.background).toBeNull();
    expect(composition.notes).toBe('');
    expect(composition.canvasSize).toEqual({ width: 640, height: 480 });
  });

  it('rejects a degenerate canvas', () => {
    expect(() => createComposition('Bad', { width: 0, height: 10 })).toThrow(InvalidGeometryError);
  });
});

describe('defaultLayerName', () => {
  it('numbers after the current layer count', () => {
    const composition = createComposition('C', { width: 4, height: 4 });
    expect(defaultLayerName('subject', composition)).toBe('Subject 1');
    appendLayer(composition, createLayer('subject', createRaster(1, 1)));
    expect(defaultLayerName('uploaded-image', composition)).toBe('Imported Layer 2');
  });
});
