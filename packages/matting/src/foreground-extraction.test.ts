import { describe, expect, it, vi } from 'vitest';
import type { SegmentationOracle, SegmentationResult, SourceImage } from '@cutout-studio/types';
import {
  InvalidInputError,
  InvalidStateError,
  MultipleSubjectsError,
  NoSubjectError,
  TaskCancelledError,
  createLayer,
  createRaster,
} from '@cutout-studio/core';
import { canCleanLayer, cleanLayer, extractForeground } from './foreground-extraction';

function fakeOracle(instanceCount: number) {
  const result: SegmentationResult = {
    mask: { size: { width: 4, height: 4 }, data: new Float32Array(16).fill(1) },
    instanceCount,
  };
  const segment = vi.fn((image: SourceImage, signal?: AbortSignal) => Promise.resolve(result));
  return { segment } satisfies SegmentationOracle;
}

describe('extractForeground', () => {
  const image = createRaster(8, 8, { r: 0, g: 0, b: 255, a: 1 });

  it('refines to the image size and cuts the subject out', async () => {
    const oracle = fakeOracle(1);
    const result = await extractForeground(oracle, image);

    expect(result.instanceCount).toBe(1);
    expect(result.mask.size).toEqual({ width: 8, height: 8 });
    expect(result.cutout.width).toBe(8);
    expect(result.cutout.height).toBe(8);
    expect(Array.from(result.cutout.data.subarray(0, 4))).toEqual([0, 0, 255, 255]);
    expect(oracle.segment).toHaveBeenCalledWith(image, undefined);
  });

  it('rejects an image without a subject', async () => {
    await expect(extractForeground(fakeOracle(0), image)).rejects.toBeInstanceOf(NoSubjectError);
  });

  it('rejects several subjects unless allowed', async () => {
    await expect(extractForeground(fakeOracle(2), image)).rejects.toBeInstanceOf(MultipleSubjectsError);
    const result = await extractForeground(fakeOracle(2), image, { allowMultipleSubjects: true });
    expect(result.instanceCount).toBe(2);
  });

  it('does not call the oracle when already cancelled', async () => {
    const oracle = fakeOracle(1);
    const controller = new AbortController();
    controller.abort();
    await expect(extractForeground(oracle, image, { signal: controller.signal })).rejects.toBeInstanceOf(
      TaskCancelledError,
    );
    expect(oracle.segment).not.toHaveBeenCalled();
  });
});

describe('cleanLayer', () => {
  const photo = createRaster(8, 8, { r: 0, g: 0, b: 255, a: 1 });

  it('writes the mask, source and cut-out into a subject layer', async () => {
    const layer = createLayer('subject', photo);
    const oracle = fakeOracle(1);

    const result = await cleanLayer(oracle, layer);

    expect(oracle.segment).toHaveBeenCalledWith(photo, undefined);
    expect(layer.mask).toBe(result.mask);
    expect(layer.source).toBe(photo);
    expect(layer.pixels).toBe(result.cutout);
    expect(Array.from(layer.pixels.data.subarray(0, 4))).toEqual([0, 0, 255, 255]);
  });

  it('segments the stored source photo rather than the current pixels', async () => {
    const cutout = createRaster(8, 8);
    const layer = createLayer('uploaded-image', cutout, { source: photo });
    const oracle = fakeOracle(1);

    await cleanLayer(oracle, layer);

    expect(oracle.segment).toHaveBeenCalledWith(photo, undefined);
    expect(layer.pixels).not.toBe(cutout);
  });

  it('refuses layers that are not photos', async () => {
    const oracle = fakeOracle(1);
    const text = createLayer('text', photo);

    expect(canCleanLayer(text)).toBe(false);
    await expect(cleanLayer(oracle, text)).rejects.toBeInstanceOf(InvalidInputError);
    expect(oracle.segment).not.toHaveBeenCalled();
  });

  it('refuses a locked layer', async () => {
    const layer = createLayer('subject', photo, { locked: true });
    expect(canCleanLayer(layer)).toBe(false);
    expect(canCleanLayer(createLayer('subject', photo))).toBe(true);
    await expect(cleanLayer(fakeOracle(1), layer)).rejects.toBeInstanceOf(InvalidStateError);
  });

  it('leaves the layer untouched when no subject is found', async () => {
    const layer = createLayer('subject', photo);
    await expect(cleanLayer(fakeOracle(0), layer)).rejects.toBeInstanceOf(NoSubjectError);
    expect(layer.pixels).toBe(photo);
    expect(layer.mask).toBeUndefined();
    expect(layer.source).toBeUndefined();
  });
});
