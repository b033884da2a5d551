import { describe, expect, it } from 'vitest';
import { InvalidInputError, createRaster } from '@cutout-studio/core';
import { compositeOnto } from './overlay-compositor';

describe('compositeOnto', () => {
  function makeSubject() {
    const subject = createRaster(2, 2);
    // left column opaque red, right column half-transparent blue
    for (const i of [0, 2]) subject.data.set([255, 0, 0, 255], i * 4);
    for (const i of [1, 3]) subject.data.set([0, 0, 255, 128], i * 4);
    return subject;
  }

  it('draws the subject over an aspect-filled overlay at the subject size', () => {
    const overlay = createRaster(4, 2);
    for (let y = 0; y < 2; y++) {
      overlay.data.set([0, 0, 255, 255, 0, 255, 0, 255, 0, 255, 0, 255, 0, 0, 255, 255], y * 16);
    }
    const out = compositeOnto(makeSubject(), overlay);

    expect(out.width).toBe(2);
    expect(out.height).toBe(2);
    expect(Array.from(out.data.subarray(0, 4))).toEqual([255, 0, 0, 255]);
    // 128/255 blue over opaque green
    expect(Array.from(out.data.subarray(4, 8))).toEqual([0, 127, 128, 255]);
  });

  it('keeps the subject as-is when the overlay is empty', () => {
    const subject = makeSubject();
    const out = compositeOnto(subject, { width: 0, height: 0, data: new Uint8ClampedArray(0) });
    expect(Array.from(out.data)).toEqual(Array.from(subject.data));
  });

  it('rejects an empty subject', () => {
    expect(() => compositeOnto({ width: 0, height: 0, data: new Uint8ClampedArray(0) }, createRaster(1, 1))).toThrow(
      InvalidInputError,
    );
  });
});
