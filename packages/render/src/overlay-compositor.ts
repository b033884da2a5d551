/**
 * @module overlay-compositor
 * Places a cut-out subject over a background photo at the subject's own size.
 */

import type { CutoutImage, RasterBuffer } from '@cutout-studio/types';
import { assertValidRaster, identityMatrix, isValidRaster } from '@cutout-studio/core';
import { SoftwareCanvas } from './software-canvas';

/**
 * Composite `subject` over `overlay`. The overlay is aspect-filled beneath the
 * subject; the result has the subject's dimensions and is transparent where
 * neither covers.
 *
 * @throws {InvalidInputError} If the subject is empty or inconsistent.
 */
export function compositeOnto(subject: CutoutImage, overlay: RasterBuffer): RasterBuffer {
  assertValidRaster(subject, 'subject');
  const canvas = new SoftwareCanvas(subject.width, subject.height);
  if (isValidRaster(overlay)) {
    canvas.drawAspectFill(overlay);
  }
  canvas.drawTransformed(subject, identityMatrix(), 1);
  return canvas.toRaster();
}
