/**
 * @module subject-compositions
 * Builds one composition per extracted subject over a shared background.
 */

import type { BackgroundImage, Composition, CutoutImage, Size } from '@cutout-studio/types';
import { fitSubjectLayer, type AutoFitOptions } from './auto-fit';
import { InvalidGeometryError, InvalidInputError } from './errors';
import { createComposition, createLayer, defaultLayerName } from './layer-factory';
import { appendLayer } from './layer-model';
import { createLogger } from './logger';
import { isPositiveSize, isValidRaster } from './raster';

const log = createLogger('subject-compositions');

/** A subject cut-out and the name its composition should carry. */
export interface SubjectInput {
  cutout: CutoutImage;
  name?: string;
}

/**
 * Creates a composition for each subject, each holding a single centered,
 * auto-fitted subject layer over `background`.
 *
 * Subjects with empty or inconsistent pixels are skipped with a warning.
 *
 * @throws {InvalidGeometryError} If the canvas size is degenerate.
 * @throws {InvalidInputError} If `subjects` is empty.
 */
export function createSubjectCompositions(
  subjects: readonly SubjectInput[],
  background: BackgroundImage | null,
  canvasSize: Size,
  options: Partial<AutoFitOptions> = {},
): Composition[] {
  if (subjects.length === 0) {
    throw new InvalidInputError('At least one subject is required');
  }

  if (!isPositiveSize(canvasSize)) {
    throw new InvalidGeometryError(`Invalid canvas size ${canvasSize.width}x${canvasSize.height}`);
  }

  const compositions: Composition[] = [];
  subjects.forEach((subject, index) => {
    if (!isValidRaster(subject.cutout)) {
      log.warn(`Skipping subject ${index}: empty or inconsistent pixel buffer`);
      return;
    }
    const composition = createComposition(subject.name ?? `Composition ${index + 1}`, canvasSize, { background });
    const layer = createLayer('subject', subject.cutout, { name: defaultLayerName('subject', composition) });
    fitSubjectLayer(layer, canvasSize, options);
    appendLayer(composition, layer);
    compositions.push(composition);
  });

  log.info(`Created ${compositions.length} of ${subjects.length} subject compositions`);
  return compositions;
}
