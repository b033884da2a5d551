/**
 * @module foreground-extraction
 * End-to-end subject cut-out: segmentation oracle → refine → composite.
 * {@link cleanLayer} re-runs the same pipeline on a layer already in a composition.
 */

import type { AlphaMask, CutoutImage, Layer, LayerKind, SegmentationOracle, SourceImage } from '@cutout-studio/types';
import {
  InvalidInputError,
  InvalidStateError,
  MultipleSubjectsError,
  NoSubjectError,
  assertValidRaster,
  createLogger,
  throwIfCancelled,
} from '@cutout-studio/core';
import { compositeAsync, type CompositeOptions } from './alpha-compositor';
import { refineMaskAsync, type RefineOptions } from './mask-refiner';

const log = createLogger('foreground-extraction');

export interface ForegroundExtractionOptions {
  /** Accept oracle results with more than one subject instance. */
  allowMultipleSubjects?: boolean;
  /** Refiner overrides. The target size is always the image size. */
  refine?: Partial<Omit<RefineOptions, 'targetSize'>>;
  composite?: Partial<CompositeOptions>;
  /** Aborts between and during stages. */
  signal?: AbortSignal;
}

export interface ForegroundExtraction {
  /** Refined mask at image resolution. */
  mask: AlphaMask;
  cutout: CutoutImage;
  /** Subject count reported by the oracle. */
  instanceCount: number;
}

/**
 * Cut the subject out of a photo.
 *
 * @throws {InvalidInputError} If the image is empty or inconsistent.
 * @throws {NoSubjectError} If the oracle found no subject.
 * @throws {MultipleSubjectsError} If it found several and `allowMultipleSubjects` is off.
 * @throws {TaskCancelledError} If the signal fires.
 */
export async function extractForeground(
  oracle: SegmentationOracle,
  image: SourceImage,
  options: ForegroundExtractionOptions = {},
): Promise<ForegroundExtraction> {
  const { allowMultipleSubjects = false, refine = {}, composite = {}, signal } = options;
  assertValidRaster(image, 'source image');
  throwIfCancelled(signal);

  const result = await oracle.segment(image, signal);
  throwIfCancelled(signal);

  if (result.instanceCount <= 0) {
    throw new NoSubjectError();
  }
  if (result.instanceCount > 1 && !allowMultipleSubjects) {
    throw new MultipleSubjectsError(result.instanceCount);
  }
  log.debug('Segmentation finished', { instanceCount: result.instanceCount, maskSize: result.mask.size });

  const mask = await refineMaskAsync(
    result.mask,
    { ...refine, targetSize: { width: image.width, height: image.height } },
    signal,
  );
  const cutout = await compositeAsync(mask, image, composite, signal);
  return { mask, cutout, instanceCount: result.instanceCount };
}

/** Layer kinds whose content is a photo that background removal applies to. */
const CLEANABLE_KINDS: ReadonlySet<LayerKind> = new Set<LayerKind>(['subject', 'uploaded-image']);

/** Whether {@link cleanLayer} accepts this layer. */
export function canCleanLayer(layer: Layer): boolean {
  return CLEANABLE_KINDS.has(layer.kind) && !layer.locked;
}

/**
 * Remove the background from a subject or uploaded-image layer again and
 * write the mask, source and cut-out back into it.
 *
 * The layer's stored source photo is segmented when it has one, otherwise
 * its current pixels. On failure the layer is left untouched.
 *
 * @throws {InvalidInputError} If the layer is of another kind.
 * @throws {InvalidStateError} If the layer is locked.
 */
export async function cleanLayer(
  oracle: SegmentationOracle,
  layer: Layer,
  options: ForegroundExtractionOptions = {},
): Promise<ForegroundExtraction> {
  if (!CLEANABLE_KINDS.has(layer.kind)) {
    throw new InvalidInputError(`Layer "${layer.name}" of kind ${layer.kind} cannot be cleaned`);
  }
  if (layer.locked) {
    throw new InvalidStateError(`Layer "${layer.name}" is locked`);
  }

  const image = layer.source ?? layer.pixels;
  const extraction = await extractForeground(oracle, image, options);
  layer.mask = extraction.mask;
  layer.source = image;
  layer.pixels = extraction.cutout;
  log.info(`Cleaned layer "${layer.name}"`, { instanceCount: extraction.instanceCount });
  return extraction;
}
