/**
 * @cutout-studio/core
 *
 * Errors, logging, events, raster primitives, filters, layer model and
 * auto-fit placement shared by the matting and render packages.
 *
 * @packageDocumentation
 */

// Errors
export {
  CutoutError,
  InvalidInputError,
  CompositingFailedError,
  InvalidGeometryError,
  InvalidStateError,
  TaskCancelledError,
  NoSubjectError,
  MultipleSubjectsError,
  isCutoutError,
  toError,
} from './errors';
export type { CutoutErrorKind } from './errors';

// Logging
export { createLogger, setLogLevel, getLogLevel } from './logger';
export type { Logger, LogLevel } from './logger';

// IDs and events
export { generateId } from './uuid';
export { EventBusImpl } from './event-bus';

// Cancellable tasks
export { runTask, throwIfCancelled } from './task';

// Raster and mask helpers
export {
  isPositiveSize,
  createRaster,
  cloneRaster,
  isValidRaster,
  assertValidRaster,
  createMask,
  cloneMask,
  isValidMask,
  assertValidMask,
  normalizeRawMask,
  maskFromAlpha,
  masksEqual,
} from './raster';

// Filters
export {
  diskOffsets,
  erodePlane,
  dilatePlane,
  gammaPlane,
  contrastPlane,
  gaussianKernel,
  gaussianBlurPlane,
  unsharpMask,
} from './filters';

// Resampling
export { resamplePlane } from './resample';
export type { ResampleFilter } from './resample';

// Affine transforms
export {
  identityMatrix,
  multiplyMatrix,
  composeMatrices,
  rotateMatrix,
  scaleMatrix,
  translateMatrix,
  invertMatrix,
  transformPoint,
  transformedBounds,
} from './transform';
export type { Matrix2D } from './transform';

// PNG
export { encodePng, decodePng } from './png-codec';

// Layer factory and model
export {
  IDENTITY_TRANSFORM,
  createLayer,
  createComposition,
  createBackground,
  defaultLayerName,
} from './layer-factory';
export type { CreateLayerOptions, CreateCompositionOptions } from './layer-factory';
export {
  appendLayer,
  removeLayer,
  reorderLayer,
  moveLayerUp,
  moveLayerDown,
  findLayer,
  sortedLayers,
  normalizeLayerOrder,
  updateLayerTransform,
  setLayerOpacity,
  toggleLayerVisibility,
  toggleLayerLock,
  setBackground,
} from './layer-model';

// Auto-fit placement
export {
  DEFAULT_AUTO_FIT_OPTIONS,
  DEFAULT_REFIT_THRESHOLD,
  computeScale,
  fitSubjectLayer,
  refitSubjectLayers,
} from './auto-fit';
export type { AutoFitOptions, RefitOptions } from './auto-fit';
export { createSubjectCompositions } from './subject-compositions';
export type { SubjectInput } from './subject-compositions';
