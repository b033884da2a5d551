/**
 * @cutout-studio/matting
 *
 * Mask refinement, alpha compositing and interactive mask editing.
 *
 * @packageDocumentation
 */

// Refinement
export { refineMask, refineMaskAsync, DEFAULT_REFINE_OPTIONS } from './mask-refiner';
export type { RefineOptions } from './mask-refiner';

// Compositing
export {
  composite,
  applyExternalMask,
  compositeAsync,
  DEFAULT_COMPOSITE_OPTIONS,
} from './alpha-compositor';
export type { CompositeOptions } from './alpha-compositor';

// Mask painting
export { paintDisk, fillLasso } from './mask-painting';
export type { PaintMode } from './mask-painting';

// History and preview scheduling
export { MaskHistory, DEFAULT_HISTORY_CAPACITY } from './mask-history';
export { PreviewScheduler } from './preview-scheduler';
export type { PreviewResult } from './preview-scheduler';

// Interactive editor
export { EditSession, EditSessionRegistry } from './edit-session';
export type { EditSessionOptions, EditSessionState } from './edit-session';

// Pipeline
export { canCleanLayer, cleanLayer, extractForeground } from './foreground-extraction';
export type { ForegroundExtraction, ForegroundExtractionOptions } from './foreground-extraction';
