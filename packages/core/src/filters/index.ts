/**
 * @module filters
 * Pixel filters used by the mask refinement and cut-out stages.
 *
 * Morphology: erosion, dilation.
 * Tone: gamma, contrast.
 * Blur: gaussian blur, unsharp mask.
 *
 * @packageDocumentation
 */

export { diskOffsets, erodePlane, dilatePlane } from './morphology';
export { gammaPlane, contrastPlane } from './tone';
export { gaussianKernel, gaussianBlurPlane, unsharpMask } from './blur';
