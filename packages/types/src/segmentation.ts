/**
 * @module segmentation
 * Boundary with the external subject-detection model.
 */

import type { RawMask } from './mask';
import type { SourceImage } from './raster';

/** Result of one segmentation request. */
export interface SegmentationResult {
  /** Foreground probability map, at source or working resolution. */
  mask: RawMask;
  /** Number of distinct subjects the detector found. */
  instanceCount: number;
}

/** External subject detector. Implementations live outside this repository. */
export interface SegmentationOracle {
  /**
   * Detect foreground subjects in an image.
   * @param image - The captured photo.
   * @param signal - Aborts the request.
   */
  segment(image: SourceImage, signal?: AbortSignal): Promise<SegmentationResult>;
}
