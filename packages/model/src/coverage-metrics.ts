/**
 * Two-valued art format label.
 *
 * - `has_raster`: the region is dominated by bitmap content and needs a raster proof
 * - `has_vector`: the region can be regenerated as vector art
 */
export type ArtFormatLabel = 'has_raster' | 'has_vector';

/**
 * Native resolution of the largest raster intersecting the region.
 */
export interface NativeRasterInfo {
  /** Identifier of the chosen image */
  imageId: string;

  /** Native pixel width (0 when the image data could not be decoded) */
  nativePxW: number;

  /** Native pixel height (0 when the image data could not be decoded) */
  nativePxH: number;

  /** Placed width of the visible part, in inches */
  placedWIn: number;

  /** Placed height of the visible part, in inches */
  placedHIn: number;

  nativeDpiX: number;
  nativeDpiY: number;

  /** min(dpiX, dpiY) when both are positive, otherwise 0 */
  nativeDpiMin: number;
}

/**
 * Scalar signals measured over one region.
 * All coverage fields are ratios in [0, 1].
 */
export interface CoverageMetrics {
  rasterCoverage: number;
  textCoverage: number;
  drawingCoverage: number;
  effectiveVectorCoverage: number;

  /** Count of vector path operators intersecting the region */
  vectorSegments: number;

  /** Number of raster images placed on the whole page */
  rasterCount: number;

  nativeRaster?: NativeRasterInfo;
}
