import type { LoggerMethods } from '@artform/logger';
import type {
  NativeRasterInfo,
  PageContent,
  PixelSize,
  PlacedImage,
  Rect,
} from '@artform/model';

import { POINTS_PER_INCH } from '../config/constants';
import {
  intersectRects,
  rectArea,
  rectHeight,
  rectWidth,
} from '../geometry/rect-utils';

/**
 * Estimates the placed DPI of the dominant raster in a region.
 *
 * Picks the image with the largest visible area inside the clip (first one on
 * ties) and divides its native pixel size by the placed size of the visible
 * part, in inches. Image data that cannot be decoded yields a 0×0 native size
 * and therefore 0 DPI.
 */
export class NativeResolutionEstimator {
  constructor(private readonly logger: LoggerMethods) {}

  /**
   * @returns Native raster info, or undefined when no image intersects the clip
   */
  estimate(page: PageContent, clip: Rect): NativeRasterInfo | undefined {
    const largest = this.findLargestImage(page.getImages(), clip);
    if (!largest) {
      return undefined;
    }

    const { image, visible } = largest;
    const native = this.readPixelSize(image);
    const placedWIn = rectWidth(visible) / POINTS_PER_INCH;
    const placedHIn = rectHeight(visible) / POINTS_PER_INCH;
    const nativeDpiX = placedWIn > 0 ? native.width / placedWIn : 0;
    const nativeDpiY = placedHIn > 0 ? native.height / placedHIn : 0;

    return {
      imageId: image.id,
      nativePxW: native.width,
      nativePxH: native.height,
      placedWIn,
      placedHIn,
      nativeDpiX,
      nativeDpiY,
      nativeDpiMin:
        nativeDpiX > 0 && nativeDpiY > 0 ? Math.min(nativeDpiX, nativeDpiY) : 0,
    };
  }

  private findLargestImage(
    images: readonly PlacedImage[],
    clip: Rect,
  ): { image: PlacedImage; visible: Rect } | undefined {
    let best: { image: PlacedImage; visible: Rect } | undefined;
    let bestArea = 0;

    for (const image of images) {
      const visible = intersectRects(image.placement, clip);
      const area = rectArea(visible);
      if (area > bestArea) {
        best = { image, visible };
        bestArea = area;
      }
    }

    return best;
  }

  private readPixelSize(image: PlacedImage): PixelSize {
    try {
      const { width, height } = image.nativePixelSize();
      return {
        width: Number.isFinite(width) && width > 0 ? Math.trunc(width) : 0,
        height: Number.isFinite(height) && height > 0 ? Math.trunc(height) : 0,
      };
    } catch (error) {
      this.logger.warn(
        `[NativeResolutionEstimator] Could not decode image ${image.id}: ${error instanceof Error ? error.message : String(error)}`,
      );
      return { width: 0, height: 0 };
    }
  }
}
