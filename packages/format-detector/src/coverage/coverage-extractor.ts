import type { DrawingObject, PageContent, Rect } from '@artform/model';

import { clamp, isUndefined, omitBy, sumBy } from 'es-toolkit';

import { COVERAGE_WEIGHTS } from '../config/constants';
import { coverageDenominator, intersectionArea } from '../geometry/rect-utils';

/** Options for CoverageExtractor (defaults from COVERAGE_WEIGHTS) */
export type CoverageOptions = {
  panelWeight?: number;
  rectWeight?: number;
  shapeWeight?: number;
  panelAreaFraction?: number;
  panelMaxItems?: number;
  hairlineWidth?: number;
  /** Damping of drawing coverage in the effective vector coverage */
  drawingWeight?: number;
};

export interface RegionCoverage {
  rasterCoverage: number;
  textCoverage: number;
  drawingCoverage: number;
  effectiveVectorCoverage: number;
}

/** How a drawing was classified for weighting */
export type DrawingShape = 'panel' | 'rect' | 'shape';

const clamp01 = (value: number): number => clamp(value, 0, 1);

/**
 * Measures how much of a region is covered by rasters, text and vector drawings.
 *
 * Every ratio is relative to the clip area (never below 1 pt²) and clamped to
 * [0, 1]. Overlaps between objects are not deduplicated.
 *
 * Drawing coverage is weighted by shape: large filled panels are background
 * chrome and count at `panelWeight`, plain rectangles at `rectWeight`, and
 * everything else at `shapeWeight`.
 */
export class CoverageExtractor {
  private readonly options: Required<CoverageOptions>;

  constructor(options: CoverageOptions = {}) {
    this.options = {
      panelWeight: COVERAGE_WEIGHTS.PANEL_WEIGHT,
      rectWeight: COVERAGE_WEIGHTS.RECT_WEIGHT,
      shapeWeight: COVERAGE_WEIGHTS.SHAPE_WEIGHT,
      panelAreaFraction: COVERAGE_WEIGHTS.PANEL_AREA_FRACTION,
      panelMaxItems: COVERAGE_WEIGHTS.PANEL_MAX_ITEMS,
      hairlineWidth: COVERAGE_WEIGHTS.HAIRLINE_WIDTH,
      drawingWeight: COVERAGE_WEIGHTS.DRAWING_WEIGHT,
      ...omitBy(options, isUndefined),
    };
  }

  /**
   * Compute all coverage ratios for a clip.
   */
  measure(page: PageContent, clip: Rect): RegionCoverage {
    const rasterCoverage = this.rasterCoverage(page, clip);
    const textCoverage = this.textCoverage(page, clip);
    const drawingCoverage = this.drawingCoverage(page, clip);

    return {
      rasterCoverage,
      textCoverage,
      drawingCoverage,
      effectiveVectorCoverage: this.effectiveVectorCoverage(
        textCoverage,
        drawingCoverage,
      ),
    };
  }

  rasterCoverage(page: PageContent, clip: Rect): number {
    const covered = sumBy([...page.getImages()], (image) =>
      intersectionArea(image.placement, clip),
    );
    return clamp01(covered / coverageDenominator(clip));
  }

  /**
   * Text coverage; non-text blocks (images, tables) are skipped.
   */
  textCoverage(page: PageContent, clip: Rect): number {
    const textBlocks = page
      .getTextBlocks()
      .filter((block) => block.kind === 'text');
    const covered = sumBy(textBlocks, (block) =>
      intersectionArea(block.bounds, clip),
    );
    return clamp01(covered / coverageDenominator(clip));
  }

  drawingCoverage(page: PageContent, clip: Rect): number {
    const clipArea = coverageDenominator(clip);
    let weighted = 0;

    for (const drawing of page.getDrawings()) {
      if (!drawing.bounds) {
        continue;
      }
      const area = intersectionArea(drawing.bounds, clip);
      if (area <= 0 || this.isHairline(drawing)) {
        continue;
      }
      weighted += area * this.weightFor(this.classify(drawing, area / clipArea));
    }

    return clamp01(weighted / clipArea);
  }

  /**
   * Text counts in full; drawings are damped so decorative panels cannot
   * out-rank photographic content.
   */
  effectiveVectorCoverage(textCoverage: number, drawingCoverage: number): number {
    return clamp01(textCoverage + this.options.drawingWeight * drawingCoverage);
  }

  /**
   * Classify a drawing given the fraction of the clip it covers.
   */
  classify(drawing: DrawingObject, intersectFraction: number): DrawingShape {
    const { panelAreaFraction, panelMaxItems } = this.options;
    const isRect = drawing.items.includes('rect');
    const isLarge = intersectFraction >= panelAreaFraction;
    const isFlatFill =
      drawing.fill &&
      drawing.strokeWidth <= 0 &&
      drawing.items.length <= panelMaxItems;

    if (isLarge && (isRect || isFlatFill)) {
      return 'panel';
    }
    return isRect ? 'rect' : 'shape';
  }

  private weightFor(shape: DrawingShape): number {
    switch (shape) {
      case 'panel':
        return this.options.panelWeight;
      case 'rect':
        return this.options.rectWeight;
      case 'shape':
        return this.options.shapeWeight;
    }
  }

  private isHairline(drawing: DrawingObject): boolean {
    return !drawing.fill && drawing.strokeWidth < this.options.hairlineWidth;
  }
}
