import type { DrawingObject, PageContent, Rect } from '@artform/model';

import { isUndefined, omitBy } from 'es-toolkit';

import { SEGMENT_COUNTER } from '../config/constants';
import { coverageDenominator, intersectionArea } from '../geometry/rect-utils';

/** Options for SegmentCounter (defaults from SEGMENT_COUNTER) */
export type SegmentCounterOptions = {
  hairlineWidth?: number;
  panelAreaFraction?: number;
  panelMaxItems?: number;
  minIntersectFraction?: number;
  /** Skip large low-detail rectangular panels (default: true) */
  skipPanels?: boolean;
};

/**
 * Counts vector path operators intersecting a clip.
 *
 * A coarse structural signal independent of area: catches vector art whose
 * measured coverage is small but whose geometry is clearly complex. Hairline
 * strokes, crumbs and template panels are ignored. Rectangle operators only
 * count on filled paths; filled paths count even without a stroke.
 */
export class SegmentCounter {
  private readonly options: Required<SegmentCounterOptions>;

  constructor(options: SegmentCounterOptions = {}) {
    this.options = {
      hairlineWidth: SEGMENT_COUNTER.HAIRLINE_WIDTH,
      panelAreaFraction: SEGMENT_COUNTER.PANEL_AREA_FRACTION,
      panelMaxItems: SEGMENT_COUNTER.PANEL_MAX_ITEMS,
      minIntersectFraction: SEGMENT_COUNTER.MIN_INTERSECT_FRACTION,
      skipPanels: true,
      ...omitBy(options, isUndefined),
    };
  }

  count(page: PageContent, clip: Rect): number {
    const clipArea = coverageDenominator(clip);
    let segments = 0;

    for (const drawing of page.getDrawings()) {
      if (!drawing.bounds) {
        continue;
      }
      const fraction = intersectionArea(drawing.bounds, clip) / clipArea;
      if (fraction <= 0 || fraction < this.options.minIntersectFraction) {
        continue;
      }
      if (this.isHairline(drawing) || this.isPanel(drawing, fraction)) {
        continue;
      }
      segments += this.countOperators(drawing);
    }

    return segments;
  }

  private countOperators(drawing: DrawingObject): number {
    return drawing.items.filter((op) => op !== 'rect' || drawing.fill).length;
  }

  private isHairline(drawing: DrawingObject): boolean {
    return !drawing.fill && drawing.strokeWidth <= this.options.hairlineWidth;
  }

  private isPanel(drawing: DrawingObject, fraction: number): boolean {
    return (
      this.options.skipPanels &&
      drawing.items.includes('rect') &&
      fraction >= this.options.panelAreaFraction &&
      drawing.items.length < this.options.panelMaxItems
    );
  }
}
