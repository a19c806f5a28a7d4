import { isUndefined, omitBy } from 'es-toolkit';

/**
 * Page-space unit conversion
 */
export const POINTS_PER_INCH = 72;

/**
 * Configuration constants for region selection
 */
export const REGION = {
  /**
   * `coordsOrigin` value marking x/y/width/height as PDF page-space points
   */
  PAGE_SPACE_ORIGIN: 'pdf',
} as const;

/**
 * Weights and shape limits for drawing coverage.
 *
 * Large flat panels are template chrome, not art, so they barely count.
 * Drawing coverage is further damped by `DRAWING_WEIGHT` before it is
 * combined with text coverage.
 */
export const COVERAGE_WEIGHTS = {
  /**
   * Weight for a large filled panel (background/template chrome)
   */
  PANEL_WEIGHT: 0.05,

  /**
   * Weight for a rectangle-operator shape below the panel threshold
   */
  RECT_WEIGHT: 0.15,

  /**
   * Weight for any other vector shape
   */
  SHAPE_WEIGHT: 0.35,

  /**
   * Fraction of the clip a shape must cover to count as a panel
   */
  PANEL_AREA_FRACTION: 0.15,

  /**
   * Maximum path items for a filled, unstroked shape to count as a panel
   */
  PANEL_MAX_ITEMS: 5,

  /**
   * Unfilled strokes thinner than this are guide lines and ignored
   */
  HAIRLINE_WIDTH: 0.25,

  /**
   * Damping applied to drawing coverage in the effective vector coverage
   */
  DRAWING_WEIGHT: 0.5,
} as const;

/**
 * Configuration constants for SegmentCounter
 */
export const SEGMENT_COUNTER = {
  /**
   * Unfilled strokes at or below this width are ignored
   */
  HAIRLINE_WIDTH: 0.25,

  /**
   * Fraction of the clip a rectangular shape must cover to count as a panel
   */
  PANEL_AREA_FRACTION: 0.15,

  /**
   * Panels have fewer path items than this
   */
  PANEL_MAX_ITEMS: 8,

  /**
   * Drawings covering less than this fraction of the clip are crumbs
   */
  MIN_INTERSECT_FRACTION: 0.0005,
} as const;

/**
 * Thresholds of the decision cascade.
 *
 * None of these are derived; they are tuned by hand and individually
 * overridable through `DecisionEngine` options.
 */
export const DECISION_THRESHOLDS = {
  /**
   * Raster coverage at or below this counts as "no raster" (rule 1)
   */
  NO_RASTER_MAX_COVERAGE: 0.02,

  /**
   * Effective vector coverage that counts as a vector signal under rule 1
   */
  NO_RASTER_MIN_VECTOR_COVERAGE: 0.03,

  /**
   * Text coverage that counts as a vector signal under rule 1
   */
  NO_RASTER_MIN_TEXT_COVERAGE: 0.025,

  /**
   * Segment count that counts as a vector signal under rule 1
   */
  NO_RASTER_MIN_SEGMENTS: 20,

  /**
   * Margin raster coverage needs over vector coverage to win (rule 2)
   */
  RASTER_MARGIN: 0.01,

  /**
   * Margin vector coverage needs over raster coverage to win (rule 3)
   */
  VECTOR_MARGIN: 0.12,

  /**
   * Rule 4: raster at least this much...
   */
  CLOSE_RASTER_MIN_COVERAGE: 0.15,

  /**
   * ...while vector stays at or below this
   */
  CLOSE_VECTOR_MAX_COVERAGE: 0.3,

  /**
   * Rule 5: raster at or below this with many segments is pure vector
   */
  PURE_VECTOR_MAX_RASTER_COVERAGE: 0.03,

  PURE_VECTOR_MIN_SEGMENTS: 40,

  /**
   * Rule 6: segments needed to out-rank a low-detail raster
   */
  LOW_DETAIL_MIN_SEGMENTS: 18,

  /**
   * Rule 6: rasters below this DPI are flat placeholders
   */
  LOW_DETAIL_MAX_DPI: 40,

  /**
   * Rule 6: minimum raster coverage for the override to apply
   */
  LOW_DETAIL_MIN_RASTER_COVERAGE: 0.1,
} as const;

/**
 * Overridable decision thresholds
 */
export type DecisionThresholds = {
  -readonly [K in keyof typeof DECISION_THRESHOLDS]: number;
};

/**
 * Merge overrides onto the default decision thresholds.
 */
export function resolveDecisionThresholds(
  overrides: Partial<DecisionThresholds> = {},
): DecisionThresholds {
  return { ...DECISION_THRESHOLDS, ...omitBy(overrides, isUndefined) };
}
