import type { ArtFormatLabel } from '@artform/model';

import {
  type DecisionThresholds,
  resolveDecisionThresholds,
} from '../config/constants';

/**
 * Scalar inputs of the decision cascade
 */
export interface DecisionInput {
  rasterCoverage: number;
  effectiveVectorCoverage: number;
  textCoverage: number;
  vectorSegments: number;
  rasterCount: number;
  /** Minimum native DPI of the dominant raster, 0 when unknown */
  nativeDpiMin: number;
}

/** Cascade rules, in evaluation order */
export type DecisionRule =
  | 'no-raster'
  | 'raster-margin'
  | 'vector-margin'
  | 'raster-dominant'
  | 'pure-vector'
  | 'low-detail-raster'
  | 'default-raster';

export interface Decision {
  label: ArtFormatLabel;
  rule: DecisionRule;
}

/**
 * Turns coverage signals into a two-valued label.
 *
 * Rules are evaluated top to bottom and the first match wins:
 *
 * 1. no-raster: essentially no image plus any vector/text signal (or no
 *    image on the page at all) → vector
 * 2. raster-margin: raster beats vector by a small margin → raster
 * 3. vector-margin: vector beats raster by a large margin → vector
 * 4. raster-dominant: sizable raster and modest vector → raster
 * 5. pure-vector: negligible raster but many segments → vector
 * 6. low-detail-raster: a low-DPI raster against real vector structure → vector
 * 7. default → raster; text shouldn't override a big photo
 *
 * Raster wins on a tiny margin while vector needs a large one, because
 * coverage heuristics overstate vector area through panels and backgrounds.
 */
export class DecisionEngine {
  readonly thresholds: DecisionThresholds;

  constructor(overrides: Partial<DecisionThresholds> = {}) {
    this.thresholds = resolveDecisionThresholds(overrides);
  }

  decide(input: DecisionInput): Decision {
    const t = this.thresholds;
    const {
      rasterCoverage: raster,
      effectiveVectorCoverage: vector,
      textCoverage,
      vectorSegments,
      rasterCount,
      nativeDpiMin,
    } = input;

    if (
      raster <= t.NO_RASTER_MAX_COVERAGE &&
      (vector >= t.NO_RASTER_MIN_VECTOR_COVERAGE ||
        textCoverage >= t.NO_RASTER_MIN_TEXT_COVERAGE ||
        rasterCount === 0 ||
        vectorSegments >= t.NO_RASTER_MIN_SEGMENTS)
    ) {
      return { label: 'has_vector', rule: 'no-raster' };
    }

    if (raster >= vector + t.RASTER_MARGIN) {
      return { label: 'has_raster', rule: 'raster-margin' };
    }

    if (vector >= raster + t.VECTOR_MARGIN) {
      return { label: 'has_vector', rule: 'vector-margin' };
    }

    if (
      raster >= t.CLOSE_RASTER_MIN_COVERAGE &&
      vector <= t.CLOSE_VECTOR_MAX_COVERAGE
    ) {
      return { label: 'has_raster', rule: 'raster-dominant' };
    }

    if (
      raster <= t.PURE_VECTOR_MAX_RASTER_COVERAGE &&
      vectorSegments >= t.PURE_VECTOR_MIN_SEGMENTS
    ) {
      return { label: 'has_vector', rule: 'pure-vector' };
    }

    if (
      vectorSegments >= t.LOW_DETAIL_MIN_SEGMENTS &&
      nativeDpiMin > 0 &&
      nativeDpiMin < t.LOW_DETAIL_MAX_DPI &&
      raster >= t.LOW_DETAIL_MIN_RASTER_COVERAGE
    ) {
      return { label: 'has_vector', rule: 'low-detail-raster' };
    }

    return { label: 'has_raster', rule: 'default-raster' };
  }
}
