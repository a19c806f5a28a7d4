export { ArtFormatDetector } from './core/art-format-detector';
export type { ClassificationResult } from './core/art-format-detector';
export {
  COVERAGE_WEIGHTS,
  DECISION_THRESHOLDS,
  POINTS_PER_INCH,
  REGION,
  SEGMENT_COUNTER,
  resolveDecisionThresholds,
} from './config/constants';
export type { DecisionThresholds } from './config/constants';
export { CoverageExtractor } from './coverage/coverage-extractor';
export type {
  CoverageOptions,
  DrawingShape,
  RegionCoverage,
} from './coverage/coverage-extractor';
export { SegmentCounter } from './coverage/segment-counter';
export type { SegmentCounterOptions } from './coverage/segment-counter';
export { DecisionEngine } from './decision/decision-engine';
export type {
  Decision,
  DecisionInput,
  DecisionRule,
} from './decision/decision-engine';
export { ClassificationError } from './errors/classification-error';
export type { ClassificationFailureReason } from './errors/classification-error';
export {
  clampRect,
  intersectRects,
  intersectionArea,
  makeRect,
  rectArea,
  rectsIntersect,
} from './geometry/rect-utils';
export { bottomHalf, selectRegion } from './region/region-selector';
export type { SelectedRegion } from './region/region-selector';
export { NativeResolutionEstimator } from './resolution/native-resolution-estimator';
export type {
  ClipRequest,
  DetectionRequest,
  FormValue,
} from './types/detection-request-schema';
export { formatReport } from './utils/report-formatter';
