import type { ArtFormatLabel, CoverageMetrics } from './coverage-metrics';

/** Which rectangle was analysed */
export type RegionSource = 'clip' | 'bottom-half';

/**
 * Display form of a classification, as returned to the host.
 * Numbers are rounded for presentation.
 */
export interface DetectionReport {
  format: ArtFormatLabel;
  metrics: CoverageMetrics & {
    region: RegionSource;
  };
}
