import type {
  ArtFormatLabel,
  CoverageMetrics,
  DetectionReport,
  NativeRasterInfo,
  RegionSource,
} from '@artform/model';

import { round } from 'es-toolkit';

/**
 * Round metrics for display: coverage to 4 decimals, placed inches to 3,
 * DPI to 1. `nativeRaster` is left out when no raster intersects the region.
 */
export function formatReport(
  label: ArtFormatLabel,
  metrics: CoverageMetrics,
  region: RegionSource,
): DetectionReport {
  const { nativeRaster } = metrics;
  return {
    format: label,
    metrics: {
      region,
      rasterCoverage: round(metrics.rasterCoverage, 4),
      textCoverage: round(metrics.textCoverage, 4),
      drawingCoverage: round(metrics.drawingCoverage, 4),
      effectiveVectorCoverage: round(metrics.effectiveVectorCoverage, 4),
      vectorSegments: metrics.vectorSegments,
      rasterCount: metrics.rasterCount,
      ...(nativeRaster ? { nativeRaster: formatNativeRaster(nativeRaster) } : {}),
    },
  };
}

function formatNativeRaster(info: NativeRasterInfo): NativeRasterInfo {
  return {
    ...info,
    placedWIn: round(info.placedWIn, 3),
    placedHIn: round(info.placedHIn, 3),
    nativeDpiX: round(info.nativeDpiX, 1),
    nativeDpiY: round(info.nativeDpiY, 1),
    nativeDpiMin: round(info.nativeDpiMin, 1),
  };
}
