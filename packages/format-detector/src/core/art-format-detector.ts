import type { LoggerMethods } from '@artform/logger';
import type {
  ArtFormatLabel,
  CoverageMetrics,
  DetectionReport,
  NativeRasterInfo,
  PageContent,
  PdfDocumentHandle,
  PdfDocumentLoader,
  Rect,
} from '@artform/model';

import type { DecisionThresholds } from '../config/constants';
import type { CoverageOptions } from '../coverage/coverage-extractor';
import type { SegmentCounterOptions } from '../coverage/segment-counter';
import type { DecisionRule } from '../decision/decision-engine';
import type { SelectedRegion } from '../region/region-selector';
import type {
  ClipRequest,
  DetectionRequest,
  FormValue,
} from '../types/detection-request-schema';

import { createConsoleLogger } from '@artform/logger';

import { CoverageExtractor } from '../coverage/coverage-extractor';
import { SegmentCounter } from '../coverage/segment-counter';
import { DecisionEngine } from '../decision/decision-engine';
import { ClassificationError } from '../errors/classification-error';
import { selectRegion } from '../region/region-selector';
import { NativeResolutionEstimator } from '../resolution/native-resolution-estimator';
import { pageIndexSchema } from '../types/detection-request-schema';
import { formatReport } from '../utils/report-formatter';

type Options = {
  logger?: LoggerMethods;
  /** Overrides for individual decision thresholds */
  thresholds?: Partial<DecisionThresholds>;
  coverage?: CoverageOptions;
  segments?: SegmentCounterOptions;
};

export interface ClassificationResult {
  label: ArtFormatLabel;
  metrics: CoverageMetrics;
  region: SelectedRegion;
  /** Cascade rule that produced the label */
  rule: DecisionRule;
}

/**
 * ArtFormatDetector - decides whether a region of a PDF page needs a raster
 * proof or can be regenerated as vector art.
 *
 * ## Pipeline
 * 1. Resolve the region (explicit clip or bottom half of the page)
 * 2. Measure raster, text and weighted drawing coverage
 * 3. Count vector segments
 * 4. Estimate native DPI of the dominant raster
 * 5. Run the decision cascade
 *
 * Every request is independent; the detector holds configuration only.
 * `detect()` owns the document handle and closes it on every path.
 */
export class ArtFormatDetector {
  private readonly logger: LoggerMethods;
  private readonly coverageExtractor: CoverageExtractor;
  private readonly segmentCounter: SegmentCounter;
  private readonly resolutionEstimator: NativeResolutionEstimator;
  private readonly decisionEngine: DecisionEngine;

  constructor(options: Options = {}) {
    this.logger = options.logger ?? createConsoleLogger();
    this.coverageExtractor = new CoverageExtractor(options.coverage);
    this.segmentCounter = new SegmentCounter(options.segments);
    this.resolutionEstimator = new NativeResolutionEstimator(this.logger);
    this.decisionEngine = new DecisionEngine(options.thresholds);
  }

  /**
   * Classify a region of an already loaded page.
   *
   * @param page - Read-only page content
   * @param clipRequest - Optional explicit region; malformed input selects the bottom half
   */
  classify(page: PageContent, clipRequest?: ClipRequest): ClassificationResult {
    const region = selectRegion(page.bounds, clipRequest);
    const clip = region.rect;

    const coverage = this.coverageExtractor.measure(page, clip);
    const vectorSegments = this.segmentCounter.count(page, clip);
    const rasterCount = page.getImages().length;
    const nativeRaster = this.estimateNativeResolution(page, clip);

    const metrics: CoverageMetrics = {
      ...coverage,
      vectorSegments,
      rasterCount,
      ...(nativeRaster ? { nativeRaster } : {}),
    };

    const { label, rule } = this.decisionEngine.decide({
      rasterCoverage: coverage.rasterCoverage,
      effectiveVectorCoverage: coverage.effectiveVectorCoverage,
      textCoverage: coverage.textCoverage,
      vectorSegments,
      rasterCount,
      nativeDpiMin: nativeRaster?.nativeDpiMin ?? 0,
    });

    this.logger.debug(
      `[ArtFormatDetector] ${region.source} raster=${coverage.rasterCoverage.toFixed(4)} vector=${coverage.effectiveVectorCoverage.toFixed(4)} segments=${vectorSegments} → ${label} (${rule})`,
    );

    return { label, metrics, region, rule };
  }

  /**
   * Native resolution of the largest raster inside the clip.
   */
  estimateNativeResolution(
    page: PageContent,
    clip: Rect,
  ): NativeRasterInfo | undefined {
    return this.resolutionEstimator.estimate(page, clip);
  }

  /**
   * Open a document, classify one page and release the document.
   *
   * @param loader - Host PDF loader
   * @param source - Whatever the loader opens (path, buffer, ...)
   * @param request - Page index and optional clip, as form values
   * @returns Rounded report for the host
   * @throws ClassificationError when the document or page cannot be acquired
   */
  async detect<TSource>(
    loader: PdfDocumentLoader<TSource>,
    source: TSource,
    request: DetectionRequest = {},
  ): Promise<DetectionReport> {
    const pageIndex = this.parsePageIndex(request.pageIndex);
    const document = await this.openDocument(loader, source);

    try {
      this.logger.info(
        `[ArtFormatDetector] Classifying page ${pageIndex + 1}/${document.pageCount}`,
      );
      const page = await this.loadPage(document, pageIndex);
      const result = this.classify(page, request);

      this.logger.info(
        `[ArtFormatDetector] Page ${pageIndex + 1}: ${result.label}`,
      );
      return formatReport(result.label, result.metrics, result.region.source);
    } finally {
      await this.closeDocument(document);
    }
  }

  private parsePageIndex(value: FormValue): number {
    if (value === undefined) {
      return 0;
    }
    const parsed = pageIndexSchema.safeParse(value);
    if (!parsed.success) {
      throw new ClassificationError(
        'PAGE_INDEX_OUT_OF_RANGE',
        `Invalid page index: ${String(value)}`,
      );
    }
    return parsed.data;
  }

  private async openDocument<TSource>(
    loader: PdfDocumentLoader<TSource>,
    source: TSource,
  ): Promise<PdfDocumentHandle> {
    try {
      return await loader.open(source);
    } catch (error) {
      this.logger.error('[ArtFormatDetector] Failed to open document', error);
      throw ClassificationError.fromError(
        'DOCUMENT_OPEN_FAILED',
        'Failed to open document',
        error,
      );
    }
  }

  private async loadPage(
    document: PdfDocumentHandle,
    pageIndex: number,
  ): Promise<PageContent> {
    if (pageIndex >= document.pageCount) {
      throw new ClassificationError(
        'PAGE_INDEX_OUT_OF_RANGE',
        `Page index ${pageIndex} is out of range (document has ${document.pageCount} pages)`,
      );
    }

    try {
      return await document.loadPage(pageIndex);
    } catch (error) {
      throw ClassificationError.fromError(
        'PAGE_LOAD_FAILED',
        `Failed to load page ${pageIndex}`,
        error,
      );
    }
  }

  /**
   * Close failures are logged so they never mask the request's own outcome.
   */
  private async closeDocument(document: PdfDocumentHandle): Promise<void> {
    try {
      await document.close();
    } catch (error) {
      this.logger.warn(
        `[ArtFormatDetector] Failed to close document: ${ClassificationError.getErrorMessage(error)}`,
      );
    }
  }
}
