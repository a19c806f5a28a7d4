export type { Rect } from './rect';
export type {
  DrawingObject,
  PageContent,
  PathOperatorKind,
  PixelSize,
  PlacedImage,
  TextBlock,
  TextBlockKind,
} from './page-content';
export type {
  ArtFormatLabel,
  CoverageMetrics,
  NativeRasterInfo,
} from './coverage-metrics';
export type { DetectionReport, RegionSource } from './detection-report';
export type { PdfDocumentHandle, PdfDocumentLoader } from './pdf-document';
