import type { Rect } from './rect';

/** Native pixel dimensions of an encoded raster */
export interface PixelSize {
  width: number;
  height: number;
}

/**
 * A raster image placed on a page.
 */
export interface PlacedImage {
  /** Opaque identifier from the host document (e.g. an xref number) */
  readonly id: string;

  /** Where the image is drawn on the page */
  readonly placement: Rect;

  /**
   * Decode the pixel size from the image's encoded data.
   * May throw when the stream cannot be read.
   */
  nativePixelSize(): PixelSize;
}

/** Path construction operators found in a drawing */
export type PathOperatorKind = 'move' | 'line' | 'curve' | 'rect' | 'close';

/**
 * A vector drawing (one filled and/or stroked path group).
 */
export interface DrawingObject {
  /** Bounding box; absent when the host could not compute one */
  readonly bounds?: Rect;

  /** Nominal stroke width, 0 when the path is not stroked */
  readonly strokeWidth: number;

  /** Whether the path is filled */
  readonly fill: boolean;

  /** Path operators in drawing order */
  readonly items: readonly PathOperatorKind[];
}

export type TextBlockKind = 'text' | 'image' | 'table';

export interface TextBlock {
  readonly bounds: Rect;
  readonly kind: TextBlockKind;
}

/**
 * Read-only view of one PDF page's geometric primitives.
 *
 * Implemented by the host on top of its PDF object model. The detector never
 * writes through this interface.
 */
export interface PageContent {
  /** Page bounding box */
  readonly bounds: Rect;

  getImages(): readonly PlacedImage[];
  getDrawings(): readonly DrawingObject[];
  getTextBlocks(): readonly TextBlock[];
}
