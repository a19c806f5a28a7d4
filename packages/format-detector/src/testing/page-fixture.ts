import type {
  DrawingObject,
  PageContent,
  PathOperatorKind,
  PixelSize,
  PlacedImage,
  Rect,
  TextBlock,
} from '@artform/model';

import { makeRect } from '../geometry/rect-utils';

/** US Letter in points */
export const LETTER_BOUNDS = makeRect(0, 0, 612, 792);

interface PageFixture {
  bounds?: Rect;
  images?: PlacedImage[];
  drawings?: DrawingObject[];
  textBlocks?: TextBlock[];
}

/**
 * In-memory PageContent for tests.
 */
export function createPage(fixture: PageFixture = {}): PageContent {
  const {
    bounds = LETTER_BOUNDS,
    images = [],
    drawings = [],
    textBlocks = [],
  } = fixture;
  return {
    bounds,
    getImages: () => images,
    getDrawings: () => drawings,
    getTextBlocks: () => textBlocks,
  };
}

/**
 * Placed image whose pixel size is `size`, or whose decode throws `size` when
 * it is an Error.
 */
export function createImage(
  id: string,
  placement: Rect,
  size: PixelSize | Error = { width: 0, height: 0 },
): PlacedImage {
  return {
    id,
    placement,
    nativePixelSize: () => {
      if (size instanceof Error) {
        throw size;
      }
      return size;
    },
  };
}

export function createDrawing(
  bounds: Rect | undefined,
  items: PathOperatorKind[],
  style: { fill?: boolean; strokeWidth?: number } = {},
): DrawingObject {
  return {
    bounds,
    items,
    fill: style.fill ?? false,
    strokeWidth: style.strokeWidth ?? 0,
  };
}

export function createTextBlock(
  bounds: Rect,
  kind: TextBlock['kind'] = 'text',
): TextBlock {
  return { bounds, kind };
}

/** A filled, unstroked curve path with `segments` operators */
export function createFilledGlyph(bounds: Rect, segments: number): DrawingObject {
  const items: PathOperatorKind[] = ['move'];
  for (let i = 1; i < segments - 1; i++) {
    items.push('curve');
  }
  items.push('close');
  return createDrawing(bounds, items.slice(0, segments), { fill: true });
}
