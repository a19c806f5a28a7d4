import type { Rect, RegionSource } from '@artform/model';

import type { ClipRequest } from '../types/detection-request-schema';

import { clampRect, makeRect } from '../geometry/rect-utils';
import { clipRequestSchema } from '../types/detection-request-schema';

export interface SelectedRegion {
  rect: Rect;
  source: RegionSource;
}

/**
 * Bottom half of the page: full width, split at the vertical midpoint.
 */
export function bottomHalf(pageBounds: Rect): Rect {
  const midY = pageBounds.y0 + (pageBounds.y1 - pageBounds.y0) / 2;
  return makeRect(pageBounds.x0, midY, pageBounds.x1, pageBounds.y1);
}

/**
 * Resolve the analysis rectangle for a page.
 *
 * An explicit page-space rectangle is clamped to the page. Anything missing or
 * malformed falls back to the bottom half of the page. Never throws.
 */
export function selectRegion(
  pageBounds: Rect,
  request?: ClipRequest,
): SelectedRegion {
  const parsed = clipRequestSchema.safeParse(request ?? {});
  if (!parsed.success) {
    return { rect: bottomHalf(pageBounds), source: 'bottom-half' };
  }

  const { x, y, width, height } = parsed.data;
  return {
    rect: clampRect(makeRect(x, y, x + width, y + height), pageBounds),
    source: 'clip',
  };
}
