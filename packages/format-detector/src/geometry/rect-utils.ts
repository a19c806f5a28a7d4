import type { Rect } from '@artform/model';

/**
 * Create a rect from its edges.
 */
export function makeRect(x0: number, y0: number, x1: number, y1: number): Rect {
  return { x0, y0, x1, y1 };
}

export function rectWidth(rect: Rect): number {
  return Math.max(0, rect.x1 - rect.x0);
}

export function rectHeight(rect: Rect): number {
  return Math.max(0, rect.y1 - rect.y0);
}

/**
 * Area of a rect. Inverted rects have zero area.
 */
export function rectArea(rect: Rect): number {
  return rectWidth(rect) * rectHeight(rect);
}

/**
 * Intersection of two rects.
 * Disjoint rects yield a zero-area rect anchored at the overlap origin.
 */
export function intersectRects(a: Rect, b: Rect): Rect {
  const x0 = Math.max(a.x0, b.x0);
  const y0 = Math.max(a.y0, b.y0);
  return {
    x0,
    y0,
    x1: Math.max(x0, Math.min(a.x1, b.x1)),
    y1: Math.max(y0, Math.min(a.y1, b.y1)),
  };
}

export function intersectionArea(a: Rect, b: Rect): number {
  return rectArea(intersectRects(a, b));
}

/**
 * True when the rects share a region of positive area.
 */
export function rectsIntersect(a: Rect, b: Rect): boolean {
  return intersectionArea(a, b) > 0;
}

/**
 * Clamp `rect` inside `bounds`. The result is always normalized.
 */
export function clampRect(rect: Rect, bounds: Rect): Rect {
  const x0 = Math.min(Math.max(bounds.x0, rect.x0), bounds.x1);
  const y0 = Math.min(Math.max(bounds.y0, rect.y0), bounds.y1);
  return {
    x0,
    y0,
    x1: Math.max(x0, Math.min(bounds.x1, rect.x1)),
    y1: Math.max(y0, Math.min(bounds.y1, rect.y1)),
  };
}

/**
 * Divisor for coverage ratios; never below 1 so degenerate clips divide safely.
 */
export function coverageDenominator(clip: Rect): number {
  return Math.max(1, rectArea(clip));
}
