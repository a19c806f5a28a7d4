import { describe, expect, test } from 'vitest';

import {
  clampRect,
  coverageDenominator,
  intersectRects,
  intersectionArea,
  makeRect,
  rectArea,
  rectHeight,
  rectWidth,
  rectsIntersect,
} from './rect-utils';

describe('rect-utils', () => {
  test('should compute width, height and area', () => {
    const rect = makeRect(10, 20, 110, 70);

    expect(rectWidth(rect)).toBe(100);
    expect(rectHeight(rect)).toBe(50);
    expect(rectArea(rect)).toBe(5000);
  });

  test('should treat inverted rects as zero area', () => {
    expect(rectArea(makeRect(50, 50, 10, 80))).toBe(0);
  });

  test('should intersect overlapping rects', () => {
    const result = intersectRects(makeRect(0, 0, 100, 100), makeRect(50, 25, 200, 75));

    expect(result).toEqual({ x0: 50, y0: 25, x1: 100, y1: 75 });
    expect(intersectionArea(makeRect(0, 0, 100, 100), makeRect(50, 25, 200, 75))).toBe(2500);
  });

  test('should return a zero-area rect for disjoint rects', () => {
    const result = intersectRects(makeRect(0, 0, 10, 10), makeRect(20, 20, 30, 30));

    expect(rectArea(result)).toBe(0);
    expect(result.x1).toBeGreaterThanOrEqual(result.x0);
    expect(result.y1).toBeGreaterThanOrEqual(result.y0);
  });

  test('should not report touching edges as intersecting', () => {
    expect(rectsIntersect(makeRect(0, 0, 10, 10), makeRect(10, 0, 20, 10))).toBe(false);
    expect(rectsIntersect(makeRect(0, 0, 10, 10), makeRect(9, 0, 20, 10))).toBe(true);
  });

  test('should clamp a rect to bounds', () => {
    const bounds = makeRect(0, 0, 612, 792);

    expect(clampRect(makeRect(-20, 700, 100, 900), bounds)).toEqual({
      x0: 0,
      y0: 700,
      x1: 100,
      y1: 792,
    });
  });

  test('should collapse a rect lying outside the bounds', () => {
    const clamped = clampRect(makeRect(700, 10, 800, 20), makeRect(0, 0, 612, 792));

    expect(clamped).toEqual({ x0: 612, y0: 10, x1: 612, y1: 20 });
    expect(rectArea(clamped)).toBe(0);
  });

  test('should never divide by less than one', () => {
    expect(coverageDenominator(makeRect(0, 0, 0, 0))).toBe(1);
    expect(coverageDenominator(makeRect(0, 0, 0.5, 0.5))).toBe(1);
    expect(coverageDenominator(makeRect(0, 0, 10, 10))).toBe(100);
  });
});
