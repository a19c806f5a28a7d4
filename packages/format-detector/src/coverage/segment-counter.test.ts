import { describe, expect, test } from 'vitest';

import { makeRect } from '../geometry/rect-utils';
import {
  createDrawing,
  createFilledGlyph,
  createPage,
} from '../testing/page-fixture';
import { SegmentCounter } from './segment-counter';

const CLIP = makeRect(0, 0, 100, 100);

describe('SegmentCounter', () => {
  const counter = new SegmentCounter();

  test('should count every operator of a stroked path', () => {
    const page = createPage({
      drawings: [
        createDrawing(makeRect(10, 10, 30, 30), ['move', 'line', 'curve', 'close'], {
          strokeWidth: 1,
        }),
      ],
    });

    expect(counter.count(page, CLIP)).toBe(4);
  });

  test('should count filled paths without a stroke', () => {
    const page = createPage({
      drawings: [createFilledGlyph(makeRect(10, 10, 20, 20), 6)],
    });

    expect(counter.count(page, CLIP)).toBe(6);
  });

  test('should count rectangle operators only on filled paths', () => {
    const page = createPage({
      drawings: [
        createDrawing(makeRect(0, 0, 10, 10), ['rect', 'move', 'line'], {
          strokeWidth: 1,
        }),
        createDrawing(makeRect(20, 20, 30, 30), ['rect', 'move', 'line'], {
          fill: true,
        }),
      ],
    });

    expect(counter.count(page, CLIP)).toBe(2 + 3);
  });

  test('should ignore hairline unfilled strokes', () => {
    const page = createPage({
      drawings: [
        createDrawing(makeRect(0, 0, 50, 50), ['move', 'line', 'line'], {
          strokeWidth: 0.25,
        }),
      ],
    });

    expect(counter.count(page, CLIP)).toBe(0);
  });

  test('should ignore drawings outside the clip or without bounds', () => {
    const page = createPage({
      drawings: [
        createFilledGlyph(makeRect(200, 200, 250, 250), 10),
        createDrawing(undefined, ['move', 'line'], { fill: true }),
        createFilledGlyph(makeRect(100, 0, 150, 50), 10),
      ],
    });

    expect(counter.count(page, CLIP)).toBe(0);
  });

  test('should ignore crumbs below the minimum intersect fraction', () => {
    const page = createPage({
      drawings: [createFilledGlyph(makeRect(0, 0, 2, 2), 10)],
    });

    expect(counter.count(page, CLIP)).toBe(0);
  });

  test('should skip large low-detail rectangular panels', () => {
    const panel = createDrawing(
      makeRect(0, 0, 100, 50),
      ['rect', 'move', 'line', 'close'],
      { fill: true },
    );
    const page = createPage({ drawings: [panel] });

    expect(counter.count(page, CLIP)).toBe(0);
    expect(new SegmentCounter({ skipPanels: false }).count(page, CLIP)).toBe(4);
  });

  test('should keep large rectangular shapes with enough detail', () => {
    const detailed = createDrawing(
      makeRect(0, 0, 100, 50),
      ['rect', 'move', 'line', 'line', 'line', 'curve', 'curve', 'close'],
      { fill: true },
    );

    expect(counter.count(createPage({ drawings: [detailed] }), CLIP)).toBe(8);
  });

  test('should return zero for a degenerate clip', () => {
    const page = createPage({
      drawings: [createFilledGlyph(makeRect(0, 0, 612, 792), 12)],
    });

    expect(counter.count(page, makeRect(50, 50, 50, 50))).toBe(0);
  });
});
