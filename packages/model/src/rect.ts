/**
 * Axis-aligned box in page space.
 *
 * Units are PDF points (72 pt = 1 inch), origin at the top-left of the page
 * with y growing downwards. A rect is normalized when `x1 >= x0` and
 * `y1 >= y0`; zero-area rects are valid.
 */
export interface Rect {
  readonly x0: number;
  readonly y0: number;
  readonly x1: number;
  readonly y1: number;
}
