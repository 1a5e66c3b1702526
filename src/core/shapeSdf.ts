/**
 * Signed distance of a point in marker-local space ([-1, 1]²) to a marker outline.
 *
 * Marker-local space is screen-oriented: +y points down, so `triangle-up` has its apex at y = -1.
 *
 * Negative inside, ~0 on the outline, positive outside. Only the circle is a true Euclidean
 * distance; the other shapes use Chebyshev / Manhattan / half-plane approximations. The marker
 * stage's ±0.1 anti-aliasing band is tuned to these exact formulas, so they must stay in sync
 * with `shape_sdf` in `plot.wgsl`.
 */

import { MARKER_SHAPES, type MarkerShapeName, type Vec2 } from '../config/types';

const SQUARE_HALF_SIZE = 0.7;
const TRIANGLE_HALF_BASE = 0.7;
const TRIANGLE_BASE_OFFSET = 0.5;
const COS_30 = 0.866;
const STROKE_HALF_THICKNESS = 0.2;

const assertUnreachable = (value: never): never => {
  throw new Error(`Unhandled marker shape: ${String(value)}`);
};

export const sdfCircle = (p: Vec2): number => Math.hypot(p[0], p[1]) - 1;

export const sdfSquare = (p: Vec2): number => Math.max(Math.abs(p[0]), Math.abs(p[1])) - SQUARE_HALF_SIZE;

export const sdfDiamond = (p: Vec2): number => Math.abs(p[0]) + Math.abs(p[1]) - 1;

// Mirror of `sdfTriangleDown` about the X axis (y → -y).
export const sdfTriangleUp = (p: Vec2): number => {
  const ax = Math.abs(p[0]);
  return Math.max(
    ax - TRIANGLE_HALF_BASE,
    p[1] - TRIANGLE_BASE_OFFSET,
    (ax * COS_30 - p[1]) * 0.5 - 0.5
  );
};

export const sdfTriangleDown = (p: Vec2): number => {
  const ax = Math.abs(p[0]);
  return Math.max(
    ax - TRIANGLE_HALF_BASE,
    -p[1] - TRIANGLE_BASE_OFFSET,
    (ax * COS_30 + p[1]) * 0.5 - 0.5
  );
};

export const sdfCross = (p: Vec2): number => {
  const ax = Math.abs(p[0]);
  const ay = Math.abs(p[1]);
  // Both diagonals at once: |ax - ay| is the distance-like offset from either diagonal.
  const band = Math.abs(ax - ay) - STROKE_HALF_THICKNESS;
  const bounds = Math.max(ax, ay) - 1;
  return Math.max(band, bounds);
};

export const sdfPlus = (p: Vec2): number => {
  const ax = Math.abs(p[0]);
  const ay = Math.abs(p[1]);
  const d1 = Math.max(ax, ay) - STROKE_HALF_THICKNESS;
  const d2 = Math.min(ax, ay) - STROKE_HALF_THICKNESS;
  const bounds = Math.max(ax, ay) - 1;
  return Math.max(Math.min(d1, d2), bounds);
};

/**
 * `'none'` is evaluated as a circle; the marker stage discards it before ever asking.
 */
export function evaluateShapeSdf(p: Vec2, shape: MarkerShapeName): number {
  switch (shape) {
    case 'circle':
      return sdfCircle(p);
    case 'square':
      return sdfSquare(p);
    case 'diamond':
      return sdfDiamond(p);
    case 'triangle-up':
      return sdfTriangleUp(p);
    case 'triangle-down':
      return sdfTriangleDown(p);
    case 'cross':
      return sdfCross(p);
    case 'plus':
      return sdfPlus(p);
    case 'none':
      return sdfCircle(p);
    default:
      return assertUnreachable(shape);
  }
}

export const markerShapeTag = (shape: MarkerShapeName): number => MARKER_SHAPES.indexOf(shape);

/**
 * Maps a wire tag back to a shape. Anything that is not an integer in 0..7 is a circle.
 */
export function resolveMarkerShapeTag(tag: number): MarkerShapeName {
  if (!Number.isInteger(tag) || tag < 0 || tag >= MARKER_SHAPES.length) return 'circle';
  return MARKER_SHAPES[tag] ?? 'circle';
}

export const evaluateShapeSdfForTag = (p: Vec2, tag: number): number =>
  evaluateShapeSdf(p, resolveMarkerShapeTag(tag));
