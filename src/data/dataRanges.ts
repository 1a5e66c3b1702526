import type { Vec2 } from '../config/types';

export interface DataRanges {
  readonly xRange: Vec2;
  readonly yRange: Vec2;
}

/** Half-extent used to open up an axis whose data is constant. */
const CONSTANT_AXIS_HALF_SPAN = 0.5;

/** Spacing of f32 values relative to their magnitude. */
const F32_RELATIVE_EPSILON = 2 ** -23;

const collapsesInF32 = (min: number, max: number): boolean =>
  !(Math.fround(max) > Math.fround(min)) || !Number.isFinite(Math.fround(max - min));

const widenIfDegenerate = (min: number, max: number): Vec2 => {
  if (Math.abs(max - min) >= Number.EPSILON && !collapsesInF32(min, max)) return [min, max];

  const center = (min + max) / 2;
  let half = Math.max(CONSTANT_AXIS_HALF_SPAN, Math.abs(center) * F32_RELATIVE_EPSILON);
  // Values beyond the f32 range never separate; stop once doubling overflows.
  while (collapsesInF32(center - half, center + half) && Number.isFinite(half * 2)) {
    half *= 2;
  }
  return [center - half, center + half];
};

/**
 * Fits (min, max) ranges over every finite point of every series.
 *
 * No points yields (0, 1) on both axes. An axis whose values are all equal is widened by ±0.5
 * around them, or by more when its magnitude is large enough that f32 would still see a single
 * value; the same widening applies to distinct values that round to one f32.
 */
export function computeDataRanges(series: ReadonlyArray<ReadonlyArray<Vec2>>): DataRanges {
  let xMin = Number.POSITIVE_INFINITY;
  let xMax = Number.NEGATIVE_INFINITY;
  let yMin = Number.POSITIVE_INFINITY;
  let yMax = Number.NEGATIVE_INFINITY;

  for (const points of series) {
    for (const [x, y] of points) {
      if (!Number.isFinite(x) || !Number.isFinite(y)) continue;
      if (x < xMin) xMin = x;
      if (x > xMax) xMax = x;
      if (y < yMin) yMin = y;
      if (y > yMax) yMax = y;
    }
  }

  if (xMin > xMax) {
    return { xRange: [0, 1], yRange: [0, 1] };
  }

  return { xRange: widenIfDegenerate(xMin, xMax), yRange: widenIfDegenerate(yMin, yMax) };
}
