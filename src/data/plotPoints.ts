import type { DataPoint, FunctionGenerator, PlotPoints, Vec2 } from '../config/types';

export const isFunctionGenerator = (points: PlotPoints): points is FunctionGenerator =>
  'fn' in points && typeof points.fn === 'function';

const getXY = (p: DataPoint): Vec2 => ('x' in p ? [p.x, p.y] : [p[0], p[1]]);

/**
 * Samples `fn` at `points` evenly spaced x values covering `xRange` inclusively.
 * A single sample sits at `xRange[0]`.
 */
export function sampleFunction(generator: FunctionGenerator): Vec2[] {
  const count = Number.isFinite(generator.points) ? Math.max(0, Math.floor(generator.points)) : 0;
  const [xMin, xMax] = generator.xRange;
  const span = xMax - xMin;
  const denom = Math.max(count - 1, 1);

  const out: Vec2[] = new Array(count);
  for (let i = 0; i < count; i++) {
    const x = xMin + (i / denom) * span;
    out[i] = [x, generator.fn(x)];
  }
  return out;
}

/**
 * Normalizes any `PlotPoints` form to `[x, y]` tuples, dropping points with a non-finite coordinate.
 */
export function normalizePlotPoints(points: PlotPoints): Vec2[] {
  const raw = isFunctionGenerator(points) ? sampleFunction(points) : points.map(getXY);
  return raw.filter(([x, y]) => Number.isFinite(x) && Number.isFinite(y));
}
