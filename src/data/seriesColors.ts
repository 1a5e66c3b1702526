import type { ColorMode, Rgba, Vec2 } from '../config/types';
import { lerpRgba, sampleColormap } from '../utils/colormap';

/**
 * Resolves one color per point.
 *
 * Value-based modes normalize Y against `yRange` (the plot's Y axis), so colors stay
 * comparable across series. A zero-width range maps every point to t = 0.
 */
export function resolvePointColors(
  points: ReadonlyArray<Vec2>,
  seriesColor: Rgba,
  mode: ColorMode,
  yRange: Vec2
): Rgba[] {
  const [yMin, yMax] = yRange;
  const ySpan = yMax - yMin;
  const normalizeY = (y: number): number => (ySpan > 0 ? (y - yMin) / ySpan : 0);
  const lastIndex = Math.max(points.length - 1, 1);

  switch (mode.type) {
    case 'solid':
      return points.map(() => seriesColor);
    case 'value-gradient':
      return points.map(([, y]) => lerpRgba(mode.low, mode.high, normalizeY(y)));
    case 'index-gradient':
      return points.map((_, i) => lerpRgba(mode.start, mode.end, i / lastIndex));
    case 'colormap':
      return points.map(([, y]) => sampleColormap(mode.name, normalizeY(y)));
  }
}
