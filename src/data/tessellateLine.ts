/**
 * CPU tessellation of a data-space polyline into screen-space line triangles.
 *
 * Each segment becomes an independent quad (two triangles, 6 vertices); joins are left to the
 * overlap of neighbouring quads. Vertex order per segment, with `n` the left-hand normal:
 *
 *   v0 = start + n, v1 = start - n, v2 = end + n, v3 = end - n
 *   triangles (v0, v1, v2) and (v1, v3, v2)
 */

import type { LinePattern, LineVertex, PlotUniforms, Rgba, Vec2 } from '../config/types';
import { mapDataToScreen } from '../core/coordinateMapper';

/** Segments shorter than this many pixels are dropped. */
export const MIN_SEGMENT_LENGTH_PX = 0.001;

export interface TessellateLineOptions {
  /** One color per point; the segment takes the color of its first point. */
  readonly colors: ReadonlyArray<Rgba>;
  readonly pattern?: LinePattern;
  /** Extra pixels of geometry outside each nominal edge. Defaults to 0. */
  readonly fringe?: number;
}

export function tessellateLine(
  points: ReadonlyArray<Vec2>,
  uniforms: PlotUniforms,
  options: TessellateLineOptions
): LineVertex[] {
  if (points.length < 2) return [];

  const pattern = options.pattern ?? 'solid';
  const fringeRaw = options.fringe ?? 0;
  const fringe = Number.isFinite(fringeRaw) && fringeRaw > 0 ? fringeRaw : 0;
  const halfWidth = uniforms.lineWidth / 2;
  if (!(halfWidth > 0)) return [];

  const outer = halfWidth + fringe;
  const edge = outer / halfWidth;
  const fallbackColor: Rgba = [0, 0, 0, 1];

  const vertices: LineVertex[] = [];
  let distance = 0;
  let prev = mapDataToScreen(points[0] ?? [0, 0], uniforms);

  for (let i = 1; i < points.length; i++) {
    const cur = mapDataToScreen(points[i] ?? [0, 0], uniforms);
    const [sx0, sy0] = prev;
    const [sx1, sy1] = cur;
    const dx = sx1 - sx0;
    const dy = sy1 - sy0;
    const len = Math.sqrt(dx * dx + dy * dy);
    prev = cur;

    // Also drops segments whose endpoints mapped to NaN.
    if (!(len >= MIN_SEGMENT_LENGTH_PX)) continue;

    const nx = (-dy / len) * outer;
    const ny = (dx / len) * outer;
    const color = options.colors[i - 1] ?? fallbackColor;
    const d0 = distance;
    const d1 = distance + len;
    distance = d1;

    const v0: LineVertex = { position: [sx0 + nx, sy0 + ny], color, edgeDistance: edge, lineDistance: d0, pattern };
    const v1: LineVertex = { position: [sx0 - nx, sy0 - ny], color, edgeDistance: -edge, lineDistance: d0, pattern };
    const v2: LineVertex = { position: [sx1 + nx, sy1 + ny], color, edgeDistance: edge, lineDistance: d1, pattern };
    const v3: LineVertex = { position: [sx1 - nx, sy1 - ny], color, edgeDistance: -edge, lineDistance: d1, pattern };

    vertices.push(v0, v1, v2, v1, v3, v2);
  }

  return vertices;
}
