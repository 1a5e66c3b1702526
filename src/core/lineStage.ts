/**
 * CPU reference of the line pipeline (`vsLine` / `fsLine` in `plot.wgsl`).
 *
 * Line geometry arrives pre-tessellated in screen pixels (see `tessellateLine`). The vertex step
 * only converts to NDC; the fragment step applies the dash pattern, then fades alpha between
 * |edgeDistance| 0.8 and 1.0.
 */

import { LINE_PATTERNS, type LinePattern, type LineVertex, type PlotUniforms, type Rgba, type Vec2 } from '../config/types';
import { floorMod, smoothstep } from '../utils/math';
import { mapScreenToNdc } from './coordinateMapper';

export const LINE_AA_START = 0.8;
export const LINE_AA_END = 1.0;
/** Fragments fainter than this are dropped instead of blended. */
export const LINE_MIN_ALPHA = 0.001;

/**
 * Alternating on/off run lengths in multiples of the line width, starting with "on".
 * `solid` and `none` have no runs.
 */
export const LINE_PATTERN_RUNS: Readonly<Record<LinePattern, ReadonlyArray<number>>> = {
  solid: [],
  dashed: [4, 2],
  dotted: [1, 1],
  'dash-dot': [4, 1.5, 1, 1.5],
  none: [],
};

export interface LineVertexOutput {
  readonly clipPosition: Vec2;
  readonly color: Rgba;
  readonly edgeDistance: number;
  readonly lineDistance: number;
  readonly pattern: LinePattern;
}

export type LineFragmentInput = Omit<LineVertexOutput, 'clipPosition'>;

export const linePatternTag = (pattern: LinePattern): number => LINE_PATTERNS.indexOf(pattern);

/**
 * Maps a wire tag back to a pattern. Unknown tags draw solid.
 */
export function resolveLinePatternTag(tag: number): LinePattern {
  if (!Number.isInteger(tag) || tag < 0 || tag >= LINE_PATTERNS.length) return 'solid';
  return LINE_PATTERNS[tag] ?? 'solid';
}

export function lineVertex(vertex: LineVertex, uniforms: PlotUniforms): LineVertexOutput {
  return {
    clipPosition: mapScreenToNdc(vertex.position, uniforms.viewportSize),
    color: vertex.color,
    edgeDistance: vertex.edgeDistance,
    lineDistance: vertex.lineDistance,
    pattern: vertex.pattern,
  };
}

/**
 * Whether the pattern is "on" at `lineDistance` pixels along the line.
 *
 * Run boundaries are inclusive at the start of an "on" run and exclusive at its end. A
 * non-positive or non-finite `lineWidth` collapses every dashed pattern to solid.
 */
export function isLinePatternVisible(lineDistance: number, pattern: LinePattern, lineWidth: number): boolean {
  if (pattern === 'none') return false;
  const runs = LINE_PATTERN_RUNS[pattern];
  if (runs.length === 0) return true;
  if (!Number.isFinite(lineWidth) || lineWidth <= 0) return true;

  let period = 0;
  for (const run of runs) period += run;
  const phase = floorMod(lineDistance, period * lineWidth);

  let start = 0;
  for (let i = 0; i < runs.length; i++) {
    const end = start + (runs[i] ?? 0) * lineWidth;
    if (phase < end) return i % 2 === 0;
    start = end;
  }
  return false;
}

export function lineEdgeAlpha(edgeDistance: number): number {
  return 1 - smoothstep(LINE_AA_START, LINE_AA_END, Math.abs(edgeDistance));
}

/**
 * Returns the straight-alpha output color, or `null` when the fragment is discarded.
 */
export function lineFragment(input: LineFragmentInput, uniforms: PlotUniforms): Rgba | null {
  if (!isLinePatternVisible(input.lineDistance, input.pattern, uniforms.lineWidth)) return null;
  const alpha = lineEdgeAlpha(input.edgeDistance);
  if (alpha < LINE_MIN_ALPHA) return null;
  const [r, g, b, a] = input.color;
  return [r, g, b, a * alpha];
}
