/**
 * CPU reference of the marker pipeline (`vsMarker` / `fsMarker` in `plot.wgsl`).
 *
 * Every point is one instance of a shared 6-vertex quad. The vertex step places the quad at the
 * point's NDC position, scaled to `markerRadius` pixels; the fragment step masks it with the
 * shape SDF and fades alpha over a fixed ±0.1 band in marker-local units. The band does not
 * depend on pixel density, so edge softness scales with the marker radius.
 */

import type { MarkerShapeName, PlotUniforms, PointInstance, Rgba, Vec2 } from '../config/types';
import { smoothstep } from '../utils/math';
import { mapDataToNdc } from './coordinateMapper';
import { evaluateShapeSdf } from './shapeSdf';

/**
 * Two triangles covering [-1, 1]², indexed by `vertex_index` 0..5.
 */
export const QUAD_VERTICES: ReadonlyArray<Vec2> = [
  [-1, -1],
  [1, -1],
  [-1, 1],
  [-1, 1],
  [1, -1],
  [1, 1],
];

export const QUAD_VERTEX_COUNT = 6;

/** SDF values above this are culled outright. */
export const MARKER_DISCARD_THRESHOLD = 0.1;
/** Half-width of the anti-aliasing band around the outline, in marker-local units. */
export const MARKER_AA_HALF_WIDTH = 0.1;

export interface MarkerVertexOutput {
  readonly clipPosition: Vec2;
  readonly color: Rgba;
  /** Marker-local position with +y down, as consumed by the shape SDF. */
  readonly localPos: Vec2;
  readonly shape: MarkerShapeName;
}

export type MarkerFragmentInput = Omit<MarkerVertexOutput, 'clipPosition'>;

export function markerVertex(vertexIndex: number, instance: PointInstance, uniforms: PlotUniforms): MarkerVertexOutput {
  const local = QUAD_VERTICES[((vertexIndex % QUAD_VERTEX_COUNT) + QUAD_VERTEX_COUNT) % QUAD_VERTEX_COUNT] ?? [0, 0];
  const center = mapDataToNdc(instance.position, uniforms);
  const [viewportW, viewportH] = uniforms.viewportSize;
  const sizeX = (2 * uniforms.markerRadius) / viewportW;
  const sizeY = (2 * uniforms.markerRadius) / viewportH;

  return {
    clipPosition: [center[0] + local[0] * sizeX, center[1] + local[1] * sizeY],
    color: instance.color,
    // NDC is +y up; shapes are authored +y down.
    localPos: [local[0], -local[1]],
    shape: instance.shape,
  };
}

/**
 * Coverage of a marker-local position, in [0, 1]. `null` means the fragment is discarded.
 */
export function markerCoverage(localPos: Vec2, shape: MarkerShapeName): number | null {
  if (shape === 'none') return null;
  const d = evaluateShapeSdf(localPos, shape);
  if (d > MARKER_DISCARD_THRESHOLD) return null;
  return 1 - smoothstep(-MARKER_AA_HALF_WIDTH, MARKER_AA_HALF_WIDTH, d);
}

/**
 * Returns the straight-alpha output color, or `null` when the fragment is discarded.
 */
export function markerFragment(input: MarkerFragmentInput): Rgba | null {
  const alpha = markerCoverage(input.localPos, input.shape);
  if (alpha === null) return null;
  const [r, g, b, a] = input.color;
  return [r, g, b, a * alpha];
}
