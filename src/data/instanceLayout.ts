/**
 * Interleaved GPU layouts for marker instances and line vertices.
 *
 * Marker instance (32 bytes):  position f32x2 @0 | color f32x4 @8 | shape u32 @24 | pad u32 @28
 * Line vertex (36 bytes):      position f32x2 @0 | color f32x4 @8 | edge f32 @24 | dist f32 @28 | pattern u32 @32
 *
 * Both writers reuse caller-provided staging storage when it is large enough, so per-frame
 * repacking does not allocate.
 */

import type { LineVertex, PointInstance } from '../config/types';
import { linePatternTag } from '../core/lineStage';
import { markerShapeTag } from '../core/shapeSdf';
import { nextPow2 } from '../utils/math';

export const POINT_INSTANCE_STRIDE_BYTES = 32;
export const LINE_VERTEX_STRIDE_BYTES = 36;

const POINT_INSTANCE_STRIDE_WORDS = POINT_INSTANCE_STRIDE_BYTES / 4;
const LINE_VERTEX_STRIDE_WORDS = LINE_VERTEX_STRIDE_BYTES / 4;

export const pointInstanceAttributes: readonly GPUVertexAttribute[] = [
  { shaderLocation: 0, format: 'float32x2', offset: 0 },
  { shaderLocation: 1, format: 'float32x4', offset: 8 },
  { shaderLocation: 2, format: 'uint32', offset: 24 },
  { shaderLocation: 3, format: 'uint32', offset: 28 },
];

export const lineVertexAttributes: readonly GPUVertexAttribute[] = [
  { shaderLocation: 0, format: 'float32x2', offset: 0 },
  { shaderLocation: 1, format: 'float32x4', offset: 8 },
  { shaderLocation: 2, format: 'float32', offset: 24 },
  { shaderLocation: 3, format: 'float32', offset: 28 },
  { shaderLocation: 4, format: 'uint32', offset: 32 },
];

/**
 * Reusable CPU staging memory with float and uint views over the same bytes.
 */
export interface StagingBuffer {
  readonly buffer: ArrayBuffer;
  readonly f32: Float32Array;
  readonly u32: Uint32Array;
}

export function createStagingBuffer(byteLength: number): StagingBuffer {
  const buffer = new ArrayBuffer(Math.max(0, Math.ceil(byteLength / 4) * 4));
  return { buffer, f32: new Float32Array(buffer), u32: new Uint32Array(buffer) };
}

/**
 * Returns `staging` when it already holds `byteLength` bytes, otherwise a new power-of-two sized one.
 */
export function ensureStagingCapacity(staging: StagingBuffer | null, byteLength: number): StagingBuffer {
  if (staging && staging.buffer.byteLength >= byteLength) return staging;
  return createStagingBuffer(Math.max(64, nextPow2(byteLength)));
}

/**
 * Packs instances into `staging`; returns the staging buffer actually written (it may have grown)
 * and the number of bytes used.
 */
export function packPointInstances(
  instances: ReadonlyArray<PointInstance>,
  staging: StagingBuffer | null = null
): { readonly staging: StagingBuffer; readonly byteLength: number } {
  const byteLength = instances.length * POINT_INSTANCE_STRIDE_BYTES;
  const out = ensureStagingCapacity(staging, byteLength);
  const { f32, u32 } = out;

  for (let i = 0; i < instances.length; i++) {
    const inst = instances[i];
    if (!inst) continue;
    const o = i * POINT_INSTANCE_STRIDE_WORDS;
    f32[o + 0] = inst.position[0];
    f32[o + 1] = inst.position[1];
    f32[o + 2] = inst.color[0];
    f32[o + 3] = inst.color[1];
    f32[o + 4] = inst.color[2];
    f32[o + 5] = inst.color[3];
    u32[o + 6] = markerShapeTag(inst.shape);
    u32[o + 7] = 0; // pad
  }

  return { staging: out, byteLength };
}

export function packLineVertices(
  vertices: ReadonlyArray<LineVertex>,
  staging: StagingBuffer | null = null
): { readonly staging: StagingBuffer; readonly byteLength: number } {
  const byteLength = vertices.length * LINE_VERTEX_STRIDE_BYTES;
  const out = ensureStagingCapacity(staging, byteLength);
  const { f32, u32 } = out;

  for (let i = 0; i < vertices.length; i++) {
    const v = vertices[i];
    if (!v) continue;
    const o = i * LINE_VERTEX_STRIDE_WORDS;
    f32[o + 0] = v.position[0];
    f32[o + 1] = v.position[1];
    f32[o + 2] = v.color[0];
    f32[o + 3] = v.color[1];
    f32[o + 4] = v.color[2];
    f32[o + 5] = v.color[3];
    f32[o + 6] = v.edgeDistance;
    f32[o + 7] = v.lineDistance;
    u32[o + 8] = linePatternTag(v.pattern);
  }

  return { staging: out, byteLength };
}
