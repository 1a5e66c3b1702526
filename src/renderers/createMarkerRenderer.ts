import plotWgsl from '../shaders/plot.wgsl?raw';
import type { PointInstance } from '../config/types';
import type { PipelineCache } from '../core/PipelineCache';
import {
  POINT_INSTANCE_STRIDE_BYTES,
  packPointInstances,
  pointInstanceAttributes,
  type StagingBuffer,
} from '../data/instanceLayout';
import { QUAD_VERTEX_COUNT } from '../core/markerStage';
import type { PlotUniformBinding } from './createPlotUniforms';
import { ALPHA_BLEND, createDynamicBuffer, createRenderPipeline } from './rendererUtils';

export interface MarkerRenderer {
  /** Packs and uploads one instance per marker. Instance order is draw order. */
  prepare(instances: ReadonlyArray<PointInstance>): void;
  render(passEncoder: GPURenderPassEncoder): void;
  readonly instanceCount: number;
  dispose(): void;
}

export interface MarkerRendererOptions {
  /** Uniform block shared with the line renderer. */
  readonly uniforms: PlotUniformBinding;
  /**
   * Must match the color attachment format of the render pass.
   * Defaults to `'bgra8unorm'`.
   */
  readonly targetFormat?: GPUTextureFormat;
  /** Must match the color attachment sampleCount. Defaults to 1 (no MSAA). */
  readonly sampleCount?: number;
  readonly pipelineCache?: PipelineCache;
}

const DEFAULT_TARGET_FORMAT: GPUTextureFormat = 'bgra8unorm';
const INITIAL_INSTANCE_CAPACITY = 1024;

export const sanitizeSampleCount = (raw: number | undefined): number => {
  const v = raw ?? 1;
  return Number.isFinite(v) ? Math.max(1, Math.floor(v)) : 1;
};

export function createMarkerRenderer(device: GPUDevice, options: MarkerRendererOptions): MarkerRenderer {
  let disposed = false;
  const { uniforms, pipelineCache } = options;

  const pipeline = createRenderPipeline(
    device,
    {
      label: 'markerRenderer/pipeline',
      bindGroupLayouts: [uniforms.bindGroupLayout],
      vertex: {
        code: plotWgsl,
        label: 'plot.wgsl',
        entryPoint: 'vsMarker',
        buffers: [
          {
            arrayStride: POINT_INSTANCE_STRIDE_BYTES,
            stepMode: 'instance',
            attributes: pointInstanceAttributes,
          },
        ],
      },
      fragment: {
        code: plotWgsl,
        label: 'plot.wgsl',
        entryPoint: 'fsMarker',
        format: options.targetFormat ?? DEFAULT_TARGET_FORMAT,
        blend: ALPHA_BLEND,
      },
      primitive: { topology: 'triangle-list', cullMode: 'none' },
      multisample: { count: sanitizeSampleCount(options.sampleCount) },
    },
    pipelineCache
  );

  const instanceBuffer = createDynamicBuffer(device, {
    label: 'markerRenderer/instanceBuffer',
    initialCapacity: INITIAL_INSTANCE_CAPACITY * POINT_INSTANCE_STRIDE_BYTES,
  });
  let staging: StagingBuffer | null = null;
  let instanceCount = 0;

  const assertNotDisposed = (): void => {
    if (disposed) throw new Error('MarkerRenderer is disposed.');
  };

  const prepare: MarkerRenderer['prepare'] = (instances) => {
    assertNotDisposed();
    const packed = packPointInstances(instances, staging);
    staging = packed.staging;
    instanceBuffer.upload(packed.staging.buffer, packed.byteLength);
    instanceCount = instances.length;
  };

  const render: MarkerRenderer['render'] = (passEncoder) => {
    assertNotDisposed();
    if (instanceCount === 0) return;
    passEncoder.setPipeline(pipeline);
    passEncoder.setBindGroup(0, uniforms.bindGroup);
    passEncoder.setVertexBuffer(0, instanceBuffer.buffer);
    passEncoder.draw(QUAD_VERTEX_COUNT, instanceCount);
  };

  const dispose: MarkerRenderer['dispose'] = () => {
    if (disposed) return;
    disposed = true;
    instanceBuffer.destroy();
    staging = null;
    instanceCount = 0;
  };

  return {
    prepare,
    render,
    get instanceCount() {
      return instanceCount;
    },
    dispose,
  };
}
