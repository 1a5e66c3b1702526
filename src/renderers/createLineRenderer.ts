import plotWgsl from '../shaders/plot.wgsl?raw';
import type { LineVertex } from '../config/types';
import type { PipelineCache } from '../core/PipelineCache';
import {
  LINE_VERTEX_STRIDE_BYTES,
  lineVertexAttributes,
  packLineVertices,
  type StagingBuffer,
} from '../data/instanceLayout';
import type { PlotUniformBinding } from './createPlotUniforms';
import { sanitizeSampleCount } from './createMarkerRenderer';
import { ALPHA_BLEND, createDynamicBuffer, createRenderPipeline } from './rendererUtils';

export interface LineRenderer {
  /** Uploads pre-tessellated triangle-list geometry in screen pixels. */
  prepare(vertices: ReadonlyArray<LineVertex>): void;
  render(passEncoder: GPURenderPassEncoder): void;
  readonly vertexCount: number;
  dispose(): void;
}

export interface LineRendererOptions {
  /** Uniform block shared with the marker renderer. */
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
const INITIAL_VERTEX_CAPACITY = 1024;

export function createLineRenderer(device: GPUDevice, options: LineRendererOptions): LineRenderer {
  let disposed = false;
  const { uniforms, pipelineCache } = options;

  const pipeline = createRenderPipeline(
    device,
    {
      label: 'lineRenderer/pipeline',
      bindGroupLayouts: [uniforms.bindGroupLayout],
      vertex: {
        code: plotWgsl,
        label: 'plot.wgsl',
        entryPoint: 'vsLine',
        buffers: [
          {
            arrayStride: LINE_VERTEX_STRIDE_BYTES,
            stepMode: 'vertex',
            attributes: lineVertexAttributes,
          },
        ],
      },
      fragment: {
        code: plotWgsl,
        label: 'plot.wgsl',
        entryPoint: 'fsLine',
        format: options.targetFormat ?? DEFAULT_TARGET_FORMAT,
        blend: ALPHA_BLEND,
      },
      primitive: { topology: 'triangle-list', cullMode: 'none' },
      multisample: { count: sanitizeSampleCount(options.sampleCount) },
    },
    pipelineCache
  );

  const vertexBuffer = createDynamicBuffer(device, {
    label: 'lineRenderer/vertexBuffer',
    initialCapacity: INITIAL_VERTEX_CAPACITY * LINE_VERTEX_STRIDE_BYTES,
  });
  let staging: StagingBuffer | null = null;
  let vertexCount = 0;

  const assertNotDisposed = (): void => {
    if (disposed) throw new Error('LineRenderer is disposed.');
  };

  const prepare: LineRenderer['prepare'] = (vertices) => {
    assertNotDisposed();
    const packed = packLineVertices(vertices, staging);
    staging = packed.staging;
    vertexBuffer.upload(packed.staging.buffer, packed.byteLength);
    vertexCount = vertices.length;
  };

  const render: LineRenderer['render'] = (passEncoder) => {
    assertNotDisposed();
    // A triangle list needs at least one whole triangle.
    if (vertexCount < 3) return;
    passEncoder.setPipeline(pipeline);
    passEncoder.setBindGroup(0, uniforms.bindGroup);
    passEncoder.setVertexBuffer(0, vertexBuffer.buffer);
    passEncoder.draw(vertexCount);
  };

  const dispose: LineRenderer['dispose'] = () => {
    if (disposed) return;
    disposed = true;
    vertexBuffer.destroy();
    staging = null;
    vertexCount = 0;
  };

  return {
    prepare,
    render,
    get vertexCount() {
      return vertexCount;
    },
    dispose,
  };
}
