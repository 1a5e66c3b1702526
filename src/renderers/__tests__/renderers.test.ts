import { describe, it, expect, beforeAll, afterAll, afterEach, vi } from 'vitest';
import { createPlotUniforms } from '../createPlotUniforms';
import { createMarkerRenderer } from '../createMarkerRenderer';
import { createLineRenderer } from '../createLineRenderer';
import { ALPHA_BLEND } from '../rendererUtils';
import { createPipelineCache } from '../../core/PipelineCache';
import type { LineVertex, PlotUniforms, PointInstance } from '../../config/types';
import { createMockDevice, createMockPass, stubWebGPUGlobals } from './mockDevice';

beforeAll(() => {
  stubWebGPUGlobals();
});

afterAll(() => {
  vi.unstubAllGlobals();
});

afterEach(() => {
  vi.clearAllMocks();
});

const uniforms: PlotUniforms = {
  viewportSize: [200, 200],
  xRange: [0, 20],
  yRange: [0, 20],
  padding: [0, 0],
  markerRadius: 5,
  lineWidth: 1,
};

const instances: PointInstance[] = [
  { position: [10, 10], color: [1, 0, 0, 1], shape: 'square' },
  { position: [5, 15], color: [0, 0, 1, 1], shape: 'triangle-up' },
];

const segment = (pattern: LineVertex['pattern']): LineVertex[] =>
  [0, 1, 2, 1, 3, 2].map((i) => ({
    position: [i * 10, i * 10] as const,
    color: [0, 0, 0, 1] as const,
    edgeDistance: i % 2 === 0 ? 1 : -1,
    lineDistance: i < 2 ? 0 : 10,
    pattern,
  }));

describe('createPlotUniforms', () => {
  it('declares a single uniform binding visible to both stages', () => {
    const { device, createBindGroupLayout, createBuffer } = createMockDevice();
    createPlotUniforms(device);
    expect(createBindGroupLayout).toHaveBeenCalledWith({
      label: 'plotUniforms/layout',
      entries: [{ binding: 0, visibility: 0x1 | 0x2, buffer: { type: 'uniform' } }],
    });
    expect(createBuffer).toHaveBeenCalledWith({ label: 'plotUniforms/buffer', size: 48, usage: 0x0040 | 0x0008 });
  });

  it('writes the packed 40-byte block', () => {
    const { device, writeBuffer } = createMockDevice();
    const binding = createPlotUniforms(device);
    binding.write(uniforms);

    expect(writeBuffer).toHaveBeenCalledTimes(1);
    const args = writeBuffer.mock.calls[0] ?? [];
    expect(args[1]).toBe(0);
    expect(args[4]).toBe(40);
    expect(Array.from(new Float32Array(args[2], 0, 10))).toEqual([200, 200, 0, 20, 0, 20, 0, 0, 5, 1]);
    expect(binding.current).toBe(uniforms);
  });

  it('destroys its buffer once and rejects writes after dispose', () => {
    const { device, createBuffer } = createMockDevice();
    const binding = createPlotUniforms(device);
    binding.dispose();
    binding.dispose();
    expect(createBuffer.mock.results[0]?.value.destroy).toHaveBeenCalledTimes(1);
    expect(binding.current).toBeNull();
    expect(() => binding.write(uniforms)).toThrow('PlotUniformBinding is disposed.');
  });
});

describe('createMarkerRenderer', () => {
  it('builds an instanced pipeline on the marker entry points', () => {
    const { device, createRenderPipeline, createPipelineLayout } = createMockDevice();
    const binding = createPlotUniforms(device);
    createMarkerRenderer(device, { uniforms: binding });

    expect(createPipelineLayout).toHaveBeenCalledWith({ bindGroupLayouts: [binding.bindGroupLayout] });
    const descriptor = createRenderPipeline.mock.calls[0]?.[0];
    expect(descriptor?.vertex.entryPoint).toBe('vsMarker');
    expect(descriptor?.fragment?.entryPoint).toBe('fsMarker');
    expect(descriptor?.vertex.buffers).toEqual([
      expect.objectContaining({ arrayStride: 32, stepMode: 'instance' }),
    ]);
    expect(descriptor?.fragment?.targets).toEqual([{ format: 'bgra8unorm', blend: ALPHA_BLEND }]);
    expect(descriptor?.primitive).toEqual({ topology: 'triangle-list', cullMode: 'none' });
    expect(descriptor?.multisample).toEqual({ count: 1 });
  });

  it('forwards target format and a sanitized sample count', () => {
    const { device, createRenderPipeline } = createMockDevice();
    const binding = createPlotUniforms(device);
    createMarkerRenderer(device, { uniforms: binding, targetFormat: 'rgba8unorm', sampleCount: 4 });
    createMarkerRenderer(device, { uniforms: binding, sampleCount: Number.NaN });

    expect(createRenderPipeline.mock.calls[0]?.[0].fragment?.targets).toEqual([
      { format: 'rgba8unorm', blend: ALPHA_BLEND },
    ]);
    expect(createRenderPipeline.mock.calls[0]?.[0].multisample).toEqual({ count: 4 });
    expect(createRenderPipeline.mock.calls[1]?.[0].multisample).toEqual({ count: 1 });
  });

  it('uploads one 32-byte record per instance and draws a six-vertex quad per instance', () => {
    const { device, writeBuffer } = createMockDevice();
    const binding = createPlotUniforms(device);
    const renderer = createMarkerRenderer(device, { uniforms: binding });
    const { pass, calls, draw, setBindGroup } = createMockPass();

    renderer.prepare(instances);
    expect(renderer.instanceCount).toBe(2);
    expect(writeBuffer.mock.calls[0]?.[4]).toBe(64);

    renderer.render(pass);
    expect(calls).toEqual(['setPipeline', 'setBindGroup', 'setVertexBuffer', 'draw']);
    expect(setBindGroup).toHaveBeenCalledWith(0, binding.bindGroup);
    expect(draw).toHaveBeenCalledWith(6, 2);
  });

  it('records nothing without instances', () => {
    const { device } = createMockDevice();
    const renderer = createMarkerRenderer(device, { uniforms: createPlotUniforms(device) });
    const { pass, calls } = createMockPass();
    renderer.prepare([]);
    renderer.render(pass);
    expect(calls).toEqual([]);
  });

  it('throws after dispose', () => {
    const { device } = createMockDevice();
    const renderer = createMarkerRenderer(device, { uniforms: createPlotUniforms(device) });
    const { pass } = createMockPass();
    renderer.dispose();
    renderer.dispose();
    expect(() => renderer.prepare(instances)).toThrow('MarkerRenderer is disposed.');
    expect(() => renderer.render(pass)).toThrow('MarkerRenderer is disposed.');
  });
});

describe('createLineRenderer', () => {
  it('builds a per-vertex pipeline on the line entry points', () => {
    const { device, createRenderPipeline } = createMockDevice();
    createLineRenderer(device, { uniforms: createPlotUniforms(device) });

    const descriptor = createRenderPipeline.mock.calls[0]?.[0];
    expect(descriptor?.vertex.entryPoint).toBe('vsLine');
    expect(descriptor?.fragment?.entryPoint).toBe('fsLine');
    expect(descriptor?.vertex.buffers).toEqual([
      expect.objectContaining({ arrayStride: 36, stepMode: 'vertex' }),
    ]);
  });

  it('uploads 36 bytes per vertex and draws them as a triangle list', () => {
    const { device, writeBuffer } = createMockDevice();
    const renderer = createLineRenderer(device, { uniforms: createPlotUniforms(device) });
    const { pass, draw } = createMockPass();

    renderer.prepare(segment('dashed'));
    expect(renderer.vertexCount).toBe(6);
    expect(writeBuffer.mock.calls[0]?.[4]).toBe(216);

    renderer.render(pass);
    expect(draw).toHaveBeenCalledWith(6);
  });

  it('records nothing with less than one triangle', () => {
    const { device } = createMockDevice();
    const renderer = createLineRenderer(device, { uniforms: createPlotUniforms(device) });
    const { pass, calls } = createMockPass();
    renderer.prepare(segment('solid').slice(0, 2));
    renderer.render(pass);
    expect(calls).toEqual([]);
  });
});

describe('shared pipeline cache', () => {
  it('compiles plot.wgsl once for both renderers', () => {
    const { device, createShaderModule, createRenderPipeline } = createMockDevice();
    const pipelineCache = createPipelineCache(device);
    const binding = createPlotUniforms(device);

    createMarkerRenderer(device, { uniforms: binding, pipelineCache });
    createLineRenderer(device, { uniforms: binding, pipelineCache });

    expect(createShaderModule).toHaveBeenCalledTimes(1);
    expect(createRenderPipeline).toHaveBeenCalledTimes(2);
    expect(pipelineCache.getStats().shaderModules).toEqual({ total: 4, hits: 3, misses: 1, entries: 1 });
  });
});
