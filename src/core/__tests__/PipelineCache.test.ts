/// <reference types="@webgpu/types" />

import { describe, it, expect, vi } from 'vitest';
import { createPipelineCache } from '../PipelineCache';

function createMockDevice(lost: Promise<GPUDeviceLostInfo> = new Promise(() => {})) {
  const createShaderModule = vi.fn((_descriptor: GPUShaderModuleDescriptor) => ({}));
  const createRenderPipeline = vi.fn((_descriptor: GPURenderPipelineDescriptor) => ({}));
  const device = { createShaderModule, createRenderPipeline, lost } as unknown as GPUDevice;
  return { device, createShaderModule, createRenderPipeline };
}

const makeDescriptor = (
  module: GPUShaderModule,
  layout: GPUPipelineLayout,
  overrides: { vertexEntryPoint?: string; format?: GPUTextureFormat } = {}
): GPURenderPipelineDescriptor => ({
  layout,
  vertex: {
    module,
    entryPoint: overrides.vertexEntryPoint ?? 'vsMarker',
    buffers: [
      {
        arrayStride: 32,
        stepMode: 'instance',
        attributes: [{ shaderLocation: 0, format: 'float32x2', offset: 0 }],
      },
    ],
  },
  fragment: {
    module,
    entryPoint: 'fsMarker',
    targets: [{ format: overrides.format ?? 'bgra8unorm' }],
  },
  primitive: { topology: 'triangle-list' },
});

describe('PipelineCache', () => {
  it('creates one shader module per WGSL source', () => {
    const { device, createShaderModule } = createMockDevice();
    const cache = createPipelineCache(device);

    const a = cache.getOrCreateShaderModule('// shader a', 'a');
    const again = cache.getOrCreateShaderModule('// shader a', 'a');
    const b = cache.getOrCreateShaderModule('// shader b', 'b');

    expect(again).toBe(a);
    expect(b).not.toBe(a);
    expect(createShaderModule).toHaveBeenCalledTimes(2);
    expect(cache.getStats().shaderModules).toEqual({ total: 3, hits: 1, misses: 2, entries: 2 });
  });

  it('dedupes render pipelines with identical descriptors', () => {
    const { device, createRenderPipeline } = createMockDevice();
    const cache = createPipelineCache(device);
    const module = cache.getOrCreateShaderModule('// plot');
    const layout = {} as GPUPipelineLayout;

    const first = cache.getOrCreateRenderPipeline(makeDescriptor(module, layout));
    const second = cache.getOrCreateRenderPipeline(makeDescriptor(module, layout));

    expect(second).toBe(first);
    expect(createRenderPipeline).toHaveBeenCalledTimes(1);
    expect(cache.getStats().renderPipelines).toEqual({ total: 2, hits: 1, misses: 1, entries: 1 });
  });

  it('keeps pipelines apart when entry point, target format or layout differ', () => {
    const { device, createRenderPipeline } = createMockDevice();
    const cache = createPipelineCache(device);
    const module = cache.getOrCreateShaderModule('// plot');
    const layout = {} as GPUPipelineLayout;

    cache.getOrCreateRenderPipeline(makeDescriptor(module, layout));
    cache.getOrCreateRenderPipeline(makeDescriptor(module, layout, { vertexEntryPoint: 'vsLine' }));
    cache.getOrCreateRenderPipeline(makeDescriptor(module, layout, { format: 'rgba8unorm' }));
    cache.getOrCreateRenderPipeline(makeDescriptor(module, {} as GPUPipelineLayout));

    expect(createRenderPipeline).toHaveBeenCalledTimes(4);
    expect(cache.getStats().renderPipelines.entries).toBe(4);
  });

  it('clears entries and stats on demand', () => {
    const { device } = createMockDevice();
    const cache = createPipelineCache(device);
    cache.getOrCreateShaderModule('// plot');
    cache.clear();
    expect(cache.getStats().shaderModules).toEqual({ total: 0, hits: 0, misses: 0, entries: 0 });
  });

  it('clears itself when the device is lost', async () => {
    const lost = Promise.resolve({ reason: 'destroyed', message: 'test' } as GPUDeviceLostInfo);
    const { device, createShaderModule } = createMockDevice(lost);
    const cache = createPipelineCache(device);
    cache.getOrCreateShaderModule('// plot');

    await lost;
    await Promise.resolve();

    expect(cache.getStats().shaderModules.entries).toBe(0);
    cache.getOrCreateShaderModule('// plot');
    expect(createShaderModule).toHaveBeenCalledTimes(2);
  });
});
