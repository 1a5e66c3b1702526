/**
 * Shared renderer utilities.
 *
 * Thin helpers over WebGPU boilerplate used by the plot renderers:
 * - shader module / render pipeline creation (optionally through a `PipelineCache`)
 * - uniform buffer creation + updates
 * - growable vertex buffers
 *
 * First argument is always `device: GPUDevice`.
 */

import type { PipelineCache } from '../core/PipelineCache';

export interface ShaderStageConfig {
  readonly code: string;
  readonly label?: string;
  readonly entryPoint: string;
}

export interface VertexStageConfig extends ShaderStageConfig {
  readonly buffers?: readonly GPUVertexBufferLayout[];
}

export interface FragmentStageConfig extends ShaderStageConfig {
  readonly format: GPUTextureFormat;
  readonly blend?: GPUBlendState;
}

export interface RenderPipelineConfig {
  readonly label?: string;
  readonly bindGroupLayouts: readonly GPUBindGroupLayout[];
  readonly vertex: VertexStageConfig;
  readonly fragment: FragmentStageConfig;
  readonly primitive?: GPUPrimitiveState;
  readonly multisample?: GPUMultisampleState;
}

/**
 * Straight-alpha "over" compositing, used by both plot pipelines.
 */
export const ALPHA_BLEND: GPUBlendState = {
  color: { operation: 'add', srcFactor: 'src-alpha', dstFactor: 'one-minus-src-alpha' },
  alpha: { operation: 'add', srcFactor: 'one', dstFactor: 'one-minus-src-alpha' },
};

const isPowerOfTwo = (n: number): boolean => Number.isInteger(n) && n > 0 && (n & (n - 1)) === 0;

export const alignTo = (value: number, alignment: number): number => {
  if (!Number.isFinite(value) || value < 0) {
    throw new Error(`alignTo(value): value must be a finite non-negative number. Received: ${String(value)}`);
  }
  if (!isPowerOfTwo(alignment)) {
    throw new Error(`alignTo(alignment): alignment must be a positive power of two. Received: ${String(alignment)}`);
  }
  const v = Math.floor(value);
  return (v + alignment - 1) & ~(alignment - 1);
};

const assertCacheDevice = (fn: string, device: GPUDevice, pipelineCache: PipelineCache | undefined): void => {
  if (pipelineCache && pipelineCache.device !== device) {
    throw new Error(`${fn}(pipelineCache): cache.device must match the provided GPUDevice.`);
  }
};

export function createShaderModule(
  device: GPUDevice,
  code: string,
  label?: string,
  pipelineCache?: PipelineCache
): GPUShaderModule {
  if (code.length === 0) {
    throw new Error('createShaderModule(code): WGSL code must be a non-empty string.');
  }
  assertCacheDevice('createShaderModule', device, pipelineCache);
  return pipelineCache ? pipelineCache.getOrCreateShaderModule(code, label) : device.createShaderModule({ code, label });
}

/**
 * Creates a render pipeline with an explicit layout built from `bindGroupLayouts`.
 *
 * Defaults: `primitive.topology: 'triangle-list'`, `multisample.count: 1`.
 */
export function createRenderPipeline(
  device: GPUDevice,
  config: RenderPipelineConfig,
  pipelineCache?: PipelineCache
): GPURenderPipeline {
  assertCacheDevice('createRenderPipeline', device, pipelineCache);

  const vertexModule = createShaderModule(device, config.vertex.code, config.vertex.label, pipelineCache);
  const fragmentModule = createShaderModule(device, config.fragment.code, config.fragment.label, pipelineCache);

  // Explicit layout even when caching: bind groups built from our own GPUBindGroupLayout are not
  // compatible with an 'auto' pipeline layout.
  const layout = device.createPipelineLayout({ bindGroupLayouts: [...config.bindGroupLayouts] });

  const descriptor: GPURenderPipelineDescriptor = {
    label: config.label,
    layout,
    vertex: {
      module: vertexModule,
      entryPoint: config.vertex.entryPoint,
      buffers: config.vertex.buffers ? [...config.vertex.buffers] : [],
    },
    fragment: {
      module: fragmentModule,
      entryPoint: config.fragment.entryPoint,
      targets: [{ format: config.fragment.format, blend: config.fragment.blend }],
    },
    primitive: config.primitive ?? { topology: 'triangle-list' },
    multisample: config.multisample ?? { count: 1 },
  };

  return pipelineCache ? pipelineCache.getOrCreateRenderPipeline(descriptor) : device.createRenderPipeline(descriptor);
}

/**
 * Creates a uniform buffer, rounding `size` up to `alignment` (default 16 bytes, the WGSL struct
 * size alignment).
 */
export function createUniformBuffer(
  device: GPUDevice,
  size: number,
  options?: { readonly label?: string; readonly alignment?: number }
): GPUBuffer {
  if (!Number.isFinite(size) || size <= 0) {
    throw new Error(`createUniformBuffer(size): size must be a positive number. Received: ${String(size)}`);
  }

  const alignedSize = alignTo(size, Math.max(4, options?.alignment ?? 16));
  const maxSize = device.limits.maxUniformBufferBindingSize;
  if (alignedSize > maxSize) {
    throw new Error(
      `createUniformBuffer(size): requested size ${alignedSize} exceeds device.limits.maxUniformBufferBindingSize (${maxSize}).`
    );
  }

  return device.createBuffer({
    label: options?.label,
    size: alignedSize,
    usage: GPUBufferUsage.UNIFORM | GPUBufferUsage.COPY_DST,
  });
}

/**
 * Writes `data` at offset 0. `queue.writeBuffer()` requires offsets and sizes in multiples of 4.
 */
export function writeUniformBuffer(device: GPUDevice, buffer: GPUBuffer, data: ArrayBuffer | ArrayBufferView): void {
  const src =
    data instanceof ArrayBuffer
      ? { arrayBuffer: data, offset: 0, size: data.byteLength }
      : { arrayBuffer: data.buffer, offset: data.byteOffset, size: data.byteLength };

  if (src.size === 0) return;

  if ((src.offset & 3) !== 0 || (src.size & 3) !== 0) {
    throw new Error(
      `writeUniformBuffer(data): data byteOffset (${src.offset}) and byteLength (${src.size}) must be multiples of 4 for queue.writeBuffer().`
    );
  }
  if (src.size > buffer.size) {
    throw new Error(`writeUniformBuffer(data): data byteLength (${src.size}) exceeds buffer.size (${buffer.size}).`);
  }

  device.queue.writeBuffer(buffer, 0, src.arrayBuffer, src.offset, src.size);
}

/**
 * A vertex buffer that is recreated larger when an upload does not fit.
 */
export interface DynamicBuffer {
  /** Current GPU buffer; replaced (and the old one destroyed) when capacity grows. */
  readonly buffer: GPUBuffer;
  readonly capacity: number;
  /** Grows to `max(1.5 × capacity, byteLength)` when needed, then writes `data[0, byteLength)`. */
  upload(data: ArrayBuffer, byteLength: number): void;
  destroy(): void;
}

export function createDynamicBuffer(
  device: GPUDevice,
  options: { readonly label: string; readonly initialCapacity: number; readonly usage?: GPUBufferUsageFlags }
): DynamicBuffer {
  const usage = (options.usage ?? GPUBufferUsage.VERTEX) | GPUBufferUsage.COPY_DST;
  const create = (size: number): GPUBuffer => device.createBuffer({ label: options.label, size, usage });

  let capacity = alignTo(Math.max(4, options.initialCapacity), 4);
  let buffer = create(capacity);

  const upload = (data: ArrayBuffer, byteLength: number): void => {
    if (byteLength <= 0) return;
    if (byteLength > data.byteLength) {
      throw new Error(`DynamicBuffer.upload(byteLength): ${byteLength} exceeds source size ${data.byteLength}.`);
    }
    if (byteLength > capacity) {
      const nextCapacity = alignTo(Math.max(Math.floor((capacity * 3) / 2), byteLength), 4);
      try {
        buffer.destroy();
      } catch {
        // best-effort
      }
      buffer = create(nextCapacity);
      capacity = nextCapacity;
    }
    device.queue.writeBuffer(buffer, 0, data, 0, alignTo(byteLength, 4));
  };

  const destroy = (): void => {
    try {
      buffer.destroy();
    } catch {
      // best-effort
    }
  };

  return {
    get buffer() {
      return buffer;
    },
    get capacity() {
      return capacity;
    },
    upload,
    destroy,
  };
}
