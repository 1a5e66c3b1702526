/**
 * Per-device cache of immutable WebGPU objects shared by plot renderers:
 * - GPUShaderModule, keyed by WGSL source
 * - GPURenderPipeline, keyed by the descriptor fields that define its identity
 *
 * Notes:
 * - A cache is bound to a single GPUDevice and clears itself (stats included) on `device.lost`.
 * - Buffers, uniforms and bind groups are per-renderer and never cached here.
 */

export type PipelineCacheEntryStats = Readonly<{
  readonly total: number;
  readonly hits: number;
  readonly misses: number;
  readonly entries: number;
}>;

export type PipelineCacheStats = Readonly<{
  readonly shaderModules: PipelineCacheEntryStats;
  readonly renderPipelines: PipelineCacheEntryStats;
}>;

export interface PipelineCache {
  readonly device: GPUDevice;
  getStats(): PipelineCacheStats;
  /** Drops every cached object and resets stats. */
  clear(): void;
  getOrCreateShaderModule(code: string, label?: string): GPUShaderModule;
  getOrCreateRenderPipeline(descriptor: GPURenderPipelineDescriptor): GPURenderPipeline;
}

const FNV1A_64_OFFSET = 0xcbf29ce484222325n;
const FNV1A_64_PRIME = 0x100000001b3n;
const U64_MASK = 0xffffffffffffffffn;

const fnv1a64Hex = (s: string): string => {
  let h = FNV1A_64_OFFSET;
  for (let i = 0; i < s.length; i++) {
    h ^= BigInt(s.charCodeAt(i));
    h = (h * FNV1A_64_PRIME) & U64_MASK;
  }
  return h.toString(16).padStart(16, '0');
};

const DEFAULT_WRITE_MASK_ALL = 0xf;

// Key parts are length-prefixed so no value can be mistaken for a delimiter.
const pushTag = (parts: string[], tag: string): void => {
  parts.push(tag, '|');
};

const pushStr = (parts: string[], s: string): void => {
  parts.push('s', String(s.length), ':', s, '|');
};

const pushNum = (parts: string[], n: number): void => {
  parts.push('n', String(n), '|');
};

const pushConstants = (parts: string[], constants: Record<string, GPUPipelineConstantValue> | undefined): void => {
  const keys = constants ? Object.keys(constants).sort() : [];
  if (!constants || keys.length === 0) {
    pushTag(parts, 'C0');
    return;
  }
  pushTag(parts, 'C1');
  pushNum(parts, keys.length);
  for (const k of keys) {
    pushStr(parts, k);
    pushNum(parts, constants[k] ?? 0);
  }
};

const pushVertexBuffers = (parts: string[], buffers: Iterable<GPUVertexBufferLayout | null | undefined> | undefined): void => {
  const present = Array.from(buffers ?? []).filter((b): b is GPUVertexBufferLayout => b != null);
  pushTag(parts, present.length === 0 ? 'B0' : 'B1');
  pushNum(parts, present.length);

  for (const b of present) {
    pushNum(parts, b.arrayStride);
    pushStr(parts, b.stepMode ?? 'vertex');

    const attrs = Array.from(b.attributes).sort((a, c) =>
      a.shaderLocation !== c.shaderLocation ? a.shaderLocation - c.shaderLocation : a.offset - c.offset
    );
    pushNum(parts, attrs.length);
    for (const a of attrs) {
      pushNum(parts, a.shaderLocation);
      pushNum(parts, a.offset);
      pushStr(parts, a.format);
    }
  }
};

const pushBlend = (parts: string[], blend: GPUBlendState | undefined): void => {
  if (!blend) {
    pushTag(parts, 'BL0');
    return;
  }
  pushTag(parts, 'BL1');
  for (const component of [blend.color, blend.alpha]) {
    pushStr(parts, component.operation ?? 'add');
    pushStr(parts, component.srcFactor ?? 'one');
    pushStr(parts, component.dstFactor ?? 'zero');
  }
};

const pushTargets = (parts: string[], targets: Iterable<GPUColorTargetState | null | undefined>): void => {
  const list = Array.from(targets);
  pushTag(parts, 'T');
  pushNum(parts, list.length);
  for (const t of list) {
    if (!t) {
      pushTag(parts, '0');
      continue;
    }
    pushStr(parts, t.format);
    pushBlend(parts, t.blend);
    pushNum(parts, t.writeMask ?? DEFAULT_WRITE_MASK_ALL);
  }
};

const pushPrimitive = (parts: string[], p: GPUPrimitiveState | undefined): void => {
  pushStr(parts, p?.topology ?? 'triangle-list');
  pushStr(parts, p?.stripIndexFormat ?? '');
  pushStr(parts, p?.frontFace ?? 'ccw');
  pushStr(parts, p?.cullMode ?? 'none');
};

const pushMultisample = (parts: string[], m: GPUMultisampleState | undefined): void => {
  pushNum(parts, m?.count ?? 1);
  pushNum(parts, m?.mask ?? 0xffffffff);
  pushTag(parts, m?.alphaToCoverageEnabled ? 't' : 'f');
};

export function createPipelineCache(device: GPUDevice): PipelineCache {
  const shaderModuleByWgsl = new Map<string, GPUShaderModule>();
  const renderPipelineByKey = new Map<string, GPURenderPipeline>();

  let shaderTotal = 0;
  let shaderHits = 0;
  let pipeTotal = 0;
  let pipeHits = 0;

  // Identity keys for objects the cache did not create itself.
  let moduleIdByModule = new WeakMap<GPUShaderModule, string>();
  let layoutIdByLayout = new WeakMap<GPUPipelineLayout, string>();
  let nextExternalId = 0;

  const idFor = <K extends object>(map: WeakMap<K, string>, obj: K, prefix: string): string => {
    const existing = map.get(obj);
    if (existing) return existing;
    const id = `${prefix}:${++nextExternalId}`;
    map.set(obj, id);
    return id;
  };

  const clear = (): void => {
    shaderModuleByWgsl.clear();
    renderPipelineByKey.clear();
    shaderTotal = 0;
    shaderHits = 0;
    pipeTotal = 0;
    pipeHits = 0;
    moduleIdByModule = new WeakMap();
    layoutIdByLayout = new WeakMap();
    nextExternalId = 0;
  };

  void device.lost.then(
    () => clear(),
    (err: unknown) => {
      console.warn('PipelineCache: device.lost promise rejected:', err);
      clear();
    }
  );

  const getOrCreateShaderModule = (code: string, label?: string): GPUShaderModule => {
    shaderTotal++;
    const cached = shaderModuleByWgsl.get(code);
    if (cached) {
      shaderHits++;
      return cached;
    }
    const module = device.createShaderModule({ code, label });
    shaderModuleByWgsl.set(code, module);
    moduleIdByModule.set(module, `wgsl:${fnv1a64Hex(code)}:${code.length}`);
    return module;
  };

  const getOrCreateRenderPipeline = (descriptor: GPURenderPipelineDescriptor): GPURenderPipeline => {
    pipeTotal++;

    const layout = descriptor.layout;
    const parts: string[] = [];
    pushTag(parts, 'rp1');
    pushStr(parts, layout === 'auto' ? 'auto' : idFor(layoutIdByLayout, layout, 'layout'));

    const { vertex, fragment } = descriptor;
    pushTag(parts, 'V');
    pushStr(parts, idFor(moduleIdByModule, vertex.module, 'ext'));
    pushStr(parts, vertex.entryPoint ?? '');
    pushConstants(parts, vertex.constants);
    pushVertexBuffers(parts, vertex.buffers);

    if (fragment) {
      pushTag(parts, 'F1');
      pushStr(parts, idFor(moduleIdByModule, fragment.module, 'ext'));
      pushStr(parts, fragment.entryPoint ?? '');
      pushConstants(parts, fragment.constants);
      pushTargets(parts, fragment.targets);
    } else {
      pushTag(parts, 'F0');
    }

    pushTag(parts, 'P');
    pushPrimitive(parts, descriptor.primitive);
    pushTag(parts, 'M');
    pushMultisample(parts, descriptor.multisample);

    const key = parts.join('');
    const cached = renderPipelineByKey.get(key);
    if (cached) {
      pipeHits++;
      return cached;
    }
    const pipeline = device.createRenderPipeline(descriptor);
    renderPipelineByKey.set(key, pipeline);
    return pipeline;
  };

  const getStats = (): PipelineCacheStats => ({
    shaderModules: {
      total: shaderTotal,
      hits: shaderHits,
      misses: shaderTotal - shaderHits,
      entries: shaderModuleByWgsl.size,
    },
    renderPipelines: {
      total: pipeTotal,
      hits: pipeHits,
      misses: pipeTotal - pipeHits,
      entries: renderPipelineByKey.size,
    },
  });

  return { device, getStats, clear, getOrCreateShaderModule, getOrCreateRenderPipeline };
}
