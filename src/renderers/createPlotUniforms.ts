import type { PlotUniforms } from '../config/types';
import { PLOT_UNIFORMS_BYTES, PLOT_UNIFORMS_FLOATS, packPlotUniforms } from '../core/uniformLayout';
import { createUniformBuffer, writeUniformBuffer } from './rendererUtils';

/**
 * The single `@group(0) @binding(0)` uniform block read by both plot pipelines.
 */
export interface PlotUniformBinding {
  readonly bindGroupLayout: GPUBindGroupLayout;
  readonly bindGroup: GPUBindGroup;
  /** Last written value, or `null` before the first `write`. */
  readonly current: PlotUniforms | null;
  /** Replaces the whole block. Call between draws, never mid-pass. */
  write(uniforms: PlotUniforms): void;
  dispose(): void;
}

export function createPlotUniforms(device: GPUDevice, options?: { readonly label?: string }): PlotUniformBinding {
  const label = options?.label ?? 'plotUniforms';
  let disposed = false;
  let current: PlotUniforms | null = null;

  const bindGroupLayout = device.createBindGroupLayout({
    label: `${label}/layout`,
    entries: [
      {
        binding: 0,
        visibility: GPUShaderStage.VERTEX | GPUShaderStage.FRAGMENT,
        buffer: { type: 'uniform' },
      },
    ],
  });

  const buffer = createUniformBuffer(device, PLOT_UNIFORMS_BYTES, { label: `${label}/buffer` });
  // Reused CPU-side staging (avoid per-frame allocations).
  const scratch = new Float32Array(PLOT_UNIFORMS_FLOATS);

  const bindGroup = device.createBindGroup({
    label: `${label}/bindGroup`,
    layout: bindGroupLayout,
    entries: [{ binding: 0, resource: { buffer } }],
  });

  const write = (uniforms: PlotUniforms): void => {
    if (disposed) throw new Error('PlotUniformBinding is disposed.');
    writeUniformBuffer(device, buffer, packPlotUniforms(uniforms, scratch));
    current = uniforms;
  };

  const dispose = (): void => {
    if (disposed) return;
    disposed = true;
    current = null;
    try {
      buffer.destroy();
    } catch {
      // best-effort
    }
  };

  return {
    bindGroupLayout,
    bindGroup,
    get current() {
      return current;
    },
    write,
    dispose,
  };
}
