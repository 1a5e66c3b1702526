import type { LineVertex, PlotOptions, PlotUniforms, PointInstance, Vec2 } from '../config/types';
import { resolveOptions, type ResolvedPlotOptions } from '../config/OptionResolver';
import type { PipelineCache } from '../core/PipelineCache';
import { assertValidPlotUniforms } from '../core/uniformLayout';
import { computeDataRanges } from '../data/dataRanges';
import { resolvePointColors } from '../data/seriesColors';
import { tessellateLine } from '../data/tessellateLine';
import { createLineRenderer } from './createLineRenderer';
import { createMarkerRenderer } from './createMarkerRenderer';
import { createPlotUniforms } from './createPlotUniforms';

/**
 * CPU-side output of one `prepare` call.
 */
export interface PlotGeometry {
  readonly uniforms: PlotUniforms;
  readonly instances: ReadonlyArray<PointInstance>;
  readonly lineVertices: ReadonlyArray<LineVertex>;
  /** Names of series that had no finite point and were left out. */
  readonly skippedSeries: ReadonlyArray<string>;
}

/**
 * Builds uniforms, marker instances and line geometry from resolved options.
 *
 * Explicit `xRange` / `yRange` win over the fitted data ranges. Throws `PlotUniformsError` when the
 * resulting uniform block is invalid (for example padding larger than the viewport).
 */
export function buildPlotGeometry(resolved: ResolvedPlotOptions, viewportSize: Vec2): PlotGeometry {
  const drawable = resolved.series.filter((s) => s.points.length > 0);
  const skippedSeries = resolved.series.filter((s) => s.points.length === 0).map((s) => s.name);

  const fitted = computeDataRanges(drawable.map((s) => s.points));
  const uniforms: PlotUniforms = {
    viewportSize,
    xRange: resolved.xRange ?? fitted.xRange,
    yRange: resolved.yRange ?? fitted.yRange,
    padding: resolved.padding,
    markerRadius: resolved.markerRadius,
    lineWidth: resolved.lineWidth,
  };
  assertValidPlotUniforms(uniforms);

  const instances: PointInstance[] = [];
  const lineVertices: LineVertex[] = [];

  for (const s of drawable) {
    const colors = resolvePointColors(s.points, s.color, s.colorMode, uniforms.yRange);

    if (s.showLines) {
      const vertices = tessellateLine(s.points, uniforms, {
        colors,
        pattern: s.linePattern,
        fringe: resolved.lineFringe,
      });
      for (const v of vertices) lineVertices.push(v);
    }

    if (s.showMarkers) {
      s.points.forEach((position, i) => {
        instances.push({ position, color: colors[i] ?? s.color, shape: s.marker });
      });
    }
  }

  return { uniforms, instances, lineVertices, skippedSeries };
}

export interface PlotRenderer {
  /**
   * Resolves `options`, uploads uniforms and geometry. Call outside a render pass.
   */
  prepare(options: PlotOptions, viewportSize: Vec2): PlotGeometry;
  /** Records lines, then markers, into `passEncoder`. No-op before the first `prepare`. */
  render(passEncoder: GPURenderPassEncoder): void;
  dispose(): void;
}

export interface PlotRendererOptions {
  readonly targetFormat?: GPUTextureFormat;
  readonly sampleCount?: number;
  readonly pipelineCache?: PipelineCache;
}

export function createPlotRenderer(device: GPUDevice, options: PlotRendererOptions = {}): PlotRenderer {
  let disposed = false;
  let prepared = false;

  const uniforms = createPlotUniforms(device);
  const rendererOptions = {
    uniforms,
    targetFormat: options.targetFormat,
    sampleCount: options.sampleCount,
    pipelineCache: options.pipelineCache,
  };
  const lineRenderer = createLineRenderer(device, rendererOptions);
  const markerRenderer = createMarkerRenderer(device, rendererOptions);

  const assertNotDisposed = (): void => {
    if (disposed) throw new Error('PlotRenderer is disposed.');
  };

  const prepare: PlotRenderer['prepare'] = (plotOptions, viewportSize) => {
    assertNotDisposed();
    const geometry = buildPlotGeometry(resolveOptions(plotOptions), viewportSize);

    for (const name of geometry.skippedSeries) {
      console.warn(`PlotRenderer: series "${name}" has no finite points and was skipped.`);
    }

    uniforms.write(geometry.uniforms);
    lineRenderer.prepare(geometry.lineVertices);
    markerRenderer.prepare(geometry.instances);
    prepared = true;
    return geometry;
  };

  const render: PlotRenderer['render'] = (passEncoder) => {
    assertNotDisposed();
    if (!prepared) return;
    lineRenderer.render(passEncoder);
    markerRenderer.render(passEncoder);
  };

  const dispose: PlotRenderer['dispose'] = () => {
    if (disposed) return;
    disposed = true;
    lineRenderer.dispose();
    markerRenderer.dispose();
    uniforms.dispose();
  };

  return { prepare, render, dispose };
}
