/**
 * Data space → screen pixels → normalized device coordinates.
 *
 * Mirrors `data_to_screen` / `screen_to_ndc` in `plot.wgsl`. Screen space has its origin at the
 * top-left with +y down; data space and NDC have +y up, so both steps flip Y.
 *
 * Nothing here guards against degenerate ranges: `xRange[1] === xRange[0]` divides by zero and the
 * resulting non-finite value propagates. Callers validate with `validatePlotUniforms`.
 */

import type { PlotUniforms, Vec2 } from '../config/types';

export function mapDataToScreen(dataPos: Vec2, uniforms: PlotUniforms): Vec2 {
  const [viewportW, viewportH] = uniforms.viewportSize;
  const [padX, padY] = uniforms.padding;
  const [xMin, xMax] = uniforms.xRange;
  const [yMin, yMax] = uniforms.yRange;

  const plotWidth = viewportW - 2 * padX;
  const plotHeight = viewportH - 2 * padY;

  // Not clamped: out-of-range data lands outside the plot area and is clipped by the rasterizer.
  const xNorm = (dataPos[0] - xMin) / (xMax - xMin);
  const yNorm = (dataPos[1] - yMin) / (yMax - yMin);

  return [padX + xNorm * plotWidth, padY + (1 - yNorm) * plotHeight];
}

export function mapScreenToNdc(screenPos: Vec2, viewportSize: Vec2): Vec2 {
  return [(screenPos[0] / viewportSize[0]) * 2 - 1, 1 - (screenPos[1] / viewportSize[1]) * 2];
}

export function mapDataToNdc(dataPos: Vec2, uniforms: PlotUniforms): Vec2 {
  return mapScreenToNdc(mapDataToScreen(dataPos, uniforms), uniforms.viewportSize);
}
