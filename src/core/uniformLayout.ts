/**
 * `PlotUniforms` ↔ the WGSL `Uniforms` struct, plus caller-side validation.
 *
 * WGSL layout (all f32, std140-compatible because the vec2 pairs come first):
 *
 * | offset | field          |
 * |-------:|----------------|
 * |      0 | viewport_size  |
 * |      8 | x_range        |
 * |     16 | y_range        |
 * |     24 | padding        |
 * |     32 | marker_radius  |
 * |     36 | line_width     |
 *
 * The shader has no runtime guards; a degenerate range produces non-finite clip positions.
 * `validatePlotUniforms` is the only place those conditions are detected.
 */

import type { PlotUniforms } from '../config/types';

export const PLOT_UNIFORMS_FLOATS = 10;
export const PLOT_UNIFORMS_BYTES = PLOT_UNIFORMS_FLOATS * 4;

export type PlotUniformsIssueCode =
  | 'non-finite-value'
  | 'non-positive-viewport'
  | 'degenerate-x-range'
  | 'degenerate-y-range'
  | 'padding-exceeds-viewport'
  | 'non-positive-marker-radius'
  | 'non-positive-line-width';

export interface PlotUniformsIssue {
  readonly code: PlotUniformsIssueCode;
  readonly message: string;
}

export class PlotUniformsError extends Error {
  readonly issues: ReadonlyArray<PlotUniformsIssue>;

  constructor(issues: ReadonlyArray<PlotUniformsIssue>) {
    super(`Invalid plot uniforms: ${issues.map((i) => i.message).join('; ')}`);
    this.name = 'PlotUniformsError';
    this.issues = issues;
  }
}

/**
 * Writes the uniform block into `out` (which must hold at least 10 floats) and returns it.
 */
export function packPlotUniforms(
  uniforms: PlotUniforms,
  out: Float32Array = new Float32Array(PLOT_UNIFORMS_FLOATS)
): Float32Array {
  if (out.length < PLOT_UNIFORMS_FLOATS) {
    throw new Error(`packPlotUniforms(out): expected at least ${PLOT_UNIFORMS_FLOATS} floats. Received: ${out.length}`);
  }
  out[0] = uniforms.viewportSize[0];
  out[1] = uniforms.viewportSize[1];
  out[2] = uniforms.xRange[0];
  out[3] = uniforms.xRange[1];
  out[4] = uniforms.yRange[0];
  out[5] = uniforms.yRange[1];
  out[6] = uniforms.padding[0];
  out[7] = uniforms.padding[1];
  out[8] = uniforms.markerRadius;
  out[9] = uniforms.lineWidth;
  return out;
}

const f32 = Math.fround;

// A span is usable when max > min and max - min stays finite once rounded to f32.
const isUsableSpan = (min: number, max: number): boolean => max > min && Number.isFinite(f32(max - min));

/**
 * Checks the block as the shader will read it: every field is rounded to f32 first, so a range
 * that only increases in double precision, or a value beyond the f32 range, is reported.
 */
export function validatePlotUniforms(uniforms: PlotUniforms): PlotUniformsIssue[] {
  const issues: PlotUniformsIssue[] = [];
  const packed = packPlotUniforms(uniforms);
  if (!packed.every(Number.isFinite)) {
    return [{ code: 'non-finite-value', message: 'all uniform values must be finite in f32' }];
  }

  const viewportW = packed[0];
  const viewportH = packed[1];
  const xMin = packed[2];
  const xMax = packed[3];
  const yMin = packed[4];
  const yMax = packed[5];
  const padX = packed[6];
  const padY = packed[7];
  const markerRadius = packed[8];
  const lineWidth = packed[9];

  if (!(viewportW > 0) || !(viewportH > 0)) {
    issues.push({
      code: 'non-positive-viewport',
      message: `viewport must be positive, got ${viewportW}x${viewportH}`,
    });
  }
  if (!isUsableSpan(xMin, xMax)) {
    issues.push({ code: 'degenerate-x-range', message: `xRange max must exceed min in f32, got [${xMin}, ${xMax}]` });
  }
  if (!isUsableSpan(yMin, yMax)) {
    issues.push({ code: 'degenerate-y-range', message: `yRange max must exceed min in f32, got [${yMin}, ${yMax}]` });
  }
  if (padX < 0 || padY < 0 || f32(viewportW - 2 * padX) <= 0 || f32(viewportH - 2 * padY) <= 0) {
    issues.push({
      code: 'padding-exceeds-viewport',
      message: `padding [${padX}, ${padY}] leaves no plot area in a ${viewportW}x${viewportH} viewport`,
    });
  }
  if (!(markerRadius > 0)) {
    issues.push({
      code: 'non-positive-marker-radius',
      message: `markerRadius must be positive, got ${markerRadius}`,
    });
  }
  if (!(lineWidth > 0)) {
    issues.push({ code: 'non-positive-line-width', message: `lineWidth must be positive, got ${lineWidth}` });
  }
  return issues;
}

export function assertValidPlotUniforms(uniforms: PlotUniforms): void {
  const issues = validatePlotUniforms(uniforms);
  if (issues.length > 0) throw new PlotUniformsError(issues);
}
