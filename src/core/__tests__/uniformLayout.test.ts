import { describe, it, expect } from 'vitest';
import {
  PLOT_UNIFORMS_BYTES,
  PlotUniformsError,
  assertValidPlotUniforms,
  packPlotUniforms,
  validatePlotUniforms,
} from '../uniformLayout';
import type { PlotUniforms } from '../../config/types';

const valid: PlotUniforms = {
  viewportSize: [800, 600],
  xRange: [0, 10],
  yRange: [-5, 5],
  padding: [50, 40],
  markerRadius: 4,
  lineWidth: 2,
};

const codesOf = (u: PlotUniforms): string[] => validatePlotUniforms(u).map((i) => i.code);

describe('packPlotUniforms', () => {
  it('writes the ten fields in shader order', () => {
    expect(Array.from(packPlotUniforms(valid))).toEqual([800, 600, 0, 10, -5, 5, 50, 40, 4, 2]);
  });

  it('reuses the provided output array', () => {
    const out = new Float32Array(12);
    expect(packPlotUniforms(valid, out)).toBe(out);
    expect(out[9]).toBe(2);
  });

  it('rejects an output array that is too small', () => {
    expect(() => packPlotUniforms(valid, new Float32Array(9))).toThrow(/at least 10 floats/);
  });

  it('describes a 40-byte block', () => {
    expect(PLOT_UNIFORMS_BYTES).toBe(40);
  });
});

describe('validatePlotUniforms', () => {
  it('accepts a well-formed block', () => {
    expect(validatePlotUniforms(valid)).toEqual([]);
  });

  it('flags degenerate and inverted ranges', () => {
    expect(codesOf({ ...valid, xRange: [1, 1] })).toEqual(['degenerate-x-range']);
    expect(codesOf({ ...valid, yRange: [2, 1] })).toEqual(['degenerate-y-range']);
  });

  it('flags a zero viewport, which also leaves no plot area', () => {
    expect(codesOf({ ...valid, viewportSize: [0, 600], padding: [0, 0] })).toEqual([
      'non-positive-viewport',
      'padding-exceeds-viewport',
    ]);
  });

  it('flags padding that consumes the viewport', () => {
    expect(codesOf({ ...valid, padding: [400, 10] })).toEqual(['padding-exceeds-viewport']);
    expect(codesOf({ ...valid, padding: [-1, 10] })).toEqual(['padding-exceeds-viewport']);
  });

  it('flags non-positive marker radius and line width together', () => {
    expect(codesOf({ ...valid, markerRadius: 0, lineWidth: -1 })).toEqual([
      'non-positive-marker-radius',
      'non-positive-line-width',
    ]);
  });

  it('flags a range that only increases in double precision', () => {
    expect(codesOf({ ...valid, xRange: [1e8, 1e8 + 1] })).toEqual(['degenerate-x-range']);
    expect(codesOf({ ...valid, yRange: [0.1, 0.1 + 1e-12] })).toEqual(['degenerate-y-range']);
  });

  it('flags a range whose f32 span overflows', () => {
    expect(codesOf({ ...valid, xRange: [-3e38, 3e38] })).toEqual(['degenerate-x-range']);
  });

  it('treats values beyond the f32 range as non-finite', () => {
    expect(codesOf({ ...valid, xRange: [0, 1e39] })).toEqual(['non-finite-value']);
  });

  it('reports only the non-finite issue when any value is NaN or infinite', () => {
    expect(codesOf({ ...valid, xRange: [0, Number.NaN], lineWidth: -1 })).toEqual(['non-finite-value']);
    expect(codesOf({ ...valid, viewportSize: [Number.POSITIVE_INFINITY, 600] })).toEqual(['non-finite-value']);
  });
});

describe('assertValidPlotUniforms', () => {
  it('does nothing for a valid block', () => {
    expect(() => assertValidPlotUniforms(valid)).not.toThrow();
  });

  it('throws a PlotUniformsError carrying every issue', () => {
    let caught: unknown;
    try {
      assertValidPlotUniforms({ ...valid, xRange: [3, 3], markerRadius: 0 });
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(PlotUniformsError);
    if (caught instanceof PlotUniformsError) {
      expect(caught.name).toBe('PlotUniformsError');
      expect(caught.issues.map((i) => i.code)).toEqual(['degenerate-x-range', 'non-positive-marker-radius']);
      expect(caught.message).toBe(
        'Invalid plot uniforms: xRange max must exceed min in f32, got [3, 3]; markerRadius must be positive, got 0'
      );
    }
  });
});
