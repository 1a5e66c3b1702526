import { describe, it, expect } from 'vitest';
import plotWgsl from '../plot.wgsl?raw';
import { LINE_PATTERNS, MARKER_SHAPES } from '../../config/types';

const constName = (prefix: string, name: string): string => `${prefix}_${name.toUpperCase().replace(/-/g, '_')}`;

describe('plot.wgsl', () => {
  it('declares all four entry points', () => {
    expect(plotWgsl).toContain('fn vsMarker(');
    expect(plotWgsl).toContain('fn fsMarker(');
    expect(plotWgsl).toContain('fn vsLine(');
    expect(plotWgsl).toContain('fn fsLine(');
  });

  it.each(MARKER_SHAPES.map((shape, tag) => [shape, tag] as const))('tags marker %s as %i', (shape, tag) => {
    expect(plotWgsl).toContain(`const ${constName('SHAPE', shape)}: u32 = ${tag}u;`);
  });

  it.each(LINE_PATTERNS.map((pattern, tag) => [pattern, tag] as const))('tags pattern %s as %i', (pattern, tag) => {
    expect(plotWgsl).toContain(`const ${constName('PATTERN', pattern)}: u32 = ${tag}u;`);
  });

  it('lays the uniform struct out in packing order', () => {
    const fields = ['viewport_size', 'x_range', 'y_range', 'padding', 'marker_radius', 'line_width'];
    const offsets = fields.map((f) => plotWgsl.indexOf(`  ${f}:`));
    expect(offsets.every((o) => o >= 0)).toBe(true);
    expect([...offsets].sort((a, b) => a - b)).toEqual(offsets);
  });
});
