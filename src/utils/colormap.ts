/**
 * Piecewise-linear colormaps for value-based point coloring.
 *
 * Each map is a short list of (t, rgb) stops; `sampleColormap` clamps t to [0, 1] and
 * interpolates between the surrounding stops. Output alpha is always 1.
 */

import type { ColormapName, Rgba } from '../config/types';
import { clamp01, lerp } from './math';

type ColorStop = readonly [t: number, r: number, g: number, b: number];

const COLORMAP_STOPS: Readonly<Record<Exclude<ColormapName, 'grayscale'>, ReadonlyArray<ColorStop>>> = {
  // Perceptually uniform, colorblind-friendly (purple → blue → green → yellow).
  viridis: [
    [0.0, 0.267, 0.004, 0.329],
    [0.25, 0.282, 0.14, 0.458],
    [0.5, 0.204, 0.286, 0.469],
    [0.6, 0.128, 0.4, 0.369],
    [0.75, 0.527, 0.51, 0.149],
    [1.0, 0.993, 0.906, 0.144],
  ],
  plasma: [
    [0.0, 0.05, 0.03, 0.53],
    [0.25, 0.275, 0.005, 0.61],
    [0.5, 0.553, 0.027, 0.416],
    [0.6, 0.764, 0.19, 0.217],
    [0.75, 0.96, 0.38, 0.113],
    [1.0, 0.94, 0.975, 0.131],
  ],
  turbo: [
    [0.0, 0.18, 0.07, 0.45],
    [0.2, 0.0, 0.3, 0.74],
    [0.4, 0.0, 0.78, 0.87],
    [0.5, 0.0, 0.98, 0.6],
    [0.6, 0.85, 0.97, 0.11],
    [0.8, 0.97, 0.43, 0.0],
    [1.0, 0.88, 0.0, 0.0],
  ],
  // black → red → yellow
  heat: [
    [0.0, 0.0, 0.0, 0.0],
    [0.25, 0.5, 0.0, 0.0],
    [0.5, 1.0, 0.0, 0.0],
    [0.75, 1.0, 0.5, 0.0],
    [1.0, 1.0, 1.0, 0.0],
  ],
};

const stopColor = (s: ColorStop): Rgba => [s[1], s[2], s[3], 1];

function samplePalette(stops: ReadonlyArray<ColorStop>, t: number): Rgba {
  const first = stops[0];
  const last = stops[stops.length - 1];
  if (!first || !last) return [0, 0, 0, 1];
  if (t <= first[0]) return stopColor(first);
  if (t >= last[0]) return stopColor(last);

  for (let i = 0; i < stops.length - 1; i++) {
    const s0 = stops[i];
    const s1 = stops[i + 1];
    if (!s0 || !s1) break;
    if (t >= s0[0] && t <= s1[0]) {
      const local = (t - s0[0]) / (s1[0] - s0[0]);
      return [lerp(s0[1], s1[1], local), lerp(s0[2], s1[2], local), lerp(s0[3], s1[3], local), 1];
    }
  }
  return stopColor(last);
}

export function sampleColormap(name: ColormapName, t: number): Rgba {
  const x = Number.isNaN(t) ? 0 : clamp01(t);
  if (name === 'grayscale') return [x, x, x, 1];
  return samplePalette(COLORMAP_STOPS[name], x);
}

/**
 * Channel-wise lerp between two colors, alpha included. `t` is clamped to [0, 1].
 */
export function lerpRgba(a: Rgba, b: Rgba, t: number): Rgba {
  const x = Number.isNaN(t) ? 0 : clamp01(t);
  return [lerp(a[0], b[0], x), lerp(a[1], b[1], x), lerp(a[2], b[2], x), lerp(a[3], b[3], x)];
}
