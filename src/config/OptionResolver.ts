import type {
  ColorMode,
  LinePattern,
  MarkerShapeName,
  PlotOptions,
  Rgba,
  SeriesConfig,
  Vec2,
} from './types';
import { COLORMAP_NAMES, LINE_PATTERNS, MARKER_SHAPES } from './types';
import { defaultOptions, defaultPalette, defaultSeriesStyle } from './defaults';
import { normalizePlotPoints } from '../data/plotPoints';

export interface ResolvedSeriesConfig {
  readonly name: string;
  /** Finite `[x, y]` points; generators are already sampled. */
  readonly points: ReadonlyArray<Vec2>;
  readonly color: Rgba;
  readonly colorMode: ColorMode;
  readonly marker: MarkerShapeName;
  readonly linePattern: LinePattern;
  readonly showMarkers: boolean;
  readonly showLines: boolean;
}

export interface ResolvedPlotOptions {
  readonly padding: Vec2;
  readonly markerRadius: number;
  readonly lineWidth: number;
  readonly lineFringe: number;
  readonly showMarkers: boolean;
  readonly showLines: boolean;
  readonly xRange: Vec2 | null;
  readonly yRange: Vec2 | null;
  readonly palette: ReadonlyArray<Rgba>;
  readonly series: ReadonlyArray<ResolvedSeriesConfig>;
}

const isFiniteNumber = (v: unknown): v is number => typeof v === 'number' && Number.isFinite(v);

const positiveOr = (v: unknown, fallback: number): number => (isFiniteNumber(v) && v > 0 ? v : fallback);

const nonNegativeOr = (v: unknown, fallback: number): number => (isFiniteNumber(v) && v >= 0 ? v : fallback);

const isVec2 = (v: unknown): v is Vec2 =>
  Array.isArray(v) && v.length >= 2 && isFiniteNumber(v[0]) && isFiniteNumber(v[1]);

const isRgba = (v: unknown): v is Rgba =>
  Array.isArray(v) && v.length >= 4 && v.slice(0, 4).every(isFiniteNumber);

const resolvePadding = (padding: unknown): Vec2 => {
  if (isFiniteNumber(padding) && padding >= 0) return [padding, padding];
  if (isVec2(padding) && padding[0] >= 0 && padding[1] >= 0) return [padding[0], padding[1]];
  return defaultOptions.padding;
};

// Explicit ranges are kept only when they are strictly increasing.
const resolveRange = (range: unknown): Vec2 | null =>
  isVec2(range) && range[1] > range[0] ? [range[0], range[1]] : null;

const sanitizePalette = (palette: unknown): Rgba[] => {
  if (!Array.isArray(palette)) return [];
  return palette.filter(isRgba);
};

const resolveMarker = (marker: unknown): MarkerShapeName =>
  MARKER_SHAPES.find((m) => m === marker) ?? defaultSeriesStyle.marker;

const resolveLinePattern = (pattern: unknown): LinePattern =>
  LINE_PATTERNS.find((p) => p === pattern) ?? defaultSeriesStyle.linePattern;

const resolveColorMode = (mode: ColorMode | undefined): ColorMode => {
  if (!mode) return defaultSeriesStyle.colorMode;
  switch (mode.type) {
    case 'solid':
      return mode;
    case 'value-gradient':
      return isRgba(mode.low) && isRgba(mode.high) ? mode : defaultSeriesStyle.colorMode;
    case 'index-gradient':
      return isRgba(mode.start) && isRgba(mode.end) ? mode : defaultSeriesStyle.colorMode;
    case 'colormap':
      return COLORMAP_NAMES.some((n) => n === mode.name) ? mode : defaultSeriesStyle.colorMode;
    default:
      return defaultSeriesStyle.colorMode;
  }
};

export function resolveOptions(userOptions: PlotOptions = {}): ResolvedPlotOptions {
  const paletteOverride = sanitizePalette(userOptions.palette);
  const palette: ReadonlyArray<Rgba> = paletteOverride.length > 0 ? paletteOverride : defaultPalette;

  const showMarkers = userOptions.showMarkers ?? defaultOptions.showMarkers;
  const showLines = userOptions.showLines ?? defaultOptions.showLines;

  const series = (userOptions.series ?? []).map((s: SeriesConfig, i): ResolvedSeriesConfig => {
    const inheritedColor = palette[i % palette.length] ?? defaultPalette[0];
    return {
      name: s.name ?? `Series ${i + 1}`,
      points: normalizePlotPoints(s.data),
      color: isRgba(s.color) ? s.color : inheritedColor,
      colorMode: resolveColorMode(s.colorMode),
      marker: resolveMarker(s.marker),
      linePattern: resolveLinePattern(s.linePattern),
      showMarkers: s.showMarkers ?? showMarkers,
      showLines: s.showLines ?? showLines,
    };
  });

  return {
    padding: resolvePadding(userOptions.padding),
    markerRadius: positiveOr(userOptions.markerRadius, defaultOptions.markerRadius),
    lineWidth: positiveOr(userOptions.lineWidth, defaultOptions.lineWidth),
    lineFringe: nonNegativeOr(userOptions.lineFringe, defaultOptions.lineFringe),
    showMarkers,
    showLines,
    xRange: resolveRange(userOptions.xRange),
    yRange: resolveRange(userOptions.yRange),
    palette,
    series,
  };
}

export const OptionResolver = { resolve: resolveOptions } as const;
