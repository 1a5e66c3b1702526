import type { ColorMode, LinePattern, MarkerShapeName, PlotOptions, Rgba } from './types';

export const defaultPalette = [
  [0.329, 0.439, 0.776, 1],
  [0.569, 0.8, 0.459, 1],
  [0.98, 0.784, 0.345, 1],
  [0.933, 0.4, 0.4, 1],
  [0.451, 0.753, 0.871, 1],
  [0.231, 0.635, 0.447, 1],
  [0.988, 0.518, 0.322, 1],
  [0.604, 0.376, 0.706, 1],
] as const satisfies ReadonlyArray<Rgba>;

export const defaultSeriesStyle: {
  readonly marker: MarkerShapeName;
  readonly linePattern: LinePattern;
  readonly colorMode: ColorMode;
} = {
  marker: 'circle',
  linePattern: 'solid',
  colorMode: { type: 'solid' },
};

export const defaultOptions = {
  padding: [50, 50],
  markerRadius: 4,
  lineWidth: 2,
  lineFringe: 0,
  showMarkers: true,
  showLines: true,
  palette: defaultPalette,
} as const satisfies Omit<Required<PlotOptions>, 'series' | 'xRange' | 'yRange'>;
