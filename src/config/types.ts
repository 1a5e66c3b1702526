/**
 * Plot configuration and GPU-facing data types.
 */

export type Vec2 = readonly [x: number, y: number];

/**
 * Straight (non-premultiplied) RGBA, each channel expected in [0, 1].
 */
export type Rgba = readonly [r: number, g: number, b: number, a: number];

/**
 * Marker outline selector.
 *
 * Wire tags follow declaration order in `MARKER_SHAPES` (circle = 0 … none = 7).
 */
export type MarkerShapeName =
  | 'circle'
  | 'square'
  | 'diamond'
  | 'triangle-up'
  | 'triangle-down'
  | 'cross'
  | 'plus'
  | 'none';

export const MARKER_SHAPES = [
  'circle',
  'square',
  'diamond',
  'triangle-up',
  'triangle-down',
  'cross',
  'plus',
  'none',
] as const satisfies ReadonlyArray<MarkerShapeName>;

/**
 * Line dash pattern. Wire tags follow declaration order in `LINE_PATTERNS`.
 */
export type LinePattern = 'solid' | 'dashed' | 'dotted' | 'dash-dot' | 'none';

export const LINE_PATTERNS = [
  'solid',
  'dashed',
  'dotted',
  'dash-dot',
  'none',
] as const satisfies ReadonlyArray<LinePattern>;

/**
 * Per-draw uniform block shared by the marker and line pipelines.
 *
 * Read-only for the duration of a draw; callers build a fresh value for the next one.
 */
export interface PlotUniforms {
  /** Render target size in pixels. */
  readonly viewportSize: Vec2;
  /** Data-space X extent as (min, max). */
  readonly xRange: Vec2;
  /** Data-space Y extent as (min, max). */
  readonly yRange: Vec2;
  /** Pixels reserved on each side of the plot area (horizontal, vertical). */
  readonly padding: Vec2;
  readonly markerRadius: number;
  readonly lineWidth: number;
}

/**
 * One marker. `position` is in data space.
 */
export interface PointInstance {
  readonly position: Vec2;
  readonly color: Rgba;
  readonly shape: MarkerShapeName;
}

/**
 * One vertex of caller-tessellated line geometry.
 *
 * `position` is already in screen pixels (top-left origin). `edgeDistance` is the signed
 * offset from the segment centerline, ±1 at the nominal line edge. `lineDistance` is the
 * accumulated arc length in pixels used by dash patterns.
 */
export interface LineVertex {
  readonly position: Vec2;
  readonly color: Rgba;
  readonly edgeDistance: number;
  readonly lineDistance: number;
  readonly pattern: LinePattern;
}

export type DataPointTuple = readonly [x: number, y: number];

export type DataPoint = DataPointTuple | Readonly<{ x: number; y: number }>;

/**
 * Describes y = fn(x), sampled at `points` evenly spaced x values over `xRange`.
 */
export interface FunctionGenerator {
  readonly fn: (x: number) => number;
  readonly xRange: Vec2;
  readonly points: number;
}

export type PlotPoints = ReadonlyArray<DataPoint> | FunctionGenerator;

export type ColormapName = 'viridis' | 'plasma' | 'turbo' | 'heat' | 'grayscale';

export const COLORMAP_NAMES = [
  'viridis',
  'plasma',
  'turbo',
  'heat',
  'grayscale',
] as const satisfies ReadonlyArray<ColormapName>;

/**
 * How per-point colors are derived for a series.
 *
 * - `'solid'`: every point uses the series color
 * - `'value-gradient'`: lerp `low` → `high` by the point's normalized Y
 * - `'index-gradient'`: lerp `start` → `end` by the point's position in the series
 * - `'colormap'`: sample a named colormap by normalized Y
 */
export type ColorMode =
  | Readonly<{ type: 'solid' }>
  | Readonly<{ type: 'value-gradient'; low: Rgba; high: Rgba }>
  | Readonly<{ type: 'index-gradient'; start: Rgba; end: Rgba }>
  | Readonly<{ type: 'colormap'; name: ColormapName }>;

export interface SeriesConfig {
  readonly name?: string;
  readonly data: PlotPoints;
  /** Falls back to the palette entry for the series index. */
  readonly color?: Rgba;
  readonly colorMode?: ColorMode;
  readonly marker?: MarkerShapeName;
  readonly linePattern?: LinePattern;
  /** Per-series overrides of the plot-level toggles. */
  readonly showMarkers?: boolean;
  readonly showLines?: boolean;
}

export interface PlotOptions {
  /** Pixels reserved around the plot area; a single number applies to both axes. */
  readonly padding?: number | Vec2;
  readonly markerRadius?: number;
  readonly lineWidth?: number;
  /** Anti-aliasing fringe added outside each line edge, in pixels. */
  readonly lineFringe?: number;
  readonly showMarkers?: boolean;
  readonly showLines?: boolean;
  /** Explicit axis ranges. When omitted the range is fitted to the data. */
  readonly xRange?: Vec2;
  readonly yRange?: Vec2;
  readonly palette?: ReadonlyArray<Rgba>;
  readonly series?: ReadonlyArray<SeriesConfig>;
}
