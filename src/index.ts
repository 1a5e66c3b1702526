/**
 * plotgpu - WebGPU scatter and line plots with SDF markers
 */

export const version = '0.1.0';

// Types
export type {
  Vec2,
  Rgba,
  MarkerShapeName,
  LinePattern,
  PlotUniforms,
  PointInstance,
  LineVertex,
  DataPoint,
  DataPointTuple,
  FunctionGenerator,
  PlotPoints,
  ColormapName,
  ColorMode,
  SeriesConfig,
  PlotOptions,
} from './config/types';
export { MARKER_SHAPES, LINE_PATTERNS, COLORMAP_NAMES } from './config/types';

// Options
export { defaultOptions, defaultPalette, defaultSeriesStyle } from './config/defaults';
export { OptionResolver, resolveOptions } from './config/OptionResolver';
export type { ResolvedPlotOptions, ResolvedSeriesConfig } from './config/OptionResolver';

// Pipeline stages (CPU reference of plot.wgsl)
export { mapDataToScreen, mapScreenToNdc, mapDataToNdc } from './core/coordinateMapper';
export {
  evaluateShapeSdf,
  evaluateShapeSdfForTag,
  markerShapeTag,
  resolveMarkerShapeTag,
} from './core/shapeSdf';
export { QUAD_VERTICES, markerVertex, markerFragment, markerCoverage } from './core/markerStage';
export type { MarkerVertexOutput, MarkerFragmentInput } from './core/markerStage';
export {
  LINE_PATTERN_RUNS,
  linePatternTag,
  resolveLinePatternTag,
  lineVertex,
  lineFragment,
  lineEdgeAlpha,
  isLinePatternVisible,
} from './core/lineStage';
export type { LineVertexOutput, LineFragmentInput } from './core/lineStage';

// Uniforms
export {
  PLOT_UNIFORMS_BYTES,
  PLOT_UNIFORMS_FLOATS,
  PlotUniformsError,
  packPlotUniforms,
  validatePlotUniforms,
  assertValidPlotUniforms,
} from './core/uniformLayout';
export type { PlotUniformsIssue, PlotUniformsIssueCode } from './core/uniformLayout';

// Data preparation
export { normalizePlotPoints, sampleFunction, isFunctionGenerator } from './data/plotPoints';
export { computeDataRanges } from './data/dataRanges';
export type { DataRanges } from './data/dataRanges';
export { resolvePointColors } from './data/seriesColors';
export { tessellateLine } from './data/tessellateLine';
export type { TessellateLineOptions } from './data/tessellateLine';
export {
  POINT_INSTANCE_STRIDE_BYTES,
  LINE_VERTEX_STRIDE_BYTES,
  packPointInstances,
  packLineVertices,
} from './data/instanceLayout';

// Utilities
export { sampleColormap, lerpRgba } from './utils/colormap';
export { computeTicks, defaultTickConfig } from './utils/ticks';
export type { TickConfig } from './utils/ticks';

// GPU
export { createPipelineCache } from './core/PipelineCache';
export type { PipelineCache, PipelineCacheStats, PipelineCacheEntryStats } from './core/PipelineCache';
export { createPlotUniforms } from './renderers/createPlotUniforms';
export type { PlotUniformBinding } from './renderers/createPlotUniforms';
export { createMarkerRenderer } from './renderers/createMarkerRenderer';
export type { MarkerRenderer, MarkerRendererOptions } from './renderers/createMarkerRenderer';
export { createLineRenderer } from './renderers/createLineRenderer';
export type { LineRenderer, LineRendererOptions } from './renderers/createLineRenderer';
export { createPlotRenderer, buildPlotGeometry } from './renderers/createPlotRenderer';
export type { PlotRenderer, PlotRendererOptions, PlotGeometry } from './renderers/createPlotRenderer';
export { createDynamicBuffer } from './renderers/rendererUtils';
export type { DynamicBuffer } from './renderers/rendererUtils';
