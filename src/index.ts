/**
 * outline2gds - curve outlines to GDSII polygons
 *
 * Flattens line, bezier and arc segments into polygons, centers and scales
 * the combined geometry, and writes it as a GDSII layout stream.
 */

// Main entry point
export {
  OutlineConverter,
  createConverter,
  convertPaths,
  convertToGds,
} from './core/OutlineConverter.js';
export type { IOutlineConverter, OutlineConverterConfig } from './core/OutlineConverter.js';
export { resolveConversionOptions } from './core/options.js';

// Errors
export {
  ConversionError,
  ConfigurationError,
  ResourceLimitError,
  InvalidGeometryError,
  OutputLimitError,
  InvalidDocumentError,
  errorMessage,
} from './core/errors.js';
export type { ConversionErrorCode } from './core/errors.js';

// Types - Options and Results
export type {
  ConversionOptions,
  ResolvedConversionOptions,
  FlattenMethod,
  LogLevel,
  ConversionStats,
  ConversionResult,
  EmptyConversionResult,
  PolygonConversionResult,
  AdaptiveFlattenResult,
} from './types/index.js';
export { DEFAULT_CONVERSION_OPTIONS } from './types/index.js';

// Types - Geometry
export type {
  Point,
  CurveKind,
  CurveSegment,
  ArcParameters,
  PointTuple,
  SegmentDescriptor,
  Path,
  Polygon,
  BoundingBox,
  TransformParameters,
} from './types/index.js';

// Geometry components (for advanced usage)
export {
  LineSegment,
  QuadraticSegment,
  CubicSegment,
  ArcSegment,
  createSegment,
  evaluateFinite,
  sampleSegment,
  flattenPathFixed,
  AdaptiveFlattener,
  chordDeviation,
  assemblePath,
  isSamePoint,
  JOIN_TOLERANCE,
  computeBounds,
  TransformEngine,
  defaultTransformEngine,
} from './geometry/index.js';
export type { AdaptiveFlattenerOptions, TransformRequest } from './geometry/index.js';

// Output sinks
export {
  emitPolygons,
  CollectingSink,
  FanOutSink,
  GdsWriter,
  SvgPreviewWriter,
} from './output/index.js';
export type { PolygonSink, GdsWriterOptions, GdsWriterStats, SvgPreviewOptions } from './output/index.js';

// Input documents
export { parseSegmentDocument, validateSegmentDocument } from './parsers/index.js';
export type { SegmentDocument } from './parsers/index.js';

// Logger and preview rasterizer
export { createLogger, Logger, PreviewRasterizer, createPreviewRasterizer } from './utils/index.js';
export type { ILogger, LogEntry, LogWriter, RasterizeOptions } from './utils/index.js';
