/**
 * Type definitions for outline2gds.
 */

// Options and configuration
export type {
  ConversionOptions,
  FlattenMethod,
  LogLevel,
  ResolvedConversionOptions,
} from './options.js';
export { DEFAULT_CONVERSION_OPTIONS } from './options.js';

// Results
export type {
  ConversionStats,
  ConversionResult,
  EmptyConversionResult,
  PolygonConversionResult,
  AdaptiveFlattenResult,
} from './results.js';

// Geometry
export type {
  Point,
  CurveKind,
  CurveSegment,
  ArcParameters,
  PointTuple,
  LineDescriptor,
  QuadraticDescriptor,
  CubicDescriptor,
  ArcDescriptor,
  SegmentDescriptor,
  Path,
  Polygon,
  BoundingBox,
  TransformParameters,
} from './geometry.js';
