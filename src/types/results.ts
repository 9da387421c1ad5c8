import type { BoundingBox, Point, Polygon, TransformParameters } from './geometry.js';
import type { FlattenMethod } from './options.js';

/**
 * Counters collected during a conversion run.
 */
export interface ConversionStats {
  /** Method used to flatten the curves */
  method: FlattenMethod;

  /** Number of paths handed to the converter */
  inputPaths: number;

  /** Number of polygons produced */
  polygonCount: number;

  /** Paths that contributed no points (no segments) */
  skippedPaths: number;

  /** Total vertices across all polygons */
  pointCount: number;
}

/**
 * Returned when flattening produced no points at all.
 * Callers should skip output rather than treat this as a failure.
 */
export interface EmptyConversionResult {
  status: 'empty';
  stats: ConversionStats;
}

/**
 * Transformed, output-ready geometry.
 */
export interface PolygonConversionResult {
  status: 'ok';

  /**
   * Transformed polygons in input path order.
   */
  polygons: Polygon[];

  /**
   * Combined extent of the flattened geometry before transformation.
   */
  bounds: BoundingBox;

  /**
   * Transform that was applied to every point.
   */
  transform: TransformParameters;

  stats: ConversionStats;
}

export type ConversionResult = EmptyConversionResult | PolygonConversionResult;

/**
 * Result of flattening a single segment with the adaptive flattener.
 */
export interface AdaptiveFlattenResult {
  /** Polyline vertices in parameter order */
  points: Point[];

  /** Parameter value of each vertex, same length as points */
  parameters: number[];

  /** Deepest bisection level that produced an accepted chord */
  depth: number;
}
