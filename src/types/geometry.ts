/**
 * 2D point in coordinate space.
 */
export interface Point {
  x: number;
  y: number;
}

/**
 * Curve segment kinds understood by the flatteners.
 */
export type CurveKind = 'line' | 'quadratic' | 'cubic' | 'arc';

/**
 * A parametric curve segment.
 * Implementations are immutable once constructed.
 */
export interface CurveSegment {
  readonly kind: CurveKind;
  /** Point at t = 0 */
  readonly start: Point;
  /** Point at t = 1 */
  readonly end: Point;
  /**
   * Evaluates the curve at parameter t in [0, 1].
   * Values outside the range are clamped.
   */
  evaluate(t: number): Point;
}

/**
 * SVG-style elliptical arc parameters (endpoint parameterization).
 */
export interface ArcParameters {
  /** Horizontal radius */
  rx: number;
  /** Vertical radius */
  ry: number;
  /** X-axis rotation in degrees */
  xAxisRotation: number;
  /** Whether to use the larger arc (true) or smaller arc (false) */
  largeArcFlag: boolean;
  /** Direction: true = positive-angle direction, false = negative */
  sweepFlag: boolean;
}

/**
 * Point written as an [x, y] pair in descriptor documents.
 */
export type PointTuple = readonly [number, number];

export interface LineDescriptor {
  type: 'line';
  start: PointTuple;
  end: PointTuple;
}

export interface QuadraticDescriptor {
  type: 'quadratic';
  start: PointTuple;
  control: PointTuple;
  end: PointTuple;
}

export interface CubicDescriptor {
  type: 'cubic';
  start: PointTuple;
  control1: PointTuple;
  control2: PointTuple;
  end: PointTuple;
}

export interface ArcDescriptor extends ArcParameters {
  type: 'arc';
  start: PointTuple;
  end: PointTuple;
}

/**
 * Plain-data form of a curve segment, tagged by `type`.
 */
export type SegmentDescriptor = LineDescriptor | QuadraticDescriptor | CubicDescriptor | ArcDescriptor;

/**
 * One contiguous drawable outline: an ordered run of segments.
 */
export interface Path {
  segments: readonly CurveSegment[];
  /** Optional identifier carried through for diagnostics */
  id?: string;
}

/**
 * Ordered vertex list with the layer it will be written to.
 */
export interface Polygon {
  points: Point[];
  layer: number;
}

/**
 * Axis-aligned extent of a set of points.
 */
export interface BoundingBox {
  minX: number;
  maxX: number;
  minY: number;
  maxY: number;
  width: number;
  height: number;
}

/**
 * Uniform similarity transform applied before emission.
 * x' = (x - centerX) * scale, y' = (y - centerY) * scale, then y' = -y' when flipY.
 */
export interface TransformParameters {
  scale: number;
  centerX: number;
  centerY: number;
  flipY: boolean;
}
