/**
 * Geometry module: curve segments, flattening, assembly, bounds and transforms.
 */

export {
  LineSegment,
  QuadraticSegment,
  CubicSegment,
  ArcSegment,
  createSegment,
  resolveArcCenter,
  evaluateFinite,
  type ArcCenterForm,
} from './CurveSegments.js';
export { sampleSegment, flattenPathFixed, assertValidSteps } from './FixedStepFlattener.js';
export {
  AdaptiveFlattener,
  chordDeviation,
  assertValidMaxError,
  DEFAULT_MAX_DEPTH,
  DEFAULT_MAX_POINTS,
  type AdaptiveFlattenerOptions,
} from './AdaptiveFlattener.js';
export { assemblePath, isSamePoint, JOIN_TOLERANCE } from './PathAssembler.js';
export { computeBounds, computePointBounds } from './BoundsAggregator.js';
export {
  TransformEngine,
  defaultTransformEngine,
  assertValidTargetWidth,
  type TransformRequest,
} from './TransformEngine.js';
