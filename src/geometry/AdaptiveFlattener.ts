/**
 * Error-driven curve flattening by parameter bisection.
 *
 * An interval [t0, t1] is accepted when the curve point at the parameter
 * midpoint lies within `maxError` of the chord from curve(t0) to curve(t1).
 * Otherwise it is split at the parameter midpoint and both halves are
 * examined, left before right. Flat regions get few vertices and tight
 * bends get many.
 *
 * The deviation is sampled at a single point per interval, so it estimates
 * the chord error rather than bounding its maximum: a curve whose deviation
 * peaks away from the parameter midpoint can be accepted with a larger
 * true error.
 */

import type { CurveSegment, Path, Point } from '../types/geometry.js';
import type { AdaptiveFlattenResult } from '../types/results.js';
import { DEFAULT_CONVERSION_OPTIONS } from '../types/options.js';
import { ConfigurationError, ResourceLimitError } from '../core/errors.js';
import { evaluateFinite } from './CurveSegments.js';

export interface AdaptiveFlattenerOptions {
  /** Maximum accepted chord error, > 0 */
  maxError: number;
  /** Deepest bisection level before the segment is rejected */
  maxDepth?: number;
  /** Maximum vertices per segment before the segment is rejected */
  maxPoints?: number;
}

export const DEFAULT_MAX_DEPTH = DEFAULT_CONVERSION_OPTIONS.maxDepth;
export const DEFAULT_MAX_POINTS = DEFAULT_CONVERSION_OPTIONS.maxPoints;

interface PendingInterval {
  t0: number;
  t1: number;
  p0: Point;
  p2: Point;
  depth: number;
}

/**
 * Perpendicular distance of `mid` from the chord `from`-`to`.
 * A zero-length chord has no direction and reports 0.
 */
export function chordDeviation(from: Point, mid: Point, to: Point): number {
  const chordX = to.x - from.x;
  const chordY = to.y - from.y;
  const chordLength = Math.hypot(chordX, chordY);
  if (chordLength === 0) {
    return 0;
  }
  const midX = mid.x - from.x;
  const midY = mid.y - from.y;
  return Math.abs(chordX * midY - chordY * midX) / chordLength;
}

/**
 * Rejects tolerances that are not finite and positive.
 */
export function assertValidMaxError(maxError: number): void {
  if (!Number.isFinite(maxError) || maxError <= 0) {
    throw new ConfigurationError(`maxError must be a finite number > 0, got ${maxError}`, ['maxError']);
  }
}

export class AdaptiveFlattener {
  readonly maxError: number;
  readonly maxDepth: number;
  readonly maxPoints: number;

  constructor(options: AdaptiveFlattenerOptions) {
    assertValidMaxError(options.maxError);

    const maxDepth = options.maxDepth ?? DEFAULT_MAX_DEPTH;
    if (!Number.isInteger(maxDepth) || maxDepth < 0) {
      throw new ConfigurationError(`maxDepth must be a non-negative integer, got ${maxDepth}`, ['maxDepth']);
    }

    const maxPoints = options.maxPoints ?? DEFAULT_MAX_POINTS;
    if (!Number.isInteger(maxPoints) || maxPoints < 2) {
      throw new ConfigurationError(`maxPoints must be an integer >= 2, got ${maxPoints}`, ['maxPoints']);
    }

    this.maxError = options.maxError;
    this.maxDepth = maxDepth;
    this.maxPoints = maxPoints;
  }

  /**
   * Flattens a segment, reporting the parameter of every vertex and the depth reached.
   * @throws ResourceLimitError when the depth or point budget is exhausted
   * @throws InvalidGeometryError when the segment evaluates to a non-finite point
   */
  subdivide(segment: CurveSegment): AdaptiveFlattenResult {
    const first = evaluateFinite(segment, 0);
    const last = evaluateFinite(segment, 1);

    const points: Point[] = [first];
    const parameters: number[] = [0];
    let deepest = 0;

    // Right half is pushed first so the left half is emitted first
    const stack: PendingInterval[] = [{ t0: 0, t1: 1, p0: first, p2: last, depth: 0 }];

    for (let interval = stack.pop(); interval; interval = stack.pop()) {
      const { t0, t1, p0, p2, depth } = interval;
      const tm = 0.5 * (t0 + t1);
      const p1 = evaluateFinite(segment, tm);

      if (chordDeviation(p0, p1, p2) <= this.maxError) {
        points.push(p2);
        parameters.push(t1);
        deepest = Math.max(deepest, depth);

        if (points.length > this.maxPoints) {
          throw new ResourceLimitError(
            'points',
            `Adaptive flattening of a ${segment.kind} segment exceeded ${this.maxPoints} points`,
            { kind: segment.kind, maxPoints: this.maxPoints, maxError: this.maxError }
          );
        }
        continue;
      }

      if (depth >= this.maxDepth) {
        throw new ResourceLimitError(
          'depth',
          `Adaptive flattening of a ${segment.kind} segment exceeded depth ${this.maxDepth}`,
          { kind: segment.kind, maxDepth: this.maxDepth, maxError: this.maxError, t0, t1 }
        );
      }

      stack.push({ t0: tm, t1, p0: p1, p2, depth: depth + 1 });
      stack.push({ t0, t1: tm, p0, p2: p1, depth: depth + 1 });
    }

    return { points, parameters, depth: deepest };
  }

  /**
   * Flattens a segment into polyline vertices.
   */
  flattenSegment(segment: CurveSegment): Point[] {
    return this.subdivide(segment).points;
  }

  /**
   * Flattens every segment of a path.
   * Adjacent lists share their endpoint; the path assembler removes the repeat.
   */
  flattenPath(path: Path): Point[][] {
    return path.segments.map((segment) => this.flattenSegment(segment));
  }
}
