/**
 * Uniform-step curve sampling.
 * Cost is linear in the step count and independent of curvature.
 */

import type { CurveSegment, Path, Point } from '../types/geometry.js';
import { ConfigurationError } from '../core/errors.js';
import { evaluateFinite } from './CurveSegments.js';

/**
 * Rejects step counts that are not integers >= 1.
 */
export function assertValidSteps(steps: number): void {
  if (!Number.isInteger(steps) || steps < 1) {
    throw new ConfigurationError(`steps must be an integer >= 1, got ${steps}`, ['steps']);
  }
}

/**
 * Samples a segment at t = i / steps for i = 0..steps inclusive.
 * @returns steps + 1 points
 * @throws InvalidGeometryError when a sample is not finite
 */
export function sampleSegment(segment: CurveSegment, steps: number): Point[] {
  assertValidSteps(steps);

  const points: Point[] = [];
  for (let i = 0; i <= steps; i++) {
    points.push(evaluateFinite(segment, i / steps));
  }
  return points;
}

/**
 * Samples every segment of a path.
 * Adjacent lists repeat their shared endpoint; the path assembler removes it.
 */
export function flattenPathFixed(path: Path, steps: number): Point[][] {
  assertValidSteps(steps);
  return path.segments.map((segment) => sampleSegment(segment, steps));
}
