/**
 * Joins per-segment vertex lists into one vertex list per path.
 */

import type { Point } from '../types/geometry.js';

/** Per-axis tolerance for recognising a shared segment endpoint */
export const JOIN_TOLERANCE = 1e-12;

/**
 * True when both coordinates differ by less than the tolerance.
 */
export function isSamePoint(a: Point, b: Point, tolerance: number = JOIN_TOLERANCE): boolean {
  return Math.abs(a.x - b.x) < tolerance && Math.abs(a.y - b.y) < tolerance;
}

interface AssemblyState {
  points: Point[];
  /** Last vertex appended so far, undefined before the first segment */
  last: Point | undefined;
}

/**
 * Concatenates segment vertex lists, dropping the first vertex of a list when it
 * repeats the previous list's last vertex. Vertices repeated inside a single
 * list are kept.
 * @returns an empty list when no segment contributed points
 */
export function assemblePath(segmentPoints: readonly (readonly Point[])[]): Point[] {
  const assembled = segmentPoints.reduce<AssemblyState>(
    (state, points) => {
      if (points.length === 0) {
        return state;
      }

      const skip = state.last !== undefined && isSamePoint(state.last, points[0]) ? 1 : 0;

      for (const point of points.slice(skip)) {
        state.points.push({ x: point.x, y: point.y });
      }

      return { points: state.points, last: state.points[state.points.length - 1] };
    },
    { points: [], last: undefined }
  );

  return assembled.points;
}
