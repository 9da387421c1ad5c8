/**
 * Cuts rings that exceed a vertex limit into smaller rings.
 *
 * Each cut is an axis-aligned line through the median vertex coordinate of
 * the longer bounding-box axis. Both sides are clipped against the line
 * (Sutherland-Hodgman), so neighbouring pieces share their seam vertices
 * and together cover the original area.
 */

import { OutputLimitError } from '../core/errors.js';

/** Vertex in integer database units */
export type DatabasePoint = [number, number];

type Axis = 0 | 1;

function samePoint(a: DatabasePoint, b: DatabasePoint): boolean {
  return a[0] === b[0] && a[1] === b[1];
}

/**
 * Twice the signed area (shoelace sum) of an open ring.
 */
export function ringArea2(ring: readonly DatabasePoint[]): number {
  let sum = 0;
  ring.forEach((point, index) => {
    const next = ring[(index + 1) % ring.length];
    sum += point[0] * next[1] - next[0] * point[1];
  });
  return sum;
}

function crossing(from: DatabasePoint, to: DatabasePoint, axis: Axis, cut: number): DatabasePoint {
  const other = axis === 0 ? 1 : 0;
  const f = (cut - from[axis]) / (to[axis] - from[axis]);
  const value = Math.round(from[other] + f * (to[other] - from[other])) + 0;
  return axis === 0 ? [cut, value] : [value, cut];
}

/**
 * Keeps the part of an open ring on one side of the line `point[axis] = cut`.
 * Points on the line belong to both sides.
 */
export function clipRing(
  ring: readonly DatabasePoint[],
  axis: Axis,
  cut: number,
  keepBelow: boolean
): DatabasePoint[] {
  const inside = (point: DatabasePoint) => (keepBelow ? point[axis] <= cut : point[axis] >= cut);
  const clipped: DatabasePoint[] = [];
  const append = (point: DatabasePoint) => {
    const last = clipped[clipped.length - 1];
    if (!last || !samePoint(last, point)) {
      clipped.push(point);
    }
  };

  let previous = ring[ring.length - 1];
  for (const current of ring) {
    const currentInside = inside(current);
    if (currentInside !== inside(previous)) {
      append(crossing(previous, current, axis, cut));
    }
    if (currentInside) {
      append(current);
    }
    previous = current;
  }

  if (clipped.length > 1 && samePoint(clipped[0], clipped[clipped.length - 1])) {
    clipped.pop();
  }
  return clipped;
}

function cutCoordinate(ring: readonly DatabasePoint[], axis: Axis): number | undefined {
  const values = ring.map((point) => point[axis]).sort((a, b) => a - b);
  const min = values[0];
  const max = values[values.length - 1];
  if (min === max) {
    return undefined;
  }
  const median = values[Math.floor(values.length / 2)];
  return median > min && median < max ? median : Math.floor((min + max) / 2);
}

function axesByExtent(ring: readonly DatabasePoint[]): Axis[] {
  let minX = Infinity;
  let maxX = -Infinity;
  let minY = Infinity;
  let maxY = -Infinity;
  for (const [x, y] of ring) {
    minX = Math.min(minX, x);
    maxX = Math.max(maxX, x);
    minY = Math.min(minY, y);
    maxY = Math.max(maxY, y);
  }
  return maxX - minX >= maxY - minY ? [0, 1] : [1, 0];
}

/**
 * Splits an open ring until every piece holds at most `maxVertices` vertices.
 * Pieces of zero area are dropped.
 * @throws OutputLimitError when a ring cannot be reduced by cutting
 */
export function fractureRing(ring: readonly DatabasePoint[], maxVertices: number): DatabasePoint[][] {
  if (ring.length <= maxVertices) {
    return [ring.slice()];
  }

  for (const axis of axesByExtent(ring)) {
    const cut = cutCoordinate(ring, axis);
    if (cut === undefined) continue;

    const below = clipRing(ring, axis, cut, true);
    const above = clipRing(ring, axis, cut, false);
    if (below.length < ring.length && above.length < ring.length) {
      return [below, above]
        .filter((piece) => piece.length >= 3 && ringArea2(piece) !== 0)
        .flatMap((piece) => fractureRing(piece, maxVertices));
    }
  }

  throw new OutputLimitError(
    `Polygon with ${ring.length} vertices cannot be split into boundaries of at most ${maxVertices}`,
    { vertices: ring.length, limit: maxVertices }
  );
}
