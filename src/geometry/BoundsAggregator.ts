/**
 * Combined extent of a polygon set.
 */

import type { BoundingBox, Point, Polygon } from '../types/geometry.js';

/**
 * Computes the bounding box over every point of every polygon.
 * @returns undefined when the polygons hold no points (empty geometry)
 */
export function computeBounds(polygons: readonly Polygon[]): BoundingBox | undefined {
  return computePointBounds(polygons.map((polygon) => polygon.points));
}

/**
 * Computes the bounding box over several point lists.
 * @returns undefined when no list holds a point
 */
export function computePointBounds(pointLists: readonly (readonly Point[])[]): BoundingBox | undefined {
  let minX = Infinity;
  let minY = Infinity;
  let maxX = -Infinity;
  let maxY = -Infinity;
  let count = 0;

  for (const points of pointLists) {
    for (const point of points) {
      minX = Math.min(minX, point.x);
      minY = Math.min(minY, point.y);
      maxX = Math.max(maxX, point.x);
      maxY = Math.max(maxY, point.y);
    }
    count += points.length;
  }

  if (count === 0) {
    return undefined;
  }

  return {
    minX,
    maxX,
    minY,
    maxY,
    width: maxX - minX,
    height: maxY - minY,
  };
}
