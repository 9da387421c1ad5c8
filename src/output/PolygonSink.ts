/**
 * Boundary between the converter and whatever encodes its polygons.
 */

import type { Point, Polygon } from '../types/geometry.js';

/**
 * Receives transformed polygons one at a time, in emission order.
 * The sink owns all output encoding.
 */
export interface PolygonSink {
  addPolygon(points: readonly Point[], layer: number): void;
}

/**
 * Submits each polygon to the sink in order.
 * @returns the number of polygons submitted
 */
export function emitPolygons(polygons: readonly Polygon[], sink: PolygonSink): number {
  for (const polygon of polygons) {
    sink.addPolygon(polygon.points, polygon.layer);
  }
  return polygons.length;
}

/**
 * Sink that keeps copies of everything it receives.
 */
export class CollectingSink implements PolygonSink {
  readonly polygons: Polygon[] = [];

  addPolygon(points: readonly Point[], layer: number): void {
    this.polygons.push({
      points: points.map((point) => ({ x: point.x, y: point.y })),
      layer,
    });
  }
}

/**
 * Forwards every polygon to several sinks, in the order given.
 */
export class FanOutSink implements PolygonSink {
  private readonly sinks: readonly PolygonSink[];

  constructor(...sinks: PolygonSink[]) {
    this.sinks = sinks;
  }

  addPolygon(points: readonly Point[], layer: number): void {
    for (const sink of this.sinks) {
      sink.addPolygon(points, layer);
    }
  }
}
