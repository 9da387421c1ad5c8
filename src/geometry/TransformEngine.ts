/**
 * Center, scale and mirror transform applied to the flattened geometry.
 * One scale factor drives both axes, so aspect ratio is preserved.
 */

import type { BoundingBox, Point, Polygon, TransformParameters } from '../types/geometry.js';
import { ConfigurationError } from '../core/errors.js';

export interface TransformRequest {
  /** Width the bounding box is scaled to. Undefined keeps the input scale. */
  targetWidth?: number;
  /** Mirror y after centering and scaling */
  flipY?: boolean;
}

/**
 * Rejects target widths that are present but not finite and positive.
 */
export function assertValidTargetWidth(targetWidth: number | undefined): void {
  if (targetWidth === undefined) return;
  if (!Number.isFinite(targetWidth) || targetWidth <= 0) {
    throw new ConfigurationError(`targetWidth must be a finite number > 0, got ${targetWidth}`, ['targetWidth']);
  }
}

export class TransformEngine {
  /**
   * Derives the transform for a bounding box.
   * Scale stays 1 when no target width is given or the box has zero width.
   */
  derive(bounds: BoundingBox, request: TransformRequest = {}): TransformParameters {
    assertValidTargetWidth(request.targetWidth);

    const width = bounds.maxX - bounds.minX;
    const scale = request.targetWidth !== undefined && width > 0 ? request.targetWidth / width : 1;

    return {
      scale,
      centerX: 0.5 * (bounds.minX + bounds.maxX),
      centerY: 0.5 * (bounds.minY + bounds.maxY),
      flipY: request.flipY ?? false,
    };
  }

  transformPoint(point: Point, params: TransformParameters): Point {
    const x = (point.x - params.centerX) * params.scale;
    const y = (point.y - params.centerY) * params.scale;
    // 0 - y rather than -y: a mirrored zero stays +0
    return { x, y: params.flipY ? 0 - y : y };
  }

  transformPolygon(polygon: Polygon, params: TransformParameters): Polygon {
    return {
      points: polygon.points.map((point) => this.transformPoint(point, params)),
      layer: polygon.layer,
    };
  }

  /**
   * Transforms every polygon. Inputs are left untouched.
   */
  apply(polygons: readonly Polygon[], params: TransformParameters): Polygon[] {
    return polygons.map((polygon) => this.transformPolygon(polygon, params));
  }
}

/**
 * Shared stateless instance.
 */
export const defaultTransformEngine = new TransformEngine();
