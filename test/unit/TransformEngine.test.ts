import { describe, it, expect } from 'vitest';
import { TransformEngine, assertValidTargetWidth } from '../../src/geometry/TransformEngine.js';
import { ConfigurationError } from '../../src/core/errors.js';
import { computeBounds } from '../../src/geometry/BoundsAggregator.js';
import type { BoundingBox } from '../../src/types/index.js';

const box = (minX: number, maxX: number, minY: number, maxY: number): BoundingBox => ({
  minX,
  maxX,
  minY,
  maxY,
  width: maxX - minX,
  height: maxY - minY,
});

describe('TransformEngine', () => {
  const engine = new TransformEngine();

  describe('derive', () => {
    it('should scale the bounding box width to the target width', () => {
      const params = engine.derive(box(0, 20, 0, 10), { targetWidth: 100 });

      expect(params).toEqual({ scale: 5, centerX: 10, centerY: 5, flipY: false });
    });

    it('should keep a unit scale without a target width', () => {
      expect(engine.derive(box(-4, 4, 2, 6)).scale).toBe(1);
    });

    it('should keep a unit scale for a zero-width box', () => {
      const params = engine.derive(box(3, 3, -1, 1), { targetWidth: 100 });

      expect(params.scale).toBe(1);
      expect(params.centerX).toBe(3);
      expect(params.centerY).toBe(0);
    });

    it('should reject non-positive target widths', () => {
      expect(() => engine.derive(box(0, 1, 0, 1), { targetWidth: 0 })).toThrow(ConfigurationError);
      expect(() => assertValidTargetWidth(-5)).toThrow('targetWidth must be a finite number > 0, got -5');
      expect(() => assertValidTargetWidth(Number.POSITIVE_INFINITY)).toThrow(ConfigurationError);
      expect(() => assertValidTargetWidth(undefined)).not.toThrow();
    });
  });

  describe('apply', () => {
    it('should center the geometry and keep the aspect ratio', () => {
      const params = engine.derive(box(0, 20, 0, 10), { targetWidth: 100 });
      const [polygon] = engine.apply(
        [
          {
            points: [
              { x: 0, y: 0 },
              { x: 20, y: 10 },
            ],
            layer: 4,
          },
        ],
        params
      );

      expect(polygon).toEqual({
        points: [
          { x: -50, y: -25 },
          { x: 50, y: 25 },
        ],
        layer: 4,
      });
    });

    it('should mirror y after centering', () => {
      const params = engine.derive(box(0, 0, -1, 1), { flipY: true });

      expect(engine.transformPoint({ x: 0, y: 1 }, params)).toEqual({ x: 0, y: -1 });
      expect(engine.transformPoint({ x: 0, y: -1 }, params)).toEqual({ x: 0, y: 1 });
    });

    it('should map a mirrored zero to positive zero', () => {
      const params = { scale: 1, centerX: 0, centerY: 0, flipY: true };

      expect(Object.is(engine.transformPoint({ x: 1, y: 0 }, params).y, 0)).toBe(true);
    });

    it('should leave the input polygons untouched', () => {
      const input = [{ points: [{ x: 2, y: 2 }], layer: 0 }];
      engine.apply(input, { scale: 3, centerX: 1, centerY: 1, flipY: true });

      expect(input[0].points[0]).toEqual({ x: 2, y: 2 });
    });
  });

  it('should reproduce the bounding box extents when the target width equals the input width', () => {
    const polygons = [
      {
        points: [
          { x: 1.25, y: -3.5 },
          { x: 7.75, y: 2 },
          { x: 4, y: 9.125 },
        ],
        layer: 0,
      },
    ];
    const bounds = computeBounds(polygons);
    if (!bounds) throw new Error('expected bounds');

    const params = engine.derive(bounds, { targetWidth: bounds.width, flipY: false });
    const moved = computeBounds(engine.apply(polygons, params));

    expect(params.scale).toBe(1);
    expect(moved?.width).toBeCloseTo(bounds.width, 12);
    expect(moved?.height).toBeCloseTo(bounds.height, 12);
    expect(moved?.minX).toBeCloseTo(-bounds.width / 2, 12);
    expect(moved?.maxY).toBeCloseTo(bounds.height / 2, 12);
  });
});
