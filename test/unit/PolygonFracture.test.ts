import { describe, it, expect } from 'vitest';
import { clipRing, fractureRing, ringArea2 } from '../../src/output/PolygonFracture.js';
import type { DatabasePoint } from '../../src/output/PolygonFracture.js';

function circle(count: number, radius: number): DatabasePoint[] {
  return Array.from({ length: count }, (_, index): DatabasePoint => [
    Math.round(radius * Math.cos((2 * Math.PI * index) / count)),
    Math.round(radius * Math.sin((2 * Math.PI * index) / count)),
  ]);
}

describe('PolygonFracture', () => {
  const strip: DatabasePoint[] = [
    [0, 0],
    [10, 0],
    [20, 0],
    [30, 0],
    [30, 10],
    [20, 10],
    [10, 10],
    [0, 10],
  ];

  it('should return a ring within the limit unchanged', () => {
    expect(fractureRing(strip, 8)).toEqual([strip]);
  });

  it('should cut the longer axis at the median vertex coordinate', () => {
    expect(fractureRing(strip, 6)).toEqual([
      [
        [0, 0],
        [10, 0],
        [20, 0],
        [20, 10],
        [10, 10],
        [0, 10],
      ],
      [
        [20, 0],
        [30, 0],
        [30, 10],
        [20, 10],
      ],
    ]);
  });

  it('should clip a crossing edge at the cut line', () => {
    const triangle: DatabasePoint[] = [
      [0, 0],
      [10, 0],
      [0, 10],
    ];

    expect(clipRing(triangle, 0, 5, true)).toEqual([
      [0, 0],
      [5, 0],
      [5, 5],
      [0, 10],
    ]);
    expect(clipRing(triangle, 0, 5, false)).toEqual([
      [5, 0],
      [10, 0],
      [5, 5],
    ]);
  });

  it('should keep every piece within the limit and preserve the area', () => {
    const ring = circle(1000, 1_000_000);
    const pieces = fractureRing(ring, 100);
    const original = ringArea2(ring);
    const total = pieces.reduce((sum, piece) => sum + ringArea2(piece), 0);

    expect(pieces.length).toBeGreaterThan(1);
    for (const piece of pieces) {
      expect(piece.length).toBeGreaterThanOrEqual(3);
      expect(piece.length).toBeLessThanOrEqual(100);
    }
    expect(Math.abs(total - original) / original).toBeLessThan(1e-6);
  });

  it('should drop pieces without area', () => {
    const line = Array.from({ length: 20 }, (_, index): DatabasePoint => [0, index]);

    expect(fractureRing(line, 10)).toEqual([]);
  });

  it('should compute twice the signed area', () => {
    expect(ringArea2(strip)).toBe(600);
    expect(ringArea2([...strip].reverse())).toBe(-600);
  });
});
