/**
 * Primitive curve segments with parametric evaluation.
 * Every segment returns its exact start and end points at t = 0 and t = 1,
 * so consecutive segments sharing an endpoint join without rounding drift.
 */

import type {
  ArcParameters,
  CurveKind,
  CurveSegment,
  Point,
  PointTuple,
  SegmentDescriptor,
} from '../types/geometry.js';
import { InvalidGeometryError } from '../core/errors.js';

function clampParameter(t: number): number {
  if (t < 0) return 0;
  if (t > 1) return 1;
  return t;
}

function copyPoint(p: Point): Point {
  return { x: p.x, y: p.y };
}

/**
 * Evaluates a segment and rejects non-finite coordinates.
 * @throws InvalidGeometryError
 */
export function evaluateFinite(segment: CurveSegment, t: number): Point {
  const point = segment.evaluate(t);
  if (!Number.isFinite(point.x) || !Number.isFinite(point.y)) {
    throw new InvalidGeometryError(`${segment.kind} segment evaluated to a non-finite point at t=${t}`, {
      kind: segment.kind,
      t,
      x: point.x,
      y: point.y,
    });
  }
  return point;
}

/**
 * Straight segment from start to end.
 */
export class LineSegment implements CurveSegment {
  readonly kind: CurveKind = 'line';
  readonly start: Point;
  readonly end: Point;

  constructor(start: Point, end: Point) {
    this.start = copyPoint(start);
    this.end = copyPoint(end);
  }

  evaluate(t: number): Point {
    const u = clampParameter(t);
    if (u === 0) return copyPoint(this.start);
    if (u === 1) return copyPoint(this.end);
    return {
      x: this.start.x + (this.end.x - this.start.x) * u,
      y: this.start.y + (this.end.y - this.start.y) * u,
    };
  }
}

/**
 * Quadratic bezier segment.
 */
export class QuadraticSegment implements CurveSegment {
  readonly kind: CurveKind = 'quadratic';
  readonly start: Point;
  readonly control: Point;
  readonly end: Point;

  constructor(start: Point, control: Point, end: Point) {
    this.start = copyPoint(start);
    this.control = copyPoint(control);
    this.end = copyPoint(end);
  }

  evaluate(t: number): Point {
    const u = clampParameter(t);
    if (u === 0) return copyPoint(this.start);
    if (u === 1) return copyPoint(this.end);
    const mt = 1 - u;
    const a = mt * mt;
    const b = 2 * mt * u;
    const c = u * u;
    return {
      x: a * this.start.x + b * this.control.x + c * this.end.x,
      y: a * this.start.y + b * this.control.y + c * this.end.y,
    };
  }
}

/**
 * Cubic bezier segment.
 */
export class CubicSegment implements CurveSegment {
  readonly kind: CurveKind = 'cubic';
  readonly start: Point;
  readonly control1: Point;
  readonly control2: Point;
  readonly end: Point;

  constructor(start: Point, control1: Point, control2: Point, end: Point) {
    this.start = copyPoint(start);
    this.control1 = copyPoint(control1);
    this.control2 = copyPoint(control2);
    this.end = copyPoint(end);
  }

  evaluate(t: number): Point {
    const u = clampParameter(t);
    if (u === 0) return copyPoint(this.start);
    if (u === 1) return copyPoint(this.end);
    const mt = 1 - u;
    const a = mt * mt * mt;
    const b = 3 * mt * mt * u;
    const c = 3 * mt * u * u;
    const d = u * u * u;
    return {
      x: a * this.start.x + b * this.control1.x + c * this.control2.x + d * this.end.x,
      y: a * this.start.y + b * this.control1.y + c * this.control2.y + d * this.end.y,
    };
  }
}

/**
 * Center parameterization of an elliptical arc.
 */
export interface ArcCenterForm {
  cx: number;
  cy: number;
  /** Radii after scaling up to reach the end point */
  rx: number;
  ry: number;
  /** Ellipse rotation in radians */
  phi: number;
  /** Start angle in radians */
  theta1: number;
  /** Signed swept angle in radians */
  dTheta: number;
}

function angleBetween(ux: number, uy: number, vx: number, vy: number): number {
  const n = ux * vx + uy * vy;
  const d = Math.sqrt(ux * ux + uy * uy) * Math.sqrt(vx * vx + vy * vy);
  let a = Math.acos(Math.max(-1, Math.min(1, n / d)));
  if (ux * vy - uy * vx < 0) {
    a = -a;
  }
  return a;
}

/**
 * Converts SVG endpoint arc notation to center form.
 * Returns undefined for the degenerate cases (coincident endpoints or a zero radius).
 */
export function resolveArcCenter(start: Point, end: Point, arc: ArcParameters): ArcCenterForm | undefined {
  const { x: x1, y: y1 } = start;
  const { x: x2, y: y2 } = end;

  if (x1 === x2 && y1 === y2) {
    return undefined;
  }

  let rx = Math.abs(arc.rx);
  let ry = Math.abs(arc.ry);
  if (rx === 0 || ry === 0) {
    return undefined;
  }

  const phi = (arc.xAxisRotation * Math.PI) / 180;
  const cosPhi = Math.cos(phi);
  const sinPhi = Math.sin(phi);

  // Start point in the ellipse's own frame, relative to the chord midpoint
  const dx = (x1 - x2) / 2;
  const dy = (y1 - y2) / 2;
  const x1p = cosPhi * dx + sinPhi * dy;
  const y1p = -sinPhi * dx + cosPhi * dy;

  const x1p2 = x1p * x1p;
  const y1p2 = y1p * y1p;

  // Radii too small to span the chord are scaled up uniformly
  const lambda = x1p2 / (rx * rx) + y1p2 / (ry * ry);
  if (lambda > 1) {
    const sqrtLambda = Math.sqrt(lambda);
    rx = sqrtLambda * rx;
    ry = sqrtLambda * ry;
  }

  const rx2 = rx * rx;
  const ry2 = ry * ry;
  const sign = arc.largeArcFlag === arc.sweepFlag ? -1 : 1;
  const sq = sign * Math.sqrt(Math.max(0, (rx2 * ry2 - rx2 * y1p2 - ry2 * x1p2) / (rx2 * y1p2 + ry2 * x1p2)));

  const cxp = (sq * (rx * y1p)) / ry;
  const cyp = (sq * -(ry * x1p)) / rx;

  const cx = cosPhi * cxp - sinPhi * cyp + (x1 + x2) / 2;
  const cy = sinPhi * cxp + cosPhi * cyp + (y1 + y2) / 2;

  const ux = (x1p - cxp) / rx;
  const uy = (y1p - cyp) / ry;
  const vx = (-x1p - cxp) / rx;
  const vy = (-y1p - cyp) / ry;

  const theta1 = angleBetween(1, 0, ux, uy);
  let dTheta = angleBetween(ux, uy, vx, vy);

  if (!arc.sweepFlag && dTheta > 0) {
    dTheta -= 2 * Math.PI;
  } else if (arc.sweepFlag && dTheta < 0) {
    dTheta += 2 * Math.PI;
  }

  return { cx, cy, rx, ry, phi, theta1, dTheta };
}

/**
 * Elliptical arc given in SVG endpoint notation.
 * Zero radii degrade to a straight line; coincident endpoints to a single point.
 */
export class ArcSegment implements CurveSegment {
  readonly kind: CurveKind = 'arc';
  readonly start: Point;
  readonly end: Point;
  readonly arc: ArcParameters;
  /** Undefined when the arc is degenerate */
  readonly center: ArcCenterForm | undefined;

  constructor(start: Point, end: Point, arc: ArcParameters) {
    this.start = copyPoint(start);
    this.end = copyPoint(end);
    this.arc = { ...arc };
    this.center = resolveArcCenter(this.start, this.end, this.arc);
  }

  evaluate(t: number): Point {
    const u = clampParameter(t);
    if (u === 0) return copyPoint(this.start);
    if (u === 1) return copyPoint(this.end);

    const center = this.center;
    if (!center) {
      return {
        x: this.start.x + (this.end.x - this.start.x) * u,
        y: this.start.y + (this.end.y - this.start.y) * u,
      };
    }

    const theta = center.theta1 + center.dTheta * u;
    const cosTheta = Math.cos(theta);
    const sinTheta = Math.sin(theta);
    const cosPhi = Math.cos(center.phi);
    const sinPhi = Math.sin(center.phi);

    return {
      x: center.cx + center.rx * cosPhi * cosTheta - center.ry * sinPhi * sinTheta,
      y: center.cy + center.rx * sinPhi * cosTheta + center.ry * cosPhi * sinTheta,
    };
  }
}

function toPoint(tuple: PointTuple): Point {
  return { x: tuple[0], y: tuple[1] };
}

/**
 * Builds a curve segment from its plain-data descriptor.
 */
export function createSegment(descriptor: SegmentDescriptor): CurveSegment {
  switch (descriptor.type) {
    case 'line':
      return new LineSegment(toPoint(descriptor.start), toPoint(descriptor.end));
    case 'quadratic':
      return new QuadraticSegment(
        toPoint(descriptor.start),
        toPoint(descriptor.control),
        toPoint(descriptor.end)
      );
    case 'cubic':
      return new CubicSegment(
        toPoint(descriptor.start),
        toPoint(descriptor.control1),
        toPoint(descriptor.control2),
        toPoint(descriptor.end)
      );
    case 'arc':
      return new ArcSegment(toPoint(descriptor.start), toPoint(descriptor.end), {
        rx: descriptor.rx,
        ry: descriptor.ry,
        xAxisRotation: descriptor.xAxisRotation,
        largeArcFlag: descriptor.largeArcFlag,
        sweepFlag: descriptor.sweepFlag,
      });
  }
}
