/**
 * Renders emitted polygons into a standalone SVG document for inspection.
 * Layout coordinates have y pointing up, so y is mirrored for display.
 */

import { XMLBuilder } from 'fast-xml-parser';
import type { Point, Polygon } from '../types/geometry.js';
import type { PolygonSink } from './PolygonSink.js';
import { computePointBounds } from '../geometry/BoundsAggregator.js';

export interface SvgPreviewOptions {
  /** Rendered width in pixels; height follows the aspect ratio. @default 800 */
  width?: number;
  /** Padding around the geometry as a fraction of its larger side. @default 0.05 */
  margin?: number;
  /** Fill opacity of each polygon. @default 0.5 */
  fillOpacity?: number;
  /** Outline width in viewBox units. Defaults to 0.2% of the larger side. */
  strokeWidth?: number;
}

/**
 * Colors cycled by layer number.
 */
export const LAYER_COLORS = [
  '#1f77b4',
  '#d62728',
  '#2ca02c',
  '#ff7f0e',
  '#9467bd',
  '#8c564b',
  '#e377c2',
  '#17becf',
] as const;

const ATTR_PREFIX = '@_';

const XML_BUILDER_OPTIONS = {
  ignoreAttributes: false,
  attributeNamePrefix: ATTR_PREFIX,
  suppressEmptyNode: true,
  format: false,
};

const XML_DECLARATION = '<?xml version="1.0" encoding="UTF-8"?>\n';

/**
 * Formats a coordinate with at most six decimals and no trailing zeros.
 */
export function formatSvgNumber(value: number): string {
  const rounded = Number(value.toFixed(6));
  return Object.is(rounded, -0) ? '0' : String(rounded);
}

export function layerColor(layer: number): string {
  return LAYER_COLORS[Math.abs(layer) % LAYER_COLORS.length] ?? LAYER_COLORS[0];
}

export class SvgPreviewWriter implements PolygonSink {
  private readonly polygons: Polygon[] = [];
  private readonly builder = new XMLBuilder(XML_BUILDER_OPTIONS);
  private readonly width: number;
  private readonly margin: number;
  private readonly fillOpacity: number;
  private readonly strokeWidth?: number;

  constructor(options: SvgPreviewOptions = {}) {
    this.width = options.width ?? 800;
    this.margin = options.margin ?? 0.05;
    this.fillOpacity = options.fillOpacity ?? 0.5;
    this.strokeWidth = options.strokeWidth;
  }

  addPolygon(points: readonly Point[], layer: number): void {
    this.polygons.push({
      points: points.map((point) => ({ x: point.x, y: -point.y })),
      layer,
    });
  }

  /**
   * Number of polygons received so far.
   */
  get size(): number {
    return this.polygons.length;
  }

  /**
   * Serializes the preview document.
   */
  toString(): string {
    const bounds = computePointBounds(this.polygons.map((polygon) => polygon.points));
    const minX = bounds?.minX ?? 0;
    const minY = bounds?.minY ?? 0;
    const spanX = bounds?.width ?? 0;
    const spanY = bounds?.height ?? 0;
    const larger = Math.max(spanX, spanY);
    const pad = larger > 0 ? larger * this.margin : 1;

    const viewWidth = spanX + 2 * pad;
    const viewHeight = spanY + 2 * pad;
    const pixelHeight = (this.width * viewHeight) / viewWidth;
    const strokeWidth = this.strokeWidth ?? (larger > 0 ? larger * 0.002 : 0.01);

    const document = {
      svg: {
        [`${ATTR_PREFIX}xmlns`]: 'http://www.w3.org/2000/svg',
        [`${ATTR_PREFIX}viewBox`]: [minX - pad, minY - pad, viewWidth, viewHeight].map(formatSvgNumber).join(' '),
        [`${ATTR_PREFIX}width`]: formatSvgNumber(this.width),
        [`${ATTR_PREFIX}height`]: formatSvgNumber(pixelHeight),
        g: {
          [`${ATTR_PREFIX}fill-rule`]: 'evenodd',
          polygon: this.polygons.map((polygon) => this.polygonNode(polygon, strokeWidth)),
        },
      },
    };

    return XML_DECLARATION + String(this.builder.build(document));
  }

  private polygonNode(polygon: Polygon, strokeWidth: number): Record<string, string> {
    const color = layerColor(polygon.layer);
    return {
      [`${ATTR_PREFIX}points`]: polygon.points
        .map((point) => `${formatSvgNumber(point.x)},${formatSvgNumber(point.y)}`)
        .join(' '),
      [`${ATTR_PREFIX}fill`]: color,
      [`${ATTR_PREFIX}fill-opacity`]: formatSvgNumber(this.fillOpacity),
      [`${ATTR_PREFIX}stroke`]: color,
      [`${ATTR_PREFIX}stroke-width`]: formatSvgNumber(strokeWidth),
      [`${ATTR_PREFIX}data-layer`]: String(polygon.layer),
    };
  }
}
