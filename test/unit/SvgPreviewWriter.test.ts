import { describe, it, expect } from 'vitest';
import { XMLParser } from 'fast-xml-parser';
import { SvgPreviewWriter, formatSvgNumber, layerColor } from '../../src/output/SvgPreviewWriter.js';

const parser = new XMLParser({
  ignoreAttributes: false,
  attributeNamePrefix: '@_',
  isArray: (name) => name === 'polygon',
});

const triangle = [
  { x: 0, y: 0 },
  { x: 10, y: 0 },
  { x: 10, y: 10 },
];

describe('SvgPreviewWriter', () => {
  it('should start with an XML declaration', () => {
    const writer = new SvgPreviewWriter();
    writer.addPolygon(triangle, 0);

    expect(writer.toString().startsWith('<?xml version="1.0" encoding="UTF-8"?>\n<svg')).toBe(true);
  });

  it('should mirror y and fit the view box around the geometry', () => {
    const writer = new SvgPreviewWriter();
    writer.addPolygon(triangle, 1);

    const document = parser.parse(writer.toString());
    const svg = document.svg;
    const [polygon] = svg.g.polygon;

    expect(svg['@_xmlns']).toBe('http://www.w3.org/2000/svg');
    expect(svg['@_viewBox']).toBe('-0.5 -10.5 11 11');
    expect(svg['@_width']).toBe('800');
    expect(svg['@_height']).toBe('800');
    expect(svg.g['@_fill-rule']).toBe('evenodd');
    expect(polygon['@_points']).toBe('0,0 10,0 10,-10');
    expect(polygon['@_fill']).toBe('#d62728');
    expect(polygon['@_stroke']).toBe('#d62728');
    expect(polygon['@_fill-opacity']).toBe('0.5');
    expect(polygon['@_stroke-width']).toBe('0.02');
    expect(polygon['@_data-layer']).toBe('1');
  });

  it('should follow the aspect ratio for the pixel height', () => {
    const writer = new SvgPreviewWriter({ width: 400, margin: 0 });
    writer.addPolygon(
      [
        { x: 0, y: 0 },
        { x: 20, y: 0 },
        { x: 20, y: 10 },
      ],
      0
    );

    const svg = parser.parse(writer.toString()).svg;

    expect(svg['@_viewBox']).toBe('0 -10 20 10');
    expect(svg['@_height']).toBe('200');
  });

  it('should write one polygon per call in order', () => {
    const writer = new SvgPreviewWriter();
    writer.addPolygon(triangle, 0);
    writer.addPolygon(triangle, 2);

    const polygons = parser.parse(writer.toString()).svg.g.polygon;

    expect(writer.size).toBe(2);
    expect(polygons.map((polygon: Record<string, string>) => polygon['@_data-layer'])).toEqual(['0', '2']);
  });

  it('should produce a unit view box when nothing was added', () => {
    const svg = parser.parse(new SvgPreviewWriter().toString()).svg;

    expect(svg['@_viewBox']).toBe('-1 -1 2 2');
  });

  it('should cycle layer colors', () => {
    expect(layerColor(0)).toBe('#1f77b4');
    expect(layerColor(9)).toBe('#d62728');
  });

  it('should format coordinates compactly', () => {
    expect(formatSvgNumber(1.5)).toBe('1.5');
    expect(formatSvgNumber(1 / 3)).toBe('0.333333');
    expect(formatSvgNumber(-0)).toBe('0');
    expect(formatSvgNumber(-1e-9)).toBe('0');
  });
});
