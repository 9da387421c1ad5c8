import { describe, it, expect } from 'vitest';
import { parseSegmentDocument, validateSegmentDocument } from '../../src/parsers/SegmentDocumentParser.js';
import { InvalidDocumentError } from '../../src/core/errors.js';

function documentIssues(value: unknown): string[] {
  try {
    validateSegmentDocument(value);
  } catch (error) {
    if (error instanceof InvalidDocumentError) {
      return error.issues;
    }
    throw error;
  }
  throw new Error('Expected an InvalidDocumentError');
}

describe('SegmentDocumentParser', () => {
  it('should build segments of every kind', () => {
    const paths = parseSegmentDocument({
      paths: [
        {
          id: 'outline',
          segments: [
            { type: 'line', start: [0, 0], end: [10, 0] },
            { type: 'quadratic', start: [10, 0], control: [15, 5], end: [10, 10] },
            { type: 'cubic', start: [10, 10], control1: [8, 12], control2: [2, 12], end: [0, 10] },
            { type: 'arc', start: [0, 10], end: [0, 0], rx: 5, ry: 5, sweepFlag: true },
          ],
        },
      ],
    });

    expect(paths).toHaveLength(1);
    expect(paths[0].id).toBe('outline');
    expect(paths[0].segments.map((segment) => segment.kind)).toEqual(['line', 'quadratic', 'cubic', 'arc']);
    expect(paths[0].segments[2].evaluate(0)).toEqual({ x: 10, y: 10 });
    expect(paths[0].segments[3].end).toEqual({ x: 0, y: 0 });
  });

  it('should fill in arc defaults', () => {
    const document = validateSegmentDocument({
      paths: [{ segments: [{ type: 'arc', start: [0, 0], end: [2, 0], rx: 1, ry: 1 }] }],
    });

    expect(document.paths[0].segments[0]).toEqual({
      type: 'arc',
      start: [0, 0],
      end: [2, 0],
      rx: 1,
      ry: 1,
      xAxisRotation: 0,
      largeArcFlag: false,
      sweepFlag: false,
    });
  });

  it('should accept paths without segments', () => {
    expect(parseSegmentDocument({ paths: [{ segments: [] }] })).toEqual([{ id: undefined, segments: [] }]);
  });

  it('should locate missing fields', () => {
    expect(documentIssues({ paths: [{ segments: [{ type: 'line', start: [0, 0] }] }] })).toEqual([
      'paths.0.segments.0.end: Required',
    ]);
  });

  it('should locate unknown segment types', () => {
    const issues = documentIssues({ paths: [{ segments: [{ type: 'spline', start: [0, 0], end: [1, 1] }] }] });

    expect(issues).toHaveLength(1);
    expect(issues[0].startsWith('paths.0.segments.0.type: ')).toBe(true);
  });

  it('should reject non-finite coordinates', () => {
    const issues = documentIssues({
      paths: [{ segments: [{ type: 'line', start: [0, Number.POSITIVE_INFINITY], end: [1, 1] }] }],
    });

    expect(issues).toHaveLength(1);
    expect(issues[0].startsWith('paths.0.segments.0.start.1: ')).toBe(true);
  });

  it('should report a non-object document at the root', () => {
    expect(documentIssues(42)).toEqual(['(root): Expected object, received number']);
    expect(() => parseSegmentDocument(null)).toThrow(/^Invalid segment document: \(root\): /);
  });
});
