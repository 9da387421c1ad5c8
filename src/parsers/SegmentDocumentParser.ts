/**
 * Validates segment descriptor documents and turns them into paths.
 *
 * A document is a plain value (typically the output of JSON.parse):
 *
 *   { "paths": [ { "id": "outline", "segments": [
 *       { "type": "line", "start": [0, 0], "end": [10, 0] },
 *       { "type": "arc", "start": [10, 0], "end": [0, 0], "rx": 5, "ry": 5,
 *         "xAxisRotation": 0, "largeArcFlag": false, "sweepFlag": true }
 *   ] } ] }
 */

import { z } from 'zod';
import type { Path } from '../types/geometry.js';
import { createSegment } from '../geometry/CurveSegments.js';
import { InvalidDocumentError } from '../core/errors.js';

const pointSchema = z.tuple([z.number().finite(), z.number().finite()]);

const segmentSchema = z.discriminatedUnion('type', [
  z.object({
    type: z.literal('line'),
    start: pointSchema,
    end: pointSchema,
  }),
  z.object({
    type: z.literal('quadratic'),
    start: pointSchema,
    control: pointSchema,
    end: pointSchema,
  }),
  z.object({
    type: z.literal('cubic'),
    start: pointSchema,
    control1: pointSchema,
    control2: pointSchema,
    end: pointSchema,
  }),
  z.object({
    type: z.literal('arc'),
    start: pointSchema,
    end: pointSchema,
    rx: z.number().finite(),
    ry: z.number().finite(),
    xAxisRotation: z.number().finite().default(0),
    largeArcFlag: z.boolean().default(false),
    sweepFlag: z.boolean().default(false),
  }),
]);

const pathSchema = z.object({
  id: z.string().optional(),
  segments: z.array(segmentSchema),
});

export const segmentDocumentSchema = z.object({
  paths: z.array(pathSchema),
});

export type SegmentDocument = z.infer<typeof segmentDocumentSchema>;

function describeIssue(issue: z.ZodIssue): string {
  const location = issue.path.length > 0 ? issue.path.join('.') : '(root)';
  return `${location}: ${issue.message}`;
}

/**
 * Validates a document and returns its descriptors unchanged, with arc defaults filled in.
 * @throws InvalidDocumentError naming every failing location
 */
export function validateSegmentDocument(value: unknown): SegmentDocument {
  const result = segmentDocumentSchema.safeParse(value);
  if (!result.success) {
    const issues = result.error.issues.map(describeIssue);
    throw new InvalidDocumentError(`Invalid segment document: ${issues.join('; ')}`, issues);
  }
  return result.data;
}

/**
 * Validates a document and builds its paths.
 */
export function parseSegmentDocument(value: unknown): Path[] {
  const document = validateSegmentDocument(value);
  return document.paths.map((path) => ({
    id: path.id,
    segments: path.segments.map((descriptor) => createSegment(descriptor)),
  }));
}
