export {
  parseSegmentDocument,
  validateSegmentDocument,
  segmentDocumentSchema,
} from './SegmentDocumentParser.js';
export type { SegmentDocument } from './SegmentDocumentParser.js';
