/**
 * Polygon sinks: the emitter contract and the bundled encoders.
 */

export { emitPolygons, CollectingSink, FanOutSink } from './PolygonSink.js';
export type { PolygonSink } from './PolygonSink.js';
export {
  GdsWriter,
  encodeGdsReal,
  decodeGdsReal,
  gdsRecord,
  gdsStringRecord,
  type GdsWriterOptions,
  type GdsWriterStats,
} from './GdsWriter.js';
export { fractureRing, clipRing, ringArea2, type DatabasePoint } from './PolygonFracture.js';
export {
  SvgPreviewWriter,
  formatSvgNumber,
  layerColor,
  LAYER_COLORS,
  type SvgPreviewOptions,
} from './SvgPreviewWriter.js';
