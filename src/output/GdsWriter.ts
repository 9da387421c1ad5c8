/**
 * GDSII stream writer.
 *
 * Produces one library holding one structure; every polygon becomes a
 * BOUNDARY element, or several when it exceeds the XY vertex limit. Coordinates arrive in user units (micrometres by
 * default) and are rounded to database units.
 */

import type { Point } from '../types/geometry.js';
import type { PolygonSink } from './PolygonSink.js';
import type { ILogger } from '../utils/Logger.js';
import { createLogger } from '../utils/Logger.js';
import { ConfigurationError, OutputLimitError } from '../core/errors.js';
import { fractureRing } from './PolygonFracture.js';
import type { DatabasePoint } from './PolygonFracture.js';
import {
  DEFAULT_CELL_NAME,
  DEFAULT_LIBRARY_NAME,
  DEFAULT_PRECISION,
  DEFAULT_USER_UNIT,
  GDS_DATA_TYPE,
  GDS_RECORD,
  GDS_STREAM_VERSION,
  INT32_MAX,
  INT32_MIN,
  MAX_XY_POINTS,
  MIN_BOUNDARY_VERTICES,
} from '../core/constants.js';

export interface GdsWriterOptions {
  /** @default 'OUTLINE_LIB' */
  libraryName?: string;
  /** @default 'OUTLINE_CELL' */
  cellName?: string;
  /** User unit in metres. @default 1e-6 */
  userUnit?: number;
  /** Database unit in metres. @default 1e-9 */
  precision?: number;
  /** Datatype written with every element. @default 0 */
  datatype?: number;
  /** Modification and access time. @default the time toBuffer() is called */
  timestamp?: Date;
  logger?: ILogger;
}

export interface GdsWriterStats {
  /** BOUNDARY elements written */
  elements: number;
  /** Polygons dropped for having fewer than three distinct vertices or no area */
  skipped: number;
  /** Polygons written as several boundaries to fit the vertex limit */
  fractured: number;
}

/**
 * Encodes a number as a GDSII 8-byte real:
 * sign bit, 7-bit excess-64 base-16 exponent, 56-bit mantissa.
 */
export function encodeGdsReal(value: number): Buffer {
  const buffer = Buffer.alloc(8);
  if (value === 0) {
    return buffer;
  }

  const sign = value < 0 ? 0x80 : 0;
  let mantissa = Math.abs(value);
  let exponent = 64;

  while (mantissa >= 1) {
    mantissa /= 16;
    exponent++;
  }
  while (mantissa < 1 / 16) {
    mantissa *= 16;
    exponent--;
  }

  let bits = BigInt(Math.round(mantissa * 2 ** 56));
  if (bits >= 1n << 56n) {
    bits >>= 4n;
    exponent++;
  }

  buffer.writeBigUInt64BE((BigInt(sign | exponent) << 56n) | bits);
  return buffer;
}

/**
 * Decodes a GDSII 8-byte real.
 */
export function decodeGdsReal(buffer: Buffer, offset = 0): number {
  const word = buffer.readBigUInt64BE(offset);
  const head = Number(word >> 56n);
  const mantissa = Number(word & ((1n << 56n) - 1n)) / 2 ** 56;
  const magnitude = mantissa * 16 ** ((head & 0x7f) - 64);
  return head & 0x80 ? -magnitude : magnitude;
}

/**
 * Builds one record: 16-bit total length, record type, data type, payload.
 */
export function gdsRecord(recordType: number, dataType: number, payload: Buffer = Buffer.alloc(0)): Buffer {
  const header = Buffer.alloc(4);
  header.writeUInt16BE(4 + payload.length, 0);
  header.writeUInt8(recordType, 2);
  header.writeUInt8(dataType, 3);
  return Buffer.concat([header, payload]);
}

/**
 * ASCII record padded with a NUL to an even length.
 */
export function gdsStringRecord(recordType: number, text: string): Buffer {
  const bytes = Buffer.from(text, 'ascii');
  const payload = bytes.length % 2 === 0 ? bytes : Buffer.concat([bytes, Buffer.alloc(1)]);
  return gdsRecord(recordType, GDS_DATA_TYPE.ASCII, payload);
}

function int16Record(recordType: number, values: readonly number[]): Buffer {
  const payload = Buffer.alloc(values.length * 2);
  values.forEach((value, index) => payload.writeUInt16BE(value, index * 2));
  return gdsRecord(recordType, GDS_DATA_TYPE.INT16, payload);
}

function timestampFields(date: Date): number[] {
  const fields = [
    date.getFullYear(),
    date.getMonth() + 1,
    date.getDate(),
    date.getHours(),
    date.getMinutes(),
    date.getSeconds(),
  ];
  // Modification time followed by access time
  return [...fields, ...fields];
}

function assertPositive(name: string, value: number): void {
  if (!Number.isFinite(value) || value <= 0) {
    throw new ConfigurationError(`${name} must be a finite number > 0, got ${value}`, [name]);
  }
}

export class GdsWriter implements PolygonSink {
  private readonly libraryName: string;
  private readonly cellName: string;
  private readonly userUnit: number;
  private readonly precision: number;
  private readonly datatype: number;
  private readonly timestamp?: Date;
  private readonly logger: ILogger;
  /** Database units per user unit */
  private readonly dbPerUser: number;
  private readonly elements: Buffer[] = [];
  private elementCount = 0;
  private skipped = 0;
  private fractured = 0;

  constructor(options: GdsWriterOptions = {}) {
    this.libraryName = options.libraryName ?? DEFAULT_LIBRARY_NAME;
    this.cellName = options.cellName ?? DEFAULT_CELL_NAME;
    this.userUnit = options.userUnit ?? DEFAULT_USER_UNIT;
    this.precision = options.precision ?? DEFAULT_PRECISION;
    this.datatype = options.datatype ?? 0;
    this.timestamp = options.timestamp;
    this.logger = options.logger ?? createLogger('warn', 'GdsWriter');

    assertPositive('userUnit', this.userUnit);
    assertPositive('precision', this.precision);
    if (!Number.isInteger(this.datatype) || this.datatype < 0 || this.datatype > 0xffff) {
      throw new ConfigurationError(`datatype must be an integer in [0, 65535], got ${this.datatype}`, ['datatype']);
    }

    this.dbPerUser = this.userUnit / this.precision;
  }

  /**
   * Adds the polygon as a closed BOUNDARY element, or as several when it
   * holds more vertices than one boundary can.
   * @throws OutputLimitError for out-of-range layers or coordinates, or a ring that cannot be split
   */
  addPolygon(points: readonly Point[], layer: number): void {
    if (!Number.isInteger(layer) || layer < 0 || layer > 0xffff) {
      throw new OutputLimitError(`Layer ${layer} cannot be written to GDSII`, { layer });
    }

    const ring = points.map((point) => this.toDatabaseUnits(point));
    const distinct = new Set(ring.map(([x, y]) => `${x},${y}`));

    if (distinct.size < MIN_BOUNDARY_VERTICES) {
      this.skipped++;
      this.logger.warn('Skipping polygon with too few distinct vertices', {
        layer,
        points: points.length,
        distinct: distinct.size,
      });
      return;
    }

    const first = ring[0];
    const last = ring[ring.length - 1];
    if (first[0] === last[0] && first[1] === last[1]) {
      ring.pop();
    }

    // Room for the closing repeat
    const pieces = fractureRing(ring, MAX_XY_POINTS - 1);
    if (pieces.length === 0) {
      this.skipped++;
      this.logger.warn('Skipping polygon with zero area', { layer, points: points.length });
      return;
    }
    if (pieces.length > 1) {
      this.fractured++;
      this.logger.debug('Fractured polygon into smaller boundaries', {
        layer,
        vertices: ring.length,
        pieces: pieces.length,
      });
    }

    for (const piece of pieces) {
      this.writeBoundary([...piece, piece[0]], layer);
    }
  }

  private writeBoundary(ring: readonly DatabasePoint[], layer: number): void {
    const xy = Buffer.alloc(ring.length * 8);
    ring.forEach(([x, y], index) => {
      xy.writeInt32BE(x, index * 8);
      xy.writeInt32BE(y, index * 8 + 4);
    });

    this.elements.push(
      gdsRecord(GDS_RECORD.BOUNDARY, GDS_DATA_TYPE.NONE),
      int16Record(GDS_RECORD.LAYER, [layer]),
      int16Record(GDS_RECORD.DATATYPE, [this.datatype]),
      gdsRecord(GDS_RECORD.XY, GDS_DATA_TYPE.INT32, xy),
      gdsRecord(GDS_RECORD.ENDEL, GDS_DATA_TYPE.NONE)
    );
    this.elementCount++;
  }

  getStats(): GdsWriterStats {
    return { elements: this.elementCount, skipped: this.skipped, fractured: this.fractured };
  }

  /**
   * Encodes the complete stream.
   */
  toBuffer(): Buffer {
    const time = timestampFields(this.timestamp ?? new Date());
    const stats = this.getStats();

    this.logger.debug('Writing GDSII stream', {
      library: this.libraryName,
      cell: this.cellName,
      elements: stats.elements,
      skipped: stats.skipped,
    });

    return Buffer.concat([
      int16Record(GDS_RECORD.HEADER, [GDS_STREAM_VERSION]),
      int16Record(GDS_RECORD.BGNLIB, time),
      gdsStringRecord(GDS_RECORD.LIBNAME, this.libraryName),
      gdsRecord(
        GDS_RECORD.UNITS,
        GDS_DATA_TYPE.REAL8,
        Buffer.concat([encodeGdsReal(this.precision / this.userUnit), encodeGdsReal(this.precision)])
      ),
      int16Record(GDS_RECORD.BGNSTR, time),
      gdsStringRecord(GDS_RECORD.STRNAME, this.cellName),
      ...this.elements,
      gdsRecord(GDS_RECORD.ENDSTR, GDS_DATA_TYPE.NONE),
      gdsRecord(GDS_RECORD.ENDLIB, GDS_DATA_TYPE.NONE),
    ]);
  }

  private toDatabaseUnits(point: Point): DatabasePoint {
    const x = Math.round(point.x * this.dbPerUser);
    const y = Math.round(point.y * this.dbPerUser);
    if (!Number.isFinite(x) || !Number.isFinite(y) || x < INT32_MIN || x > INT32_MAX || y < INT32_MIN || y > INT32_MAX) {
      throw new OutputLimitError(`Coordinate (${point.x}, ${point.y}) does not fit in GDSII database units`, {
        x: point.x,
        y: point.y,
        dbPerUser: this.dbPerUser,
      });
    }
    // Normalise -0 so equality checks and encoding agree
    return [x + 0, y + 0];
  }
}
