/**
 * Shared constants for the GDSII output stage.
 */

/** GDSII stream format release written in the HEADER record */
export const GDS_STREAM_VERSION = 600;

/** User unit in metres: coordinates are written in micrometres */
export const DEFAULT_USER_UNIT = 1e-6;

/** Database unit in metres: coordinates are rounded to nanometres */
export const DEFAULT_PRECISION = 1e-9;

export const DEFAULT_LIBRARY_NAME = 'OUTLINE_LIB';
export const DEFAULT_CELL_NAME = 'OUTLINE_CELL';

/** Record length is a 16-bit byte count: (65535 - 4 header bytes) / 8 bytes per pair */
export const MAX_XY_POINTS = 8191;

/** Fewest distinct vertices a BOUNDARY element may enclose */
export const MIN_BOUNDARY_VERTICES = 3;

export const INT32_MIN = -2147483648;
export const INT32_MAX = 2147483647;

/**
 * GDSII record types used by the writer.
 */
export const GDS_RECORD = {
  HEADER: 0x00,
  BGNLIB: 0x01,
  LIBNAME: 0x02,
  UNITS: 0x03,
  ENDLIB: 0x04,
  BGNSTR: 0x05,
  STRNAME: 0x06,
  ENDSTR: 0x07,
  BOUNDARY: 0x08,
  LAYER: 0x0d,
  DATATYPE: 0x0e,
  XY: 0x10,
  ENDEL: 0x11,
} as const;

/**
 * GDSII data types carried in the fourth byte of each record header.
 */
export const GDS_DATA_TYPE = {
  NONE: 0x00,
  INT16: 0x02,
  INT32: 0x03,
  REAL8: 0x05,
  ASCII: 0x06,
} as const;
