export {
  OutlineConverter,
  createConverter,
  convertPaths,
  convertToGds,
} from './OutlineConverter.js';
export type { IOutlineConverter, OutlineConverterConfig } from './OutlineConverter.js';

export { resolveConversionOptions, issuePaths, MAX_LAYER } from './options.js';

export {
  ConversionError,
  ConfigurationError,
  ResourceLimitError,
  InvalidGeometryError,
  OutputLimitError,
  InvalidDocumentError,
  errorMessage,
} from './errors.js';
export type { ConversionErrorCode } from './errors.js';

export {
  GDS_STREAM_VERSION,
  DEFAULT_USER_UNIT,
  DEFAULT_PRECISION,
  DEFAULT_LIBRARY_NAME,
  DEFAULT_CELL_NAME,
  MAX_XY_POINTS,
  MIN_BOUNDARY_VERTICES,
  GDS_RECORD,
  GDS_DATA_TYPE,
} from './constants.js';
