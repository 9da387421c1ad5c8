export { Logger, createLogger, consoleLogWriter, formatLogEntry } from './Logger.js';
export type { ILogger, LogEntry, LogWriter } from './Logger.js';

export {
  PreviewRasterizer,
  createPreviewRasterizer,
  type RasterizeOptions,
} from './PreviewRasterizer.js';
