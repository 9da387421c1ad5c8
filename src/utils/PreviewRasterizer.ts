/**
 * Rasterizes SVG previews to PNG using Sharp.
 * Sharp is loaded on first use; without it rasterize() returns undefined.
 */

import type { ILogger } from './Logger.js';
import { createLogger } from './Logger.js';
import { errorMessage } from '../core/errors.js';

/**
 * Sharp module type (dynamically imported).
 */
type SharpModule = typeof import('sharp');

export interface RasterizeOptions {
  /** Output width in pixels; height follows the SVG aspect ratio. @default 1024 */
  width?: number;
  /** Background painted under the drawing. @default '#ffffff' */
  background?: string;
  /** PNG compression level (0-9). @default 6 */
  compressionLevel?: number;
}

export class PreviewRasterizer {
  private sharp: SharpModule | null = null;
  private initialized = false;
  private readonly logger: ILogger;

  constructor(logger?: ILogger) {
    this.logger = logger ?? createLogger('warn', 'PreviewRasterizer');
  }

  /**
   * Attempts to load Sharp.
   * @returns true if Sharp is available
   */
  async initialize(): Promise<boolean> {
    if (this.initialized) {
      return this.sharp !== null;
    }

    try {
      const sharpModule = await import('sharp');
      this.sharp = sharpModule.default;
      this.logger.debug('Sharp loaded successfully');
    } catch (error) {
      this.logger.debug('Sharp not available, PNG previews disabled', {
        error: errorMessage(error),
      });
    }

    this.initialized = true;
    return this.sharp !== null;
  }

  isAvailable(): boolean {
    return this.sharp !== null;
  }

  /**
   * Renders an SVG document to PNG bytes.
   * @returns undefined when Sharp has not been loaded
   */
  async rasterize(svg: string, options: RasterizeOptions = {}): Promise<Buffer | undefined> {
    if (!this.sharp) {
      this.logger.warn('PNG preview requested but Sharp is not loaded');
      return undefined;
    }

    return this.sharp(Buffer.from(svg, 'utf8'))
      .resize({ width: options.width ?? 1024 })
      .flatten({ background: options.background ?? '#ffffff' })
      .png({ compressionLevel: options.compressionLevel ?? 6 })
      .toBuffer();
  }
}

/**
 * Creates a preview rasterizer. Call initialize() before rasterize().
 */
export function createPreviewRasterizer(logger?: ILogger): PreviewRasterizer {
  return new PreviewRasterizer(logger);
}
