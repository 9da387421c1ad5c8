import type {
  ConversionOptions,
  ConversionResult,
  ConversionStats,
  LogLevel,
  Path,
  Point,
  Polygon,
  ResolvedConversionOptions,
} from '../types/index.js';
import { resolveConversionOptions } from './options.js';
import { flattenPathFixed } from '../geometry/FixedStepFlattener.js';
import { AdaptiveFlattener } from '../geometry/AdaptiveFlattener.js';
import { assemblePath } from '../geometry/PathAssembler.js';
import { computeBounds } from '../geometry/BoundsAggregator.js';
import { defaultTransformEngine } from '../geometry/TransformEngine.js';
import type { PolygonSink } from '../output/PolygonSink.js';
import { emitPolygons } from '../output/PolygonSink.js';
import { GdsWriter } from '../output/GdsWriter.js';
import type { GdsWriterOptions } from '../output/GdsWriter.js';
import type { ILogger } from '../utils/Logger.js';
import { createLogger } from '../utils/Logger.js';

/**
 * Interface for the outline converter.
 */
export interface IOutlineConverter {
  /**
   * Flattens, assembles, measures and transforms every path.
   * @throws ConfigurationError before any geometry is touched
   */
  convert(paths: readonly Path[], options?: ConversionOptions): ConversionResult;

  /**
   * Hands the transformed polygons to a sink.
   * @returns the number of polygons submitted (0 for an empty result)
   */
  emit(result: ConversionResult, sink: PolygonSink): number;
}

type PathFlattener = (path: Path) => Point[][];

export interface OutlineConverterConfig {
  logLevel?: LogLevel;
  /** Takes precedence over logLevel */
  logger?: ILogger;
}

/**
 * Main entry point for turning curve paths into output-ready polygons.
 */
export class OutlineConverter implements IOutlineConverter {
  private readonly logger: ILogger;

  constructor(config: OutlineConverterConfig = {}) {
    this.logger = config.logger ?? createLogger(config.logLevel ?? 'warn', 'OutlineConverter');
  }

  convert(paths: readonly Path[], options: ConversionOptions = {}): ConversionResult {
    const resolved = resolveConversionOptions(options);
    const logger =
      options.logLevel !== undefined ? createLogger(resolved.logLevel, 'OutlineConverter') : this.logger;
    const flatten = this.createFlattener(resolved);

    const polygons: Polygon[] = [];
    let skippedPaths = 0;

    paths.forEach((path, index) => {
      const points = assemblePath(flatten(path));
      if (points.length === 0) {
        skippedPaths++;
        logger.debug('Path contributed no points', { index, id: path.id });
        return;
      }
      polygons.push({ points, layer: resolved.layer });
    });

    const stats: ConversionStats = {
      method: resolved.method,
      inputPaths: paths.length,
      polygonCount: polygons.length,
      skippedPaths,
      pointCount: polygons.reduce((sum, polygon) => sum + polygon.points.length, 0),
    };

    // Bounds need every polygon: the scale factor is global
    const bounds = computeBounds(polygons);
    if (!bounds) {
      logger.warn('No geometry found; nothing to emit', { inputPaths: paths.length });
      return { status: 'empty', stats };
    }

    const transform = defaultTransformEngine.derive(bounds, {
      targetWidth: resolved.targetWidth,
      flipY: resolved.flipY,
    });

    logger.info('Converted paths', {
      ...stats,
      width: bounds.width,
      height: bounds.height,
      scale: transform.scale,
    });

    return {
      status: 'ok',
      polygons: defaultTransformEngine.apply(polygons, transform),
      bounds,
      transform,
      stats,
    };
  }

  emit(result: ConversionResult, sink: PolygonSink): number {
    if (result.status === 'empty') {
      return 0;
    }
    return emitPolygons(result.polygons, sink);
  }

  private createFlattener(options: ResolvedConversionOptions): PathFlattener {
    if (options.method === 'adaptive') {
      const flattener = new AdaptiveFlattener({
        maxError: options.maxError,
        maxDepth: options.maxDepth,
        maxPoints: options.maxPoints,
      });
      return (path) => flattener.flattenPath(path);
    }

    return (path) => flattenPathFixed(path, options.steps);
  }
}

/**
 * Creates a new OutlineConverter instance.
 */
export function createConverter(config?: OutlineConverterConfig): IOutlineConverter {
  return new OutlineConverter(config);
}

/**
 * Convenience function to convert paths with a throwaway converter.
 */
export function convertPaths(paths: readonly Path[], options?: ConversionOptions): ConversionResult {
  const converter = new OutlineConverter({ logLevel: options?.logLevel });
  return converter.convert(paths, options);
}

/**
 * Converts paths and encodes them as a GDSII stream.
 * @returns undefined when there is no geometry to write
 */
export function convertToGds(
  paths: readonly Path[],
  options: ConversionOptions = {},
  gdsOptions: GdsWriterOptions = {}
): Buffer | undefined {
  const logger = createLogger(options.logLevel ?? 'warn', 'OutlineConverter');
  const converter = new OutlineConverter({ logger });
  const result = converter.convert(paths, options);

  if (result.status === 'empty') {
    return undefined;
  }

  const writer = new GdsWriter({ logger: logger.child('Gds'), ...gdsOptions });
  converter.emit(result, writer);
  return writer.toBuffer();
}
