/**
 * Curve approximation method.
 * - 'fixed': every segment sampled at a uniform number of steps
 * - 'adaptive': bisection until the chord error is within tolerance
 */
export type FlattenMethod = 'fixed' | 'adaptive';

/**
 * Logging level for the converter.
 */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

/**
 * Options for converting paths into output polygons.
 */
export interface ConversionOptions {
  /**
   * Approximation method.
   * @default 'fixed'
   */
  method?: FlattenMethod;

  /**
   * Linear steps per segment. Only used when method is 'fixed'.
   * @default 1000
   */
  steps?: number;

  /**
   * Maximum chord error in input units. Only used when method is 'adaptive'.
   * @default 0.01
   */
  maxError?: number;

  /**
   * Width the combined geometry is scaled to, in output units (micrometres for GDSII).
   * Height follows from the aspect ratio. Omit to keep the input scale.
   */
  targetWidth?: number;

  /**
   * Mirror the y axis after centering (layout formats have y pointing up).
   * @default true
   */
  flipY?: boolean;

  /**
   * Layer tag attached to every emitted polygon.
   * @default 0
   */
  layer?: number;

  /**
   * Deepest bisection level the adaptive flattener may reach.
   * @default 32
   */
  maxDepth?: number;

  /**
   * Point budget per segment for the adaptive flattener.
   * @default 1000000
   */
  maxPoints?: number;

  /**
   * Logging level for diagnostic output.
   * @default 'warn'
   */
  logLevel?: LogLevel;
}

/**
 * Conversion options after merging with defaults and validation.
 * Unlike Required<ConversionOptions>, targetWidth stays optional (undefined = no scaling).
 */
export interface ResolvedConversionOptions {
  method: FlattenMethod;
  steps: number;
  maxError: number;
  targetWidth: number | undefined;
  flipY: boolean;
  layer: number;
  maxDepth: number;
  maxPoints: number;
  logLevel: LogLevel;
}

/**
 * Default conversion options.
 */
export const DEFAULT_CONVERSION_OPTIONS: ResolvedConversionOptions = {
  method: 'fixed',
  steps: 1000,
  maxError: 0.01,
  targetWidth: undefined,
  flipY: true,
  layer: 0,
  maxDepth: 32,
  maxPoints: 1_000_000,
  logLevel: 'warn',
};
