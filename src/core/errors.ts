/**
 * Error classes raised by the conversion pipeline.
 *
 * Empty geometry is not an error: it is reported through
 * `ConversionResult.status === 'empty'`.
 */

export type ConversionErrorCode =
  | 'CONFIGURATION'
  | 'RESOURCE_LIMIT'
  | 'INVALID_GEOMETRY'
  | 'OUTPUT_LIMIT'
  | 'INVALID_DOCUMENT';

/**
 * Base class for every error the converter raises on purpose.
 */
export class ConversionError extends Error {
  readonly code: ConversionErrorCode;
  readonly details?: Record<string, unknown>;

  constructor(code: ConversionErrorCode, message: string, details?: Record<string, unknown>) {
    super(message);
    this.name = 'ConversionError';
    this.code = code;
    this.details = details;
  }
}

/**
 * Invalid option values. Raised before any geometry is processed.
 */
export class ConfigurationError extends ConversionError {
  /** Option paths that failed validation, e.g. ['steps'] */
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super('CONFIGURATION', message, { issues });
    this.name = 'ConfigurationError';
    this.issues = issues;
  }
}

/**
 * Adaptive subdivision exceeded its depth or point budget.
 */
export class ResourceLimitError extends ConversionError {
  readonly limit: 'depth' | 'points';

  constructor(limit: 'depth' | 'points', message: string, details?: Record<string, unknown>) {
    super('RESOURCE_LIMIT', message, { limit, ...details });
    this.name = 'ResourceLimitError';
    this.limit = limit;
  }
}

/**
 * A segment evaluated to a non-finite coordinate.
 */
export class InvalidGeometryError extends ConversionError {
  constructor(message: string, details?: Record<string, unknown>) {
    super('INVALID_GEOMETRY', message, details);
    this.name = 'InvalidGeometryError';
  }
}

/**
 * Geometry cannot be represented in the output format.
 */
export class OutputLimitError extends ConversionError {
  constructor(message: string, details?: Record<string, unknown>) {
    super('OUTPUT_LIMIT', message, details);
    this.name = 'OutputLimitError';
  }
}

/**
 * A segment descriptor document did not have the expected shape.
 */
export class InvalidDocumentError extends ConversionError {
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super('INVALID_DOCUMENT', message, { issues });
    this.name = 'InvalidDocumentError';
    this.issues = issues;
  }
}

/**
 * Extracts a printable message from an unknown thrown value.
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
