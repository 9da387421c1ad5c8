/**
 * Option merging and validation for the conversion pipeline.
 */

import { z } from 'zod';
import type { ConversionOptions, ResolvedConversionOptions } from '../types/index.js';
import { DEFAULT_CONVERSION_OPTIONS } from '../types/index.js';
import { ConfigurationError } from './errors.js';

/** GDSII stores layer numbers as 16-bit values */
export const MAX_LAYER = 65535;

const conversionOptionsSchema = z
  .object({
    method: z.enum(['fixed', 'adaptive']),
    steps: z.number().int().min(1),
    maxError: z.number().finite().positive(),
    targetWidth: z.number().finite().positive().optional(),
    flipY: z.boolean(),
    layer: z.number().int().min(0).max(MAX_LAYER),
    maxDepth: z.number().int().min(0),
    maxPoints: z.number().int().min(2),
    logLevel: z.enum(['debug', 'info', 'warn', 'error', 'silent']),
  })
  .strict();

/**
 * Lists the option names named by zod issues, without duplicates.
 */
export function issuePaths(error: z.ZodError): string[] {
  const paths = error.issues.flatMap((issue) => {
    if (issue.code === z.ZodIssueCode.unrecognized_keys) {
      return issue.keys;
    }
    return [issue.path.length > 0 ? issue.path.join('.') : '(root)'];
  });
  return [...new Set(paths)];
}

function describeIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}

/**
 * Merges options with the defaults and validates the result.
 * Options set to undefined fall back to their default.
 * @throws ConfigurationError listing every invalid option
 */
export function resolveConversionOptions(options: ConversionOptions = {}): ResolvedConversionOptions {
  const provided = Object.fromEntries(
    Object.entries(options).filter(([, value]) => value !== undefined)
  );

  const result = conversionOptionsSchema.safeParse({ ...DEFAULT_CONVERSION_OPTIONS, ...provided });
  if (!result.success) {
    throw new ConfigurationError(
      `Invalid conversion options: ${describeIssues(result.error)}`,
      issuePaths(result.error)
    );
  }

  return { ...result.data, targetWidth: result.data.targetWidth };
}
