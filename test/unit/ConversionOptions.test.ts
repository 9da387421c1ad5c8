import { describe, it, expect } from 'vitest';
import { resolveConversionOptions } from '../../src/core/options.js';
import { ConfigurationError } from '../../src/core/errors.js';
import { DEFAULT_CONVERSION_OPTIONS } from '../../src/types/index.js';

function configurationIssues(run: () => unknown): string[] {
  try {
    run();
  } catch (error) {
    if (error instanceof ConfigurationError) {
      return error.issues;
    }
    throw error;
  }
  throw new Error('Expected a ConfigurationError');
}

describe('resolveConversionOptions', () => {
  it('should return the defaults when nothing is given', () => {
    expect(resolveConversionOptions()).toEqual(DEFAULT_CONVERSION_OPTIONS);
  });

  it('should treat undefined values as unset', () => {
    const resolved = resolveConversionOptions({ steps: undefined, method: 'adaptive' });

    expect(resolved.steps).toBe(1000);
    expect(resolved.method).toBe('adaptive');
  });

  it('should keep provided values', () => {
    const resolved = resolveConversionOptions({ maxError: 0.5, targetWidth: 250, flipY: false, layer: 7 });

    expect(resolved.maxError).toBe(0.5);
    expect(resolved.targetWidth).toBe(250);
    expect(resolved.flipY).toBe(false);
    expect(resolved.layer).toBe(7);
  });

  it('should name the invalid option', () => {
    expect(configurationIssues(() => resolveConversionOptions({ steps: 0 }))).toEqual(['steps']);
    expect(configurationIssues(() => resolveConversionOptions({ steps: 2.5 }))).toEqual(['steps']);
    expect(configurationIssues(() => resolveConversionOptions({ maxError: 0 }))).toEqual(['maxError']);
    expect(configurationIssues(() => resolveConversionOptions({ targetWidth: -1 }))).toEqual(['targetWidth']);
    expect(configurationIssues(() => resolveConversionOptions({ layer: 70000 }))).toEqual(['layer']);
  });

  it('should validate options that are not used by the chosen method', () => {
    expect(configurationIssues(() => resolveConversionOptions({ method: 'fixed', maxError: -1 }))).toEqual([
      'maxError',
    ]);
  });

  it('should report every invalid option at once', () => {
    expect(configurationIssues(() => resolveConversionOptions({ steps: 0, maxError: 0 }))).toEqual([
      'steps',
      'maxError',
    ]);
  });

  it('should reject unknown options and invalid enum values from untyped input', () => {
    expect(configurationIssues(() => resolveConversionOptions(JSON.parse('{"colour":"red"}')))).toEqual(['colour']);
    expect(configurationIssues(() => resolveConversionOptions(JSON.parse('{"method":"spline"}')))).toEqual([
      'method',
    ]);
  });

  it('should prefix the message', () => {
    expect(() => resolveConversionOptions({ steps: 0 })).toThrow(/^Invalid conversion options: steps: /);
  });
});
