/**
 * Parameter validation for the grouping engine.
 *
 * @module dedupe/validate
 */

import type { ZodType } from 'zod';
import { PrefixLengthSchema, ThresholdSchema, type DedupeParams } from '../schemas/params.js';
import { InvalidParameterError } from './errors.js';

function parseParameter<T>(schema: ZodType<T>, parameter: string, value: unknown): T {
  const result = schema.safeParse(value);
  if (!result.success) {
    const reason = result.error.issues.map((issue) => issue.message).join('; ');
    throw new InvalidParameterError(`Invalid ${parameter}: ${reason}`, parameter, value);
  }
  return result.data;
}

/**
 * Validate a blocking prefix length (integer in 1..10).
 *
 * @throws {InvalidParameterError} When the value is out of range
 */
export function validatePrefixLength(prefixLength: unknown): number {
  return parseParameter(PrefixLengthSchema, 'prefixLength', prefixLength);
}

/**
 * Validate a similarity threshold (0.5..1.0).
 *
 * @throws {InvalidParameterError} When the value is out of range
 */
export function validateThreshold(threshold: unknown): number {
  return parseParameter(ThresholdSchema, 'threshold', threshold);
}

/**
 * Validate both engine parameters, threshold first.
 */
export function validateParams(threshold: unknown, prefixLength: unknown): DedupeParams {
  return {
    threshold: validateThreshold(threshold),
    prefixLength: validatePrefixLength(prefixLength),
  };
}
