/**
 * Environment Configuration Utilities
 *
 * zod-backed parsing of process.env into typed service configuration.
 */

import { z } from 'zod';
import { DomainError, DomainErrorCode } from '../error-handling/errors';

export type Environment = Record<string, string | undefined>;

/**
 * Integer env var with a default; blank values fall back to the default.
 */
export function envInteger(defaultValue: number, bounds: { min?: number; max?: number } = {}) {
  let schema = z.coerce.number().int();
  if (bounds.min !== undefined) schema = schema.min(bounds.min);
  if (bounds.max !== undefined) schema = schema.max(bounds.max);
  return z.preprocess(value => (value === undefined || value === '' ? defaultValue : value), schema);
}

/**
 * String env var with a default; blank values fall back to the default.
 */
export function envString(defaultValue: string) {
  return z.preprocess(value => (value === undefined || value === '' ? defaultValue : value), z.string().min(1));
}

/**
 * Parse an environment against a schema, failing fast with every offending variable listed.
 */
export function loadEnvironment<T>(
  serviceName: string,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  env: Environment = process.env
): T {
  const result = schema.safeParse(env);
  if (!result.success) {
    const problems = result.error.errors.map(err => `${err.path.join('.') || '(root)'}: ${err.message}`);
    throw new DomainError(`Invalid ${serviceName} configuration: ${problems.join('; ')}`, 500, undefined, DomainErrorCode.INVALID_CONFIG, {
      problems,
    });
  }
  return result.data;
}
