import { z } from 'zod';
import { DomainError, DomainErrorCode } from '../error-handling/errors';

function describeZodError(error: z.ZodError): string {
  return error.errors.map(err => (err.path.length > 0 ? `${err.path.join('.')}: ${err.message}` : err.message)).join('; ');
}

function createParser(target: string) {
  return function parse<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, input: unknown): T {
    const result = schema.safeParse(input);
    if (!result.success) {
      throw new DomainError(
        `${target} validation failed: ${describeZodError(result.error)}`,
        400,
        undefined,
        DomainErrorCode.VALIDATION_ERROR,
        { issues: result.error.errors.map(err => ({ field: err.path.join('.'), message: err.message, code: err.code })) }
      );
    }
    return result.data;
  };
}

/** Validates `req.query`; failures become a 400 DomainError. */
export const parseQuery = createParser('Query parameters');

/** Validates `req.params`; failures become a 400 DomainError. */
export const parseParams = createParser('URL parameters');
