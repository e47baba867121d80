import type { Request, Response, NextFunction, ErrorRequestHandler, RequestHandler } from 'express';
import type { ErrorResponse } from '@chipstream/shared-contracts';
import { getLogger } from '../logging';
import { serializeError } from '../logging/error-serializer';

const middlewareLogger = getLogger('error-handling:middleware');

export enum DomainErrorCode {
  VALIDATION_ERROR = 'VALIDATION_ERROR',
  NOT_FOUND = 'NOT_FOUND',
  SERVICE_UNAVAILABLE = 'SERVICE_UNAVAILABLE',
  INTERNAL_ERROR = 'INTERNAL_ERROR',
  INVALID_CONFIG = 'INVALID_CONFIG',
}

type RequiredServiceCode = 'NOT_FOUND' | 'VALIDATION_ERROR' | 'INTERNAL_ERROR' | 'SERVICE_UNAVAILABLE';

export class DomainError extends Error {
  public readonly statusCode: number;
  public readonly cause?: Error;
  public readonly code?: string;
  public readonly details?: Record<string, unknown>;
  public readonly timestamp: Date;

  constructor(
    message: string,
    statusCode: number = 500,
    cause?: Error,
    code?: string,
    details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'DomainError';
    this.statusCode = statusCode;
    this.cause = cause;
    this.code = code;
    this.details = details;
    this.timestamp = new Date();
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      statusCode: this.statusCode,
      ...(this.code && { code: this.code }),
      ...(this.details && { details: this.details }),
      timestamp: this.timestamp.toISOString(),
      cause: this.cause?.message,
    };
  }
}

export class DomainServiceError<T extends string> extends DomainError {
  public declare readonly code: T;

  constructor(
    message: string,
    statusCode: number,
    code: T,
    cause?: Error,
    serviceName?: string,
    details?: Record<string, unknown>
  ) {
    super(message, statusCode, cause, code, details);
    if (serviceName) this.name = `${serviceName}Error`;
    this.code = code;
  }
}

/**
 * Builds a service-scoped error class whose code is narrowed to the service's code table.
 * The table must provide NOT_FOUND, VALIDATION_ERROR, INTERNAL_ERROR and SERVICE_UNAVAILABLE.
 */
export function createDomainServiceError<T extends string>(
  serviceName: string,
  domainErrorCodes: Record<RequiredServiceCode, T> & Record<string, T>
) {
  class ServiceError extends DomainServiceError<T> {
    constructor(message: string, statusCode = 500, code?: T, cause?: Error, details?: Record<string, unknown>) {
      super(message, statusCode, code ?? domainErrorCodes.INTERNAL_ERROR, cause, serviceName, details);
    }

    static notFound(resource: string, id?: string) {
      const msg = id ? `${resource} not found: ${id}` : `${resource} not found`;
      return new ServiceError(msg, 404, domainErrorCodes.NOT_FOUND);
    }

    static validationError(field: string, message: string) {
      return new ServiceError(`Validation failed for ${field}: ${message}`, 400, domainErrorCodes.VALIDATION_ERROR);
    }

    static serviceUnavailable(service: string, cause?: Error) {
      return new ServiceError(`Service unavailable: ${service}`, 503, domainErrorCodes.SERVICE_UNAVAILABLE, cause);
    }
  }

  return ServiceError;
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  if (typeof error === 'string') return error;
  return String(error);
}

export function errorStack(error: unknown): string | undefined {
  return error instanceof Error ? error.stack : undefined;
}

export function wrapError(error: unknown, fallbackMessage = 'Unknown error'): DomainError {
  if (error instanceof DomainError) return error;
  if (error instanceof Error) {
    return new DomainError(error.message, httpStatusOf(error) ?? 500, error);
  }
  const message = error === undefined || error === null || error === '' ? fallbackMessage : String(error);
  return new DomainError(message, 500);
}

/**
 * Matches the `code` of a DomainError or of a Node system error (ENOENT, EPIPE, ...).
 */
export function isErrorCode(error: unknown, code: string): boolean {
  return typeof error === 'object' && error !== null && 'code' in error && error.code === code;
}

/**
 * Reads the HTTP status that libraries such as body-parser attach to their errors.
 */
export function httpStatusOf(error: unknown): number | undefined {
  if (typeof error !== 'object' || error === null) return undefined;
  if ('statusCode' in error && typeof error.statusCode === 'number') return error.statusCode;
  if ('status' in error && typeof error.status === 'number') return error.status;
  return undefined;
}

export function sendErrorResponse(res: Response, statusCode: number, message: string): void {
  const body: ErrorResponse = { error: message };
  res.status(statusCode).json(body);
}

/**
 * Terminal express error middleware. Client errors keep their status and message;
 * everything else is reported as a 500 without leaking internals.
 */
export function errorHandler(): ErrorRequestHandler {
  return (error: unknown, req: Request, res: Response, next: NextFunction): void => {
    if (res.headersSent) {
      next(error);
      return;
    }

    if (error instanceof DomainError) {
      const level = error.statusCode >= 500 ? 'error' : 'warn';
      middlewareLogger.log(level, 'DomainError caught', {
        error: error.message,
        statusCode: error.statusCode,
        code: error.code,
        url: req.originalUrl,
        method: req.method,
      });
      sendErrorResponse(res, error.statusCode, error.message);
      return;
    }

    const statusCode = httpStatusOf(error);
    if (statusCode !== undefined && statusCode >= 400 && statusCode < 500) {
      sendErrorResponse(res, statusCode, errorMessage(error));
      return;
    }

    middlewareLogger.error('Unhandled error', {
      error: serializeError(error),
      url: req.originalUrl,
      method: req.method,
    });
    sendErrorResponse(res, 500, 'Internal server error');
  };
}

export function notFoundHandler(): RequestHandler {
  return (_req: Request, res: Response): void => {
    sendErrorResponse(res, 404, 'Not found');
  };
}
