/**
 * Shared Response Helpers
 *
 * Factory functions to create service-specific response helpers. Success bodies are sent
 * as-is; failures always use the `{ error }` body from @chipstream/shared-contracts.
 *
 * Usage:
 *   import { createResponseHelpers } from '@chipstream/platform-core';
 *   const { sendSuccess, sendCreated, ServiceErrors } = createResponseHelpers('my-service');
 */

import type { Response } from 'express';
import { DomainError, errorMessage, httpStatusOf, sendErrorResponse } from '../error-handling/errors';
import { getLogger } from '../logging/logger';
import { serializeError } from '../logging/error-serializer';

export interface ServiceErrorHelpers {
  fromException: (res: Response, error: unknown, fallbackMessage: string) => void;
}

export interface ResponseHelpers {
  sendSuccess: <T>(res: Response, data: T, statusCode?: number) => void;
  sendCreated: <T>(res: Response, data: T) => void;
  ServiceErrors: ServiceErrorHelpers;
}

function createServiceErrors(serviceName: string): ServiceErrorHelpers {
  const logger = getLogger(`${serviceName}:responses`);

  const internal = (res: Response, message: string, originalError?: unknown): void => {
    logger.error(message, originalError === undefined ? {} : { error: serializeError(originalError) });
    sendErrorResponse(res, 500, 'Internal server error');
  };

  return {
    fromException: (res: Response, error: unknown, fallbackMessage: string) => {
      if (error instanceof DomainError) {
        if (error.statusCode >= 500) {
          logger.error(fallbackMessage, { error: serializeError(error), code: error.code });
        }
        sendErrorResponse(res, error.statusCode, error.message);
        return;
      }

      const statusCode = httpStatusOf(error);
      if (statusCode !== undefined && statusCode >= 400 && statusCode < 500) {
        sendErrorResponse(res, statusCode, errorMessage(error));
        return;
      }

      internal(res, fallbackMessage, error);
    },
  };
}

function sendSuccess<T>(res: Response, data: T, statusCode: number = 200): void {
  res.status(statusCode).json(data);
}

function sendCreated<T>(res: Response, data: T): void {
  sendSuccess(res, data, 201);
}

/**
 * Create response helpers for a specific service
 *
 * @example
 * ```typescript
 * const { sendSuccess, ServiceErrors } = createResponseHelpers('catalog-service');
 *
 * async getSong(req: Request, res: Response) {
 *   try {
 *     sendSuccess(res, await this.songs.findById(req.params.id));
 *   } catch (error) {
 *     ServiceErrors.fromException(res, error, 'Failed to load song');
 *   }
 * }
 * ```
 */
export function createResponseHelpers(serviceName: string): ResponseHelpers {
  return {
    sendSuccess,
    sendCreated,
    ServiceErrors: createServiceErrors(serviceName),
  };
}
