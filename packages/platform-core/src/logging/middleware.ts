/**
 * Logging Middleware
 *
 * Express middleware for request logging with correlation
 */

import type { Request, Response, NextFunction, RequestHandler } from 'express';
import type { LogContext } from './types';
import { getLogger } from './logger';
import { correlationStorage, generateCorrelationId } from './correlation';

function headerValue(value: string | string[] | undefined): string | undefined {
  return Array.isArray(value) ? value[0] : value;
}

/**
 * Express middleware for request logging with correlation ID.
 * Logs one line per finished (or aborted) response.
 */
export function requestLogger(serviceName: string): RequestHandler {
  const logger = getLogger(serviceName);

  return (req: Request, res: Response, next: NextFunction) => {
    const correlationId =
      headerValue(req.headers['x-correlation-id']) || headerValue(req.headers['x-request-id']) || generateCorrelationId();
    const startedAt = Date.now();

    const context: LogContext = {
      correlationId,
      service: serviceName,
      method: req.method,
      url: req.originalUrl,
    };

    res.setHeader('x-correlation-id', correlationId);

    res.on('close', () => {
      logger.debug(`${req.method} ${req.originalUrl} ${res.statusCode}`, {
        correlationId,
        durationMs: Date.now() - startedAt,
        finished: res.writableFinished,
      });
    });

    correlationStorage.run(context, () => {
      next();
    });
  };
}
