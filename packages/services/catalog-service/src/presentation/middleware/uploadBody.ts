import express, {
  type ErrorRequestHandler,
  type NextFunction,
  type Request,
  type RequestHandler,
  type Response,
} from 'express';
import { CatalogError } from '../../application/errors';

function isPayloadTooLarge(error: unknown): boolean {
  return error instanceof Error && 'type' in error && error.type === 'entity.too.large';
}

/**
 * Buffers multipart bodies up to `maxBytes` into `req.body` for the multipart decoder.
 * Other content types are left unparsed so the controller can reject them.
 */
export function uploadBody(maxBytes: number): Array<RequestHandler | ErrorRequestHandler> {
  const raw = express.raw({ type: 'multipart/form-data', limit: maxBytes });

  const translateLimitError = (error: unknown, _req: Request, _res: Response, next: NextFunction): void => {
    next(isPayloadTooLarge(error) ? CatalogError.uploadTooLarge(maxBytes) : error);
  };

  return [raw, translateLimitError];
}
