import { DomainErrorCode, createDomainServiceError } from '@chipstream/platform-core';

const CatalogDomainCodes = {
  SONG_NOT_FOUND: 'SONG_NOT_FOUND',
  FILE_MISSING: 'FILE_MISSING',
  NOT_MULTIPART: 'NOT_MULTIPART',
  MISSING_BOUNDARY: 'MISSING_BOUNDARY',
  NO_FILE: 'NO_FILE',
  UNSUPPORTED_FORMAT: 'UNSUPPORTED_FORMAT',
  UPLOAD_TOO_LARGE: 'UPLOAD_TOO_LARGE',
  INVALID_RAW_HEADER: 'INVALID_RAW_HEADER',
  CATALOG_EMPTY: 'CATALOG_EMPTY',
  PERSISTENCE_FAILED: 'PERSISTENCE_FAILED',
} as const;

export const CatalogErrorCode = { ...DomainErrorCode, ...CatalogDomainCodes } as const;
export type CatalogErrorCodeType = (typeof CatalogErrorCode)[keyof typeof CatalogErrorCode];

const CatalogErrorBase = createDomainServiceError<CatalogErrorCodeType>('Catalog', CatalogErrorCode);

export class CatalogError extends CatalogErrorBase {
  static songNotFound(songId: string) {
    return new CatalogError('Not found', 404, CatalogErrorCode.SONG_NOT_FOUND, undefined, { songId });
  }

  static fileMissing(songId: string, storedFilename: string) {
    return new CatalogError('File missing', 404, CatalogErrorCode.FILE_MISSING, undefined, { songId, storedFilename });
  }

  static notMultipart(contentType: string | undefined) {
    return new CatalogError('Expected multipart/form-data', 400, CatalogErrorCode.NOT_MULTIPART, undefined, {
      contentType,
    });
  }

  static missingBoundary() {
    return new CatalogError('Missing boundary', 400, CatalogErrorCode.MISSING_BOUNDARY);
  }

  static noFile() {
    return new CatalogError('No file uploaded', 400, CatalogErrorCode.NO_FILE);
  }

  static unsupportedFormat(extension: string) {
    return new CatalogError(`Unsupported format: ${extension}`, 400, CatalogErrorCode.UNSUPPORTED_FORMAT, undefined, {
      extension,
    });
  }

  static uploadTooLarge(limitBytes?: number) {
    return new CatalogError('Upload too large', 413, CatalogErrorCode.UPLOAD_TOO_LARGE, undefined, { limitBytes });
  }

  static invalidRawHeader(songId: string, fileSize: number) {
    return new CatalogError('Invalid raw sample header', 422, CatalogErrorCode.INVALID_RAW_HEADER, undefined, {
      songId,
      fileSize,
    });
  }

  static noSongsAvailable() {
    return new CatalogError('No songs available', 404, CatalogErrorCode.CATALOG_EMPTY);
  }

  static persistenceFailed(operation: string, cause?: Error) {
    return new CatalogError(`Catalog ${operation} failed`, 500, CatalogErrorCode.PERSISTENCE_FAILED, cause);
  }
}
