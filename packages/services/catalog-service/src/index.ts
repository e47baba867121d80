/**
 * Catalog Service - Exports Index
 */

export type { Song, NewSongInput } from './domains/entities/Song';
export { createSong, songMatchesQuery } from './domains/entities/Song';
export { contentTypeFor, resolveAudioExtension } from './domains/value-objects/AudioFormat';

export type { ICatalogRepository } from './application/interfaces/ICatalogRepository';
export type { IMediaFileStore, StoredFileInfo, RemoveFileResult } from './application/interfaces/IMediaFileStore';
export { CatalogError, CatalogErrorCode } from './application/errors';
export * from './application/use-cases';

export { JsonFileCatalogRepository } from './infrastructure/repositories/JsonFileCatalogRepository';
export { InMemoryCatalogRepository } from './infrastructure/repositories/InMemoryCatalogRepository';
export { LocalMediaFileStore } from './infrastructure/providers/LocalMediaFileStore';
export { Mutex } from './infrastructure/concurrency/Mutex';
export * from './infrastructure/streaming';

export { decodeMultipart, extractBoundary, isMultipartFormData } from './presentation/parsers/MultipartDecoder';
export type { MultipartFile, MultipartResult } from './presentation/parsers/MultipartDecoder';

export { createCatalogApp, type CatalogAppDeps } from './app';
export { loadCatalogServiceConfig, type CatalogServiceConfig } from './config/service-config';
