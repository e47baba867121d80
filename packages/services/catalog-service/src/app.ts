/**
 * Catalog Service - Express App Factory
 */

import express from 'express';
import helmet from 'helmet';
import { errorHandler, notFoundHandler, requestLogger } from '@chipstream/platform-core';
import type { ICatalogRepository } from './application/interfaces/ICatalogRepository';
import type { IMediaFileStore } from './application/interfaces/IMediaFileStore';
import {
  DeleteSongUseCase,
  ListSongsUseCase,
  PickRandomSongUseCase,
  ResolveStreamUseCase,
  UploadSongUseCase,
} from './application/use-cases';
import { MediaStreamer } from './infrastructure/streaming';
import { CatalogController } from './presentation/controllers/CatalogController';
import { StreamController } from './presentation/controllers/StreamController';
import { catalogCors } from './presentation/middleware/cors';
import { createCatalogRoutes } from './presentation/routes/catalogRoutes';
import { SERVICE_NAME } from './config/logger';

export interface CatalogAppDeps {
  repository: ICatalogRepository;
  fileStore: IMediaFileStore;
  indexFile: string;
  chunkSize: number;
  maxUploadBytes: number;
  /** Overrides id generation for uploads. */
  generateId?: () => string;
  /** Overrides the random source used by `/api/random`. */
  random?: () => number;
}

export function createCatalogApp(deps: CatalogAppDeps): express.Application {
  const app = express();
  app.disable('x-powered-by');

  app.use(
    helmet({
      contentSecurityPolicy: {
        directives: {
          defaultSrc: ["'self'"],
          styleSrc: ["'self'", "'unsafe-inline'"],
          scriptSrc: ["'self'", "'unsafe-inline'"],
          imgSrc: ["'self'", 'data:'],
          mediaSrc: ["'self'", 'blob:'],
        },
      },
      crossOriginEmbedderPolicy: false,
      crossOriginResourcePolicy: { policy: 'cross-origin' },
    })
  );
  app.use(catalogCors());
  app.use(requestLogger(SERVICE_NAME));

  const catalogController = new CatalogController({
    listSongs: new ListSongsUseCase(deps.repository),
    pickRandomSong: new PickRandomSongUseCase(deps.repository, deps.random),
    uploadSong: new UploadSongUseCase(deps.repository, deps.fileStore, deps.generateId),
    deleteSong: new DeleteSongUseCase(deps.repository, deps.fileStore),
  });
  const streamController = new StreamController(
    new ResolveStreamUseCase(deps.repository, deps.fileStore),
    new MediaStreamer(deps.chunkSize),
    deps.indexFile
  );

  app.get('/health', (_req, res) => {
    res.status(200).json({ status: 'ok', service: SERVICE_NAME });
  });

  app.use(createCatalogRoutes(catalogController, streamController, { maxUploadBytes: deps.maxUploadBytes }));

  app.use(notFoundHandler());
  app.use(errorHandler());

  return app;
}
