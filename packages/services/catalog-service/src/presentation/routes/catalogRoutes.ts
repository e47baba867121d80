/**
 * Catalog Routes
 * HTTP route definitions for catalog-service
 */

import { Router } from 'express';
import type { CatalogController } from '../controllers/CatalogController';
import type { StreamController } from '../controllers/StreamController';
import { uploadBody } from '../middleware/uploadBody';

export interface CatalogRouteOptions {
  maxUploadBytes: number;
}

export function createCatalogRoutes(
  catalog: CatalogController,
  stream: StreamController,
  options: CatalogRouteOptions
): Router {
  const router = Router();

  // Catalog API
  router.get('/api/songs', catalog.listSongs);
  router.get('/api/random', catalog.randomSong);
  router.post('/api/upload', uploadBody(options.maxUploadBytes), catalog.uploadSong);
  router.delete('/api/songs/:id', catalog.deleteSong);

  // Playback
  router.get('/stream/:id', stream.streamSong);

  // Static page
  router.get(['/', '/index.html'], stream.indexPage);

  return router;
}
