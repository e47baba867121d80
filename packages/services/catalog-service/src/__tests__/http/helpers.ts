import path from 'path';
import type express from 'express';
import request from 'supertest';
import { buildMultipartBody, type MultipartPart } from '@chipstream/test-utils';
import { createCatalogApp } from '../../app';
import { JsonFileCatalogRepository } from '../../infrastructure/repositories/JsonFileCatalogRepository';
import { LocalMediaFileStore } from '../../infrastructure/providers/LocalMediaFileStore';

export const BOUNDARY = '----chipstreamTestBoundary';

export interface TestCatalogApp {
  app: express.Application;
  repository: JsonFileCatalogRepository;
  uploadDir: string;
  catalogFile: string;
  indexFile: string;
}

export interface TestAppOptions {
  maxUploadBytes?: number;
  random?: () => number;
}

export async function createTestCatalogApp(dir: string, options: TestAppOptions = {}): Promise<TestCatalogApp> {
  const uploadDir = path.join(dir, 'uploads');
  const catalogFile = path.join(dir, 'songs.json');
  const indexFile = path.join(dir, 'index.html');

  const fileStore = new LocalMediaFileStore(uploadDir);
  await fileStore.initialize();
  const repository = new JsonFileCatalogRepository(catalogFile);

  let nextId = 0;
  const app = createCatalogApp({
    repository,
    fileStore,
    indexFile,
    chunkSize: 16,
    maxUploadBytes: options.maxUploadBytes ?? 1024 * 1024,
    generateId: () => `song-${++nextId}`,
    random: options.random,
  });

  return { app, repository, uploadDir, catalogFile, indexFile };
}

export function uploadParts(app: express.Application, parts: MultipartPart[]) {
  return request(app)
    .post('/api/upload')
    .set('Content-Type', `multipart/form-data; boundary=${BOUNDARY}`)
    .send(buildMultipartBody(BOUNDARY, parts));
}

export function uploadFile(
  app: express.Application,
  filename: string,
  data: Buffer,
  metadata: { title?: string; artist?: string; comment?: string } = {}
) {
  const fields: MultipartPart[] = Object.entries(metadata).map(([name, value]) => ({ name, value }));
  return uploadParts(app, [...fields, { name: 'file', filename, data }]);
}

/** GET with the body buffered as raw bytes regardless of content type. */
export function getBinary(app: express.Application, url: string, range?: string) {
  const req = request(app).get(url).responseType('blob');
  return range === undefined ? req : req.set('Range', range);
}
