/**
 * Catalog Service Configuration
 * Environment-driven settings, validated once at startup.
 */

import path from 'path';
import { z } from 'zod';
import { envInteger, envString, loadEnvironment, type Environment } from '@chipstream/platform-core';
import { SERVICE_NAME } from './logger';

const EnvSchema = z.object({
  PORT: envInteger(8080, { min: 1, max: 65535 }),
  HOST: envString('0.0.0.0'),
  UPLOAD_DIR: envString('uploads'),
  CATALOG_FILE: envString('songs.json'),
  INDEX_FILE: envString('index.html'),
  STREAM_CHUNK_SIZE: envInteger(64 * 1024, { min: 1024 }),
  MAX_UPLOAD_MB: envInteger(100, { min: 1 }),
  REQUEST_TIMEOUT_MS: envInteger(0, { min: 0 }),
});

export interface CatalogServiceConfig {
  server: {
    name: string;
    port: number;
    host: string;
    requestTimeoutMs: number;
  };
  storage: {
    uploadDir: string;
    catalogFile: string;
    indexFile: string;
  };
  streaming: {
    chunkSize: number;
  };
  upload: {
    maxBytes: number;
  };
}

export function loadCatalogServiceConfig(env: Environment = process.env, cwd: string = process.cwd()): CatalogServiceConfig {
  const parsed = loadEnvironment(SERVICE_NAME, EnvSchema, env);

  return {
    server: {
      name: SERVICE_NAME,
      port: parsed.PORT,
      host: parsed.HOST,
      requestTimeoutMs: parsed.REQUEST_TIMEOUT_MS,
    },
    storage: {
      uploadDir: path.resolve(cwd, parsed.UPLOAD_DIR),
      catalogFile: path.resolve(cwd, parsed.CATALOG_FILE),
      indexFile: path.resolve(cwd, parsed.INDEX_FILE),
    },
    streaming: {
      chunkSize: parsed.STREAM_CHUNK_SIZE,
    },
    upload: {
      maxBytes: parsed.MAX_UPLOAD_MB * 1024 * 1024,
    },
  };
}
