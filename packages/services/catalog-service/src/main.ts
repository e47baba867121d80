// Load environment variables first (never override the process environment)
import { config } from 'dotenv';
import { resolve } from 'path';
config({ path: resolve(process.cwd(), '.env'), override: false });

/**
 * Catalog Service
 * Process entry point: configuration, storage initialization and HTTP listener
 */

import type { Server } from 'http';
import { errorMessage, errorStack, registerShutdownHook, setupGracefulShutdown } from '@chipstream/platform-core';
import { createCatalogApp } from './app';
import { loadCatalogServiceConfig } from './config/service-config';
import { getLogger, SERVICE_NAME } from './config/logger';
import { JsonFileCatalogRepository } from './infrastructure/repositories/JsonFileCatalogRepository';
import { LocalMediaFileStore } from './infrastructure/providers/LocalMediaFileStore';

const logger = getLogger('main');

async function main(): Promise<void> {
  const serviceConfig = loadCatalogServiceConfig();

  const fileStore = new LocalMediaFileStore(serviceConfig.storage.uploadDir);
  await fileStore.initialize();
  const repository = new JsonFileCatalogRepository(serviceConfig.storage.catalogFile);

  const app = createCatalogApp({
    repository,
    fileStore,
    indexFile: serviceConfig.storage.indexFile,
    chunkSize: serviceConfig.streaming.chunkSize,
    maxUploadBytes: serviceConfig.upload.maxBytes,
  });

  const server = await new Promise<Server>((resolveServer, rejectServer) => {
    const listening = app.listen(serviceConfig.server.port, serviceConfig.server.host, () => resolveServer(listening));
    listening.once('error', rejectServer);
  });

  if (serviceConfig.server.requestTimeoutMs > 0) {
    server.requestTimeout = serviceConfig.server.requestTimeoutMs;
    server.headersTimeout = Math.min(server.headersTimeout, serviceConfig.server.requestTimeoutMs);
  }

  setupGracefulShutdown(server);
  registerShutdownHook(() => repository.flush(), 'catalog-writes');

  logger.info('Catalog service started', {
    service: SERVICE_NAME,
    host: serviceConfig.server.host,
    port: serviceConfig.server.port,
    uploadDir: serviceConfig.storage.uploadDir,
    catalogFile: serviceConfig.storage.catalogFile,
  });
}

main().catch((error: unknown) => {
  logger.error('Failed to start catalog service', {
    service: SERVICE_NAME,
    error: errorMessage(error),
    stack: errorStack(error),
    phase: 'startup-failed',
  });
  process.exit(1);
});
