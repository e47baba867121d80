/**
 * Local Media File Store
 * Uploaded media kept flat in one directory on the local filesystem
 */

import fs from 'fs/promises';
import path from 'path';
import type { IMediaFileStore, RemoveFileResult, StoredFileInfo } from '../../application/interfaces/IMediaFileStore';
import { getLogger } from '../../config/logger';
import { errorMessage, isErrorCode } from '@chipstream/platform-core';

const logger = getLogger('local-media-file-store');

export class LocalMediaFileStore implements IMediaFileStore {
  private readonly basePath: string;

  constructor(basePath: string = './uploads') {
    this.basePath = path.resolve(basePath);
  }

  async initialize(): Promise<void> {
    await fs.mkdir(this.basePath, { recursive: true });
    logger.info('Media directory ready', { basePath: this.basePath });
  }

  resolvePath(storedFilename: string): string {
    // stored names are generated server-side, but never let one escape the directory
    return path.join(this.basePath, path.basename(storedFilename));
  }

  async write(storedFilename: string, data: Buffer): Promise<StoredFileInfo> {
    const fullPath = this.resolvePath(storedFilename);
    await fs.mkdir(this.basePath, { recursive: true });
    await fs.writeFile(fullPath, data);
    return { path: fullPath, size: data.length };
  }

  async stat(storedFilename: string): Promise<StoredFileInfo | null> {
    const fullPath = this.resolvePath(storedFilename);
    try {
      const stats = await fs.stat(fullPath);
      return stats.isFile() ? { path: fullPath, size: stats.size } : null;
    } catch (error) {
      if (isErrorCode(error, 'ENOENT')) return null;
      throw error;
    }
  }

  async remove(storedFilename: string): Promise<RemoveFileResult> {
    const fullPath = this.resolvePath(storedFilename);
    try {
      await fs.rm(fullPath, { force: true });
      return { success: true };
    } catch (error) {
      return { success: false, error: errorMessage(error) };
    }
  }
}
