/**
 * Delete Song Use Case
 * Removes the catalog entry, then the backing file on a best-effort basis
 */

import type { ICatalogRepository } from '../interfaces/ICatalogRepository';
import type { IMediaFileStore } from '../interfaces/IMediaFileStore';
import { CatalogError } from '../errors';
import { getLogger } from '../../config/logger';

const logger = getLogger('delete-song-use-case');

export class DeleteSongUseCase {
  constructor(
    private readonly repository: ICatalogRepository,
    private readonly fileStore: IMediaFileStore
  ) {}

  async execute(songId: string): Promise<void> {
    const song = await this.repository.findById(songId);
    if (!song) {
      throw CatalogError.songNotFound(songId);
    }

    const removed = await this.repository.removeById(songId);
    if (!removed) {
      // deleted concurrently between lookup and removal
      throw CatalogError.songNotFound(songId);
    }

    const fileResult = await this.fileStore.remove(song.storedFilename);
    if (!fileResult.success) {
      logger.warn('Failed to delete song file', {
        songId,
        storedFilename: song.storedFilename,
        error: fileResult.error,
      });
    }

    logger.info('Song deleted', { songId });
  }
}
