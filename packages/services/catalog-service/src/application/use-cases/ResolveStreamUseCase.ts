/**
 * Resolve Stream Use Case
 * Finds the song and verifies its backing file before any bytes are sent
 */

import type { ICatalogRepository } from '../interfaces/ICatalogRepository';
import type { IMediaFileStore } from '../interfaces/IMediaFileStore';
import type { Song } from '../../domains/entities/Song';
import { contentTypeFor, isRawSampleFormat } from '../../domains/value-objects/AudioFormat';
import { CatalogError } from '../errors';
import { getLogger } from '../../config/logger';

const logger = getLogger('resolve-stream-use-case');

export interface ResolvedStream {
  song: Song;
  path: string;
  size: number;
  contentType: string;
  rawSample: boolean;
}

export class ResolveStreamUseCase {
  constructor(
    private readonly repository: ICatalogRepository,
    private readonly fileStore: IMediaFileStore
  ) {}

  async execute(songId: string): Promise<ResolvedStream> {
    const song = await this.repository.findById(songId);
    if (!song) {
      throw CatalogError.songNotFound(songId);
    }

    const file = await this.fileStore.stat(song.storedFilename);
    if (!file) {
      logger.warn('Catalog entry has no backing file', { songId, storedFilename: song.storedFilename });
      throw CatalogError.fileMissing(songId, song.storedFilename);
    }

    return {
      song,
      path: file.path,
      size: file.size,
      contentType: contentTypeFor(song.storedFilename),
      rawSample: isRawSampleFormat(song.extension),
    };
  }
}
