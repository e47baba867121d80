/**
 * Upload Song Use Case
 * Validates an uploaded file, stores it and appends its Song record to the catalog
 */

import { v4 as uuidv4 } from 'uuid';
import { errorMessage } from '@chipstream/platform-core';
import type { ICatalogRepository } from '../interfaces/ICatalogRepository';
import type { IMediaFileStore } from '../interfaces/IMediaFileStore';
import { createSong, type Song } from '../../domains/entities/Song';
import { extensionOf, resolveAudioExtension } from '../../domains/value-objects/AudioFormat';
import { CatalogError } from '../errors';
import { getLogger } from '../../config/logger';

const logger = getLogger('upload-song-use-case');

export interface UploadSongRequest {
  file: { filename: string; data: Buffer } | null;
  title?: string;
  artist?: string;
  comment?: string;
}

export class UploadSongUseCase {
  constructor(
    private readonly repository: ICatalogRepository,
    private readonly fileStore: IMediaFileStore,
    private readonly generateId: () => string = () => uuidv4(),
    private readonly now: () => Date = () => new Date()
  ) {}

  async execute(request: UploadSongRequest): Promise<Song> {
    const { file } = request;
    if (!file || !file.filename || file.data.length === 0) {
      throw CatalogError.noFile();
    }

    const extension = resolveAudioExtension(file.filename);
    if (!extension) {
      throw CatalogError.unsupportedFormat(extensionOf(file.filename));
    }

    const song = createSong({
      id: this.generateId(),
      title: request.title,
      artist: request.artist,
      comment: request.comment,
      extension,
      sizeBytes: file.data.length,
      uploadedAt: this.now(),
    });

    await this.fileStore.write(song.storedFilename, file.data);

    try {
      await this.repository.append(song);
    } catch (error) {
      const cleanup = await this.fileStore.remove(song.storedFilename);
      if (!cleanup.success) {
        logger.warn('Failed to remove file after catalog append failed', {
          songId: song.id,
          storedFilename: song.storedFilename,
          error: cleanup.error,
        });
      }
      logger.error('Catalog append failed', { songId: song.id, error: errorMessage(error) });
      throw error;
    }

    logger.info('Song uploaded', {
      songId: song.id,
      extension: song.extension,
      sizeBytes: song.sizeBytes,
      originalName: file.filename,
    });
    return song;
  }
}
