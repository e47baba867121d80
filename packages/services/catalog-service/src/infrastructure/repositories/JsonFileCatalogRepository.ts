/**
 * JSON File Catalog Repository
 * Whole catalog persisted as one JSON array; every read re-loads, every write rewrites.
 */

import fs from 'fs/promises';
import path from 'path';
import { SongSchema } from '@chipstream/shared-contracts';
import type { Song } from '../../domains/entities/Song';
import type { ICatalogRepository } from '../../application/interfaces/ICatalogRepository';
import { CatalogError } from '../../application/errors';
import { Mutex } from '../concurrency/Mutex';
import { getLogger } from '../../config/logger';
import { errorMessage, isErrorCode } from '@chipstream/platform-core';

const logger = getLogger('json-catalog-repository');

function asError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

export class JsonFileCatalogRepository implements ICatalogRepository {
  private readonly filePath: string;
  private readonly mutex = new Mutex();

  constructor(filePath: string) {
    this.filePath = path.resolve(filePath);
  }

  /** Resolves once every write queued before the call has finished. */
  async flush(): Promise<void> {
    await this.mutex.runExclusive(async () => undefined);
  }

  async list(): Promise<Song[]> {
    return this.mutex.runExclusive(() => this.load());
  }

  async findById(id: string): Promise<Song | null> {
    const songs = await this.list();
    return songs.find(song => song.id === id) ?? null;
  }

  async append(song: Song): Promise<void> {
    await this.mutex.runExclusive(async () => {
      const songs = await this.load();
      songs.push(song);
      await this.save(songs);
    });
  }

  async removeById(id: string): Promise<boolean> {
    return this.mutex.runExclusive(async () => {
      const songs = await this.load();
      const remaining = songs.filter(song => song.id !== id);
      if (remaining.length === songs.length) {
        return false;
      }
      await this.save(remaining);
      return true;
    });
  }

  /**
   * Tolerant read: a missing, unparseable or non-array document is an empty catalog,
   * and entries that fail the schema are dropped.
   */
  private async load(): Promise<Song[]> {
    let raw: string;
    try {
      raw = await fs.readFile(this.filePath, 'utf-8');
    } catch (error) {
      if (isErrorCode(error, 'ENOENT')) {
        return [];
      }
      throw CatalogError.persistenceFailed('read', asError(error));
    }

    let document: unknown;
    try {
      document = JSON.parse(raw);
    } catch (error) {
      logger.warn('Catalog document is not valid JSON, treating as empty', {
        filePath: this.filePath,
        error: errorMessage(error),
      });
      return [];
    }

    if (!Array.isArray(document)) {
      logger.warn('Catalog document is not an array, treating as empty', { filePath: this.filePath });
      return [];
    }

    const songs: Song[] = [];
    document.forEach((entry: unknown, index) => {
      const result = SongSchema.safeParse(entry);
      if (result.success) {
        songs.push(result.data);
      } else {
        logger.warn('Skipping invalid catalog entry', {
          filePath: this.filePath,
          index,
          issues: result.error.errors.map(issue => `${issue.path.join('.')}: ${issue.message}`),
        });
      }
    });
    return songs;
  }

  private async save(songs: Song[]): Promise<void> {
    const tempPath = `${this.filePath}.${process.pid}.tmp`;
    try {
      await fs.mkdir(path.dirname(this.filePath), { recursive: true });
      await fs.writeFile(tempPath, JSON.stringify(songs, null, 2), 'utf-8');
      await fs.rename(tempPath, this.filePath);
    } catch (error) {
      throw CatalogError.persistenceFailed('write', asError(error));
    }
  }
}
