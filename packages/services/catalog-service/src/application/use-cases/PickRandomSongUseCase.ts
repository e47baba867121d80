/**
 * Pick Random Song Use Case
 * Uniform pick from the catalog, avoiding the song the client just played when possible
 */

import type { ICatalogRepository } from '../interfaces/ICatalogRepository';
import type { Song } from '../../domains/entities/Song';
import { CatalogError } from '../errors';

export interface PickRandomSongRequest {
  excludeId?: string;
}

export class PickRandomSongUseCase {
  constructor(
    private readonly repository: ICatalogRepository,
    private readonly random: () => number = Math.random
  ) {}

  async execute(request: PickRandomSongRequest = {}): Promise<Song> {
    const songs = await this.repository.list();
    if (songs.length === 0) {
      throw CatalogError.noSongsAvailable();
    }

    const others = request.excludeId ? songs.filter(song => song.id !== request.excludeId) : songs;
    const pool = others.length > 0 ? others : songs;
    const index = Math.min(Math.floor(this.random() * pool.length), pool.length - 1);
    return pool[index];
  }
}
