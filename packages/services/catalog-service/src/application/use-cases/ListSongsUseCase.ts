/**
 * List Songs Use Case
 * Full catalog or a case-insensitive title/artist search
 */

import type { ICatalogRepository } from '../interfaces/ICatalogRepository';
import { songMatchesQuery, type Song } from '../../domains/entities/Song';

export interface ListSongsRequest {
  query?: string;
}

export class ListSongsUseCase {
  constructor(private readonly repository: ICatalogRepository) {}

  async execute(request: ListSongsRequest = {}): Promise<Song[]> {
    const songs = await this.repository.list();
    const query = request.query?.trim() ?? '';
    return query ? songs.filter(song => songMatchesQuery(song, query)) : songs;
  }
}
