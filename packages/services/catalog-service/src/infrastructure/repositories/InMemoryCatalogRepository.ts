/**
 * In-Memory Catalog Repository
 * Non-durable catalog for tests and throwaway runs; same locking contract as the JSON store.
 */

import type { Song } from '../../domains/entities/Song';
import type { ICatalogRepository } from '../../application/interfaces/ICatalogRepository';
import { Mutex } from '../concurrency/Mutex';

export class InMemoryCatalogRepository implements ICatalogRepository {
  private songs: Song[];
  private readonly mutex = new Mutex();

  constructor(initialSongs: Song[] = []) {
    this.songs = [...initialSongs];
  }

  async list(): Promise<Song[]> {
    return this.mutex.runExclusive(async () => [...this.songs]);
  }

  async findById(id: string): Promise<Song | null> {
    const songs = await this.list();
    return songs.find(song => song.id === id) ?? null;
  }

  async append(song: Song): Promise<void> {
    await this.mutex.runExclusive(async () => {
      this.songs = [...this.songs, song];
    });
  }

  async removeById(id: string): Promise<boolean> {
    return this.mutex.runExclusive(async () => {
      const remaining = this.songs.filter(song => song.id !== id);
      const removed = remaining.length !== this.songs.length;
      this.songs = remaining;
      return removed;
    });
  }
}
