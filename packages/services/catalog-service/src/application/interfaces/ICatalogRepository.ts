import type { Song } from '../../domains/entities/Song';

/**
 * Durable song catalog. `append` and `removeById` are read-modify-write operations that
 * must not lose updates when called concurrently.
 */
export interface ICatalogRepository {
  list(): Promise<Song[]>;
  findById(id: string): Promise<Song | null>;
  append(song: Song): Promise<void>;
  removeById(id: string): Promise<boolean>;
}
