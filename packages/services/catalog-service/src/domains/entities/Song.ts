/**
 * Song - Catalog Domain Model
 * Immutable metadata record for one uploaded audio file
 */

import {
  DEFAULT_SONG_ARTIST,
  DEFAULT_SONG_TITLE,
  type AudioExtension,
  type Song,
} from '@chipstream/shared-contracts';

export type { Song };

export interface NewSongInput {
  id: string;
  title?: string;
  artist?: string;
  comment?: string;
  extension: AudioExtension;
  sizeBytes: number;
  uploadedAt?: Date;
}

/**
 * Builds a Song record with trimmed metadata and placeholder title/artist.
 */
export function createSong(input: NewSongInput): Song {
  return {
    id: input.id,
    title: input.title?.trim() || DEFAULT_SONG_TITLE,
    artist: input.artist?.trim() || DEFAULT_SONG_ARTIST,
    comment: input.comment?.trim() ?? '',
    storedFilename: `${input.id}${input.extension}`,
    extension: input.extension,
    sizeBytes: input.sizeBytes,
    uploadedAt: (input.uploadedAt ?? new Date()).toISOString(),
  };
}

/**
 * Case-insensitive substring match on title or artist. An empty query matches everything.
 */
export function songMatchesQuery(song: Song, query: string): boolean {
  const needle = query.toLowerCase();
  if (!needle) return true;
  return song.title.toLowerCase().includes(needle) || song.artist.toLowerCase().includes(needle);
}
