/**
 * Songs API Contracts
 *
 * Zod schemas for catalog records and endpoint payloads.
 */

import { z } from 'zod';
import { AUDIO_EXTENSIONS } from '../common/constants';

// =============================================================================
// SONG RECORD
// =============================================================================

export const AudioExtensionSchema = z.enum(AUDIO_EXTENSIONS);

export const SongSchema = z.object({
  id: z.string().min(1),
  title: z.string(),
  artist: z.string(),
  comment: z.string(),
  storedFilename: z.string().min(1),
  extension: AudioExtensionSchema,
  sizeBytes: z.number().int().nonnegative(),
  uploadedAt: z.string().datetime(),
});
export type Song = z.infer<typeof SongSchema>;

// =============================================================================
// QUERIES
// =============================================================================

const firstValue = z
  .union([z.string(), z.array(z.string())])
  .optional()
  .transform(value => (Array.isArray(value) ? value[0] : value) ?? '');

export const SearchSongsQuerySchema = z.object({ q: firstValue });
export type SearchSongsQuery = z.infer<typeof SearchSongsQuerySchema>;

export const RandomSongQuerySchema = z.object({ exclude: firstValue });
export type RandomSongQuery = z.infer<typeof RandomSongQuerySchema>;

export const SongIdParamsSchema = z.object({ id: z.string().min(1) });

// =============================================================================
// RESPONSES
// =============================================================================

export interface UploadSongResponse {
  ok: true;
  song: Song;
}

export interface DeleteSongResponse {
  ok: true;
}

export interface ErrorResponse {
  error: string;
}
