import { randomUUID } from 'crypto';
import type { Song } from '@chipstream/shared-contracts';

export function createTestSong(overrides: Partial<Song> = {}): Song {
  const id = overrides.id ?? randomUUID();
  const extension = overrides.extension ?? '.mp3';
  return {
    id,
    title: 'Test Song',
    artist: 'Test Artist',
    comment: '',
    storedFilename: `${id}${extension}`,
    extension,
    sizeBytes: 1024,
    uploadedAt: '2026-01-01T00:00:00.000Z',
    ...overrides,
  };
}
