import { describe, it, expect, vi, beforeEach } from 'vitest';

const mockLogger = vi.hoisted(() => ({
  info: vi.fn(),
  debug: vi.fn(),
  warn: vi.fn(),
  error: vi.fn(),
}));

vi.mock('../../config/logger', () => ({
  SERVICE_NAME: 'catalog-service',
  getLogger: () => mockLogger,
}));

import { createTestSong } from '@chipstream/test-utils';
import { DeleteSongUseCase } from '../../application/use-cases/DeleteSongUseCase';
import { CatalogErrorCode } from '../../application/errors';
import { InMemoryCatalogRepository } from '../../infrastructure/repositories/InMemoryCatalogRepository';
import { createFakeFileStore } from './fakes';

describe('DeleteSongUseCase', () => {
  const song = createTestSong({ id: 'song-1', extension: '.xm' });
  let repository: InMemoryCatalogRepository;
  let fileStore: ReturnType<typeof createFakeFileStore>;
  let useCase: DeleteSongUseCase;

  beforeEach(() => {
    vi.clearAllMocks();
    repository = new InMemoryCatalogRepository([song]);
    fileStore = createFakeFileStore({ 'song-1.xm': Buffer.from('xm') });
    useCase = new DeleteSongUseCase(repository, fileStore.store);
  });

  it('should remove the catalog entry and the backing file', async () => {
    await useCase.execute('song-1');

    await expect(repository.list()).resolves.toEqual([]);
    expect(fileStore.remove).toHaveBeenCalledWith('song-1.xm');
    expect(fileStore.files.has('song-1.xm')).toBe(false);
  });

  it('should fail with not found for an unknown id and leave the catalog unchanged', async () => {
    await expect(useCase.execute('nope')).rejects.toMatchObject({
      statusCode: 404,
      message: 'Not found',
      code: CatalogErrorCode.SONG_NOT_FOUND,
    });

    await expect(repository.list()).resolves.toEqual([song]);
    expect(fileStore.remove).not.toHaveBeenCalled();
  });

  it('should succeed once and then fail for the same id', async () => {
    await useCase.execute('song-1');

    await expect(useCase.execute('song-1')).rejects.toMatchObject({ statusCode: 404 });
  });

  it('should still succeed when the file cannot be removed', async () => {
    fileStore.remove.mockResolvedValueOnce({ success: false, error: 'EACCES' });

    await expect(useCase.execute('song-1')).resolves.toBeUndefined();

    await expect(repository.list()).resolves.toEqual([]);
    expect(mockLogger.warn).toHaveBeenCalledWith('Failed to delete song file', {
      songId: 'song-1',
      storedFilename: 'song-1.xm',
      error: 'EACCES',
    });
  });
});
