import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'fs/promises';
import path from 'path';
import { createTempDir, removeTempDir } from '@chipstream/test-utils';
import { LocalMediaFileStore } from '../../infrastructure/providers/LocalMediaFileStore';

describe('LocalMediaFileStore', () => {
  let dir: string;
  let mediaDir: string;
  let store: LocalMediaFileStore;

  beforeEach(async () => {
    dir = await createTempDir();
    mediaDir = path.join(dir, 'uploads');
    store = new LocalMediaFileStore(mediaDir);
    await store.initialize();
  });

  afterEach(async () => {
    await removeTempDir(dir);
  });

  it('should create the media directory on initialize', async () => {
    const stats = await fs.stat(mediaDir);

    expect(stats.isDirectory()).toBe(true);
  });

  it('should write a file and report its path and size', async () => {
    const info = await store.write('song-1.mp3', Buffer.from('abcdef'));

    expect(info).toEqual({ path: path.join(mediaDir, 'song-1.mp3'), size: 6 });
    await expect(fs.readFile(info.path, 'utf-8')).resolves.toBe('abcdef');
  });

  it('should stat an existing file and return null for a missing one', async () => {
    await store.write('song-1.ogg', Buffer.alloc(12));

    await expect(store.stat('song-1.ogg')).resolves.toEqual({ path: path.join(mediaDir, 'song-1.ogg'), size: 12 });
    await expect(store.stat('missing.ogg')).resolves.toBeNull();
  });

  it('should surface stat failures other than a missing file', async () => {
    const blocker = path.join(dir, 'not-a-directory');
    await fs.writeFile(blocker, 'x');
    const broken = new LocalMediaFileStore(blocker);

    await expect(broken.stat('song-1.ogg')).rejects.toMatchObject({ code: 'ENOTDIR' });
  });

  it('should keep resolved paths inside the media directory', () => {
    expect(store.resolvePath('../../etc/passwd')).toBe(path.join(mediaDir, 'passwd'));
  });

  it('should remove a file and treat a missing file as success', async () => {
    await store.write('song-1.it', Buffer.from('x'));

    await expect(store.remove('song-1.it')).resolves.toEqual({ success: true });
    await expect(store.stat('song-1.it')).resolves.toBeNull();
    await expect(store.remove('song-1.it')).resolves.toEqual({ success: true });
  });

  it('should report a failed removal instead of throwing', async () => {
    await fs.mkdir(path.join(mediaDir, 'folder.mod'));
    await fs.writeFile(path.join(mediaDir, 'folder.mod', 'inner'), 'x');

    const result = await store.remove('folder.mod');

    expect(result.success).toBe(false);
    expect(typeof result.error).toBe('string');
  });
});
