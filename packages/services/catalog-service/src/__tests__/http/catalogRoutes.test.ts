import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'fs/promises';
import path from 'path';
import request from 'supertest';
import { createTempDir, removeTempDir, sequentialBytes } from '@chipstream/test-utils';
import { BOUNDARY, createTestCatalogApp, uploadFile, uploadParts, type TestCatalogApp } from './helpers';

describe('catalog routes', () => {
  let dir: string;
  let ctx: TestCatalogApp;

  beforeEach(async () => {
    dir = await createTempDir();
    ctx = await createTestCatalogApp(dir, { random: () => 0 });
  });

  afterEach(async () => {
    await removeTempDir(dir);
  });

  describe('POST /api/upload', () => {
    it('should store the upload and list it with the submitted metadata', async () => {
      const data = sequentialBytes(300);

      const upload = await uploadFile(ctx.app, 'space_debris.MOD', data, {
        title: 'Space Debris',
        artist: '',
        comment: 'amiga classic',
      });

      expect(upload.status).toBe(201);
      expect(upload.body).toEqual({
        ok: true,
        song: {
          id: 'song-1',
          title: 'Space Debris',
          artist: 'Unknown Artist',
          comment: 'amiga classic',
          storedFilename: 'song-1.mod',
          extension: '.mod',
          sizeBytes: 300,
          uploadedAt: expect.stringMatching(/^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}\.\d{3}Z$/),
        },
      });

      const list = await request(ctx.app).get('/api/songs');
      expect(list.status).toBe(200);
      expect(list.body).toEqual([upload.body.song]);

      const stored = await fs.readFile(path.join(ctx.uploadDir, 'song-1.mod'));
      expect(stored.equals(data)).toBe(true);
    });

    it('should accept a form built by the HTTP client', async () => {
      const response = await request(ctx.app)
        .post('/api/upload')
        .field('title', 'Chip Tune')
        .field('artist', 'Ada')
        .attach('file', Buffer.from('OggS-data'), 'chip.ogg');

      expect(response.status).toBe(201);
      expect(response.body.song).toMatchObject({
        title: 'Chip Tune',
        artist: 'Ada',
        comment: '',
        extension: '.ogg',
        sizeBytes: 9,
      });
    });

    it('should reject a non-multipart content type', async () => {
      const response = await request(ctx.app).post('/api/upload').send({ title: 'json' });

      expect(response.status).toBe(400);
      expect(response.body).toEqual({ error: 'Expected multipart/form-data' });
    });

    it('should reject a multipart request without a boundary', async () => {
      const response = await request(ctx.app)
        .post('/api/upload')
        .set('Content-Type', 'multipart/form-data')
        .send(Buffer.from('irrelevant'));

      expect(response.status).toBe(400);
      expect(response.body).toEqual({ error: 'Missing boundary' });
    });

    it('should reject a form without a file part', async () => {
      const response = await uploadParts(ctx.app, [{ name: 'title', value: 'Lonely' }]);

      expect(response.status).toBe(400);
      expect(response.body).toEqual({ error: 'No file uploaded' });
    });

    it('should reject a disallowed extension and store nothing', async () => {
      const response = await uploadFile(ctx.app, 'notes.txt', Buffer.from('hello'));

      expect(response.status).toBe(400);
      expect(response.body).toEqual({ error: 'Unsupported format: .txt' });
      await expect(fs.readdir(ctx.uploadDir)).resolves.toEqual([]);
      expect((await request(ctx.app).get('/api/songs')).body).toEqual([]);
    });

    it('should reject a body over the upload limit with 413', async () => {
      const small = await createTestCatalogApp(path.join(dir, 'small'), { maxUploadBytes: 1024 });

      const response = await request(small.app)
        .post('/api/upload')
        .set('Content-Type', `multipart/form-data; boundary=${BOUNDARY}`)
        .send(Buffer.alloc(2048, 0x61));

      expect(response.status).toBe(413);
      expect(response.body).toEqual({ error: 'Upload too large' });
    });
  });

  describe('GET /api/songs', () => {
    beforeEach(async () => {
      await uploadFile(ctx.app, 'a.mod', Buffer.from('a'), { title: 'Chip Tune', artist: 'Ada' });
      await uploadFile(ctx.app, 'b.xm', Buffer.from('b'), { title: 'Other', artist: 'Bob' });
    });

    it('should filter by title case-insensitively', async () => {
      const response = await request(ctx.app).get('/api/songs').query({ q: 'chip' });

      expect(response.status).toBe(200);
      expect(response.body.map((song: { title: string }) => song.title)).toEqual(['Chip Tune']);
    });

    it('should filter by artist', async () => {
      const response = await request(ctx.app).get('/api/songs?q=BOB');

      expect(response.body.map((song: { id: string }) => song.id)).toEqual(['song-2']);
    });

    it('should return the whole catalog for an empty query', async () => {
      const response = await request(ctx.app).get('/api/songs?q=');

      expect(response.body).toHaveLength(2);
    });
  });

  describe('GET /api/random', () => {
    it('should return 404 when the catalog is empty', async () => {
      const response = await request(ctx.app).get('/api/random');

      expect(response.status).toBe(404);
      expect(response.body).toEqual({ error: 'No songs available' });
    });

    it('should skip the excluded song', async () => {
      await uploadFile(ctx.app, 'a.mod', Buffer.from('a'));
      await uploadFile(ctx.app, 'b.mod', Buffer.from('b'));

      const response = await request(ctx.app).get('/api/random?exclude=song-1');

      expect(response.status).toBe(200);
      expect(response.body.id).toBe('song-2');
    });

    it('should fall back to the excluded song when it is the only one', async () => {
      await uploadFile(ctx.app, 'a.mod', Buffer.from('a'));

      const response = await request(ctx.app).get('/api/random?exclude=song-1');

      expect(response.body.id).toBe('song-1');
    });
  });

  describe('DELETE /api/songs/:id', () => {
    it('should return 404 for an unknown id and leave the catalog unchanged', async () => {
      await uploadFile(ctx.app, 'a.mod', Buffer.from('a'));

      const response = await request(ctx.app).delete('/api/songs/unknown');

      expect(response.status).toBe(404);
      expect(response.body).toEqual({ error: 'Not found' });
      expect((await request(ctx.app).get('/api/songs')).body).toHaveLength(1);
    });

    it('should delete once, remove the file, then report not found', async () => {
      await uploadFile(ctx.app, 'a.mod', Buffer.from('a'));

      const first = await request(ctx.app).delete('/api/songs/song-1');
      expect(first.status).toBe(200);
      expect(first.body).toEqual({ ok: true });
      await expect(fs.access(path.join(ctx.uploadDir, 'song-1.mod'))).rejects.toThrow();

      const second = await request(ctx.app).delete('/api/songs/song-1');
      expect(second.status).toBe(404);
      expect(second.body).toEqual({ error: 'Not found' });
    });

    it('should succeed when the backing file is already gone', async () => {
      await uploadFile(ctx.app, 'a.mod', Buffer.from('a'));
      await fs.rm(path.join(ctx.uploadDir, 'song-1.mod'));

      const response = await request(ctx.app).delete('/api/songs/song-1');

      expect(response.status).toBe(200);
      expect((await request(ctx.app).get('/api/songs')).body).toEqual([]);
    });
  });

  describe('service routes', () => {
    it('should answer preflight requests with 204 and CORS headers', async () => {
      const response = await request(ctx.app).options('/api/upload');

      expect(response.status).toBe(204);
      expect(response.headers['access-control-allow-origin']).toBe('*');
      expect(response.headers['access-control-allow-methods']).toBe('GET,POST,DELETE,OPTIONS');
      expect(response.headers['access-control-allow-headers']).toBe('Content-Type,Range');
    });

    it('should add the allow-origin header to API responses', async () => {
      const response = await request(ctx.app).get('/api/songs');

      expect(response.headers['access-control-allow-origin']).toBe('*');
    });

    it('should report health', async () => {
      const response = await request(ctx.app).get('/health');

      expect(response.status).toBe(200);
      expect(response.body).toEqual({ status: 'ok', service: 'catalog-service' });
    });

    it('should serve the index page at / and /index.html', async () => {
      await fs.writeFile(ctx.indexFile, '<!doctype html><title>CHIP.STREAM</title>');

      for (const url of ['/', '/index.html']) {
        const response = await request(ctx.app).get(url);
        expect(response.status).toBe(200);
        expect(response.headers['content-type']).toMatch(/^text\/html/);
        expect(response.text).toBe('<!doctype html><title>CHIP.STREAM</title>');
      }
    });

    it('should return 404 when the index page is missing', async () => {
      const response = await request(ctx.app).get('/');

      expect(response.status).toBe(404);
      expect(response.body).toEqual({ error: 'index.html not found' });
    });

    it('should return a JSON 404 for unknown routes', async () => {
      const response = await request(ctx.app).get('/api/nothing-here');

      expect(response.status).toBe(404);
      expect(response.body).toEqual({ error: 'Not found' });
    });

    it('should attach a correlation id to every response', async () => {
      const response = await request(ctx.app).get('/health').set('x-correlation-id', 'test-correlation');

      expect(response.headers['x-correlation-id']).toBe('test-correlation');
    });
  });
});
