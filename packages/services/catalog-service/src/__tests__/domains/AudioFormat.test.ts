import { describe, it, expect } from 'vitest';
import {
  DEFAULT_CONTENT_TYPE,
  contentTypeFor,
  extensionOf,
  isRawSampleFormat,
  resolveAudioExtension,
} from '../../domains/value-objects/AudioFormat';
import { createSong, songMatchesQuery } from '../../domains/entities/Song';

describe('AudioFormat', () => {
  it('should lowercase the extension of the last path segment', () => {
    expect(extensionOf('Track.FLAC')).toBe('.flac');
    expect(extensionOf('dir.v2/noext')).toBe('');
    expect(extensionOf('C:\\Users\\me\\song.Vgz')).toBe('.vgz');
  });

  it('should only resolve allow-listed extensions', () => {
    expect(resolveAudioExtension('tune.nsf')).toBe('.nsf');
    expect(resolveAudioExtension('cover.png')).toBeNull();
  });

  it('should map extensions to content types with a binary fallback', () => {
    expect(contentTypeFor('a.mp3')).toBe('audio/mpeg');
    expect(contentTypeFor('a.fc')).toBe('audio/wav');
    expect(contentTypeFor('a.bin')).toBe(DEFAULT_CONTENT_TYPE);
  });

  it('should recognise the raw-sample extension', () => {
    expect(isRawSampleFormat('.fc')).toBe(true);
    expect(isRawSampleFormat('.wav')).toBe(false);
  });
});

describe('Song', () => {
  it('should derive the stored filename from id and extension', () => {
    const song = createSong({
      id: 'abc',
      extension: '.spc',
      sizeBytes: 10,
      uploadedAt: new Date('2026-05-01T00:00:00.000Z'),
    });

    expect(song).toEqual({
      id: 'abc',
      title: 'Unknown Title',
      artist: 'Unknown Artist',
      comment: '',
      storedFilename: 'abc.spc',
      extension: '.spc',
      sizeBytes: 10,
      uploadedAt: '2026-05-01T00:00:00.000Z',
    });
  });

  it('should match a query against title or artist ignoring case', () => {
    const song = createSong({ id: 'x', title: 'Chip Tune', artist: 'Ada', extension: '.mod', sizeBytes: 1 });

    expect(songMatchesQuery(song, 'CHIP')).toBe(true);
    expect(songMatchesQuery(song, 'ada')).toBe(true);
    expect(songMatchesQuery(song, 'other')).toBe(false);
    expect(songMatchesQuery(song, '')).toBe(true);
  });
});
