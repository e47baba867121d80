/**
 * Catalog-wide constants shared by the service and its clients.
 */

export const AUDIO_EXTENSIONS = [
  '.mp3',
  '.ogg',
  '.wav',
  '.flac',
  '.mod',
  '.xm',
  '.s3m',
  '.it',
  '.nsf',
  '.spc',
  '.gbs',
  '.vgm',
  '.vgz',
  '.fc',
] as const;

export type AudioExtension = (typeof AUDIO_EXTENSIONS)[number];

/** Raw-sample container that is rewrapped as WAVE on playback */
export const RAW_SAMPLE_EXTENSION: AudioExtension = '.fc';

export const DEFAULT_SONG_TITLE = 'Unknown Title';
export const DEFAULT_SONG_ARTIST = 'Unknown Artist';

export function isAudioExtension(value: string): value is AudioExtension {
  return AUDIO_EXTENSIONS.some(ext => ext === value);
}
