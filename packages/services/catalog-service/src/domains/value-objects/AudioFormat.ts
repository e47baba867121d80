/**
 * Audio format helpers: upload allow-list checks and response content types.
 */

import path from 'path';
import { RAW_SAMPLE_EXTENSION, isAudioExtension, type AudioExtension } from '@chipstream/shared-contracts';

const CONTENT_TYPES: Record<AudioExtension, string> = {
  '.mp3': 'audio/mpeg',
  '.ogg': 'audio/ogg',
  '.wav': 'audio/wav',
  '.flac': 'audio/flac',
  '.mod': 'audio/x-mod',
  '.xm': 'audio/x-xm',
  '.s3m': 'audio/x-s3m',
  '.it': 'audio/x-it',
  '.nsf': 'audio/x-nsf',
  '.spc': 'audio/x-spc',
  '.gbs': 'audio/x-gbs',
  '.vgm': 'audio/x-vgm',
  '.vgz': 'audio/x-vgz',
  '.fc': 'audio/wav',
};

export const DEFAULT_CONTENT_TYPE = 'application/octet-stream';

/**
 * Lowercased extension of the final path segment, with its leading dot. Accepts both
 * POSIX and Windows separators since some clients send a full local path.
 */
export function extensionOf(filename: string): string {
  const basename = filename.split(/[\\/]/).pop() ?? '';
  return path.extname(basename).toLowerCase();
}

export function resolveAudioExtension(filename: string): AudioExtension | null {
  const ext = extensionOf(filename);
  return isAudioExtension(ext) ? ext : null;
}

export function contentTypeFor(filename: string): string {
  const ext = extensionOf(filename);
  return isAudioExtension(ext) ? CONTENT_TYPES[ext] : DEFAULT_CONTENT_TYPE;
}

export function isRawSampleFormat(extension: string): boolean {
  return extension === RAW_SAMPLE_EXTENSION;
}
