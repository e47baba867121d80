/**
 * Raw-sample to RIFF/WAVE rewrapping.
 *
 * The raw format is a 6-byte header (u32 LE sample rate, u16 LE channel count) followed
 * by interleaved signed 16-bit little-endian PCM. Playback prepends a canonical 44-byte
 * WAVE header and sends the PCM bytes untouched.
 */

import fs from 'fs/promises';

export const RAW_HEADER_SIZE = 6;
export const WAV_HEADER_SIZE = 44;
export const BITS_PER_SAMPLE = 16;

const WAVE_FORMAT_PCM = 1;
const FMT_CHUNK_SIZE = 16;
const UINT32_MAX = 0xffffffff;

export interface RawSampleHeader {
  sampleRate: number;
  channels: number;
}

export interface WavLayout extends RawSampleHeader {
  byteRate: number;
  blockAlign: number;
  pcmSize: number;
  chunkSize: number;
}

export function parseRawSampleHeader(header: Buffer): RawSampleHeader | null {
  if (header.length < RAW_HEADER_SIZE) return null;
  return {
    sampleRate: header.readUInt32LE(0),
    channels: header.readUInt16LE(4),
  };
}

/**
 * Derives WAVE header fields for a raw file of `fileSize` bytes, or `null` when the
 * values cannot be represented in a WAVE header.
 */
export function computeWavLayout(header: RawSampleHeader, fileSize: number): WavLayout | null {
  const bytesPerSample = BITS_PER_SAMPLE / 8;
  const pcmSize = fileSize - RAW_HEADER_SIZE;
  const byteRate = header.sampleRate * header.channels * bytesPerSample;
  const blockAlign = header.channels * bytesPerSample;
  const chunkSize = 36 + pcmSize;

  if (pcmSize < 0 || header.channels === 0 || byteRate > UINT32_MAX || chunkSize > UINT32_MAX) {
    return null;
  }

  return { ...header, byteRate, blockAlign, pcmSize, chunkSize };
}

export function buildWavHeader(layout: WavLayout): Buffer {
  const header = Buffer.alloc(WAV_HEADER_SIZE);
  header.write('RIFF', 0, 'ascii');
  header.writeUInt32LE(layout.chunkSize, 4);
  header.write('WAVE', 8, 'ascii');
  header.write('fmt ', 12, 'ascii');
  header.writeUInt32LE(FMT_CHUNK_SIZE, 16);
  header.writeUInt16LE(WAVE_FORMAT_PCM, 20);
  header.writeUInt16LE(layout.channels, 22);
  header.writeUInt32LE(layout.sampleRate, 24);
  header.writeUInt32LE(layout.byteRate, 28);
  header.writeUInt16LE(layout.blockAlign, 32);
  header.writeUInt16LE(BITS_PER_SAMPLE, 34);
  header.write('data', 36, 'ascii');
  header.writeUInt32LE(layout.pcmSize, 40);
  return header;
}

/**
 * Reads the raw header of a file on disk without loading the sample data.
 */
export async function readRawSampleHeader(filePath: string): Promise<RawSampleHeader | null> {
  const handle = await fs.open(filePath, 'r');
  try {
    const buffer = Buffer.alloc(RAW_HEADER_SIZE);
    const { bytesRead } = await handle.read(buffer, 0, RAW_HEADER_SIZE, 0);
    return parseRawSampleHeader(buffer.subarray(0, bytesRead));
  } finally {
    await handle.close();
  }
}
