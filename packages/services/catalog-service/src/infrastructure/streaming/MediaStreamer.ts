/**
 * Media Streamer
 * Sends stored files to an HTTP response, either as byte ranges or rewrapped as WAVE.
 */

import { createReadStream } from 'fs';
import type { ServerResponse } from 'http';
import { Readable } from 'stream';
import { pipeline } from 'stream/promises';
import { getLogger } from '../../config/logger';
import { CatalogError } from '../../application/errors';
import { parseRangeHeader, planRangeResponse, type RangeResponsePlan } from './ByteRange';
import { RAW_HEADER_SIZE, buildWavHeader, computeWavLayout, readRawSampleHeader } from './WavTranscoder';

const logger = getLogger('media-streamer');

const CLIENT_GONE_CODES = new Set(['ERR_STREAM_PREMATURE_CLOSE', 'ERR_STREAM_DESTROYED', 'EPIPE', 'ECONNRESET']);

export interface StreamTarget {
  songId: string;
  path: string;
  size: number;
  contentType: string;
}

export type DeliveryOutcome = 'completed' | 'client-aborted';

function isClientGone(error: unknown): boolean {
  return error instanceof Error && 'code' in error && typeof error.code === 'string' && CLIENT_GONE_CODES.has(error.code);
}

async function* prefixed(prefix: Buffer, rest: AsyncIterable<Buffer>): AsyncGenerator<Buffer> {
  yield prefix;
  yield* rest;
}

export class MediaStreamer {
  constructor(private readonly chunkSize: number) {}

  /**
   * Answers a (possibly ranged) GET for a stored file.
   */
  async streamRange(res: ServerResponse, target: StreamTarget, rangeHeader: string | undefined): Promise<DeliveryOutcome> {
    const plan = planRangeResponse(parseRangeHeader(rangeHeader, target.size), target.size, target.contentType);
    this.writeHead(res, plan);

    if (plan.body === null) {
      res.end();
      return 'completed';
    }

    const source = createReadStream(target.path, {
      start: plan.body.start,
      end: plan.body.end,
      highWaterMark: this.chunkSize,
    });
    return this.deliver(source, res, target.path);
  }

  /**
   * Answers a GET for a raw-sample file with a WAVE header followed by its PCM data.
   * Range requests are not honored on this path.
   */
  async streamRawAsWav(res: ServerResponse, target: StreamTarget): Promise<DeliveryOutcome> {
    const rawHeader = await readRawSampleHeader(target.path);
    const layout = rawHeader ? computeWavLayout(rawHeader, target.size) : null;
    if (!layout) {
      throw CatalogError.invalidRawHeader(target.songId, target.size);
    }

    const wavHeader = buildWavHeader(layout);
    res.writeHead(200, {
      'Content-Type': 'audio/wav',
      'Content-Length': String(wavHeader.length + layout.pcmSize),
      'Cache-Control': 'no-cache',
    });

    const pcm = createReadStream(target.path, { start: RAW_HEADER_SIZE, highWaterMark: this.chunkSize });
    return this.deliver(Readable.from(prefixed(wavHeader, pcm)), res, target.path);
  }

  private writeHead(res: ServerResponse, plan: RangeResponsePlan): void {
    res.writeHead(plan.status, plan.headers);
  }

  private async deliver(source: Readable, res: ServerResponse, filePath: string): Promise<DeliveryOutcome> {
    try {
      await pipeline(source, res);
      return 'completed';
    } catch (error) {
      // pipeline destroys res on any failure, so only the error code tells a disconnect from a read error
      if (isClientGone(error)) {
        logger.debug('Client disconnected during stream', { filePath });
        return 'client-aborted';
      }
      throw error;
    }
  }
}
