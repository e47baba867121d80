/**
 * Stream Controller
 * Media playback and the static index page
 */

import fs from 'fs/promises';
import type { Request, Response } from 'express';
import { isErrorCode, parseParams, sendErrorResponse, serializeError } from '@chipstream/platform-core';
import { SongIdParamsSchema } from '@chipstream/shared-contracts';
import type { ResolveStreamUseCase } from '../../application/use-cases';
import type { MediaStreamer, StreamTarget } from '../../infrastructure/streaming';
import { getLogger } from '../../config/logger';
import { ServiceErrors } from '../utils/response-helpers';

const logger = getLogger('stream-controller');

export class StreamController {
  constructor(
    private readonly resolveStream: ResolveStreamUseCase,
    private readonly streamer: MediaStreamer,
    private readonly indexFile: string
  ) {}

  streamSong = async (req: Request, res: Response): Promise<void> => {
    try {
      const { id } = parseParams(SongIdParamsSchema, req.params);
      const resolved = await this.resolveStream.execute(id);
      const target: StreamTarget = {
        songId: resolved.song.id,
        path: resolved.path,
        size: resolved.size,
        contentType: resolved.contentType,
      };

      const outcome = resolved.rawSample
        ? await this.streamer.streamRawAsWav(res, target)
        : await this.streamer.streamRange(res, target, req.headers.range);

      logger.debug('Stream finished', { songId: id, outcome, range: req.headers.range });
    } catch (error) {
      if (res.headersSent) {
        logger.error('Stream failed after response started', { error: serializeError(error) });
        res.destroy();
        return;
      }
      ServiceErrors.fromException(res, error, 'Failed to stream song');
    }
  };

  indexPage = async (_req: Request, res: Response): Promise<void> => {
    try {
      const html = await fs.readFile(this.indexFile);
      res.status(200).type('html').send(html);
    } catch (error) {
      if (isErrorCode(error, 'ENOENT') || isErrorCode(error, 'EISDIR')) {
        sendErrorResponse(res, 404, 'index.html not found');
        return;
      }
      ServiceErrors.fromException(res, error, 'Failed to read index page');
    }
  };
}
