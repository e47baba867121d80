/**
 * Catalog Controller
 * HTTP API endpoints for browsing, uploading and deleting songs
 */

import type { Request, Response } from 'express';
import { parseParams, parseQuery } from '@chipstream/platform-core';
import {
  RandomSongQuerySchema,
  SearchSongsQuerySchema,
  SongIdParamsSchema,
  type DeleteSongResponse,
  type UploadSongResponse,
} from '@chipstream/shared-contracts';
import type {
  DeleteSongUseCase,
  ListSongsUseCase,
  PickRandomSongUseCase,
  UploadSongUseCase,
} from '../../application/use-cases';
import { CatalogError } from '../../application/errors';
import { decodeMultipart, extractBoundary, isMultipartFormData } from '../parsers/MultipartDecoder';
import { sendCreated, sendSuccess, ServiceErrors } from '../utils/response-helpers';

export interface CatalogControllerDeps {
  listSongs: ListSongsUseCase;
  pickRandomSong: PickRandomSongUseCase;
  uploadSong: UploadSongUseCase;
  deleteSong: DeleteSongUseCase;
}

export class CatalogController {
  constructor(private readonly useCases: CatalogControllerDeps) {}

  listSongs = async (req: Request, res: Response): Promise<void> => {
    try {
      const { q } = parseQuery(SearchSongsQuerySchema, req.query);
      sendSuccess(res, await this.useCases.listSongs.execute({ query: q }));
    } catch (error) {
      ServiceErrors.fromException(res, error, 'Failed to list songs');
    }
  };

  randomSong = async (req: Request, res: Response): Promise<void> => {
    try {
      const { exclude } = parseQuery(RandomSongQuerySchema, req.query);
      sendSuccess(res, await this.useCases.pickRandomSong.execute({ excludeId: exclude || undefined }));
    } catch (error) {
      ServiceErrors.fromException(res, error, 'Failed to pick a random song');
    }
  };

  uploadSong = async (req: Request, res: Response): Promise<void> => {
    try {
      const contentType = req.headers['content-type'];
      if (!isMultipartFormData(contentType)) {
        throw CatalogError.notMultipart(contentType);
      }
      const boundary = extractBoundary(contentType);
      if (!boundary) {
        throw CatalogError.missingBoundary();
      }

      const body: unknown = req.body;
      const { fields, file } = decodeMultipart(Buffer.isBuffer(body) ? body : Buffer.alloc(0), boundary);

      const song = await this.useCases.uploadSong.execute({
        file,
        title: fields.title,
        artist: fields.artist,
        comment: fields.comment,
      });

      const response: UploadSongResponse = { ok: true, song };
      sendCreated(res, response);
    } catch (error) {
      ServiceErrors.fromException(res, error, 'Failed to upload song');
    }
  };

  deleteSong = async (req: Request, res: Response): Promise<void> => {
    try {
      const { id } = parseParams(SongIdParamsSchema, req.params);
      await this.useCases.deleteSong.execute(id);
      const response: DeleteSongResponse = { ok: true };
      sendSuccess(res, response);
    } catch (error) {
      ServiceErrors.fromException(res, error, 'Failed to delete song');
    }
  };
}
