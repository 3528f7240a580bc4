/**
 * Reader Controller
 * HTTP endpoints for browsing the library and reading chapters
 */

import type { Request, Response } from 'express';
import type { BookParams, ChapterParams, ImageParams, ReadChapterQuery } from '@folio/shared-contracts';
import { getLogger, serializeError, type EmptyInput, type ValidatedInput } from '@folio/platform-core';
import type {
  GetTableOfContentsUseCase,
  ListLibraryUseCase,
  ReadChapterUseCase,
  ResolveImageUseCase,
} from '../../application/use-cases';
import { ReaderError } from '../../application/errors';
import { sendSuccess, ServiceErrors } from '../utils/response-helpers';

const logger = getLogger('reader-controller');

export interface ReaderUseCases {
  listLibrary: ListLibraryUseCase;
  readChapter: ReadChapterUseCase;
  getTableOfContents: GetTableOfContentsUseCase;
  resolveImage: ResolveImageUseCase;
}

export class ReaderController {
  constructor(private readonly _useCases: ReaderUseCases) {}

  listLibrary = async (_input: ValidatedInput<EmptyInput, EmptyInput>, req: Request, res: Response): Promise<void> => {
    try {
      const books = await this._useCases.listLibrary.execute();
      sendSuccess(res, { books });
    } catch (error) {
      this.handleError(res, error, req, 'Failed to list library');
    }
  };

  readFirstChapter = async (
    { params }: ValidatedInput<BookParams, EmptyInput>,
    req: Request,
    res: Response
  ): Promise<void> => {
    try {
      const result = await this._useCases.readChapter.executeFirst(params.bookId);
      sendSuccess(res, result);
    } catch (error) {
      this.handleError(res, error, req, 'Failed to read chapter');
    }
  };

  readChapter = async (
    { params, query }: ValidatedInput<ChapterParams, ReadChapterQuery>,
    req: Request,
    res: Response
  ): Promise<void> => {
    try {
      const result = await this._useCases.readChapter.execute({
        bookId: params.bookId,
        chapterIndex: params.chapterIndex,
        anchor: query.anchor,
      });
      sendSuccess(res, result);
    } catch (error) {
      this.handleError(res, error, req, 'Failed to read chapter');
    }
  };

  getTableOfContents = async (
    { params }: ValidatedInput<BookParams, EmptyInput>,
    req: Request,
    res: Response
  ): Promise<void> => {
    try {
      const toc = await this._useCases.getTableOfContents.execute(params.bookId);
      sendSuccess(res, toc);
    } catch (error) {
      this.handleError(res, error, req, 'Failed to load table of contents');
    }
  };

  serveImage = async ({ params }: ValidatedInput<ImageParams, EmptyInput>, req: Request, res: Response): Promise<void> => {
    try {
      const image = await this._useCases.resolveImage.execute(params.bookId, params.imageName);
      await new Promise<void>((resolve, reject) => {
        res.sendFile(image.filePath, { dotfiles: 'allow' }, err => (err ? reject(err) : resolve()));
      });
    } catch (error) {
      if (res.headersSent) {
        logger.warn('Image transfer interrupted', { bookId: params.bookId, error: serializeError(error) });
        return;
      }
      this.handleError(res, error, req, 'Failed to serve image');
    }
  };

  private handleError(res: Response, error: unknown, req: Request, fallbackMessage: string): void {
    if (error instanceof ReaderError) {
      if (error.statusCode >= 500) {
        logger.error(fallbackMessage, { code: error.code, error: serializeError(error) });
      }
      ServiceErrors.fromException(res, error, fallbackMessage, req);
      return;
    }

    logger.error(fallbackMessage, { error: serializeError(error) });
    ServiceErrors.internal(res, fallbackMessage, req);
  }
}
