/**
 * Reader Routes
 * HTTP route definitions for the reader service
 */

import { Router } from 'express';
import rateLimit from 'express-rate-limit';
import { EmptySchema } from '@folio/platform-core';
import {
  BookParamsSchema,
  ChapterParamsSchema,
  ImageParamsSchema,
  ReadChapterQuerySchema,
} from '@folio/shared-contracts';
import type { ReaderController } from '../controllers/ReaderController';
import { ServiceErrors, validateRequest } from '../utils/response-helpers';

export interface ReaderRouteOptions {
  rateLimitWindowMs: number;
  rateLimitMax: number;
}

export function createReaderRoutes(controller: ReaderController, options: ReaderRouteOptions): Router {
  const router = Router();

  router.use(
    rateLimit({
      windowMs: options.rateLimitWindowMs,
      max: options.rateLimitMax,
      standardHeaders: true,
      legacyHeaders: false,
      handler: (req, res) => ServiceErrors.rateLimited(res, req),
    })
  );

  router.get('/library', validateRequest({ params: EmptySchema, query: EmptySchema }, controller.listLibrary));

  router.get('/books/:bookId/toc', validateRequest({ params: BookParamsSchema, query: EmptySchema }, controller.getTableOfContents));

  router.get('/read/:bookId', validateRequest({ params: BookParamsSchema, query: EmptySchema }, controller.readFirstChapter));

  router.get(
    '/read/:bookId/images/:imageName',
    validateRequest({ params: ImageParamsSchema, query: EmptySchema }, controller.serveImage)
  );

  router.get(
    '/read/:bookId/:chapterIndex',
    validateRequest({ params: ChapterParamsSchema, query: ReadChapterQuerySchema }, controller.readChapter)
  );

  return router;
}
