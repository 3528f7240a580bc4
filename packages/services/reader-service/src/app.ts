/**
 * Reader Service - Express App Factory
 */

import express, { type NextFunction, type Request, type Response } from 'express';
import cors from 'cors';
import helmet from 'helmet';
import compression from 'compression';
import { getLogger, requestLogger, serializeError } from '@folio/platform-core';
import type { IBookRepository } from './application/interfaces';
import {
  GetTableOfContentsUseCase,
  ListLibraryUseCase,
  ReadChapterUseCase,
  ResolveImageUseCase,
} from './application/use-cases';
import { BookCache } from './infrastructure/cache';
import { FileSystemBookRepository } from './infrastructure/repositories';
import { ReaderController } from './presentation/controllers/ReaderController';
import { createReaderRoutes } from './presentation/routes/readerRoutes';
import { ServiceErrors } from './presentation/utils/response-helpers';
import { SERVICE_NAME, type ReaderServiceConfig } from './config/service-config';

const logger = getLogger('reader-service-app');

export interface CreateAppOptions {
  config: Readonly<ReaderServiceConfig>;
  /** Defaults to the file-system repository rooted at `config.booksDir` */
  repository?: IBookRepository;
}

export interface ReaderApp {
  app: express.Application;
  cache: BookCache;
}

export function createApp(options: CreateAppOptions): ReaderApp {
  const { config } = options;
  const repository = options.repository ?? new FileSystemBookRepository(config.booksDir);
  const cache = new BookCache(repository, config.bookCacheSize);

  const controller = new ReaderController({
    listLibrary: new ListLibraryUseCase(repository, cache),
    readChapter: new ReadChapterUseCase(cache, {
      maxNodes: config.sectionMaxNodes,
      maxDepth: config.sectionMaxDepth,
    }),
    getTableOfContents: new GetTableOfContentsUseCase(cache),
    resolveImage: new ResolveImageUseCase(repository),
  });

  const app = express();

  setupMiddleware(app, config);
  setupRoutes(app, controller, cache, config);
  setupErrorHandling(app);

  return { app, cache };
}

function setupMiddleware(app: express.Application, config: Readonly<ReaderServiceConfig>): void {
  app.disable('x-powered-by');
  app.use(
    helmet({
      contentSecurityPolicy: {
        directives: {
          defaultSrc: ["'self'"],
          styleSrc: ["'self'", "'unsafe-inline'"],
          imgSrc: ["'self'", 'data:'],
        },
      },
      crossOriginEmbedderPolicy: false,
    })
  );

  const origins = config.allowedOrigins
    .split(',')
    .map(origin => origin.trim())
    .filter(Boolean);
  app.use(
    cors({
      origin: origins.length === 0 || origins.includes('*') ? '*' : origins,
      methods: ['GET', 'OPTIONS'],
      allowedHeaders: ['Content-Type', 'X-Correlation-ID'],
    })
  );

  app.use(
    compression({
      filter: (req, res) => {
        if (req.headers['x-no-compression']) return false;
        return compression.filter(req, res);
      },
      threshold: 1024,
    })
  );

  app.use(requestLogger(SERVICE_NAME));
}

function setupRoutes(
  app: express.Application,
  controller: ReaderController,
  cache: BookCache,
  config: Readonly<ReaderServiceConfig>
): void {
  app.get('/health', (_req: Request, res: Response) => {
    const { size, capacity, hits, misses } = cache.getStats();
    res.status(200).json({
      status: 'healthy',
      service: SERVICE_NAME,
      timestamp: new Date().toISOString(),
      cache: { size, capacity, hits, misses },
    });
  });

  app.use(
    '/api',
    createReaderRoutes(controller, {
      rateLimitWindowMs: config.rateLimitWindowMs,
      rateLimitMax: config.rateLimitMax,
    })
  );
}

function setupErrorHandling(app: express.Application): void {
  app.use((req: Request, res: Response) => {
    ServiceErrors.notFound(res, `Route ${req.method} ${req.path}`, req);
  });

  app.use((err: unknown, req: Request, res: Response, next: NextFunction) => {
    if (res.headersSent) {
      next(err);
      return;
    }

    logger.error('Unhandled error', { path: req.path, error: serializeError(err) });
    ServiceErrors.fromException(res, err, 'An internal server error occurred', req);
  });
}
