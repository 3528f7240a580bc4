import { describe, it, expect, vi, beforeAll, afterAll } from 'vitest';
import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import request from 'supertest';

const mockLogger = vi.hoisted(() => ({
  info: vi.fn(),
  debug: vi.fn(),
  warn: vi.fn(),
  error: vi.fn(),
}));

vi.mock('@folio/platform-core', async importOriginal => ({
  ...(await importOriginal<typeof import('@folio/platform-core')>()),
  getLogger: () => mockLogger,
  createLogger: () => mockLogger,
}));

import type express from 'express';
import { createApp } from '../../app';
import { loadServiceConfig } from '../../config/service-config';
import { Book } from '../../domains/library';
import { InMemoryBookRepository } from '../../infrastructure/repositories';
import { makeChapter } from '../helpers/books';

const CHAPTER = '<h2 id="a">A</h2><p>p1</p><h3 id="b">B</h3><p>p2</p><h2 id="c">C</h2><p>p3</p>';

describe('reader routes', () => {
  let app: express.Application;
  let imageDir: string;

  beforeAll(async () => {
    imageDir = await fs.mkdtemp(path.join(os.tmpdir(), 'reader-images-'));
    const coverPath = path.join(imageDir, 'cover.png');
    await fs.writeFile(coverPath, 'png-bytes');

    const repository = new InMemoryBookRepository([
      new Book({
        id: 'tale_data',
        metadata: { title: 'A Tale', authors: ['One', 'Two'], identifiers: [], subjects: [] },
        spine: [makeChapter(0, CHAPTER), makeChapter(1, '<p>mid</p>'), makeChapter(2, '<p>end</p>')],
        toc: [{ title: 'B', href: 'text/ch0.xhtml#b', fileHref: 'text/ch0.xhtml', anchor: 'b', children: [] }],
      }),
    ]);
    repository.addImage('tale_data', 'cover.png', coverPath);
    const hiddenPath = path.join(imageDir, '.cover.png');
    await fs.writeFile(hiddenPath, 'png-bytes');
    repository.addImage('tale_data', '.cover.png', hiddenPath);

    ({ app } = createApp({ config: loadServiceConfig({}), repository }));
  });

  afterAll(async () => {
    await fs.rm(imageDir, { recursive: true, force: true });
  });

  it('GET /health reports cache statistics', async () => {
    const res = await request(app).get('/health');

    expect(res.status).toBe(200);
    expect(res.body).toMatchObject({
      status: 'healthy',
      service: 'reader-service',
      cache: { capacity: 10 },
    });
  });

  it('GET /api/library lists books', async () => {
    const res = await request(app).get('/api/library');

    expect(res.status).toBe(200);
    expect(res.body.success).toBe(true);
    expect(res.body.data).toEqual({
      books: [{ id: 'tale_data', title: 'A Tale', author: 'One, Two', chapters: 3 }],
    });
  });

  it('GET /api/read/:bookId serves the first chapter', async () => {
    const res = await request(app).get('/api/read/tale_data');

    expect(res.status).toBe(200);
    expect(res.body.data).toMatchObject({
      bookId: 'tale_data',
      chapterIndex: 0,
      previousIndex: null,
      nextIndex: 1,
      content: CHAPTER,
      isSubsection: false,
    });
  });

  it('GET /api/read/:bookId/:chapterIndex narrows to an anchor', async () => {
    const res = await request(app).get('/api/read/tale_data/0').query({ anchor: '#b' });

    expect(res.status).toBe(200);
    expect(res.body.data).toMatchObject({
      content: '<h3 id="b">B</h3><p>p2</p>',
      anchor: '#b',
      isSubsection: true,
    });
  });

  it('answers 400 for a non-integer chapter index', async () => {
    const res = await request(app).get('/api/read/tale_data/abc');

    expect(res.status).toBe(400);
    expect(res.body.error).toMatchObject({
      code: 'VALIDATION_ERROR',
      message: 'URL parameters validation failed',
    });
    expect(res.body.error.details.errors[0]).toMatchObject({ field: 'chapterIndex' });
  });

  it('answers 400 for an overlong anchor', async () => {
    const res = await request(app).get('/api/read/tale_data/0').query({ anchor: 'x'.repeat(513) });

    expect(res.status).toBe(400);
    expect(res.body.error.message).toBe('Query parameters validation failed');
  });

  it.each(['-1', '3'])('answers 404 for chapter index %s', async index => {
    const res = await request(app).get(`/api/read/tale_data/${index}`);

    expect(res.status).toBe(404);
    expect(res.body.error).toMatchObject({ type: 'NotFoundError', code: 'CHAPTER_NOT_FOUND' });
  });

  it('answers 404 for an unknown book', async () => {
    const res = await request(app).get('/api/read/nope_data/0');

    expect(res.status).toBe(404);
    expect(res.body.error).toMatchObject({ code: 'BOOK_NOT_FOUND', message: 'Book not found: nope_data' });
  });

  it('GET /api/books/:bookId/toc maps entries to chapters', async () => {
    const res = await request(app).get('/api/books/tale_data/toc');

    expect(res.status).toBe(200);
    expect(res.body.data).toEqual({
      bookId: 'tale_data',
      toc: [{ title: 'B', href: 'text/ch0.xhtml#b', chapterIndex: 0, anchor: 'b', children: [] }],
    });
  });

  it('GET /api/read/:bookId/images/:imageName serves the file', async () => {
    const res = await request(app).get('/api/read/tale_data/images/cover.png');

    expect(res.status).toBe(200);
    expect(res.headers['content-type']).toBe('image/png');
  });

  it('serves image names that start with a dot', async () => {
    mockLogger.error.mockClear();
    const res = await request(app).get('/api/read/tale_data/images/.cover.png');

    expect(res.status).toBe(200);
    expect(res.headers['content-type']).toBe('image/png');
    expect(mockLogger.error).not.toHaveBeenCalled();
  });

  it('answers 404 for a missing image', async () => {
    const res = await request(app).get('/api/read/tale_data/images/missing.png');

    expect(res.status).toBe(404);
    expect(res.body.error.code).toBe('IMAGE_NOT_FOUND');
  });

  it('answers unknown routes with a structured 404 carrying the correlation id', async () => {
    const res = await request(app).get('/nowhere').set('x-correlation-id', 'test-correlation');

    expect(res.status).toBe(404);
    expect(res.headers['x-correlation-id']).toBe('test-correlation');
    expect(res.body.error).toMatchObject({
      code: 'NOT_FOUND',
      message: 'Route GET /nowhere not found',
      correlationId: 'test-correlation',
    });
  });
});
