import { describe, it, expect, vi, beforeEach } from 'vitest';

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

import { GetTableOfContentsUseCase, ListLibraryUseCase, ResolveImageUseCase } from '../../application/use-cases';
import { ReaderErrorCode } from '../../application/errors';
import { BookCache } from '../../infrastructure/cache';
import { InMemoryBookRepository } from '../../infrastructure/repositories';
import { Book } from '../../domains/library';
import { makeBook, makeChapter } from '../helpers/books';

class RepositoryWithGhost extends InMemoryBookRepository {
  async listBookIds(): Promise<string[]> {
    return ['ghost_data', ...(await super.listBookIds())];
  }
}

describe('ListLibraryUseCase', () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  it('lists loadable books sorted by id and skips the rest', async () => {
    const repository = new RepositoryWithGhost([
      makeBook('b_data', ['<p>1</p>', '<p>2</p>'], ['X', 'Y']),
      makeBook('a_data', ['<p>1</p>']),
    ]);
    const useCase = new ListLibraryUseCase(repository, new BookCache(repository));

    const books = await useCase.execute();

    expect(books).toEqual([
      { id: 'a_data', title: 'Title of a_data', author: 'Ada Writer', chapters: 1 },
      { id: 'b_data', title: 'Title of b_data', author: 'X, Y', chapters: 2 },
    ]);
    expect(mockLogger.warn).toHaveBeenCalledWith('Skipping book that failed to load', { bookId: 'ghost_data' });
  });

  it('returns an empty list for an empty library', async () => {
    const repository = new InMemoryBookRepository();
    const useCase = new ListLibraryUseCase(repository, new BookCache(repository));

    expect(await useCase.execute()).toEqual([]);
  });
});

describe('GetTableOfContentsUseCase', () => {
  const book = new Book({
    id: 'tale_data',
    metadata: { title: 'A Tale', authors: [], identifiers: [], subjects: [] },
    spine: [makeChapter(0, '<p>a</p>'), makeChapter(1, '<p>b</p>')],
    toc: [
      {
        title: 'One',
        href: 'text/ch0.xhtml',
        fileHref: 'text/ch0.xhtml',
        anchor: '',
        children: [{ title: 'Sub', href: 'text/ch0.xhtml#b', fileHref: 'text/ch0.xhtml', anchor: 'b', children: [] }],
      },
      { title: 'Two', href: 'text/ch1.xhtml', fileHref: 'text/ch1.xhtml', anchor: '', children: [] },
      { title: 'Appendix', href: 'appendix.xhtml', fileHref: 'appendix.xhtml', anchor: '', children: [] },
    ],
  });

  it('maps entries to spine indices and anchors', async () => {
    const repository = new InMemoryBookRepository([book]);
    const useCase = new GetTableOfContentsUseCase(new BookCache(repository));

    const result = await useCase.execute('tale_data');

    expect(result).toEqual({
      bookId: 'tale_data',
      toc: [
        {
          title: 'One',
          href: 'text/ch0.xhtml',
          chapterIndex: 0,
          anchor: null,
          children: [{ title: 'Sub', href: 'text/ch0.xhtml#b', chapterIndex: 0, anchor: 'b', children: [] }],
        },
        { title: 'Two', href: 'text/ch1.xhtml', chapterIndex: 1, anchor: null, children: [] },
        { title: 'Appendix', href: 'appendix.xhtml', chapterIndex: null, anchor: null, children: [] },
      ],
    });
  });

  it('rejects unknown books', async () => {
    const useCase = new GetTableOfContentsUseCase(new BookCache(new InMemoryBookRepository()));

    await expect(useCase.execute('nope_data')).rejects.toMatchObject({ code: ReaderErrorCode.BOOK_NOT_FOUND });
  });
});

describe('ResolveImageUseCase', () => {
  it('returns the image path and file name', async () => {
    const repository = new InMemoryBookRepository();
    repository.addImage('a_data', 'cover.png', '/books/a_data/images/cover.png');

    const image = await new ResolveImageUseCase(repository).execute('a_data', 'cover.png');

    expect(image).toEqual({ filePath: '/books/a_data/images/cover.png', fileName: 'cover.png' });
  });

  it('rejects missing images as not found', async () => {
    const useCase = new ResolveImageUseCase(new InMemoryBookRepository());

    await expect(useCase.execute('a_data', 'missing.png')).rejects.toMatchObject({
      code: ReaderErrorCode.IMAGE_NOT_FOUND,
      statusCode: 404,
    });
  });
});
