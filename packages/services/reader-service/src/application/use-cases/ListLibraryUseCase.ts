/**
 * List Library Use Case
 * One entry per book archive that loads; broken archives are left out
 */

import type { LibraryEntry } from '@folio/shared-contracts';
import { getLogger } from '@folio/platform-core';
import type { IBookProvider, IBookRepository } from '../interfaces';

const logger = getLogger('reader-service-list-library');

export class ListLibraryUseCase {
  constructor(
    private readonly _repository: IBookRepository,
    private readonly _books: IBookProvider
  ) {}

  async execute(): Promise<LibraryEntry[]> {
    const bookIds = [...(await this._repository.listBookIds())].sort();
    const entries: LibraryEntry[] = [];

    for (const bookId of bookIds) {
      const book = await this._books.getBook(bookId);
      if (!book) {
        logger.warn('Skipping book that failed to load', { bookId });
        continue;
      }
      entries.push({
        id: book.id,
        title: book.title,
        author: book.authorLine,
        chapters: book.chapterCount,
      });
    }

    return entries;
  }
}
