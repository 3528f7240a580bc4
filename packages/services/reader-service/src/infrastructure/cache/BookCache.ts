/**
 * Book Cache
 *
 * Bounded LRU cache of loaded books in front of the repository. Concurrent
 * misses for the same id share one load. A failed load is returned to every
 * waiting caller but is not remembered; the next lookup tries again.
 */

import { getLogger, serializeError } from '@folio/platform-core';
import type { IBookProvider, IBookRepository } from '../../application/interfaces';
import type { Book } from '../../domains/library';
import { LRUCache, type LRUCacheStats } from './LRUCache';

const logger = getLogger('reader-service-book-cache');

export const DEFAULT_BOOK_CACHE_CAPACITY = 10;

export class BookCache implements IBookProvider {
  private readonly books: LRUCache<string, Book>;
  private readonly inFlight = new Map<string, Promise<Book | null>>();

  constructor(
    private readonly repository: IBookRepository,
    capacity: number = DEFAULT_BOOK_CACHE_CAPACITY
  ) {
    this.books = new LRUCache<string, Book>({
      capacity,
      onEvict: bookId => logger.debug('Evicted book from cache', { bookId }),
    });
  }

  async getBook(bookId: string): Promise<Book | null> {
    const cached = this.books.get(bookId);
    if (cached) return cached;

    const pending = this.inFlight.get(bookId);
    if (pending) return pending;

    const load = this.load(bookId).finally(() => this.inFlight.delete(bookId));
    this.inFlight.set(bookId, load);
    return load;
  }

  getStats(): LRUCacheStats {
    return this.books.getStats();
  }

  private async load(bookId: string): Promise<Book | null> {
    try {
      const book = await this.repository.load(bookId);
      if (book) {
        this.books.set(bookId, book);
      }
      return book;
    } catch (error) {
      logger.error('Book load failed', { bookId, error: serializeError(error) });
      return null;
    }
  }
}
