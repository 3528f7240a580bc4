import type { Book } from '../../domains/library';

/**
 * Cached access to loaded books, shared by every use case
 */
export interface IBookProvider {
  getBook(_bookId: string): Promise<Book | null>;
}
