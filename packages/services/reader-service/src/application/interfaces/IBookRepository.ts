/**
 * Book Repository Interface
 * Read-only access to processed book archives
 */

import type { Book } from '../../domains/library';

export interface IBookRepository {
  /** Loads a book; null when it is missing or cannot be read */
  load(_bookId: string): Promise<Book | null>;
  /** Identifiers of every archive directory, in no particular order */
  listBookIds(): Promise<string[]>;
  /** Absolute path of an image inside a book's image directory, or null */
  findImage(_bookId: string, _imageName: string): Promise<string | null>;
}
