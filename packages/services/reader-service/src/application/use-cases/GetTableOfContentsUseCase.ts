/**
 * Get Table Of Contents Use Case
 */

import type { TocItem } from '@folio/shared-contracts';
import type { IBookProvider } from '../interfaces';
import { ReaderError } from '../errors';
import type { Book, TocEntry } from '../../domains/library';
import { normalizeAnchor } from '../../domains/sectioning';

export interface TableOfContents {
  bookId: string;
  toc: TocItem[];
}

export class GetTableOfContentsUseCase {
  constructor(private readonly _books: IBookProvider) {}

  async execute(bookId: string): Promise<TableOfContents> {
    const book = await this._books.getBook(bookId);
    if (!book) {
      throw ReaderError.bookNotFound(bookId);
    }

    return { bookId: book.id, toc: book.toc.map(entry => this.toItem(book, entry)) };
  }

  private toItem(book: Book, entry: TocEntry): TocItem {
    return {
      title: entry.title,
      href: entry.href,
      chapterIndex: book.indexOfHref(entry.fileHref),
      anchor: normalizeAnchor(entry.anchor),
      children: entry.children.map(child => this.toItem(book, child)),
    };
  }
}
