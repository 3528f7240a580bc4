/**
 * Read Chapter Use Case
 * Loads a chapter and, when an anchor is given, narrows it to the section the anchor points into
 */

import type { ReadChapterResult } from '@folio/shared-contracts';
import type { IBookProvider } from '../interfaces';
import { ReaderError } from '../errors';
import { chapterAt, nextIndex, previousIndex } from '../../domains/library';
import { buildSubsectionContent } from '../../domains/sectioning';
import type { ParseLimits } from '../../domains/document';

export interface ReadChapterRequest {
  bookId: string;
  chapterIndex: number;
  anchor?: string | null;
}

export class ReadChapterUseCase {
  constructor(
    private readonly _books: IBookProvider,
    private readonly _parseLimits: Partial<ParseLimits> = {}
  ) {}

  async execute(request: ReadChapterRequest): Promise<ReadChapterResult> {
    const book = await this._books.getBook(request.bookId);
    if (!book) {
      throw ReaderError.bookNotFound(request.bookId);
    }

    const original = chapterAt(book.spine, request.chapterIndex);
    if (!original) {
      throw ReaderError.chapterNotFound(request.chapterIndex, book.chapterCount);
    }

    const subsection = buildSubsectionContent(original.content, request.anchor, this._parseLimits);
    const chapter = subsection === null ? original : original.withContent(subsection);

    return {
      bookId: book.id,
      book: {
        title: book.title,
        authors: [...book.authors],
        chapterCount: book.chapterCount,
      },
      chapter: {
        id: chapter.id,
        href: chapter.href,
        title: chapter.title,
        order: chapter.order,
        content: chapter.content,
      },
      content: chapter.content,
      chapterIndex: request.chapterIndex,
      previousIndex: previousIndex(request.chapterIndex),
      nextIndex: nextIndex(request.chapterIndex, book.chapterCount),
      anchor: request.anchor ?? null,
      isSubsection: subsection !== null,
    };
  }

  async executeFirst(bookId: string): Promise<ReadChapterResult> {
    return this.execute({ bookId, chapterIndex: 0 });
  }
}
