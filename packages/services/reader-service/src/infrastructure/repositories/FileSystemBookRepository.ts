/**
 * File System Book Repository
 *
 * Reads processed books from `<booksDir>/<bookId>/book.json`. Archives that
 * are missing or fail validation are reported as absent; the reason is logged.
 */

import type { Dirent } from 'fs';
import fs from 'fs/promises';
import path from 'path';
import { z } from 'zod';
import { getLogger, serializeError } from '@folio/platform-core';
import {
  BOOK_ARCHIVE_FILENAME,
  BOOK_DIRECTORY_SUFFIX,
  BOOK_IMAGES_DIRECTORY,
  BookArchiveSchema,
  type BookArchive,
} from '@folio/shared-contracts';
import type { IBookRepository } from '../../application/interfaces';
import { ReaderError } from '../../application/errors';
import { Book, Chapter } from '../../domains/library';
import { isWithin, safeSegment } from '../utils/PathUtils';

const logger = getLogger('reader-service-book-repository');

function isErrnoCode(error: unknown, ...codes: string[]): boolean {
  if (!(error instanceof Error)) return false;
  const code: unknown = Reflect.get(error, 'code');
  return typeof code === 'string' && codes.includes(code);
}

export function bookFromArchive(bookId: string, archive: BookArchive): Book {
  return new Book({
    id: bookId,
    metadata: archive.metadata,
    spine: archive.spine.map(record => new Chapter(record)),
    toc: archive.toc,
    images: archive.images,
    sourceFile: archive.sourceFile,
    processedAt: archive.processedAt,
  });
}

export class FileSystemBookRepository implements IBookRepository {
  private readonly booksDir: string;

  constructor(booksDir: string) {
    this.booksDir = path.resolve(booksDir);
  }

  async load(bookId: string): Promise<Book | null> {
    const directory = this.bookDirectory(bookId);
    if (!directory) return null;

    const archivePath = path.join(directory, BOOK_ARCHIVE_FILENAME);
    let raw: string;
    try {
      raw = await fs.readFile(archivePath, 'utf8');
    } catch (error) {
      if (isErrnoCode(error, 'ENOENT', 'ENOTDIR', 'EISDIR')) {
        logger.debug('Book archive not found', { bookId, archivePath });
        return null;
      }
      throw error;
    }

    try {
      const archive = BookArchiveSchema.parse(JSON.parse(raw));
      const book = bookFromArchive(bookId, archive);
      logger.debug('Loaded book archive', { bookId, chapters: book.chapterCount });
      return book;
    } catch (error) {
      if (error instanceof SyntaxError || error instanceof z.ZodError) {
        const malformed = ReaderError.malformedArchive(bookId, error);
        logger.error('Failed to load book archive', { bookId, archivePath, error: serializeError(malformed) });
        return null;
      }
      throw error;
    }
  }

  async listBookIds(): Promise<string[]> {
    let entries: Dirent[];
    try {
      entries = await fs.readdir(this.booksDir, { withFileTypes: true });
    } catch (error) {
      if (isErrnoCode(error, 'ENOENT', 'ENOTDIR')) {
        logger.warn('Books directory does not exist', { booksDir: this.booksDir });
        return [];
      }
      throw error;
    }

    return entries
      .filter(entry => entry.isDirectory() && entry.name.endsWith(BOOK_DIRECTORY_SUFFIX))
      .map(entry => entry.name);
  }

  async findImage(bookId: string, imageName: string): Promise<string | null> {
    const directory = this.bookDirectory(bookId);
    const image = safeSegment(imageName);
    if (!directory || !image) return null;

    const imagePath = path.join(directory, BOOK_IMAGES_DIRECTORY, image);
    try {
      const stats = await fs.stat(imagePath);
      return stats.isFile() ? imagePath : null;
    } catch (error) {
      if (isErrnoCode(error, 'ENOENT', 'ENOTDIR')) return null;
      throw error;
    }
  }

  private bookDirectory(bookId: string): string | null {
    const segment = safeSegment(bookId);
    if (!segment) return null;

    const directory = path.join(this.booksDir, segment);
    return isWithin(this.booksDir, directory) ? directory : null;
  }
}
