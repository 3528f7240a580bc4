/**
 * In-memory repository, used by tests and for serving books built in process
 */

import type { IBookRepository } from '../../application/interfaces';
import type { Book } from '../../domains/library';

export class InMemoryBookRepository implements IBookRepository {
  private readonly books = new Map<string, Book>();
  private readonly images = new Map<string, string>();
  loadCount = 0;

  constructor(books: Book[] = []) {
    books.forEach(book => this.books.set(book.id, book));
  }

  addImage(bookId: string, imageName: string, filePath: string): void {
    this.images.set(`${bookId}/${imageName}`, filePath);
  }

  async load(bookId: string): Promise<Book | null> {
    this.loadCount++;
    return this.books.get(bookId) ?? null;
  }

  async listBookIds(): Promise<string[]> {
    return [...this.books.keys()];
  }

  async findImage(bookId: string, imageName: string): Promise<string | null> {
    return this.images.get(`${bookId}/${imageName}`) ?? null;
  }
}
