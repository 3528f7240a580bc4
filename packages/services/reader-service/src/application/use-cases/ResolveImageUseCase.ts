/**
 * Resolve Image Use Case
 * Maps a book image request to a file on disk
 */

import path from 'path';
import type { IBookRepository } from '../interfaces';
import { ReaderError } from '../errors';

export interface ResolvedImage {
  filePath: string;
  fileName: string;
}

export class ResolveImageUseCase {
  constructor(private readonly _repository: IBookRepository) {}

  async execute(bookId: string, imageName: string): Promise<ResolvedImage> {
    const filePath = await this._repository.findImage(bookId, imageName);
    if (!filePath) {
      throw ReaderError.imageNotFound(imageName);
    }
    return { filePath, fileName: path.basename(filePath) };
  }
}
