import { DomainErrorCode, createDomainServiceError } from '@folio/platform-core';

const ReaderDomainCodes = {
  BOOK_NOT_FOUND: 'BOOK_NOT_FOUND',
  CHAPTER_NOT_FOUND: 'CHAPTER_NOT_FOUND',
  IMAGE_NOT_FOUND: 'IMAGE_NOT_FOUND',
  MALFORMED_ARCHIVE: 'MALFORMED_ARCHIVE',
  INVALID_REQUEST: 'INVALID_REQUEST',
} as const;

export const ReaderErrorCode = { ...DomainErrorCode, ...ReaderDomainCodes } as const;
export type ReaderErrorCodeType = (typeof ReaderErrorCode)[keyof typeof ReaderErrorCode];

const ReaderErrorBase = createDomainServiceError('Reader', ReaderErrorCode);

export class ReaderError extends ReaderErrorBase {
  static statusCodeFor(code: ReaderErrorCodeType): number {
    const statusMap: Record<ReaderErrorCodeType, number> = {
      [ReaderErrorCode.BOOK_NOT_FOUND]: 404,
      [ReaderErrorCode.CHAPTER_NOT_FOUND]: 404,
      [ReaderErrorCode.IMAGE_NOT_FOUND]: 404,
      [ReaderErrorCode.NOT_FOUND]: 404,
      [ReaderErrorCode.INVALID_REQUEST]: 400,
      [ReaderErrorCode.VALIDATION_ERROR]: 400,
      [ReaderErrorCode.MALFORMED_ARCHIVE]: 500,
      [ReaderErrorCode.INTERNAL_ERROR]: 500,
      [ReaderErrorCode.SERVICE_UNAVAILABLE]: 503,
    };
    return statusMap[code];
  }

  static withCode(code: ReaderErrorCodeType, message: string, cause?: Error): ReaderError {
    return new ReaderError(message, ReaderError.statusCodeFor(code), code, cause);
  }

  static bookNotFound(bookId: string): ReaderError {
    return ReaderError.withCode(ReaderErrorCode.BOOK_NOT_FOUND, `Book not found: ${bookId}`);
  }

  static chapterNotFound(chapterIndex: number, chapterCount: number): ReaderError {
    return ReaderError.withCode(
      ReaderErrorCode.CHAPTER_NOT_FOUND,
      `Chapter ${chapterIndex} not found (book has ${chapterCount} chapters)`
    );
  }

  static imageNotFound(imageName: string): ReaderError {
    return ReaderError.withCode(ReaderErrorCode.IMAGE_NOT_FOUND, `Image not found: ${imageName}`);
  }

  static malformedArchive(bookId: string, cause?: Error): ReaderError {
    return ReaderError.withCode(ReaderErrorCode.MALFORMED_ARCHIVE, `Book archive is malformed: ${bookId}`, cause);
  }
}
