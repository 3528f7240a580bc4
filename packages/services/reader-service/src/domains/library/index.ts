export { Book, type BookMetadata, type BookProps, type TocEntry } from './entities/Book';
export { Chapter, type ChapterProps } from './entities/Chapter';
export { chapterAt, isValidChapterIndex, nextIndex, previousIndex } from './spine-navigation';
