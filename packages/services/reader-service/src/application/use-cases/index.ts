export { ReadChapterUseCase, type ReadChapterRequest } from './ReadChapterUseCase';
export { ListLibraryUseCase } from './ListLibraryUseCase';
export { GetTableOfContentsUseCase, type TableOfContents } from './GetTableOfContentsUseCase';
export { ResolveImageUseCase, type ResolvedImage } from './ResolveImageUseCase';
