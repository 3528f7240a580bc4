export { FileSystemBookRepository, bookFromArchive } from './FileSystemBookRepository';
export { InMemoryBookRepository } from './InMemoryBookRepository';
