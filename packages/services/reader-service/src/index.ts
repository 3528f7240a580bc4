/**
 * Reader Service - Types and Exports Index
 */

// Domain exports
export * from './domains/document';
export * from './domains/sectioning';
export * from './domains/library';

// Application exports
export type { IBookRepository, IBookProvider } from './application/interfaces';
export { ReaderError, ReaderErrorCode } from './application/errors';
export * from './application/use-cases';

// Infrastructure exports
export { BookCache, LRUCache } from './infrastructure/cache';
export { FileSystemBookRepository, InMemoryBookRepository, bookFromArchive } from './infrastructure/repositories';

export { createApp, type CreateAppOptions, type ReaderApp } from './app';
export { loadServiceConfig, parseCliArgs, type ReaderServiceConfig } from './config/service-config';
