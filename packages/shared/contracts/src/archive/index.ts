export * from './book-archive.js';
