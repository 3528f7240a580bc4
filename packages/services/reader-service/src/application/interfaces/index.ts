export type { IBookRepository } from './IBookRepository';
export type { IBookProvider } from './IBookProvider';
