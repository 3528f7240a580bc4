/**
 * Reader API Contracts
 *
 * Request validation schemas and response payloads for the reader service
 */

import { z } from 'zod';
import type { ServiceResponse } from '../common/index.js';

export const MAX_ANCHOR_LENGTH = 512;

export const BookParamsSchema = z.object({
  bookId: z.string().min(1).max(255),
});
export type BookParams = z.infer<typeof BookParamsSchema>;

export const ChapterParamsSchema = BookParamsSchema.extend({
  chapterIndex: z
    .string()
    .regex(/^-?\d+$/, 'chapterIndex must be an integer')
    .transform(value => Number.parseInt(value, 10)),
});
export type ChapterParams = z.infer<typeof ChapterParamsSchema>;

export const ImageParamsSchema = BookParamsSchema.extend({
  imageName: z.string().min(1).max(255),
});
export type ImageParams = z.infer<typeof ImageParamsSchema>;

export const ReadChapterQuerySchema = z.object({
  anchor: z.string().max(MAX_ANCHOR_LENGTH).optional(),
});
export type ReadChapterQuery = z.infer<typeof ReadChapterQuerySchema>;

export interface LibraryEntry {
  id: string;
  title: string;
  author: string;
  chapters: number;
}

export interface ChapterView {
  id: string;
  href: string;
  title: string;
  order: number;
  content: string;
}

export interface ReadChapterResult {
  bookId: string;
  book: {
    title: string;
    authors: string[];
    chapterCount: number;
  };
  chapter: ChapterView;
  content: string;
  chapterIndex: number;
  previousIndex: number | null;
  nextIndex: number | null;
  anchor: string | null;
  isSubsection: boolean;
}

export interface TocItem {
  title: string;
  href: string;
  chapterIndex: number | null;
  anchor: string | null;
  children: TocItem[];
}

export type LibraryResponse = ServiceResponse<{ books: LibraryEntry[] }>;
export type ReadChapterResponse = ServiceResponse<ReadChapterResult>;
export type TableOfContentsResponse = ServiceResponse<{ bookId: string; toc: TocItem[] }>;
