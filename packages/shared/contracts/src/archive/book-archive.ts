/**
 * Book Archive Contract
 *
 * Shape of the `book.json` file written by the book processor into
 * `<books_dir>/<book_id>/`. Readers validate it before building a Book.
 */

import { z } from 'zod';

export const BOOK_ARCHIVE_FILENAME = 'book.json';
export const BOOK_DIRECTORY_SUFFIX = '_data';
export const BOOK_IMAGES_DIRECTORY = 'images';

export const BookMetadataSchema = z.object({
  title: z.string(),
  authors: z.array(z.string()).default([]),
  language: z.string().optional(),
  description: z.string().optional(),
  publisher: z.string().optional(),
  date: z.string().optional(),
  identifiers: z.array(z.string()).default([]),
  subjects: z.array(z.string()).default([]),
});
export type BookMetadataRecord = z.infer<typeof BookMetadataSchema>;

export const ChapterRecordSchema = z.object({
  id: z.string(),
  href: z.string(),
  title: z.string(),
  content: z.string(),
  text: z.string().default(''),
  order: z.number().int().nonnegative(),
});
export type ChapterRecord = z.infer<typeof ChapterRecordSchema>;

export interface TocEntryRecord {
  title: string;
  href: string;
  fileHref: string;
  anchor: string;
  children: TocEntryRecord[];
}

export const TocEntrySchema: z.ZodType<TocEntryRecord, z.ZodTypeDef, unknown> = z.lazy(() =>
  z.object({
    title: z.string(),
    href: z.string(),
    fileHref: z.string(),
    anchor: z.string().default(''),
    children: z.array(TocEntrySchema).default([]),
  })
);

export const BookArchiveSchema = z.object({
  metadata: BookMetadataSchema,
  spine: z.array(ChapterRecordSchema),
  toc: z.array(TocEntrySchema).default([]),
  images: z.record(z.string()).default({}),
  sourceFile: z.string().optional(),
  processedAt: z.string().optional(),
  version: z.string().optional(),
});
export type BookArchive = z.infer<typeof BookArchiveSchema>;
