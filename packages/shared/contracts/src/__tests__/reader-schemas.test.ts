import { describe, it, expect } from 'vitest';
import { ChapterParamsSchema, MAX_ANCHOR_LENGTH, ReadChapterQuerySchema } from '../api/index.js';

describe('ChapterParamsSchema', () => {
  it('turns the chapter index into a number', () => {
    expect(ChapterParamsSchema.parse({ bookId: 'a_data', chapterIndex: '12' })).toEqual({
      bookId: 'a_data',
      chapterIndex: 12,
    });
  });

  it('accepts negative integers so range checks can answer not found', () => {
    expect(ChapterParamsSchema.parse({ bookId: 'a_data', chapterIndex: '-1' }).chapterIndex).toBe(-1);
  });

  it.each(['abc', '1.5', '', '1e3'])('rejects %j', chapterIndex => {
    expect(ChapterParamsSchema.safeParse({ bookId: 'a_data', chapterIndex }).success).toBe(false);
  });
});

describe('ReadChapterQuerySchema', () => {
  it('limits the anchor length', () => {
    expect(ReadChapterQuerySchema.safeParse({ anchor: 'x'.repeat(MAX_ANCHOR_LENGTH) }).success).toBe(true);
    expect(ReadChapterQuerySchema.safeParse({ anchor: 'x'.repeat(MAX_ANCHOR_LENGTH + 1) }).success).toBe(false);
  });

  it('allows the anchor to be absent', () => {
    expect(ReadChapterQuerySchema.parse({})).toEqual({});
  });
});
