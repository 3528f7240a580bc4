/**
 * Index-based navigation over a book's spine. Pure functions of index and length.
 */

import type { Chapter } from './entities/Chapter';

export function isValidChapterIndex(index: number, length: number): boolean {
  return Number.isInteger(index) && index >= 0 && index < length;
}

/**
 * Chapter at `index`, or null when out of range
 */
export function chapterAt(spine: readonly Chapter[], index: number): Chapter | null {
  return isValidChapterIndex(index, spine.length) ? spine[index] : null;
}

export function previousIndex(index: number): number | null {
  return index > 0 ? index - 1 : null;
}

export function nextIndex(index: number, length: number): number | null {
  return index < length - 1 ? index + 1 : null;
}
