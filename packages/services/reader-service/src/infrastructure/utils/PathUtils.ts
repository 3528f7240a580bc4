import path from 'path';

/**
 * Final path component of a user-supplied segment, or null when nothing usable remains.
 * Both separators are stripped so `..\\x` cannot escape on any platform.
 */
export function safeSegment(segment: string): string | null {
  const base = path.posix.basename(segment.replace(/\\/g, '/'));
  if (base === '' || base === '.' || base === '..' || base.includes('\0')) {
    return null;
  }
  return base;
}

/**
 * Whether `candidate` lies strictly inside `root`
 */
export function isWithin(root: string, candidate: string): boolean {
  const relative = path.relative(root, candidate);
  if (relative === '' || path.isAbsolute(relative)) return false;
  return relative !== '..' && !relative.startsWith(`..${path.sep}`);
}
