import type { DocumentNode } from './DocumentTree';

export type HeadingLevel = 1 | 2 | 3 | 4 | 5 | 6;

const HEADING_LEVELS: ReadonlyMap<string, HeadingLevel> = new Map<string, HeadingLevel>([
  ['h1', 1],
  ['h2', 2],
  ['h3', 3],
  ['h4', 4],
  ['h5', 5],
  ['h6', 6],
]);

export function headingLevelOf(tagName: string): HeadingLevel | null {
  return HEADING_LEVELS.get(tagName) ?? null;
}

export function nodeHeadingLevel(node: DocumentNode): HeadingLevel | null {
  return node.kind === 'element' ? headingLevelOf(node.tagName) : null;
}

export function isHeading(node: DocumentNode): boolean {
  return nodeHeadingLevel(node) !== null;
}
