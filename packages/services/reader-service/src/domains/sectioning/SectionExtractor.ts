/**
 * Section Extractor
 *
 * Headings in chapter markup form an implicit hierarchy over a flat sibling
 * list. A section starts at its owning heading and runs until the next
 * sibling heading of the same or a higher rank (a lower or equal number).
 * Deeper headings are subsections and stay inside the span.
 */

import type { DocumentTree, NodeId } from '../document';
import { headingLevelOf, isHeading, nodeHeadingLevel, spanToHtml, type HeadingLevel } from '../document';

export interface SectionSpan {
  /** Owning heading, or the target itself when no heading owns it */
  start: NodeId;
  /** Level of `start`; null when the section has no bounding heading */
  level: HeadingLevel | null;
  /** `start` followed by the siblings that belong to it, in document order */
  nodes: readonly NodeId[];
}

/**
 * Heading that governs `target`: the target itself, else its nearest heading ancestor
 */
export function findOwningHeading(tree: DocumentTree, target: NodeId): { start: NodeId; level: HeadingLevel | null } {
  const ownLevel = nodeHeadingLevel(tree.node(target));
  if (ownLevel !== null) {
    return { start: target, level: ownLevel };
  }

  const heading = tree.findAncestor(target, node => isHeading(node));
  if (heading !== null) {
    return { start: heading, level: nodeHeadingLevel(tree.node(heading)) };
  }

  return { start: target, level: null };
}

export function extractSection(tree: DocumentTree, target: NodeId | null): SectionSpan | null {
  if (target === null) return null;

  const { start, level } = findOwningHeading(tree, target);
  const nodes: NodeId[] = [start];

  for (const sibling of tree.followingSiblings(start)) {
    if (level !== null) {
      const node = tree.node(sibling);
      const siblingLevel = node.kind === 'element' ? headingLevelOf(node.tagName) : null;
      if (siblingLevel !== null && siblingLevel <= level) break;
    }
    nodes.push(sibling);
  }

  return { start, level, nodes };
}

export function serializeSection(tree: DocumentTree, span: SectionSpan): string {
  return spanToHtml(tree, span.nodes);
}
