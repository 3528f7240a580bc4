/**
 * Anchor Resolver
 *
 * Locates the node an in-page anchor refers to. Strategies are tried in order
 * and the first hit wins:
 *   1. element with a matching `id`
 *   2. element with a matching `name`
 *   3. `<a href="#anchor">` link; the link itself is the result, not its target
 */

import type { DocumentTree, NodeId } from '../document';

export type AnchorStrategy = 'id' | 'name' | 'link';

export interface ResolvedAnchor {
  node: NodeId;
  strategy: AnchorStrategy;
}

/**
 * Strip one leading `#`; blank anchors count as absent
 */
export function normalizeAnchor(anchor: string | null | undefined): string | null {
  if (anchor === null || anchor === undefined) return null;
  const stripped = anchor.startsWith('#') ? anchor.slice(1) : anchor;
  return stripped.length > 0 ? stripped : null;
}

export function resolveAnchor(tree: DocumentTree, anchor: string): ResolvedAnchor | null {
  if (anchor.length === 0) return null;

  const byId = tree.findByAttribute('id', anchor);
  if (byId !== null) return { node: byId, strategy: 'id' };

  const byName = tree.findByAttribute('name', anchor);
  if (byName !== null) return { node: byName, strategy: 'name' };

  const href = `#${anchor}`;
  const byLink = tree.findFirstMatching(
    node => node.kind === 'element' && node.tagName === 'a' && tree.attribute(node.id, 'href') === href
  );
  if (byLink !== null) return { node: byLink, strategy: 'link' };

  return null;
}
