/**
 * Document Tree
 *
 * Arena representation of a parsed HTML fragment. Nodes live in a flat array
 * and refer to each other by index; sibling links are derived from the
 * parent's child list, so there is a single source of truth for order.
 */

import { decodeHTML } from 'entities';

export type NodeId = number;

export const ROOT_ID: NodeId = 0;

export interface FragmentNode {
  readonly kind: 'fragment';
  readonly id: NodeId;
  readonly parent: null;
  readonly children: readonly NodeId[];
}

export interface ElementNode {
  readonly kind: 'element';
  readonly id: NodeId;
  readonly parent: NodeId;
  readonly tagName: string;
  /** Raw attribute values, entities left encoded */
  readonly attributes: Readonly<Record<string, string>>;
  readonly children: readonly NodeId[];
}

export interface TextNode {
  readonly kind: 'text';
  readonly id: NodeId;
  readonly parent: NodeId;
  /** Raw character data, entities left encoded */
  readonly data: string;
}

export interface CommentNode {
  readonly kind: 'comment';
  readonly id: NodeId;
  readonly parent: NodeId;
  readonly data: string;
}

/** `<!DOCTYPE ...>` and `<?xml ...?>` */
export interface DirectiveNode {
  readonly kind: 'directive';
  readonly id: NodeId;
  readonly parent: NodeId;
  readonly data: string;
}

export type ChildNode = ElementNode | TextNode | CommentNode | DirectiveNode;
export type DocumentNode = FragmentNode | ChildNode;
export type ContainerNode = FragmentNode | ElementNode;

export type NodePredicate = (node: DocumentNode, tree: DocumentTree) => boolean;

const NON_VISIBLE_TAGS = new Set(['script', 'style', 'template']);

export class DocumentTree {
  private readonly nodes: readonly DocumentNode[];
  private readonly positions: readonly number[];

  /**
   * @param nodes - arena with the fragment root at index 0
   * @param positions - index of each node within its parent's child list
   */
  constructor(nodes: readonly DocumentNode[], positions: readonly number[]) {
    if (nodes.length === 0 || nodes[ROOT_ID].kind !== 'fragment') {
      throw new Error('Document arena must start with a fragment root');
    }
    this.nodes = nodes;
    this.positions = positions;
  }

  get root(): NodeId {
    return ROOT_ID;
  }

  get size(): number {
    return this.nodes.length;
  }

  node(id: NodeId): DocumentNode {
    const node = this.nodes[id];
    if (!node) {
      throw new RangeError(`Unknown node id ${id}`);
    }
    return node;
  }

  element(id: NodeId): ElementNode | null {
    const node = this.node(id);
    return node.kind === 'element' ? node : null;
  }

  children(id: NodeId): readonly NodeId[] {
    const node = this.node(id);
    return node.kind === 'fragment' || node.kind === 'element' ? node.children : [];
  }

  parent(id: NodeId): NodeId | null {
    return this.node(id).parent;
  }

  nextSibling(id: NodeId): NodeId | null {
    const parent = this.parent(id);
    if (parent === null) return null;
    const siblings = this.children(parent);
    return siblings[this.positions[id] + 1] ?? null;
  }

  /**
   * Siblings after `id` in document order
   */
  followingSiblings(id: NodeId): readonly NodeId[] {
    const parent = this.parent(id);
    if (parent === null) return [];
    return this.children(parent).slice(this.positions[id] + 1);
  }

  /**
   * Attribute value with entities decoded, or null when absent
   */
  attribute(id: NodeId, name: string): string | null {
    const element = this.element(id);
    if (!element || !Object.prototype.hasOwnProperty.call(element.attributes, name)) return null;
    return decodeHTML(element.attributes[name]);
  }

  /**
   * Depth-first, pre-order search below (and including) `from`
   */
  findFirstMatching(predicate: NodePredicate, from: NodeId = ROOT_ID): NodeId | null {
    const stack: NodeId[] = [from];
    while (stack.length > 0) {
      const current = stack.pop();
      if (current === undefined) break;
      if (predicate(this.node(current), this)) return current;

      const children = this.children(current);
      for (let i = children.length - 1; i >= 0; i--) {
        stack.push(children[i]);
      }
    }
    return null;
  }

  findByAttribute(name: string, value: string, from: NodeId = ROOT_ID): NodeId | null {
    return this.findFirstMatching(node => node.kind === 'element' && this.attribute(node.id, name) === value, from);
  }

  /**
   * Nearest strict ancestor of `id` satisfying `predicate`
   */
  findAncestor(id: NodeId, predicate: NodePredicate): NodeId | null {
    let current = this.parent(id);
    while (current !== null) {
      if (predicate(this.node(current), this)) return current;
      current = this.parent(current);
    }
    return null;
  }

  /**
   * Visible text below `id`: decoded character data, skipping comments, scripts and styles
   */
  textContent(id: NodeId = ROOT_ID): string {
    const parts: string[] = [];
    const stack: NodeId[] = [id];
    while (stack.length > 0) {
      const current = stack.pop();
      if (current === undefined) break;
      const node = this.node(current);

      if (node.kind === 'text') {
        parts.push(decodeHTML(node.data));
      } else if (node.kind === 'fragment' || (node.kind === 'element' && !NON_VISIBLE_TAGS.has(node.tagName))) {
        for (let i = node.children.length - 1; i >= 0; i--) {
          stack.push(node.children[i]);
        }
      }
    }
    return parts.join('');
  }
}
