/**
 * HTML Parser
 *
 * Builds a DocumentTree from an HTML fragment using htmlparser2's streaming
 * tokenizer. Malformed markup never fails: htmlparser2 closes implied and
 * unterminated elements, and stray end tags are dropped.
 *
 * Entities are left encoded in text and attribute values so that
 * serialization reproduces the source verbatim.
 */

import { Parser } from 'htmlparser2';
import type { NodeId, DocumentNode } from './DocumentTree';
import { DocumentTree, ROOT_ID } from './DocumentTree';

export interface ParseLimits {
  /** Parse fails with DocumentParseError past this many nodes */
  maxNodes: number;
  /** Elements nested deeper than this are flattened into their deepest allowed ancestor */
  maxDepth: number;
}

export const DEFAULT_PARSE_LIMITS: ParseLimits = {
  maxNodes: 200_000,
  maxDepth: 512,
};

export class DocumentParseError extends Error {
  constructor(
    message: string,
    readonly limit: keyof ParseLimits
  ) {
    super(message);
    this.name = 'DocumentParseError';
  }
}

interface MutableContainer {
  kind: 'fragment' | 'element';
  children: NodeId[];
}

interface MutableText {
  kind: 'text';
  id: NodeId;
  parent: NodeId;
  data: string;
}

class TreeBuilder {
  private readonly nodes: DocumentNode[] = [];
  private readonly containers = new Map<NodeId, MutableContainer>();
  private readonly positions: number[] = [];
  // null entries mark elements flattened by the depth limit
  private readonly stack: Array<NodeId | null> = [];
  private openDepth = 0;
  private lastText: MutableText | null = null;

  constructor(private readonly limits: ParseLimits) {
    const children: NodeId[] = [];
    this.nodes.push({ kind: 'fragment', id: ROOT_ID, parent: null, children });
    this.containers.set(ROOT_ID, { kind: 'fragment', children });
    this.positions.push(0);
  }

  private get currentParent(): NodeId {
    for (let i = this.stack.length - 1; i >= 0; i--) {
      const entry = this.stack[i];
      if (entry !== null) return entry;
    }
    return ROOT_ID;
  }

  private nextId(): NodeId {
    const id = this.nodes.length;
    if (id >= this.limits.maxNodes) {
      throw new DocumentParseError(`Document exceeds ${this.limits.maxNodes} nodes`, 'maxNodes');
    }
    return id;
  }

  private attach(id: NodeId, parent: NodeId): void {
    const container = this.containers.get(parent);
    if (!container) {
      throw new Error(`Node ${parent} cannot hold children`);
    }
    this.positions[id] = container.children.length;
    container.children.push(id);
  }

  openElement(tagName: string, attributes: Record<string, string>): void {
    this.lastText = null;

    if (this.openDepth >= this.limits.maxDepth) {
      this.stack.push(null);
      return;
    }

    const id = this.nextId();
    const parent = this.currentParent;
    const children: NodeId[] = [];
    this.nodes.push({ kind: 'element', id, parent, tagName, attributes: { ...attributes }, children });
    this.containers.set(id, { kind: 'element', children });
    this.attach(id, parent);
    this.stack.push(id);
    this.openDepth++;
  }

  closeElement(): void {
    this.lastText = null;
    const entry = this.stack.pop();
    if (entry !== undefined && entry !== null) {
      this.openDepth--;
    }
  }

  text(data: string): void {
    const parent = this.currentParent;
    // htmlparser2 may deliver one run of text in several chunks
    if (this.lastText && this.lastText.parent === parent) {
      this.lastText.data += data;
      return;
    }

    const id = this.nextId();
    const node: MutableText = { kind: 'text', id, parent, data };
    this.nodes.push(node);
    this.attach(id, parent);
    this.lastText = node;
  }

  comment(data: string): void {
    this.lastText = null;
    const id = this.nextId();
    const parent = this.currentParent;
    this.nodes.push({ kind: 'comment', id, parent, data });
    this.attach(id, parent);
  }

  directive(data: string): void {
    this.lastText = null;
    const id = this.nextId();
    const parent = this.currentParent;
    this.nodes.push({ kind: 'directive', id, parent, data });
    this.attach(id, parent);
  }

  build(): DocumentTree {
    return new DocumentTree(this.nodes, this.positions);
  }
}

/**
 * Parse an HTML fragment into a DocumentTree
 *
 * @throws DocumentParseError when the fragment exceeds `limits.maxNodes`
 */
export function parseDocument(html: string, limits: Partial<ParseLimits> = {}): DocumentTree {
  const builder = new TreeBuilder({ ...DEFAULT_PARSE_LIMITS, ...limits });
  let commentBuffer = '';

  const parser = new Parser(
    {
      onopentag: (name, attribs) => builder.openElement(name, attribs),
      onclosetag: () => builder.closeElement(),
      ontext: text => builder.text(text),
      oncomment: data => {
        commentBuffer += data;
      },
      oncommentend: () => {
        builder.comment(commentBuffer);
        commentBuffer = '';
      },
      onprocessinginstruction: (_name, data) => builder.directive(data),
    },
    {
      decodeEntities: false,
      lowerCaseTags: true,
      lowerCaseAttributeNames: true,
      recognizeSelfClosing: true,
    }
  );

  parser.write(html);
  parser.end();

  return builder.build();
}
