import type { DocumentTree, NodeId, ElementNode } from './DocumentTree';

const VOID_ELEMENTS = new Set([
  'area',
  'base',
  'br',
  'col',
  'embed',
  'hr',
  'img',
  'input',
  'keygen',
  'link',
  'meta',
  'param',
  'source',
  'track',
  'wbr',
]);

function openTag(element: ElementNode): string {
  let markup = `<${element.tagName}`;
  for (const [name, value] of Object.entries(element.attributes)) {
    // Values are raw source text; only the delimiter needs escaping
    markup += ` ${name}="${value.replace(/"/g, '&quot;')}"`;
  }
  return markup;
}

type Frame = { id: NodeId; closing: false } | { id: NodeId; closing: true; tagName: string };

/**
 * Serialize one node and its subtree back to HTML
 */
export function toHtml(tree: DocumentTree, id: NodeId): string {
  const out: string[] = [];
  const stack: Frame[] = [{ id, closing: false }];

  while (stack.length > 0) {
    const frame = stack.pop();
    if (frame === undefined) break;

    if (frame.closing) {
      out.push(`</${frame.tagName}>`);
      continue;
    }

    const node = tree.node(frame.id);
    switch (node.kind) {
      case 'text':
        out.push(node.data);
        break;
      case 'comment':
        out.push(`<!--${node.data}-->`);
        break;
      case 'directive':
        out.push(`<${node.data}>`);
        break;
      case 'element':
        if (VOID_ELEMENTS.has(node.tagName) && node.children.length === 0) {
          out.push(`${openTag(node)}/>`);
          break;
        }
        out.push(`${openTag(node)}>`);
        stack.push({ id: node.id, closing: true, tagName: node.tagName });
        for (let i = node.children.length - 1; i >= 0; i--) {
          stack.push({ id: node.children[i], closing: false });
        }
        break;
      case 'fragment':
        for (let i = node.children.length - 1; i >= 0; i--) {
          stack.push({ id: node.children[i], closing: false });
        }
        break;
    }
  }

  return out.join('');
}

/**
 * Serialize a run of nodes in the given order
 */
export function spanToHtml(tree: DocumentTree, ids: readonly NodeId[]): string {
  return ids.map(id => toHtml(tree, id)).join('');
}
