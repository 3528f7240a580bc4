import { describe, it, expect } from 'vitest';
import { ROOT_ID, parseDocument, spanToHtml, headingLevelOf, isHeading } from '../../domains/document';

// section=1, h2=2, 'A'=3, p=4, 'one'=5, p=6, 'two'=7
const HTML = '<section><h2 id="a">A</h2><p>one</p><p name="b">two</p></section>';

describe('DocumentTree traversal', () => {
  const tree = parseDocument(HTML);

  it('exposes parent and child relations', () => {
    expect(tree.children(1)).toEqual([2, 4, 6]);
    expect(tree.parent(2)).toBe(1);
    expect(tree.parent(1)).toBe(ROOT_ID);
    expect(tree.parent(ROOT_ID)).toBeNull();
  });

  it('derives siblings from the parent child list', () => {
    expect(tree.nextSibling(2)).toBe(4);
    expect(tree.nextSibling(6)).toBeNull();
    expect(tree.followingSiblings(2)).toEqual([4, 6]);
    expect(tree.followingSiblings(6)).toEqual([]);
  });

  it('finds the first element in pre-order', () => {
    const firstParagraph = tree.findFirstMatching(node => node.kind === 'element' && node.tagName === 'p');
    expect(firstParagraph).toBe(4);
  });

  it('finds elements by attribute', () => {
    expect(tree.findByAttribute('id', 'a')).toBe(2);
    expect(tree.findByAttribute('name', 'b')).toBe(6);
    expect(tree.findByAttribute('id', 'missing')).toBeNull();
  });

  it('searches strict ancestors only', () => {
    const sectionAbove = (id: number) => tree.findAncestor(id, node => node.kind === 'element' && node.tagName === 'section');

    expect(sectionAbove(3)).toBe(1);
    expect(sectionAbove(1)).toBeNull();
  });

  it('serializes a span of siblings in the given order', () => {
    expect(spanToHtml(tree, [4, 6])).toBe('<p>one</p><p name="b">two</p>');
  });

  it('throws on unknown node ids', () => {
    expect(() => tree.node(99)).toThrow(RangeError);
  });
});

describe('heading levels', () => {
  it('maps h1..h6 to their level', () => {
    expect(headingLevelOf('h1')).toBe(1);
    expect(headingLevelOf('h6')).toBe(6);
  });

  it('treats other tags as non-headings', () => {
    expect(headingLevelOf('h7')).toBeNull();
    expect(headingLevelOf('header')).toBeNull();
    expect(headingLevelOf('constructor')).toBeNull();
  });

  it('only counts elements as headings', () => {
    const tree = parseDocument('<h3>x</h3>');
    expect(isHeading(tree.node(1))).toBe(true);
    expect(isHeading(tree.node(2))).toBe(false);
  });
});
