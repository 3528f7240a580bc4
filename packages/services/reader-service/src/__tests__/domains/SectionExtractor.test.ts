import { describe, it, expect, vi, beforeEach } from 'vitest';

const mockLogger = vi.hoisted(() => ({
  info: vi.fn(),
  debug: vi.fn(),
  warn: vi.fn(),
  error: vi.fn(),
}));

vi.mock('@folio/platform-core', () => ({
  getLogger: () => mockLogger,
  createLogger: () => mockLogger,
}));

import { parseDocument, spanToHtml } from '../../domains/document';
import { buildSubsectionContent, extractSection, resolveAnchor } from '../../domains/sectioning';

const CHAPTER =
  '<h2 id="a">A</h2><p>p1</p><h3 id="b">B</h3><p>p2</p><h2 id="c">C</h2><p>p3</p>';

describe('extractSection', () => {
  it('returns null without a target', () => {
    const tree = parseDocument(CHAPTER);
    expect(extractSection(tree, null)).toBeNull();
  });

  it('takes a heading with its deeper subsections and stops at the next same-level heading', () => {
    const tree = parseDocument(CHAPTER);
    const span = extractSection(tree, tree.findByAttribute('id', 'a'));

    expect(span?.level).toBe(2);
    expect(span && spanToHtml(tree, span.nodes)).toBe('<h2 id="a">A</h2><p>p1</p><h3 id="b">B</h3><p>p2</p>');
  });

  it('stops a subsection at a higher-level heading', () => {
    const tree = parseDocument(CHAPTER);
    const span = extractSection(tree, tree.findByAttribute('id', 'b'));

    expect(span?.level).toBe(3);
    expect(span && spanToHtml(tree, span.nodes)).toBe('<h3 id="b">B</h3><p>p2</p>');
  });

  it('runs the last heading to the end of its siblings', () => {
    const tree = parseDocument(CHAPTER);
    const span = extractSection(tree, tree.findByAttribute('id', 'c'));

    expect(span && spanToHtml(tree, span.nodes)).toBe('<h2 id="c">C</h2><p>p3</p>');
  });

  it('promotes a target inside a heading to that heading', () => {
    // h2=1 a=2 'Title'=3 p=4
    const tree = parseDocument('<h2><a id="n"></a>Title</h2><p>x</p><h2>Next</h2>');
    const span = extractSection(tree, 2);

    expect(span?.start).toBe(1);
    expect(span && spanToHtml(tree, span.nodes)).toBe('<h2><a id="n"></a>Title</h2><p>x</p>');
  });

  it('takes every following sibling when no heading owns the target', () => {
    const tree = parseDocument('<p>intro</p><p id="f">note</p><p>after</p><h2>H</h2><p>tail</p>');
    const span = extractSection(tree, tree.findByAttribute('id', 'f'));

    expect(span?.level).toBeNull();
    expect(span && spanToHtml(tree, span.nodes)).toBe('<p id="f">note</p><p>after</p><h2>H</h2><p>tail</p>');
  });

  it('returns just the target when it has no heading and no following siblings', () => {
    // div=1 span=2
    const tree = parseDocument('<div><span id="s">x</span></div><p>outside</p>');
    const span = extractSection(tree, 2);

    expect(span).toEqual({ start: 2, level: null, nodes: [2] });
  });
});

describe('buildSubsectionContent', () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  it('returns null when there is no anchor', () => {
    expect(buildSubsectionContent(CHAPTER, undefined)).toBeNull();
    expect(buildSubsectionContent(CHAPTER, null)).toBeNull();
    expect(buildSubsectionContent(CHAPTER, '')).toBeNull();
  });

  it('returns null when the anchor does not resolve', () => {
    expect(buildSubsectionContent(CHAPTER, 'missing')).toBeNull();
  });

  it('accepts anchors with a leading hash', () => {
    expect(buildSubsectionContent(CHAPTER, '#b')).toBe('<h3 id="b">B</h3><p>p2</p>');
  });

  it('narrows a footnote link to the link element', () => {
    const html = '<p>See <a href="#fn1">1</a></p><p>more</p>';

    expect(buildSubsectionContent(html, 'fn1')).toBe('<a href="#fn1">1</a>');
  });

  it('narrows a link inside a heading to the heading section', () => {
    const html = '<h2><a href="#sec">S</a></h2><p>x</p><h2>T</h2>';

    expect(buildSubsectionContent(html, 'sec')).toBe('<h2><a href="#sec">S</a></h2><p>x</p>');
  });

  it('gives byte-identical output on repeated extraction', () => {
    const first = buildSubsectionContent(CHAPTER, 'a');
    const second = buildSubsectionContent(CHAPTER, 'a');

    expect(first).not.toBeNull();
    expect(second).toBe(first);
  });

  it('keeps the visible text of the span through a re-parse', () => {
    const tree = parseDocument(CHAPTER);
    const span = extractSection(tree, resolveAnchor(tree, 'a')?.node ?? null);
    const spanText = span ? span.nodes.map(id => tree.textContent(id)).join('') : '';

    const narrowed = buildSubsectionContent(CHAPTER, 'a');

    expect(spanText).toBe('Ap1Bp2');
    expect(parseDocument(narrowed ?? '').textContent()).toBe(spanText);
  });

  it('falls back when the chapter exceeds the parse limits', () => {
    expect(buildSubsectionContent(CHAPTER, 'a', { maxNodes: 4 })).toBeNull();
    expect(mockLogger.warn).toHaveBeenCalledWith(
      'Chapter markup exceeds parse limits, showing full chapter',
      expect.objectContaining({ anchor: 'a', limit: 'maxNodes' })
    );
  });
});
