/**
 * Narrows chapter HTML to the section an anchor points into.
 * Returns null whenever no narrowing is possible; callers then show the full chapter.
 */

import { getLogger } from '@folio/platform-core';
import { parseDocument, DocumentParseError, type DocumentTree, type ParseLimits } from '../document';
import { normalizeAnchor, resolveAnchor } from './AnchorResolver';
import { extractSection, serializeSection } from './SectionExtractor';

const logger = getLogger('reader-service-sectioning');

export function buildSubsectionContent(
  html: string,
  anchor: string | null | undefined,
  limits: Partial<ParseLimits> = {}
): string | null {
  const normalized = normalizeAnchor(anchor);
  if (normalized === null) return null;

  let tree: DocumentTree;
  try {
    tree = parseDocument(html, limits);
  } catch (error) {
    if (error instanceof DocumentParseError) {
      logger.warn('Chapter markup exceeds parse limits, showing full chapter', {
        anchor: normalized,
        limit: error.limit,
        length: html.length,
      });
      return null;
    }
    throw error;
  }

  const resolved = resolveAnchor(tree, normalized);
  if (!resolved) {
    logger.debug('Anchor not found in chapter, showing full chapter', { anchor: normalized });
    return null;
  }

  const span = extractSection(tree, resolved.node);
  if (!span) return null;

  logger.debug('Narrowed chapter to section', {
    anchor: normalized,
    strategy: resolved.strategy,
    level: span.level,
    nodeCount: span.nodes.length,
  });

  return serializeSection(tree, span);
}
