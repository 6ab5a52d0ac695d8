/*
  @author Sven Wisotzky

  © 2026 Nokia
  Licensed under the BSD 3-Clause License
  SPDX-License-Identifier: BSD-3-Clause
*/

import { parseHtml } from './html-parser';
import { parseXml, scanXml } from './xml-parser';
import type { DomDocument, MarkupFormat, ParsedTree } from './types';

/**
 * Markup that opens with an XML declaration is XML. So is any other input that
 * is well-formed XML with a single root other than `html`. Everything else,
 * an HTML doctype included, is HTML.
 */
export function detectFormat(text: string): MarkupFormat {
  if (/^\uFEFF?\s*<\?xml[\s?]/.test(text)) return 'xml';
  if (!/^\uFEFF?\s*</.test(text) || /^\uFEFF?\s*<!doctype\s+html/i.test(text)) return 'html';
  const scan = scanXml(text);
  return scan.wellFormed && scan.rootName !== undefined && scan.rootName.toLowerCase() !== 'html' ? 'xml' : 'html';
}

/** Run the adapter for `format`, building into `document`. */
export function buildTree(text: string, format: MarkupFormat, document: DomDocument): ParsedTree {
  return format === 'xml' ? parseXml(text, document) : parseHtml(text, document);
}
