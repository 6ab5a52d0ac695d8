/*
  @author Sven Wisotzky

  © 2026 Nokia
  Licensed under the BSD 3-Clause License
  SPDX-License-Identifier: BSD-3-Clause
*/

import { XMLSerializer } from '@xmldom/xmldom';
import { defaultTreeAdapter, html, serialize } from 'parse5';
import type { DefaultTreeAdapterMap } from 'parse5';
import xmlFormat from 'xml-formatter';
import type { Logger } from '../common/logger';
import {
  COMMENT_NODE,
  attributeNodes,
  childNodes,
  isAttribute,
  isElement,
  isProcessingInstruction,
  isTextLike,
} from './dom';
import type { DomElement, DomNode, MarkupFormat } from './types';

type HtmlParentNode = DefaultTreeAdapterMap['parentNode'];
type HtmlElement = DefaultTreeAdapterMap['element'];

export interface SerializeOptions {
  /** Re-indent the output. Only applied when it is well-formed XML. */
  pretty?: boolean;
}

/*
 * HTML goes through parse5's serializer: the subtree is copied into a parse5
 * tree first, so void elements, raw text and escaping follow the WHATWG
 * fragment serialization rules.
 */

function escapeAttribute(value: string): string {
  return value.replace(/&/g, '&amp;').replace(/\u00a0/g, '&nbsp;').replace(/"/g, '&quot;');
}

function isTemplate(node: DomNode): boolean {
  return isElement(node) && node.nodeName === 'template';
}

function htmlShell(element: DomElement): HtmlElement {
  const attrs = attributeNodes(element).map((attr) => ({ name: attr.name, value: attr.value }));
  return defaultTreeAdapter.createElement(element.nodeName, html.NS.HTML, attrs);
}

function appendHtml(parent: HtmlParentNode, node: DomNode): void {
  if (isElement(node)) {
    const element = htmlShell(node);
    defaultTreeAdapter.appendChild(parent, element);
    let target: HtmlParentNode = element;
    if (isTemplate(node)) {
      target = defaultTreeAdapter.createDocumentFragment();
      Object.assign(element, { content: target });
    }
    for (const child of childNodes(node)) appendHtml(target, child);
  } else if (isTextLike(node)) {
    defaultTreeAdapter.insertText(parent, node.nodeValue ?? '');
  } else if (isProcessingInstruction(node)) {
    defaultTreeAdapter.appendChild(parent, defaultTreeAdapter.createCommentNode(`?${node.target} ${node.data}`));
  } else if (node.nodeType === COMMENT_NODE) {
    defaultTreeAdapter.appendChild(parent, defaultTreeAdapter.createCommentNode(node.nodeValue ?? ''));
  } else {
    for (const child of childNodes(node)) appendHtml(parent, child);
  }
}

/** A parse5 parent standing in for `node`, so text below it is escaped the same way. */
function htmlHost(node: DomNode | null): HtmlParentNode {
  if (node && isElement(node) && !isTemplate(node)) return htmlShell(node);
  return defaultTreeAdapter.createDocumentFragment();
}

function htmlOuter(node: DomNode): string {
  const host = htmlHost(node.parentNode);
  appendHtml(host, node);
  return serialize(host);
}

function htmlInner(node: DomNode): string {
  const host = htmlHost(node);
  for (const child of childNodes(node)) appendHtml(host, child);
  return serialize(host);
}

function xmlNode(node: DomNode): string {
  return new XMLSerializer().serializeToString(node);
}

function serializeAttribute(node: DomNode): string | undefined {
  if (!isAttribute(node)) return undefined;
  return `${node.name}="${escapeAttribute(node.value)}"`;
}

function prettify(markup: string, logger: Logger | undefined): string {
  if (markup.trim() === '') return markup;
  try {
    return xmlFormat(markup, {
      indentation: '  ',
      collapseContent: true,
      lineSeparator: '\n',
      whiteSpaceAtEndOfSelfclosingTag: true,
    });
  } catch (err) {
    logger?.debug('Pretty printing skipped, output is not well-formed XML', err);
    return markup;
  }
}

/** Markup of `node` itself including its descendants. */
export function serializeOuter(
  node: DomNode,
  format: MarkupFormat,
  options: SerializeOptions = {},
  logger?: Logger
): string {
  const out = serializeAttribute(node) ?? (format === 'html' ? htmlOuter(node) : xmlNode(node));
  return options.pretty ? prettify(out, logger) : out;
}

/** Markup of the descendants of `node`. Attributes have none. */
export function serializeInner(
  node: DomNode,
  format: MarkupFormat,
  options: SerializeOptions = {},
  logger?: Logger
): string {
  if (isAttribute(node)) return '';
  const out = format === 'html' ? htmlInner(node) : childNodes(node).map(xmlNode).join('');
  return options.pretty ? prettify(out, logger) : out;
}
