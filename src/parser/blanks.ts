/*
  @author Sven Wisotzky

  © 2026 Nokia
  Licensed under the BSD 3-Clause License
  SPDX-License-Identifier: BSD-3-Clause
*/

import { XML_NAMESPACE, childNodes, isElement, isTextNode } from './dom';
import type { DomNode, MarkupFormat } from './types';

/** HTML elements whose whitespace is content. */
const PRESERVE_HTML = new Set(['pre', 'textarea', 'script', 'style', 'listing']);

function isBlankText(node: DomNode): boolean {
  return isTextNode(node) && /^[ \t\r\n]*$/.test(node.data);
}

function preservesSpace(node: DomNode, format: MarkupFormat): boolean {
  if (!isElement(node)) return false;
  if (format === 'html') return PRESERVE_HTML.has(node.nodeName);
  return node.getAttributeNS(XML_NAMESPACE, 'space') === 'preserve';
}

/**
 * Drop ignorable whitespace-only text nodes below `node`.
 * A blank text node stays when it is the only child, when its parent also has
 * non-blank text (mixed content) or inside elements that preserve space.
 */
export function removeBlankNodes(node: DomNode, format: MarkupFormat): void {
  if (preservesSpace(node, format)) return;
  const children = childNodes(node);
  const mixed = children.some((c) => isTextNode(c) && !isBlankText(c));
  for (const child of children) {
    if (isElement(child)) removeBlankNodes(child, format);
    else if (!mixed && children.length > 1 && isBlankText(child)) node.removeChild(child);
  }
}
