/*
  @author Sven Wisotzky

  © 2026 Nokia
  Licensed under the BSD 3-Clause License
  SPDX-License-Identifier: BSD-3-Clause
*/

import type { DomAttr, DomDocument, DomElement, DomNode, NodeKind } from './types';

export const ELEMENT_NODE = 1;
export const ATTRIBUTE_NODE = 2;
export const TEXT_NODE = 3;
export const CDATA_SECTION_NODE = 4;
export const PROCESSING_INSTRUCTION_NODE = 7;
export const COMMENT_NODE = 8;
export const DOCUMENT_NODE = 9;

export const XMLNS_NAMESPACE = 'http://www.w3.org/2000/xmlns/';
export const XML_NAMESPACE = 'http://www.w3.org/XML/1998/namespace';

export function isElement(node: DomNode): node is DomElement {
  return node.nodeType === ELEMENT_NODE;
}

export function isAttribute(node: DomNode): node is DomAttr {
  return node.nodeType === ATTRIBUTE_NODE;
}

export function isProcessingInstruction(node: DomNode): node is ProcessingInstruction {
  return node.nodeType === PROCESSING_INSTRUCTION_NODE;
}

export function isDocumentNode(node: DomNode): node is DomDocument {
  return node.nodeType === DOCUMENT_NODE;
}

export function isTextNode(node: DomNode): node is Text {
  return node.nodeType === TEXT_NODE;
}

/** Text and CDATA both count as text for string values and `text()`. */
export function isTextLike(node: DomNode): boolean {
  return node.nodeType === TEXT_NODE || node.nodeType === CDATA_SECTION_NODE;
}

export function kindOf(node: DomNode): NodeKind {
  switch (node.nodeType) {
    case ELEMENT_NODE:
      return 'element';
    case ATTRIBUTE_NODE:
      return 'attribute';
    case TEXT_NODE:
      return 'text';
    case CDATA_SECTION_NODE:
      return 'cdata';
    case PROCESSING_INSTRUCTION_NODE:
      return 'processing-instruction';
    case COMMENT_NODE:
      return 'comment';
    case DOCUMENT_NODE:
      return 'document';
    default:
      return 'unknown';
  }
}

/** Namespace declarations are bookkeeping, not attributes. */
export function isNamespaceDeclaration(attr: DomAttr): boolean {
  return attr.namespaceURI === XMLNS_NAMESPACE || attr.name === 'xmlns' || attr.name.startsWith('xmlns:');
}

export function childNodes(node: DomNode): DomNode[] {
  const children: DomNode[] = [];
  for (let child = node.firstChild; child; child = child.nextSibling) {
    children.push(child);
  }
  return children;
}

/** Attributes of an element in document order, namespace declarations excluded. */
export function attributeNodes(element: DomElement): DomAttr[] {
  const result: DomAttr[] = [];
  const list = element.attributes;
  for (let i = 0; i < list.length; i++) {
    const attr = list.item(i);
    if (attr && !isNamespaceDeclaration(attr)) result.push(attr);
  }
  return result;
}

export function findAttribute(element: DomElement, name: string): DomAttr | undefined {
  if (name === '') return undefined;
  const attrs = attributeNodes(element);
  return attrs.find((a) => a.name === name) ?? attrs.find((a) => a.localName === name);
}

/** The document element, if the tree has one. */
export function documentElement(document: DomDocument): DomElement | undefined {
  for (let child = document.firstChild; child; child = child.nextSibling) {
    if (isElement(child)) return child;
  }
  return undefined;
}

/**
 * XPath string-value: descendant text for elements and documents, the node's
 * own value for everything else.
 */
export function stringValue(node: DomNode): string {
  if (isElement(node) || isDocumentNode(node)) {
    let text = '';
    for (let child = node.firstChild; child; child = child.nextSibling) {
      if (isTextLike(child) || isElement(child)) text += stringValue(child);
    }
    return text;
  }
  if (isAttribute(node)) return node.value;
  return node.nodeValue ?? '';
}

/** Tag name by kind: elements and attributes by name, PIs by target, '' for the rest. */
export function nameOf(node: DomNode): string {
  if (isElement(node) || isAttribute(node)) return node.nodeName;
  if (isProcessingInstruction(node)) return node.target;
  return '';
}
