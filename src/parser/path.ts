/*
  @author Sven Wisotzky

  © 2026 Nokia
  Licensed under the BSD 3-Clause License
  SPDX-License-Identifier: BSD-3-Clause
*/

import { COMMENT_NODE, childNodes, isAttribute, isDocumentNode, isElement, isProcessingInstruction, isTextLike } from './dom';
import type { DomAttr, DomElement, DomNode } from './types';

const PLAIN_NAME = /^[\p{L}_][\p{L}\p{N}_.\u00B7-]*$/u;

/**
 * Names that a plain XPath name test would not match: namespaced names,
 * prefixed names, and names HTML allows but XPath cannot spell (`@click`).
 */
function needsNameTest(node: DomElement | DomAttr): boolean {
  return node.namespaceURI !== null || !PLAIN_NAME.test(node.nodeName);
}

/** `value` as an XPath string literal. */
function literal(value: string): string {
  if (!value.includes("'")) return `'${value}'`;
  if (!value.includes('"')) return `"${value}"`;
  return `concat('${value.split("'").join(`', "'", '`)}')`;
}

function sameStepKind(a: DomNode, b: DomNode): boolean {
  if (isElement(a)) {
    return isElement(b) && a.nodeName === b.nodeName && a.namespaceURI === b.namespaceURI;
  }
  if (isTextLike(a)) return isTextLike(b);
  if (isProcessingInstruction(a)) return isProcessingInstruction(b) && a.target === b.target;
  return a.nodeType === b.nodeType;
}

function nodeTest(node: DomNode): string {
  if (isElement(node)) return needsNameTest(node) ? `*[name()=${literal(node.nodeName)}]` : node.nodeName;
  if (isTextLike(node)) return 'text()';
  if (isProcessingInstruction(node)) return `processing-instruction(${literal(node.target)})`;
  if (node.nodeType === COMMENT_NODE) return 'comment()';
  return 'node()';
}

/** One location step; the position is only added when it disambiguates. */
export function buildStep(node: DomNode): string {
  const test = nodeTest(node);
  const parent = node.parentNode;
  if (!parent) return test;
  const peers = childNodes(parent).filter((sibling) => sameStepKind(node, sibling));
  if (peers.length < 2) return test;
  return `${test}[${peers.indexOf(node) + 1}]`;
}

function attributeStep(attr: DomAttr): string {
  return needsNameTest(attr) ? `@*[name()=${literal(attr.name)}]` : `@${attr.name}`;
}

/**
 * Absolute XPath locating `node`, e.g. `/html/body/ul/li[2]/text()`.
 * Evaluating it against the same document selects exactly that node.
 */
export function buildPath(node: DomNode): string {
  if (isDocumentNode(node)) return '/';
  if (isAttribute(node)) {
    const owner = node.ownerElement;
    return owner ? `${buildPath(owner)}/${attributeStep(node)}` : attributeStep(node);
  }
  const steps: string[] = [];
  for (let current: DomNode | null = node; current && !isDocumentNode(current); current = current.parentNode) {
    steps.unshift(buildStep(current));
  }
  return '/' + steps.join('/');
}
