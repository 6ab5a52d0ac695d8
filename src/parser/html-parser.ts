/*
  @author Sven Wisotzky

  © 2026 Nokia
  Licensed under the BSD 3-Clause License
  SPDX-License-Identifier: BSD-3-Clause
*/

import { defaultTreeAdapter, parse } from 'parse5';
import type { DefaultTreeAdapterMap, ParserError } from 'parse5';
import type { Diagnostic, DomDocument, DomNode, ParsedTree } from './types';

type HtmlChildNode = DefaultTreeAdapterMap['childNode'];
type HtmlParentNode = DefaultTreeAdapterMap['parentNode'];
type HtmlElement = DefaultTreeAdapterMap['element'];
type HtmlTemplate = DefaultTreeAdapterMap['template'];

/** parse5 codes that describe the document's form rather than broken markup. */
const WARNING_CODES: ReadonlySet<string> = new Set(['missing-doctype', 'non-conforming-doctype']);

function isTemplate(element: HtmlElement): element is HtmlTemplate {
  return 'content' in element;
}

function toDiagnostic(err: ParserError): Diagnostic {
  return {
    severity: WARNING_CODES.has(err.code) ? 'warning' : 'error',
    code: err.code,
    message: err.code.replace(/-/g, ' '),
    line: err.startLine,
    column: err.startCol,
  };
}

/**
 * Parse HTML with the WHATWG tree construction rules and copy the result into
 * `document`. Implied elements (html, head, body, closing of p/li/...) are
 * created the way a browser would. Template contents become ordinary children;
 * the doctype is not copied.
 */
export function parseHtml(text: string, document: DomDocument): ParsedTree {
  const diagnostics: Diagnostic[] = [];
  const source = parse(text, {
    onParseError: (err: ParserError) => {
      diagnostics.push(toDiagnostic(err));
    },
  });
  appendChildren(document, source, document);
  return { document, diagnostics };
}

function appendChildren(target: DomNode, source: HtmlParentNode, document: DomDocument): void {
  for (const child of defaultTreeAdapter.getChildNodes(source)) {
    const converted = convertNode(child, document);
    if (converted) target.appendChild(converted);
  }
}

function convertNode(node: HtmlChildNode, document: DomDocument): DomNode | undefined {
  if (defaultTreeAdapter.isElementNode(node)) {
    const element = document.createElement(defaultTreeAdapter.getTagName(node));
    for (const attr of defaultTreeAdapter.getAttrList(node)) {
      element.setAttribute(attr.prefix ? `${attr.prefix}:${attr.name}` : attr.name, attr.value);
    }
    appendChildren(element, isTemplate(node) ? node.content : node, document);
    return element;
  }
  if (defaultTreeAdapter.isTextNode(node)) {
    return document.createTextNode(defaultTreeAdapter.getTextNodeContent(node));
  }
  if (defaultTreeAdapter.isCommentNode(node)) {
    return document.createComment(defaultTreeAdapter.getCommentNodeContent(node));
  }
  return undefined;
}
