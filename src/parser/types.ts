/*
  @author Sven Wisotzky

  © 2026 Nokia
  Licensed under the BSD 3-Clause License
  SPDX-License-Identifier: BSD-3-Clause

  Handles into the DOM trees built by the engine adapters. The tree itself is
  an @xmldom/xmldom document; these aliases keep the DOM names available to
  modules that declare their own Document and Node.
*/

export type DomNode = Node;
export type DomDocument = Document;
export type DomElement = Element;
export type DomAttr = Attr;
export type DomImplementation = DOMImplementation;

/** Markup dialect a document was parsed as. */
export type MarkupFormat = 'html' | 'xml';

export type NodeKind =
  | 'element'
  | 'attribute'
  | 'text'
  | 'cdata'
  | 'processing-instruction'
  | 'comment'
  | 'document'
  | 'unknown';

export type DiagnosticSeverity = 'warning' | 'error';

/**
 * A message reported by a parser while building the tree. Line and column are
 * 1-based.
 */
export interface Diagnostic {
  severity: DiagnosticSeverity;
  /** Parser specific code, e.g. `eof-in-tag` or `xml-syntax`. */
  code: string;
  message: string;
  line: number;
  column: number;
}

/** Output of an engine adapter: the tree plus everything the parser reported. */
export interface ParsedTree {
  document: DomDocument;
  diagnostics: Diagnostic[];
}
