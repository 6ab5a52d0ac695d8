/*
  @author Sven Wisotzky

  © 2026 Nokia
  Licensed under the BSD 3-Clause License
  SPDX-License-Identifier: BSD-3-Clause

  Closed error taxonomy for parsing and querying.
*/

export type ParseErrorKind = 'Malformed' | 'EncodingError';
export type XPathErrorKind = 'InvalidExpression' | 'TypeMismatch' | 'EvaluationFailure';

export interface SourcePosition {
  line: number;
  column: number;
}

export class MarkupQueryError extends Error {
  readonly code: string;

  constructor(code: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'MarkupQueryError';
    this.code = code;
  }
}

/**
 * Raised when markup cannot be turned into a tree at all. Recoverable defects
 * never end up here; they are reported as diagnostics on the document.
 */
export class ParseError extends MarkupQueryError {
  readonly kind: ParseErrorKind;
  readonly position?: SourcePosition;

  constructor(kind: ParseErrorKind, message: string, position?: SourcePosition, options?: { cause?: unknown }) {
    super(kind === 'Malformed' ? 'PARSE_MALFORMED' : 'PARSE_ENCODING', message, options);
    this.name = 'ParseError';
    this.kind = kind;
    this.position = position;
  }
}

const XPATH_CODES: Record<XPathErrorKind, string> = {
  InvalidExpression: 'XPATH_INVALID_EXPRESSION',
  TypeMismatch: 'XPATH_TYPE_MISMATCH',
  EvaluationFailure: 'XPATH_EVALUATION_FAILURE',
};

export class XPathError extends MarkupQueryError {
  readonly kind: XPathErrorKind;
  /** The expression as the caller passed it. */
  readonly expression: string;

  constructor(kind: XPathErrorKind, expression: string, message: string, options?: { cause?: unknown }) {
    super(XPATH_CODES[kind], `${message}: ${expression}`, options);
    this.name = 'XPathError';
    this.kind = kind;
    this.expression = expression;
  }
}

/**
 * A node or query was used after its document was disposed.
 */
export class DocumentDisposedError extends MarkupQueryError {
  constructor(operation: string) {
    super('DOCUMENT_DISPOSED', `Cannot ${operation}: the owning document has been disposed`);
    this.name = 'DocumentDisposedError';
  }
}
