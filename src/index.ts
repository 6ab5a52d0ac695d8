/*
  @author Sven Wisotzky

  © 2026 Nokia
  Licensed under the BSD 3-Clause License
  SPDX-License-Identifier: BSD-3-Clause

  markup-query: tolerant HTML/XML parsing with XPath 1.0 queries.
*/

export { Document } from './document/document';
export type { Node } from './document/node';
export { ParseOptions } from './document/options';
export type { FormatOption, ParseOptionsInit } from './document/options';
export { numberToString, stringToNumber, toBooleanValue, toNumberValue, toStringValue } from './document/result';
export type { XPathResult, XPathResultKind } from './document/result';
export { DocumentDisposedError, MarkupQueryError, ParseError, XPathError } from './common/errors';
export type { ParseErrorKind, SourcePosition, XPathErrorKind } from './common/errors';
export { cleanup, init, isInitialized } from './parser/runtime';
export type { InitOptions } from './parser/runtime';
export type { SerializeOptions } from './parser/serializer';
export type { Diagnostic, DiagnosticSeverity, MarkupFormat, NodeKind } from './parser/types';
export { ConsoleLogger } from './common/console-logger';
export type { Logger, LogLevel } from './common/logger';
export { loadConfig } from './common/config';
export type { MarkupQueryConfig } from './common/config';
