/*
  @author Sven Wisotzky

  © 2026 Nokia
  Licensed under the BSD 3-Clause License
  SPDX-License-Identifier: BSD-3-Clause
*/

import { DocumentDisposedError, MarkupQueryError, ParseError, XPathError } from '../common/errors';
import type { Logger } from '../common/logger';
import { removeBlankNodes } from '../parser/blanks';
import { documentElement } from '../parser/dom';
import { decodeMarkup } from '../parser/encoding';
import { buildTree, detectFormat } from '../parser/format';
import { acquire, release, releaseHold, trackHold } from '../parser/runtime';
import type { DocumentHold } from '../parser/runtime';
import type { Diagnostic, DomDocument, DomNode, MarkupFormat } from '../parser/types';
import { Node } from './node';
import type { NodeOwner } from './node';
import { ParseOptions } from './options';
import type { ParseOptionsInit } from './options';
import { requireNodeSet, toBooleanValue, toNumberValue, toStringValue } from './result';
import type { XPathResult } from './result';
import { XPathContext } from './xpath-context';

/** Diagnostics the options ask for, written to the engine logger. */
function reportDiagnostics(diagnostics: Diagnostic[], options: ParseOptions, logger: Logger): Diagnostic[] {
  const reported = diagnostics.filter((d) => (d.severity === 'error' ? !options.noError : !options.noWarning));
  for (const d of reported) {
    const line = `${d.line}:${d.column} ${d.message} (${d.code})`;
    if (d.severity === 'error') logger.error(line);
    else logger.warn(line);
  }
  return reported;
}

function disposedQueryError(expression: string): XPathError {
  return new XPathError('EvaluationFailure', expression, 'Document has been disposed', {
    cause: new DocumentDisposedError('evaluate an XPath expression'),
  });
}

/**
 * A parsed HTML or XML tree and the entry point for queries on it.
 *
 * The document owns its tree until dispose(); afterwards every node taken from
 * it refuses to work. A document and its nodes belong to the thread (worker)
 * that created them: use one document per worker.
 */
export class Document implements NodeOwner {
  private tree: DomDocument | undefined;
  private context: XPathContext | undefined;
  private readonly hold: DocumentHold;

  private constructor(
    tree: DomDocument,
    readonly format: MarkupFormat,
    readonly options: ParseOptions,
    /** Parser diagnostics not suppressed by `noError`/`noWarning`. */
    readonly diagnostics: readonly Diagnostic[],
    readonly logger: Logger
  ) {
    this.tree = tree;
    this.hold = trackHold(this, logger);
  }

  /**
   * Parse markup text or bytes. Structural defects are repaired unless
   * `recover` is off; only input that yields no tree at all fails.
   */
  static parse(markup: string | Uint8Array, init: ParseOptionsInit = {}): Document {
    const options = ParseOptions.resolve(init);
    const text = typeof markup === 'string' ? markup : decodeMarkup(markup, options.encoding);
    if (text.trim() === '') {
      throw new ParseError('Malformed', 'Input contains no markup');
    }
    const source = text.replace(/^\uFEFF/, '');
    const format = options.format === 'auto' ? detectFormat(source) : options.format;

    const lease = acquire();
    try {
      const { document, diagnostics } = buildTree(source, format, lease.document);
      const reported = reportDiagnostics(diagnostics, options, lease.logger);

      const fatal = diagnostics.find((d) => d.severity === 'error');
      if (!options.recover && fatal) {
        throw new ParseError('Malformed', `${fatal.message} at ${fatal.line}:${fatal.column}`, {
          line: fatal.line,
          column: fatal.column,
        });
      }
      if (!documentElement(document)) {
        throw new ParseError('Malformed', 'Document has no root element');
      }
      if (options.noBlanks) removeBlankNodes(document, format);

      lease.logger.debug(`parsed ${format} document, ${diagnostics.length} diagnostic(s)`);
      return new Document(document, format, options, reported, lease.logger);
    } catch (err) {
      release();
      if (err instanceof MarkupQueryError) throw err;
      throw new ParseError('Malformed', 'Markup could not be parsed', undefined, { cause: err });
    }
  }

  static parseHtml(markup: string | Uint8Array, init: ParseOptionsInit = {}): Document {
    return Document.parse(markup, { ...init, format: 'html' });
  }

  static parseXml(markup: string | Uint8Array, init: ParseOptionsInit = {}): Document {
    return Document.parse(markup, { ...init, format: 'xml' });
  }

  get isDisposed(): boolean {
    return this.tree === undefined;
  }

  /** Release the tree. Calling it again does nothing. */
  dispose(): void {
    if (this.tree === undefined) return;
    this.tree = undefined;
    this.context = undefined;
    this.logger.debug('document disposed');
    releaseHold(this.hold);
  }

  /** @internal */
  access(handle: DomNode, operation: string): DomNode {
    if (this.tree === undefined) throw new DocumentDisposedError(operation);
    return handle;
  }

  /** @internal */
  query(expression: string, context: DomNode): XPathResult {
    if (this.tree === undefined) {
      throw disposedQueryError(expression);
    }
    const value = this.xpathContext().evaluate(expression, context);
    if (value.kind !== 'node-set') return value;
    return { kind: 'node-set', nodes: value.nodes.map((node) => new Node(this, node)) };
  }

  private xpathContext(): XPathContext {
    if (!this.context) this.context = new XPathContext(this.format);
    return this.context;
  }

  private domTree(operation: string): DomDocument {
    if (this.tree === undefined) throw new DocumentDisposedError(operation);
    return this.tree;
  }

  /** The document node, parent of the root element. */
  documentNode(): Node {
    return new Node(this, this.domTree('get the document node'));
  }

  /** The root element. */
  root(): Node | undefined {
    const element = documentElement(this.domTree('get the root element'));
    return element ? new Node(this, element) : undefined;
  }

  get isEmpty(): boolean {
    return documentElement(this.domTree('inspect the tree')) === undefined;
  }

  /** Bind `prefix` to `uri` for XPath queries on this document. */
  registerNamespace(prefix: string, uri: string): void {
    this.domTree('register a namespace');
    this.xpathContext().registerNamespace(prefix, uri);
  }

  evaluate(xpath: string): XPathResult {
    return this.query(xpath, this.queryRoot(xpath));
  }

  /** Nodes selected by `xpath`, in document order. */
  select(xpath: string): Node[] {
    return requireNodeSet(this.evaluate(xpath), xpath);
  }

  /** Trimmed string value of every selected node. */
  extractTexts(xpath: string): string[] {
    return this.select(xpath).map((node) => node.text().trim());
  }

  extractNumber(xpath: string): number {
    return toNumberValue(this.evaluate(xpath));
  }

  extractBoolean(xpath: string): boolean {
    return toBooleanValue(this.evaluate(xpath));
  }

  extractString(xpath: string): string {
    return toStringValue(this.evaluate(xpath));
  }

  private queryRoot(expression: string): DomNode {
    if (this.tree === undefined) {
      throw disposedQueryError(expression);
    }
    return this.tree;
  }
}
