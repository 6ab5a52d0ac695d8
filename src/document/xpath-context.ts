/*
  @author Sven Wisotzky

  © 2026 Nokia
  Licensed under the BSD 3-Clause License
  SPDX-License-Identifier: BSD-3-Clause
*/

import { MarkupQueryError } from '../common/errors';
import { XML_NAMESPACE } from '../parser/dom';
import { evaluateXPath } from '../parser/xpath-engine';
import type { EngineValue } from '../parser/xpath-engine';
import type { DomNode, MarkupFormat } from '../parser/types';

const NCNAME = /^[A-Za-z_][\w.-]*$/;

/**
 * Per-document XPath state: the namespace prefixes queries may use and the
 * format that decides whether name tests ignore case. Each document creates
 * its own on first query. Prefixes declared in the document resolve too when
 * nothing is registered under them.
 */
export class XPathContext {
  private readonly namespaces = new Map<string, string>([['xml', XML_NAMESPACE]]);

  constructor(readonly format: MarkupFormat) {}

  registerNamespace(prefix: string, uri: string): void {
    if (!NCNAME.test(prefix) || prefix === 'xmlns' || uri === '') {
      throw new MarkupQueryError('NAMESPACE_BINDING', `Cannot bind prefix "${prefix}" to "${uri}"`);
    }
    this.namespaces.set(prefix, uri);
  }

  lookupNamespaceURI(prefix: string | null): string | null {
    if (prefix === null) return null;
    return this.namespaces.get(prefix) ?? null;
  }

  /** Compiled on every call, so nothing compiled outlives the call. */
  evaluate(expression: string, context: DomNode): EngineValue {
    return evaluateXPath(expression, context, Object.fromEntries(this.namespaces), this.format);
  }
}
