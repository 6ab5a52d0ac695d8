/*
  @author Sven Wisotzky

  © 2026 Nokia
  Licensed under the BSD 3-Clause License
  SPDX-License-Identifier: BSD-3-Clause
*/

import * as xpath from 'xpath';
import { XPathError } from '../common/errors';
import { rewriteDocumentOrderAxes } from './axes';
import type { DomNode, MarkupFormat } from './types';

/** The engine reports syntax errors with this XPathException code. */
const INVALID_EXPRESSION_ERR = 51;

/** Prefix to namespace URI bindings visible to one evaluation. */
export type NamespaceBindings = Record<string, string>;

/** Result of one evaluation, still in terms of DOM nodes. */
export type EngineValue =
  | { kind: 'node-set'; nodes: DomNode[] }
  | { kind: 'number'; value: number }
  | { kind: 'boolean'; value: boolean }
  | { kind: 'string'; value: string };

function isSyntaxError(err: unknown): boolean {
  if (!(err instanceof Error)) return false;
  if ('code' in err && err.code === INVALID_EXPRESSION_ERR) return true;
  return /parse error|invalid expression/i.test(err.message);
}

function toXPathError(expression: string, err: unknown): XPathError {
  if (err instanceof XPathError) return err;
  if (isSyntaxError(err)) {
    return new XPathError('InvalidExpression', expression, 'Invalid XPath expression', { cause: err });
  }
  const reason = err instanceof Error ? err.message : String(err);
  return new XPathError('EvaluationFailure', expression, `XPath evaluation failed (${reason})`, { cause: err });
}

function isDomNode(value: unknown): value is DomNode {
  return typeof value === 'object' && value !== null && 'nodeType' in value && typeof value.nodeType === 'number';
}

function call(target: object, method: string): unknown {
  const fn: unknown = Reflect.get(target, method);
  if (typeof fn !== 'function') throw new TypeError(`engine value has no ${method}()`);
  const result: unknown = Reflect.apply(fn, target, []);
  return result;
}

/**
 * Map a raw engine value (XNodeSet, XNumber, XString or XBoolean) onto
 * EngineValue. The engine itself tells these apart by constructor.
 */
function toEngineValue(expression: string, raw: unknown): EngineValue {
  const type = typeof raw === 'object' && raw !== null ? raw.constructor.name : typeof raw;
  if (typeof raw === 'object' && raw !== null) {
    switch (type) {
      case 'XNodeSet': {
        const nodes = call(raw, 'toArray');
        if (Array.isArray(nodes)) return { kind: 'node-set', nodes: nodes.filter(isDomNode) };
        break;
      }
      case 'XNumber': {
        const value = call(raw, 'numberValue');
        if (typeof value === 'number') return { kind: 'number', value };
        break;
      }
      case 'XString': {
        const value = call(raw, 'stringValue');
        if (typeof value === 'string') return { kind: 'string', value };
        break;
      }
      case 'XBoolean': {
        const value = call(raw, 'booleanValue');
        if (typeof value === 'boolean') return { kind: 'boolean', value };
        break;
      }
    }
  }
  throw new XPathError('EvaluationFailure', expression, `Unexpected result type ${type}`);
}

/**
 * Compile and evaluate `expression` with `context` as context node. The type
 * of the value follows from the expression. Name tests ignore case only in
 * HTML documents.
 */
export function evaluateXPath(
  expression: string,
  context: DomNode,
  namespaces: NamespaceBindings,
  format: MarkupFormat
): EngineValue {
  if (expression.trim() === '') {
    throw new XPathError('InvalidExpression', expression, 'Empty XPath expression');
  }

  let raw: unknown;
  try {
    const compiled = xpath.parse(rewriteDocumentOrderAxes(expression));
    raw = compiled.evaluate({ node: context, namespaces, isHtml: format === 'html' });
  } catch (err) {
    throw toXPathError(expression, err);
  }
  return toEngineValue(expression, raw);
}
