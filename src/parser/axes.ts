/*
  @author Sven Wisotzky

  © 2026 Nokia
  Licensed under the BSD 3-Clause License
  SPDX-License-Identifier: BSD-3-Clause
*/

import { XPathError } from '../common/errors';

/*
 * The xpath engine walks following:: into the context node's own children and
 * returns ancestors on preceding::. Steps on those two axes are rewritten into
 * sibling walks that the engine gets right:
 *
 *   following::T  =>  ancestor-or-self::node()/following-sibling::node()/descendant-or-self::T
 *   preceding::T  =>  ancestor-or-self::node()/preceding-sibling::node()/descendant-or-self::T
 *
 * Predicates keep their meaning as long as they do not depend on position.
 * A positional predicate is only exact when the step starts a relative path,
 * where the rewrite becomes a parenthesized filter in document order.
 */

type DocumentOrderAxis = 'following' | 'preceding';

interface AxisStep {
  axis: DocumentOrderAxis;
  nodeTest: string;
  predicates: string[];
  end: number;
}

const AXIS = /(following|preceding)\s*::/y;
const NODE_TEST =
  /\s*(?:(?:node|text|comment)\s*\(\s*\)|processing-instruction\s*\(\s*(?:'[^']*'|"[^"]*")?\s*\)|\*|[\p{L}_][\p{L}\p{N}_.-]*(?::(?:\*|[\p{L}_][\p{L}\p{N}_.-]*))?)/uy;
const NAME_CHAR = /[\p{L}\p{N}_.:-]/u;
const NUMBER_LITERAL = /^\s*(\d+(\.\d*)?|\.\d+)\s*$/;
const POSITION_CALL = /(?<![\p{L}\p{N}_.:-])position\s*\(\s*\)/gu;
const POSITIONAL_CALL = /(?<![\p{L}\p{N}_.:-])(position|last)\s*\(/u;

/** Index just past the `]` that closes the `[` at `open`, or -1. */
function closingBracket(text: string, open: number): number {
  let depth = 0;
  for (let i = open; i < text.length; i++) {
    const ch = text[i];
    if (ch === '"' || ch === "'") {
      const close = text.indexOf(ch, i + 1);
      if (close === -1) return -1;
      i = close;
    } else if (ch === '[') {
      depth++;
    } else if (ch === ']') {
      depth--;
      if (depth === 0) return i + 1;
    }
  }
  return -1;
}

/** `text` with string literals and nested predicates blanked out, same length. */
function topLevel(text: string): string {
  let masked = '';
  let depth = 0;
  let quote = '';
  for (let i = 0; i < text.length; i++) {
    const ch = text[i];
    if (quote) {
      if (ch === quote) quote = '';
      masked += ' ';
    } else if (ch === '"' || ch === "'") {
      quote = ch;
      masked += ' ';
    } else if (ch === '[') {
      depth++;
      masked += ' ';
    } else if (ch === ']') {
      depth--;
      masked += ' ';
    } else {
      masked += depth > 0 ? ' ' : ch;
    }
  }
  return masked;
}

function isPositional(predicate: string): boolean {
  return NUMBER_LITERAL.test(predicate) || POSITIONAL_CALL.test(topLevel(predicate));
}

/** Turn a predicate written for reverse document order into one for document order. */
function reversePositions(predicate: string): string {
  if (NUMBER_LITERAL.test(predicate)) return `last() + 1 - position() = ${predicate.trim()}`;
  const masked = topLevel(predicate);
  let result = '';
  let from = 0;
  for (const match of masked.matchAll(POSITION_CALL)) {
    const at = match.index ?? 0;
    result += `${predicate.slice(from, at)}(last() + 1 - position())`;
    from = at + match[0].length;
  }
  return result + predicate.slice(from);
}

function readStep(text: string, start: number): AxisStep | undefined {
  AXIS.lastIndex = start;
  const axis = AXIS.exec(text);
  if (!axis) return undefined;
  NODE_TEST.lastIndex = AXIS.lastIndex;
  const test = NODE_TEST.exec(text);
  if (!test) return undefined;

  const predicates: string[] = [];
  let end = NODE_TEST.lastIndex;
  for (;;) {
    let next = end;
    while (next < text.length && /\s/.test(text[next])) next++;
    if (text[next] !== '[') break;
    const close = closingBracket(text, next);
    if (close === -1) return undefined;
    predicates.push(text.slice(next + 1, close - 1));
    end = close;
  }
  return {
    axis: axis[1] === 'following' ? 'following' : 'preceding',
    nodeTest: test[0].trim(),
    predicates,
    end,
  };
}

function rewrite(text: string, source: string): string {
  let out = '';
  let i = 0;
  while (i < text.length) {
    const ch = text[i];
    if (ch === '"' || ch === "'") {
      const close = text.indexOf(ch, i + 1);
      const end = close === -1 ? text.length : close + 1;
      out += text.slice(i, end);
      i = end;
      continue;
    }
    const step = i === 0 || !NAME_CHAR.test(text[i - 1]) ? readStep(text, i) : undefined;
    if (step) {
      out += rewriteStep(step, !out.trimEnd().endsWith('/'), source);
      i = step.end;
      continue;
    }
    out += ch;
    i++;
  }
  return out;
}

function rewriteStep(step: AxisStep, startsPath: boolean, source: string): string {
  const path = `ancestor-or-self::node()/${step.axis}-sibling::node()/descendant-or-self::${step.nodeTest}`;
  const predicates = step.predicates.map((predicate) => rewrite(predicate, source));
  if (predicates.length === 0) return path;

  if (startsPath) {
    const ordered = step.axis === 'preceding' ? predicates.map(reversePositions) : predicates;
    return `(${path})${ordered.map((p) => `[${p}]`).join('')}`;
  }
  if (predicates.some(isPositional)) {
    throw new XPathError(
      'EvaluationFailure',
      source,
      `Positional predicates on ${step.axis}:: are only supported where the step starts a path`
    );
  }
  return `${path}${predicates.map((p) => `[${p}]`).join('')}`;
}

/** Rewrite following:: and preceding:: steps of `expression` into sibling walks. */
export function rewriteDocumentOrderAxes(expression: string): string {
  return rewrite(expression, expression);
}
