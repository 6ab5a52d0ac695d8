/*
  @author Sven Wisotzky

  © 2026 Nokia
  Licensed under the BSD 3-Clause License
  SPDX-License-Identifier: BSD-3-Clause
*/

import { XPathError } from '../common/errors';
import type { Node } from './node';

/**
 * Value of an XPath 1.0 expression. The kind is the static type of the
 * expression: a path gives a node-set, `count()` a number, a comparison a
 * boolean and `string()` a string.
 */
export type XPathResult =
  | { kind: 'node-set'; nodes: Node[] }
  | { kind: 'number'; value: number }
  | { kind: 'boolean'; value: boolean }
  | { kind: 'string'; value: string };

export type XPathResultKind = XPathResult['kind'];

/** XPath numbers are written without exponent. */
function expandExponent(text: string): string {
  const match = /^(-?)(\d+)(?:\.(\d+))?e([+-]\d+)$/.exec(text);
  if (!match) return text;
  const [, sign, whole, fraction = '', exponent] = match;
  const digits = whole + fraction;
  const point = whole.length + Number(exponent);
  let out: string;
  if (point <= 0) out = '0.' + '0'.repeat(-point) + digits;
  else if (point >= digits.length) out = digits + '0'.repeat(point - digits.length);
  else out = digits.slice(0, point) + '.' + digits.slice(point);
  return sign + out;
}

/** The XPath `string()` of a number. */
export function numberToString(value: number): string {
  if (Number.isNaN(value)) return 'NaN';
  if (value === Infinity) return 'Infinity';
  if (value === -Infinity) return '-Infinity';
  if (value === 0) return '0';
  return expandExponent(String(value));
}

/** The XPath `number()` of a string: NaN unless it is a plain decimal. */
export function stringToNumber(value: string): number {
  return /^[ \t\r\n]*-?(\d+(\.\d*)?|\.\d+)[ \t\r\n]*$/.test(value) ? Number(value) : NaN;
}

export function toStringValue(result: XPathResult): string {
  switch (result.kind) {
    case 'node-set':
      return result.nodes.length > 0 ? result.nodes[0].text() : '';
    case 'number':
      return numberToString(result.value);
    case 'boolean':
      return result.value ? 'true' : 'false';
    case 'string':
      return result.value;
  }
}

export function toNumberValue(result: XPathResult): number {
  switch (result.kind) {
    case 'number':
      return result.value;
    case 'boolean':
      return result.value ? 1 : 0;
    default:
      return stringToNumber(toStringValue(result));
  }
}

export function toBooleanValue(result: XPathResult): boolean {
  switch (result.kind) {
    case 'node-set':
      return result.nodes.length > 0;
    case 'number':
      return result.value !== 0 && !Number.isNaN(result.value);
    case 'boolean':
      return result.value;
    case 'string':
      return result.value.length > 0;
  }
}

/** Nodes of a node-set result; any other kind is a type mismatch. */
export function requireNodeSet(result: XPathResult, expression: string): Node[] {
  if (result.kind !== 'node-set') {
    throw new XPathError('TypeMismatch', expression, `Expected a node-set but the expression yields a ${result.kind}`);
  }
  return result.nodes;
}
