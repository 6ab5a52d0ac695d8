/*
  @author Sven Wisotzky

  © 2026 Nokia
  Licensed under the BSD 3-Clause License
  SPDX-License-Identifier: BSD-3-Clause
*/

import { ParseError } from '../common/errors';

/** How far into the input encoding declarations are looked for. */
const SNIFF_LENGTH = 1024;

const XML_DECLARATION = /^\s*<\?xml[^>]*?\bencoding\s*=\s*["']([A-Za-z0-9._:-]+)["']/i;
const META_CHARSET = /<meta\b[^>]*?\bcharset\s*=\s*["']?([A-Za-z0-9._:-]+)/i;

function byteOrderMark(bytes: Uint8Array): string | undefined {
  if (bytes.length >= 3 && bytes[0] === 0xef && bytes[1] === 0xbb && bytes[2] === 0xbf) return 'utf-8';
  if (bytes.length >= 2 && bytes[0] === 0xfe && bytes[1] === 0xff) return 'utf-16be';
  if (bytes.length >= 2 && bytes[0] === 0xff && bytes[1] === 0xfe) return 'utf-16le';
  return undefined;
}

/**
 * The encoding declared inside the markup, if any. The prefix is read as
 * Latin-1 so every byte maps to one character.
 */
export function declaredEncoding(bytes: Uint8Array): string | undefined {
  const head = new TextDecoder('latin1').decode(bytes.subarray(0, SNIFF_LENGTH));
  const match = XML_DECLARATION.exec(head) ?? META_CHARSET.exec(head);
  return match ? match[1] : undefined;
}

/**
 * Select the encoding of `bytes`: byte order mark, then a declaration in the
 * markup, then `fallback`, then UTF-8.
 */
export function detectEncoding(bytes: Uint8Array, fallback?: string): string {
  return byteOrderMark(bytes) ?? declaredEncoding(bytes) ?? fallback ?? 'utf-8';
}

/** Decode markup bytes to text. Throws `ParseError('EncodingError')`. */
export function decodeMarkup(bytes: Uint8Array, fallback?: string): string {
  const encoding = detectEncoding(bytes, fallback);
  let decoder: TextDecoder;
  try {
    decoder = new TextDecoder(encoding, { fatal: true });
  } catch (err) {
    throw new ParseError('EncodingError', `Unsupported encoding "${encoding}"`, undefined, { cause: err });
  }
  try {
    return decoder.decode(bytes);
  } catch (err) {
    throw new ParseError('EncodingError', `Input is not valid ${encoding}`, undefined, { cause: err });
  }
}
