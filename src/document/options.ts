/*
  @author Sven Wisotzky

  © 2026 Nokia
  Licensed under the BSD 3-Clause License
  SPDX-License-Identifier: BSD-3-Clause
*/

import type { MarkupFormat } from '../parser/types';

export type FormatOption = MarkupFormat | 'auto';

/**
 * Flags for building a document. `noError` and `noWarning` only decide which
 * diagnostics are reported; they never change the tree.
 */
export interface ParseOptions {
  /** Continue past structural errors instead of failing. */
  readonly recover: boolean;
  /** Do not report error diagnostics. */
  readonly noError: boolean;
  /** Do not report warning diagnostics. */
  readonly noWarning: boolean;
  /** Drop whitespace-only text nodes that are not content. */
  readonly noBlanks: boolean;
  /** `auto` parses input starting with `<?xml` as XML and everything else as HTML. */
  readonly format: FormatOption;
  /** Encoding of byte input that declares none. */
  readonly encoding?: string;
}

export type ParseOptionsInit = { -readonly [K in keyof ParseOptions]?: ParseOptions[K] };

const DEFAULTS: ParseOptions = {
  recover: true,
  noError: false,
  noWarning: false,
  noBlanks: false,
  format: 'auto',
};

/** Fill in defaults and freeze. */
function resolveParseOptions(init: ParseOptionsInit = {}): ParseOptions {
  const options: ParseOptions = {
    recover: init.recover ?? DEFAULTS.recover,
    noError: init.noError ?? DEFAULTS.noError,
    noWarning: init.noWarning ?? DEFAULTS.noWarning,
    noBlanks: init.noBlanks ?? DEFAULTS.noBlanks,
    format: init.format ?? DEFAULTS.format,
    ...(init.encoding !== undefined ? { encoding: init.encoding } : {}),
  };
  return Object.freeze(options);
}

export const ParseOptions = {
  resolve: resolveParseOptions,

  /** Tolerant parsing with all diagnostics reported. */
  defaults(): ParseOptions {
    return resolveParseOptions();
  },

  /** Fail on the first error the parser reports. */
  strict(): ParseOptions {
    return resolveParseOptions({ recover: false });
  },

  /** Tolerant parsing of markup from the wild, without diagnostics. */
  scraper(): ParseOptions {
    return resolveParseOptions({ noError: true, noWarning: true });
  },

  /** Scraper settings plus removal of blank text nodes. */
  compact(): ParseOptions {
    return resolveParseOptions({ noError: true, noWarning: true, noBlanks: true });
  },
};
