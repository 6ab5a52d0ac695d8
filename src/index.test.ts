/*
  @author Sven Wisotzky
  © 2026 Nokia
  Licensed under the BSD 3-Clause License
  SPDX-License-Identifier: BSD-3-Clause
*/

import { describe, it, expect } from 'vitest';
import { Document, DocumentDisposedError, ParseOptions, cleanup, init, isInitialized } from './index';

describe('public API', () => {
  it('parses, queries and disposes', () => {
    init();
    const doc = Document.parse('<ul><li class="item">1</li><li>2</li></ul>', ParseOptions.scraper());
    const [item] = doc.select("//li[@class='item']");
    expect(item.text()).toBe('1');
    expect(item.path()).toBe('/ul/li[1]');
    doc.dispose();
    expect(() => item.text()).toThrow(DocumentDisposedError);
    cleanup();
    expect(isInitialized()).toBe(false);
  });
});
