/*
  @author Sven Wisotzky
  © 2026 Nokia
  Licensed under the BSD 3-Clause License
  SPDX-License-Identifier: BSD-3-Clause
*/

import { describe, it, expect } from 'vitest';
import { DocumentDisposedError, ParseError, XPathError } from '../common/errors';
import type { Logger } from '../common/logger';
import { cleanup, init } from '../parser/runtime';
import { Document } from './document';
import { ParseOptions } from './options';

function thrown(fn: () => unknown): unknown {
  try {
    fn();
  } catch (err) {
    return err;
  }
  return undefined;
}

function parseErrorKind(fn: () => unknown): string | undefined {
  const err = thrown(fn);
  return err instanceof ParseError ? err.kind : undefined;
}

function xpathErrorKind(fn: () => unknown): string | undefined {
  const err = thrown(fn);
  return err instanceof XPathError ? err.kind : undefined;
}

class RecordingLogger implements Logger {
  readonly lines: Array<[string, string]> = [];
  clone(): Logger {
    return this;
  }
  setContext(): void {}
  trace(): void {}
  debug(): void {}
  info(message: string): void {
    this.lines.push(['info', message]);
  }
  warn(message: string): void {
    this.lines.push(['warn', message]);
  }
  error(message: string): void {
    this.lines.push(['error', message]);
  }
}

describe('Document.parse', () => {
  it('selects the root element of well-formed XML', () => {
    for (const xml of ['<catalog><book id="1"/></catalog>', '<?xml version="1.0"?>\n<catalog/>']) {
      const roots = Document.parse(xml).select('/*');
      expect(roots).toHaveLength(1);
      expect(roots[0].tagName).toBe('catalog');
    }
  });

  it('repairs broken HTML', () => {
    const doc = Document.parse(
      '<div><p>Unclosed paragraph<p>Another one<ul><li>Item 1<li>Item 2</ul></div>'
    );
    expect(doc.format).toBe('html');
    expect(doc.extractTexts('//li')).toEqual(['Item 1', 'Item 2']);
  });

  it('rejects input without markup', () => {
    expect(parseErrorKind(() => Document.parse(''))).toBe('Malformed');
    expect(parseErrorKind(() => Document.parse('  \n\t'))).toBe('Malformed');
  });

  it('rejects XML without a root element', () => {
    expect(parseErrorKind(() => Document.parse('<?xml version="1.0"?>'))).toBe('Malformed');
  });

  it('fails on the first error when recovery is off', () => {
    const xml = '<?xml version="1.0"?><r><a></r>';
    const err = thrown(() => Document.parse(xml, ParseOptions.strict()));
    expect(err instanceof ParseError ? err.kind : undefined).toBe('Malformed');
    expect(err instanceof ParseError ? err.position?.line : undefined).toBe(1);
    expect(Document.parse(xml).root()?.tagName).toBe('r');
  });

  it('accepts HTML without doctype when recovery is off', () => {
    const doc = Document.parse('<div>test<br></div>', { recover: false });
    expect(doc.format).toBe('html');
    expect(doc.extractString('//div')).toBe('test');
    expect(parseErrorKind(() => Document.parse('<!DOCTYPE html><div class="x', { recover: false }))).toBe(
      'Malformed'
    );
  });

  it('forces the format', () => {
    const html = Document.parseHtml('<catalog/>');
    expect(html.format).toBe('html');
    expect(html.root()?.tagName).toBe('html');
    const xml = Document.parseXml('<catalog/>');
    expect(xml.format).toBe('xml');
    expect(xml.options.format).toBe('xml');
  });

  it('decodes byte input', () => {
    const bytes = new TextEncoder().encode('<?xml version="1.0"?><r>é</r>');
    expect(Document.parse(bytes).extractString('string(/r)')).toBe('é');
    const latin1 = Uint8Array.from([0x3c, 0x72, 0x3e, 0xe9, 0x3c, 0x2f, 0x72, 0x3e]);
    expect(Document.parse(latin1, { encoding: 'latin1' }).extractString('/r')).toBe('é');
    expect(parseErrorKind(() => Document.parse(latin1))).toBe('EncodingError');
  });

  it('drops blank text nodes when asked to', () => {
    const xml = '<r>\n  <a>x</a>\n  <b>y</b>\n</r>';
    expect(Document.parse(xml).root()?.childCount()).toBe(5);
    expect(Document.parse(xml, ParseOptions.compact()).root()?.childCount()).toBe(2);
  });

  it('freezes its options', () => {
    const doc = Document.parse('<r/>', { noBlanks: true });
    expect(Object.isFrozen(doc.options)).toBe(true);
    expect(doc.options.noBlanks).toBe(true);
  });
});

describe('diagnostics', () => {
  const broken = '<!DOCTYPE html><p>a</p><div class="x';

  it('are captured on the document', () => {
    const doc = Document.parse('<p>x<br></p>');
    expect(doc.format).toBe('html');
    expect(doc.diagnostics.map((d) => d.code)).toContain('missing-doctype');
  });

  it('are filtered by noWarning and noError without changing the tree', () => {
    expect(Document.parse('<p>x<br></p>', { noWarning: true }).diagnostics).toEqual([]);
    const quiet = Document.parse(broken, { noError: true });
    const loud = Document.parse(broken);
    expect(quiet.diagnostics).toEqual([]);
    expect(loud.diagnostics.some((d) => d.code === 'eof-in-tag')).toBe(true);
    expect(quiet.extractTexts('//p')).toEqual(loud.extractTexts('//p'));
    expect(quiet.root()?.outerHtml()).toBe(loud.root()?.outerHtml());
  });

  it('go to the engine logger', () => {
    const logger = new RecordingLogger();
    init({ logger });
    try {
      Document.parse(broken).dispose();
      Document.parse(broken, ParseOptions.scraper()).dispose();
    } finally {
      cleanup();
    }
    const errors = logger.lines.filter(([level]) => level === 'error');
    expect(errors).toHaveLength(1);
    expect(errors[0][1]).toMatch(/^-?\d+:-?\d+ eof in tag \(eof-in-tag\)$/);
  });
});

describe('queries', () => {
  const doc = Document.parse('<div><p>A</p><p>B</p></div>');

  it('coerces results the XPath 1.0 way', () => {
    expect(doc.extractNumber('count(//p)')).toBe(2);
    expect(doc.extractBoolean('count(//p) > 1')).toBe(true);
    expect(doc.extractString('string(//p)')).toBe('A');
    expect(doc.extractString('//p')).toBe('A');
    expect(doc.extractNumber('//p')).toBeNaN();
    expect(doc.extractBoolean('//missing')).toBe(false);
    expect(doc.extractString('count(//p) div 4')).toBe('0.5');
  });

  it('returns typed results from evaluate', () => {
    expect(doc.evaluate('count(//p)')).toEqual({ kind: 'number', value: 2 });
    expect(doc.evaluate('concat("x", "y")')).toEqual({ kind: 'string', value: 'xy' });
    expect(doc.evaluate('1 = 1')).toEqual({ kind: 'boolean', value: true });
    expect(doc.evaluate('//p').kind).toBe('node-set');
  });

  it('filters by attribute in document order', () => {
    const list = Document.parse(
      '<ul><li class="item">one</li><li>two</li><li class="item">three</li></ul>'
    );
    expect(list.extractTexts("//li[@class='item']")).toEqual(['one', 'three']);
  });

  it('returns an empty selection when nothing matches', () => {
    expect(doc.select('//table')).toEqual([]);
  });

  it('rejects non-node-set results in select', () => {
    expect(xpathErrorKind(() => doc.select('count(//p)'))).toBe('TypeMismatch');
    expect(xpathErrorKind(() => doc.extractTexts('string(//p)'))).toBe('TypeMismatch');
  });

  it('rejects invalid expressions', () => {
    expect(xpathErrorKind(() => doc.select('//p['))).toBe('InvalidExpression');
  });

  it('trims extracted texts', () => {
    const padded = Document.parse('<ul><li>  a </li><li>\n b\n</li></ul>');
    expect(padded.extractTexts('//li')).toEqual(['a', 'b']);
  });
});

describe('namespaces', () => {
  const doc = Document.parse('<r xmlns="urn:a" xmlns:p="urn:p"><item>1</item><p:item>2</p:item></r>');

  it('resolves registered prefixes', () => {
    doc.registerNamespace('a', 'urn:a');
    doc.registerNamespace('q', 'urn:p');
    expect(doc.extractTexts('//a:item')).toEqual(['1']);
    expect(doc.extractTexts('//q:item')).toEqual(['2']);
  });

  it('fails on unbound prefixes', () => {
    expect(xpathErrorKind(() => doc.select('//zz:item'))).toBe('EvaluationFailure');
  });

  it('binds the xml prefix by default', () => {
    const spaced = Document.parse('<r xml:lang="en"/>');
    expect(spaced.extractString('string(/r/@xml:lang)')).toBe('en');
  });
});

describe('document structure', () => {
  it('exposes the root element and document node', () => {
    const doc = Document.parse('<r>a<b>c</b></r>');
    expect(doc.isEmpty).toBe(false);
    expect(doc.root()?.tagName).toBe('r');
    const node = doc.documentNode();
    expect(node.kind).toBe('document');
    expect(node.path()).toBe('/');
    expect(node.text()).toBe('ac');
    expect(node.parent()).toBeUndefined();
  });

  it('round-trips node paths', () => {
    const docs = [
      Document.parse('<!DOCTYPE html><ul><li class="a">x</li><li>y<!--c--></li></ul><p>t<br>u</p>'),
      Document.parse('<r xmlns="urn:a" xmlns:p="urn:p"><p:c p:k="v">t</p:c><p:c/><d><![CDATA[x]]>y</d></r>'),
    ];
    for (const doc of docs) {
      const nodes = [...doc.select('//node()'), ...doc.select("//@*[local-name() = 'k' or local-name() = 'class']")];
      expect(nodes.length).toBeGreaterThan(5);
      for (const node of nodes) {
        const found = doc.select(node.path());
        expect(found).toHaveLength(1);
        expect(found[0].equals(node)).toBe(true);
      }
    }
  });

  it('round-trips paths of case-only siblings, odd attribute names and mixed text', () => {
    const docs = [
      Document.parseXml('<root><Item>a</Item><item>b</item><ITEM>c</ITEM><item>d</item></root>'),
      Document.parseHtml('<div @click="go" [prop]="x" :class="y">t</div><div v-on:submit="s"></div>'),
      Document.parseXml('<r>a<![CDATA[b]]>c<x/>d<![CDATA[e]]><x>f</x></r>'),
    ];
    for (const doc of docs) {
      const nodes = [...doc.select('//node()'), ...doc.select('//@*')];
      for (const node of nodes) {
        const found = doc.select(node.path());
        expect(found).toHaveLength(1);
        expect(found[0].equals(node)).toBe(true);
      }
    }
  });

  it('matches XML element names case-sensitively', () => {
    const doc = Document.parse('<root><Item>a</Item><item>b</item></root>');
    expect(doc.extractTexts('//item')).toEqual(['b']);
    expect(doc.select('/root/Item')).toHaveLength(1);
  });

  it('walks following and preceding in document order', () => {
    const doc = Document.parse('<r><a>1</a><b>2</b><a>3</a></r>');
    const [b] = doc.select('/r/b');
    expect(b.select('following::*').map((n) => n.text())).toEqual(['3']);
    expect(b.select('preceding::*').map((n) => n.text())).toEqual(['1']);
  });

  it('re-parses serialized markup to the same texts', () => {
    const html = Document.parse('<div><p>One<p>Two &amp; more<ul><li>a<li>b</ul></div>');
    const copy = Document.parse(html.root()?.outerHtml() ?? '');
    for (const xpath of ['//li', '//p', '//div']) {
      expect(copy.extractTexts(xpath)).toEqual(html.extractTexts(xpath));
    }

    const xml = Document.parse('<?xml version="1.0"?><r><a x="1">t &lt; u</a><b><![CDATA[c]]></b></r>');
    const xmlCopy = Document.parseXml(xml.root()?.outerHtml() ?? '');
    for (const xpath of ['//a', '//b', '/r']) {
      expect(xmlCopy.extractTexts(xpath)).toEqual(xml.extractTexts(xpath));
    }
  });
});

describe('dispose', () => {
  it('invalidates nodes and queries', () => {
    const doc = Document.parse('<ul><li>a</li><li>b</li></ul>');
    const item = doc.select('//li')[0];
    doc.dispose();

    expect(doc.isDisposed).toBe(true);
    expect(thrown(() => item.text())).toBeInstanceOf(DocumentDisposedError);
    expect(thrown(() => item.nextSibling())).toBeInstanceOf(DocumentDisposedError);
    expect(thrown(() => doc.root())).toBeInstanceOf(DocumentDisposedError);

    const err = thrown(() => doc.select('//li'));
    expect(err instanceof XPathError ? err.kind : undefined).toBe('EvaluationFailure');
    expect(err instanceof XPathError ? err.cause : undefined).toBeInstanceOf(DocumentDisposedError);
    expect(xpathErrorKind(() => item.select('.'))).toBe('EvaluationFailure');
    expect(String(item)).toBe('Node(<disposed>)');
  });

  it('is idempotent', () => {
    const doc = Document.parse('<r/>');
    doc.dispose();
    doc.dispose();
    expect(doc.isDisposed).toBe(true);
  });
});
