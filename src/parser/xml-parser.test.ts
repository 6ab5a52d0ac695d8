/*
  @author Sven Wisotzky
  © 2026 Nokia
  Licensed under the BSD 3-Clause License
  SPDX-License-Identifier: BSD-3-Clause
*/

import { describe, it, expect } from 'vitest';
import { DOMImplementation } from '@xmldom/xmldom';
import { childNodes, documentElement, isElement } from './dom';
import { parseXml, scanXml } from './xml-parser';

function emptyDocument(): Document {
  return new DOMImplementation().createDocument(null, null, null);
}

describe('parseXml', () => {
  it('builds elements, attributes and text', () => {
    const xml = '<?xml version="1.0"?><root id="1"><a/><b>text</b></root>';
    const { document, diagnostics } = parseXml(xml, emptyDocument());
    expect(diagnostics).toHaveLength(0);
    const root = documentElement(document);
    expect(root?.nodeName).toBe('root');
    expect(root?.getAttribute('id')).toBe('1');
    expect(root?.childNodes.length).toBe(2);
    expect(root?.lastChild?.textContent).toBe('text');
  });

  it('leaves the XML declaration out of the tree', () => {
    const { document } = parseXml('<?xml version="1.0"?><root/>', emptyDocument());
    expect(document.childNodes.length).toBe(1);
    expect(document.firstChild?.nodeName).toBe('root');
  });

  it('reports errors and keeps what was parsed', () => {
    const { document, diagnostics } = parseXml('<root><unclosed>', emptyDocument());
    expect(diagnostics.length).toBeGreaterThan(0);
    expect(diagnostics.every((d) => d.severity === 'error')).toBe(true);
    expect(documentElement(document)?.firstChild?.nodeName).toBe('unclosed');
  });

  it('resolves namespaces', () => {
    const xml = '<r xmlns="urn:a" xmlns:p="urn:p"><p:c p:k="v"/></r>';
    const { document, diagnostics } = parseXml(xml, emptyDocument());
    expect(diagnostics).toHaveLength(0);
    const root = documentElement(document);
    expect(root?.namespaceURI).toBe('urn:a');
    const child = root?.firstChild;
    expect(child && isElement(child) ? child.namespaceURI : undefined).toBe('urn:p');
    expect(child && isElement(child) ? child.localName : undefined).toBe('c');
    expect(child && isElement(child) ? child.getAttributeNS('urn:p', 'k') : undefined).toBe('v');
  });

  it('keeps CDATA, comments and processing instructions', () => {
    const { document } = parseXml('<r><![CDATA[a<b]]><!--c--><?pi data?></r>', emptyDocument());
    const root = documentElement(document);
    const kinds = root ? childNodes(root).map((n) => n.nodeType) : [];
    expect(kinds).toEqual([4, 8, 7]);
    expect(root?.firstChild?.nodeValue).toBe('a<b');
  });

  it('decodes entities into a single text node', () => {
    const { document } = parseXml('<r>a &amp; b</r>', emptyDocument());
    const root = documentElement(document);
    expect(root?.childNodes.length).toBe(1);
    expect(root?.textContent).toBe('a & b');
  });

  it('skips a second root element', () => {
    const { document, diagnostics } = parseXml('<a/><b><c/></b>', emptyDocument());
    expect(childNodes(document).filter(isElement).map((e) => e.nodeName)).toEqual(['a']);
    expect(diagnostics.some((d) => d.message === 'Extra content at the end of the document')).toBe(true);
  });
});

describe('scanXml', () => {
  it('accepts well-formed markup', () => {
    expect(scanXml('<div><p>A</p></div>')).toEqual({ wellFormed: true, rootName: 'div' });
  });

  it('rejects unclosed tags', () => {
    expect(scanXml('<div><p>A</div>').wellFormed).toBe(false);
  });

  it('rejects several top-level elements', () => {
    expect(scanXml('<a/><b/>').wellFormed).toBe(false);
  });
});
