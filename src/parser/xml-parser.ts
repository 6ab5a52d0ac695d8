/*
  @author Sven Wisotzky

  © 2026 Nokia
  Licensed under the BSD 3-Clause License
  SPDX-License-Identifier: BSD-3-Clause
*/

import * as sax from 'sax';
import { documentElement, isTextNode } from './dom';
import type { Diagnostic, DomDocument, DomElement, DomNode, ParsedTree } from './types';

function isQualifiedTag(tag: sax.Tag | sax.QualifiedTag): tag is sax.QualifiedTag {
  return 'uri' in tag;
}

/**
 * Parse XML text into `document` (an empty DOM document).
 * Uses sax in strict, namespace-aware mode and resumes after every error, so
 * the tree always holds everything up to the end of the input. Whether the
 * errors are fatal is up to the caller.
 */
export function parseXml(text: string, document: DomDocument): ParsedTree {
  const diagnostics: Diagnostic[] = [];
  const stack: DomNode[] = [document];
  // Depth inside content that cannot be attached (a second root element).
  let skipDepth = 0;
  let cdata: CDATASection | undefined;

  const parser = sax.parser(true, { xmlns: true, position: true });

  const report = (message: string): void => {
    diagnostics.push({
      severity: 'error',
      code: 'xml-syntax',
      message,
      line: parser.line + 1,
      column: parser.column + 1,
    });
  };

  parser.onerror = (err: Error) => {
    report(err.message.split('\n')[0]);
    parser.resume();
  };

  parser.onopentag = (tag: sax.Tag | sax.QualifiedTag) => {
    const parent = stack[stack.length - 1];
    if (skipDepth > 0 || (parent === document && documentElement(document))) {
      if (skipDepth === 0) report('Extra content at the end of the document');
      skipDepth++;
      return;
    }

    let element: DomElement;
    if (isQualifiedTag(tag)) {
      element = document.createElementNS(tag.uri || null, tag.name);
      for (const attr of Object.values(tag.attributes)) {
        element.setAttributeNS(attr.uri || null, attr.name, attr.value);
      }
    } else {
      element = document.createElement(tag.name);
      for (const [name, value] of Object.entries(tag.attributes)) {
        element.setAttribute(name, value);
      }
    }
    parent.appendChild(element);
    stack.push(element);
  };

  parser.onclosetag = () => {
    if (skipDepth > 0) {
      skipDepth--;
      return;
    }
    if (stack.length > 1) stack.pop();
  };

  parser.ontext = (t: string) => {
    const parent = stack[stack.length - 1];
    if (skipDepth > 0 || parent === document) return;
    const last = parent.lastChild;
    if (last && isTextNode(last)) last.appendData(t);
    else parent.appendChild(document.createTextNode(t));
  };

  parser.onopencdata = () => {
    const parent = stack[stack.length - 1];
    if (skipDepth > 0 || parent === document) return;
    cdata = document.createCDATASection('');
    parent.appendChild(cdata);
  };

  parser.oncdata = (t: string) => {
    cdata?.appendData(t);
  };

  parser.onclosecdata = () => {
    cdata = undefined;
  };

  parser.oncomment = (comment: string) => {
    if (skipDepth > 0) return;
    stack[stack.length - 1].appendChild(document.createComment(comment));
  };

  parser.onprocessinginstruction = (node: { name: string; body: string }) => {
    // The XML declaration is not part of the tree.
    if (skipDepth > 0 || node.name.toLowerCase() === 'xml') return;
    stack[stack.length - 1].appendChild(document.createProcessingInstruction(node.name, node.body));
  };

  parser.write(text).close();

  return { document, diagnostics };
}

export interface XmlScan {
  wellFormed: boolean;
  /** Name of the first element, if any. */
  rootName?: string;
}

/** Tokenize `text` without building a tree and report whether it is well-formed XML. */
export function scanXml(text: string): XmlScan {
  const parser = sax.parser(true, { xmlns: true });
  let wellFormed = true;
  let rootName: string | undefined;
  let depth = 0;
  let roots = 0;

  parser.onerror = () => {
    wellFormed = false;
    parser.resume();
  };
  parser.onopentag = (tag: sax.Tag | sax.QualifiedTag) => {
    if (depth === 0) {
      roots++;
      rootName ??= tag.name;
    }
    depth++;
  };
  parser.onclosetag = () => {
    depth--;
  };
  parser.write(text).close();

  return { wellFormed: wellFormed && roots === 1, rootName };
}
