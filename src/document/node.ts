/*
  @author Sven Wisotzky

  © 2026 Nokia
  Licensed under the BSD 3-Clause License
  SPDX-License-Identifier: BSD-3-Clause
*/

import type { Logger } from '../common/logger';
import {
  attributeNodes,
  childNodes,
  findAttribute,
  isAttribute,
  isDocumentNode,
  isElement,
  isTextLike,
  kindOf,
  nameOf,
  stringValue,
} from '../parser/dom';
import { buildPath } from '../parser/path';
import { serializeInner, serializeOuter } from '../parser/serializer';
import type { SerializeOptions } from '../parser/serializer';
import type { DomNode, MarkupFormat, NodeKind } from '../parser/types';
import { requireNodeSet } from './result';
import type { XPathResult } from './result';

/** What a node needs from the document that owns its tree. */
export interface NodeOwner {
  readonly format: MarkupFormat;
  readonly logger: Logger;
  readonly isDisposed: boolean;
  /** Returns `handle` while the tree is alive; throws DocumentDisposedError after. */
  access(handle: DomNode, operation: string): DomNode;
  query(expression: string, context: DomNode): XPathResult;
}

/**
 * Handle to one node of a document's tree. Copying it copies the handle, not
 * the subtree. Every operation checks with the owning document first, so a
 * node of a disposed document fails with DocumentDisposedError.
 *
 * Nodes are created by navigation and queries only. Like their document they
 * belong to the thread (worker) that parsed it.
 */
export class Node {
  constructor(
    private readonly owner: NodeOwner,
    private readonly handle: DomNode
  ) {}

  private dom(operation: string): DomNode {
    return this.owner.access(this.handle, operation);
  }

  private wrap(handle: DomNode | null | undefined): Node | undefined {
    return handle ? new Node(this.owner, handle) : undefined;
  }

  get kind(): NodeKind {
    return kindOf(this.dom('read node kind'));
  }

  /** Element or attribute name, processing instruction target, otherwise ''. */
  get tagName(): string {
    return nameOf(this.dom('read tag name'));
  }

  /** XPath string value: descendant text for elements, own value otherwise. */
  text(): string {
    return stringValue(this.dom('read text'));
  }

  /** Absolute XPath that selects exactly this node. */
  path(): string {
    return buildPath(this.dom('build path'));
  }

  children(): Node[] {
    const node = this.dom('list children');
    if (isAttribute(node)) return [];
    return childNodes(node).map((child) => new Node(this.owner, child));
  }

  elementChildren(): Node[] {
    return childNodes(this.dom('list element children'))
      .filter(isElement)
      .map((child) => new Node(this.owner, child));
  }

  /** Text and CDATA children. */
  textChildren(): Node[] {
    return childNodes(this.dom('list text children'))
      .filter(isTextLike)
      .map((child) => new Node(this.owner, child));
  }

  firstChild(): Node | undefined {
    const node = this.dom('navigate');
    return isAttribute(node) ? undefined : this.wrap(node.firstChild);
  }

  lastChild(): Node | undefined {
    const node = this.dom('navigate');
    return isAttribute(node) ? undefined : this.wrap(node.lastChild);
  }

  /**
   * The parent element. Nodes directly below the document node have none;
   * attributes report their owner element.
   */
  parent(): Node | undefined {
    const node = this.dom('navigate');
    const parent = isAttribute(node) ? node.ownerElement : node.parentNode;
    if (!parent || isDocumentNode(parent)) return undefined;
    return this.wrap(parent);
  }

  hasParent(): boolean {
    return this.parent() !== undefined;
  }

  nextSibling(): Node | undefined {
    const node = this.dom('navigate');
    return isAttribute(node) ? undefined : this.wrap(node.nextSibling);
  }

  prevSibling(): Node | undefined {
    const node = this.dom('navigate');
    return isAttribute(node) ? undefined : this.wrap(node.previousSibling);
  }

  /** The other children of the parent, in document order. */
  siblings(): Node[] {
    const node = this.dom('navigate');
    const parent = node.parentNode;
    if (isAttribute(node) || !parent) return [];
    return childNodes(parent)
      .filter((sibling) => sibling !== node)
      .map((sibling) => new Node(this.owner, sibling));
  }

  hasChildren(): boolean {
    return this.childCount() > 0;
  }

  childCount(): number {
    const node = this.dom('count children');
    return isAttribute(node) ? 0 : childNodes(node).length;
  }

  /** Attribute value by qualified name, or by local name when no qualified name matches. */
  attr(name: string): string | undefined {
    const node = this.dom('read attribute');
    if (!isElement(node)) return undefined;
    return findAttribute(node, name)?.value;
  }

  hasAttr(name: string): boolean {
    return this.attr(name) !== undefined;
  }

  /** All attributes in document order; namespace declarations are left out. */
  attrs(): Map<string, string> {
    const node = this.dom('read attributes');
    const result = new Map<string, string>();
    if (isElement(node)) {
      for (const attr of attributeNodes(node)) result.set(attr.name, attr.value);
    }
    return result;
  }

  innerHtml(options: SerializeOptions = {}): string {
    return serializeInner(this.dom('serialize'), this.owner.format, options, this.owner.logger);
  }

  outerHtml(options: SerializeOptions = {}): string {
    return serializeOuter(this.dom('serialize'), this.owner.format, options, this.owner.logger);
  }

  /** Nodes selected by `xpath` with this node as context node. */
  select(xpath: string): Node[] {
    return requireNodeSet(this.evaluate(xpath), xpath);
  }

  evaluate(xpath: string): XPathResult {
    return this.owner.query(xpath, this.handle);
  }

  /** Same document, same position in the tree. */
  equals(other: Node): boolean {
    return this.owner === other.owner && this.handle === other.handle;
  }

  toString(): string {
    if (this.owner.isDisposed) return 'Node(<disposed>)';
    const tag = this.tagName || this.kind;
    return `Node(${tag} at ${this.path()})`;
  }
}
