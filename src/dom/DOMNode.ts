/**
 * DOMNode - element and text nodes of the in-memory DOM
 *
 * Tag and attribute names are case-insensitive (stored lower-case);
 * attribute values are case-sensitive.
 *
 * @since 2026-10-18
 */

import * as query from '../query/query.js';
import type { SelectorLike } from '../query/query.js';
import {
  ancestors,
  descendants,
  nextElementSibling,
  nextSiblings,
  previousElementSibling,
  previousSiblings,
  walk,
} from './traversal.js';
import type { DOMNode, SourcePosition } from './types.js';

/**
 * Navigation and query API shared by both node variants.
 * Not exported: the variants are exactly ElementNode and TextNode.
 */
abstract class BaseNode {
  /** Non-owning back-reference; null for top-level nodes */
  parent: ElementNode | null = null;

  protected abstract asNode(): DOMNode;

  get previousSibling(): DOMNode | null {
    return previousSiblings(this.asNode())[0] ?? null;
  }

  get nextSibling(): DOMNode | null {
    return nextSiblings(this.asNode())[0] ?? null;
  }

  get previousElementSibling(): ElementNode | null {
    return previousElementSibling(this.asNode());
  }

  get nextElementSibling(): ElementNode | null {
    return nextElementSibling(this.asNode());
  }

  /**
   * Preceding siblings, the adjacent one first
   */
  previousSiblings(): DOMNode[] {
    return previousSiblings(this.asNode());
  }

  nextSiblings(): DOMNode[] {
    return nextSiblings(this.asNode());
  }

  /**
   * Ancestors in reverse order of depth, stopping at `root`.
   * Throws if `root` is not in the ancestral chain.
   */
  ancestors(root: ElementNode | null = null): ElementNode[] {
    return [...ancestors(this.asNode(), root)];
  }

  /**
   * Descendants in depth-first order
   */
  descendants(): DOMNode[] {
    return [...descendants(this.asNode())];
  }

  /**
   * querySelector clone: first match in document order, this node included.
   * A string selector is parsed on every call.
   */
  select(selector: SelectorLike): ElementNode | null {
    return query.select(this.asNode(), selector);
  }

  /**
   * querySelectorAll clone: all matches in document order, this node included.
   */
  selectAll(selector: SelectorLike): ElementNode[] {
    return query.selectAll(this.asNode(), selector);
  }

  /**
   * Whether this node is matched by `selector`. Combinator lookups stop at
   * `root` when given.
   */
  matchedBy(selector: SelectorLike, root: DOMNode | null = null): boolean {
    return query.matchedBy(this.asNode(), selector, root);
  }
}

export class ElementNode extends BaseNode {
  readonly nodeType = 'element';
  readonly tagName: string;
  readonly attributes: Map<string, string>;
  readonly children: DOMNode[] = [];

  /** Start tag location, when the tokenizer reported one */
  readonly position: SourcePosition | null;

  constructor(
    tagName: string,
    attributes: Iterable<readonly [string, string]> = [],
    position: SourcePosition | null = null
  ) {
    super();
    this.tagName = tagName.toLowerCase();
    this.attributes = new Map();
    for (const [name, value] of attributes) {
      const key = name.toLowerCase();
      // Later duplicates are dropped, as in HTML
      if (!this.attributes.has(key)) {
        this.attributes.set(key, value);
      }
    }
    this.position = position;
  }

  protected asNode(): DOMNode {
    return this;
  }

  getAttribute(name: string): string | null {
    return this.attributes.get(name.toLowerCase()) ?? null;
  }

  hasAttribute(name: string): boolean {
    return this.attributes.has(name.toLowerCase());
  }

  get id(): string | null {
    return this.getAttribute('id');
  }

  get classList(): string[] {
    return (this.attributes.get('class') ?? '').split(/\s+/).filter(Boolean);
  }

  get firstChild(): DOMNode | null {
    return this.children[0] ?? null;
  }

  get lastChild(): DOMNode | null {
    return this.children[this.children.length - 1] ?? null;
  }

  get elementChildren(): ElementNode[] {
    return this.children.filter((child): child is ElementNode => child.nodeType === 'element');
  }

  get firstElementChild(): ElementNode | null {
    return this.elementChildren[0] ?? null;
  }

  get lastElementChild(): ElementNode | null {
    const elements = this.elementChildren;
    return elements[elements.length - 1] ?? null;
  }

  /**
   * Concatenation of all descendant text nodes
   */
  get text(): string {
    let text = '';
    for (const node of walk(this)) {
      if (node.nodeType === 'text') text += node.data;
    }
    return text;
  }

  get textContent(): string {
    return this.text;
  }

  /**
   * Append `node` as the last child, detaching it from its current parent.
   */
  appendChild<T extends DOMNode>(node: T): T {
    for (let ancestor: ElementNode | null = this; ancestor; ancestor = ancestor.parent) {
      if (ancestor === node) {
        throw new Error(`cannot append <${this.tagName}> ancestor as its own descendant`);
      }
    }
    if (node.parent) {
      node.parent.removeChild(node);
    }
    this.children.push(node);
    node.parent = this;
    return node;
  }

  removeChild<T extends DOMNode>(node: T): T {
    const index = this.children.indexOf(node);
    if (index === -1) {
      throw new Error(`node is not a child of <${this.tagName}>`);
    }
    this.children.splice(index, 1);
    node.parent = null;
    return node;
  }
}

export class TextNode extends BaseNode {
  readonly nodeType = 'text';
  data: string;

  constructor(data: string) {
    super();
    this.data = data;
  }

  protected asNode(): DOMNode {
    return this;
  }

  get text(): string {
    return this.data;
  }

  get textContent(): string {
    return this.data;
  }

  appendData(data: string): void {
    this.data += data;
  }

  /**
   * Text nodes compare by payload, wherever they sit in a tree
   */
  equals(other: DOMNode): boolean {
    return other.nodeType === 'text' && other.data === this.data;
  }
}
