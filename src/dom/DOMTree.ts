/**
 * DOMTree - the forest produced by one parse
 *
 * Usually a single root element, but text or further elements may sit next
 * to it at the top level. Queries run over every top-level node in order
 * and are not scoped: combinators may use the whole forest.
 *
 * @since 2026-10-18
 */

import type { ElementNode } from './DOMNode.js';
import { traverse, walk } from './traversal.js';
import type { DOMNode } from './types.js';
import { toSelectorGroup, type SelectorLike } from '../query/query.js';
import { iterateMatches } from '../selector/matcher.js';

export class DOMTree {
  readonly nodes: readonly DOMNode[];

  constructor(nodes: readonly DOMNode[]) {
    this.nodes = nodes;
  }

  /**
   * The first top-level element, or null when nothing was parsed
   */
  get root(): ElementNode | null {
    for (const node of this.nodes) {
      if (node.nodeType === 'element') return node;
    }
    return null;
  }

  get isEmpty(): boolean {
    return this.nodes.length === 0;
  }

  /**
   * Every node of the forest in document order
   */
  *walk(): Generator<DOMNode, void, undefined> {
    for (const node of this.nodes) {
      yield* walk(node);
    }
  }

  /**
   * Find elements matching a CSS selector; null when none does
   */
  querySelector(selector: SelectorLike): ElementNode | null {
    for (const element of this.matching(selector)) {
      return element;
    }
    return null;
  }

  /**
   * Find all elements matching a CSS selector, in document order
   */
  querySelectorAll(selector: SelectorLike): ElementNode[] {
    return [...this.matching(selector)];
  }

  /**
   * Find all elements matching a tag name
   */
  findElements(tagName: string): ElementNode[] {
    const wanted = tagName.toLowerCase();
    return this.elements().filter((element) => element.tagName === wanted);
  }

  /**
   * Find element by ID
   */
  getElementById(id: string): ElementNode | null {
    let result: ElementNode | null = null;
    for (const node of this.nodes) {
      const found = !traverse(node, (current) => {
        if (current.nodeType === 'element' && current.attributes.get('id') === id) {
          result = current;
          return false; // Stop traversal
        }
      });
      if (found) break;
    }
    return result;
  }

  /**
   * Find elements by class name
   */
  getElementsByClassName(className: string): ElementNode[] {
    return this.elements().filter((element) => element.classList.includes(className));
  }

  /**
   * Find elements that have a specific attribute, optionally with a value
   */
  findElementsWithAttribute(attrName: string, attrValue?: string): ElementNode[] {
    return this.elements().filter((element) => {
      const value = element.getAttribute(attrName);
      return value !== null && (attrValue === undefined || value === attrValue);
    });
  }

  /**
   * Get all text content from a subtree (or the whole forest), with runs of
   * whitespace collapsed
   */
  getTextContent(node?: DOMNode): string {
    const texts: string[] = [];
    const roots = node ? [node] : this.nodes;
    for (const root of roots) {
      for (const current of walk(root)) {
        if (current.nodeType === 'text') texts.push(current.data);
      }
    }
    return texts.join(' ').replace(/\s+/g, ' ').trim();
  }

  private elements(): ElementNode[] {
    const results: ElementNode[] = [];
    for (const node of this.walk()) {
      if (node.nodeType === 'element') results.push(node);
    }
    return results;
  }

  private *matching(selector: SelectorLike): Generator<ElementNode, void, undefined> {
    const group = toSelectorGroup(selector);
    for (const node of this.nodes) {
      yield* iterateMatches(node, group);
    }
  }
}
