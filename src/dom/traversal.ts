/**
 * Tree walking primitives shared by the node classes, the matcher and DOMTree.
 *
 * Sibling lookups scan the parent's child list, so they are O(siblings).
 */

import type { ElementNode } from './DOMNode.js';
import type { DOMNode } from './types.js';

/**
 * Index of `node` in its parent's children, or -1 for a top-level node
 */
export function indexInParent(node: DOMNode): number {
  const parent = node.parent;
  if (!parent) return -1;
  const index = parent.children.indexOf(node);
  if (index === -1) {
    throw new Error('node is not found in children of its parent');
  }
  return index;
}

/**
 * Preceding siblings, nearest first (reverse document order)
 */
export function previousSiblings(node: DOMNode): DOMNode[] {
  const index = indexInParent(node);
  if (index <= 0 || !node.parent) return [];
  return node.parent.children.slice(0, index).reverse();
}

/**
 * Following siblings in document order
 */
export function nextSiblings(node: DOMNode): DOMNode[] {
  const index = indexInParent(node);
  if (index === -1 || !node.parent) return [];
  return node.parent.children.slice(index + 1);
}

export function previousElementSibling(node: DOMNode): ElementNode | null {
  const parent = node.parent;
  if (!parent) return null;
  for (let i = indexInParent(node) - 1; i >= 0; i--) {
    const sibling = parent.children[i];
    if (sibling.nodeType === 'element') return sibling;
  }
  return null;
}

export function nextElementSibling(node: DOMNode): ElementNode | null {
  const parent = node.parent;
  if (!parent) return null;
  for (let i = indexInParent(node) + 1; i < parent.children.length; i++) {
    const sibling = parent.children[i];
    if (sibling.nodeType === 'element') return sibling;
  }
  return null;
}

/**
 * Ancestors nearest first, stopping at (and including) `root`.
 *
 * Throws if `root` is given but is not in the ancestral chain.
 */
export function* ancestors(
  node: DOMNode,
  root: ElementNode | null = null
): Generator<ElementNode, void, undefined> {
  if (node === root) return;
  let ancestor = node.parent;
  while (ancestor !== root) {
    if (ancestor === null) {
      throw new Error('provided root node not found in ancestral chain');
    }
    yield ancestor;
    ancestor = ancestor.parent;
  }
  if (root) yield root;
}

/**
 * Pre-order walk of the subtree rooted at `node`, `node` included
 */
export function* walk(node: DOMNode): Generator<DOMNode, void, undefined> {
  const stack: DOMNode[] = [node];
  while (stack.length > 0) {
    const current = stack.pop();
    if (current === undefined) break;
    yield current;
    if (current.nodeType === 'element') {
      for (let i = current.children.length - 1; i >= 0; i--) {
        stack.push(current.children[i]);
      }
    }
  }
}

/**
 * Descendants in document order, `node` excluded
 */
export function* descendants(node: DOMNode): Generator<DOMNode, void, undefined> {
  const iterator = walk(node);
  iterator.next();
  yield* iterator;
}

/**
 * Traverse a subtree depth-first.
 * @param callback Called for each node. Return false to stop traversal.
 * @returns false when the callback stopped the traversal
 */
export function traverse(node: DOMNode, callback: (node: DOMNode) => boolean | void): boolean {
  for (const current of walk(node)) {
    if (callback(current) === false) return false;
  }
  return true;
}
