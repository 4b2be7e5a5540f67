/**
 * Matching engine
 *
 * Selectors are evaluated right to left: the rightmost compound must match
 * the candidate itself, then each combinator to its left asks for some
 * related node matching the rest of the chain. Recursion depth is bounded by
 * the number of compounds in the selector.
 *
 * An optional `scope` node bounds combinator lookups: ancestors are searched
 * up to and including the scope, and the scope has no parent or siblings.
 */

import type { ElementNode } from '../dom/DOMNode.js';
import { walk } from '../dom/traversal.js';
import type { DOMNode } from '../dom/types.js';
import type { AttributeSelector, Selector, SelectorGroup } from './Selector.js';
import type { Combinator, CompoundSelector } from './types.js';

export type ParsedSelector = Selector | SelectorGroup;

function splitWords(value: string): string[] {
  return value.split(/\s+/).filter(Boolean);
}

export function matchesAttribute(element: ElementNode, selector: AttributeSelector): boolean {
  const actual = element.attributes.get(selector.name);
  if (actual === undefined) return false;

  const expected = selector.value ?? '';
  switch (selector.type) {
    case 'exists':
      return true;
    case 'equals':
      return actual === expected;
    case 'contains-word':
      return splitWords(actual).includes(expected);
    case 'hyphen-prefix':
      return actual === expected || actual.startsWith(`${expected}-`);
    // An empty target represents nothing for the three substring forms
    case 'starts-with':
      return expected !== '' && actual.startsWith(expected);
    case 'ends-with':
      return expected !== '' && actual.endsWith(expected);
    case 'contains':
      return expected !== '' && actual.includes(expected);
    default: {
      const unreachable: never = selector.type;
      throw new Error(`unimplemented attribute selector: ${String(unreachable)}`);
    }
  }
}

export function matchesCompound(node: DOMNode, compound: CompoundSelector): boolean {
  if (node.nodeType !== 'element') return false;
  const element = node;
  if (compound.tag !== null && element.tagName !== compound.tag.toLowerCase()) return false;
  if (compound.id !== null && element.attributes.get('id') !== compound.id) return false;
  if (compound.classes.length > 0) {
    const classes = splitWords(element.attributes.get('class') ?? '');
    if (!compound.classes.every((className) => classes.includes(className))) return false;
  }
  return compound.attributes.every((attribute) => matchesAttribute(element, attribute));
}

/**
 * Candidates related to `node` by `combinator`, nearest first
 */
function* related(
  node: DOMNode,
  combinator: Combinator,
  scope: DOMNode | null
): Generator<ElementNode, void, undefined> {
  if (node === scope) return;

  switch (combinator) {
    case 'child':
      if (node.parent) yield node.parent;
      return;
    case 'descendant':
      for (let ancestor = node.parent; ancestor; ancestor = ancestor.parent) {
        yield ancestor;
        if (ancestor === scope) return;
      }
      return;
    case 'next-sibling':
    case 'subsequent-sibling': {
      const parent = node.parent;
      if (!parent) return;
      for (let i = parent.children.indexOf(node) - 1; i >= 0; i--) {
        const sibling = parent.children[i];
        // Text between elements does not break adjacency
        if (sibling.nodeType !== 'element') continue;
        yield sibling;
        if (combinator === 'next-sibling') return;
      }
      return;
    }
    default: {
      const unreachable: never = combinator;
      throw new Error(`unimplemented combinator: ${String(unreachable)}`);
    }
  }
}

function matchesFrom(node: DOMNode, selector: Selector, index: number, scope: DOMNode | null): boolean {
  const part = selector.parts[index];
  if (!matchesCompound(node, part.compound)) return false;
  if (part.combinator === null) return true;

  for (const candidate of related(node, part.combinator, scope)) {
    if (matchesFrom(candidate, selector, index - 1, scope)) return true;
  }
  return false;
}

export function matchesSelector(node: DOMNode, selector: Selector, scope: DOMNode | null = null): boolean {
  return matchesFrom(node, selector, selector.parts.length - 1, scope);
}

export function matchesSelectorGroup(
  node: DOMNode,
  group: SelectorGroup,
  scope: DOMNode | null = null
): boolean {
  for (const selector of group) {
    if (matchesSelector(node, selector, scope)) return true;
  }
  return false;
}

function isGroup(selector: ParsedSelector): selector is SelectorGroup {
  return 'selectors' in selector;
}

/**
 * Whether `node` is matched by a selector or by any selector of a group
 */
export function matches(node: DOMNode, selector: ParsedSelector, scope: DOMNode | null = null): boolean {
  return isGroup(selector)
    ? matchesSelectorGroup(node, selector, scope)
    : matchesSelector(node, selector, scope);
}

/**
 * Lazily yield matching elements of the subtree rooted at `root`, root
 * included, in document order.
 */
export function* iterateMatches(
  root: DOMNode,
  selector: ParsedSelector,
  scope: DOMNode | null = null
): Generator<ElementNode, void, undefined> {
  for (const node of walk(root)) {
    if (node.nodeType === 'element' && matches(node, selector, scope)) {
      yield node;
    }
  }
}

export function selectAll(root: DOMNode, selector: ParsedSelector, scope: DOMNode | null = null): ElementNode[] {
  return [...iterateMatches(root, selector, scope)];
}

/**
 * First match in document order; stops walking at the first hit.
 */
export function selectFirst(
  root: DOMNode,
  selector: ParsedSelector,
  scope: DOMNode | null = null
): ElementNode | null {
  for (const node of iterateMatches(root, selector, scope)) {
    return node;
  }
  return null;
}
