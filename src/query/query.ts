/**
 * Query facade
 *
 * querySelector-style entry points taking either selector text or an
 * already parsed selector. Text is parsed on every call: callers running the
 * same query repeatedly should parse it once with SelectorGroup.fromString
 * and pass the result instead.
 */

import type { ElementNode } from '../dom/DOMNode.js';
import type { DOMNode } from '../dom/types.js';
import { matches, selectAll as selectAllFrom, selectFirst } from '../selector/matcher.js';
import { Selector, SelectorGroup } from '../selector/Selector.js';

export type SelectorLike = string | Selector | SelectorGroup;

export function toSelectorGroup(selector: SelectorLike): SelectorGroup {
  if (typeof selector === 'string') {
    return SelectorGroup.fromString(selector);
  }
  if (selector instanceof SelectorGroup || selector instanceof Selector) {
    return SelectorGroup.from(selector);
  }
  throw new TypeError(`not a selector or group of selectors: ${String(selector)}`);
}

/**
 * First element of the subtree rooted at `node` (node included) matched by
 * `selector`. Combinator lookups do not leave the subtree.
 */
export function select(node: DOMNode, selector: SelectorLike): ElementNode | null {
  return selectFirst(node, toSelectorGroup(selector), node);
}

/**
 * All elements of the subtree rooted at `node` (node included) matched by
 * `selector`, in document order.
 */
export function selectAll(node: DOMNode, selector: SelectorLike): ElementNode[] {
  return selectAllFrom(node, toSelectorGroup(selector), node);
}

export function matchedBy(node: DOMNode, selector: SelectorLike, scope: DOMNode | null = null): boolean {
  return matches(node, toSelectorGroup(selector), scope);
}
