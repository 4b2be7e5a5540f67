/**
 * In-memory DOM
 *
 * ElementNode / TextNode, the DOMTree forest wrapper and traversal helpers.
 *
 * @since 2026-10-18
 */

export { ElementNode, TextNode } from './DOMNode.js';
export { DOMTree } from './DOMTree.js';
export {
  ancestors,
  descendants,
  indexInParent,
  nextElementSibling,
  nextSiblings,
  previousElementSibling,
  previousSiblings,
  traverse,
  walk,
} from './traversal.js';
export type { DOMNode, NodeType, SourcePosition } from './types.js';
