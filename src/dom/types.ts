/**
 * Types for the in-memory DOM
 *
 * @since 2026-10-18
 */

import type { ElementNode, TextNode } from './DOMNode.js';

/**
 * A node of the tree: either an element or a run of character data.
 * Closed union, discriminated by `nodeType`.
 */
export type DOMNode = ElementNode | TextNode;

export type NodeType = DOMNode['nodeType'];

/**
 * Location of a token in the HTML source
 */
export interface SourcePosition {
  /** 1-based line */
  line: number;

  /** 0-based column */
  column: number;
}
