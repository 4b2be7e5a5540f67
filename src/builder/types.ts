/**
 * Types for the DOM builder
 *
 * The builder consumes the events of any HTML tokenizer; HTMLTokenizer is
 * the one shipped with this package.
 *
 * @since 2026-10-18
 */

import type { SourcePosition } from '../dom/types.js';

export interface StartTagEvent {
  type: 'start-tag';
  name: string;

  /** Attributes in source order; an attribute without a value has '' */
  attributes: ReadonlyArray<readonly [string, string]>;

  /** Written as `<name/>`; only meaningful for void elements */
  selfClosing?: boolean;

  position?: SourcePosition;
}

export interface EndTagEvent {
  type: 'end-tag';
  name: string;
  position?: SourcePosition;
}

export interface TextEvent {
  type: 'text';
  content: string;
  position?: SourcePosition;
}

export interface CommentEvent {
  type: 'comment';
  content: string;
  position?: SourcePosition;
}

/**
 * Lexical event produced by an HTML tokenizer
 */
export type TokenizerEvent = StartTagEvent | EndTagEvent | TextEvent | CommentEvent;

/**
 * Options for DOMBuilder
 */
export interface DOMBuilderOptions {
  /**
   * Raise DOMBuilderException instead of recovering from a spurious end tag,
   * an end tag that implicitly closes other elements, or elements left open
   * at the end of input
   */
  strict?: boolean;

  /** Log every recovered anomaly with console.warn */
  verbose?: boolean;
}
