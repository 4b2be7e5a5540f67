/**
 * DOM builder
 *
 * Stack-based tree construction from HTML tokenizer events.
 *
 * @since 2026-10-18
 */

export { DOMBuilder } from './DOMBuilder.js';
export { isVoidElement } from './voidElements.js';
export type {
  CommentEvent,
  DOMBuilderOptions,
  EndTagEvent,
  StartTagEvent,
  TextEvent,
  TokenizerEvent,
} from './types.js';
