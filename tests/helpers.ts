/**
 * Event factories for building trees without the HTML tokenizer
 */
import { DOMBuilder } from '../src/builder/DOMBuilder.js';
import type { DOMBuilderOptions, TokenizerEvent } from '../src/builder/types.js';
import type { ElementNode } from '../src/dom/DOMNode.js';
import type { DOMTree } from '../src/dom/DOMTree.js';

export function start(name: string, attributes: Record<string, string> = {}): TokenizerEvent {
  return { type: 'start-tag', name, attributes: Object.entries(attributes) };
}

export function end(name: string): TokenizerEvent {
  return { type: 'end-tag', name };
}

export function text(content: string): TokenizerEvent {
  return { type: 'text', content };
}

export function comment(content: string): TokenizerEvent {
  return { type: 'comment', content };
}

export function build(events: TokenizerEvent[], options: DOMBuilderOptions = {}): DOMTree {
  return DOMBuilder.build(events, options);
}

export function buildRoot(events: TokenizerEvent[], options: DOMBuilderOptions = {}): ElementNode {
  const root = build(events, options).root;
  if (!root) {
    throw new Error('event stream produced no element');
  }
  return root;
}

/**
 * Compact rendering of a subtree: tag#id for elements, "text" for text
 */
export function label(node: ElementNode): string {
  return node.id ? `${node.tagName}#${node.id}` : node.tagName;
}
