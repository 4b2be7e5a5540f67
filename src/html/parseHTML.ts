/**
 * One-call entry points sharing a lazily initialized parser
 */

import type { ElementNode } from '../dom/DOMNode.js';
import type { DOMTree } from '../dom/DOMTree.js';
import { HTMLDocumentParser } from './HTMLDocumentParser.js';
import type { HTMLParseOptions } from './types.js';

let shared: Promise<HTMLDocumentParser> | null = null;

function sharedParser(): Promise<HTMLDocumentParser> {
  if (!shared) {
    const parser = new HTMLDocumentParser();
    shared = parser.initialize().then(
      () => parser,
      (error: unknown) => {
        // Let the next call retry
        shared = null;
        throw error;
      }
    );
  }
  return shared;
}

/**
 * Parse HTML source and return its root element, or null for a document
 * without any element.
 *
 * Asynchronous only because the grammar is loaded on first use. For a
 * synchronous call, await `HTMLDocumentParser.initialize()` once and then use
 * `HTMLDocumentParser.parse`, which returns the root element directly.
 */
export async function parseHTML(source: string, options: HTMLParseOptions = {}): Promise<ElementNode | null> {
  const parser = await sharedParser();
  return parser.parse(source, options);
}

/**
 * Parse HTML source into the full forest of top-level nodes
 */
export async function parseHTMLDocument(source: string, options: HTMLParseOptions = {}): Promise<DOMTree> {
  const parser = await sharedParser();
  return parser.parseDocument(source, options);
}
