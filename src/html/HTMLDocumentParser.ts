/**
 * HTMLDocumentParser
 *
 * Parses HTML source into an in-memory DOMTree: HTMLTokenizer produces the
 * events, DOMBuilder assembles them.
 *
 * @since 2026-10-18
 */

import { DOMBuilder } from '../builder/DOMBuilder.js';
import type { ElementNode } from '../dom/DOMNode.js';
import type { DOMTree } from '../dom/DOMTree.js';
import { HTMLTokenizer } from './HTMLTokenizer.js';
import type { HTMLParseOptions } from './types.js';

export class HTMLDocumentParser {
  private readonly tokenizer = new HTMLTokenizer();

  /**
   * Initialize the parser
   */
  async initialize(): Promise<void> {
    await this.tokenizer.initialize();
  }

  get isInitialized(): boolean {
    return this.tokenizer.isInitialized;
  }

  /**
   * Parse a whole document into its forest of top-level nodes
   */
  parseDocument(content: string, options: HTMLParseOptions = {}): DOMTree {
    if (!this.tokenizer.isInitialized) {
      throw new Error('Parser not initialized. Call initialize() first.');
    }
    return DOMBuilder.build(this.tokenizer.tokenize(content, options), options);
  }

  /**
   * Parse and return the first top-level element, or null if there is none
   */
  parse(content: string, options: HTMLParseOptions = {}): ElementNode | null {
    return this.parseDocument(content, options).root;
  }
}
