/**
 * Types for HTML parsing
 *
 * @since 2026-10-18
 */

import type { DOMBuilderOptions } from '../builder/types.js';

/**
 * Options for the tokenizer alone
 */
export interface HTMLTokenizeOptions {
  /**
   * Replace character references (`&amp;`, `&#233;`) in text and attribute
   * values. Raw text of script and style is never decoded.
   * @default true
   */
  decodeEntities?: boolean;
}

/**
 * Options for parseHTML / HTMLDocumentParser
 */
export interface HTMLParseOptions extends HTMLTokenizeOptions, DOMBuilderOptions {}
