/**
 * HTML front end: tree-sitter tokenizer plus DOMBuilder
 *
 * @since 2026-10-18
 */

export { HTMLDocumentParser } from './HTMLDocumentParser.js';
export { HTMLTokenizer } from './HTMLTokenizer.js';
export { SourceLines } from './sourceLines.js';
export { parseHTML, parseHTMLDocument } from './parseHTML.js';
export type { HTMLParseOptions, HTMLTokenizeOptions } from './types.js';
