/**
 * Types for WASM loader module
 */

import type { Language, Parser } from 'web-tree-sitter';

export interface LoadedParser {
  parser: Parser;
  language: Language;
}

export type SupportedLanguage = 'html';
