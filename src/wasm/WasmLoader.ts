/**
 * WASM loader for tree-sitter parsers in Node.js
 * Note: Browser environments are not currently supported
 */

import { createRequire } from 'module';
import { Language, Parser } from 'web-tree-sitter';
import type { LoadedParser, SupportedLanguage } from './types.js';

const require = createRequire(import.meta.url);

// Grammar files shipped in node_modules
const GRAMMAR_WASM: Record<SupportedLanguage, string> = {
  html: 'tree-sitter-html/tree-sitter-html.wasm',
};

/**
 * WASM loader for Node.js environments
 */
export class WasmLoader {
  private static parserInstances = new Map<string, LoadedParser>();
  private static runtimeReady: Promise<void> | null = null;

  /**
   * Load tree-sitter and a language grammar
   * Only supports Node.js environment
   */
  static async loadParser(language: SupportedLanguage): Promise<LoadedParser> {
    const cacheKey = `${language}-node`;

    const cached = this.parserInstances.get(cacheKey);
    if (cached) {
      return cached;
    }

    const parser = await this.loadNodeParser(language);
    this.parserInstances.set(cacheKey, parser);
    return parser;
  }

  /**
   * Load a parser for Node.js environment
   * Uses WASM files from node_modules
   */
  private static async loadNodeParser(language: SupportedLanguage): Promise<LoadedParser> {
    const wasmFile = GRAMMAR_WASM[language];
    if (!wasmFile) {
      throw new Error(`Unsupported language: ${language}`);
    }

    // Parser.init() must only run once per process
    this.runtimeReady ??= Parser.init();
    await this.runtimeReady;

    const parser = new Parser();
    const wasmPath = require.resolve(wasmFile);
    const languageInstance = await Language.load(wasmPath);
    parser.setLanguage(languageInstance);

    return { parser, language: languageInstance };
  }

  /**
   * Clear the parser cache
   * Useful for tests or reloading
   */
  static clearCache(): void {
    // Parsers already handed out stay usable
    this.parserInstances.clear();
  }

  /**
   * Check if a parser is already cached
   */
  static isCached(language: SupportedLanguage): boolean {
    const cacheKey = `${language}-node`;
    return this.parserInstances.has(cacheKey);
  }
}
