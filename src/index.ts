/**
 * html-dom-select
 *
 * Builds an in-memory DOM from HTML and queries it with CSS selectors.
 *
 * ## Recommended API (use these):
 * - parseHTML, parseHTMLDocument - Parse source text
 * - node.select / node.selectAll / node.matchedBy - Query a tree
 * - Selector, SelectorGroup - Parse a selector once, reuse it
 *
 * ## Lower level:
 * - DOMBuilder - Build a tree from any tokenizer's events
 * - HTMLTokenizer, HTMLDocumentParser - tree-sitter front end
 * - matcher functions (matches, iterateMatches, selectFirst)
 */

// =============================================================================
// PUBLIC API
// =============================================================================

export * from './dom/index.js';
export * from './builder/index.js';
export * from './html/index.js';
export { matchedBy, select, selectAll, toSelectorGroup } from './query/index.js';
export type { SelectorLike } from './query/index.js';
export { DOMBuilderException, SelectorParserException } from './errors.js';

// =============================================================================
// INTERNAL API - selector internals, exported for advanced use
// =============================================================================

export {
  AttributeSelector,
  Selector,
  SelectorGroup,
  SelectorLexer,
  SelectorParser,
  iterateMatches,
  matches,
  matchesAttribute,
  matchesCompound,
  matchesSelector,
  matchesSelectorGroup,
  parseSelectorGroup,
  selectFirst,
  selectAll as selectAllFrom,
} from './selector/index.js';
export type {
  AttributeOperator,
  AttributeSelectorType,
  Combinator,
  CompoundSelector,
  ParsedSelector,
  SelectorPart,
  SelectorToken,
  SelectorTokenType,
} from './selector/index.js';

export { WasmLoader } from './wasm/index.js';
export type { LoadedParser, SupportedLanguage } from './wasm/index.js';
