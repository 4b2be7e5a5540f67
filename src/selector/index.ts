/**
 * CSS selectors
 *
 * Parses selector text into SelectorGroup / Selector / AttributeSelector
 * and matches them against DOM nodes.
 *
 * @since 2026-10-18
 */

export { AttributeSelector, Selector, SelectorGroup } from './Selector.js';
export { SelectorParser, parseSelectorGroup } from './SelectorParser.js';
export { SelectorLexer } from './SelectorLexer.js';
export {
  iterateMatches,
  matches,
  matchesAttribute,
  matchesCompound,
  matchesSelector,
  matchesSelectorGroup,
  selectAll,
  selectFirst,
} from './matcher.js';
export type { ParsedSelector } from './matcher.js';
export type {
  AttributeOperator,
  AttributeSelectorType,
  Combinator,
  CompoundSelector,
  SelectorPart,
  SelectorToken,
  SelectorTokenType,
} from './types.js';
