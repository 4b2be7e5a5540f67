/**
 * Types for the CSS selector subsystem
 *
 * Supported grammar is a subset of Selectors Level 3: type, universal, id,
 * class and attribute selectors joined by the four combinators.
 *
 * @since 2026-10-18
 */

import type { AttributeSelector } from './Selector.js';

/**
 * Relation between two compound selectors
 * - descendant: `A B`
 * - child: `A > B`
 * - next-sibling: `A + B`
 * - subsequent-sibling: `A ~ B`
 */
export type Combinator = 'descendant' | 'child' | 'next-sibling' | 'subsequent-sibling';

/**
 * Attribute selector forms
 * - exists: `[attr]`
 * - equals: `[attr=val]`
 * - contains-word: `[attr~=val]`
 * - hyphen-prefix: `[attr|=val]`
 * - starts-with: `[attr^=val]`
 * - ends-with: `[attr$=val]`
 * - contains: `[attr*=val]`
 */
export type AttributeSelectorType =
  | 'exists'
  | 'equals'
  | 'contains-word'
  | 'hyphen-prefix'
  | 'starts-with'
  | 'ends-with'
  | 'contains';

export type AttributeOperator = '=' | '~=' | '|=' | '^=' | '$=' | '*=';

export const ATTRIBUTE_OPERATORS: Readonly<Record<AttributeOperator, AttributeSelectorType>> = {
  '=': 'equals',
  '~=': 'contains-word',
  '|=': 'hyphen-prefix',
  '^=': 'starts-with',
  '$=': 'ends-with',
  '*=': 'contains',
};

export type CombinatorGlyph = '>' | '+' | '~';

export const COMBINATOR_GLYPHS: Readonly<Record<CombinatorGlyph, Combinator>> = {
  '>': 'child',
  '+': 'next-sibling',
  '~': 'subsequent-sibling',
};

/**
 * A sequence of simple selectors with implicit AND
 */
export interface CompoundSelector {
  /** Type selector, lower-case; null for `*` or when omitted */
  readonly tag: string | null;

  readonly id: string | null;

  /** Every class must be present */
  readonly classes: readonly string[];

  /** Every attribute selector must hold */
  readonly attributes: readonly AttributeSelector[];
}

/**
 * One segment of a selector chain
 */
export interface SelectorPart {
  /** Relation to the segment on the left; null for the leftmost segment */
  readonly combinator: Combinator | null;

  readonly compound: CompoundSelector;
}

/**
 * Lexical token of selector text
 */
export type SelectorToken =
  | { type: 'whitespace'; start: number; end: number }
  | { type: 'name'; value: string; start: number; end: number }
  | { type: 'string'; value: string; start: number; end: number }
  | { type: 'combinator'; value: CombinatorGlyph; start: number; end: number }
  | { type: 'match'; value: AttributeOperator; start: number; end: number }
  | {
      type: 'hash' | 'dot' | 'star' | 'lbracket' | 'rbracket' | 'comma' | 'colon' | 'pipe' | 'eof';
      start: number;
      end: number;
    };

export type SelectorTokenType = SelectorToken['type'];
