/**
 * Selector AST
 *
 * A SelectorGroup is a comma-separated list of Selectors. A Selector is a
 * chain of compound selectors joined by combinators, e.g.
 * `main#main p.important > a.term[href]` is held as three parts:
 *
 *     tag='main' id='main'
 *     " " tag='p' classes=('important')
 *     ">" tag='a' classes=('term') attributes=([href])
 *
 * Parsed selectors are frozen and can be reused across any number of
 * matches; prefer parsing once over passing the same string repeatedly.
 *
 * @since 2026-10-18
 */

import { SelectorParserException } from '../errors.js';
import type { DOMNode } from '../dom/types.js';
import type { ElementNode } from '../dom/DOMNode.js';
import { matchesAttribute, matchesSelector, matchesSelectorGroup } from './matcher.js';
import { SelectorParser, parseSelectorGroup } from './SelectorParser.js';
import type { AttributeSelectorType, Combinator, CompoundSelector, SelectorPart } from './types.js';

const ATTRIBUTE_OPERATOR_TEXT: Readonly<Record<AttributeSelectorType, string>> = {
  exists: '',
  equals: '=',
  'contains-word': '~=',
  'hyphen-prefix': '|=',
  'starts-with': '^=',
  'ends-with': '$=',
  contains: '*=',
};

const COMBINATOR_TEXT: Readonly<Record<Combinator, string>> = {
  descendant: ' ',
  child: ' > ',
  'next-sibling': ' + ',
  'subsequent-sibling': ' ~ ',
};

function quote(value: string): string {
  return `"${value.replace(/\\/g, '\\\\').replace(/"/g, '\\"')}"`;
}

export class AttributeSelector {
  readonly name: string;
  readonly type: AttributeSelectorType;

  /** Comparison value; null only for `exists` */
  readonly value: string | null;

  constructor(name: string, type: AttributeSelectorType, value: string | null = null) {
    if ((type === 'exists') !== (value === null)) {
      throw new Error(`attribute selector of type ${type} ${type === 'exists' ? 'takes no' : 'needs a'} value`);
    }
    this.name = name.toLowerCase();
    this.type = type;
    this.value = value;
    Object.freeze(this);
  }

  matches(element: ElementNode): boolean {
    return matchesAttribute(element, this);
  }

  toString(): string {
    if (this.value === null) return `[${this.name}]`;
    return `[${this.name}${ATTRIBUTE_OPERATOR_TEXT[this.type]}${quote(this.value)}]`;
  }
}

function compoundToString(compound: CompoundSelector): string {
  let text = compound.tag ?? '';
  if (compound.id !== null) text += `#${compound.id}`;
  for (const className of compound.classes) text += `.${className}`;
  for (const attribute of compound.attributes) text += attribute.toString();
  return text || '*';
}

export class Selector {
  /** Compound selectors, left to right */
  readonly parts: readonly SelectorPart[];

  constructor(parts: readonly SelectorPart[]) {
    if (parts.length === 0) {
      throw new Error('a selector needs at least one compound selector');
    }
    parts.forEach((part, index) => {
      if ((index === 0) !== (part.combinator === null)) {
        throw new Error('only the leftmost compound selector has no combinator');
      }
    });
    this.parts = Object.freeze(
      parts.map((part) =>
        Object.freeze({
          combinator: part.combinator,
          compound: Object.freeze({
            tag: part.compound.tag === null ? null : part.compound.tag.toLowerCase(),
            id: part.compound.id,
            classes: Object.freeze([...part.compound.classes]),
            attributes: Object.freeze([...part.compound.attributes]),
          }),
        })
      )
    );
    Object.freeze(this);
  }

  /**
   * Parse exactly one selector; a comma-separated list is rejected at the
   * start of its second alternative.
   */
  static fromString(text: string): Selector {
    const parser = new SelectorParser(text);
    const group = parser.parseGroup();
    if (group.length > 1) {
      throw new SelectorParserException(
        text,
        parser.alternativeStarts[1],
        `expected a single selector, found a group of ${group.length}`
      );
    }
    return group.selectors[0];
  }

  /**
   * The rightmost compound, the one a candidate node must satisfy itself
   */
  get subject(): CompoundSelector {
    return this.parts[this.parts.length - 1].compound;
  }

  matches(node: DOMNode, scope: DOMNode | null = null): boolean {
    return matchesSelector(node, this, scope);
  }

  toString(): string {
    return this.parts
      .map((part) => (part.combinator ? COMBINATOR_TEXT[part.combinator] : '') + compoundToString(part.compound))
      .join('');
  }
}

export class SelectorGroup implements Iterable<Selector> {
  readonly selectors: readonly Selector[];

  constructor(selectors: Iterable<Selector>) {
    this.selectors = Object.freeze([...selectors]);
    if (this.selectors.length === 0) {
      throw new Error('a selector group needs at least one selector');
    }
    Object.freeze(this);
  }

  /**
   * Parse a comma-separated group of selectors.
   */
  static fromString(text: string): SelectorGroup {
    return parseSelectorGroup(text);
  }

  static from(selector: Selector | SelectorGroup): SelectorGroup {
    return selector instanceof SelectorGroup ? selector : new SelectorGroup([selector]);
  }

  get length(): number {
    return this.selectors.length;
  }

  at(index: number): Selector | undefined {
    return this.selectors.at(index);
  }

  [Symbol.iterator](): Iterator<Selector> {
    return this.selectors[Symbol.iterator]();
  }

  /**
   * Matches when any alternative matches.
   */
  matches(node: DOMNode, scope: DOMNode | null = null): boolean {
    return matchesSelectorGroup(node, this, scope);
  }

  toString(): string {
    return this.selectors.map((selector) => selector.toString()).join(', ');
  }
}
