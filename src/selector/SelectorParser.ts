/**
 * SelectorParser
 *
 * Recursive-descent parser over SelectorLexer tokens, one token of
 * lookahead:
 *
 *     group      := selector (',' selector)*
 *     selector   := compound (combinator compound)*
 *     combinator := whitespace | '>' | '+' | '~'
 *     compound   := (tag | '*')? ('#' ident | '.' ident | attr)*
 *     attr       := '[' ident (op value)? ']'
 *     value      := string | name
 *
 * @since 2026-10-18
 */

import { SelectorParserException } from '../errors.js';
import { AttributeSelector, Selector, SelectorGroup } from './Selector.js';
import { SelectorLexer } from './SelectorLexer.js';
import {
  ATTRIBUTE_OPERATORS,
  COMBINATOR_GLYPHS,
  type CompoundSelector,
  type SelectorPart,
  type SelectorToken,
  type SelectorTokenType,
} from './types.js';

// CSS identifier without escapes: no leading digit, no '-' followed by a digit
const IDENTIFIER = /^(?:--|-?[_a-zA-Z\u0080-\uffff])[-\w\u0080-\uffff]*$/;

// Tokens that can open a compound selector
const COMPOUND_START = new Set<SelectorTokenType>(['name', 'star', 'hash', 'dot', 'lbracket', 'colon', 'pipe']);

export class SelectorParser {
  private readonly tokens: SelectorToken[];
  private index = 0;

  /** Offset of each alternative of the last parsed group */
  readonly alternativeStarts: number[] = [];

  constructor(private readonly input: string) {
    this.tokens = SelectorLexer.tokenize(input);
  }

  parseGroup(): SelectorGroup {
    const selectors: Selector[] = [];
    this.skipWhitespace();
    for (;;) {
      this.alternativeStarts.push(this.peek().start);
      selectors.push(this.parseSelector());
      this.skipWhitespace();
      const token = this.peek();
      if (token.type === 'eof') break;
      if (token.type !== 'comma') {
        this.fail(token, `unexpected ${describe(token)}`);
      }
      this.advance();
      this.skipWhitespace();
    }
    return new SelectorGroup(selectors);
  }

  private parseSelector(): Selector {
    const start = this.peek();
    if (start.type === 'eof' || start.type === 'comma') {
      this.fail(start, this.input.trim() === '' ? 'selector group is empty' : 'selector is empty');
    }

    const parts: SelectorPart[] = [{ combinator: null, compound: this.parseCompound() }];

    for (;;) {
      const hadWhitespace = this.skipWhitespace();
      const token = this.peek();

      if (token.type === 'combinator') {
        this.advance();
        this.skipWhitespace();
        const next = this.peek();
        if (next.type === 'eof' || next.type === 'comma') {
          this.fail(next, 'unexpected end at combinator');
        }
        parts.push({ combinator: COMBINATOR_GLYPHS[token.value], compound: this.parseCompound() });
      } else if (hadWhitespace && COMPOUND_START.has(token.type)) {
        parts.push({ combinator: 'descendant', compound: this.parseCompound() });
      } else {
        return new Selector(parts);
      }
    }
  }

  private parseCompound(): CompoundSelector {
    let tag: string | null = null;
    let id: string | null = null;
    const classes: string[] = [];
    const attributes: AttributeSelector[] = [];
    let empty = true;

    const first = this.peek();
    if (first.type === 'name') {
      tag = this.identifier(first).toLowerCase();
      this.advance();
      empty = false;
    } else if (first.type === 'star') {
      this.advance();
      empty = false;
    }

    for (;;) {
      const token = this.peek();
      switch (token.type) {
        case 'hash': {
          this.advance();
          const name = this.expectIdentifier('#');
          if (id !== null) {
            this.fail(token, 'multiple id selectors found');
          }
          id = name;
          break;
        }
        case 'dot':
          this.advance();
          classes.push(this.expectIdentifier('.'));
          break;
        case 'lbracket':
          attributes.push(this.parseAttribute());
          break;
        case 'name':
        case 'star':
          this.fail(token, 'type selector must come first in a compound selector');
          break;
        case 'colon':
          this.fail(
            token,
            this.tokens[this.index + 1]?.type === 'colon'
              ? 'pseudo-elements are not supported'
              : 'pseudo-classes are not supported'
          );
          break;
        case 'pipe':
          this.fail(token, 'namespace prefixes are not supported');
          break;
        default:
          if (empty) {
            this.fail(token, `expecting simple selector, found ${describe(token)}`);
          }
          return { tag, id, classes, attributes };
      }
      empty = false;
    }
  }

  private parseAttribute(): AttributeSelector {
    const open = this.advance();
    this.skipWhitespace();

    const nameToken = this.peek();
    if (nameToken.type === 'pipe') {
      this.fail(nameToken, 'namespace prefixes are not supported');
    }
    if (nameToken.type !== 'name') {
      this.fail(nameToken, `expected attribute name, found ${describe(nameToken)}`);
    }
    const name = this.identifier(nameToken);
    this.advance();
    this.skipWhitespace();

    const operatorToken = this.peek();
    if (operatorToken.type === 'rbracket') {
      this.advance();
      return new AttributeSelector(name, 'exists');
    }
    if (operatorToken.type === 'eof') {
      this.fail(open, 'unterminated attribute selector');
    }
    if (operatorToken.type !== 'match') {
      this.fail(operatorToken, `unrecognized operator ${describe(operatorToken)} in attribute selector`);
    }
    this.advance();
    this.skipWhitespace();

    const valueToken = this.peek();
    if (valueToken.type !== 'string' && valueToken.type !== 'name') {
      this.fail(valueToken, `expected attribute value, found ${describe(valueToken)}`);
    }
    this.advance();
    this.skipWhitespace();

    const close = this.peek();
    if (close.type === 'eof') {
      this.fail(open, 'unterminated attribute selector');
    }
    if (close.type !== 'rbracket') {
      this.fail(close, `expected ']', found ${describe(close)}`);
    }
    this.advance();

    return new AttributeSelector(name, ATTRIBUTE_OPERATORS[operatorToken.value], valueToken.value);
  }

  private expectIdentifier(prefix: string): string {
    const token = this.peek();
    if (token.type !== 'name') {
      this.fail(token, `expected identifier after '${prefix}', found ${describe(token)}`);
    }
    this.advance();
    return this.identifier(token);
  }

  private identifier(token: Extract<SelectorToken, { type: 'name' }>): string {
    if (!IDENTIFIER.test(token.value)) {
      this.fail(token, `invalid identifier ${JSON.stringify(token.value)}`);
    }
    return token.value;
  }

  /**
   * Consume whitespace; true if any was consumed
   */
  private skipWhitespace(): boolean {
    let skipped = false;
    while (this.peek().type === 'whitespace') {
      this.index++;
      skipped = true;
    }
    return skipped;
  }

  private peek(): SelectorToken {
    return this.tokens[Math.min(this.index, this.tokens.length - 1)];
  }

  private advance(): SelectorToken {
    const token = this.peek();
    if (token.type !== 'eof') this.index++;
    return token;
  }

  private fail(token: SelectorToken, reason: string): never {
    throw new SelectorParserException(this.input, token.start, reason);
  }
}

function describe(token: SelectorToken): string {
  switch (token.type) {
    case 'eof':
      return 'end of input';
    case 'name':
    case 'string':
      return `${token.type} ${JSON.stringify(token.value)}`;
    case 'combinator':
    case 'match':
      return `'${token.value}'`;
    default:
      return token.type;
  }
}

/**
 * Parse a comma-separated group of selectors.
 * Throws SelectorParserException on invalid input.
 */
export function parseSelectorGroup(text: string): SelectorGroup {
  return new SelectorParser(text).parseGroup();
}
