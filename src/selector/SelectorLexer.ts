/**
 * SelectorLexer
 *
 * Splits selector text into tokens. Whitespace is kept as a token: whether
 * it is a descendant combinator or padding is decided by the parser.
 */

import { SelectorParserException } from '../errors.js';
import type { AttributeOperator, SelectorToken } from './types.js';

const NAME_CHAR = /[-\w\u0080-\uffff]/;
const WHITESPACE = /[ \t\n\r\f]/;

// Operators spelled as a glyph followed by '='
const PREFIXED_OPERATORS: Partial<Record<string, AttributeOperator>> = {
  '~': '~=',
  '|': '|=',
  '^': '^=',
  '$': '$=',
  '*': '*=',
};

export class SelectorLexer {
  private cursor = 0;

  constructor(private readonly input: string) {}

  /**
   * Tokenize the whole input; the last token is always `eof`
   */
  static tokenize(input: string): SelectorToken[] {
    const lexer = new SelectorLexer(input);
    const tokens: SelectorToken[] = [];
    let token: SelectorToken;
    do {
      token = lexer.next();
      tokens.push(token);
    } while (token.type !== 'eof');
    return tokens;
  }

  next(): SelectorToken {
    const { input } = this;
    const start = this.cursor;
    if (start >= input.length) {
      return { type: 'eof', start, end: start };
    }

    const char = input[start];

    if (WHITESPACE.test(char)) {
      let end = start + 1;
      while (end < input.length && WHITESPACE.test(input[end])) end++;
      this.cursor = end;
      return { type: 'whitespace', start, end };
    }

    if (NAME_CHAR.test(char)) {
      let end = start + 1;
      while (end < input.length && NAME_CHAR.test(input[end])) end++;
      this.cursor = end;
      return { type: 'name', value: input.slice(start, end), start, end };
    }

    if (char === '"' || char === "'") {
      return this.readString(char);
    }

    const operator = PREFIXED_OPERATORS[char];
    if (operator && input[start + 1] === '=') {
      this.cursor = start + 2;
      return { type: 'match', value: operator, start, end: start + 2 };
    }

    this.cursor = start + 1;
    switch (char) {
      case '=':
        return { type: 'match', value: '=', start, end: start + 1 };
      case '>':
        return { type: 'combinator', value: '>', start, end: start + 1 };
      case '+':
        return { type: 'combinator', value: '+', start, end: start + 1 };
      case '~':
        return { type: 'combinator', value: '~', start, end: start + 1 };
      case '#':
        return { type: 'hash', start, end: start + 1 };
      case '.':
        return { type: 'dot', start, end: start + 1 };
      case '*':
        return { type: 'star', start, end: start + 1 };
      case '[':
        return { type: 'lbracket', start, end: start + 1 };
      case ']':
        return { type: 'rbracket', start, end: start + 1 };
      case ',':
        return { type: 'comma', start, end: start + 1 };
      case ':':
        return { type: 'colon', start, end: start + 1 };
      case '|':
        return { type: 'pipe', start, end: start + 1 };
      case '\\':
        throw new SelectorParserException(input, start, 'escapes are not supported outside strings');
      default:
        throw new SelectorParserException(input, start, `unexpected character ${JSON.stringify(char)}`);
    }
  }

  /**
   * Quoted attribute value. A backslash escapes the next character.
   */
  private readString(quote: string): SelectorToken {
    const { input } = this;
    const start = this.cursor;
    let value = '';
    let i = start + 1;
    while (i < input.length) {
      const char = input[i];
      if (char === quote) {
        this.cursor = i + 1;
        return { type: 'string', value, start, end: i + 1 };
      }
      if (char === '\\') {
        i++;
        if (i >= input.length) break;
        value += input[i];
      } else {
        value += char;
      }
      i++;
    }
    throw new SelectorParserException(input, start, 'unterminated string');
  }
}
