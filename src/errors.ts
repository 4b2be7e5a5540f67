/**
 * Errors surfaced by the builder and the selector parser.
 *
 * These are the only two checked failure kinds of the library; matching and
 * traversal never throw.
 */

import type { SourcePosition } from './dom/types.js';

/**
 * Raised by DOMBuilder on misuse, and on recovered anomalies in strict mode.
 */
export class DOMBuilderException extends Error {
  /** Where the offending event came from, when the tokenizer knew */
  readonly position: SourcePosition | null;

  constructor(message: string, position: SourcePosition | null = null) {
    super(
      position ? `DOM builder aborted at ${position.line}:${position.column}: ${message}` : message
    );
    this.name = 'DOMBuilderException';
    this.position = position;
  }
}

/**
 * Raised on any selector syntax error.
 */
export class SelectorParserException extends Error {
  /** Reason without the location prefix */
  readonly reason: string;

  /** Offset into `input` where parsing failed */
  readonly position: number;

  readonly input: string;

  constructor(input: string, position: number, reason: string) {
    super(`selector parser aborted at character ${position} of ${JSON.stringify(input)}: ${reason}`);
    this.name = 'SelectorParserException';
    this.reason = reason;
    this.position = position;
    this.input = input;
  }
}
