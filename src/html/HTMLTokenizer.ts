/**
 * HTMLTokenizer
 *
 * Turns HTML source into a flat stream of tokenizer events using
 * tree-sitter-html. Only the tags of the syntax tree are used; its element
 * nesting is ignored, so that tree construction (and its recoveries) is left
 * entirely to DOMBuilder.
 *
 * Text events carry the exact source between two tags, whitespace included.
 *
 * @since 2026-10-18
 */

import { decodeHTML } from 'entities';
import type { Node, Parser } from 'web-tree-sitter';
import { WasmLoader } from '../wasm/WasmLoader.js';
import type { StartTagEvent, TokenizerEvent } from '../builder/types.js';
import { SourceLines } from './sourceLines.js';
import type { HTMLTokenizeOptions } from './types.js';

interface ScanState {
  source: string;
  lines: SourceLines;
  decode: boolean;

  /** End of the last consumed token */
  offset: number;
}

function childrenOf(node: Node): Node[] {
  return node.children.filter((child): child is Node => child !== null);
}

function findChild(node: Node, ...types: string[]): Node | undefined {
  return childrenOf(node).find((child) => types.includes(child.type));
}

/**
 * A tag tree-sitter had to repair, e.g. `< b` read as a start tag missing
 * its `>`. Its source is left to the surrounding text.
 */
function isRepaired(node: Node): boolean {
  return node.hasError || childrenOf(node).some((child) => child.isMissing);
}

function stripQuotes(value: string): string {
  if ((value.startsWith('"') && value.endsWith('"')) || (value.startsWith("'") && value.endsWith("'"))) {
    return value.slice(1, -1);
  }
  return value;
}

export class HTMLTokenizer {
  private parser: Parser | null = null;

  /**
   * Load the HTML grammar
   */
  async initialize(): Promise<void> {
    if (this.parser) return;

    try {
      const { parser } = await WasmLoader.loadParser('html');
      this.parser = parser;
      console.log('✅ HTMLTokenizer initialized');
    } catch (error) {
      console.error('❌ Failed to initialize HTMLTokenizer:', error);
      throw error;
    }
  }

  get isInitialized(): boolean {
    return this.parser !== null;
  }

  /**
   * Tokenize a whole document. The syntax tree is released once the
   * generator completes or is closed.
   */
  *tokenize(source: string, options: HTMLTokenizeOptions = {}): Generator<TokenizerEvent, void, undefined> {
    if (!this.parser) {
      throw new Error('Tokenizer not initialized. Call initialize() first.');
    }

    const tree = this.parser.parse(source);
    if (!tree) {
      throw new Error('tree-sitter returned no tree for the HTML source');
    }

    const state: ScanState = {
      source,
      lines: new SourceLines(source),
      decode: options.decodeEntities !== false,
      offset: 0,
    };

    try {
      yield* this.scan(tree.rootNode, state);
      yield* this.textUpTo(source.length, state);
    } finally {
      tree.delete();
    }
  }

  private *scan(node: Node, state: ScanState): Generator<TokenizerEvent, void, undefined> {
    // Zero-width nodes are inserted by error recovery and stand for nothing in the source
    if (node.startIndex === node.endIndex) return;

    switch (node.type) {
      case 'start_tag':
      case 'self_closing_tag':
        if (isRepaired(node)) return;
        yield* this.textUpTo(node.startIndex, state);
        yield this.startTag(node, state);
        state.offset = node.endIndex;
        return;

      case 'end_tag':
      case 'erroneous_end_tag': {
        if (isRepaired(node)) return;
        yield* this.textUpTo(node.startIndex, state);
        const nameNode = findChild(node, 'tag_name', 'erroneous_end_tag_name');
        if (nameNode) {
          yield { type: 'end-tag', name: nameNode.text, position: state.lines.positionAt(node.startIndex) };
        }
        state.offset = node.endIndex;
        return;
      }

      case 'comment':
        yield* this.textUpTo(node.startIndex, state);
        yield {
          type: 'comment',
          content: node.text.replace(/^<!--/, '').replace(/-->$/, ''),
          position: state.lines.positionAt(node.startIndex),
        };
        state.offset = node.endIndex;
        return;

      case 'doctype':
        yield* this.textUpTo(node.startIndex, state);
        state.offset = node.endIndex;
        return;

      case 'raw_text':
        // Content of script/style, never decoded
        yield* this.textUpTo(node.startIndex, state);
        yield { type: 'text', content: node.text, position: state.lines.positionAt(node.startIndex) };
        state.offset = node.endIndex;
        return;

      default:
        for (const child of childrenOf(node)) {
          yield* this.scan(child, state);
        }
    }
  }

  /**
   * Emit the source between the last consumed token and `end` as text
   */
  private *textUpTo(end: number, state: ScanState): Generator<TokenizerEvent, void, undefined> {
    if (end <= state.offset) return;

    const raw = state.source.slice(state.offset, end);
    const position = state.lines.positionAt(state.offset);
    state.offset = end;
    yield { type: 'text', content: state.decode ? decodeHTML(raw) : raw, position };
  }

  private startTag(node: Node, state: ScanState): StartTagEvent {
    const attributes: Array<[string, string]> = [];

    for (const child of childrenOf(node)) {
      if (child.type !== 'attribute') continue;

      const nameNode = findChild(child, 'attribute_name');
      if (!nameNode) continue;

      const valueNode = findChild(child, 'attribute_value', 'quoted_attribute_value');
      const value = valueNode ? stripQuotes(valueNode.text) : '';
      attributes.push([nameNode.text, state.decode ? decodeHTML(value) : value]);
    }

    return {
      type: 'start-tag',
      name: findChild(node, 'tag_name')?.text ?? '',
      attributes,
      selfClosing: node.type === 'self_closing_tag',
      position: state.lines.positionAt(node.startIndex),
    };
  }
}
