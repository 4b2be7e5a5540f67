/**
 * DOMBuilder
 *
 * Consumes tokenizer events and assembles a node forest with a stack of
 * open elements:
 * - start tags append to the current parent and are pushed, unless void;
 * - an end tag pops up to the nearest open element of the same name,
 *   implicitly closing anything above it; an end tag with no open match is
 *   ignored;
 * - adjacent text runs are coalesced into one TextNode;
 * - comments are dropped;
 * - elements still open at the end are closed.
 *
 * In strict mode the three recoveries above raise DOMBuilderException.
 *
 * @since 2026-10-18
 */

import { ElementNode, TextNode } from '../dom/DOMNode.js';
import { DOMTree } from '../dom/DOMTree.js';
import type { DOMNode, SourcePosition } from '../dom/types.js';
import { DOMBuilderException } from '../errors.js';
import type { DOMBuilderOptions, EndTagEvent, StartTagEvent, TextEvent, TokenizerEvent } from './types.js';
import { isVoidElement } from './voidElements.js';

export class DOMBuilder {
  private readonly stack: ElementNode[] = [];
  private readonly topLevel: DOMNode[] = [];
  private readonly strict: boolean;
  private readonly verbose: boolean;
  private finished = false;
  private lastPosition: SourcePosition | null = null;

  constructor(options: DOMBuilderOptions = {}) {
    this.strict = options.strict === true;
    this.verbose = options.verbose === true;
  }

  /**
   * Build a tree from a complete event stream, consumed once front to back.
   */
  static build(events: Iterable<TokenizerEvent>, options: DOMBuilderOptions = {}): DOMTree {
    const builder = new DOMBuilder(options);
    for (const event of events) {
      builder.feed(event);
    }
    return builder.finish();
  }

  /**
   * Elements currently open, outermost first
   */
  get openElements(): readonly ElementNode[] {
    return [...this.stack];
  }

  get isFinished(): boolean {
    return this.finished;
  }

  feed(event: TokenizerEvent): void {
    if (this.finished) {
      throw new DOMBuilderException(`cannot feed ${event.type} event after the builder finished`, event.position);
    }
    this.lastPosition = event.position ?? this.lastPosition;

    switch (event.type) {
      case 'start-tag':
        this.handleStartTag(event);
        break;
      case 'end-tag':
        this.handleEndTag(event);
        break;
      case 'text':
        this.handleText(event);
        break;
      case 'comment':
        break;
      default: {
        const unreachable: never = event;
        throw new DOMBuilderException(`unknown event ${JSON.stringify(unreachable)}`);
      }
    }
  }

  /**
   * Close whatever is still open and return the forest.
   */
  finish(): DOMTree {
    if (this.finished) {
      throw new DOMBuilderException('builder already finished', this.lastPosition);
    }
    this.finished = true;

    if (this.stack.length > 0) {
      const open = this.stack.map((element) => element.tagName);
      this.recover(`unclosed element(s) at end of input: ${open.join(', ')}`, this.lastPosition);
      this.stack.length = 0;
    }
    return new DOMTree(this.topLevel);
  }

  private handleStartTag(event: StartTagEvent): void {
    const element = new ElementNode(event.name, event.attributes, event.position ?? null);
    this.append(element);
    if (!isVoidElement(element.tagName)) {
      this.stack.push(element);
    }
  }

  private handleEndTag(event: EndTagEvent): void {
    const tagName = event.name.toLowerCase();
    const position = event.position ?? null;

    let index = this.stack.length - 1;
    while (index >= 0 && this.stack[index].tagName !== tagName) index--;

    if (index === -1) {
      const reason = isVoidElement(tagName) ? 'end tag for void element' : 'extra end tag';
      this.recover(`${reason}: ${JSON.stringify(tagName)}`, position);
      return;
    }

    if (index < this.stack.length - 1) {
      const top = this.stack[this.stack.length - 1];
      this.recover(`expecting end tag ${JSON.stringify(top.tagName)}, got ${JSON.stringify(tagName)}`, position);
    }
    this.stack.length = index;
  }

  private handleText(event: TextEvent): void {
    if (event.content === '') return;

    const siblings = this.current()?.children ?? this.topLevel;
    const last = siblings[siblings.length - 1];
    if (last && last.nodeType === 'text') {
      last.appendData(event.content);
      return;
    }
    this.append(new TextNode(event.content));
  }

  private current(): ElementNode | null {
    return this.stack[this.stack.length - 1] ?? null;
  }

  private append(node: DOMNode): void {
    const parent = this.current();
    if (parent) {
      parent.appendChild(node);
    } else {
      this.topLevel.push(node);
    }
  }

  /**
   * Report a recovered anomaly; fatal in strict mode
   */
  private recover(reason: string, position: SourcePosition | null): void {
    if (this.strict) {
      throw new DOMBuilderException(reason, position);
    }
    if (this.verbose) {
      const where = position ? ` at ${position.line}:${position.column}` : '';
      console.warn(`⚠️ DOMBuilder recovered${where}: ${reason}`);
    }
  }
}
