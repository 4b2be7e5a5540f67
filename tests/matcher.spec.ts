/**
 * Tests for the matching engine
 */
import { describe, it, expect } from 'vitest';
import type { ElementNode } from '../src/dom/DOMNode.js';
import { walk } from '../src/dom/traversal.js';
import { Selector, SelectorGroup } from '../src/selector/Selector.js';
import { iterateMatches, matches, matchesCompound, selectAll, selectFirst } from '../src/selector/matcher.js';
import { buildRoot, end, label, start, text } from './helpers.js';

// <div id="page" class="layout wide">
//   <ul id="list">
//     <li id="a" class="item first" data-k="v">A</li>
//     text
//     <li id="b" class="item" lang="en-GB">B</li>
//     <li id="c" class="item last" title="release notes 2024">C</li>
//   </ul>
//   <p id="note"><a id="link" href="https://example.test/guide.html">guide</a></p>
// </div>
function page(): ElementNode {
  return buildRoot([
    start('div', { id: 'page', class: 'layout wide' }),
    start('ul', { id: 'list' }),
    start('li', { id: 'a', class: 'item first', 'data-k': 'v' }),
    text('A'),
    end('li'),
    text(' between '),
    start('li', { id: 'b', class: 'item', lang: 'en-GB' }),
    text('B'),
    end('li'),
    start('li', { id: 'c', class: 'item last', title: 'release notes 2024' }),
    text('C'),
    end('li'),
    end('ul'),
    start('p', { id: 'note' }),
    start('a', { id: 'link', href: 'https://example.test/guide.html' }),
    text('guide'),
    end('a'),
    end('p'),
    end('div'),
  ]);
}

function byId(root: ElementNode, id: string): ElementNode {
  for (const node of walk(root)) {
    if (node.nodeType === 'element' && node.id === id) return node;
  }
  throw new Error(`no element #${id}`);
}

function ids(elements: ElementNode[]): string[] {
  return elements.map(label);
}

describe('matcher', () => {
  describe('compound selectors', () => {
    it('should match when every simple selector holds', () => {
      const root = buildRoot([start('div', { id: 'x', class: 'item', 'data-k': 'v' }), end('div')]);

      expect(matches(root, Selector.fromString('div.item#x[data-k="v"]'))).toBe(true);
    });

    it.each(['span.item#x[data-k="v"]', 'div.other#x[data-k="v"]', 'div.item#y[data-k="v"]', 'div.item#x[data-k="w"]'])(
      'should fail when one part mismatches: %s',
      (selector) => {
        const root = buildRoot([start('div', { id: 'x', class: 'item', 'data-k': 'v' }), end('div')]);

        expect(matches(root, Selector.fromString(selector))).toBe(false);
      }
    );

    it('should match the universal selector on elements only', () => {
      const root = page();
      const textNode = byId(root, 'a').children[0];

      expect(matches(root, Selector.fromString('*'))).toBe(true);
      expect(matchesCompound(textNode, Selector.fromString('*').subject)).toBe(false);
    });

    it('should require every class', () => {
      const root = page();

      expect(matches(root, Selector.fromString('.wide.layout'))).toBe(true);
      expect(matches(root, Selector.fromString('.wide.narrow'))).toBe(false);
    });

    it('should compare id and class case-sensitively', () => {
      const root = page();

      expect(matches(root, Selector.fromString('#PAGE'))).toBe(false);
      expect(matches(root, Selector.fromString('.Wide'))).toBe(false);
      expect(matches(root, Selector.fromString('DIV'))).toBe(true);
    });
  });

  describe('attribute selectors', () => {
    const cases: Array<[string, string, boolean]> = [
      ['[lang]', 'b', true],
      ['[lang]', 'a', false],
      ['[lang="en-GB"]', 'b', true],
      ['[lang="en"]', 'b', false],
      ['[lang|="en"]', 'b', true],
      ['[lang|="en-GB"]', 'b', true],
      ['[lang|="e"]', 'b', false],
      ['[title~="notes"]', 'c', true],
      ['[title~="note"]', 'c', false],
      ['[title^="release"]', 'c', true],
      ['[title$="2024"]', 'c', true],
      ['[title*="se no"]', 'c', true],
      ['[title*="draft"]', 'c', false],
      ['[title^=""]', 'c', false],
      ['[title$=""]', 'c', false],
      ['[title*=""]', 'c', false],
      ['[title~=""]', 'c', false],
      ['[href$=".html"]', 'link', true],
      ['[HREF^="https://"]', 'link', true],
    ];

    it.each(cases)('%s on #%s should be %s', (selector, id, expected) => {
      const root = page();

      expect(matches(byId(root, id), Selector.fromString(selector))).toBe(expected);
    });
  });

  describe('combinators', () => {
    it('should match descendants at any depth', () => {
      const root = page();

      expect(matches(byId(root, 'link'), Selector.fromString('div a'))).toBe(true);
      expect(matches(byId(root, 'link'), Selector.fromString('ul a'))).toBe(false);
    });

    it('should match children only one level up', () => {
      const root = page();

      expect(matches(byId(root, 'link'), Selector.fromString('p > a'))).toBe(true);
      expect(matches(byId(root, 'link'), Selector.fromString('div > a'))).toBe(false);
    });

    it('should match adjacent siblings across text', () => {
      const root = page();

      expect(matches(byId(root, 'b'), Selector.fromString('li#a + li#b'))).toBe(true);
      expect(matches(byId(root, 'c'), Selector.fromString('li#a + li#c'))).toBe(false);
      expect(matches(byId(root, 'a'), Selector.fromString('li#b + li#a'))).toBe(false);
    });

    it('should match any preceding sibling', () => {
      const root = page();

      expect(matches(byId(root, 'b'), Selector.fromString('li#a ~ li#b'))).toBe(true);
      expect(matches(byId(root, 'c'), Selector.fromString('li#a ~ li#c'))).toBe(true);
      expect(matches(byId(root, 'a'), Selector.fromString('li ~ li#a'))).toBe(false);
    });

    it('should try further candidates when the first one fails', () => {
      const root = page();

      expect(matches(byId(root, 'link'), Selector.fromString('div#page p > a'))).toBe(true);
      // li#b is the nearest preceding sibling but lacks .first
      expect(matches(byId(root, 'c'), Selector.fromString('div > ul > .first ~ .last'))).toBe(true);
    });
  });

  describe('scope', () => {
    it('should not look past the scope for ancestors', () => {
      const root = page();
      const note = byId(root, 'note');

      expect(matches(byId(root, 'link'), Selector.fromString('div a'), note)).toBe(false);
      expect(matches(byId(root, 'link'), Selector.fromString('p a'), note)).toBe(true);
    });

    it('should give the scope no parent or siblings', () => {
      const root = page();
      const b = byId(root, 'b');

      expect(matches(b, Selector.fromString('ul > li'), b)).toBe(false);
      expect(matches(b, Selector.fromString('li + li'), b)).toBe(false);
      expect(matches(b, Selector.fromString('li'), b)).toBe(true);
    });
  });

  describe('selection', () => {
    it('should return matches in document order, root included', () => {
      const root = page();

      expect(ids(selectAll(root, Selector.fromString('li')))).toEqual(['li#a', 'li#b', 'li#c']);
      expect(ids(selectAll(root, Selector.fromString('[id]')))).toEqual([
        'div#page',
        'ul#list',
        'li#a',
        'li#b',
        'li#c',
        'p#note',
        'a#link',
      ]);
    });

    it('should report each element once for a group', () => {
      const root = page();
      const group = SelectorGroup.fromString('.item, li, #b');

      expect(ids(selectAll(root, group))).toEqual(['li#a', 'li#b', 'li#c']);
    });

    it('should match a group when either alternative does', () => {
      const root = page();
      const group = SelectorGroup.fromString('p, li');

      expect(matches(byId(root, 'note'), group)).toBe(true);
      expect(matches(byId(root, 'a'), group)).toBe(true);
      expect(matches(byId(root, 'list'), group)).toBe(false);
    });

    it('should stop at the first match', () => {
      const root = page();
      const iterator = iterateMatches(root, Selector.fromString('li'));

      expect(iterator.next().value).toBe(byId(root, 'a'));
      expect(selectFirst(root, Selector.fromString('li.item'))).toBe(byId(root, 'a'));
      expect(selectFirst(root, Selector.fromString('table'))).toBeNull();
    });
  });
});
