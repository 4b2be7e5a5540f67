/**
 * Tests for the node model, traversal helpers and DOMTree
 */
import { describe, it, expect } from 'vitest';
import { ElementNode, TextNode } from '../src/dom/DOMNode.js';
import { DOMTree } from '../src/dom/DOMTree.js';
import { ancestors, indexInParent, traverse, walk } from '../src/dom/traversal.js';
import type { DOMNode } from '../src/dom/types.js';
import { build, buildRoot, end, label, start, text } from './helpers.js';

function describeNode(node: DOMNode): string {
  return node.nodeType === 'element' ? label(node) : JSON.stringify(node.data);
}

// <article id="post">
//   <h1 id="title">Notes</h1>
//   <p id="first">alpha <em id="stress">beta</em></p>
//   <p id="second" class="muted small">gamma</p>
// </article>
function article(): ElementNode {
  return buildRoot([
    start('article', { id: 'post' }),
    start('h1', { id: 'title' }),
    text('Notes'),
    end('h1'),
    start('p', { id: 'first' }),
    text('alpha '),
    start('em', { id: 'stress' }),
    text('beta'),
    end('em'),
    end('p'),
    start('p', { id: 'second', class: 'muted small' }),
    text('gamma'),
    end('p'),
    end('article'),
  ]);
}

function byId(root: ElementNode, id: string): ElementNode {
  for (const node of walk(root)) {
    if (node.nodeType === 'element' && node.id === id) return node;
  }
  throw new Error(`no element #${id}`);
}

describe('ElementNode', () => {
  it('should expose attributes case-insensitively', () => {
    const element = new ElementNode('A', [['HREF', '/docs']]);

    expect(element.getAttribute('href')).toBe('/docs');
    expect(element.getAttribute('Href')).toBe('/docs');
    expect(element.hasAttribute('title')).toBe(false);
    expect(element.getAttribute('title')).toBeNull();
  });

  it('should split the class attribute', () => {
    const second = byId(article(), 'second');

    expect(second.classList).toEqual(['muted', 'small']);
    expect(byId(article(), 'title').classList).toEqual([]);
  });

  it('should concatenate descendant text', () => {
    const root = article();

    expect(byId(root, 'first').text).toBe('alpha beta');
    expect(root.textContent).toBe('Notesalpha betagamma');
  });

  it('should list element children only', () => {
    const first = byId(article(), 'first');

    expect(first.children).toHaveLength(2);
    expect(first.elementChildren.map(label)).toEqual(['em#stress']);
    expect(first.firstChild?.text).toBe('alpha ');
    expect(first.firstElementChild?.id).toBe('stress');
    expect(first.lastElementChild?.id).toBe('stress');
  });

  it('should move a node when appending it elsewhere', () => {
    const root = article();
    const em = byId(root, 'stress');
    const second = byId(root, 'second');

    second.appendChild(em);

    expect(em.parent).toBe(second);
    expect(byId(root, 'first').children).toHaveLength(1);
    expect(second.lastChild).toBe(em);
  });

  it('should refuse to append an ancestor', () => {
    const root = article();
    const em = byId(root, 'stress');

    expect(() => em.appendChild(root)).toThrow('cannot append <em> ancestor as its own descendant');
  });

  it('should refuse to remove a node that is not a child', () => {
    const root = article();

    expect(() => root.removeChild(byId(root, 'stress'))).toThrow('node is not a child of <article>');
  });
});

describe('TextNode', () => {
  it('should compare by payload', () => {
    const left = new TextNode('same');
    const right = new TextNode('same');

    expect(left.equals(right)).toBe(true);
    expect(left.equals(new TextNode('other'))).toBe(false);
    expect(left.equals(new ElementNode('same'))).toBe(false);
  });

  it('should append data', () => {
    const node = new TextNode('ab');
    node.appendData('cd');

    expect(node.data).toBe('abcd');
    expect(node.textContent).toBe('abcd');
  });
});

describe('navigation', () => {
  it('should walk in document order', () => {
    expect([...walk(article())].map(describeNode)).toEqual([
      'article#post',
      'h1#title',
      '"Notes"',
      'p#first',
      '"alpha "',
      'em#stress',
      '"beta"',
      'p#second',
      '"gamma"',
    ]);
  });

  it('should list descendants without the node itself', () => {
    expect(byId(article(), 'first').descendants().map(describeNode)).toEqual(['"alpha "', 'em#stress', '"beta"']);
  });

  it('should list siblings nearest first', () => {
    const second = byId(article(), 'second');

    expect(second.previousSiblings().map(describeNode)).toEqual(['p#first', 'h1#title']);
    expect(byId(article(), 'title').nextSiblings().map(describeNode)).toEqual(['p#first', 'p#second']);
  });

  it('should skip text for element siblings', () => {
    const em = byId(article(), 'stress');

    expect(em.previousSibling?.text).toBe('alpha ');
    expect(em.previousElementSibling).toBeNull();
    expect(byId(article(), 'first').nextElementSibling?.id).toBe('second');
  });

  it('should give -1 as index of a top-level node', () => {
    const root = article();

    expect(indexInParent(root)).toBe(-1);
    expect(indexInParent(byId(root, 'second'))).toBe(2);
    expect(root.nextSibling).toBeNull();
  });

  it('should list ancestors up to a root', () => {
    const root = article();
    const em = byId(root, 'stress');

    expect(em.ancestors().map(label)).toEqual(['p#first', 'article#post']);
    expect(em.ancestors(byId(root, 'first')).map(label)).toEqual(['p#first']);
    expect([...ancestors(root, root)]).toEqual([]);
  });

  it('should reject a root outside the ancestral chain', () => {
    const root = article();

    expect(() => byId(root, 'stress').ancestors(byId(root, 'second'))).toThrow(
      'provided root node not found in ancestral chain'
    );
  });

  it('should stop traversal when the callback returns false', () => {
    const seen: string[] = [];
    const completed = traverse(article(), (node) => {
      seen.push(describeNode(node));
      return node.nodeType !== 'element' || node.tagName !== 'h1';
    });

    expect(completed).toBe(false);
    expect(seen).toEqual(['article#post', 'h1#title']);
  });
});

describe('DOMTree', () => {
  function forest(): DOMTree {
    return build([
      text('lead '),
      start('header', { id: 'top' }),
      start('a', { href: '/', class: 'brand' }),
      text('Home'),
      end('a'),
      end('header'),
      start('footer', { id: 'bottom' }),
      start('a', { href: '/about', rel: 'author' }),
      text('About'),
      end('a'),
      end('footer'),
    ]);
  }

  it('should use the first element as root', () => {
    const tree = forest();

    expect(tree.nodes).toHaveLength(3);
    expect(tree.root?.id).toBe('top');
  });

  it('should query across every top-level node', () => {
    const tree = forest();

    expect(tree.querySelectorAll('a').map((a) => a.getAttribute('href'))).toEqual(['/', '/about']);
    expect(tree.querySelector('footer > a')?.text).toBe('About');
    expect(tree.querySelector('nav')).toBeNull();
  });

  it('should find elements by name, id, class and attribute', () => {
    const tree = forest();

    expect(tree.findElements('A')).toHaveLength(2);
    expect(tree.getElementById('bottom')?.tagName).toBe('footer');
    expect(tree.getElementById('missing')).toBeNull();
    expect(tree.getElementsByClassName('brand').map((a) => a.text)).toEqual(['Home']);
    expect(tree.findElementsWithAttribute('rel').map((a) => a.text)).toEqual(['About']);
    expect(tree.findElementsWithAttribute('href', '/')).toHaveLength(1);
  });

  it('should join text content with collapsed whitespace', () => {
    const tree = forest();

    expect(tree.getTextContent()).toBe('lead Home About');
    expect(tree.getTextContent(tree.nodes[2])).toBe('About');
  });
});
