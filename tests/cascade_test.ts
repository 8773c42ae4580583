// Tests for the cascade: ordering, specificity, inheritance and
// presentational hints

import { test } from 'node:test';
import assert from 'node:assert/strict';
import {
  INITIAL_STYLE,
  parseHtml,
  parseStylesheet,
  resolveStyles,
  userAgentRules,
  type ComputedStyle,
  type StyleMap,
} from '../mod.js';

const RED = { r: 255, g: 0, b: 0, a: 255 };
const BLUE = { r: 0, g: 0, b: 255, a: 255 };
const GREEN = { r: 0, g: 128, b: 0, a: 255 };
const PURPLE = { r: 128, g: 0, b: 128, a: 255 };

function cascade(html: string, css = ''): { styles: StyleMap; styleOf: (tag: string) => Readonly<ComputedStyle> } {
  const { tree, root } = parseHtml(html);
  const styles = resolveStyles(tree, root, { userAgent: userAgentRules(), author: parseStylesheet(css) });
  const styleOf = (tag: string) => {
    const element = tree.findFirst(root, tag);
    assert.ok(element, `no <${tag}> in document`);
    return styles.get(element.handle);
  };
  return { styles, styleOf };
}

test('cascade - later rule wins at equal specificity', () => {
  const { styleOf } = cascade('<p class="a">x</p>', '.a{color:red} .a{color:blue}');
  assert.deepEqual(styleOf('p').color, BLUE);
});

test('cascade - id beats class regardless of order', () => {
  assert.deepEqual(cascade('<p id="id" class="a">x</p>', '#id{color:green} .a{color:red}').styleOf('p').color, GREEN);
  assert.deepEqual(cascade('<p id="id" class="a">x</p>', '.a{color:red} #id{color:green}').styleOf('p').color, GREEN);
});

test('cascade - inherited color reaches descendants', () => {
  const { styleOf } = cascade('<div><p><span>x</span></p></div>', 'div { color: purple }');
  assert.deepEqual(styleOf('span').color, PURPLE);
});

test('cascade - non-inherited properties take initial values', () => {
  const { styleOf } = cascade('<div><span>x</span></div>', 'div { margin-left: 16px; background: red }');
  assert.deepEqual(styleOf('div').marginLeft, { unit: 'cells', value: 2 });
  assert.deepEqual(styleOf('span').marginLeft, INITIAL_STYLE.marginLeft);
  assert.equal(styleOf('span').backgroundColor, null);
});

test('cascade - unsupported properties and values are ignored', () => {
  const { styleOf } = cascade('<p>x</p>', 'p { color: red; color: bogus; float: left; display: sideways }');
  assert.deepEqual(styleOf('p').color, RED);
  assert.equal(styleOf('p').display, 'block');
});

test('cascade - user-agent defaults', () => {
  const { styleOf } = cascade('<title>t</title><h1>x</h1><ul><li>a</li></ul><pre>p</pre><a href="/">l</a>');
  assert.equal(styleOf('h1').fontWeight, 'bold');
  assert.equal(styleOf('h1').textTransform, 'uppercase');
  assert.deepEqual(styleOf('h1').marginTop, { unit: 'cells', value: 1 });
  assert.equal(styleOf('head').display, 'none');
  assert.equal(styleOf('li').display, 'list-item');
  assert.equal(styleOf('ul').listStyleType, 'disc');
  assert.deepEqual(styleOf('ul').paddingLeft, { unit: 'cells', value: 4 });
  assert.equal(styleOf('pre').whiteSpace, 'pre');
  assert.equal(styleOf('a').textDecoration, 'underline');
  assert.equal(styleOf('html').display, 'block');
  assert.deepEqual(styleOf('body').marginTop, { unit: 'cells', value: 0 });
});

test('cascade - author rules override the user agent', () => {
  const { styleOf } = cascade('<h1>x</h1>', 'h1 { font-weight: normal; text-transform: none }');
  assert.equal(styleOf('h1').fontWeight, 'normal');
  assert.equal(styleOf('h1').textTransform, 'none');
});

test('cascade - inline style beats an id rule', () => {
  const { styleOf } = cascade('<p id="x" style="color: red">x</p>', '#x { color: blue }');
  assert.deepEqual(styleOf('p').color, RED);
});

test('cascade - presentational hints rank below author rules', () => {
  assert.equal(cascade('<p align="center">x</p>').styleOf('p').textAlign, 'center');
  assert.equal(cascade('<p align="center">x</p>', 'p { text-align: right }').styleOf('p').textAlign, 'right');
  assert.deepEqual(cascade('<font color="red">x</font>').styleOf('font').color, RED);
  assert.deepEqual(cascade('<body bgcolor="#0000ff">x</body>').styleOf('body').backgroundColor, BLUE);
});

test('cascade - inherit, initial and unset', () => {
  const css = 'div { margin-left: 16px; color: red } p { margin-left: inherit } span { color: initial }';
  const { styleOf } = cascade('<div><p><span>x</span><em>y</em></p></div>', css + ' em { color: unset }');
  assert.deepEqual(styleOf('p').marginLeft, { unit: 'cells', value: 2 });
  assert.equal(styleOf('span').color, null);
  assert.deepEqual(styleOf('em').color, RED);
});

test('cascade - currentColor follows the color set earlier', () => {
  const { styleOf } = cascade('<p>x</p>', 'p { color: red; border: solid currentColor }');
  assert.deepEqual(styleOf('p').borderColor, RED);
  assert.equal(styleOf('p').borderTopStyle, 'solid');
});

test('cascade - text nodes share their parent style', () => {
  const { tree, root } = parseHtml('<p>hello</p>');
  const styles = resolveStyles(tree, root, { userAgent: userAgentRules(), author: parseStylesheet('p { color: red }') });
  const p = tree.findFirst(root, 'p');
  assert.ok(p);
  const text = p.children[0];
  assert.equal(styles.get(text), styles.get(p.handle));
});

test('cascade - descendant combinator walks the ancestor chain', () => {
  const { styleOf } = cascade('<div class="box"><section><p>x</p></section></div>', '.box p { color: green } div > p { color: red }');
  assert.deepEqual(styleOf('p').color, GREEN);
});
