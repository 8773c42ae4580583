// Tests for painting laid out documents into a terminal buffer

import { test } from 'node:test';
import assert from 'node:assert/strict';
import {
  buildBoxTree,
  controlText,
  FormModel,
  layoutDocument,
  paintDocument,
  parseHtml,
  parseStylesheet,
  resolveStyles,
  TerminalBuffer,
  THEMES,
  userAgentRules,
  type Bounds,
  type FormControl,
  type NodeHandle,
  type PaintContext,
  type Pixmap,
} from '../mod.js';

const THEME = THEMES.light;
const RED = { r: 255, g: 0, b: 0 };

interface PaintOptions {
  width?: number;
  height?: number;
  viewport?: Bounds;
  scrollY?: number;
  focus?: string;
  images?: boolean;
  pixmap?: Pixmap;
}

function paint(html: string, options: PaintOptions = {}): TerminalBuffer {
  const width = options.width ?? 20;
  const height = options.height ?? 5;
  const viewport = options.viewport ?? { x: 0, y: 0, width, height };
  const { tree, root } = parseHtml(html);
  const styles = resolveStyles(tree, root, { userAgent: userAgentRules(), author: parseStylesheet('') });
  const boxes = buildBoxTree(tree, root, styles, { imageFor: () => options.pixmap ?? null });
  const layout = layoutDocument(boxes, { width: viewport.width, height: viewport.height });
  const forms = FormModel.fromDocument(tree, root);
  let focused: NodeHandle | null = null;
  if (options.focus) {
    const element = tree.findFirst(root, options.focus);
    assert.ok(element);
    focused = element.handle;
  }
  const context: PaintContext = {
    tree,
    forms,
    theme: THEME,
    viewport,
    scrollY: options.scrollY ?? 0,
    focused,
    images: options.images,
  };
  const buffer = new TerminalBuffer(width, height);
  paintDocument(buffer, layout, context);
  return buffer;
}

function solid(width: number, height: number): Pixmap {
  const data = new Uint8Array(width * height * 4);
  for (let i = 0; i < data.length; i += 4) data.set([255, 0, 0, 255], i);
  return { width, height, data };
}

function controlOf(html: string): FormControl {
  const { tree, root } = parseHtml(html);
  const [control] = FormModel.fromDocument(tree, root).controls();
  assert.ok(control);
  return control;
}

test('paintDocument - text on the theme canvas', () => {
  const buffer = paint('<p>hello</p>');
  assert.equal(buffer.rowText(1), 'hello' + ' '.repeat(15));
  const cell = buffer.getCell(0, 1);
  assert.deepEqual(cell?.foreground, THEME.text);
  assert.deepEqual(cell?.background, THEME.background);
  assert.deepEqual(buffer.getCell(19, 4)?.background, THEME.background);
});

test('paintDocument - links are underlined and the focused one reversed', () => {
  const buffer = paint('<p><a href="/x">go</a> on</p>', { focus: 'a' });
  assert.equal(buffer.rowText(1).slice(0, 5), 'go on');
  const link = buffer.getCell(0, 1);
  assert.deepEqual(link?.foreground, THEME.interactive);
  assert.equal(link?.underline, true);
  assert.equal(link?.reverse, true);
  const plain = buffer.getCell(3, 1);
  assert.equal(plain?.underline, false);
  assert.equal(plain?.reverse, false);
});

test('paintDocument - styles become cell attributes', () => {
  const buffer = paint('<p><b>a</b><i>b</i><s>c</s><u>d</u><span style="color: red">e</span></p>');
  assert.equal(buffer.getCell(0, 1)?.bold, true);
  assert.equal(buffer.getCell(1, 1)?.italic, true);
  assert.equal(buffer.getCell(2, 1)?.strikethrough, true);
  assert.equal(buffer.getCell(3, 1)?.underline, true);
  assert.deepEqual(buffer.getCell(4, 1)?.foreground, RED);
});

test('paintDocument - scrolled viewport below a title row', () => {
  const buffer = paint('<p>a</p><p>b</p>', { viewport: { x: 0, y: 1, width: 20, height: 3 }, scrollY: 2 });
  assert.equal(buffer.rowText(2).trimEnd(), 'b');
  assert.equal(buffer.rowText(1).trim(), '');
  assert.equal(buffer.getCell(0, 0)?.background, null);
  assert.deepEqual(buffer.getCell(0, 1)?.background, THEME.background);
  assert.equal(buffer.getCell(0, 4)?.background, null);
});

test('paintDocument - body background fills the canvas', () => {
  const buffer = paint('<body style="background: red"><p>x</p></body>');
  assert.deepEqual(buffer.getCell(0, 0)?.background, RED);
  assert.deepEqual(buffer.getCell(0, 1)?.background, RED);
  assert.deepEqual(buffer.getCell(19, 4)?.background, RED);
});

test('paintDocument - borders', () => {
  const buffer = paint('<div style="border: solid">x</div>');
  assert.equal(buffer.rowText(0), '┌' + '─'.repeat(18) + '┐');
  assert.equal(buffer.rowText(1), '│x' + ' '.repeat(17) + '│');
  assert.equal(buffer.rowText(2), '└' + '─'.repeat(18) + '┘');
  assert.deepEqual(buffer.getCell(0, 0)?.foreground, THEME.text);
});

test('paintDocument - hidden content leaves only the background', () => {
  const buffer = paint('<p style="visibility: hidden">secret</p>');
  assert.equal(buffer.rowText(1), ' '.repeat(20));
});

test('paintDocument - images as blocks or as labels', () => {
  const html = '<div><img src="a.png" alt="cat"></div>';
  const pixels = paint(html, { pixmap: solid(16, 32) });
  assert.equal(pixels.rowText(0).slice(0, 3), '██ ');
  assert.equal(pixels.rowText(1).slice(0, 3), '██ ');
  assert.deepEqual(pixels.getCell(0, 0)?.foreground, RED);

  const labels = paint(html, { pixmap: solid(16, 32), images: false });
  assert.equal(labels.rowText(0).slice(0, 3), '[c ');
});

test('paintDocument - focused form control is reversed', () => {
  const buffer = paint('<form><input name=q value=hi size=4></form>', { focus: 'input' });
  const row = [0, 1, 2, 3, 4].find(y => buffer.rowText(y).startsWith('[hi__]'));
  assert.ok(row !== undefined);
  assert.equal(buffer.getCell(0, row)?.reverse, true);
  assert.deepEqual(buffer.getCell(0, row)?.foreground, THEME.interactive);
});

test('paintDocument - clipped to a narrow viewport', () => {
  const buffer = paint('<pre>abcdefghij</pre>', { width: 10, viewport: { x: 2, y: 0, width: 5, height: 5 } });
  assert.equal(buffer.rowText(1), '  abcde   ');
});

// ---

test('controlText - text fields', () => {
  assert.equal(controlText(controlOf('<input name=t value=abc>'), 7), '[abc__]');
  assert.equal(controlText(controlOf('<input type=password name=p value=abc>'), 7), '[***__]');
  const control = controlOf('<input name=t>');
  assert.equal(controlText(control, 7, { node: control.node, text: 'abcdefgh', cursor: 8 }), '[efgh_]');
});

test('controlText - toggles, selects and buttons', () => {
  assert.equal(controlText(controlOf('<input type=checkbox name=c checked>'), 3), '[x]');
  assert.equal(controlText(controlOf('<input type=radio name=r>'), 3), '( )');
  assert.equal(controlText(controlOf('<select name=s><option>One<option selected>Two</select>'), 9), '[Two   ▾]');
  assert.equal(controlText(controlOf('<input type=submit value=Go>'), 6), '[ Go ]');
  assert.equal(controlText(controlOf('<input type=hidden name=h value=x>'), 4), '');
});
