// Tests for the cell grid and the dual-buffer frame diff

import { test } from 'node:test';
import assert from 'node:assert/strict';
import { BLANK_CELL, cellsEqual, DualBuffer, TerminalBuffer } from '../mod.js';

const BLUE = { r: 0, g: 0, b: 255 };

test('TerminalBuffer - creation and bounds', () => {
  const buffer = new TerminalBuffer(10, 5);
  assert.equal(buffer.width, 10);
  assert.equal(buffer.height, 5);
  assert.equal(buffer.getCell(0, 0)?.char, ' ');
  assert.equal(buffer.getCell(-1, 0), undefined);
  assert.equal(buffer.getCell(10, 0), undefined);
  assert.equal(buffer.getCell(0, 5), undefined);

  buffer.setCell(10, 0, { ...BLANK_CELL, char: 'X' });
  buffer.setCell(0, -1, { ...BLANK_CELL, char: 'X' });
  assert.equal(buffer.toString(), Array(5).fill(' '.repeat(10)).join('\n'));
});

test('TerminalBuffer - setText writes styled cells', () => {
  const buffer = new TerminalBuffer(10, 3);
  assert.equal(buffer.setText(2, 1, 'Hello', { bold: true }), 7);
  assert.equal(buffer.rowText(1), '  Hello   ');
  assert.equal(buffer.getCell(2, 1)?.bold, true);
  assert.equal(buffer.getCell(7, 1)?.bold, false);
});

test('TerminalBuffer - setText clips at both edges', () => {
  const buffer = new TerminalBuffer(10, 1);
  assert.equal(buffer.setText(8, 0, 'abc'), 10);
  assert.equal(buffer.rowText(0), '        ab');
  assert.equal(buffer.setText(-1, 0, 'xy'), 1);
  assert.equal(buffer.rowText(0), 'y       ab');
});

test('TerminalBuffer - wide characters take two cells', () => {
  const buffer = new TerminalBuffer(5, 1);
  buffer.setText(0, 0, '日x');
  assert.equal(buffer.getCell(0, 0)?.width, 2);
  assert.equal(buffer.getCell(1, 0)?.isWideCharContinuation, true);
  assert.equal(buffer.rowText(0), '日x  ');

  // overwriting the second half clears the first
  buffer.setText(1, 0, 'a');
  assert.equal(buffer.rowText(0), ' ax  ');

  // no room for the second half
  buffer.setText(4, 0, '日');
  assert.equal(buffer.getCell(4, 0)?.char, ' ');
});

test('TerminalBuffer - backgrounds survive text writes', () => {
  const buffer = new TerminalBuffer(4, 2);
  buffer.setText(0, 0, 'ab');
  buffer.fillBackground(1, 0, 10, 1, BLUE);
  assert.equal(buffer.rowText(0), 'ab  ');
  assert.deepEqual(buffer.getCell(0, 0)?.background, null);
  assert.deepEqual(buffer.getCell(1, 0)?.background, BLUE);
  assert.deepEqual(buffer.getCell(3, 0)?.background, BLUE);

  buffer.setText(2, 0, 'c');
  assert.deepEqual(buffer.getCell(2, 0)?.background, BLUE);

  buffer.applyStyle(0, 0, 2, 1, { underline: true });
  assert.equal(buffer.getCell(1, 0)?.underline, true);
  assert.equal(buffer.getCell(1, 0)?.char, 'b');
  assert.equal(buffer.getCell(2, 0)?.underline, false);
});

test('TerminalBuffer - clear with a background', () => {
  const buffer = new TerminalBuffer(2, 1);
  buffer.setText(0, 0, 'ab');
  buffer.clear(BLUE);
  assert.equal(buffer.rowText(0), '  ');
  assert.deepEqual(buffer.getCell(1, 0)?.background, BLUE);
});

test('TerminalBuffer - diff, equals and clone', () => {
  const a = new TerminalBuffer(3, 2);
  a.setText(0, 0, 'abc');
  const b = a.clone();
  assert.ok(a.equals(b));
  assert.equal(a.diff(b).length, 0);

  b.setText(1, 1, 'z');
  assert.ok(!a.equals(b));
  assert.deepEqual(b.diff(a).map(d => [d.x, d.y, d.cell.char]), [[1, 1, 'z']]);
  assert.equal(a.rowText(1), '   ');

  assert.ok(!a.equals(new TerminalBuffer(3, 3)));
});

test('cellsEqual - compares colors by value', () => {
  const red = { ...BLANK_CELL, foreground: { r: 255, g: 0, b: 0 } };
  assert.ok(cellsEqual(red, { ...BLANK_CELL, foreground: { r: 255, g: 0, b: 0 } }));
  assert.ok(!cellsEqual(red, BLANK_CELL));
  assert.ok(!cellsEqual(BLANK_CELL, { ...BLANK_CELL, reverse: true }));
});

// ---

test('DualBuffer - first frame is full, later frames only report changes', () => {
  const dual = new DualBuffer(4, 2);
  dual.currentBuffer.setText(1, 0, 'Z');
  const first = dual.swapAndGetDiff();
  assert.equal(first.full, true);
  assert.equal(first.diff.length, 8);
  assert.equal(dual.displayBuffer.rowText(0), ' Z  ');
  assert.equal(dual.currentBuffer.rowText(0), '    ');

  dual.currentBuffer.setText(0, 0, 'A');
  const second = dual.swapAndGetDiff();
  assert.equal(second.full, false);
  assert.deepEqual(second.diff.map(d => [d.x, d.y, d.cell.char]), [[0, 0, 'A'], [1, 0, ' ']]);
});

test('DualBuffer - resize and invalidate force a full frame', () => {
  const dual = new DualBuffer(2, 1);
  dual.swapAndGetDiff();
  assert.equal(dual.swapAndGetDiff().full, false);

  dual.resize(3, 2);
  assert.equal(dual.width, 3);
  assert.equal(dual.height, 2);
  const resized = dual.swapAndGetDiff();
  assert.equal(resized.full, true);
  assert.equal(resized.diff.length, 6);

  dual.invalidate();
  assert.equal(dual.swapAndGetDiff().full, true);
});
