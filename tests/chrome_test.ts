// Tests for the title bar and status line

import { test } from 'node:test';
import assert from 'node:assert/strict';
import {
  paintChrome,
  paintStatusLine,
  paintTitleBar,
  scrollIndicator,
  TerminalBuffer,
  THEMES,
  tabLabel,
  titleBarText,
  type ChromeState,
} from '../mod.js';

const THEME = THEMES.dark;

function state(overrides: Partial<ChromeState> = {}): ChromeState {
  return {
    title: 'Home',
    url: 'http://a.test/',
    status: null,
    hover: null,
    address: null,
    scrollY: 0,
    documentHeight: 100,
    pageRows: 10,
    tabs: { active: 0, count: 1 },
    ...overrides,
  };
}

test('scrollIndicator - pager style position', () => {
  assert.equal(scrollIndicator(0, 10, 20), 'All');
  assert.equal(scrollIndicator(0, 100, 20), 'Top');
  assert.equal(scrollIndicator(80, 100, 20), 'Bot');
  assert.equal(scrollIndicator(40, 100, 20), '50%');
  assert.equal(scrollIndicator(1, 100, 20), '1%');
});

test('titleBarText', () => {
  assert.equal(titleBarText('', 'http://a.test/'), 'http://a.test/');
  assert.equal(titleBarText('Home', 'http://a.test/'), 'Home | http://a.test/');
});

test('paintTitleBar - title and URL clipped to the width', () => {
  const buffer = new TerminalBuffer(20, 5);
  paintTitleBar(buffer, state(), THEME);
  assert.equal(buffer.rowText(0), ' Home | http://a.tes');
  assert.equal(buffer.getCell(1, 0)?.bold, true);
  assert.deepEqual(buffer.getCell(19, 0)?.background, THEME.ui);
});

test('paintTitleBar - tab position when several tabs are open', () => {
  const buffer = new TerminalBuffer(24, 5);
  paintTitleBar(buffer, state({ tabs: { active: 1, count: 3 } }), THEME);
  assert.equal(buffer.rowText(0), ' [2/3] Home | http://a.t');
  assert.equal(tabLabel({ active: 0, count: 1 }), '');
});

test('paintTitleBar - address prompt with a cursor', () => {
  const buffer = new TerminalBuffer(20, 5);
  paintTitleBar(buffer, state({ address: { text: 'example', cursor: 7 } }), THEME);
  assert.equal(buffer.rowText(0), ' Go to: example     ');
  assert.equal(buffer.getCell(15, 0)?.reverse, true);
  assert.equal(buffer.getCell(14, 0)?.reverse, false);
});

test('paintTitleBar - long addresses scroll to keep the cursor visible', () => {
  const buffer = new TerminalBuffer(12, 3);
  paintTitleBar(buffer, state({ address: { text: 'abcdefghij', cursor: 10 } }), THEME);
  assert.equal(buffer.rowText(0), ' Go to: hij ');
  assert.equal(buffer.getCell(11, 0)?.reverse, true);
});

test('paintStatusLine - error status with the scroll indicator', () => {
  const buffer = new TerminalBuffer(20, 5);
  paintStatusLine(buffer, state({ status: { text: 'Failed: x', kind: 'error' } }), THEME);
  assert.equal(buffer.rowText(4), ' Failed: x      Top ');
  assert.deepEqual(buffer.getCell(1, 4)?.foreground, THEME.error);
  assert.equal(buffer.getCell(1, 4)?.bold, true);
  assert.deepEqual(buffer.getCell(16, 4)?.foreground, THEME.text);
});

test('paintStatusLine - hover target and line breaks', () => {
  const buffer = new TerminalBuffer(20, 3);
  paintStatusLine(buffer, state({ hover: 'http://x/', scrollY: 90 }), THEME);
  assert.equal(buffer.rowText(2), ' http://x/      Bot ');
  assert.equal(buffer.getCell(1, 2)?.bold, false);

  paintStatusLine(buffer, state({ status: { text: 'a\nb', kind: 'info' }, documentHeight: 1 }), THEME);
  assert.equal(buffer.rowText(2), ' a b            All ');
});

test('paintChrome - a single row gets only the title bar', () => {
  const buffer = new TerminalBuffer(10, 1);
  paintChrome(buffer, state({ title: '' }), THEME);
  assert.equal(buffer.rowText(0), ' http://a.');
});
