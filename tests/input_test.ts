// Tests for key decoding and key bindings

import { test } from 'node:test';
import assert from 'node:assert/strict';
import { createKeyEvent, KeyDecoder, mapKey, parseKeySequence, splitSequences } from '../mod.js';

test('splitSequences - characters and escape sequences', () => {
  assert.deepEqual(splitSequences('a\x1b[Ab\x1bOPé\x1bx'), ['a', '\x1b[A', 'b', '\x1bOP', 'é', '\x1bx']);
  assert.deepEqual(splitSequences('\x1b[1;5C😀'), ['\x1b[1;5C', '😀']);
  assert.deepEqual(splitSequences('\x1b'), ['\x1b']);
});

test('parseKeySequence - plain and control keys', () => {
  assert.deepEqual(parseKeySequence('a'), createKeyEvent('a'));
  assert.deepEqual(parseKeySequence('\r'), createKeyEvent('Enter'));
  assert.deepEqual(parseKeySequence('\t'), createKeyEvent('Tab'));
  assert.deepEqual(parseKeySequence('\x7f'), createKeyEvent('Backspace'));
  assert.deepEqual(parseKeySequence('\x1b'), createKeyEvent('Escape'));
  assert.deepEqual(parseKeySequence('\x03'), createKeyEvent('c', { ctrlKey: true }));
  assert.deepEqual(parseKeySequence('\x0c'), createKeyEvent('l', { ctrlKey: true }));
});

test('parseKeySequence - escape sequences', () => {
  assert.deepEqual(parseKeySequence('\x1b[A'), createKeyEvent('ArrowUp'));
  assert.deepEqual(parseKeySequence('\x1bOB'), createKeyEvent('ArrowDown'));
  assert.deepEqual(parseKeySequence('\x1b[6~'), createKeyEvent('PageDown'));
  assert.deepEqual(parseKeySequence('\x1b[Z'), createKeyEvent('Tab', { shiftKey: true }));
  assert.deepEqual(parseKeySequence('\x1b[15~'), createKeyEvent('F5'));
  assert.deepEqual(parseKeySequence('\x1b[1;5C'), createKeyEvent('ArrowRight', { ctrlKey: true }));
  assert.deepEqual(parseKeySequence('\x1b[1;3D'), createKeyEvent('ArrowLeft', { altKey: true }));
  assert.deepEqual(parseKeySequence('\x1b[5;2~'), createKeyEvent('PageUp', { shiftKey: true }));
  assert.deepEqual(parseKeySequence('\x1bx'), createKeyEvent('x', { altKey: true }));
});

test('parseKeySequence - non-key sequences', () => {
  assert.equal(parseKeySequence('\x1b[<0;1;1M'), null);
  assert.equal(parseKeySequence('\x1b[I'), null);
  assert.equal(parseKeySequence('\x1b[1;5Q'), null);
});

test('KeyDecoder - multi-byte characters split across reads', () => {
  const decoder = new KeyDecoder();
  assert.deepEqual(decoder.processRawInput(Uint8Array.of(0x61, 0xc3)), [createKeyEvent('a')]);
  assert.deepEqual(decoder.processRawInput(Uint8Array.of(0xa9, 0x1b, 0x5b, 0x42)), [createKeyEvent('é'), createKeyEvent('ArrowDown')]);
});

// ---

test('mapKey - browse mode', () => {
  assert.deepEqual(mapKey(createKeyEvent('j'), 'browse'), { type: 'scroll', delta: 1 });
  assert.deepEqual(mapKey(createKeyEvent('ArrowUp'), 'browse'), { type: 'scroll', delta: -1 });
  assert.deepEqual(mapKey(createKeyEvent(' '), 'browse'), { type: 'page', direction: 1 });
  assert.deepEqual(mapKey(createKeyEvent('Tab'), 'browse'), { type: 'focus', direction: 1 });
  assert.deepEqual(mapKey(createKeyEvent('Tab', { shiftKey: true }), 'browse'), { type: 'focus', direction: -1 });
  assert.deepEqual(mapKey(createKeyEvent('Enter'), 'browse'), { type: 'activate' });
  assert.deepEqual(mapKey(createKeyEvent('ArrowLeft', { altKey: true }), 'browse'), { type: 'back' });
  assert.deepEqual(mapKey(createKeyEvent('l', { ctrlKey: true }), 'browse'), { type: 'open-address' });
  assert.deepEqual(mapKey(createKeyEvent('i'), 'browse'), { type: 'toggle-images' });
  assert.deepEqual(mapKey(createKeyEvent('t'), 'browse'), { type: 'toggle-theme' });
  assert.deepEqual(mapKey(createKeyEvent('q'), 'browse'), { type: 'quit' });
  assert.equal(mapKey(createKeyEvent('x'), 'browse'), null);
});

test('mapKey - tab keys', () => {
  assert.deepEqual(mapKey(createKeyEvent('t', { ctrlKey: true }), 'browse'), { type: 'new-tab' });
  assert.deepEqual(mapKey(createKeyEvent('w', { ctrlKey: true }), 'browse'), { type: 'close-tab' });
  assert.deepEqual(mapKey(createKeyEvent(']'), 'browse'), { type: 'switch-tab', direction: 1 });
  assert.deepEqual(mapKey(createKeyEvent('['), 'browse'), { type: 'switch-tab', direction: -1 });
  assert.deepEqual(mapKey(createKeyEvent('Enter', { altKey: true }), 'browse'), { type: 'activate-new-tab' });
  const ctrlPageUp = parseKeySequence('\x1b[5;5~');
  assert.ok(ctrlPageUp);
  assert.deepEqual(mapKey(ctrlPageUp, 'browse'), { type: 'switch-tab', direction: -1 });
  assert.equal(mapKey(createKeyEvent('w', { ctrlKey: true }), 'edit'), null);
});

test('mapKey - edit mode', () => {
  assert.deepEqual(mapKey(createKeyEvent('q'), 'edit'), { type: 'edit', action: { kind: 'insert', text: 'q' } });
  assert.deepEqual(mapKey(createKeyEvent('Enter'), 'edit'), { type: 'edit', action: { kind: 'commit' } });
  assert.deepEqual(mapKey(createKeyEvent('Enter', { altKey: true }), 'edit'), { type: 'edit', action: { kind: 'newline' } });
  assert.deepEqual(mapKey(createKeyEvent('Escape'), 'edit'), { type: 'edit', action: { kind: 'cancel' } });
  assert.deepEqual(mapKey(createKeyEvent('a', { ctrlKey: true }), 'edit'), { type: 'edit', action: { kind: 'home' } });
  assert.equal(mapKey(createKeyEvent('F5'), 'edit'), null);
});

test('mapKey - Ctrl-C quits in every mode', () => {
  const ctrlC = createKeyEvent('c', { ctrlKey: true });
  assert.deepEqual(mapKey(ctrlC, 'browse'), { type: 'quit' });
  assert.deepEqual(mapKey(ctrlC, 'edit'), { type: 'quit' });
});
