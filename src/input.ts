// Input processing: raw terminal bytes → key events → browser events

import { StringDecoder } from 'node:string_decoder';
import { createKeyEvent, type BrowserEvent, type KeyEvent } from './events.js';

// Common escape sequences
const ESCAPE_MAP: Record<string, { key: string; shiftKey?: boolean }> = {
  '\x1b[A': { key: 'ArrowUp' },
  '\x1b[B': { key: 'ArrowDown' },
  '\x1b[C': { key: 'ArrowRight' },
  '\x1b[D': { key: 'ArrowLeft' },
  '\x1b[H': { key: 'Home' },
  '\x1b[F': { key: 'End' },
  '\x1bOA': { key: 'ArrowUp' },
  '\x1bOB': { key: 'ArrowDown' },
  '\x1bOC': { key: 'ArrowRight' },
  '\x1bOD': { key: 'ArrowLeft' },
  '\x1bOH': { key: 'Home' },
  '\x1bOF': { key: 'End' },
  '\x1b[Z': { key: 'Tab', shiftKey: true },
  '\x1b[2~': { key: 'Insert' },
  '\x1b[3~': { key: 'Delete' },
  '\x1b[5~': { key: 'PageUp' },
  '\x1b[6~': { key: 'PageDown' },
  '\x1b[1~': { key: 'Home' },
  '\x1b[4~': { key: 'End' },
  '\x1b[7~': { key: 'Home' },
  '\x1b[8~': { key: 'End' },
  // SS3 format for F1-F4 (some terminals send these)
  '\x1bOP': { key: 'F1' },
  '\x1bOQ': { key: 'F2' },
  '\x1bOR': { key: 'F3' },
  '\x1bOS': { key: 'F4' },
};

// Function keys - standard xterm/VT100 sequences (16 and 22 are skipped)
const F_KEY_CODES = [11, 12, 13, 14, 15, 17, 18, 19, 20, 21, 23, 24];
F_KEY_CODES.forEach((code, index) => {
  ESCAPE_MAP[`\x1b[${code}~`] = { key: `F${index + 1}` };
});

const MODIFIED_KEYS: Record<string, string> = {
  A: 'ArrowUp',
  B: 'ArrowDown',
  C: 'ArrowRight',
  D: 'ArrowLeft',
  H: 'Home',
  F: 'End',
};

/**
 * Check if character terminates a CSI sequence
 */
function isCsiTerminator(char: string): boolean {
  const code = char.charCodeAt(0);
  return code >= 0x40 && code <= 0x7e;
}

/**
 * Split decoded input into single keys and escape sequences
 */
export function splitSequences(text: string): string[] {
  const sequences: string[] = [];
  let i = 0;
  while (i < text.length) {
    if (text[i] !== '\x1b') {
      const codePoint = text.codePointAt(i) ?? 0;
      const char = String.fromCodePoint(codePoint);
      sequences.push(char);
      i += char.length;
      continue;
    }
    let end = i + 1;
    if (text[end] === '[') {
      // CSI sequence
      end++;
      while (end < text.length && !isCsiTerminator(text[end])) end++;
      if (end < text.length) end++;
    } else if (text[end] === 'O' && end + 1 < text.length) {
      // SS3 sequence
      end += 2;
    } else if (end < text.length) {
      // Alt + character
      const codePoint = text.codePointAt(end) ?? 0;
      end += String.fromCodePoint(codePoint).length;
    }
    sequences.push(text.slice(i, end));
    i = end;
  }
  return sequences;
}

function controlKey(code: number): KeyEvent {
  switch (code) {
    case 8:
    case 127:
      return createKeyEvent('Backspace');
    case 9:
      return createKeyEvent('Tab');
    case 10:
    case 13:
      return createKeyEvent('Enter');
    case 27:
      return createKeyEvent('Escape');
    case 0:
      return createKeyEvent(' ', { ctrlKey: true });
    default:
      return createKeyEvent(String.fromCharCode(code + 96), { ctrlKey: true });
  }
}

/**
 * Key event for one sequence from `splitSequences`, or null for sequences
 * that are not keys (mouse reports, focus events).
 */
export function parseKeySequence(sequence: string): KeyEvent | null {
  if (!sequence.startsWith('\x1b') || sequence === '\x1b') {
    const code = sequence.charCodeAt(0);
    if (code < 32 || code === 127) return controlKey(code);
    return createKeyEvent(sequence);
  }

  const mapping = ESCAPE_MAP[sequence];
  if (mapping) return createKeyEvent(mapping.key, { shiftKey: mapping.shiftKey ?? false });

  // Modified keys (with Ctrl, Alt, Shift): CSI 1;m X or CSI n;m ~
  const modified = /^\x1b\[(\d+);(\d+)([A-Z~])$/.exec(sequence);
  if (modified) {
    const modifierCode = Number.parseInt(modified[2], 10) - 1;
    const key = modified[3] === '~' ? ESCAPE_MAP[`\x1b[${modified[1]}~`]?.key : MODIFIED_KEYS[modified[3]];
    if (key === undefined) return null;
    return createKeyEvent(key, {
      shiftKey: (modifierCode & 1) !== 0,
      altKey: (modifierCode & 2) !== 0,
      ctrlKey: (modifierCode & 4) !== 0,
    });
  }

  if (sequence.startsWith('\x1b[')) return null;

  // Alt + character
  const rest = sequence.slice(1);
  const inner = parseKeySequence(rest);
  return inner ? { ...inner, altKey: true } : null;
}

/**
 * Incremental decoder: multi-byte UTF-8 characters split across reads are
 * held back until complete.
 */
export class KeyDecoder {
  private readonly _decoder = new StringDecoder('utf8');

  processRawInput(data: Uint8Array): KeyEvent[] {
    const text = this._decoder.write(Buffer.from(data));
    const events: KeyEvent[] = [];
    for (const sequence of splitSequences(text)) {
      const event = parseKeySequence(sequence);
      if (event) events.push(event);
    }
    return events;
  }
}

export type InputMode = 'browse' | 'edit';

/**
 * Browser event for a key. In edit mode keys go to the line editor; in
 * browse mode they navigate.
 */
export function mapKey(event: KeyEvent, mode: InputMode): BrowserEvent | null {
  if (event.ctrlKey && event.key === 'c') return { type: 'quit' };

  if (mode === 'edit') {
    switch (event.key) {
      case 'Enter':
        return { type: 'edit', action: { kind: event.altKey ? 'newline' : 'commit' } };
      case 'Escape':
        return { type: 'edit', action: { kind: 'cancel' } };
      case 'Backspace':
        return { type: 'edit', action: { kind: 'delete-back' } };
      case 'Delete':
        return { type: 'edit', action: { kind: 'delete-forward' } };
      case 'ArrowLeft':
        return { type: 'edit', action: { kind: 'left' } };
      case 'ArrowRight':
        return { type: 'edit', action: { kind: 'right' } };
      case 'Home':
        return { type: 'edit', action: { kind: 'home' } };
      case 'End':
        return { type: 'edit', action: { kind: 'end' } };
    }
    if (event.ctrlKey) {
      if (event.key === 'a') return { type: 'edit', action: { kind: 'home' } };
      if (event.key === 'e') return { type: 'edit', action: { kind: 'end' } };
      return null;
    }
    if ([...event.key].length === 1 && !event.altKey) {
      return { type: 'edit', action: { kind: 'insert', text: event.key } };
    }
    return null;
  }

  if (event.altKey) {
    if (event.key === 'ArrowLeft') return { type: 'back' };
    if (event.key === 'ArrowRight') return { type: 'forward' };
    if (event.key === 'Enter') return { type: 'activate-new-tab' };
    return null;
  }
  if (event.ctrlKey) {
    switch (event.key) {
      case 'l':
        return { type: 'open-address' };
      case 'r':
        return { type: 'reload' };
      case 't':
        return { type: 'new-tab' };
      case 'w':
        return { type: 'close-tab' };
      case 'PageDown':
        return { type: 'switch-tab', direction: 1 };
      case 'PageUp':
        return { type: 'switch-tab', direction: -1 };
    }
    return null;
  }

  switch (event.key) {
    case 'q':
      return { type: 'quit' };
    case 'ArrowDown':
    case 'j':
      return { type: 'scroll', delta: 1 };
    case 'ArrowUp':
    case 'k':
      return { type: 'scroll', delta: -1 };
    case 'PageDown':
    case ' ':
      return { type: 'page', direction: 1 };
    case 'PageUp':
    case 'b':
      return { type: 'page', direction: -1 };
    case 'Home':
      return { type: 'home' };
    case 'End':
    case 'G':
      return { type: 'end' };
    case 'Tab':
      return { type: 'focus', direction: event.shiftKey ? -1 : 1 };
    case 'Enter':
      return { type: 'activate' };
    case 'Backspace':
    case 'ArrowLeft':
    case 'h':
      return { type: 'back' };
    case 'ArrowRight':
    case 'l':
      return { type: 'forward' };
    case 'r':
    case 'F5':
      return { type: 'reload' };
    case 'g':
      return { type: 'open-address' };
    case 'i':
      return { type: 'toggle-images' };
    case 't':
      return { type: 'toggle-theme' };
    case ']':
      return { type: 'switch-tab', direction: 1 };
    case '[':
      return { type: 'switch-tab', direction: -1 };
    default:
      return null;
  }
}

/** Key bindings shown by `--help` */
export const KEY_HELP: ReadonlyArray<[string, string]> = [
  ['↑ ↓ / j k', 'scroll one line'],
  ['PgUp PgDn / b Space', 'scroll one page'],
  ['Home End / G', 'top or bottom of the page'],
  ['Tab Shift-Tab', 'next or previous link or field'],
  ['Enter', 'follow link, press button, edit field'],
  ['← → / h l', 'back and forward'],
  ['Alt-Enter', 'open link in a new tab'],
  ['g', 'enter an address'],
  ['Ctrl-T Ctrl-W', 'open or close a tab'],
  ['[ ] / Ctrl-PgUp Ctrl-PgDn', 'previous or next tab'],
  ['r', 'reload'],
  ['i', 'toggle images'],
  ['t', 'toggle light and dark theme'],
  ['q / Ctrl-C', 'quit'],
];
