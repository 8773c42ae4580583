// Single-field text editing for form controls and the address bar

import type { EditAction } from './events.js';

export interface EditBuffer {
  text: string;
  /** Cursor position in code units, always on a code point boundary */
  cursor: number;
}

export type EditOutcome =
  | { kind: 'editing'; buffer: EditBuffer }
  | { kind: 'commit'; text: string }
  | { kind: 'cancel' };

function previousBoundary(text: string, index: number): number {
  if (index <= 0) return 0;
  const low = text.charCodeAt(index - 1);
  const high = index >= 2 ? text.charCodeAt(index - 2) : 0;
  const isPair = low >= 0xdc00 && low <= 0xdfff && high >= 0xd800 && high <= 0xdbff;
  return index - (isPair ? 2 : 1);
}

function nextBoundary(text: string, index: number): number {
  if (index >= text.length) return text.length;
  const codePoint = text.codePointAt(index) ?? 0;
  return index + (codePoint > 0xffff ? 2 : 1);
}

/** Start editing with the cursor after the last character */
export function startEdit(text: string): EditBuffer {
  return { text, cursor: text.length };
}

/**
 * Apply one edit action. `multiline` decides whether `newline` inserts a
 * line break or is ignored.
 */
export function applyEdit(buffer: EditBuffer, action: EditAction, multiline = false): EditOutcome {
  const { text, cursor } = buffer;
  const editing = (next: string, at: number): EditOutcome => ({ kind: 'editing', buffer: { text: next, cursor: at } });
  switch (action.kind) {
    case 'insert': {
      const inserted = multiline ? action.text : action.text.replace(/[\r\n]/g, '');
      return editing(text.slice(0, cursor) + inserted + text.slice(cursor), cursor + inserted.length);
    }
    case 'newline':
      return multiline ? editing(text.slice(0, cursor) + '\n' + text.slice(cursor), cursor + 1) : editing(text, cursor);
    case 'delete-back': {
      const start = previousBoundary(text, cursor);
      return editing(text.slice(0, start) + text.slice(cursor), start);
    }
    case 'delete-forward':
      return editing(text.slice(0, cursor) + text.slice(nextBoundary(text, cursor)), cursor);
    case 'left':
      return editing(text, previousBoundary(text, cursor));
    case 'right':
      return editing(text, nextBoundary(text, cursor));
    case 'home':
      return editing(text, 0);
    case 'end':
      return editing(text, text.length);
    case 'commit':
      return { kind: 'commit', text };
    case 'cancel':
      return { kind: 'cancel' };
  }
}
