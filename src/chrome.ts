// Browser chrome: the title bar on the first row and the status line on
// the last, drawn over the page in the theme's ui color

import type { TerminalBuffer } from './buffer.js';
import { fitToWidth, stringWidth, truncateToWidth } from './char-width.js';
import type { Theme } from './theme.js';

/** Rows taken by the chrome (title bar + status line) */
export const CHROME_ROWS = 2;

export type StatusKind = 'info' | 'error';

export interface StatusMessage {
  text: string;
  kind: StatusKind;
}

/** Address being typed after `g` */
export interface AddressEdit {
  text: string;
  /** Cursor position in code units */
  cursor: number;
}

export interface ChromeState {
  title: string;
  url: string;
  status: StatusMessage | null;
  /** Target of the focused link, shown when there is no status message */
  hover: string | null;
  address: AddressEdit | null;
  /** First visible document row, document height and rows shown */
  scrollY: number;
  documentHeight: number;
  pageRows: number;
  /** Active tab index and number of open tabs */
  tabs: { active: number; count: number };
}

const HINT = 'q:quit g:go ←/→:history Tab:next i:images t:theme';

/**
 * Position in the document the way pagers show it: `All`, `Top`, `Bot`
 * or a percentage of the way down.
 */
export function scrollIndicator(scrollY: number, documentHeight: number, pageRows: number): string {
  const maxScroll = Math.max(0, documentHeight - pageRows);
  if (maxScroll === 0) return 'All';
  if (scrollY <= 0) return 'Top';
  if (scrollY >= maxScroll) return 'Bot';
  return `${Math.round((scrollY / maxScroll) * 100)}%`;
}

/**
 * Title bar text: the page title followed by its URL, or just the URL.
 */
export function titleBarText(title: string, url: string): string {
  return title === '' ? url : `${title} | ${url}`;
}

/** `[2/3] ` when more than one tab is open */
export function tabLabel(tabs: ChromeState['tabs']): string {
  return tabs.count > 1 ? `[${tabs.active + 1}/${tabs.count}] ` : '';
}

export function paintTitleBar(buffer: TerminalBuffer, state: ChromeState, theme: Theme): void {
  const width = buffer.width;
  if (buffer.height === 0) return;
  const style = { foreground: theme.text, background: theme.ui, bold: true };

  if (state.address) {
    const prompt = ' Go to: ';
    const room = Math.max(1, width - stringWidth(prompt));
    // drop characters left of the cursor until the cursor cell fits
    const head = [...state.address.text.slice(0, state.address.cursor)];
    while (head.length > 0 && stringWidth(head.join('')) >= room) head.shift();
    const before = head.join('');
    const visible = truncateToWidth(before + state.address.text.slice(state.address.cursor), room);
    buffer.setText(0, 0, fitToWidth(prompt + visible, width), { ...style, bold: false });
    const cursorX = stringWidth(prompt) + stringWidth(before);
    if (cursorX < width) buffer.applyStyle(cursorX, 0, 1, 1, { reverse: true });
    return;
  }

  buffer.setText(0, 0, fitToWidth(` ${tabLabel(state.tabs)}${titleBarText(state.title, state.url)}`, width), style);
}

export function paintStatusLine(buffer: TerminalBuffer, state: ChromeState, theme: Theme): void {
  const width = buffer.width;
  const y = buffer.height - 1;
  if (y < 1) return;

  const indicator = ` ${scrollIndicator(state.scrollY, state.documentHeight, state.pageRows)} `;
  const room = Math.max(0, width - stringWidth(indicator));
  let message: string;
  let foreground = theme.text;
  if (state.status) {
    message = state.status.text;
    if (state.status.kind === 'error') foreground = theme.error;
  } else if (state.hover !== null) {
    message = state.hover;
  } else {
    message = HINT;
  }

  buffer.setText(0, y, fitToWidth(` ${message.replace(/[\r\n\t]+/g, ' ')}`, room), {
    foreground,
    background: theme.ui,
    bold: state.status?.kind === 'error',
  });
  buffer.setText(room, y, truncateToWidth(indicator, width - room), { foreground: theme.text, background: theme.ui });
}

/** Draw both bars */
export function paintChrome(buffer: TerminalBuffer, state: ChromeState, theme: Theme): void {
  paintTitleBar(buffer, state, theme);
  paintStatusLine(buffer, state, theme);
}
