// Dual-buffer cell grid for terminal rendering

import { charWidth } from './char-width.js';
import type { Rgb } from './types.js';

export interface Cell {
  char: string;
  /** null: terminal default */
  foreground: Rgb | null;
  background: Rgb | null;
  bold: boolean;
  italic: boolean;
  underline: boolean;
  strikethrough: boolean;
  reverse: boolean; // Swap foreground and background colors
  // Wide character support
  width: number; // Character display width (1 or 2)
  isWideCharContinuation: boolean; // True if this cell is the second part of a wide character
}

/** Attributes that can be applied when writing text */
export type CellStyle = Partial<Omit<Cell, 'char' | 'width' | 'isWideCharContinuation'>>;

export interface BufferDiff {
  x: number;
  y: number;
  cell: Cell;
}

export const BLANK_CELL: Readonly<Cell> = Object.freeze({
  char: ' ',
  foreground: null,
  background: null,
  bold: false,
  italic: false,
  underline: false,
  strikethrough: false,
  reverse: false,
  width: 1,
  isWideCharContinuation: false,
});

function sameColor(a: Rgb | null, b: Rgb | null): boolean {
  if (a === null || b === null) return a === b;
  return a.r === b.r && a.g === b.g && a.b === b.b;
}

export function cellsEqual(a: Readonly<Cell>, b: Readonly<Cell>): boolean {
  return (
    a.char === b.char &&
    sameColor(a.foreground, b.foreground) &&
    sameColor(a.background, b.background) &&
    a.bold === b.bold &&
    a.italic === b.italic &&
    a.underline === b.underline &&
    a.strikethrough === b.strikethrough &&
    a.reverse === b.reverse &&
    a.width === b.width &&
    a.isWideCharContinuation === b.isWideCharContinuation
  );
}

export class TerminalBuffer {
  private _width: number;
  private _height: number;
  private _cells: Cell[][];
  private _defaultCell: Cell;

  constructor(width: number, height: number, defaultCell: Readonly<Cell> = BLANK_CELL) {
    this._width = Math.max(0, width);
    this._height = Math.max(0, height);
    this._defaultCell = { ...defaultCell };
    this._cells = this._createEmptyBuffer();
  }

  get width(): number {
    return this._width;
  }

  get height(): number {
    return this._height;
  }

  // Create empty buffer filled with default cells
  private _createEmptyBuffer(): Cell[][] {
    const buffer: Cell[][] = [];
    for (let y = 0; y < this._height; y++) {
      const row: Cell[] = [];
      for (let x = 0; x < this._width; x++) row.push({ ...this._defaultCell });
      buffer.push(row);
    }
    return buffer;
  }

  /** Reset every cell, optionally with a new default background */
  clear(background?: Rgb | null): void {
    if (background !== undefined) this._defaultCell = { ...this._defaultCell, background };
    this._cells = this._createEmptyBuffer();
  }

  // Resize buffer (content is discarded; every frame is a full repaint)
  resize(newWidth: number, newHeight: number): void {
    this._width = Math.max(0, newWidth);
    this._height = Math.max(0, newHeight);
    this._cells = this._createEmptyBuffer();
  }

  // Set a single cell with wide character support
  setCell(x: number, y: number, cell: Cell): void {
    if (x < 0 || x >= this._width || y < 0 || y >= this._height) {
      return;
    }

    this._clearWideCharAt(x, y);

    if (cell.width === 2) {
      // Not enough space for wide character, skip
      if (x + 1 >= this._width) return;
      this._clearWideCharAt(x + 1, y);
      this._cells[y][x] = { ...cell };
      this._cells[y][x + 1] = { ...cell, char: '', width: 0, isWideCharContinuation: true };
    } else if (cell.width === 1) {
      this._cells[y][x] = { ...cell };
    }
    // Zero-width characters are skipped
  }

  // Clear wide character at position if it exists
  private _clearWideCharAt(x: number, y: number): void {
    const cell = this._cells[y][x];
    if (cell.isWideCharContinuation) {
      if (x > 0) this._cells[y][x - 1] = { ...this._defaultCell, background: this._cells[y][x - 1].background };
    } else if (cell.width === 2 && x + 1 < this._width) {
      this._cells[y][x + 1] = { ...this._defaultCell, background: this._cells[y][x + 1].background };
    }
  }

  getCell(x: number, y: number): Readonly<Cell> | undefined {
    if (x >= 0 && x < this._width && y >= 0 && y < this._height) {
      return this._cells[y][x];
    }
    return undefined;
  }

  /**
   * Write text from (`x`, `y`). Cells keep their background unless the style
   * sets one. Characters left of column 0 are skipped.
   *
   * @returns the column after the last character
   */
  setText(x: number, y: number, text: string, style: CellStyle = {}): number {
    let visualX = x;
    for (const char of text) {
      const width = charWidth(char);
      if (width === 0) continue;
      if (visualX >= this._width) break;
      if (visualX >= 0) {
        const existing = this.getCell(visualX, y);
        this.setCell(visualX, y, {
          ...BLANK_CELL,
          foreground: this._defaultCell.foreground,
          background: existing?.background ?? this._defaultCell.background,
          ...style,
          char,
          width,
        });
      }
      visualX += width;
    }
    return visualX;
  }

  /** Set the background of every cell in a rectangle, keeping characters */
  fillBackground(x: number, y: number, width: number, height: number, background: Rgb): void {
    const x0 = Math.max(0, x);
    const y0 = Math.max(0, y);
    const x1 = Math.min(this._width, x + width);
    const y1 = Math.min(this._height, y + height);
    for (let row = y0; row < y1; row++) {
      for (let col = x0; col < x1; col++) {
        this._cells[row][col] = { ...this._cells[row][col], background };
      }
    }
  }

  /** Apply attributes to every cell of a rectangle, keeping characters */
  applyStyle(x: number, y: number, width: number, height: number, style: CellStyle): void {
    const x0 = Math.max(0, x);
    const y0 = Math.max(0, y);
    const x1 = Math.min(this._width, x + width);
    const y1 = Math.min(this._height, y + height);
    for (let row = y0; row < y1; row++) {
      for (let col = x0; col < x1; col++) {
        this._cells[row][col] = { ...this._cells[row][col], ...style };
      }
    }
  }

  // Compare with another buffer and return differences
  diff(otherBuffer: TerminalBuffer): BufferDiff[] {
    const differences: BufferDiff[] = [];
    for (let y = 0; y < this._height; y++) {
      for (let x = 0; x < this._width; x++) {
        const thisCell = this._cells[y][x];
        const otherCell = otherBuffer.getCell(x, y);
        if (!otherCell || !cellsEqual(thisCell, otherCell)) {
          differences.push({ x, y, cell: thisCell });
        }
      }
    }
    return differences;
  }

  equals(other: TerminalBuffer): boolean {
    return this._width === other._width && this._height === other._height && this.diff(other).length === 0;
  }

  clone(): TerminalBuffer {
    const cloned = new TerminalBuffer(this._width, this._height, this._defaultCell);
    cloned._cells = this._cells.map(row => row.map(cell => ({ ...cell })));
    return cloned;
  }

  /** Characters of one row, continuation cells skipped */
  rowText(y: number): string {
    const row = this._cells[y];
    if (!row) return '';
    let result = '';
    for (const cell of row) {
      if (!cell.isWideCharContinuation) result += cell.char;
    }
    return result;
  }

  // Convert buffer to string representation (useful for debugging)
  toString(): string {
    const rows: string[] = [];
    for (let y = 0; y < this._height; y++) rows.push(this.rowText(y));
    return rows.join('\n');
  }
}

/**
 * Front and back buffers: frames are painted into `currentBuffer`, and
 * `swapAndGetDiff` returns only the cells that changed since the last frame.
 */
export class DualBuffer {
  private _currentBuffer: TerminalBuffer;
  private _previousBuffer: TerminalBuffer;
  private _forceFull = true;

  constructor(width: number, height: number) {
    this._currentBuffer = new TerminalBuffer(width, height);
    this._previousBuffer = new TerminalBuffer(width, height);
  }

  get width(): number {
    return this._currentBuffer.width;
  }

  get height(): number {
    return this._currentBuffer.height;
  }

  get currentBuffer(): TerminalBuffer {
    return this._currentBuffer;
  }

  /** The buffer last sent to the terminal */
  get displayBuffer(): TerminalBuffer {
    return this._previousBuffer;
  }

  resize(newWidth: number, newHeight: number): void {
    this._currentBuffer.resize(newWidth, newHeight);
    this._previousBuffer.resize(newWidth, newHeight);
    this._forceFull = true;
  }

  /** Make the next swap report every cell */
  invalidate(): void {
    this._forceFull = true;
  }

  // Swap buffers and return differences for rendering
  swapAndGetDiff(): { full: boolean; diff: BufferDiff[] } {
    const full = this._forceFull;
    const differences = full
      ? this._currentBuffer.diff(new TerminalBuffer(0, 0))
      : this._currentBuffer.diff(this._previousBuffer);
    this._forceFull = false;

    const temp = this._previousBuffer;
    this._previousBuffer = this._currentBuffer;
    this._currentBuffer = temp;
    this._currentBuffer.clear();
    return { full, diff: differences };
  }
}
