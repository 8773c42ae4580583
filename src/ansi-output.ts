// ANSI output generation for terminal rendering
// Handles cursor movement optimization, color codes, and cell styling

import type { BufferDiff, Cell, TerminalBuffer } from './buffer.js';
import { quantize } from './paint/color.js';
import type { ColorSupport, Rgb, TerminalColor } from './types.js';

// ANSI escape codes for terminal control
export const ANSI = {
  clearScreen: '\x1b[2J',
  cursorHome: '\x1b[H',
  hideCursor: '\x1b[?25l',
  showCursor: '\x1b[?25h',
  alternateScreen: '\x1b[?1049h',
  normalScreen: '\x1b[?1049l',
  reset: '\x1b[0m',
  // Synchronized output sequences for reducing flicker
  beginSync: '\x1b[?2026h', // Begin synchronized update (DEC Private Mode 2026)
  endSync: '\x1b[?2026l', // End synchronized update
};

export interface AnsiOutputOptions {
  colorSupport: ColorSupport;
}

interface ContiguousSpan {
  x: number;
  y: number;
  cells: Cell[];
}

/** SGR parameters for a quantized color */
export function colorCode(color: TerminalColor, isBackground: boolean): string {
  if (color.kind === 'rgb') {
    return `${isBackground ? 48 : 38};2;${color.r};${color.g};${color.b}`;
  }
  if (color.index < 16) {
    // 16-color palette: SGR 30-37 and 90-97
    const base = color.index < 8 ? 30 + color.index : 90 + color.index - 8;
    return String(base + (isBackground ? 10 : 0));
  }
  return `${isBackground ? 48 : 38};5;${color.index}`;
}

/**
 * Generates optimized ANSI output from buffer differences
 */
export class AnsiOutputGenerator {
  private _colorSupport: ColorSupport;

  constructor(options: AnsiOutputOptions) {
    this._colorSupport = options.colorSupport;
  }

  get colorSupport(): ColorSupport {
    return this._colorSupport;
  }

  setColorSupport(colorSupport: ColorSupport): void {
    this._colorSupport = colorSupport;
  }

  /**
   * Generate optimized ANSI output from buffer differences. The cursor
   * position is unknown at the start, so the first span is placed absolutely.
   */
  generateOptimizedOutput(differences: readonly BufferDiff[], terminalWidth: number): string {
    if (differences.length === 0) return '';

    const commands: string[] = [];
    let currentX = -1;
    let currentY = -1;
    let currentStyle = '';

    // Sort differences by position for optimal cursor movement (row-major order)
    const sorted = [...differences].sort((a, b) => a.y - b.y || a.x - b.x);

    for (const span of this._groupContiguousSpans(sorted)) {
      const movement = this._generateCursorMovement(currentX, currentY, span.x, span.y);
      if (movement) {
        commands.push(movement);
        currentX = span.x;
        currentY = span.y;
      }

      for (const cell of span.cells) {
        // the wide character before it already covered this column
        if (cell.isWideCharContinuation) continue;

        const cellStyle = this.cellStyle(cell);
        if (cellStyle !== currentStyle) {
          commands.push(cellStyle);
          currentStyle = cellStyle;
        }
        commands.push(cell.char);
        currentX += cell.width;

        // Handle line wrapping
        if (currentX >= terminalWidth) {
          currentX = -1;
          currentY = -1;
        }
      }
    }

    commands.push(ANSI.reset);
    return commands.join('');
  }

  /**
   * Whole buffer as lines of text with SGR codes, for printing to a
   * non-interactive stream. Trailing default-styled blanks are kept.
   */
  renderLines(buffer: TerminalBuffer): string[] {
    const lines: string[] = [];
    for (let y = 0; y < buffer.height; y++) {
      let line = '';
      let currentStyle = '';
      for (let x = 0; x < buffer.width; x++) {
        const cell = buffer.getCell(x, y);
        if (!cell || cell.isWideCharContinuation) continue;
        const cellStyle = this.cellStyle(cell);
        if (cellStyle !== currentStyle) {
          line += cellStyle;
          currentStyle = cellStyle;
        }
        line += cell.char;
      }
      if (currentStyle !== '') line += ANSI.reset;
      lines.push(line);
    }
    return lines;
  }

  /**
   * Group differences into contiguous horizontal spans for efficient rendering
   */
  private _groupContiguousSpans(differences: readonly BufferDiff[]): ContiguousSpan[] {
    const spans: ContiguousSpan[] = [];
    let currentSpan: ContiguousSpan | null = null;

    for (const diff of differences) {
      if (!currentSpan || currentSpan.y !== diff.y || currentSpan.x + currentSpan.cells.length !== diff.x) {
        if (currentSpan) spans.push(currentSpan);
        currentSpan = { x: diff.x, y: diff.y, cells: [diff.cell] };
      } else {
        currentSpan.cells.push(diff.cell);
      }
    }
    if (currentSpan) spans.push(currentSpan);

    return spans;
  }

  /**
   * Cheapest cursor movement from one position to another
   */
  private _generateCursorMovement(fromX: number, fromY: number, toX: number, toY: number): string | null {
    if (fromX === toX && fromY === toY) {
      return null;
    }

    const absoluteCmd = `\x1b[${toY + 1};${toX + 1}H`;
    // First render or position unknown
    if (fromX === -1 || fromY === -1) {
      return absoluteCmd;
    }

    const deltaX = toX - fromX;
    const deltaY = toY - fromY;
    const movements: string[] = [];

    // Vertical movement first (more common pattern)
    if (deltaY > 0) movements.push(deltaY === 1 ? '\x1b[B' : `\x1b[${deltaY}B`);
    else if (deltaY < 0) movements.push(deltaY === -1 ? '\x1b[A' : `\x1b[${-deltaY}A`);

    if (deltaX > 0) movements.push(deltaX === 1 ? '\x1b[C' : `\x1b[${deltaX}C`);
    else if (deltaX < 0) movements.push(deltaX === -1 ? '\x1b[D' : `\x1b[${-deltaX}D`);

    const relativeCmd = movements.join('');

    // Special optimization for start of line
    if (toX === 0 && deltaY > 0) {
      const lineCmd = deltaY === 1 ? '\x1b[E' : `\x1b[${deltaY}E`;
      if (lineCmd.length < Math.min(absoluteCmd.length, relativeCmd.length)) return lineCmd;
    }

    return relativeCmd.length < absoluteCmd.length ? relativeCmd : absoluteCmd;
  }

  /**
   * SGR sequence for a cell: a reset followed by its colors and attributes
   */
  cellStyle(cell: Readonly<Cell>): string {
    const codes: string[] = ['0'];

    // Colors only if color support is enabled
    const fg = this._quantize(cell.foreground);
    if (fg) codes.push(colorCode(fg, false));
    const bg = this._quantize(cell.background);
    if (bg) codes.push(colorCode(bg, true));

    // Text attributes work regardless of color support
    if (cell.bold) codes.push('1');
    if (cell.italic) codes.push('3');
    if (cell.underline) codes.push('4');
    if (cell.reverse) codes.push('7');
    if (cell.strikethrough) codes.push('9');

    return `\x1b[${codes.join(';')}m`;
  }

  private _quantize(color: Rgb | null): TerminalColor | null {
    return color === null ? null : quantize(color, this._colorSupport);
  }
}
