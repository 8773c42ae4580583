// Paint: full repaint of a laid out box tree into a terminal buffer.
//
// Document rows [scrollY, scrollY + viewport.height) map onto buffer rows
// starting at viewport.y. Boxes are painted in tree order, so descendants
// draw over their ancestors' backgrounds.

import type { TerminalBuffer, CellStyle } from '../buffer.js';
import { fitToWidth, stringWidth, truncateToWidth } from '../char-width.js';
import type { Bounds } from '../geometry.js';
import type { DomTree, NodeHandle } from '../html/dom.js';
import type { FormControl, FormModel } from '../forms/form-model.js';
import type { ComputedStyle } from '../style/properties.js';
import type { Theme } from '../theme.js';
import type { Rgb } from '../types.js';
import type { LayoutResult } from '../layout/layout.js';
import { borderBox, type AnonymousBox, type BlockBox, type FormControlBox, type LineFragment, type ReplacedBox } from '../layout/box.js';
import { blend } from './color.js';
import { reduceImage } from './image-reducer.js';

const NBSP = /\u00a0/g;

/** Line being edited in a text control */
export interface EditState {
  node: NodeHandle;
  text: string;
  /** Cursor position in code units */
  cursor: number;
}

export interface PaintContext {
  tree: DomTree;
  forms: FormModel;
  theme: Theme;
  /** Buffer rows the document occupies */
  viewport: Bounds;
  /** First document row shown */
  scrollY: number;
  focused: NodeHandle | null;
  editing?: EditState | null;
  /** Draw images as pixels; otherwise as their alt text box */
  images?: boolean;
}

/** Text drawn for a form control of the given width */
export function controlText(control: FormControl, width: number, edit: EditState | null = null): string {
  const inner = Math.max(0, width - 2);
  switch (control.type) {
    case 'text':
    case 'password': {
      const raw = edit ? edit.text : control.value;
      const shown = control.type === 'password' ? '*'.repeat([...raw].length) : raw;
      // keep the cursor in view while editing
      const start = edit && stringWidth(shown) >= inner ? Math.max(0, [...shown].length - inner + 1) : 0;
      const visible = truncateToWidth([...shown].slice(start).join(''), inner);
      return `[${visible}${'_'.repeat(Math.max(0, inner - stringWidth(visible)))}]`;
    }
    case 'textarea': {
      const first = (edit ? edit.text : control.value).split('\n')[0] ?? '';
      const visible = truncateToWidth(first, inner);
      return `[${visible}${'_'.repeat(Math.max(0, inner - stringWidth(visible)))}]`;
    }
    case 'checkbox':
      return control.checked ? '[x]' : '[ ]';
    case 'radio':
      return control.checked ? '(•)' : '( )';
    case 'select': {
      const label = control.selected.map(index => control.options[index]?.label ?? '').join(', ');
      return `[${fitToWidth(label, Math.max(0, width - 4))} ▾]`;
    }
    case 'submit':
    case 'reset':
    case 'button':
    case 'image':
    case 'file':
      return `[ ${fitToWidth(control.label, Math.max(0, width - 4))} ]`;
    case 'hidden':
      return '';
  }
}

class Painter {
  private readonly _bottom: number;

  constructor(
    private readonly _buffer: TerminalBuffer,
    private readonly _context: PaintContext,
  ) {
    this._bottom = _context.scrollY + _context.viewport.height;
  }

  /** Buffer row of a document row, or null when it is scrolled out */
  private _row(documentRow: number): number | null {
    if (documentRow < this._context.scrollY || documentRow >= this._bottom) return null;
    return documentRow - this._context.scrollY + this._context.viewport.y;
  }

  private _column(documentColumn: number): number {
    return documentColumn + this._context.viewport.x;
  }

  private _fill(rect: Bounds, color: Rgb): void {
    for (let y = rect.y; y < rect.y + rect.height; y++) {
      const row = this._row(y);
      if (row !== null) this._buffer.fillBackground(this._column(rect.x), row, rect.width, 1, color);
    }
  }

  private _text(x: number, y: number, text: string, style: CellStyle): void {
    const row = this._row(y);
    if (row === null) return;
    const limit = this._context.viewport.x + this._context.viewport.width;
    const column = this._column(x);
    if (column >= limit) return;
    this._buffer.setText(column, row, truncateToWidth(text, limit - column), style);
  }

  private _foreground(style: Readonly<ComputedStyle>, background: Rgb): Rgb {
    return style.color ? blend(style.color, background) : this._context.theme.text;
  }

  paint(root: BlockBox, canvas: Rgb): void {
    const { viewport } = this._context;
    for (let y = viewport.y; y < viewport.y + viewport.height; y++) {
      this._buffer.setText(viewport.x, y, ' '.repeat(viewport.width), { background: canvas });
    }

    const stack: Array<{ box: BlockBox | AnonymousBox; background: Rgb }> = [{ box: root, background: canvas }];
    for (let next = stack.pop(); next; next = stack.pop()) {
      const { box, background } = next;
      if (box.kind === 'anonymous') {
        this._anonymous(box, background);
        continue;
      }
      const own = this._block(box, background, box === root);
      for (let i = box.children.length - 1; i >= 0; i--) stack.push({ box: box.children[i], background: own });
    }
  }

  /** Paint a block's background, border and marker; returns the background its content sits on */
  private _block(box: BlockBox, background: Rgb, isRoot: boolean): Rgb {
    const { style } = box;
    const visible = style.visibility === 'visible';
    const outer = borderBox(box.geometry);
    let own = background;
    if (style.backgroundColor && !isRoot) {
      own = blend(style.backgroundColor, background);
      if (visible) this._fill(outer, own);
    }
    if (!visible) return own;

    const { border } = box.geometry;
    if (border.top + border.right + border.bottom + border.left > 0) {
      const double = [style.borderTopStyle, style.borderRightStyle, style.borderBottomStyle, style.borderLeftStyle].includes('double');
      const color = style.borderColor ? blend(style.borderColor, own) : this._foreground(style, own);
      this._border(outer, border.top > 0, border.right > 0, border.bottom > 0, border.left > 0, { foreground: color }, double);
    }

    if (box.marker !== null) {
      const x = box.geometry.content.x - stringWidth(box.marker) - 1;
      this._text(Math.max(0, x), firstLineRow(box), box.marker, { foreground: this._foreground(style, own), bold: style.fontWeight === 'bold' });
    }
    return own;
  }

  private _border(rect: Bounds, top: boolean, right: boolean, bottom: boolean, left: boolean, style: CellStyle, double: boolean): void {
    const chars = double
      ? { h: '═', v: '║', tl: '╔', tr: '╗', bl: '╚', br: '╝' }
      : { h: '─', v: '│', tl: '┌', tr: '┐', bl: '└', br: '┘' };
    const lastX = rect.x + rect.width - 1;
    const lastY = rect.y + rect.height - 1;
    for (let y = rect.y; y <= lastY; y++) {
      for (let x = rect.x; x <= lastX; x++) {
        const onTop = top && y === rect.y;
        const onBottom = bottom && y === lastY;
        const onLeft = left && x === rect.x;
        const onRight = right && x === lastX;
        let char: string | null = null;
        if ((onTop || onBottom) && (onLeft || onRight)) {
          char = onTop ? (onLeft ? chars.tl : chars.tr) : (onLeft ? chars.bl : chars.br);
        } else if (onTop || onBottom) {
          char = chars.h;
        } else if (onLeft || onRight) {
          char = chars.v;
        }
        if (char !== null) this._text(x, y, char, style);
      }
    }
  }

  private _anonymous(box: AnonymousBox, background: Rgb): void {
    for (const line of box.lines) {
      if (this._row(line.y) === null && this._row(line.y + line.height - 1) === null) continue;
      for (const fragment of line.fragments) this._fragment(fragment, background);
    }
  }

  private _fragment(fragment: LineFragment, background: Rgb): void {
    const { theme, focused } = this._context;
    if (fragment.kind === 'atomic') {
      if (fragment.box.kind === 'replaced') this._image(fragment.box, background);
      else this._control(fragment.box, background);
      return;
    }

    const { run } = fragment;
    if (run.style.visibility === 'hidden') return;
    const back = run.background ? blend(run.background, background) : background;
    if (run.background) this._fill({ x: fragment.x, y: fragment.y, width: fragment.width, height: 1 }, back);

    const style: CellStyle = {
      foreground: run.link !== null ? theme.interactive : this._foreground(run.style, back),
      background: back,
      bold: run.style.fontWeight === 'bold',
      italic: run.style.fontStyle === 'italic',
      underline: run.link !== null || run.style.textDecoration === 'underline',
      strikethrough: run.style.textDecoration === 'line-through',
      reverse: run.link !== null && run.link === focused,
    };
    this._text(fragment.x, fragment.y, fragment.text.replace(NBSP, ' '), style);
  }

  private _image(box: ReplacedBox, background: Rgb): void {
    if (box.style.visibility === 'hidden') return;
    const { content } = box.geometry;
    const focused = box.link !== null && box.link === this._context.focused;
    if (this._context.images === false) {
      const label = fitToWidth(box.image.alt === '' ? '[image]' : `[${box.image.alt}]`, content.width);
      this._text(content.x, content.y, label, { foreground: this._context.theme.interactive, background, reverse: focused });
      return;
    }
    const cells = reduceImage(box.image.pixmap, content.width, content.height);
    cells.forEach((row, dy) => {
      row.forEach((cell, dx) => {
        if (cell === null) return;
        this._text(content.x + dx, content.y + dy, cell.char, {
          foreground: cell.foreground,
          background: cell.background ?? background,
          reverse: focused,
        });
      });
    });
  }

  private _control(box: FormControlBox, background: Rgb): void {
    if (box.style.visibility === 'hidden') return;
    const control = this._context.forms.control(box.control);
    if (!control) return;
    const { content } = box.geometry;
    const edit = this._context.editing?.node === box.control ? this._context.editing : null;
    const style: CellStyle = {
      foreground: control.disabled ? this._foreground(box.style, background) : this._context.theme.interactive,
      background,
      reverse: box.control === this._context.focused,
    };
    this._text(content.x, content.y, controlText(control, content.width, edit), style);
    if (control.type === 'textarea') {
      const lines = (edit ? edit.text : control.value).split('\n');
      for (let row = 1; row < content.height; row++) {
        const visible = truncateToWidth(lines[row] ?? '', Math.max(0, content.width - 2));
        const text = `[${visible}${'_'.repeat(Math.max(0, content.width - 2 - stringWidth(visible)))}]`;
        this._text(content.x, content.y + row, text, style);
      }
    }
  }
}

/** Row of the first line of text inside a block, for its list marker */
function firstLineRow(box: BlockBox): number {
  let current: BlockBox = box;
  for (;;) {
    const first = current.children[0];
    if (first === undefined) return current.geometry.content.y;
    if (first.kind === 'anonymous') return first.lines[0]?.y ?? first.geometry.content.y;
    current = first;
  }
}

/** Background of the canvas: the root's, else the body's, else the theme's */
export function canvasColor(tree: DomTree, root: BlockBox, theme: Theme): Rgb {
  const fromRoot = root.style.backgroundColor;
  if (fromRoot && fromRoot.a > 0) return blend(fromRoot, theme.background);
  for (const child of root.children) {
    if (child.kind === 'block' && child.node !== null && tree.element(child.node)?.tagName === 'body') {
      const fromBody = child.style.backgroundColor;
      if (fromBody && fromBody.a > 0) return blend(fromBody, theme.background);
    }
  }
  return theme.background;
}

/**
 * Repaint the viewport from a layout. Paint never fails; content outside the
 * viewport is clipped.
 */
export function paintDocument(buffer: TerminalBuffer, layout: LayoutResult, context: PaintContext): void {
  const canvas = canvasColor(context.tree, layout.root, context.theme);
  new Painter(buffer, context).paint(layout.root, canvas);
}
