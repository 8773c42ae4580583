// Box generation: styled DOM → box tree.
//
// One box per rendered element; `display: none` produces nothing. Inline
// content directly under a block is gathered into anonymous boxes. A block
// inside an inline element ends the current anonymous box; the inline
// element continues in a fresh box after it. White space is collapsed or
// preserved here, so line breaking only sees processed text.

import type { DomTree, ElementNode, NodeHandle } from '../html/dom.js';
import type { StyleMap } from '../style/cascade.js';
import type { ComputedStyle, ListStyleType } from '../style/properties.js';
import type { Rgba } from '../css/values.js';
import { CELL_HEIGHT_PX, CELL_WIDTH_PX } from '../css/values.js';
import { buttonLabel, controlTypeOf, isTextControl, type ControlType } from '../forms/form-model.js';
import { stringWidth } from '../char-width.js';
import type { Size } from '../geometry.js';
import type { Pixmap } from '../types.js';
import {
  emptyGeometry,
  type AnonymousBox,
  type AtomicBox,
  type BlockBox,
  type FormControlBox,
  type InlineBox,
  type InlineLevel,
  type ReplacedBox,
  type TextRun,
} from './box.js';
import { getLogger } from '../logging.js';

const logger = getLogger('BoxBuilder');

/** Elements nested deeper than this are flattened into text */
const MAX_NESTING = 256;

const TAB_SIZE = 8;

/** Element types that never generate boxes, whatever their style */
const NON_RENDERED = new Set(['head', 'script', 'style', 'template', 'title', 'meta', 'link', 'base', 'noembed', 'noframes', 'iframe', 'object', 'embed', 'video', 'audio', 'canvas', 'svg', 'math']);

const STRIP_LEADING_NEWLINE = new Set(['pre', 'listing', 'textarea']);

export interface BoxBuildOptions {
  /** Decoded pixels for an `<img>`, or null to render its alt text */
  imageFor?: (element: ElementNode) => Pixmap | null;
}

interface InlineFrame {
  node: NodeHandle;
  style: Readonly<ComputedStyle>;
  link: NodeHandle | null;
  background: Rgba | null;
}

function isLink(element: ElementNode): boolean {
  return (element.tagName === 'a' || element.tagName === 'area') && element.attributes.some(a => a.name === 'href');
}

function applyTextTransform(text: string, style: Readonly<ComputedStyle>): string {
  switch (style.textTransform) {
    case 'uppercase':
      return text.toUpperCase();
    case 'lowercase':
      return text.toLowerCase();
    case 'capitalize':
      return text.replace(/(^|[\s\-/(])(\p{L})/gu, (_, before: string, letter: string) => before + letter.toUpperCase());
    case 'none':
      return text;
  }
}

function expandTabs(line: string): string {
  if (!line.includes('\t')) return line;
  let result = '';
  for (const char of line) {
    if (char === '\t') result += ' '.repeat(TAB_SIZE - (stringWidth(result) % TAB_SIZE));
    else result += char;
  }
  return result;
}

const ROMAN: Array<[number, string]> = [
  [1000, 'm'], [900, 'cm'], [500, 'd'], [400, 'cd'], [100, 'c'], [90, 'xc'],
  [50, 'l'], [40, 'xl'], [10, 'x'], [9, 'ix'], [5, 'v'], [4, 'iv'], [1, 'i'],
];

function toRoman(n: number): string {
  if (n <= 0 || n >= 4000) return String(n);
  let result = '';
  for (const [value, letters] of ROMAN) {
    while (n >= value) {
      result += letters;
      n -= value;
    }
  }
  return result;
}

function toAlpha(n: number): string {
  if (n <= 0) return String(n);
  let result = '';
  while (n > 0) {
    n--;
    result = String.fromCharCode(97 + (n % 26)) + result;
    n = Math.floor(n / 26);
  }
  return result;
}

/** Marker text for a list item with the given ordinal */
export function listMarker(type: ListStyleType, ordinal: number): string | null {
  switch (type) {
    case 'none':
      return null;
    case 'disc':
      return '•';
    case 'circle':
      return '◦';
    case 'square':
      return '▪';
    case 'decimal':
      return `${ordinal}.`;
    case 'lower-alpha':
      return `${toAlpha(ordinal)}.`;
    case 'upper-alpha':
      return `${toAlpha(ordinal).toUpperCase()}.`;
    case 'lower-roman':
      return `${toRoman(ordinal)}.`;
    case 'upper-roman':
      return `${toRoman(ordinal).toUpperCase()}.`;
  }
}

/**
 * Cell footprint of an image: explicit CSS size, else the width/height
 * attributes, else the pixel size; one given dimension scales the other.
 */
export function imageFootprint(pixmap: Pixmap, element: ElementNode, style: Readonly<ComputedStyle>): Size {
  const attrPx = (name: string): number | null => {
    const value = element.attributes.find(a => a.name === name)?.value;
    const parsed = value === undefined ? NaN : Number.parseFloat(value);
    return Number.isFinite(parsed) && parsed > 0 ? parsed : null;
  };
  let widthPx = style.width.unit === 'cells' ? style.width.value * CELL_WIDTH_PX : attrPx('width');
  let heightPx = style.height.unit === 'cells' ? style.height.value * CELL_HEIGHT_PX : attrPx('height');
  const aspect = pixmap.width > 0 ? pixmap.height / pixmap.width : 1;
  if (widthPx === null && heightPx === null) {
    widthPx = pixmap.width;
    heightPx = pixmap.height;
  } else if (widthPx === null) {
    widthPx = (heightPx ?? 0) / (aspect || 1);
  } else if (heightPx === null) {
    heightPx = widthPx * aspect;
  }
  return {
    width: Math.max(1, Math.ceil(widthPx / CELL_WIDTH_PX)),
    height: Math.max(1, Math.ceil((heightPx ?? 0) / CELL_HEIGHT_PX)),
  };
}

/**
 * Collects the inline content of one block into anonymous boxes.
 */
class InlineCollector {
  private _items: InlineLevel[] = [];
  /** Inline boxes opened in the current anonymous box, aligned with the frame stack */
  private _open: InlineBox[] = [];
  private _openFrames: InlineFrame[] = [];
  private _afterSpace = true;

  constructor(private readonly _block: BlockBox) {}

  private _container(frames: readonly InlineFrame[]): InlineLevel[] {
    let common = 0;
    while (common < frames.length && common < this._openFrames.length && this._openFrames[common] === frames[common]) {
      common++;
    }
    this._open.length = common;
    this._openFrames.length = common;
    for (let i = common; i < frames.length; i++) {
      const frame = frames[i];
      const box: InlineBox = {
        kind: 'inline',
        node: frame.node,
        style: frame.style,
        geometry: emptyGeometry(),
        children: [],
        fragments: [],
        link: frame.link,
      };
      (i === 0 ? this._items : this._open[i - 1].children).push(box);
      this._open.push(box);
      this._openFrames.push(frame);
    }
    return frames.length === 0 ? this._items : this._open[frames.length - 1].children;
  }

  private _pushRun(text: string, node: NodeHandle | null, style: Readonly<ComputedStyle>, frames: readonly InlineFrame[], linkBase: NodeHandle | null, breakable: boolean): void {
    const container = this._container(frames);
    const top = frames.length > 0 ? frames[frames.length - 1] : undefined;
    const run: TextRun = {
      kind: 'text',
      node,
      text,
      style,
      link: top ? top.link : linkBase,
      background: top ? top.background : null,
      owners: [...this._open],
      breakable,
    };
    container.push(run);
  }

  appendText(data: string, node: NodeHandle | null, style: Readonly<ComputedStyle>, frames: readonly InlineFrame[], linkBase: NodeHandle | null): void {
    const mode = style.whiteSpace;
    if (mode === 'normal' || mode === 'nowrap' || mode === 'pre-line') {
      const lines = mode === 'pre-line' ? data.replace(/\r\n?/g, '\n').split('\n') : [data];
      lines.forEach((line, index) => {
        if (index > 0) this.appendBreak(frames);
        let text = line.replace(/[ \t\n\r\f]+/g, ' ');
        if (this._afterSpace && text.startsWith(' ')) text = text.slice(1);
        if (text === '') return;
        this._afterSpace = text.endsWith(' ');
        this._pushRun(applyTextTransform(text, style), node, style, frames, linkBase, mode !== 'nowrap');
      });
      return;
    }

    const lines = data.replace(/\r\n?/g, '\n').split('\n');
    lines.forEach((line, index) => {
      if (index > 0) this.appendBreak(frames);
      const text = expandTabs(line);
      if (text === '') return;
      this._afterSpace = false;
      this._pushRun(applyTextTransform(text, style), node, style, frames, linkBase, mode === 'pre-wrap');
    });
  }

  appendBreak(frames: readonly InlineFrame[]): void {
    this._container(frames).push({ kind: 'break' });
    this._afterSpace = true;
  }

  appendAtomic(box: AtomicBox, frames: readonly InlineFrame[]): void {
    this._container(frames).push(box);
    this._afterSpace = false;
  }

  /** Close the current anonymous box, if it holds anything */
  flush(): void {
    if (this._items.length > 0) {
      const anonymous: AnonymousBox = {
        kind: 'anonymous',
        node: null,
        style: this._block.style,
        geometry: emptyGeometry(),
        children: this._items,
        lines: [],
      };
      this._block.children.push(anonymous);
    }
    this._items = [];
    this._open = [];
    this._openFrames = [];
    this._afterSpace = true;
  }
}

export class BoxBuilder {
  constructor(
    private readonly _tree: DomTree,
    private readonly _styles: StyleMap,
    private readonly _options: BoxBuildOptions = {},
  ) {}

  /**
   * Build the box tree for the document rooted at `root`. The root always
   * yields a block box, empty when it is not rendered.
   */
  build(root: NodeHandle): BlockBox {
    const element = this._tree.element(root);
    const style = this._styles.get(root);
    if (!element || style.display === 'none') {
      return { kind: 'block', node: root, style, geometry: emptyGeometry(), children: [], marker: null, link: null };
    }
    return this._buildBlock(element, style, null, null, 0);
  }

  private _buildBlock(
    element: ElementNode,
    style: Readonly<ComputedStyle>,
    link: NodeHandle | null,
    marker: string | null,
    depth: number,
  ): BlockBox {
    const block: BlockBox = {
      kind: 'block',
      node: element.handle,
      style,
      geometry: emptyGeometry(),
      children: [],
      marker,
      link: isLink(element) ? element.handle : link,
    };
    const collector = new InlineCollector(block);
    this._addChildren(element, block, collector, [], block.link, depth + 1);
    collector.flush();
    return block;
  }

  private _addChildren(
    element: ElementNode,
    block: BlockBox,
    collector: InlineCollector,
    frames: readonly InlineFrame[],
    link: NodeHandle | null,
    depth: number,
  ): void {
    let ordinal = this._listStart(element);
    const reversed = element.tagName === 'ol' && element.attributes.some(a => a.name === 'reversed');
    let first = true;

    for (const child of element.children) {
      const node = this._tree.node(child);
      if (!node) continue;

      if (node.kind === 'text') {
        let data = node.data;
        if (first && STRIP_LEADING_NEWLINE.has(element.tagName)) data = data.replace(/^\r?\n/, '');
        collector.appendText(data, child, this._styles.get(child), frames, link);
        first = false;
        continue;
      }
      first = false;
      if (node.kind !== 'element') continue;

      const style = this._styles.get(child);
      if (style.display === 'none' || NON_RENDERED.has(node.tagName)) continue;

      if (depth >= MAX_NESTING) {
        logger.trace('Flattening deeply nested content', { tag: node.tagName });
        collector.appendText(this._tree.textContent(child), child, style, frames, link);
        continue;
      }

      if (node.tagName === 'br') {
        collector.appendBreak(frames);
        continue;
      }
      if (node.tagName === 'img') {
        this._addImage(node, style, collector, frames, link);
        continue;
      }
      const controlType = controlTypeOf(node);
      if (controlType !== null) {
        if (controlType !== 'hidden') collector.appendAtomic(this._controlBox(node, style, controlType), frames);
        continue;
      }

      if (style.display === 'inline') {
        const parentFrame = frames.length > 0 ? frames[frames.length - 1] : undefined;
        const frame: InlineFrame = {
          node: child,
          style,
          link: isLink(node) ? child : parentFrame?.link ?? link,
          background: style.backgroundColor ?? parentFrame?.background ?? null,
        };
        this._addChildren(node, block, collector, [...frames, frame], link, depth + 1);
        if (node.tagName === 'td' || node.tagName === 'th') {
          // cells of a row are separated by a space
          collector.appendText(' ', null, style, frames, link);
        }
        continue;
      }

      // block-level child
      collector.flush();
      let marker: string | null = null;
      if (style.display === 'list-item') {
        const value = Number.parseInt(this._tree.getAttribute(child, 'value') ?? '', 10);
        if (Number.isFinite(value)) ordinal = value;
        marker = listMarker(style.listStyleType, ordinal);
        ordinal += reversed ? -1 : 1;
      }
      const innerLink = frames.length > 0 ? frames[frames.length - 1].link : link;
      block.children.push(this._buildBlock(node, style, innerLink, marker, depth));
    }
  }

  private _listStart(element: ElementNode): number {
    if (element.tagName !== 'ol') return 1;
    const start = Number.parseInt(this._tree.getAttribute(element.handle, 'start') ?? '', 10);
    if (Number.isFinite(start)) return start;
    if (element.attributes.some(a => a.name === 'reversed')) {
      return element.children.filter(child => this._tree.element(child)?.tagName === 'li').length;
    }
    return 1;
  }

  private _addImage(
    element: ElementNode,
    style: Readonly<ComputedStyle>,
    collector: InlineCollector,
    frames: readonly InlineFrame[],
    link: NodeHandle | null,
  ): void {
    const pixmap = this._options.imageFor?.(element) ?? null;
    const alt = this._tree.getAttribute(element.handle, 'alt');
    if (pixmap === null || pixmap.width === 0 || pixmap.height === 0) {
      const text = alt ?? '[image]';
      if (text !== '') collector.appendText(text, null, style, frames, link);
      return;
    }
    const top = frames.length > 0 ? frames[frames.length - 1] : undefined;
    const box: ReplacedBox = {
      kind: 'replaced',
      node: element.handle,
      style,
      geometry: emptyGeometry(),
      image: { src: this._tree.getAttribute(element.handle, 'src') ?? null, alt: alt ?? '', pixmap },
      intrinsic: imageFootprint(pixmap, element, style),
      link: top ? top.link : link,
    };
    collector.appendAtomic(box, frames);
  }

  private _controlBox(element: ElementNode, style: Readonly<ComputedStyle>, controlType: ControlType): FormControlBox {
    const intrinsic = defaultControlSize(this._tree, element, controlType);
    if (style.width.unit === 'cells' && isTextControl(controlType)) {
      intrinsic.width = Math.max(3, style.width.value);
    }
    return {
      kind: 'form-control',
      node: element.handle,
      style,
      geometry: emptyGeometry(),
      control: element.handle,
      controlType,
      intrinsic,
    };
  }
}

function collapsed(text: string): string {
  return text.replace(/[ \t\n\r\f]+/g, ' ').trim();
}

/**
 * Footprint of a control from its markup: text fields are `size` plus
 * brackets, buttons their label plus `[ ` and ` ]`, selects the longest
 * option plus `[`, ` ▾]`.
 */
export function defaultControlSize(tree: DomTree, element: ElementNode, type: ControlType): Size {
  const attr = (name: string) => tree.getAttribute(element.handle, name);
  const positive = (value: string | undefined, fallback: number) => {
    const parsed = Number.parseInt(value ?? '', 10);
    return Number.isFinite(parsed) && parsed > 0 ? parsed : fallback;
  };
  switch (type) {
    case 'text':
    case 'password':
      return { width: positive(attr('size'), 20) + 2, height: 1 };
    case 'textarea':
      return { width: positive(attr('cols'), 20) + 2, height: positive(attr('rows'), 2) };
    case 'checkbox':
    case 'radio':
      return { width: 3, height: 1 };
    case 'select': {
      let longest = 0;
      for (const node of tree.descendants(element.handle)) {
        if (node.kind === 'element' && node.tagName === 'option') {
          const label = tree.getAttribute(node.handle, 'label') ?? collapsed(tree.textContent(node.handle));
          longest = Math.max(longest, stringWidth(label));
        }
      }
      return { width: longest + 4, height: 1 };
    }
    case 'submit':
    case 'reset':
    case 'button':
    case 'image':
    case 'file': {
      const label = buttonLabel(tree, element, type);
      return { width: stringWidth(label) + 4, height: 1 };
    }
    case 'hidden':
      return { width: 0, height: 0 };
  }
}

/**
 * Build the box tree for a styled document.
 */
export function buildBoxTree(tree: DomTree, root: NodeHandle, styles: StyleMap, options: BoxBuildOptions = {}): BlockBox {
  return new BoxBuilder(tree, styles, options).build(root);
}
