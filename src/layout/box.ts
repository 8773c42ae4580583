// Box tree: a closed set of box kinds sharing one geometry record.
// Layout and paint switch over `kind`; there is no dispatch through methods.

import type { Bounds, Edges, Size } from '../geometry.js';
import type { NodeHandle } from '../html/dom.js';
import type { Rgba } from '../css/values.js';
import type { ComputedStyle } from '../style/properties.js';
import type { ControlType } from '../forms/form-model.js';
import type { Pixmap } from '../types.js';

export interface BoxGeometry {
  /** Content rectangle in document cells */
  content: Bounds;
  margin: Edges;
  border: Edges;
  padding: Edges;
}

interface BoxBase {
  /** Generating element; null for anonymous boxes */
  node: NodeHandle | null;
  style: Readonly<ComputedStyle>;
  geometry: BoxGeometry;
}

export interface BlockBox extends BoxBase {
  kind: 'block';
  children: BlockLevelBox[];
  /** List marker text drawn left of the first line */
  marker: string | null;
  /** Enclosing link element, when the block sits inside one */
  link: NodeHandle | null;
}

/** Wraps a run of inline content directly under a block; owns the line boxes */
export interface AnonymousBox extends BoxBase {
  kind: 'anonymous';
  children: InlineLevel[];
  lines: LineBox[];
}

export interface InlineBox extends BoxBase {
  kind: 'inline';
  children: InlineLevel[];
  /** One rectangle per line the box spans; `geometry.content` is their union */
  fragments: Bounds[];
  link: NodeHandle | null;
}

export interface ImageRef {
  src: string | null;
  alt: string;
  pixmap: Pixmap;
}

export interface ReplacedBox extends BoxBase {
  kind: 'replaced';
  image: ImageRef;
  /** Footprint in cells before shrinking to the line */
  intrinsic: Size;
  link: NodeHandle | null;
}

export interface FormControlBox extends BoxBase {
  kind: 'form-control';
  /** The control element; the form model is keyed by it */
  control: NodeHandle;
  controlType: ControlType;
  intrinsic: Size;
}

export type Box = BlockBox | AnonymousBox | InlineBox | ReplacedBox | FormControlBox;
export type BlockLevelBox = BlockBox | AnonymousBox;
export type AtomicBox = ReplacedBox | FormControlBox;

/** Text after white-space processing, with the context it inherits */
export interface TextRun {
  kind: 'text';
  node: NodeHandle | null;
  text: string;
  style: Readonly<ComputedStyle>;
  link: NodeHandle | null;
  /** Background of the nearest inline ancestor that sets one */
  background: Rgba | null;
  /** Enclosing inline boxes, outermost first */
  owners: InlineBox[];
  /** Spaces in the run are break opportunities */
  breakable: boolean;
}

export interface LineBreak {
  kind: 'break';
}

export type InlineLevel = InlineBox | ReplacedBox | FormControlBox | TextRun | LineBreak;

export type LineFragment =
  | { kind: 'text'; x: number; y: number; width: number; text: string; run: TextRun }
  | { kind: 'atomic'; x: number; y: number; box: AtomicBox };

export interface LineBox {
  y: number;
  height: number;
  /** Width of the placed content, excluding alignment offset */
  width: number;
  fragments: LineFragment[];
}

export function emptyGeometry(): BoxGeometry {
  return {
    content: { x: 0, y: 0, width: 0, height: 0 },
    margin: { top: 0, right: 0, bottom: 0, left: 0 },
    border: { top: 0, right: 0, bottom: 0, left: 0 },
    padding: { top: 0, right: 0, bottom: 0, left: 0 },
  };
}

/** Content rectangle grown by padding and border */
export function borderBox(geometry: BoxGeometry): Bounds {
  const { content, padding, border } = geometry;
  return {
    x: content.x - padding.left - border.left,
    y: content.y - padding.top - border.top,
    width: content.width + padding.left + padding.right + border.left + border.right,
    height: content.height + padding.top + padding.bottom + border.top + border.bottom,
  };
}

/** Border box grown by margins */
export function marginBox(geometry: BoxGeometry): Bounds {
  const outer = borderBox(geometry);
  const { margin } = geometry;
  return {
    x: outer.x - margin.left,
    y: outer.y - margin.top,
    width: outer.width + margin.left + margin.right,
    height: outer.height + margin.top + margin.bottom,
  };
}

/**
 * Pre-order walk over every box (inline children included).
 */
export function* walkBoxes(root: Box): Generator<Box> {
  const stack: Box[] = [root];
  for (let box = stack.pop(); box; box = stack.pop()) {
    yield box;
    switch (box.kind) {
      case 'block':
        for (let i = box.children.length - 1; i >= 0; i--) stack.push(box.children[i]);
        break;
      case 'anonymous':
      case 'inline':
        for (let i = box.children.length - 1; i >= 0; i--) {
          const child = box.children[i];
          if (child.kind !== 'text' && child.kind !== 'break') stack.push(child);
        }
        break;
      case 'replaced':
      case 'form-control':
        break;
    }
  }
}
