// Greedy line breaking of an anonymous box's inline content.
//
// Spaces in breakable runs are the only break opportunities inside text;
// atomic boxes can break on either side. A segment (words glued together
// without a space) goes on the current line if it fits, else it starts a
// new line. A segment wider than the whole line is placed alone and
// overflows. `<br>` ends the line; a trailing `<br>` adds no empty line.

import { stringWidth } from '../char-width.js';
import { unionBounds, type Bounds } from '../geometry.js';
import type { TextAlign } from '../style/properties.js';
import type { AtomicBox, InlineBox, InlineLevel, LineBox, LineFragment, TextRun } from './box.js';

type Piece =
  | { kind: 'word'; text: string; run: TextRun }
  | { kind: 'space'; text: string; run: TextRun }
  | { kind: 'atomic'; box: AtomicBox; owners: InlineBox[] }
  | { kind: 'break' };

/** Inline content in order, with text split at break opportunities */
export function* inlinePieces(items: readonly InlineLevel[], owners: InlineBox[] = []): Generator<Piece> {
  for (const item of items) {
    switch (item.kind) {
      case 'text':
        if (!item.breakable) {
          yield { kind: 'word', text: item.text, run: item };
          break;
        }
        for (const part of item.text.split(/( +)/)) {
          if (part === '') continue;
          yield part.startsWith(' ') ? { kind: 'space', text: part, run: item } : { kind: 'word', text: part, run: item };
        }
        break;
      case 'break':
        yield { kind: 'break' };
        break;
      case 'inline':
        yield* inlinePieces(item.children, [...owners, item]);
        break;
      case 'replaced':
      case 'form-control':
        yield { kind: 'atomic', box: item, owners };
        break;
    }
  }
}

/** Atomic box size after shrinking to the line width; images keep their aspect ratio */
export function fitAtomic(box: AtomicBox, available: number): { width: number; height: number } {
  const { width, height } = box.intrinsic;
  const limit = Math.max(1, available);
  if (width <= limit) return { width, height };
  if (box.kind === 'replaced') {
    return { width: limit, height: Math.max(1, Math.round((height * limit) / width)) };
  }
  return { width: limit, height };
}

interface PendingLine {
  fragments: LineFragment[];
  width: number;
  /** Atomic boxes on the line with their owners, for geometry */
  atomics: Array<{ box: AtomicBox; owners: InlineBox[]; width: number; height: number }>;
}

export interface LineLayoutResult {
  lines: LineBox[];
  height: number;
}

/**
 * Break inline content into lines of at most `width` cells starting at
 * (`x`, `y`). Sets the geometry of atomic boxes and the fragments of inline
 * boxes.
 */
export function breakLines(
  items: readonly InlineLevel[],
  x: number,
  y: number,
  width: number,
  align: TextAlign,
): LineLayoutResult {
  const lines: LineBox[] = [];
  let line: PendingLine = { fragments: [], width: 0, atomics: [] };
  let wrapped = false;
  let spaces: Array<Extract<Piece, { kind: 'space' }>> = [];
  let segment: Array<Extract<Piece, { kind: 'word' } | { kind: 'atomic' }>> = [];
  let top = y;
  const owners = new InlineFragments();

  const placeText = (text: string, run: TextRun) => {
    const textWidth = stringWidth(text);
    const last = line.fragments[line.fragments.length - 1];
    if (last?.kind === 'text' && last.run === run && last.x + last.width === line.width) {
      last.text += text;
      last.width += textWidth;
    } else {
      line.fragments.push({ kind: 'text', x: line.width, y: 0, width: textWidth, text, run });
    }
    line.width += textWidth;
  };

  const finishLine = () => {
    const height = Math.max(1, ...line.atomics.map(a => a.height));
    const slack = Math.max(0, width - line.width);
    const offset = align === 'right' ? slack : align === 'center' ? Math.floor(slack / 2) : 0;
    for (const fragment of line.fragments) {
      fragment.x += x + offset;
      if (fragment.kind === 'text') {
        fragment.y = top + height - 1;
      } else {
        const atomic = line.atomics.find(a => a.box === fragment.box);
        const boxHeight = atomic?.height ?? 1;
        fragment.y = top + height - boxHeight;
        fragment.box.geometry.content = { x: fragment.x, y: fragment.y, width: atomic?.width ?? 0, height: boxHeight };
      }
      const rect = { x: fragment.x, y: top, width: fragment.kind === 'text' ? fragment.width : fragment.box.geometry.content.width, height };
      const fragmentOwners = fragment.kind === 'text'
        ? fragment.run.owners
        : line.atomics.find(a => a.box === fragment.box)?.owners ?? [];
      for (const owner of fragmentOwners) owners.extend(owner, rect);
    }
    lines.push({ y: top, height, width: line.width, fragments: line.fragments });
    top += height;
    line = { fragments: [], width: 0, atomics: [] };
  };

  const segmentWidth = () => segment.reduce(
    (sum, piece) => sum + (piece.kind === 'word' ? stringWidth(piece.text) : fitAtomic(piece.box, width).width),
    0,
  );

  const placeSegment = () => {
    if (segment.length === 0) return;
    const needed = segmentWidth();
    const spaceWidth = spaces.reduce((sum, piece) => sum + stringWidth(piece.text), 0);
    if (line.fragments.length > 0 && line.width + spaceWidth + needed > width) {
      finishLine();
      wrapped = true;
      spaces = [];
    }
    if (line.fragments.length > 0 || !wrapped) {
      for (const space of spaces) placeText(space.text, space.run);
    }
    spaces = [];
    for (const piece of segment) {
      if (piece.kind === 'word') {
        placeText(piece.text, piece.run);
      } else {
        const size = fitAtomic(piece.box, width);
        line.fragments.push({ kind: 'atomic', x: line.width, y: 0, box: piece.box });
        line.atomics.push({ box: piece.box, owners: piece.owners, ...size });
        line.width += size.width;
      }
    }
    segment = [];
  };

  for (const piece of inlinePieces(items)) {
    switch (piece.kind) {
      case 'word':
        segment.push(piece);
        break;
      case 'atomic':
        placeSegment();
        segment.push(piece);
        placeSegment();
        break;
      case 'space':
        placeSegment();
        spaces.push(piece);
        break;
      case 'break':
        placeSegment();
        spaces = [];
        finishLine();
        wrapped = false;
        break;
    }
  }
  placeSegment();
  if (line.fragments.length > 0) finishLine();

  owners.finish();
  return { lines, height: top - y };
}

/** Per-line rectangles of inline boxes, from the fragments they contain */
class InlineFragments {
  private readonly _touched = new Set<InlineBox>();

  extend(owner: InlineBox, rect: Bounds): void {
    if (!this._touched.has(owner)) {
      owner.fragments = [];
      this._touched.add(owner);
    }
    const previous = owner.fragments[owner.fragments.length - 1];
    if (previous && previous.y === rect.y && previous.height === rect.height) {
      owner.fragments[owner.fragments.length - 1] = unionBounds(previous, rect);
    } else {
      owner.fragments.push(rect);
    }
  }

  finish(): void {
    for (const owner of this._touched) {
      owner.geometry.content = owner.fragments.reduce(unionBounds);
    }
  }
}
