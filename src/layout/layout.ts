// Block layout: assigns cell geometry to every box of the tree.
//
// Blocks fill the width of their containing block minus their own margin,
// border and padding, and stack vertically. Adjacent vertical margins
// collapse to the larger one, including between a block and its first or
// last child when no border or padding separates them. Inline content is
// handed to the line breaker.

import type { NodeHandle } from '../html/dom.js';
import { resolveLength, type Length } from '../css/values.js';
import type { ComputedStyle } from '../style/properties.js';
import type { Bounds, Edges, Size } from '../geometry.js';
import { borderBox, walkBoxes, type AnonymousBox, type BlockBox, type Box } from './box.js';
import { breakLines } from './line-breaker.js';
import { getLogger } from '../logging.js';

const logger = getLogger('Layout');

export type Interactable =
  | { kind: 'link'; node: NodeHandle; rects: Bounds[] }
  | { kind: 'control'; node: NodeHandle; rects: Bounds[] };

export interface LayoutResult {
  root: BlockBox;
  viewport: Size;
  /** Height of the laid out document in rows */
  height: number;
  /** Links and form controls in document order */
  interactables: Interactable[];
}

/** Used value of a margin, padding or width; `auto` and unresolvable percentages are 0 */
function cells(length: Length, containing: number): number {
  return Math.max(0, resolveLength(length, containing) ?? 0);
}

function borderEdges(style: Readonly<ComputedStyle>): Edges {
  return {
    top: style.borderTopStyle === 'none' ? 0 : 1,
    right: style.borderRightStyle === 'none' ? 0 : 1,
    bottom: style.borderBottomStyle === 'none' ? 0 : 1,
    left: style.borderLeftStyle === 'none' ? 0 : 1,
  };
}

function paddingEdges(style: Readonly<ComputedStyle>, containing: number): Edges {
  return {
    top: cells(style.paddingTop, containing),
    right: cells(style.paddingRight, containing),
    bottom: cells(style.paddingBottom, containing),
    left: cells(style.paddingLeft, containing),
  };
}

function topSeparated(box: BlockBox, containing: number): boolean {
  return box.style.borderTopStyle !== 'none' || cells(box.style.paddingTop, containing) > 0;
}

function bottomSeparated(box: BlockBox, containing: number): boolean {
  return box.style.borderBottomStyle !== 'none' || cells(box.style.paddingBottom, containing) > 0 ||
    box.style.height.unit !== 'auto';
}

/**
 * Top margin of a block after collapsing with the top margins of its first
 * descendants.
 */
function collapsedTopMargin(box: BlockBox, containing: number): number {
  let margin = cells(box.style.marginTop, containing);
  let current = box;
  let width = containing;
  while (!topSeparated(current, width)) {
    const first = current.children[0];
    if (first === undefined || first.kind !== 'block') break;
    width = Math.max(0, width - cells(current.style.marginLeft, width) - cells(current.style.marginRight, width));
    margin = Math.max(margin, cells(first.style.marginTop, width));
    current = first;
  }
  return margin;
}

/** Resolved content width of a block in a containing block `containing` cells wide */
function usedWidth(style: Readonly<ComputedStyle>, containing: number, frame: number): number {
  const available = Math.max(0, containing - frame);
  const explicit = resolveLength(style.width, containing);
  let width = explicit === null ? available : Math.min(explicit, available);
  const max = style.maxWidth === null ? null : resolveLength(style.maxWidth, containing);
  if (max !== null) width = Math.min(width, max);
  return Math.max(0, width);
}

function layoutAnonymous(box: AnonymousBox, x: number, y: number, width: number): number {
  const { lines, height } = breakLines(box.children, x, y, width, box.style.textAlign);
  box.lines = lines;
  box.geometry.content = { x, y, width, height };
  return height;
}

/**
 * Lay out `box` with its border box starting at row `y`, in a containing
 * block starting at column `x` that is `containingWidth` cells wide. A
 * first child's top margin that collapses with the box's own has already
 * been applied by the caller.
 *
 * @returns the bottom margin the box passes on to whatever follows it
 */
function layoutBlock(
  box: BlockBox,
  x: number,
  y: number,
  containingWidth: number,
  containingHeight: number | null,
): number {
  const { style } = box;
  const border = borderEdges(style);
  const padding = paddingEdges(style, containingWidth);
  const margin: Edges = {
    top: cells(style.marginTop, containingWidth),
    right: cells(style.marginRight, containingWidth),
    bottom: cells(style.marginBottom, containingWidth),
    left: cells(style.marginLeft, containingWidth),
  };

  // border then padding give way once they run out of room
  let room = containingWidth;
  for (const [edges, side] of [[border, 'left'], [border, 'right'], [padding, 'left'], [padding, 'right']] as const) {
    edges[side] = Math.min(edges[side], room);
    room -= edges[side];
  }

  const frame = border.left + border.right + padding.left + padding.right;
  const width = usedWidth(style, containingWidth, margin.left + margin.right + frame);

  if (style.width.unit !== 'auto' || style.maxWidth !== null) {
    const slack = Math.max(0, containingWidth - width - frame);
    const leftAuto = style.marginLeft.unit === 'auto';
    const rightAuto = style.marginRight.unit === 'auto';
    if (leftAuto && rightAuto) {
      margin.left = Math.floor(slack / 2);
    } else if (leftAuto) {
      margin.left = Math.max(0, slack - margin.right);
    }
  }
  // the border box never extends past the containing block
  margin.left = Math.min(margin.left, Math.max(0, containingWidth - width - frame));

  const contentX = x + margin.left + border.left + padding.left;
  const contentY = y + border.top + padding.top;
  const explicitHeight = resolveLength(style.height, containingHeight);

  let cursor = contentY;
  let pendingMargin = 0;
  box.children.forEach((child, index) => {
    if (child.kind === 'anonymous') {
      cursor += pendingMargin;
      pendingMargin = 0;
      cursor += layoutAnonymous(child, contentX, cursor, width);
      return;
    }
    const childTop = collapsedTopMargin(child, width);
    const absorbed = index === 0 && !topSeparated(box, containingWidth);
    cursor += absorbed ? 0 : Math.max(pendingMargin, childTop);
    pendingMargin = layoutBlock(child, contentX, cursor, width, explicitHeight);
    const outer = borderBox(child.geometry);
    cursor = outer.y + outer.height;
  });

  const passThrough = !bottomSeparated(box, containingWidth) && box.children[box.children.length - 1]?.kind === 'block';
  if (!passThrough) {
    cursor += pendingMargin;
    pendingMargin = 0;
  }

  let height = cursor - contentY;
  if (explicitHeight !== null) height = Math.max(height, explicitHeight);

  box.geometry = { content: { x: contentX, y: contentY, width, height }, margin, border, padding };
  return Math.max(margin.bottom, pendingMargin);
}

/** Group link boxes by link element and list them with form controls in document order */
export function collectInteractables(root: BlockBox): Interactable[] {
  const links = new Map<NodeHandle, Interactable>();
  const result: Interactable[] = [];

  const linkEntry = (node: NodeHandle): Interactable => {
    let entry = links.get(node);
    if (!entry) {
      entry = { kind: 'link', node, rects: [] };
      links.set(node, entry);
      result.push(entry);
    }
    return entry;
  };

  const enclosingLink = new Map<Box, NodeHandle | null>();
  for (const box of walkBoxes(root)) {
    switch (box.kind) {
      case 'block':
        for (const child of box.children) enclosingLink.set(child, box.link);
        // blocks nested in a link share the rectangle of the outermost one
        if (box.link !== null && enclosingLink.get(box) !== box.link) {
          linkEntry(box.link).rects.push(borderBox(box.geometry));
        }
        break;
      case 'inline':
        if (box.link !== null && box.link === box.node) {
          linkEntry(box.link).rects.push(...box.fragments);
        }
        break;
      case 'form-control':
        result.push({ kind: 'control', node: box.control, rects: [box.geometry.content] });
        break;
      case 'anonymous':
      case 'replaced':
        break;
    }
  }
  return result.filter(entry => entry.rects.length > 0);
}

/**
 * Lay out a box tree for a viewport. Percent heights of children of the
 * root resolve against the viewport height.
 */
export function layoutDocument(root: BlockBox, viewport: Size): LayoutResult {
  const width = Math.max(1, viewport.width);
  const topMargin = collapsedTopMargin(root, width);
  const bottomMargin = layoutBlock(root, 0, topMargin, width, Math.max(1, viewport.height));
  const outer = borderBox(root.geometry);
  const height = outer.y + outer.height + bottomMargin;
  const interactables = collectInteractables(root);
  logger.debug('Laid out document', { width, height, interactables: interactables.length });
  return { root, viewport: { width, height: viewport.height }, height, interactables };
}
