// Pixel → glyph reduction for images: 1x2 sub-cells per terminal cell using ▀▄█.
// Each sub-cell is the alpha-weighted average of the source pixels it covers.

import type { Pixmap, Rgb } from '../types.js';

// Half-block characters
const UPPER_HALF = '▀'; // ▀
const LOWER_HALF = '▄'; // ▄
const FULL_BLOCK = '█'; // █

/** Sub-cells less covered than this are transparent */
const COVERAGE_THRESHOLD = 0.5;

export interface ReducedCell {
  char: string;
  foreground: Rgb | null;
  /** null: whatever is behind the image shows through */
  background: Rgb | null;
}

/** `rows` rows of `cols` cells; null cells are fully transparent */
export type ReducedImage = Array<Array<ReducedCell | null>>;

/**
 * Alpha-weighted average of the pixels in [x0, x1) × [y0, y1), or null when
 * the block is mostly transparent.
 */
export function averageBlock(pixmap: Pixmap, x0: number, y0: number, x1: number, y1: number): Rgb | null {
  let r = 0;
  let g = 0;
  let b = 0;
  let alpha = 0;
  let count = 0;
  for (let y = y0; y < y1; y++) {
    for (let x = x0; x < x1; x++) {
      const i = (y * pixmap.width + x) * 4;
      const a = pixmap.data[i + 3];
      r += pixmap.data[i] * a;
      g += pixmap.data[i + 1] * a;
      b += pixmap.data[i + 2] * a;
      alpha += a;
      count++;
    }
  }
  if (count === 0 || alpha / (count * 255) < COVERAGE_THRESHOLD) return null;
  return { r: Math.round(r / alpha), g: Math.round(g / alpha), b: Math.round(b / alpha) };
}

function sameRgb(a: Rgb, b: Rgb): boolean {
  return a.r === b.r && a.g === b.g && a.b === b.b;
}

/**
 * Resolve the character, foreground, and background for a half-block cell
 * given the upper and lower sub-cell colors.
 */
export function resolveHalfBlockCell(upper: Rgb | null, lower: Rgb | null): ReducedCell | null {
  if (upper && lower) {
    if (sameRgb(upper, lower)) return { char: FULL_BLOCK, foreground: upper, background: null };
    return { char: UPPER_HALF, foreground: upper, background: lower };
  }
  if (upper) return { char: UPPER_HALF, foreground: upper, background: null };
  if (lower) return { char: LOWER_HALF, foreground: lower, background: null };
  return null;
}

/** Start of slice `index` when `length` items are split into `parts` slices */
function sliceStart(index: number, length: number, parts: number): number {
  return Math.floor((index * length) / parts);
}

/**
 * Reduce an image to `cols` × `rows` cells. Source blocks that would be
 * empty when downscaling little sample at least one pixel.
 */
export function reduceImage(pixmap: Pixmap, cols: number, rows: number): ReducedImage {
  const result: ReducedImage = [];
  if (cols <= 0 || rows <= 0 || pixmap.width === 0 || pixmap.height === 0) return result;

  const subRows = rows * 2;
  const sub = (cx: number, sy: number): Rgb | null => {
    const x0 = Math.min(pixmap.width - 1, sliceStart(cx, pixmap.width, cols));
    const x1 = Math.max(x0 + 1, sliceStart(cx + 1, pixmap.width, cols));
    const y0 = Math.min(pixmap.height - 1, sliceStart(sy, pixmap.height, subRows));
    const y1 = Math.max(y0 + 1, sliceStart(sy + 1, pixmap.height, subRows));
    return averageBlock(pixmap, x0, y0, Math.min(x1, pixmap.width), Math.min(y1, pixmap.height));
  };

  for (let row = 0; row < rows; row++) {
    const cells: Array<ReducedCell | null> = [];
    for (let col = 0; col < cols; col++) {
      cells.push(resolveHalfBlockCell(sub(col, row * 2), sub(col, row * 2 + 1)));
    }
    result.push(cells);
  }
  return result;
}
