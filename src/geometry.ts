// Cell-grid geometry: positions, rectangles, box edges

export interface Position {
  x: number;
  y: number;
}

export interface Size {
  width: number;
  height: number;
}

/** A rectangle in cells; `x`/`y` are column/row */
export interface Bounds extends Position, Size {}

export interface Edges {
  top: number;
  right: number;
  bottom: number;
  left: number;
}

export const NO_EDGES: Readonly<Edges> = Object.freeze({ top: 0, right: 0, bottom: 0, left: 0 });

export function clamp(value: number, min: number, max: number): number {
  return value < min ? min : value > max ? max : value;
}

export function pointInBounds(x: number, y: number, bounds: Bounds): boolean {
  return x >= bounds.x && x < bounds.x + bounds.width &&
         y >= bounds.y && y < bounds.y + bounds.height;
}

/**
 * Intersection of two rectangles (zero-sized when they do not overlap)
 */
export function clipBounds(bounds: Bounds, clipRect: Bounds): Bounds {
  const x1 = Math.max(bounds.x, clipRect.x);
  const y1 = Math.max(bounds.y, clipRect.y);
  const x2 = Math.min(bounds.x + bounds.width, clipRect.x + clipRect.width);
  const y2 = Math.min(bounds.y + bounds.height, clipRect.y + clipRect.height);

  return {
    x: x1,
    y: y1,
    width: Math.max(0, x2 - x1),
    height: Math.max(0, y2 - y1),
  };
}

/**
 * Smallest rectangle containing both
 */
export function unionBounds(a: Bounds, b: Bounds): Bounds {
  const x = Math.min(a.x, b.x);
  const y = Math.min(a.y, b.y);
  return {
    x,
    y,
    width: Math.max(a.x + a.width, b.x + b.width) - x,
    height: Math.max(a.y + a.height, b.y + b.height) - y,
  };
}

export function containsBounds(outer: Bounds, inner: Bounds): boolean {
  return inner.x >= outer.x && inner.y >= outer.y &&
         inner.x + inner.width <= outer.x + outer.width &&
         inner.y + inner.height <= outer.y + outer.height;
}

export function boundsIntersect(a: Bounds, b: Bounds): boolean {
  return a.x < b.x + b.width &&
         a.x + a.width > b.x &&
         a.y < b.y + b.height &&
         a.y + a.height > b.y;
}
