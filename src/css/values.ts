// CSS value parsing: colors and lengths converted to character cells

import type { CssToken } from './tokenizer.js';
import namedColors from './named-colors.json' with { type: 'json' };

export interface Rgba {
  r: number;
  g: number;
  b: number;
  /** 0-255 */
  a: number;
}

export type CssColor =
  | { kind: 'rgba'; value: Rgba }
  | { kind: 'currentcolor' };

export type Length =
  | { unit: 'auto' }
  | { unit: 'cells'; value: number }
  | { unit: 'percent'; value: number };

export type Axis = 'horizontal' | 'vertical';

/** Pixels per cell on each axis */
export const CELL_WIDTH_PX = 8;
export const CELL_HEIGHT_PX = 16;

const NAMED_COLORS: Partial<Record<string, string>> = namedColors;

// Absolute units in CSS pixels; font-relative ones assume a 16px font
const PX_PER_UNIT: Partial<Record<string, number>> = {
  px: 1,
  em: 16,
  rem: 16,
  ex: 8,
  ch: 8,
  lh: 16,
  rlh: 16,
  pt: 4 / 3,
  pc: 16,
  in: 96,
  cm: 96 / 2.54,
  mm: 96 / 25.4,
};

export function rgba(r: number, g: number, b: number, a = 255): Rgba {
  return { r, g, b, a };
}

export function sameRgba(a: Rgba | null, b: Rgba | null): boolean {
  if (a === null || b === null) return a === b;
  return a.r === b.r && a.g === b.g && a.b === b.b && a.a === b.a;
}

/** Drop leading and trailing whitespace tokens */
export function trimTokens(tokens: readonly CssToken[]): CssToken[] {
  let start = 0;
  let end = tokens.length;
  while (start < end && tokens[start].type === 'whitespace') start++;
  while (end > start && tokens[end - 1].type === 'whitespace') end--;
  return tokens.slice(start, end);
}

/**
 * Split a value into whitespace-separated components. A function token and
 * its arguments form a single component.
 */
export function splitComponents(tokens: readonly CssToken[]): CssToken[][] {
  const components: CssToken[][] = [];
  let current: CssToken[] = [];
  let depth = 0;
  for (const token of tokens) {
    if (token.type === 'whitespace' && depth === 0) {
      if (current.length > 0) components.push(current);
      current = [];
      continue;
    }
    if (token.type === 'function' || token.type === '(') depth++;
    if (token.type === ')' && depth > 0) depth--;
    current.push(token);
  }
  if (current.length > 0) components.push(current);
  return components;
}

/** Lower-cased keyword when the component is a single ident */
export function keywordOf(component: readonly CssToken[]): string | null {
  const token = component.length === 1 ? component[0] : undefined;
  return token?.type === 'ident' ? token.value.toLowerCase() : null;
}

function clampByte(value: number): number {
  return Math.max(0, Math.min(255, Math.round(value)));
}

function parseHex(hex: string): Rgba | null {
  if (!/^[0-9a-fA-F]+$/.test(hex)) return null;
  const digits = hex.length === 3 || hex.length === 4
    ? hex.split('').map(c => c + c)
    : hex.length === 6 || hex.length === 8
      ? (hex.match(/../g) ?? [])
      : null;
  if (digits === null) return null;
  const [r, g, b, a] = digits.map(pair => Number.parseInt(pair, 16));
  return { r, g, b, a: a ?? 255 };
}

function hueToRgb(p: number, q: number, t: number): number {
  if (t < 0) t += 1;
  if (t > 1) t -= 1;
  if (t < 1 / 6) return p + (q - p) * 6 * t;
  if (t < 1 / 2) return q;
  if (t < 2 / 3) return p + (q - p) * (2 / 3 - t) * 6;
  return p;
}

/** h in degrees, s and l in 0..1 */
export function hslToRgb(h: number, s: number, l: number): [number, number, number] {
  const hue = (((h % 360) + 360) % 360) / 360;
  if (s === 0) {
    const grey = clampByte(l * 255);
    return [grey, grey, grey];
  }
  const q = l < 0.5 ? l * (1 + s) : l + s - l * s;
  const p = 2 * l - q;
  return [
    clampByte(hueToRgb(p, q, hue + 1 / 3) * 255),
    clampByte(hueToRgb(p, q, hue) * 255),
    clampByte(hueToRgb(p, q, hue - 1 / 3) * 255),
  ];
}

type NumericArg = { type: 'number' | 'percentage' | 'angle'; value: number };

/** Arguments of a color function, comma or space separated, with optional `/ alpha` */
function functionArguments(tokens: readonly CssToken[]): NumericArg[] | null {
  const args: NumericArg[] = [];
  for (const token of tokens) {
    switch (token.type) {
      case 'whitespace':
      case 'comma':
        continue;
      case 'delim':
        if (token.value !== '/') return null;
        continue;
      case 'number':
        args.push({ type: 'number', value: token.value });
        continue;
      case 'percentage':
        args.push({ type: 'percentage', value: token.value });
        continue;
      case 'dimension':
        if (token.unit === 'deg') args.push({ type: 'angle', value: token.value });
        else if (token.unit === 'turn') args.push({ type: 'angle', value: token.value * 360 });
        else if (token.unit === 'rad') args.push({ type: 'angle', value: (token.value * 180) / Math.PI });
        else return null;
        continue;
      case 'ident':
        if (token.value.toLowerCase() === 'none') {
          args.push({ type: 'number', value: 0 });
          continue;
        }
        return null;
      default:
        return null;
    }
  }
  return args;
}

function alphaOf(arg: NumericArg | undefined): number | null {
  if (arg === undefined) return 255;
  if (arg.type === 'percentage') return clampByte((arg.value / 100) * 255);
  if (arg.type === 'number') return clampByte(arg.value * 255);
  return null;
}

function parseColorFunction(name: string, args: readonly CssToken[]): Rgba | null {
  const values = functionArguments(args);
  if (values === null || values.length < 3 || values.length > 4) return null;
  const alpha = alphaOf(values[3]);
  if (alpha === null) return null;

  if (name === 'rgb' || name === 'rgba') {
    const channels: number[] = [];
    for (const value of values.slice(0, 3)) {
      if (value.type === 'angle') return null;
      channels.push(value.type === 'percentage' ? clampByte((value.value / 100) * 255) : clampByte(value.value));
    }
    return { r: channels[0], g: channels[1], b: channels[2], a: alpha };
  }

  if (name === 'hsl' || name === 'hsla') {
    const [hue, saturation, lightness] = values;
    if (hue.type === 'percentage' || saturation.type === 'angle' || lightness.type === 'angle') return null;
    const clampUnit = (v: number) => Math.max(0, Math.min(1, v / 100));
    const [r, g, b] = hslToRgb(hue.value, clampUnit(saturation.value), clampUnit(lightness.value));
    return { r, g, b, a: alpha };
  }

  return null;
}

/**
 * Parse one color component. Returns null when the tokens are not a color.
 */
export function parseColor(component: readonly CssToken[]): CssColor | null {
  const first = component[0];
  if (first === undefined) return null;

  if (component.length === 1 && first.type === 'ident') {
    const name = first.value.toLowerCase();
    if (name === 'currentcolor') return { kind: 'currentcolor' };
    if (name === 'transparent') return { kind: 'rgba', value: { r: 0, g: 0, b: 0, a: 0 } };
    const hex = NAMED_COLORS[name];
    const value = hex === undefined ? null : parseHex(hex.slice(1));
    return value ? { kind: 'rgba', value } : null;
  }

  if (component.length === 1 && first.type === 'hash') {
    const value = parseHex(first.value);
    return value ? { kind: 'rgba', value } : null;
  }

  if (first.type === 'function') {
    const last = component[component.length - 1];
    // an unclosed function at the end of a declaration is closed implicitly
    const args = last.type === ')' ? component.slice(1, -1) : component.slice(1);
    const value = parseColorFunction(first.value, args);
    return value ? { kind: 'rgba', value } : null;
  }

  return null;
}

/** Convert a CSS length in pixels to whole cells on one axis */
export function pxToCells(px: number, axis: Axis): number {
  return Math.round(px / (axis === 'horizontal' ? CELL_WIDTH_PX : CELL_HEIGHT_PX));
}

export interface LengthOptions {
  allowAuto?: boolean;
  allowPercent?: boolean;
}

/**
 * Parse one length component into cells. Unitless numbers other than 0 are
 * rejected.
 */
export function parseLength(component: readonly CssToken[], axis: Axis, options: LengthOptions = {}): Length | null {
  if (component.length !== 1) return null;
  const token = component[0];
  switch (token.type) {
    case 'ident':
      return options.allowAuto && token.value.toLowerCase() === 'auto' ? { unit: 'auto' } : null;
    case 'number':
      return token.value === 0 ? { unit: 'cells', value: 0 } : null;
    case 'percentage':
      return options.allowPercent ? { unit: 'percent', value: token.value } : null;
    case 'dimension': {
      const factor = PX_PER_UNIT[token.unit];
      if (factor === undefined) return null;
      return { unit: 'cells', value: pxToCells(token.value * factor, axis) };
    }
    default:
      return null;
  }
}

/**
 * Resolve a length against a containing size. Auto and unresolvable
 * percentages yield null.
 */
export function resolveLength(length: Length, containing: number | null): number | null {
  switch (length.unit) {
    case 'auto':
      return null;
    case 'cells':
      return length.value;
    case 'percent':
      return containing === null ? null : Math.floor((containing * length.value) / 100);
  }
}
