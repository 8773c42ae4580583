// Supported CSS properties: computed value types, initial values,
// inheritance, and parsing of declaration values into longhands.

import type { CssToken } from '../css/tokenizer.js';
import {
  keywordOf,
  parseColor,
  parseLength,
  splitComponents,
  type CssColor,
  type Length,
  type Rgba,
} from '../css/values.js';

export type Display = 'block' | 'inline' | 'list-item' | 'none';
export type FontWeight = 'normal' | 'bold';
export type FontStyle = 'normal' | 'italic';
export type TextDecoration = 'none' | 'underline' | 'line-through';
export type TextAlign = 'left' | 'center' | 'right';
export type WhiteSpace = 'normal' | 'nowrap' | 'pre' | 'pre-wrap' | 'pre-line';
export type TextTransform = 'none' | 'uppercase' | 'lowercase' | 'capitalize';
export type ListStyleType =
  | 'none' | 'disc' | 'circle' | 'square' | 'decimal' | 'lower-alpha' | 'upper-alpha' | 'lower-roman' | 'upper-roman';
export type Visibility = 'visible' | 'hidden';
export type BorderStyle = 'none' | 'solid' | 'double';

export interface ComputedStyle {
  display: Display;
  /** null: the theme's text color */
  color: Rgba | null;
  /** null: transparent */
  backgroundColor: Rgba | null;
  fontWeight: FontWeight;
  fontStyle: FontStyle;
  textDecoration: TextDecoration;
  textAlign: TextAlign;
  whiteSpace: WhiteSpace;
  textTransform: TextTransform;
  listStyleType: ListStyleType;
  visibility: Visibility;
  width: Length;
  height: Length;
  /** null: none */
  maxWidth: Length | null;
  marginTop: Length;
  marginRight: Length;
  marginBottom: Length;
  marginLeft: Length;
  paddingTop: Length;
  paddingRight: Length;
  paddingBottom: Length;
  paddingLeft: Length;
  borderTopStyle: BorderStyle;
  borderRightStyle: BorderStyle;
  borderBottomStyle: BorderStyle;
  borderLeftStyle: BorderStyle;
  /** null: the element's text color */
  borderColor: Rgba | null;
}

export type PropertyName = keyof ComputedStyle;

const ZERO: Length = { unit: 'cells', value: 0 };
const AUTO: Length = { unit: 'auto' };

export const INITIAL_STYLE: Readonly<ComputedStyle> = Object.freeze({
  display: 'inline',
  color: null,
  backgroundColor: null,
  fontWeight: 'normal',
  fontStyle: 'normal',
  textDecoration: 'none',
  textAlign: 'left',
  whiteSpace: 'normal',
  textTransform: 'none',
  listStyleType: 'disc',
  visibility: 'visible',
  width: AUTO,
  height: AUTO,
  maxWidth: null,
  marginTop: ZERO,
  marginRight: ZERO,
  marginBottom: ZERO,
  marginLeft: ZERO,
  paddingTop: ZERO,
  paddingRight: ZERO,
  paddingBottom: ZERO,
  paddingLeft: ZERO,
  borderTopStyle: 'none',
  borderRightStyle: 'none',
  borderBottomStyle: 'none',
  borderLeftStyle: 'none',
  borderColor: null,
} satisfies ComputedStyle);

// text-decoration propagates to descendant text in a terminal rendering, so it
// is treated as inherited
export const INHERITED_PROPERTIES: ReadonlySet<PropertyName> = new Set<PropertyName>([
  'color',
  'fontWeight',
  'fontStyle',
  'textDecoration',
  'textAlign',
  'whiteSpace',
  'textTransform',
  'listStyleType',
  'visibility',
]);

const SIDES = ['Top', 'Right', 'Bottom', 'Left'] as const;
type Side = (typeof SIDES)[number];

const MARGIN_KEYS = ['marginTop', 'marginRight', 'marginBottom', 'marginLeft'] as const;
const PADDING_KEYS = ['paddingTop', 'paddingRight', 'paddingBottom', 'paddingLeft'] as const;
const BORDER_STYLE_KEYS = ['borderTopStyle', 'borderRightStyle', 'borderBottomStyle', 'borderLeftStyle'] as const;

/** Longhands set by each supported property name */
export const LONGHANDS: Readonly<Record<string, readonly PropertyName[]>> = {
  'display': ['display'],
  'color': ['color'],
  'background': ['backgroundColor'],
  'background-color': ['backgroundColor'],
  'font': ['fontWeight', 'fontStyle'],
  'font-weight': ['fontWeight'],
  'font-style': ['fontStyle'],
  'text-decoration': ['textDecoration'],
  'text-decoration-line': ['textDecoration'],
  'text-align': ['textAlign'],
  'white-space': ['whiteSpace'],
  'text-transform': ['textTransform'],
  'list-style': ['listStyleType'],
  'list-style-type': ['listStyleType'],
  'visibility': ['visibility'],
  'width': ['width'],
  'height': ['height'],
  'max-width': ['maxWidth'],
  'margin': ['marginTop', 'marginRight', 'marginBottom', 'marginLeft'],
  'margin-top': ['marginTop'],
  'margin-right': ['marginRight'],
  'margin-bottom': ['marginBottom'],
  'margin-left': ['marginLeft'],
  'padding': ['paddingTop', 'paddingRight', 'paddingBottom', 'paddingLeft'],
  'padding-top': ['paddingTop'],
  'padding-right': ['paddingRight'],
  'padding-bottom': ['paddingBottom'],
  'padding-left': ['paddingLeft'],
  'border': ['borderTopStyle', 'borderRightStyle', 'borderBottomStyle', 'borderLeftStyle', 'borderColor'],
  'border-style': ['borderTopStyle', 'borderRightStyle', 'borderBottomStyle', 'borderLeftStyle'],
  'border-color': ['borderColor'],
  'border-top': ['borderTopStyle', 'borderColor'],
  'border-right': ['borderRightStyle', 'borderColor'],
  'border-bottom': ['borderBottomStyle', 'borderColor'],
  'border-left': ['borderLeftStyle', 'borderColor'],
  'border-top-style': ['borderTopStyle'],
  'border-right-style': ['borderRightStyle'],
  'border-bottom-style': ['borderBottomStyle'],
  'border-left-style': ['borderLeftStyle'],
  'border-width': [],
};

export function isSupportedProperty(name: string): boolean {
  return Object.hasOwn(LONGHANDS, name);
}

export function copyProperty<K extends PropertyName>(target: ComputedStyle, source: Readonly<ComputedStyle>, key: K): void {
  target[key] = source[key];
}

/** Values parsed from one declaration, before they are written to a style */
export type StyleUpdate = Partial<ComputedStyle>;

const DISPLAY_VALUES: Record<string, Display> = {
  'block': 'block',
  'inline': 'inline',
  'list-item': 'list-item',
  'none': 'none',
  'flow-root': 'block',
  'flex': 'block',
  'grid': 'block',
  'table': 'block',
  'table-row': 'block',
  'table-row-group': 'block',
  'table-header-group': 'block',
  'table-footer-group': 'block',
  'table-caption': 'block',
  'inline-block': 'inline',
  'inline-flex': 'inline',
  'inline-grid': 'inline',
  'inline-table': 'inline',
  'table-cell': 'inline',
  'contents': 'inline',
  'ruby': 'inline',
};

const TEXT_ALIGN_VALUES: Record<string, TextAlign> = {
  'left': 'left',
  'start': 'left',
  'justify': 'left',
  'right': 'right',
  'end': 'right',
  'center': 'center',
  '-webkit-center': 'center',
};

const WHITE_SPACE_VALUES: Record<string, WhiteSpace> = {
  'normal': 'normal',
  'nowrap': 'nowrap',
  'pre': 'pre',
  'pre-wrap': 'pre-wrap',
  'break-spaces': 'pre-wrap',
  'pre-line': 'pre-line',
};

const TEXT_TRANSFORM_VALUES: Record<string, TextTransform> = {
  'none': 'none',
  'uppercase': 'uppercase',
  'lowercase': 'lowercase',
  'capitalize': 'capitalize',
};

const LIST_STYLE_VALUES: Record<string, ListStyleType> = {
  'none': 'none',
  'disc': 'disc',
  'circle': 'circle',
  'square': 'square',
  'decimal': 'decimal',
  'decimal-leading-zero': 'decimal',
  'lower-alpha': 'lower-alpha',
  'lower-latin': 'lower-alpha',
  'upper-alpha': 'upper-alpha',
  'upper-latin': 'upper-alpha',
  'lower-roman': 'lower-roman',
  'upper-roman': 'upper-roman',
};

const BORDER_STYLE_VALUES: Record<string, BorderStyle> = {
  'none': 'none',
  'hidden': 'none',
  'solid': 'solid',
  'dashed': 'solid',
  'dotted': 'solid',
  'groove': 'solid',
  'ridge': 'solid',
  'inset': 'solid',
  'outset': 'solid',
  'double': 'double',
};

const BORDER_WIDTH_KEYWORDS = new Set(['thin', 'medium', 'thick']);

function lookup<T>(table: Record<string, T>, keyword: string | null): T | undefined {
  return keyword !== null && Object.hasOwn(table, keyword) ? table[keyword] : undefined;
}

/** Resolve a parsed color against the element's current text color */
function resolveColor(color: CssColor, current: Rgba | null): Rgba | null {
  return color.kind === 'currentcolor' ? current : color.value;
}

/** Expand 1-4 box values to top, right, bottom, left */
function expandBox<T>(values: T[]): [T, T, T, T] | null {
  switch (values.length) {
    case 1:
      return [values[0], values[0], values[0], values[0]];
    case 2:
      return [values[0], values[1], values[0], values[1]];
    case 3:
      return [values[0], values[1], values[2], values[1]];
    case 4:
      return [values[0], values[1], values[2], values[3]];
    default:
      return null;
  }
}

function clampMargin(length: Length): Length {
  if (length.unit === 'auto') return length;
  return length.value < 0 ? ZERO : length;
}

function parseMargin(component: CssToken[], side: Side): Length | null {
  const axis = side === 'Top' || side === 'Bottom' ? 'vertical' : 'horizontal';
  const length = parseLength(component, axis, { allowAuto: true, allowPercent: true });
  return length ? clampMargin(length) : null;
}

function parsePadding(component: CssToken[], side: Side): Length | null {
  const axis = side === 'Top' || side === 'Bottom' ? 'vertical' : 'horizontal';
  const length = parseLength(component, axis, { allowPercent: true });
  return length && (length.unit !== 'cells' || length.value >= 0) ? length : null;
}

function isBorderWidth(component: CssToken[]): boolean {
  return BORDER_WIDTH_KEYWORDS.has(keywordOf(component) ?? '') || parseLength(component, 'horizontal') !== null;
}

function isZeroWidth(component: CssToken[]): boolean {
  const token = component.length === 1 ? component[0] : undefined;
  return (token?.type === 'number' || token?.type === 'dimension') && token.value === 0;
}

/** `border` and `border-<side>`: any order of width, style and color */
function parseBorderShorthand(
  components: CssToken[][],
  current: Rgba | null,
): { style: BorderStyle; color: Rgba | null } | null {
  let style: BorderStyle | undefined;
  let color: Rgba | null | undefined;
  let zeroWidth = false;
  for (const component of components) {
    const borderStyle = lookup(BORDER_STYLE_VALUES, keywordOf(component));
    if (borderStyle !== undefined && style === undefined) {
      style = borderStyle;
      continue;
    }
    if (isBorderWidth(component)) {
      zeroWidth = zeroWidth || isZeroWidth(component);
      continue;
    }
    const parsed = parseColor(component);
    if (parsed && color === undefined) {
      color = resolveColor(parsed, current);
      continue;
    }
    return null;
  }
  return { style: zeroWidth ? 'none' : style ?? 'none', color: color ?? null };
}

function parseDimension(component: CssToken[], axis: 'horizontal' | 'vertical'): Length | null {
  const length = parseLength(component, axis, { allowAuto: true, allowPercent: true });
  if (length === null) return null;
  if (length.unit !== 'auto' && length.value < 0) return null;
  return length;
}

function parseFontWeight(component: CssToken[]): FontWeight | undefined {
  const keyword = keywordOf(component);
  if (keyword === 'bold' || keyword === 'bolder') return 'bold';
  if (keyword === 'normal' || keyword === 'lighter') return 'normal';
  const token = component.length === 1 ? component[0] : undefined;
  if (token?.type === 'number' && token.value >= 1 && token.value <= 1000) {
    return token.value >= 600 ? 'bold' : 'normal';
  }
  return undefined;
}

function parseFontStyle(component: CssToken[]): FontStyle | undefined {
  const keyword = keywordOf(component);
  if (keyword === 'italic' || keyword === 'oblique') return 'italic';
  if (keyword === 'normal') return 'normal';
  return undefined;
}

/**
 * Parse a declaration of a supported property into longhand values.
 * `currentColor` is the element's text color at the time of application.
 * Returns null when the value is not understood.
 */
export function parsePropertyValue(property: string, value: readonly CssToken[], currentColor: Rgba | null): StyleUpdate | null {
  const components = splitComponents(value);
  const single = components.length === 1 ? components[0] : null;
  const keyword = single ? keywordOf(single) : null;

  switch (property) {
    case 'display': {
      const display = lookup(DISPLAY_VALUES, keyword);
      return display ? { display } : null;
    }
    case 'color': {
      const color = single ? parseColor(single) : null;
      if (!color) return null;
      return { color: resolveColor(color, currentColor) };
    }
    case 'background-color':
    case 'background': {
      let background: Rgba | null | undefined;
      for (const component of components) {
        const color = parseColor(component);
        if (color) {
          background = resolveColor(color, currentColor);
        } else if (property === 'background-color') {
          return null;
        }
      }
      if (background === undefined) {
        // a background shorthand without a color (`none`, an image) resets it
        return property === 'background' ? { backgroundColor: null } : null;
      }
      return { backgroundColor: background !== null && background.a === 0 ? null : background };
    }
    case 'font-weight': {
      const fontWeight = single ? parseFontWeight(single) : undefined;
      return fontWeight ? { fontWeight } : null;
    }
    case 'font-style': {
      const fontStyle = single ? parseFontStyle(single) : undefined;
      return fontStyle ? { fontStyle } : null;
    }
    case 'font': {
      const update: StyleUpdate = { fontWeight: 'normal', fontStyle: 'normal' };
      for (const component of components) {
        const weight = parseFontWeight(component);
        if (weight !== undefined && keywordOf(component) !== 'normal') update.fontWeight = weight;
        const style = parseFontStyle(component);
        if (style === 'italic') update.fontStyle = style;
      }
      return update;
    }
    case 'text-decoration':
    case 'text-decoration-line': {
      let textDecoration: TextDecoration | undefined;
      for (const component of components) {
        const word = keywordOf(component);
        if (word === 'underline' || word === 'line-through' || word === 'none') {
          textDecoration ??= word;
        } else if (property === 'text-decoration-line' && word !== 'overline') {
          return null;
        }
      }
      return { textDecoration: textDecoration ?? 'none' };
    }
    case 'text-align': {
      const textAlign = lookup(TEXT_ALIGN_VALUES, keyword);
      return textAlign ? { textAlign } : null;
    }
    case 'white-space': {
      const whiteSpace = lookup(WHITE_SPACE_VALUES, keyword);
      return whiteSpace ? { whiteSpace } : null;
    }
    case 'text-transform': {
      const textTransform = lookup(TEXT_TRANSFORM_VALUES, keyword);
      return textTransform ? { textTransform } : null;
    }
    case 'list-style-type': {
      const listStyleType = lookup(LIST_STYLE_VALUES, keyword);
      return listStyleType ? { listStyleType } : null;
    }
    case 'list-style': {
      for (const component of components) {
        const listStyleType = lookup(LIST_STYLE_VALUES, keywordOf(component));
        if (listStyleType) return { listStyleType };
      }
      return null;
    }
    case 'visibility': {
      if (keyword === 'visible') return { visibility: 'visible' };
      if (keyword === 'hidden' || keyword === 'collapse') return { visibility: 'hidden' };
      return null;
    }
    case 'width': {
      const width = single ? parseDimension(single, 'horizontal') : null;
      return width ? { width } : null;
    }
    case 'height': {
      const height = single ? parseDimension(single, 'vertical') : null;
      return height ? { height } : null;
    }
    case 'max-width': {
      if (keyword === 'none') return { maxWidth: null };
      const maxWidth = single ? parseDimension(single, 'horizontal') : null;
      return maxWidth && maxWidth.unit !== 'auto' ? { maxWidth } : null;
    }
    case 'margin':
    case 'padding': {
      const parse = property === 'margin' ? parseMargin : parsePadding;
      const box = expandBox(components);
      if (!box) return null;
      const update: StyleUpdate = {};
      for (let i = 0; i < 4; i++) {
        const length = parse(box[i], SIDES[i]);
        if (!length) return null;
        update[property === 'margin' ? MARGIN_KEYS[i] : PADDING_KEYS[i]] = length;
      }
      return update;
    }
    case 'border-style': {
      const styles = expandBox(components.map(c => lookup(BORDER_STYLE_VALUES, keywordOf(c))));
      if (!styles) return null;
      const update: StyleUpdate = {};
      for (let i = 0; i < 4; i++) {
        const style = styles[i];
        if (style === undefined) return null;
        update[BORDER_STYLE_KEYS[i]] = style;
      }
      return update;
    }
    case 'border-color': {
      // per-side colors collapse to the first one
      const color = components.length >= 1 && components.length <= 4 ? parseColor(components[0]) : null;
      return color ? { borderColor: resolveColor(color, currentColor) } : null;
    }
    case 'border-width':
      return components.length >= 1 && components.length <= 4 && components.every(isBorderWidth) ? {} : null;
    case 'border': {
      const border = parseBorderShorthand(components, currentColor);
      if (!border) return null;
      return {
        borderTopStyle: border.style,
        borderRightStyle: border.style,
        borderBottomStyle: border.style,
        borderLeftStyle: border.style,
        borderColor: border.color,
      };
    }
  }

  for (let i = 0; i < SIDES.length; i++) {
    const side = SIDES[i];
    const lower = side.toLowerCase();
    const update: StyleUpdate = {};
    if (property === `margin-${lower}`) {
      const length = single ? parseMargin(single, side) : null;
      if (!length) return null;
      update[MARGIN_KEYS[i]] = length;
      return update;
    }
    if (property === `padding-${lower}`) {
      const length = single ? parsePadding(single, side) : null;
      if (!length) return null;
      update[PADDING_KEYS[i]] = length;
      return update;
    }
    if (property === `border-${lower}-style`) {
      const style = lookup(BORDER_STYLE_VALUES, keyword);
      if (!style) return null;
      update[BORDER_STYLE_KEYS[i]] = style;
      return update;
    }
    if (property === `border-${lower}`) {
      const border = parseBorderShorthand(components, currentColor);
      if (!border) return null;
      update[BORDER_STYLE_KEYS[i]] = border.style;
      update.borderColor = border.color;
      return update;
    }
  }
  return null;
}
