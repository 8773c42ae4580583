// Cascade: matched rules + inline declarations → computed style per element.
//
// Resolution is a pure function of the rule lists, the element and its
// ancestors. Rules are applied in ascending (origin, specificity, source
// order); inline declarations come last. `!important` is not given extra
// weight.

import type { DomTree, ElementNode, NodeHandle } from '../html/dom.js';
import { compareSpecificity, selectorMatches } from '../css/selector.js';
import { ORIGIN_RANK, parseInlineStyle, type Declaration, type StyleRule } from '../css/parser.js';
import { tokenizeCss } from '../css/tokenizer.js';
import { trimTokens } from '../css/values.js';
import {
  copyProperty,
  INHERITED_PROPERTIES,
  INITIAL_STYLE,
  LONGHANDS,
  parsePropertyValue,
  type ComputedStyle,
} from './properties.js';
import { getLogger } from '../logging.js';

const logger = getLogger('Cascade');

export interface CascadeInput {
  /** Parsed user-agent rules, usually `userAgentRules()` */
  userAgent: readonly StyleRule[];
  /** Author rules from all document stylesheets, in document order */
  author: readonly StyleRule[];
}

/**
 * Rules bucketed by the rightmost compound's most selective part, so an
 * element is only tested against rules that can match it.
 */
export class RuleIndex {
  private readonly _buckets = new Map<string, StyleRule[]>();

  constructor(rules: Iterable<StyleRule>) {
    for (const rule of rules) {
      const key = RuleIndex._keyOf(rule);
      const bucket = this._buckets.get(key);
      if (bucket) bucket.push(rule);
      else this._buckets.set(key, [rule]);
    }
  }

  private static _keyOf(rule: StyleRule): string {
    const compound = rule.selector.compounds[rule.selector.compounds.length - 1];
    if (compound.ids.length > 0) return `#${compound.ids[0]}`;
    if (compound.classes.length > 0) return `.${compound.classes[0]}`;
    if (compound.tag !== null) return compound.tag;
    return '*';
  }

  /** Rules that match the element, sorted in cascade order */
  matching(tree: DomTree, element: ElementNode): StyleRule[] {
    const keys = new Set<string>(['*', element.tagName]);
    for (const attr of element.attributes) {
      if (attr.name === 'id') keys.add(`#${attr.value}`);
      if (attr.name === 'class') {
        for (const cls of attr.value.split(/[ \t\n\f\r]+/)) {
          if (cls !== '') keys.add(`.${cls}`);
        }
      }
    }
    const matched: StyleRule[] = [];
    for (const key of keys) {
      for (const rule of this._buckets.get(key) ?? []) {
        if (selectorMatches(tree, element.handle, rule.selector)) matched.push(rule);
      }
    }
    return matched.sort(compareRules);
  }
}

export function compareRules(a: StyleRule, b: StyleRule): number {
  return ORIGIN_RANK[a.origin] - ORIGIN_RANK[b.origin] ||
    compareSpecificity(a.specificity, b.specificity) ||
    a.sourceOrder - b.sourceOrder;
}

/** Starting point for an element: inherited values from the parent, initial values otherwise */
export function inheritFrom(parent: Readonly<ComputedStyle>): ComputedStyle {
  const style: ComputedStyle = { ...INITIAL_STYLE };
  for (const name of INHERITED_PROPERTIES) {
    copyProperty(style, parent, name);
  }
  return style;
}

/**
 * Apply one declaration. Unsupported properties and values leave the style
 * unchanged.
 */
export function applyDeclaration(style: ComputedStyle, parent: Readonly<ComputedStyle>, declaration: Declaration): void {
  const longhands = Object.hasOwn(LONGHANDS, declaration.property) ? LONGHANDS[declaration.property] : undefined;
  if (longhands === undefined) return;

  const value = declaration.value;
  const keyword = value.length === 1 && value[0].type === 'ident' ? value[0].value.toLowerCase() : null;
  if (keyword === 'inherit' || keyword === 'initial' || keyword === 'unset' || keyword === 'revert') {
    for (const name of longhands) {
      const inherits = keyword === 'inherit' || (keyword !== 'initial' && INHERITED_PROPERTIES.has(name));
      copyProperty(style, inherits ? parent : INITIAL_STYLE, name);
    }
    return;
  }

  const update = parsePropertyValue(declaration.property, value, style.color);
  if (update === null) {
    logger.trace('Ignoring unsupported value', { property: declaration.property });
    return;
  }
  Object.assign(style, update);
}

function declaration(property: string, value: string): Declaration {
  return { property, value: trimTokens(tokenizeCss(value)), important: false };
}

const ALIGN_HINT_ELEMENTS = new Set(['p', 'div', 'h1', 'h2', 'h3', 'h4', 'h5', 'h6', 'td', 'th', 'tr', 'caption']);

/**
 * Declarations implied by presentational attributes. They rank below every
 * author rule.
 */
export function presentationalHints(element: ElementNode): Declaration[] {
  const hints: Declaration[] = [];
  const attr = (name: string) => element.attributes.find(a => a.name === name)?.value;

  const bgcolor = attr('bgcolor');
  if (bgcolor !== undefined) hints.push(declaration('background-color', bgcolor));

  if (element.tagName === 'font') {
    const color = attr('color');
    if (color !== undefined) hints.push(declaration('color', color));
  }
  const text = element.tagName === 'body' ? attr('text') : undefined;
  if (text !== undefined) hints.push(declaration('color', text));

  const align = attr('align')?.toLowerCase();
  if (align !== undefined && ALIGN_HINT_ELEMENTS.has(element.tagName) &&
    (align === 'left' || align === 'center' || align === 'right')) {
    hints.push(declaration('text-align', align));
  }
  if (element.tagName === 'table' || element.tagName === 'hr') {
    const width = attr('width');
    if (width !== undefined && /^\d+%?$/.test(width)) {
      hints.push(declaration('width', width.endsWith('%') ? width : `${width}px`));
    }
  }
  if (element.tagName === 'table' && (attr('border') ?? '0') !== '0') {
    hints.push(declaration('border', 'solid'));
  }
  return hints;
}

/**
 * Compute the style of one element from its parent's computed style.
 */
export function computeElementStyle(
  tree: DomTree,
  element: ElementNode,
  parent: Readonly<ComputedStyle>,
  index: RuleIndex,
): ComputedStyle {
  const style = inheritFrom(parent);
  const rules = index.matching(tree, element);

  let i = 0;
  for (; i < rules.length && rules[i].origin === 'user-agent'; i++) {
    for (const decl of rules[i].declarations) applyDeclaration(style, parent, decl);
  }
  for (const decl of presentationalHints(element)) applyDeclaration(style, parent, decl);
  for (; i < rules.length; i++) {
    for (const decl of rules[i].declarations) applyDeclaration(style, parent, decl);
  }

  const inline = element.attributes.find(a => a.name === 'style')?.value;
  if (inline !== undefined) {
    for (const decl of parseInlineStyle(inline)) applyDeclaration(style, parent, decl);
  }

  if (element.parent === null && style.display !== 'none') {
    // the root always establishes a block
    style.display = 'block';
  }
  return style;
}

/**
 * Computed styles of every element below `root`. Text and comment nodes
 * take their parent element's style.
 */
export class StyleMap {
  private readonly _styles = new Map<NodeHandle, ComputedStyle>();

  constructor(private readonly _tree: DomTree) {}

  set(handle: NodeHandle, style: ComputedStyle): void {
    this._styles.set(handle, style);
  }

  get size(): number {
    return this._styles.size;
  }

  get(handle: NodeHandle): Readonly<ComputedStyle> {
    const own = this._styles.get(handle);
    if (own) return own;
    const node = this._tree.node(handle);
    if (node && node.kind !== 'element' && node.parent !== null) {
      return this._styles.get(node.parent) ?? INITIAL_STYLE;
    }
    return INITIAL_STYLE;
  }
}

/**
 * Run the cascade over the whole tree.
 */
export function resolveStyles(tree: DomTree, root: NodeHandle, input: CascadeInput): StyleMap {
  const index = new RuleIndex([...input.userAgent, ...input.author]);
  const styles = new StyleMap(tree);

  // iterative walk: documents can nest deeper than the call stack allows
  const pending: Array<{ handle: NodeHandle; parent: Readonly<ComputedStyle> }> = [{ handle: root, parent: INITIAL_STYLE }];
  for (let next = pending.pop(); next; next = pending.pop()) {
    const element = tree.element(next.handle);
    if (!element) continue;
    const style = computeElementStyle(tree, element, next.parent, index);
    styles.set(next.handle, style);
    for (const child of element.children) pending.push({ handle: child, parent: style });
  }

  logger.debug('Resolved styles', { elements: styles.size, rules: input.userAgent.length + input.author.length });
  return styles;
}
