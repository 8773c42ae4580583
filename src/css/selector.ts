// Selector parsing, specificity and matching against the DOM arena

import type { CssToken } from './tokenizer.js';
import type { DomTree, ElementNode, NodeHandle } from '../html/dom.js';

export type AttributeOperator = '=' | '~=' | '|=' | '^=' | '$=' | '*=';

export interface AttributeSelector {
  name: string;
  operator?: AttributeOperator;
  value?: string;
}

export interface CompoundSelector {
  /** Lower-cased tag name, or null for `*` / no type */
  tag: string | null;
  ids: string[];
  classes: string[];
  attributes: AttributeSelector[];
  pseudoClasses: string[];
}

export type Combinator = 'descendant' | 'child';

export interface Selector {
  compounds: CompoundSelector[];
  /** combinators[i] joins compounds[i] and compounds[i + 1] */
  combinators: Combinator[];
}

/** (id count, class/attribute/pseudo-class count, type count) */
export type Specificity = readonly [number, number, number];

const SUPPORTED_PSEUDO_CLASSES = new Set(['link', 'any-link', 'first-child', 'last-child', 'only-child', 'root', 'empty']);

// State-dependent pseudo-classes never match a static rendering
const NEVER_MATCHING_PSEUDO_CLASSES = new Set([
  'hover', 'active', 'focus', 'focus-within', 'focus-visible', 'visited', 'target', 'checked',
  'disabled', 'enabled', 'required', 'optional', 'invalid', 'valid', 'placeholder-shown',
]);

const PREFIXED_OPERATORS: Partial<Record<string, AttributeOperator>> = {
  '~': '~=',
  '|': '|=',
  '^': '^=',
  '$': '$=',
  '*': '*=',
};

function emptyCompound(): CompoundSelector {
  return { tag: null, ids: [], classes: [], attributes: [], pseudoClasses: [] };
}

function isEmptyCompound(compound: CompoundSelector, sawUniversal: boolean): boolean {
  return !sawUniversal && compound.tag === null && compound.ids.length === 0 && compound.classes.length === 0 &&
    compound.attributes.length === 0 && compound.pseudoClasses.length === 0;
}

/**
 * Parse one complex selector (no commas). Returns null for anything outside
 * the supported grammar, which drops the rule.
 */
export function parseSelector(tokens: readonly CssToken[]): Selector | null {
  const compounds: CompoundSelector[] = [];
  const combinators: Combinator[] = [];
  let current = emptyCompound();
  let sawUniversal = false;
  let pending: Combinator | null = null;
  let i = 0;

  const closeCompound = (): boolean => {
    if (isEmptyCompound(current, sawUniversal)) return false;
    compounds.push(current);
    current = emptyCompound();
    sawUniversal = false;
    return true;
  };

  // a token that begins a new compound after a combinator
  const startCompound = (): boolean => {
    if (pending !== null) {
      if (!closeCompound()) return false;
      combinators.push(pending);
      pending = null;
    }
    return true;
  };

  while (i < tokens.length) {
    const token = tokens[i];
    switch (token.type) {
      case 'whitespace':
        if (!isEmptyCompound(current, sawUniversal) && pending === null) pending = 'descendant';
        i++;
        continue;
      case 'delim':
        if (token.value === '>') {
          if (isEmptyCompound(current, sawUniversal) || pending === 'child') return null;
          pending = 'child';
          i++;
          continue;
        }
        if (token.value === '*') {
          if (!startCompound()) return null;
          if (current.tag !== null || sawUniversal) return null;
          sawUniversal = true;
          i++;
          continue;
        }
        if (token.value === '.') {
          const next = tokens[i + 1];
          if (next?.type !== 'ident') return null;
          if (!startCompound()) return null;
          current.classes.push(next.value);
          i += 2;
          continue;
        }
        // sibling combinators and anything else
        return null;
      case 'ident':
        if (!startCompound()) return null;
        if (!isEmptyCompound(current, sawUniversal)) return null;
        current.tag = token.value.toLowerCase();
        i++;
        continue;
      case 'hash':
        if (!startCompound()) return null;
        current.ids.push(token.value);
        i++;
        continue;
      case '[': {
        if (!startCompound()) return null;
        const parsed = parseAttributeSelector(tokens, i + 1);
        if (!parsed) return null;
        current.attributes.push(parsed.selector);
        i = parsed.next;
        continue;
      }
      case 'colon': {
        const next = tokens[i + 1];
        // pseudo-elements and functional pseudo-classes are unsupported
        if (next?.type !== 'ident') return null;
        const name = next.value.toLowerCase();
        if (!SUPPORTED_PSEUDO_CLASSES.has(name) && !NEVER_MATCHING_PSEUDO_CLASSES.has(name)) return null;
        if (!startCompound()) return null;
        current.pseudoClasses.push(name);
        i += 2;
        continue;
      }
      default:
        return null;
    }
  }

  if (pending === 'child') return null;
  if (!closeCompound()) return null;
  return { compounds, combinators };
}

function parseAttributeSelector(
  tokens: readonly CssToken[],
  start: number,
): { selector: AttributeSelector; next: number } | null {
  let i = start;
  const skipWhitespace = () => {
    while (tokens[i]?.type === 'whitespace') i++;
  };

  skipWhitespace();
  const nameToken = tokens[i];
  if (nameToken?.type !== 'ident') return null;
  const selector: AttributeSelector = { name: nameToken.value.toLowerCase() };
  i++;
  skipWhitespace();

  let token = tokens[i];
  if (token?.type === 'delim') {
    let operator: AttributeOperator | null = null;
    if (token.value === '=') {
      operator = '=';
      i++;
    } else {
      const eq = tokens[i + 1];
      const prefixed = PREFIXED_OPERATORS[token.value];
      if (prefixed && eq?.type === 'delim' && eq.value === '=') {
        operator = prefixed;
        i += 2;
      }
    }
    if (operator === null) return null;
    skipWhitespace();
    const value = tokens[i];
    if (value?.type !== 'ident' && value?.type !== 'string') return null;
    selector.operator = operator;
    selector.value = value.value;
    i++;
    skipWhitespace();
    // case-sensitivity flag
    token = tokens[i];
    if (token?.type === 'ident' && (token.value === 'i' || token.value === 's')) {
      i++;
      skipWhitespace();
    }
  }

  if (tokens[i]?.type !== ']') return null;
  return { selector, next: i + 1 };
}

export function specificity(selector: Selector): Specificity {
  let ids = 0;
  let classes = 0;
  let types = 0;
  for (const compound of selector.compounds) {
    ids += compound.ids.length;
    classes += compound.classes.length + compound.attributes.length + compound.pseudoClasses.length;
    if (compound.tag !== null) types++;
  }
  return [ids, classes, types];
}

export function compareSpecificity(a: Specificity, b: Specificity): number {
  return a[0] - b[0] || a[1] - b[1] || a[2] - b[2];
}

function elementSiblings(tree: DomTree, element: ElementNode): ElementNode[] {
  if (element.parent === null) return [element];
  const result: ElementNode[] = [];
  for (const handle of tree.children(element.parent)) {
    const sibling = tree.element(handle);
    if (sibling) result.push(sibling);
  }
  return result;
}

function attributeMatches(element: ElementNode, selector: AttributeSelector): boolean {
  const attr = element.attributes.find(a => a.name === selector.name);
  if (!attr) return false;
  if (selector.operator === undefined || selector.value === undefined) return true;
  const actual = attr.value;
  const expected = selector.value;
  switch (selector.operator) {
    case '=':
      return actual === expected;
    case '~=':
      return actual.split(/\s+/).includes(expected);
    case '|=':
      return actual === expected || actual.startsWith(`${expected}-`);
    case '^=':
      return expected !== '' && actual.startsWith(expected);
    case '$=':
      return expected !== '' && actual.endsWith(expected);
    case '*=':
      return expected !== '' && actual.includes(expected);
  }
}

function pseudoClassMatches(tree: DomTree, element: ElementNode, name: string): boolean {
  switch (name) {
    case 'link':
    case 'any-link':
      return (element.tagName === 'a' || element.tagName === 'area') && element.attributes.some(a => a.name === 'href');
    case 'root':
      return element.parent === null;
    case 'first-child':
      return elementSiblings(tree, element)[0] === element;
    case 'last-child': {
      const siblings = elementSiblings(tree, element);
      return siblings[siblings.length - 1] === element;
    }
    case 'only-child':
      return elementSiblings(tree, element).length === 1;
    case 'empty':
      return element.children.every(child => {
        const node = tree.node(child);
        return node?.kind === 'comment';
      });
    default:
      return false;
  }
}

export function compoundMatches(tree: DomTree, element: ElementNode, compound: CompoundSelector): boolean {
  if (compound.tag !== null && compound.tag !== element.tagName) return false;
  if (compound.ids.length > 0) {
    const id = element.attributes.find(a => a.name === 'id')?.value;
    if (id === undefined || compound.ids.some(expected => expected !== id)) return false;
  }
  if (compound.classes.length > 0) {
    const classAttr = element.attributes.find(a => a.name === 'class')?.value ?? '';
    const classes = classAttr.split(/[ \t\n\f\r]+/);
    if (!compound.classes.every(cls => classes.includes(cls))) return false;
  }
  if (!compound.attributes.every(attr => attributeMatches(element, attr))) return false;
  return compound.pseudoClasses.every(name => pseudoClassMatches(tree, element, name));
}

function matchFrom(tree: DomTree, element: ElementNode, selector: Selector, index: number): boolean {
  if (!compoundMatches(tree, element, selector.compounds[index])) return false;
  if (index === 0) return true;

  const combinator = selector.combinators[index - 1];
  if (combinator === 'child') {
    const parent = tree.parentElement(element.handle);
    return parent !== undefined && matchFrom(tree, parent, selector, index - 1);
  }
  for (let ancestor = tree.parentElement(element.handle); ancestor; ancestor = tree.parentElement(ancestor.handle)) {
    if (matchFrom(tree, ancestor, selector, index - 1)) return true;
  }
  return false;
}

/**
 * Match right to left: the last compound against the element, earlier ones
 * against its ancestor chain.
 */
export function selectorMatches(tree: DomTree, handle: NodeHandle, selector: Selector): boolean {
  const element = tree.element(handle);
  if (!element || selector.compounds.length === 0) return false;
  return matchFrom(tree, element, selector, selector.compounds.length - 1);
}

export function selectorToString(selector: Selector): string {
  const compound = (c: CompoundSelector) => {
    let text = c.tag ?? '';
    text += c.ids.map(id => `#${id}`).join('');
    text += c.classes.map(cls => `.${cls}`).join('');
    text += c.attributes.map(a => a.operator ? `[${a.name}${a.operator}"${a.value ?? ''}"]` : `[${a.name}]`).join('');
    text += c.pseudoClasses.map(p => `:${p}`).join('');
    return text === '' ? '*' : text;
  };
  let text = compound(selector.compounds[0]);
  for (let i = 1; i < selector.compounds.length; i++) {
    text += selector.combinators[i - 1] === 'child' ? ' > ' : ' ';
    text += compound(selector.compounds[i]);
  }
  return text;
}
