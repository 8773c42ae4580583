// Stylesheet parser: CSS tokens → rule list.
//
// Errors stay local. A declaration that does not parse is skipped up to the
// next `;` (or the end of its block); a rule whose selector does not parse is
// skipped together with its block.

import { tokenizeCss, type CssToken } from './tokenizer.js';
import { parseSelector, specificity, type Selector, type Specificity } from './selector.js';
import { trimTokens } from './values.js';
import { getLogger } from '../logging.js';

const logger = getLogger('CssParser');

export type Origin = 'user-agent' | 'author' | 'inline';

/** Cascade rank of each origin, lowest first */
export const ORIGIN_RANK: Record<Origin, number> = {
  'user-agent': 0,
  'author': 1,
  'inline': 2,
};

export interface Declaration {
  /** Lower-cased property name */
  property: string;
  /** Value tokens with surrounding whitespace and `!important` removed */
  value: CssToken[];
  important: boolean;
}

export interface StyleRule {
  selector: Selector;
  declarations: Declaration[];
  specificity: Specificity;
  sourceOrder: number;
  origin: Origin;
}

export interface MediaContext {
  colorScheme: 'light' | 'dark';
}

export interface StylesheetOptions {
  origin?: Origin;
  /** Source order given to the first rule; later sheets continue the count */
  sourceOrderStart?: number;
  media?: MediaContext;
}

const MEDIA_TYPES_MATCHING = new Set(['all', 'screen']);

function isOpener(token: CssToken): boolean {
  return token.type === '{' || token.type === '(' || token.type === '[' || token.type === 'function';
}

function isCloser(token: CssToken): boolean {
  return token.type === '}' || token.type === ')' || token.type === ']';
}

/** Split tokens at top-level occurrences of `separator` */
function splitTopLevel(tokens: readonly CssToken[], separator: 'comma' | 'semicolon'): CssToken[][] {
  const parts: CssToken[][] = [];
  let current: CssToken[] = [];
  let depth = 0;
  for (const token of tokens) {
    if (depth === 0 && token.type === separator) {
      parts.push(current);
      current = [];
      continue;
    }
    if (isOpener(token)) depth++;
    else if (isCloser(token) && depth > 0) depth--;
    current.push(token);
  }
  parts.push(current);
  return parts;
}

class StylesheetParser {
  private _pos = 0;
  private _order: number;
  private readonly _origin: Origin;
  private readonly _media: MediaContext;
  readonly rules: StyleRule[] = [];

  constructor(private readonly _tokens: readonly CssToken[], options: StylesheetOptions) {
    this._origin = options.origin ?? 'author';
    this._order = options.sourceOrderStart ?? 0;
    this._media = options.media ?? { colorScheme: 'light' };
  }

  /** Parse rules until end of input, or until the `}` closing a nested block */
  parseRuleList(nested: boolean): void {
    while (this._pos < this._tokens.length) {
      const token = this._tokens[this._pos];
      if (token.type === 'whitespace' || token.type === 'semicolon') {
        this._pos++;
        continue;
      }
      if (token.type === '}') {
        this._pos++;
        if (nested) return;
        continue;
      }
      if (token.type === 'at-keyword') {
        this._pos++;
        this._atRule(token.value);
        continue;
      }
      this._qualifiedRule(nested);
    }
  }

  private _atRule(name: string): void {
    const prelude: CssToken[] = [];
    let depth = 0;
    while (this._pos < this._tokens.length) {
      const token = this._tokens[this._pos];
      if (depth === 0 && token.type === 'semicolon') {
        this._pos++;
        logger.trace('Skipping statement at-rule', { name });
        return;
      }
      if (depth === 0 && token.type === '{') {
        this._pos++;
        if (name === 'media' && mediaQueryMatches(prelude, this._media)) {
          this.parseRuleList(true);
        } else {
          logger.trace('Skipping at-rule block', { name });
          this._consumeBlock();
        }
        return;
      }
      if (depth === 0 && token.type === '}') {
        // the enclosing block ends; leave the `}` to the caller
        return;
      }
      if (isOpener(token)) depth++;
      else if (isCloser(token) && depth > 0) depth--;
      prelude.push(token);
      this._pos++;
    }
  }

  private _qualifiedRule(nested: boolean): void {
    const prelude: CssToken[] = [];
    let depth = 0;
    while (this._pos < this._tokens.length) {
      const token = this._tokens[this._pos];
      if (depth === 0 && token.type === '{') break;
      if (depth === 0 && token.type === '}') {
        // a stray `}` ends the bad rule; inside a block it also closes the block
        if (!nested) this._pos++;
        logger.trace('Dropping rule prelude without a block');
        return;
      }
      if (isOpener(token)) depth++;
      else if (isCloser(token) && depth > 0) depth--;
      prelude.push(token);
      this._pos++;
    }
    if (this._pos >= this._tokens.length) {
      // prelude without a block
      return;
    }
    this._pos++;
    const block = this._consumeBlock();

    const selectors: Selector[] = [];
    for (const part of splitTopLevel(prelude, 'comma')) {
      const selector = parseSelector(trimTokens(part));
      if (selector === null) {
        logger.trace('Dropping rule with unsupported selector');
        return;
      }
      selectors.push(selector);
    }

    const declarations = parseDeclarationList(block);
    for (const selector of selectors) {
      this.rules.push({
        selector,
        declarations,
        specificity: specificity(selector),
        sourceOrder: this._order++,
        origin: this._origin,
      });
    }
  }

  /** Tokens up to the `}` matching an already consumed `{`, which is consumed too */
  private _consumeBlock(): CssToken[] {
    const content: CssToken[] = [];
    let depth = 0;
    while (this._pos < this._tokens.length) {
      const token = this._tokens[this._pos++];
      if (token.type === '}' && depth === 0) return content;
      if (isOpener(token)) depth++;
      else if (isCloser(token) && depth > 0) depth--;
      content.push(token);
    }
    return content;
  }
}

function parseDeclaration(tokens: readonly CssToken[]): Declaration | null {
  const trimmed = trimTokens(tokens);
  const name = trimmed[0];
  if (name?.type !== 'ident') return null;
  let i = 1;
  while (trimmed[i]?.type === 'whitespace') i++;
  if (trimmed[i]?.type !== 'colon') return null;

  let value = trimTokens(trimmed.slice(i + 1));
  let important = false;
  const last = value[value.length - 1];
  if (last?.type === 'ident' && last.value.toLowerCase() === 'important') {
    const rest = trimTokens(value.slice(0, -1));
    const bang = rest[rest.length - 1];
    if (bang?.type === 'delim' && bang.value === '!') {
      important = true;
      value = trimTokens(rest.slice(0, -1));
    }
  }
  if (value.length === 0) return null;
  return { property: name.value.toLowerCase(), value, important };
}

/**
 * Parse the contents of a declaration block. A nested `{…}` block ends the
 * declaration it appears in.
 */
export function parseDeclarationList(tokens: readonly CssToken[]): Declaration[] {
  const declarations: Declaration[] = [];
  let current: CssToken[] = [];
  let depth = 0;
  let sawBlock = false;

  const flush = () => {
    if (!sawBlock) {
      const declaration = parseDeclaration(current);
      if (declaration) declarations.push(declaration);
      else if (trimTokens(current).length > 0) logger.trace('Skipping invalid declaration');
    }
    current = [];
    sawBlock = false;
  };

  for (const token of tokens) {
    if (depth === 0 && token.type === 'semicolon') {
      flush();
      continue;
    }
    if (token.type === '{') sawBlock = true;
    if (isOpener(token)) depth++;
    else if (isCloser(token) && depth > 0) {
      depth--;
      if (depth === 0 && token.type === '}') {
        current = [];
        sawBlock = false;
        continue;
      }
    }
    current.push(token);
  }
  flush();
  return declarations;
}

/** Declarations of a `style` attribute */
export function parseInlineStyle(text: string): Declaration[] {
  return parseDeclarationList(tokenizeCss(text));
}

function mediaFeatureMatches(tokens: readonly CssToken[], media: MediaContext): boolean {
  const parts = trimTokens(tokens);
  const name = parts[0];
  if (name?.type !== 'ident') return false;
  const colon = parts.findIndex(token => token.type === 'colon');
  if (colon < 0) return false;
  const value = trimTokens(parts.slice(colon + 1));
  const keyword = value.length === 1 && value[0].type === 'ident' ? value[0].value.toLowerCase() : null;
  if (name.value.toLowerCase() === 'prefers-color-scheme') {
    return keyword === media.colorScheme;
  }
  return false;
}

function singleQueryMatches(tokens: readonly CssToken[], media: MediaContext): boolean {
  let negate = false;
  let result = true;
  let first = true;
  let i = 0;
  while (i < tokens.length) {
    const token = tokens[i];
    if (token.type === 'whitespace') {
      i++;
      continue;
    }
    if (token.type === 'ident') {
      const word = token.value.toLowerCase();
      if (first && word === 'not') {
        negate = true;
      } else if (first && word === 'only') {
        // no effect
      } else if (word === 'and') {
        // conjunction
      } else {
        result = result && MEDIA_TYPES_MATCHING.has(word);
      }
      first = word === 'not' || word === 'only' ? first : false;
      i++;
      continue;
    }
    if (token.type === '(') {
      let depth = 1;
      const inner: CssToken[] = [];
      i++;
      while (i < tokens.length) {
        const t = tokens[i++];
        if (isOpener(t)) depth++;
        else if (isCloser(t)) depth--;
        if (depth === 0) break;
        inner.push(t);
      }
      result = result && mediaFeatureMatches(inner, media);
      first = false;
      continue;
    }
    return false;
  }
  return negate ? !result : result;
}

/**
 * Evaluate a media query list. Media types `all` and `screen` and the
 * `prefers-color-scheme` feature are understood; anything else does not match.
 */
export function mediaQueryMatches(prelude: readonly CssToken[], media: MediaContext): boolean {
  const trimmed = trimTokens(prelude);
  if (trimmed.length === 0) return true;
  return splitTopLevel(trimmed, 'comma').some(query => singleQueryMatches(trimTokens(query), media));
}

/**
 * Parse stylesheet text into rules. Never throws; unparseable parts are
 * dropped.
 */
export function parseStylesheet(text: string, options: StylesheetOptions = {}): StyleRule[] {
  const parser = new StylesheetParser(tokenizeCss(text), options);
  parser.parseRuleList(false);
  logger.debug('Parsed stylesheet', { origin: options.origin ?? 'author', rules: parser.rules.length });
  return parser.rules;
}
