// HTML tokenizer: character stream → tags, text, comments and doctypes.
// A state machine after the HTML standard's, reduced to the states a
// text-mode browser needs. Every input produces a finite token list.

import entities from './entities.json' with { type: 'json' };
import legacyEntities from './legacy-entities.json' with { type: 'json' };
import type { Attribute } from './dom.js';

const NAMED_REFERENCES: Record<string, string> = entities;
// Names that also decode without a trailing semicolon
const LEGACY_REFERENCES: ReadonlySet<string> = new Set(legacyEntities);

export interface StartTagToken {
  type: 'startTag';
  name: string;
  attributes: Attribute[];
  selfClosing: boolean;
}

export interface EndTagToken {
  type: 'endTag';
  name: string;
}

export interface TextToken {
  type: 'text';
  data: string;
}

export interface CommentToken {
  type: 'comment';
  data: string;
}

export interface DoctypeToken {
  type: 'doctype';
  data: string;
}

export type HtmlToken = StartTagToken | EndTagToken | TextToken | CommentToken | DoctypeToken;

export type TokenizerState =
  | 'data'
  | 'tagOpen'
  | 'endTagOpen'
  | 'tagName'
  | 'beforeAttributeName'
  | 'attributeName'
  | 'afterAttributeName'
  | 'beforeAttributeValue'
  | 'attributeValue'
  | 'selfClosingStart'
  | 'markupDeclaration'
  | 'comment'
  | 'bogusComment'
  | 'doctype'
  | 'characterReference'
  | 'rawText';

/** Elements whose content is not markup */
const RAW_TEXT_ELEMENTS = new Set(['script', 'style', 'xmp', 'iframe', 'noembed', 'noframes']);
/** Elements whose content is text with character references */
const RCDATA_ELEMENTS = new Set(['title', 'textarea']);

const HEX_REFERENCE = /#[xX]([0-9A-Fa-f]+)(;?)/y;
const DECIMAL_REFERENCE = /#([0-9]+)(;?)/y;
const NAMED_REFERENCE = /([A-Za-z][A-Za-z0-9]*)(;?)/y;

function isAsciiAlpha(c: string): boolean {
  return (c >= 'a' && c <= 'z') || (c >= 'A' && c <= 'Z');
}

function isAsciiAlphanumeric(c: string): boolean {
  return isAsciiAlpha(c) || (c >= '0' && c <= '9');
}

function isWhitespace(c: string): boolean {
  return c === ' ' || c === '\n' || c === '\t' || c === '\f' || c === '\r';
}

function asciiLower(c: string): string {
  return c >= 'A' && c <= 'Z' ? String.fromCharCode(c.charCodeAt(0) + 32) : c;
}

function codePointToString(code: number): string {
  if (code === 0 || code > 0x10ffff || (code >= 0xd800 && code <= 0xdfff)) {
    return '�';
  }
  return String.fromCodePoint(code);
}

/**
 * Match a character reference starting just after an `&` at `pos`.
 * Returns the decoded text and how many characters it spans, or null when
 * the `&` should be taken literally.
 */
export function matchCharacterReference(
  input: string,
  pos: number,
  inAttribute: boolean,
): { text: string; length: number } | null {
  HEX_REFERENCE.lastIndex = pos;
  let match = HEX_REFERENCE.exec(input);
  if (match) {
    return { text: codePointToString(Number.parseInt(match[1], 16)), length: match[0].length };
  }

  DECIMAL_REFERENCE.lastIndex = pos;
  match = DECIMAL_REFERENCE.exec(input);
  if (match) {
    return { text: codePointToString(Number.parseInt(match[1], 10)), length: match[0].length };
  }

  NAMED_REFERENCE.lastIndex = pos;
  match = NAMED_REFERENCE.exec(input);
  if (!match) return null;

  const name = match[1];
  if (match[2] === ';' && Object.hasOwn(NAMED_REFERENCES, name)) {
    return { text: NAMED_REFERENCES[name], length: name.length + 1 };
  }

  // Legacy form without semicolon: longest known prefix
  for (let len = name.length; len > 1; len--) {
    const candidate = name.slice(0, len);
    if (!LEGACY_REFERENCES.has(candidate) || !Object.hasOwn(NAMED_REFERENCES, candidate)) continue;
    if (inAttribute) {
      const next = input[pos + len] ?? '';
      if (next === '=' || isAsciiAlphanumeric(next)) return null;
    }
    return { text: NAMED_REFERENCES[candidate], length: len };
  }
  return null;
}

/**
 * Decode every character reference in a run of text.
 */
export function decodeCharacterReferences(text: string): string {
  let result = '';
  let pos = 0;
  while (pos < text.length) {
    const amp = text.indexOf('&', pos);
    if (amp < 0) {
      result += text.slice(pos);
      break;
    }
    result += text.slice(pos, amp);
    const match = matchCharacterReference(text, amp + 1, false);
    if (match) {
      result += match.text;
      pos = amp + 1 + match.length;
    } else {
      result += '&';
      pos = amp + 1;
    }
  }
  return result;
}

interface PendingTag {
  name: string;
  isEnd: boolean;
  attributes: Attribute[];
  selfClosing: boolean;
}

export class HtmlTokenizer {
  private readonly _input: string;
  private _pos = 0;
  private _state: TokenizerState = 'data';
  private _returnState: 'data' | 'attributeValue' = 'data';
  private readonly _tokens: HtmlToken[] = [];
  private _text = '';
  private _tag: PendingTag = { name: '', isEnd: false, attributes: [], selfClosing: false };
  private _attrName = '';
  private _attrValue = '';
  private _quote: '"' | "'" | null = null;
  private _rawTextTag = '';

  constructor(input: string) {
    this._input = input.replace(/\r\n?/g, '\n');
  }

  get state(): TokenizerState {
    return this._state;
  }

  /**
   * Tokenize the whole input. Each loop iteration either consumes input or
   * moves to a state that will.
   */
  run(): HtmlToken[] {
    const input = this._input;
    while (this._pos < input.length) {
      const c = input[this._pos];
      switch (this._state) {
        case 'data':
          this._pos++;
          if (c === '<') this._state = 'tagOpen';
          else if (c === '&') this._beginCharacterReference('data');
          else this._text += c;
          break;

        case 'tagOpen':
          if (c === '!') {
            this._pos++;
            this._state = 'markupDeclaration';
          } else if (c === '/') {
            this._pos++;
            this._state = 'endTagOpen';
          } else if (isAsciiAlpha(c)) {
            this._startTag(false);
          } else if (c === '?') {
            this._state = 'bogusComment';
          } else {
            this._text += '<';
            this._state = 'data';
          }
          break;

        case 'endTagOpen':
          if (isAsciiAlpha(c)) {
            this._startTag(true);
          } else if (c === '>') {
            this._pos++;
            this._state = 'data';
          } else {
            this._state = 'bogusComment';
          }
          break;

        case 'tagName':
          this._pos++;
          if (isWhitespace(c)) this._state = 'beforeAttributeName';
          else if (c === '/') this._state = 'selfClosingStart';
          else if (c === '>') this._emitTag();
          else this._tag.name += asciiLower(c);
          break;

        case 'beforeAttributeName':
          if (isWhitespace(c)) {
            this._pos++;
          } else if (c === '/') {
            this._pos++;
            this._state = 'selfClosingStart';
          } else if (c === '>') {
            this._pos++;
            this._emitTag();
          } else {
            this._attrName = '';
            this._attrValue = '';
            this._state = 'attributeName';
            if (c === '=') {
              this._attrName = '=';
              this._pos++;
            }
          }
          break;

        case 'attributeName':
          this._pos++;
          if (isWhitespace(c)) {
            this._state = 'afterAttributeName';
          } else if (c === '/') {
            this._commitAttribute();
            this._state = 'selfClosingStart';
          } else if (c === '>') {
            this._commitAttribute();
            this._emitTag();
          } else if (c === '=') {
            this._state = 'beforeAttributeValue';
          } else {
            this._attrName += asciiLower(c);
          }
          break;

        case 'afterAttributeName':
          if (isWhitespace(c)) {
            this._pos++;
          } else if (c === '/') {
            this._pos++;
            this._commitAttribute();
            this._state = 'selfClosingStart';
          } else if (c === '=') {
            this._pos++;
            this._state = 'beforeAttributeValue';
          } else if (c === '>') {
            this._pos++;
            this._commitAttribute();
            this._emitTag();
          } else {
            this._commitAttribute();
            this._state = 'attributeName';
          }
          break;

        case 'beforeAttributeValue':
          if (isWhitespace(c)) {
            this._pos++;
          } else if (c === '"' || c === "'") {
            this._pos++;
            this._quote = c;
            this._state = 'attributeValue';
          } else if (c === '>') {
            this._pos++;
            this._commitAttribute();
            this._emitTag();
          } else {
            this._quote = null;
            this._state = 'attributeValue';
          }
          break;

        case 'attributeValue':
          this._pos++;
          if (this._quote !== null) {
            if (c === this._quote) {
              this._commitAttribute();
              this._state = 'beforeAttributeName';
            } else if (c === '&') {
              this._beginCharacterReference('attributeValue');
            } else {
              this._attrValue += c;
            }
          } else if (isWhitespace(c)) {
            this._commitAttribute();
            this._state = 'beforeAttributeName';
          } else if (c === '&') {
            this._beginCharacterReference('attributeValue');
          } else if (c === '>') {
            this._commitAttribute();
            this._emitTag();
          } else {
            this._attrValue += c;
          }
          break;

        case 'selfClosingStart':
          if (c === '>') {
            this._pos++;
            this._tag.selfClosing = true;
            this._emitTag();
          } else {
            this._state = 'beforeAttributeName';
          }
          break;

        case 'characterReference': {
          const match = matchCharacterReference(input, this._pos, this._returnState === 'attributeValue');
          const decoded = match ? match.text : '&';
          if (match) this._pos += match.length;
          if (this._returnState === 'data') this._text += decoded;
          else this._attrValue += decoded;
          this._state = this._returnState;
          break;
        }

        case 'markupDeclaration':
          if (input.startsWith('--', this._pos)) {
            this._pos += 2;
            this._state = 'comment';
          } else if (input.slice(this._pos, this._pos + 7).toLowerCase() === 'doctype') {
            this._pos += 7;
            this._state = 'doctype';
          } else {
            this._state = 'bogusComment';
          }
          break;

        case 'comment':
          this._consumeComment();
          break;

        case 'bogusComment': {
          const data = this._consumeUntil('>');
          this._push({ type: 'comment', data });
          this._state = 'data';
          break;
        }

        case 'doctype': {
          const data = this._consumeUntil('>').trim();
          this._push({ type: 'doctype', data });
          this._state = 'data';
          break;
        }

        case 'rawText':
          this._consumeRawText();
          break;
      }
    }
    this._finish();
    return this._tokens;
  }

  private _beginCharacterReference(returnState: 'data' | 'attributeValue'): void {
    this._returnState = returnState;
    this._state = 'characterReference';
  }

  private _startTag(isEnd: boolean): void {
    this._tag = { name: '', isEnd, attributes: [], selfClosing: false };
    this._attrName = '';
    this._attrValue = '';
    this._state = 'tagName';
  }

  private _commitAttribute(): void {
    if (this._attrName !== '') {
      this._tag.attributes.push({ name: this._attrName, value: this._attrValue });
    }
    this._attrName = '';
    this._attrValue = '';
  }

  private _emitTag(): void {
    const tag = this._tag;
    this._state = 'data';
    if (tag.isEnd) {
      this._push({ type: 'endTag', name: tag.name });
      return;
    }
    this._push({ type: 'startTag', name: tag.name, attributes: tag.attributes, selfClosing: tag.selfClosing });
    if (RAW_TEXT_ELEMENTS.has(tag.name) || RCDATA_ELEMENTS.has(tag.name)) {
      this._rawTextTag = tag.name;
      this._state = 'rawText';
    }
  }

  private _consumeComment(): void {
    const input = this._input;
    let data = '';
    if (input.startsWith('>', this._pos)) {
      this._pos += 1;
    } else if (input.startsWith('->', this._pos)) {
      this._pos += 2;
    } else {
      const end = input.indexOf('-->', this._pos);
      if (end < 0) {
        data = input.slice(this._pos);
        this._pos = input.length;
      } else {
        data = input.slice(this._pos, end);
        this._pos = end + 3;
      }
    }
    this._push({ type: 'comment', data });
    this._state = 'data';
  }

  private _consumeUntil(terminator: string): string {
    const end = this._input.indexOf(terminator, this._pos);
    const stop = end < 0 ? this._input.length : end;
    const data = this._input.slice(this._pos, stop);
    this._pos = end < 0 ? stop : stop + terminator.length;
    return data;
  }

  /** Everything up to the matching end tag is text; the end tag itself is tokenized normally. */
  private _consumeRawText(): void {
    const closing = new RegExp(`</${this._rawTextTag}(?=[\\t\\n\\f\\r />]|$)`, 'ig');
    closing.lastIndex = this._pos;
    const match = closing.exec(this._input);
    const end = match ? match.index : this._input.length;
    const text = this._input.slice(this._pos, end);
    this._text += RCDATA_ELEMENTS.has(this._rawTextTag) ? decodeCharacterReferences(text) : text;
    this._pos = end;
    this._state = 'data';
  }

  private _flushText(): void {
    if (this._text !== '') {
      this._tokens.push({ type: 'text', data: this._text });
      this._text = '';
    }
  }

  private _push(token: HtmlToken): void {
    this._flushText();
    this._tokens.push(token);
  }

  /** End of input: nothing already read is discarded */
  private _finish(): void {
    switch (this._state) {
      case 'tagOpen':
        this._text += '<';
        break;
      case 'endTagOpen':
        this._text += '</';
        break;
      case 'tagName':
      case 'beforeAttributeName':
      case 'attributeName':
      case 'afterAttributeName':
      case 'beforeAttributeValue':
      case 'attributeValue':
      case 'selfClosingStart':
        this._commitAttribute();
        this._emitTag();
        break;
      case 'characterReference':
        if (this._returnState === 'data') {
          this._text += '&';
        } else {
          this._attrValue += '&';
          this._commitAttribute();
          this._emitTag();
        }
        break;
      case 'markupDeclaration':
      case 'comment':
      case 'bogusComment':
        this._push({ type: 'comment', data: '' });
        break;
      case 'doctype':
        this._push({ type: 'doctype', data: '' });
        break;
      case 'data':
      case 'rawText':
        break;
    }
    this._state = 'data';
    this._flushText();
  }
}

/**
 * Tokenize an HTML document.
 */
export function tokenize(input: string): HtmlToken[] {
  return new HtmlTokenizer(input).run();
}
