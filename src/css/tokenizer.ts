// CSS tokenizer, after CSS Syntax Level 3 with the token kinds the parser uses.

export type CssToken =
  | { type: 'ident'; value: string }
  | { type: 'function'; value: string }
  | { type: 'at-keyword'; value: string }
  | { type: 'hash'; value: string }
  | { type: 'string'; value: string }
  | { type: 'number'; value: number }
  | { type: 'percentage'; value: number }
  | { type: 'dimension'; value: number; unit: string }
  | { type: 'delim'; value: string }
  | { type: 'whitespace' }
  | { type: 'colon' }
  | { type: 'semicolon' }
  | { type: 'comma' }
  | { type: '{' }
  | { type: '}' }
  | { type: '(' }
  | { type: ')' }
  | { type: '[' }
  | { type: ']' };

export type CssTokenType = CssToken['type'];

const PUNCTUATION: Record<string, CssToken> = {
  ':': { type: 'colon' },
  ';': { type: 'semicolon' },
  ',': { type: 'comma' },
  '{': { type: '{' },
  '}': { type: '}' },
  '(': { type: '(' },
  ')': { type: ')' },
  '[': { type: '[' },
  ']': { type: ']' },
};

function isDigit(c: string | undefined): boolean {
  return c !== undefined && c >= '0' && c <= '9';
}

function isHexDigit(c: string | undefined): boolean {
  return c !== undefined && /[0-9a-fA-F]/.test(c);
}

function isNameStart(c: string | undefined): boolean {
  if (c === undefined) return false;
  return (c >= 'a' && c <= 'z') || (c >= 'A' && c <= 'Z') || c === '_' || c.charCodeAt(0) >= 0x80;
}

function isNameChar(c: string | undefined): boolean {
  return isNameStart(c) || isDigit(c) || c === '-';
}

function isWhitespace(c: string | undefined): boolean {
  return c === ' ' || c === '\t' || c === '\n' || c === '\r' || c === '\f';
}

class CssTokenizer {
  private _pos = 0;
  private _pending: CssToken | null = null;

  constructor(private readonly _input: string) {}

  run(): CssToken[] {
    const tokens: CssToken[] = [];
    for (;;) {
      const token = this._next();
      if (token === null) break;
      tokens.push(token);
      if (this._pending) {
        tokens.push(this._pending);
        this._pending = null;
      }
    }
    return tokens;
  }

  private _peek(offset = 0): string | undefined {
    return this._input[this._pos + offset];
  }

  private _startsEscape(offset = 0): boolean {
    return this._peek(offset) === '\\' && this._peek(offset + 1) !== '\n' && this._peek(offset + 1) !== undefined;
  }

  private _startsIdent(offset = 0): boolean {
    const c = this._peek(offset);
    if (c === '-') {
      const next = this._peek(offset + 1);
      return isNameStart(next) || next === '-' || this._startsEscape(offset + 1);
    }
    return isNameStart(c) || this._startsEscape(offset);
  }

  private _startsNumber(): boolean {
    const c = this._peek();
    if (c === '+' || c === '-') {
      return isDigit(this._peek(1)) || (this._peek(1) === '.' && isDigit(this._peek(2)));
    }
    if (c === '.') return isDigit(this._peek(1));
    return isDigit(c);
  }

  private _next(): CssToken | null {
    // comments
    while (this._input.startsWith('/*', this._pos)) {
      const end = this._input.indexOf('*/', this._pos + 2);
      this._pos = end < 0 ? this._input.length : end + 2;
    }

    const c = this._peek();
    if (c === undefined) return null;

    if (isWhitespace(c)) {
      while (isWhitespace(this._peek())) this._pos++;
      return { type: 'whitespace' };
    }
    if (c === '"' || c === "'") {
      this._pos++;
      return this._consumeString(c);
    }
    if (this._startsNumber()) {
      return this._consumeNumeric();
    }
    if (this._startsIdent()) {
      return this._consumeIdentLike();
    }
    if (c === '#') {
      this._pos++;
      if (isNameChar(this._peek()) || this._startsEscape()) {
        return { type: 'hash', value: this._consumeName() };
      }
      return { type: 'delim', value: '#' };
    }
    if (c === '@') {
      this._pos++;
      if (this._startsIdent()) {
        return { type: 'at-keyword', value: this._consumeName().toLowerCase() };
      }
      return { type: 'delim', value: '@' };
    }
    if (this._input.startsWith('<!--', this._pos)) {
      this._pos += 4;
      return { type: 'whitespace' };
    }
    if (this._input.startsWith('-->', this._pos)) {
      this._pos += 3;
      return { type: 'whitespace' };
    }

    this._pos++;
    return PUNCTUATION[c] ?? { type: 'delim', value: c };
  }

  private _consumeEscape(): string {
    // the backslash is already consumed
    let hex = '';
    while (hex.length < 6 && isHexDigit(this._peek())) {
      hex += this._peek();
      this._pos++;
    }
    if (hex.length > 0) {
      if (isWhitespace(this._peek())) this._pos++;
      const code = Number.parseInt(hex, 16);
      return code === 0 || code > 0x10ffff || (code >= 0xd800 && code <= 0xdfff)
        ? '�'
        : String.fromCodePoint(code);
    }
    const c = this._peek();
    this._pos++;
    return c ?? '�';
  }

  private _consumeName(): string {
    let name = '';
    for (;;) {
      const c = this._peek();
      if (isNameChar(c) && c !== undefined) {
        name += c;
        this._pos++;
      } else if (this._startsEscape()) {
        this._pos++;
        name += this._consumeEscape();
      } else {
        return name;
      }
    }
  }

  private _consumeString(quote: string): CssToken {
    let value = '';
    for (;;) {
      const c = this._peek();
      if (c === undefined || c === quote) {
        this._pos++;
        return { type: 'string', value };
      }
      if (c === '\n') {
        // unterminated string: ends at the newline
        return { type: 'string', value };
      }
      if (c === '\\') {
        this._pos++;
        if (this._peek() === '\n') {
          this._pos++;
        } else if (this._peek() !== undefined) {
          value += this._consumeEscape();
        }
        continue;
      }
      value += c;
      this._pos++;
    }
  }

  private _consumeNumeric(): CssToken {
    const match = /[+-]?(?:\d+(?:\.\d+)?|\.\d+)(?:[eE][+-]?\d+)?/y;
    match.lastIndex = this._pos;
    const result = match.exec(this._input);
    const text = result ? result[0] : '0';
    this._pos += text.length;
    const value = Number.parseFloat(text);

    if (this._peek() === '%') {
      this._pos++;
      return { type: 'percentage', value };
    }
    if (this._startsIdent()) {
      return { type: 'dimension', value, unit: this._consumeName().toLowerCase() };
    }
    return { type: 'number', value };
  }

  private _consumeIdentLike(): CssToken {
    const name = this._consumeName();
    if (this._peek() !== '(') {
      return { type: 'ident', value: name };
    }
    this._pos++;
    if (name.toLowerCase() === 'url') {
      return this._consumeUrl();
    }
    return { type: 'function', value: name.toLowerCase() };
  }

  /** `url(` followed by an unquoted URL becomes a function token with one string argument */
  private _consumeUrl(): CssToken {
    while (isWhitespace(this._peek())) this._pos++;
    const c = this._peek();
    if (c === '"' || c === "'") {
      return { type: 'function', value: 'url' };
    }
    const end = this._input.indexOf(')', this._pos);
    const stop = end < 0 ? this._input.length : end;
    const value = this._input.slice(this._pos, stop).trim();
    this._pos = stop;
    this._pending = { type: 'string', value };
    return { type: 'function', value: 'url' };
  }
}

/**
 * Tokenize stylesheet or declaration-list text.
 */
export function tokenizeCss(input: string): CssToken[] {
  return new CssTokenizer(input).run();
}
