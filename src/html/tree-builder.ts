// Tree builder: token stream → DomTree.
//
// Implements a documented subset of the HTML standard's error recovery:
// - `html` always exists; `head` is created for head-only content seen before
//   the body; `body` is synthesized for the first body content and always
//   exists once building ends
// - opening a block-level element closes an open `p`; `li`, `dd`/`dt`,
//   `option`/`optgroup`, headings, table rows/cells and links close their
//   open counterparts
// - void elements never stay open; `</br>` is treated as `<br>`
// - end tags without an open match are ignored, `</body>` and `</html>`
//   leave the body open so trailing content is kept
// - elements still open at the end of input are closed implicitly

import { DomTree, type NodeHandle } from './dom.js';
import { tokenize, type HtmlToken, type StartTagToken } from './tokenizer.js';
import { getLogger } from '../logging.js';

const logger = getLogger('TreeBuilder');

export const VOID_ELEMENTS = new Set([
  'area', 'base', 'br', 'col', 'embed', 'hr', 'img', 'input', 'link', 'meta',
  'param', 'source', 'track', 'wbr', 'keygen',
]);

const HEAD_ELEMENTS = new Set(['base', 'link', 'meta', 'title', 'style', 'script', 'noscript']);

/** Start tags that close an open `p` */
const CLOSES_P = new Set([
  'address', 'article', 'aside', 'blockquote', 'center', 'details', 'dialog', 'dir', 'div', 'dl',
  'fieldset', 'figcaption', 'figure', 'footer', 'form', 'h1', 'h2', 'h3', 'h4', 'h5', 'h6',
  'header', 'hgroup', 'hr', 'li', 'dd', 'dt', 'main', 'menu', 'nav', 'ol', 'p', 'pre', 'section',
  'summary', 'table', 'ul', 'listing', 'plaintext', 'xmp',
]);

const HEADINGS = new Set(['h1', 'h2', 'h3', 'h4', 'h5', 'h6']);

/** Elements that stop the search for an element to close implicitly */
const SCOPE_BOUNDARIES = new Set(['html', 'body', 'table', 'td', 'th', 'caption', 'button', 'object', 'marquee', 'applet', 'template']);

export class TreeBuilder {
  readonly tree = new DomTree();
  readonly html: NodeHandle;
  private _head: NodeHandle | null = null;
  private _body: NodeHandle | null = null;
  private readonly _stack: NodeHandle[];

  constructor() {
    this.html = this.tree.createElement('html', [], null);
    this._stack = [this.html];
  }

  get body(): NodeHandle | null {
    return this._body;
  }

  /** Tag names on the open-element stack, bottom first */
  openElements(): string[] {
    return this._stack.map(handle => this._tagOf(handle));
  }

  process(token: HtmlToken): void {
    switch (token.type) {
      case 'doctype':
        return;
      case 'comment':
        this.tree.appendComment(token.data, this._current());
        return;
      case 'text':
        this._insertText(token.data);
        return;
      case 'startTag':
        this._startTag(token);
        return;
      case 'endTag':
        this._endTag(token.name);
        return;
    }
  }

  /**
   * Close everything and return the tree. The stack is discarded, which
   * closes unclosed elements in stack order.
   */
  finish(): DomTree {
    this._ensureBody();
    this._stack.length = 1;
    return this.tree;
  }

  private _current(): NodeHandle {
    return this._stack[this._stack.length - 1];
  }

  private _tagOf(handle: NodeHandle): string {
    return this.tree.element(handle)?.tagName ?? '';
  }

  private _insertText(data: string): void {
    if (this._body === null) {
      const inHead = this._head !== null && this._stack.includes(this._head);
      if (inHead && this._current() !== this._head) {
        // inside <title>, <style>, ...
        this.tree.appendText(data, this._current());
        return;
      }
      const trimmed = data.replace(/^[ \t\n\f\r]+/, '');
      if (trimmed === '') return;
      this._ensureBody();
      data = trimmed;
    }
    this.tree.appendText(data, this._current());
  }

  private _ensureHeadOpen(): void {
    if (this._head === null) {
      this._head = this.tree.createElement('head', [], this.html);
    }
    if (!this._stack.includes(this._head)) {
      this._stack.length = 1;
      this._stack.push(this._head);
    }
  }

  private _ensureBody(attributes: StartTagToken['attributes'] = []): void {
    if (this._body !== null) return;
    // leaving the head
    this._stack.length = 1;
    this._body = this.tree.createElement('body', attributes, this.html);
    this._stack.push(this._body);
  }

  private _startTag(token: StartTagToken): void {
    const name = token.name;

    if (name === 'html') {
      this.tree.mergeAttributes(this.html, token.attributes);
      return;
    }
    if (name === 'head') {
      if (this._body === null && this._head === null) this._ensureHeadOpen();
      return;
    }
    if (name === 'body') {
      if (this._body === null) this._ensureBody(token.attributes);
      else this.tree.mergeAttributes(this._body, token.attributes);
      return;
    }

    if (this._body === null) {
      if (HEAD_ELEMENTS.has(name)) {
        this._ensureHeadOpen();
        this._insertElement(token);
        return;
      }
      this._ensureBody();
    }

    this._closeImplied(name);
    this._insertElement(token);
  }

  private _insertElement(token: StartTagToken): void {
    const handle = this.tree.createElement(token.name, token.attributes, this._current());
    if (!VOID_ELEMENTS.has(token.name)) {
      this._stack.push(handle);
    }
  }

  /** Implicit end tags for the element about to open */
  private _closeImplied(name: string): void {
    if (CLOSES_P.has(name)) {
      this._closeInScope('p');
    }
    switch (name) {
      case 'li':
        this._closeInScope('li', ['ul', 'ol', 'menu']);
        break;
      case 'dd':
      case 'dt':
        this._closeInScope(['dd', 'dt'], ['dl']);
        break;
      case 'option':
        this._closeCurrent('option');
        break;
      case 'optgroup':
        this._closeCurrent('option');
        this._closeCurrent('optgroup');
        break;
      case 'tr':
        this._closeInScope(['td', 'th', 'tr'], ['table', 'tbody', 'thead', 'tfoot']);
        break;
      case 'td':
      case 'th':
        this._closeInScope(['td', 'th'], ['tr', 'table']);
        break;
      case 'tbody':
      case 'thead':
      case 'tfoot':
        this._closeInScope(['td', 'th', 'tr', 'tbody', 'thead', 'tfoot'], ['table']);
        break;
      case 'a':
        this._closeInScope('a');
        break;
      default:
        if (HEADINGS.has(name) && HEADINGS.has(this._tagOf(this._current()))) {
          logger.trace('Closing unterminated heading', { opened: name });
          this._stack.pop();
        }
    }
  }

  private _closeCurrent(name: string): void {
    if (this._tagOf(this._current()) === name) {
      this._stack.pop();
    }
  }

  /**
   * Pop up to and including the nearest open element named `target`, unless a
   * scope boundary (or one of `extraBoundaries`) is reached first.
   */
  private _closeInScope(target: string | string[], extraBoundaries: string[] = []): void {
    const targets = Array.isArray(target) ? target : [target];
    for (let i = this._stack.length - 1; i > 0; i--) {
      const tag = this._tagOf(this._stack[i]);
      if (targets.includes(tag)) {
        this._stack.length = i;
        return;
      }
      if (SCOPE_BOUNDARIES.has(tag) || extraBoundaries.includes(tag)) return;
    }
  }

  private _endTag(name: string): void {
    switch (name) {
      case 'html':
      case 'body':
        return;
      case 'head':
        if (this._head !== null) {
          const index = this._stack.indexOf(this._head);
          if (index > 0) this._stack.length = index;
        }
        return;
      case 'br':
        this._startTag({ type: 'startTag', name: 'br', attributes: [], selfClosing: false });
        return;
    }

    // html (index 0) and body are never popped by an end tag
    for (let i = this._stack.length - 1; i > 0; i--) {
      const handle = this._stack[i];
      if (handle === this._body) break;
      if (this._tagOf(handle) === name) {
        this._stack.length = i;
        return;
      }
    }
    logger.trace('Ignoring unmatched end tag', { name });
  }
}

/**
 * Build a DOM tree from tokens.
 */
export function buildTree(tokens: Iterable<HtmlToken>): { tree: DomTree; root: NodeHandle } {
  const builder = new TreeBuilder();
  for (const token of tokens) {
    builder.process(token);
  }
  return { tree: builder.finish(), root: builder.html };
}

/**
 * Tokenize and build in one step.
 */
export function parseHtml(text: string): { tree: DomTree; root: NodeHandle } {
  return buildTree(tokenize(text));
}
