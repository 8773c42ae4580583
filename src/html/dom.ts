// DOM tree stored in an arena of nodes addressed by numeric handles.
// Children are ordered handle lists and the parent is an optional handle, so
// the structure holds no reference cycles.

export type NodeHandle = number;

export interface Attribute {
  name: string;
  value: string;
}

export interface ElementNode {
  kind: 'element';
  handle: NodeHandle;
  parent: NodeHandle | null;
  children: NodeHandle[];
  tagName: string;
  attributes: Attribute[];
}

export interface TextNode {
  kind: 'text';
  handle: NodeHandle;
  parent: NodeHandle | null;
  data: string;
}

export interface CommentNode {
  kind: 'comment';
  handle: NodeHandle;
  parent: NodeHandle | null;
  data: string;
}

export type DomNode = ElementNode | TextNode | CommentNode;

export class DomTree {
  private readonly _nodes: DomNode[] = [];

  get size(): number {
    return this._nodes.length;
  }

  /**
   * Create an element. `parent` is null only for the root.
   */
  createElement(tagName: string, attributes: Attribute[], parent: NodeHandle | null): NodeHandle {
    const handle = this._nodes.length;
    this._nodes.push({ kind: 'element', handle, parent, children: [], tagName, attributes: uniqueAttributes(attributes) });
    if (parent !== null) this._elementOrThrow(parent).children.push(handle);
    return handle;
  }

  /**
   * Append text to `parent`, merging with a trailing text child.
   */
  appendText(data: string, parent: NodeHandle): NodeHandle {
    const element = this._elementOrThrow(parent);
    const last = element.children.length > 0 ? this._nodes[element.children[element.children.length - 1]] : undefined;
    if (last?.kind === 'text') {
      last.data += data;
      return last.handle;
    }
    const handle = this._nodes.length;
    this._nodes.push({ kind: 'text', handle, parent, data });
    element.children.push(handle);
    return handle;
  }

  appendComment(data: string, parent: NodeHandle): NodeHandle {
    const handle = this._nodes.length;
    this._nodes.push({ kind: 'comment', handle, parent, data });
    this._elementOrThrow(parent).children.push(handle);
    return handle;
  }

  node(handle: NodeHandle): DomNode | undefined {
    return this._nodes[handle];
  }

  element(handle: NodeHandle): ElementNode | undefined {
    const node = this._nodes[handle];
    return node?.kind === 'element' ? node : undefined;
  }

  children(handle: NodeHandle): readonly NodeHandle[] {
    const node = this._nodes[handle];
    return node?.kind === 'element' ? node.children : [];
  }

  parentElement(handle: NodeHandle): ElementNode | undefined {
    const parent = this._nodes[handle]?.parent;
    return parent === null || parent === undefined ? undefined : this.element(parent);
  }

  getAttribute(handle: NodeHandle, name: string): string | undefined {
    return this.element(handle)?.attributes.find(attr => attr.name === name)?.value;
  }

  hasAttribute(handle: NodeHandle, name: string): boolean {
    return this.getAttribute(handle, name) !== undefined;
  }

  /** Add the attributes the element does not carry yet (repeated `<html>`/`<body>` tags) */
  mergeAttributes(handle: NodeHandle, attributes: Attribute[]): void {
    const element = this._elementOrThrow(handle);
    for (const attr of attributes) {
      if (!element.attributes.some(existing => existing.name === attr.name)) {
        element.attributes.push(attr);
      }
    }
  }

  /**
   * Depth-first pre-order walk of element and text handles below (and
   * including) `root`.
   */
  *descendants(root: NodeHandle): Generator<DomNode> {
    const stack: NodeHandle[] = [root];
    while (stack.length > 0) {
      const handle = stack.pop();
      if (handle === undefined) break;
      const node = this._nodes[handle];
      if (!node) continue;
      yield node;
      if (node.kind === 'element') {
        for (let i = node.children.length - 1; i >= 0; i--) {
          stack.push(node.children[i]);
        }
      }
    }
  }

  /** First element with the given tag in document order */
  findFirst(root: NodeHandle, tagName: string): ElementNode | undefined {
    for (const node of this.descendants(root)) {
      if (node.kind === 'element' && node.tagName === tagName) return node;
    }
    return undefined;
  }

  findAll(root: NodeHandle, tagName: string): ElementNode[] {
    const result: ElementNode[] = [];
    for (const node of this.descendants(root)) {
      if (node.kind === 'element' && node.tagName === tagName) result.push(node);
    }
    return result;
  }

  textContent(handle: NodeHandle): string {
    let text = '';
    for (const node of this.descendants(handle)) {
      if (node.kind === 'text') text += node.data;
    }
    return text;
  }

  /** Nesting depth of the deepest node below `handle`, counting `handle` as 1 */
  depth(handle: NodeHandle): number {
    let max = 0;
    for (const child of this.children(handle)) {
      max = Math.max(max, this.depth(child));
    }
    return max + 1;
  }

  private _elementOrThrow(handle: NodeHandle): ElementNode {
    const element = this.element(handle);
    if (!element) {
      // Tree construction only ever passes handles it created as elements
      throw new RangeError(`Node ${handle} is not an element`);
    }
    return element;
  }
}

function uniqueAttributes(attributes: Attribute[]): Attribute[] {
  const seen = new Set<string>();
  const result: Attribute[] = [];
  for (const attr of attributes) {
    if (attr.name === '' || seen.has(attr.name)) continue;
    seen.add(attr.name);
    result.push(attr);
  }
  return result;
}
