// Document: a parsed DOM plus what the browser needs to know about it
// before styling (title, base URL, stylesheet and image references)

import type { DomTree, NodeHandle } from './html/dom.js';
import { decodeText } from './html/charset.js';
import { parseHtml } from './html/tree-builder.js';
import type { Size } from './geometry.js';
import { mediaType, type TransportResponse } from './net/transport.js';
import { resolveUrl } from './net/url.js';
import { getLogger } from './logging.js';

const logger = getLogger('Document');

export type StylesheetSource =
  | { kind: 'inline'; node: NodeHandle; text: string; media: string }
  | { kind: 'external'; node: NodeHandle; url: string; media: string };

export interface ImageSource {
  node: NodeHandle;
  url: string;
}

export interface ToadDocument {
  tree: DomTree;
  root: NodeHandle;
  /** URL the document was loaded from */
  url: string;
  /** URL relative references resolve against: `<base href>` or `url` */
  baseUrl: string;
  /** First `<title>` with whitespace collapsed; empty when there is none */
  title: string;
  /** Columns × rows the document is laid out for */
  viewport: Size;
  stylesheets: StylesheetSource[];
  images: ImageSource[];
}

export type DocumentResult =
  | { ok: true; document: ToadDocument }
  | { ok: false; error: string };

const HTML_TYPES = new Set(['text/html', 'application/xhtml+xml', '']);
const IMAGE_TYPES = new Set(['image/png', 'image/jpeg', 'image/jpg', 'image/gif']);

function collapse(text: string): string {
  return text.replace(/[ \t\n\r\f]+/g, ' ').trim();
}

function escapeHtml(text: string): string {
  return text.replace(/&/g, '&amp;').replace(/</g, '&lt;').replace(/>/g, '&gt;').replace(/"/g, '&quot;');
}

function fileName(url: string): string {
  try {
    const path = new URL(url).pathname;
    return decodeURIComponent(path.slice(path.lastIndexOf('/') + 1));
  } catch {
    return url;
  }
}

/**
 * Build a document from markup. References are resolved against the base
 * URL; ones that do not resolve are left out.
 */
export function createDocument(html: string, url: string, viewport: Size): ToadDocument {
  const { tree, root } = parseHtml(html);

  let baseUrl = url;
  const base = tree.findAll(root, 'base').find(element => tree.hasAttribute(element.handle, 'href'));
  const baseHref = base ? tree.getAttribute(base.handle, 'href') : undefined;
  if (baseHref !== undefined) {
    const resolved = resolveUrl(baseHref, url);
    if (resolved.ok) baseUrl = resolved.url;
  }

  const titleElement = tree.findFirst(root, 'title');
  const title = titleElement ? collapse(tree.textContent(titleElement.handle)) : '';

  const stylesheets: StylesheetSource[] = [];
  const images: ImageSource[] = [];
  for (const node of tree.descendants(root)) {
    if (node.kind !== 'element') continue;
    const attr = (name: string) => tree.getAttribute(node.handle, name);
    switch (node.tagName) {
      case 'style':
        stylesheets.push({ kind: 'inline', node: node.handle, text: tree.textContent(node.handle), media: attr('media') ?? '' });
        break;
      case 'link': {
        const rel = (attr('rel') ?? '').toLowerCase().split(/\s+/);
        const href = attr('href');
        if (!rel.includes('stylesheet') || rel.includes('alternate') || href === undefined) break;
        const resolved = resolveUrl(href, baseUrl);
        if (resolved.ok) stylesheets.push({ kind: 'external', node: node.handle, url: resolved.url, media: attr('media') ?? '' });
        break;
      }
      case 'img': {
        const src = attr('src');
        if (src === undefined || src.trim() === '') break;
        const resolved = resolveUrl(src, baseUrl);
        if (resolved.ok) images.push({ node: node.handle, url: resolved.url });
        break;
      }
    }
  }

  logger.debug('Document created', { url, title, stylesheets: stylesheets.length, images: images.length, nodes: tree.size });
  return { tree, root, url, baseUrl, title, viewport, stylesheets, images };
}

/**
 * Turn a response into a document according to its content type: markup is
 * parsed, plain text wrapped in `<pre>`, images wrapped in an `<img>`.
 */
export function documentFromResponse(response: TransportResponse, viewport: Size): DocumentResult {
  const type = mediaType(response.contentType);
  if (HTML_TYPES.has(type)) {
    return { ok: true, document: createDocument(decodeText(response.body, response.contentType), response.url, viewport) };
  }
  if (type.startsWith('text/')) {
    const text = decodeText(response.body, response.contentType);
    const name = escapeHtml(fileName(response.url));
    return { ok: true, document: createDocument(`<title>${name}</title><pre>${escapeHtml(text)}</pre>`, response.url, viewport) };
  }
  if (IMAGE_TYPES.has(type)) {
    const name = escapeHtml(fileName(response.url));
    const src = escapeHtml(response.url);
    return { ok: true, document: createDocument(`<title>${name}</title><img src="${src}" alt="${name}">`, response.url, viewport) };
  }
  return { ok: false, error: `Unsupported content type: ${type}` };
}
