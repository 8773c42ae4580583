// Transport: fetches documents, stylesheets and images over http(s), from
// the local filesystem, or out of data: URLs

import { readdir, readFile, stat } from 'node:fs/promises';
import { extname } from 'node:path';
import { fileURLToPath } from 'node:url';
import { getLogger } from '../logging.js';
import { describeError, ensureError } from '../utils/error.js';

const logger = getLogger('Transport');

export type ResourceKind = 'document' | 'stylesheet' | 'image';

export interface TransportRequest {
  method: 'GET' | 'POST';
  url: string;
  kind: ResourceKind;
  body?: string | null;
  contentType?: string | null;
}

export interface TransportResponse {
  /** Final URL after redirects */
  url: string;
  status: number;
  /** Full Content-Type header value, possibly with parameters */
  contentType: string;
  body: Uint8Array;
}

export type TransportResult =
  | { ok: true; response: TransportResponse }
  | { ok: false; error: string };

export interface SendOptions {
  timeoutMs: number;
}

/**
 * Anything that can answer a request. The browser only talks to this
 * interface; tests supply an in-memory implementation.
 */
export interface Transport {
  send(request: TransportRequest, options: SendOptions): Promise<TransportResult>;
}

export const ACCEPT: Readonly<Record<ResourceKind, string>> = {
  document: 'text/html,application/xhtml+xml,text/plain;q=0.9,*/*;q=0.8',
  stylesheet: 'text/css,*/*;q=0.1',
  image: 'image/png,image/jpeg,image/gif;q=0.9,*/*;q=0.5',
};

const MAX_BODY_BYTES = 32 * 1024 * 1024;

const EXTENSION_TYPES: Record<string, string> = {
  '.html': 'text/html',
  '.htm': 'text/html',
  '.xhtml': 'application/xhtml+xml',
  '.css': 'text/css',
  '.txt': 'text/plain',
  '.md': 'text/plain',
  '.png': 'image/png',
  '.jpg': 'image/jpeg',
  '.jpeg': 'image/jpeg',
  '.gif': 'image/gif',
  '.webp': 'image/webp',
  '.svg': 'image/svg+xml',
};

/** Media type without parameters, lowercased */
export function mediaType(contentType: string): string {
  return contentType.split(';')[0].trim().toLowerCase();
}

/**
 * Content type of a local file: by extension, else `text/html` when the
 * file starts with markup, else `text/plain`.
 */
export function guessContentType(path: string, bytes: Uint8Array): string {
  const known = EXTENSION_TYPES[extname(path).toLowerCase()];
  if (known) return known;
  let i = 0;
  while (i < bytes.length && (bytes[i] === 0x20 || bytes[i] === 0x09 || bytes[i] === 0x0a || bytes[i] === 0x0d)) i++;
  return bytes[i] === 0x3c ? 'text/html' : 'text/plain';
}

/**
 * Decode percent-escapes to bytes. Characters that are not escapes are
 * taken as UTF-8.
 */
function percentDecodeBytes(text: string): Uint8Array {
  const encoder = new TextEncoder();
  const bytes: number[] = [];
  for (let i = 0; i < text.length; i++) {
    if (text[i] === '%' && /^[0-9a-f]{2}$/i.test(text.slice(i + 1, i + 3))) {
      bytes.push(Number.parseInt(text.slice(i + 1, i + 3), 16));
      i += 2;
      continue;
    }
    const codePoint = text.codePointAt(i) ?? 0;
    const char = String.fromCodePoint(codePoint);
    bytes.push(...encoder.encode(char));
    i += char.length - 1;
  }
  return new Uint8Array(bytes);
}

/**
 * Parse `data:[<mediatype>][;base64],<data>`. Returns null when the URL has
 * no comma.
 */
export function parseDataUrl(url: string): { contentType: string; body: Uint8Array } | null {
  const comma = url.indexOf(',');
  if (!url.toLowerCase().startsWith('data:') || comma === -1) return null;
  let header = url.slice(5, comma).trim();
  const payload = url.slice(comma + 1);

  const base64 = /;\s*base64$/i.test(header);
  if (base64) header = header.replace(/;\s*base64$/i, '');
  let contentType = header.trim();
  if (contentType === '' || contentType.startsWith(';')) contentType = `text/plain${contentType || ';charset=US-ASCII'}`;

  const decoded = percentDecodeBytes(payload);
  if (!base64) return { contentType, body: decoded };
  const text = new TextDecoder('latin1').decode(decoded).replace(/[\s]/g, '');
  return { contentType, body: new Uint8Array(Buffer.from(text, 'base64')) };
}

function escapeHtml(text: string): string {
  return text.replace(/&/g, '&amp;').replace(/</g, '&lt;').replace(/>/g, '&gt;').replace(/"/g, '&quot;');
}

/** Directory listing page for a `file:` URL naming a directory */
async function directoryListing(path: string, url: string): Promise<Uint8Array> {
  const entries = await readdir(path, { withFileTypes: true });
  entries.sort((a, b) => a.name.localeCompare(b.name));
  const base = url.endsWith('/') ? url : `${url}/`;
  const items = entries.map(entry => {
    const name = entry.isDirectory() ? `${entry.name}/` : entry.name;
    const href = new URL(encodeURIComponent(entry.name) + (entry.isDirectory() ? '/' : ''), base).href;
    return `<li><a href="${escapeHtml(href)}">${escapeHtml(name)}</a></li>`;
  });
  const title = `Index of ${escapeHtml(path)}`;
  const parent = new URL('..', base).href;
  return new TextEncoder().encode(
    `<!DOCTYPE html><html><head><title>${title}</title></head><body><h1>${title}</h1>` +
      `<ul><li><a href="${escapeHtml(parent)}">../</a></li>${items.join('')}</ul></body></html>`,
  );
}

export interface FetchTransportOptions {
  userAgent: string;
  /** Replaced in tests */
  fetch?: typeof fetch;
}

/**
 * Transport on Node's `fetch` for http(s), `fs` for `file:`, and an inline
 * decoder for `data:`. Every failure comes back as `{ ok: false }`.
 */
export class FetchTransport implements Transport {
  private readonly _userAgent: string;
  private readonly _fetch: typeof fetch;

  constructor(options: FetchTransportOptions) {
    this._userAgent = options.userAgent;
    this._fetch = options.fetch ?? fetch;
  }

  async send(request: TransportRequest, options: SendOptions): Promise<TransportResult> {
    let url: URL;
    try {
      url = new URL(request.url);
    } catch {
      return { ok: false, error: `Invalid URL: ${request.url}` };
    }

    const started = Date.now();
    try {
      let result: TransportResult;
      switch (url.protocol) {
        case 'http:':
        case 'https:':
          result = await this._sendHttp(request, options);
          break;
        case 'file:':
          result = await this._readFile(url);
          break;
        case 'data:': {
          const data = parseDataUrl(request.url);
          result = data
            ? { ok: true, response: { url: request.url, status: 200, contentType: data.contentType, body: data.body } }
            : { ok: false, error: 'Malformed data: URL' };
          break;
        }
        default:
          result = { ok: false, error: `Unsupported URL scheme: ${url.protocol}` };
      }
      logger.debug('Request finished', {
        method: request.method,
        kind: request.kind,
        url: url.protocol === 'data:' ? 'data:' : request.url,
        ok: result.ok,
        elapsedMs: Date.now() - started,
      });
      return result;
    } catch (error) {
      const err = ensureError(error);
      if (err.name === 'TimeoutError' || err.name === 'AbortError') {
        return { ok: false, error: `Timed out after ${Math.round(options.timeoutMs / 1000)}s: ${request.url}` };
      }
      return { ok: false, error: `${describeError(err)}: ${request.url}` };
    }
  }

  private async _sendHttp(request: TransportRequest, options: SendOptions): Promise<TransportResult> {
    const headers: Record<string, string> = {
      'User-Agent': this._userAgent,
      Accept: ACCEPT[request.kind],
    };
    if (request.method === 'POST' && request.contentType) headers['Content-Type'] = request.contentType;

    const response = await this._fetch(request.url, {
      method: request.method,
      headers,
      body: request.method === 'POST' ? request.body ?? '' : undefined,
      redirect: 'follow',
      signal: AbortSignal.timeout(options.timeoutMs),
    });

    const declared = Number(response.headers.get('content-length') ?? '0');
    if (declared > MAX_BODY_BYTES) {
      await response.body?.cancel();
      return { ok: false, error: `Response too large (${declared} bytes): ${request.url}` };
    }
    const body = new Uint8Array(await response.arrayBuffer());
    if (body.length > MAX_BODY_BYTES) {
      return { ok: false, error: `Response too large (${body.length} bytes): ${request.url}` };
    }
    return {
      ok: true,
      response: {
        url: response.url || request.url,
        status: response.status,
        contentType: response.headers.get('content-type') ?? '',
        body,
      },
    };
  }

  private async _readFile(url: URL): Promise<TransportResult> {
    const path = fileURLToPath(url);
    const info = await stat(path);
    if (info.isDirectory()) {
      return { ok: true, response: { url: url.href, status: 200, contentType: 'text/html; charset=utf-8', body: await directoryListing(path, url.href) } };
    }
    if (info.size > MAX_BODY_BYTES) return { ok: false, error: `File too large (${info.size} bytes): ${path}` };
    const body = new Uint8Array(await readFile(path));
    return { ok: true, response: { url: url.href, status: 200, contentType: guessContentType(path, body), body } };
  }
}
