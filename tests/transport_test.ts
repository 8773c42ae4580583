// Tests for the fetch/file/data transport

import { test } from 'node:test';
import assert from 'node:assert/strict';
import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { pathToFileURL } from 'node:url';
import {
  ACCEPT,
  FetchTransport,
  guessContentType,
  mediaType,
  parseDataUrl,
  type TransportRequest,
  type TransportResult,
} from '../mod.js';

const OPTIONS = { timeoutMs: 5000 };
const text = (bytes: Uint8Array) => new TextDecoder().decode(bytes);
const get = (url: string): TransportRequest => ({ method: 'GET', url, kind: 'document' });

interface FetchCall {
  url: string;
  init: RequestInit | undefined;
}

function fakeFetch(respond: () => Response, calls: FetchCall[] = []): typeof fetch {
  return async (input, init) => {
    calls.push({ url: String(input), init });
    return respond();
  };
}

function responseOf(result: TransportResult) {
  assert.ok(result.ok, result.ok ? '' : result.error);
  return result.response;
}

test('mediaType - strips parameters', () => {
  assert.equal(mediaType('Text/HTML; charset=utf-8'), 'text/html');
  assert.equal(mediaType(''), '');
});

test('guessContentType - extension then content', () => {
  const bytes = (s: string) => new TextEncoder().encode(s);
  assert.equal(guessContentType('/a/index.HTML', bytes('')), 'text/html');
  assert.equal(guessContentType('/a/logo.png', bytes('')), 'image/png');
  assert.equal(guessContentType('/a/README', bytes('  \n<p>hi')), 'text/html');
  assert.equal(guessContentType('/a/README', bytes('hi')), 'text/plain');
  assert.equal(guessContentType('/a/empty', bytes('')), 'text/plain');
});

test('parseDataUrl - plain and base64 payloads', () => {
  const plain = parseDataUrl('data:,Hello%2C%20World');
  assert.equal(plain?.contentType, 'text/plain;charset=US-ASCII');
  assert.equal(text(plain?.body ?? new Uint8Array()), 'Hello, World');

  const encoded = parseDataUrl('data:text/html;base64,PGI+aGk8L2I+');
  assert.equal(encoded?.contentType, 'text/html');
  assert.equal(text(encoded?.body ?? new Uint8Array()), '<b>hi</b>');

  assert.equal(parseDataUrl('data:;charset=utf-8,x')?.contentType, 'text/plain;charset=utf-8');
  assert.equal(parseDataUrl('data:text/plain'), null);
});

// ---

test('FetchTransport - GET sends the user agent and accept header', async () => {
  const calls: FetchCall[] = [];
  const transport = new FetchTransport({
    userAgent: 'toad-test',
    fetch: fakeFetch(() => new Response('<p>hi</p>', { status: 200, headers: { 'content-type': 'text/html' } }), calls),
  });
  const response = responseOf(await transport.send(get('http://a.test/'), OPTIONS));
  assert.equal(response.url, 'http://a.test/');
  assert.equal(response.status, 200);
  assert.equal(response.contentType, 'text/html');
  assert.equal(text(response.body), '<p>hi</p>');

  assert.equal(calls.length, 1);
  assert.equal(calls[0].url, 'http://a.test/');
  assert.equal(calls[0].init?.method, 'GET');
  assert.equal(calls[0].init?.body, undefined);
  assert.deepEqual(calls[0].init?.headers, { 'User-Agent': 'toad-test', Accept: ACCEPT.document });
});

test('FetchTransport - POST sends the body and its content type', async () => {
  const calls: FetchCall[] = [];
  const transport = new FetchTransport({ userAgent: 'toad-test', fetch: fakeFetch(() => new Response('ok'), calls) });
  await transport.send(
    { method: 'POST', url: 'http://a.test/login', kind: 'document', body: 'a=1', contentType: 'application/x-www-form-urlencoded' },
    OPTIONS,
  );
  assert.equal(calls[0].init?.method, 'POST');
  assert.equal(calls[0].init?.body, 'a=1');
  assert.deepEqual(calls[0].init?.headers, {
    'User-Agent': 'toad-test',
    Accept: ACCEPT.document,
    'Content-Type': 'application/x-www-form-urlencoded',
  });
});

test('FetchTransport - error statuses are responses', async () => {
  const transport = new FetchTransport({ userAgent: 'toad-test', fetch: fakeFetch(() => new Response('gone', { status: 404 })) });
  const response = responseOf(await transport.send(get('http://a.test/missing'), OPTIONS));
  assert.equal(response.status, 404);
  assert.equal(text(response.body), 'gone');
});

test('FetchTransport - failures are results, not exceptions', async () => {
  const refused = new FetchTransport({
    userAgent: 'toad-test',
    fetch: async () => {
      throw new TypeError('fetch failed', { cause: new Error('connect ECONNREFUSED') });
    },
  });
  assert.deepEqual(await refused.send(get('http://a.test/'), OPTIONS), {
    ok: false,
    error: 'fetch failed: connect ECONNREFUSED: http://a.test/',
  });

  const slow = new FetchTransport({
    userAgent: 'toad-test',
    fetch: async () => {
      throw Object.assign(new Error('aborted'), { name: 'TimeoutError' });
    },
  });
  assert.deepEqual(await slow.send(get('http://a.test/'), OPTIONS), { ok: false, error: 'Timed out after 5s: http://a.test/' });

  const large = new FetchTransport({
    userAgent: 'toad-test',
    fetch: fakeFetch(() => new Response('x', { headers: { 'content-length': '40000000' } })),
  });
  assert.deepEqual(await large.send(get('http://a.test/big'), OPTIONS), {
    ok: false,
    error: 'Response too large (40000000 bytes): http://a.test/big',
  });
});

test('FetchTransport - unsupported and invalid URLs', async () => {
  const transport = new FetchTransport({ userAgent: 'toad-test', fetch: fakeFetch(() => new Response('')) });
  assert.deepEqual(await transport.send(get('ftp://a.test/'), OPTIONS), { ok: false, error: 'Unsupported URL scheme: ftp:' });
  assert.deepEqual(await transport.send(get('nope'), OPTIONS), { ok: false, error: 'Invalid URL: nope' });
  assert.deepEqual(await transport.send(get('data:text/plain'), OPTIONS), { ok: false, error: 'Malformed data: URL' });
});

test('FetchTransport - data: URLs', async () => {
  const transport = new FetchTransport({ userAgent: 'toad-test' });
  const response = responseOf(await transport.send(get('data:text/html,<p>x</p>'), OPTIONS));
  assert.equal(response.status, 200);
  assert.equal(response.contentType, 'text/html');
  assert.equal(text(response.body), '<p>x</p>');
});

test('FetchTransport - files and directory listings', async () => {
  const dir = mkdtempSync(join(tmpdir(), 'toad-transport-'));
  try {
    writeFileSync(join(dir, 'page.html'), '<p>local</p>');
    mkdirSync(join(dir, 'sub'));
    const transport = new FetchTransport({ userAgent: 'toad-test' });

    const fileUrl = pathToFileURL(join(dir, 'page.html')).href;
    const file = responseOf(await transport.send(get(fileUrl), OPTIONS));
    assert.equal(file.contentType, 'text/html');
    assert.equal(text(file.body), '<p>local</p>');

    const dirUrl = pathToFileURL(dir).href;
    const listing = responseOf(await transport.send(get(dirUrl), OPTIONS));
    assert.equal(listing.contentType, 'text/html; charset=utf-8');
    const html = text(listing.body);
    assert.ok(html.includes(`<li><a href="${dirUrl}/page.html">page.html</a></li>`));
    assert.ok(html.includes(`<li><a href="${dirUrl}/sub/">sub/</a></li>`));

    const missing = await transport.send(get(pathToFileURL(join(dir, 'nothing.html')).href), OPTIONS);
    assert.equal(missing.ok, false);
  } finally {
    rmSync(dir, { recursive: true, force: true });
  }
});
