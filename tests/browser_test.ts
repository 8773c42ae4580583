// Tests for the browser session, against an in-memory transport

import { test } from 'node:test';
import assert from 'node:assert/strict';
import { encode as encodePng } from 'fast-png';
import {
  Browser,
  FORM_URLENCODED,
  fragmentOf,
  fragmentRow,
  stripFragment,
  TerminalBuffer,
  THEMES,
  type BrowserEvent,
  type BrowserSettings,
  type Page,
  type SendOptions,
  type Transport,
  type TransportRequest,
  type TransportResult,
} from '../mod.js';

interface Route {
  status: number;
  contentType: string;
  body: Uint8Array;
}

class MemoryTransport implements Transport {
  readonly requests: TransportRequest[] = [];
  private readonly _routes = new Map<string, Route>();

  route(url: string, body: string | Uint8Array, contentType = 'text/html', status = 200): this {
    const bytes = typeof body === 'string' ? new TextEncoder().encode(body) : body;
    this._routes.set(url, { status, contentType, body: bytes });
    return this;
  }

  async send(request: TransportRequest, _options: SendOptions): Promise<TransportResult> {
    this.requests.push(request);
    const route = this._routes.get(stripFragment(request.url));
    if (!route) return { ok: false, error: `No route: ${request.url}` };
    return { ok: true, response: { url: request.url, ...route } };
  }
}

const WIDTH = 40;
const HEIGHT = 8;

function createBrowser(transport: MemoryTransport, settings: Partial<BrowserSettings> = {}, changes: BrowserSettings[] = []): Browser {
  return new Browser({
    transport,
    size: { width: WIDTH, height: HEIGHT },
    settings: { theme: 'light', images: true, timeoutMs: 1000, ...settings },
    onSettingsChange: current => changes.push({ ...current }),
  });
}

function render(browser: Browser): TerminalBuffer {
  const buffer = new TerminalBuffer(WIDTH, HEIGHT);
  browser.render(buffer);
  return buffer;
}

function current(browser: Browser): Page {
  const page = browser.currentPage;
  assert.ok(page);
  return page;
}

async function send(browser: Browser, ...events: BrowserEvent[]): Promise<void> {
  for (const event of events) await browser.handle(event);
}

const TAB: BrowserEvent = { type: 'focus', direction: 1 };
const ENTER: BrowserEvent = { type: 'activate' };

function redPng(): Uint8Array {
  const data = new Uint8Array(16 * 32 * 4);
  for (let i = 0; i < data.length; i += 4) data.set([255, 0, 0, 255], i);
  return encodePng({ width: 16, height: 32, data, channels: 4, depth: 8 });
}

// --- loading and rendering

test('Browser - open builds a page and paints it under the title bar', async () => {
  const transport = new MemoryTransport().route('http://a.test/', '<title>Home</title><p>hello</p>');
  const browser = createBrowser(transport);
  const result = await browser.open('http://a.test/');
  assert.equal(result.ok, true);
  assert.equal(current(browser).document.title, 'Home');
  assert.equal(browser.status, null);

  const buffer = render(browser);
  assert.equal(buffer.rowText(0), ' Home | http://a.test/'.padEnd(WIDTH));
  assert.equal(buffer.rowText(2).trimEnd(), 'hello');
  assert.deepEqual(buffer.getCell(0, 2)?.foreground, THEMES.light.text);
});

test('Browser - repainting the same state gives the same grid', async () => {
  const transport = new MemoryTransport().route('http://a.test/', '<h1>Title</h1><p><a href="/x">link</a> text</p>');
  const browser = createBrowser(transport);
  await browser.open('http://a.test/');
  await send(browser, TAB);
  const first = render(browser);
  const second = render(browser);
  assert.ok(first.equals(second));
  browser.render(first);
  assert.ok(first.equals(second));
});

test('Browser - a failed navigation leaves the page and history untouched', async () => {
  const transport = new MemoryTransport()
    .route('http://a.test/', '<p>first</p>')
    .route('http://a.test/second', '<p>second</p>');
  const browser = createBrowser(transport);
  await browser.open('http://a.test/');
  await browser.open('http://a.test/second');
  await send(browser, { type: 'back' });
  const page = current(browser);
  const before = render(browser);

  const result = await browser.open('http://a.test/missing');
  assert.deepEqual(result, { ok: false, error: 'No route: http://a.test/missing' });
  assert.equal(browser.currentPage, page);
  assert.equal(browser.canGoBack, false);
  assert.equal(browser.canGoForward, true);
  assert.deepEqual(browser.status, { text: 'No route: http://a.test/missing', kind: 'error' });

  const after = render(browser);
  for (let y = 0; y < HEIGHT - 1; y++) assert.equal(after.rowText(y), before.rowText(y));
  assert.ok(after.rowText(HEIGHT - 1).startsWith(' No route: http://a.test/missing'));
  assert.deepEqual(after.getCell(1, HEIGHT - 1)?.foreground, THEMES.light.error);
});

test('Browser - error statuses still show the page', async () => {
  const transport = new MemoryTransport().route('http://a.test/gone', '<p>gone</p>', 'text/html', 404);
  const browser = createBrowser(transport);
  const result = await browser.open('http://a.test/gone');
  assert.equal(result.ok, true);
  assert.deepEqual(browser.status, { text: 'HTTP 404', kind: 'error' });
  assert.equal(render(browser).rowText(2).trimEnd(), 'gone');
});

test('Browser - stylesheets and media queries', async () => {
  const transport = new MemoryTransport()
    .route('http://a.test/', '<link rel="stylesheet" href="/s.css"><link rel="stylesheet" href="/missing.css"><p>red</p>')
    .route('http://a.test/s.css', 'p { color: red }', 'text/css')
    .route('http://a.test/print', '<style media="print">p { color: red }</style><p>plain</p>');
  const browser = createBrowser(transport);
  assert.equal((await browser.open('http://a.test/')).ok, true);
  assert.deepEqual(render(browser).getCell(0, 2)?.foreground, { r: 255, g: 0, b: 0 });
  assert.deepEqual(
    transport.requests.map(r => `${r.kind} ${r.url}`),
    ['document http://a.test/', 'stylesheet http://a.test/s.css', 'stylesheet http://a.test/missing.css'],
  );

  await browser.open('http://a.test/print');
  assert.deepEqual(render(browser).getCell(0, 2)?.foreground, THEMES.light.text);
});

// --- history

test('Browser - back and forward', async () => {
  const transport = new MemoryTransport()
    .route('http://a.test/a', '<p>a</p>')
    .route('http://a.test/b', '<p>b</p>')
    .route('http://a.test/c', '<p>c</p>');
  const browser = createBrowser(transport);
  await browser.open('http://a.test/a');
  await browser.open('http://a.test/b');

  await send(browser, { type: 'back' });
  assert.equal(current(browser).document.url, 'http://a.test/a');
  await send(browser, { type: 'back' });
  assert.deepEqual(browser.status, { text: 'No previous page', kind: 'info' });

  await send(browser, { type: 'forward' });
  assert.equal(current(browser).document.url, 'http://a.test/b');
  await send(browser, { type: 'forward' });
  assert.deepEqual(browser.status, { text: 'No next page', kind: 'info' });

  // a new page after going back drops the forward entries
  await send(browser, { type: 'back' });
  await browser.open('http://a.test/c');
  assert.equal(browser.canGoForward, false);
  await send(browser, { type: 'back' });
  assert.equal(current(browser).document.url, 'http://a.test/a');
});

test('Browser - history keeps the last 50 pages', async () => {
  const transport = new MemoryTransport().route('http://a.test/', '<p>x</p>');
  const browser = createBrowser(transport);
  for (let i = 0; i < 52; i++) await browser.open('http://a.test/');
  let steps = 0;
  while (browser.canGoBack) {
    await send(browser, { type: 'back' });
    steps++;
  }
  assert.equal(steps, 49);
});

test('Browser - reload keeps the scroll position', async () => {
  const transport = new MemoryTransport().route('http://a.test/', '<p>x</p>'.repeat(10));
  const browser = createBrowser(transport);
  await browser.open('http://a.test/');
  await send(browser, { type: 'scroll', delta: 3 });
  const before = current(browser);
  await send(browser, { type: 'reload' });
  assert.notEqual(browser.currentPage, before);
  assert.equal(current(browser).scrollY, 3);
  assert.equal(transport.requests.length, 2);
});

// --- scrolling and focus

test('Browser - scrolling is clamped to the document', async () => {
  const transport = new MemoryTransport().route('http://a.test/', '<p>x</p>'.repeat(10));
  const browser = createBrowser(transport);
  await browser.open('http://a.test/');
  const page = current(browser);
  assert.equal(page.layout.height, 21);
  assert.equal(browser.pageRows, 6);

  await send(browser, { type: 'scroll', delta: 1 });
  assert.equal(page.scrollY, 1);
  await send(browser, { type: 'scroll', delta: -5 });
  assert.equal(page.scrollY, 0);
  await send(browser, { type: 'page', direction: 1 });
  assert.equal(page.scrollY, 5);
  await send(browser, { type: 'end' });
  assert.equal(page.scrollY, 15);
  await send(browser, { type: 'home' });
  assert.equal(page.scrollY, 0);
});

test('Browser - Tab cycles through links and wraps', async () => {
  const transport = new MemoryTransport().route('http://a.test/', '<p><a href="/one">one</a> <a href="/two">two</a></p>');
  const browser = createBrowser(transport);
  await browser.open('http://a.test/');
  const page = current(browser);
  const [one, two] = page.layout.interactables.map(item => item.node);

  await send(browser, TAB);
  assert.equal(page.focused, one);
  assert.equal(browser.chromeState().hover, 'http://a.test/one');
  await send(browser, TAB);
  assert.equal(page.focused, two);
  await send(browser, TAB);
  assert.equal(page.focused, one);
  await send(browser, { type: 'focus', direction: -1 });
  assert.equal(page.focused, two);
});

test('Browser - no links to focus', async () => {
  const transport = new MemoryTransport().route('http://a.test/', '<p>plain</p>');
  const browser = createBrowser(transport);
  await browser.open('http://a.test/');
  await send(browser, TAB);
  assert.deepEqual(browser.status, { text: 'No links on this page', kind: 'info' });
});

test('Browser - following a link', async () => {
  const transport = new MemoryTransport()
    .route('http://a.test/', '<p><a href="next">next</a></p>')
    .route('http://a.test/next', '<title>Next</title>');
  const browser = createBrowser(transport);
  await browser.open('http://a.test/');
  await send(browser, TAB, ENTER);
  assert.equal(current(browser).document.title, 'Next');
  assert.equal(browser.canGoBack, true);
});

test('Browser - fragment links scroll without a request', async () => {
  const html = '<p><a href="#sec">jump</a></p>' + '<p>x</p>'.repeat(10) + '<h2 id="sec">Section</h2><p>end</p>';
  const transport = new MemoryTransport().route('http://a.test/', html);
  const browser = createBrowser(transport);
  await browser.open('http://a.test/');
  const page = current(browser);
  const row = fragmentRow(page, 'sec');
  assert.ok(row !== null && row > 0);

  await send(browser, TAB, ENTER);
  assert.equal(browser.currentPage, page);
  assert.equal(page.scrollY, Math.min(row, page.layout.height - browser.pageRows));
  assert.equal(transport.requests.length, 1);
  assert.equal(fragmentRow(page, 'nowhere'), null);
});

test('Browser - a fragment in the opened URL scrolls the new page', async () => {
  const html = '<p>top</p>' + '<p>x</p>'.repeat(10) + '<p id="end">end</p>';
  const transport = new MemoryTransport().route('http://a.test/', html);
  const browser = createBrowser(transport);
  await browser.open('http://a.test/#end');
  const page = current(browser);
  assert.equal(fragmentOf(page.document.url), 'end');
  assert.ok(page.scrollY > 0);
});

// --- forms

test('Browser - editing a field and pressing Enter submits the form', async () => {
  const transport = new MemoryTransport()
    .route('http://a.test/', '<form action="/search"><input name="q"></form>')
    .route('http://a.test/search?q=hello%20world', '<title>Results</title>');
  const browser = createBrowser(transport);
  await browser.open('http://a.test/');
  await send(browser, TAB, ENTER);
  assert.equal(browser.inputMode, 'edit');

  await send(browser, { type: 'edit', action: { kind: 'insert', text: 'hello world' } }, { type: 'edit', action: { kind: 'commit' } });
  assert.equal(browser.inputMode, 'browse');
  assert.deepEqual(transport.requests.at(-1), {
    method: 'GET',
    url: 'http://a.test/search?q=hello%20world',
    kind: 'document',
    body: null,
    contentType: null,
  });
  assert.equal(current(browser).document.title, 'Results');
});

test('Browser - cancelling an edit keeps the old value', async () => {
  const transport = new MemoryTransport().route('http://a.test/', '<form><input name="q" value="old"></form>');
  const browser = createBrowser(transport);
  await browser.open('http://a.test/');
  await send(browser, TAB, ENTER, { type: 'edit', action: { kind: 'insert', text: 'new' } }, { type: 'edit', action: { kind: 'cancel' } });
  const page = current(browser);
  assert.equal(browser.inputMode, 'browse');
  assert.equal(page.forms.control(page.layout.interactables[0].node)?.value, 'old');
});

test('Browser - submit button posts the form', async () => {
  const transport = new MemoryTransport()
    .route('http://a.test/', '<form method="post" action="/login"><input name="u" value="x"><input type="submit" value="Go"></form>')
    .route('http://a.test/login', '<title>Welcome</title>');
  const browser = createBrowser(transport);
  await browser.open('http://a.test/');
  await send(browser, TAB, TAB, ENTER);
  assert.deepEqual(transport.requests.at(-1), {
    method: 'POST',
    url: 'http://a.test/login',
    kind: 'document',
    body: 'u=x',
    contentType: FORM_URLENCODED,
  });
  assert.equal(current(browser).document.title, 'Welcome');
});

test('Browser - checkboxes toggle in place', async () => {
  const transport = new MemoryTransport().route('http://a.test/', '<form><input type="checkbox" name="c"></form>');
  const browser = createBrowser(transport);
  await browser.open('http://a.test/');
  await send(browser, TAB, ENTER);
  const page = current(browser);
  assert.equal(page.forms.control(page.layout.interactables[0].node)?.checked, true);
  assert.equal(transport.requests.length, 1);
});

// --- address bar, settings and resize

test('Browser - address bar navigation', async () => {
  const transport = new MemoryTransport()
    .route('http://a.test/', '<p>a</p>')
    .route('http://a.test/b', '<p>b</p>');
  const browser = createBrowser(transport);
  await browser.open('http://a.test/');

  await send(browser, { type: 'open-address' });
  assert.equal(browser.inputMode, 'edit');
  assert.deepEqual(browser.chromeState().address, { text: 'http://a.test/', cursor: 14 });
  await send(browser, { type: 'edit', action: { kind: 'cancel' } });
  assert.equal(browser.chromeState().address, null);

  await send(browser, { type: 'open-address' }, { type: 'edit', action: { kind: 'insert', text: 'b' } }, { type: 'edit', action: { kind: 'commit' } });
  assert.equal(current(browser).document.url, 'http://a.test/b');
});

// --- tabs

function typeAddress(text: string): BrowserEvent[] {
  return [{ type: 'edit', action: { kind: 'insert', text } }, { type: 'edit', action: { kind: 'commit' } }];
}

test('Browser - tabs keep their own history', async () => {
  const transport = new MemoryTransport()
    .route('http://a.test/', '<p>a</p>')
    .route('http://a.test/b', '<p>b</p>');
  const browser = createBrowser(transport);
  await browser.open('http://a.test/');

  await send(browser, { type: 'new-tab' });
  assert.equal(browser.tabCount, 2);
  assert.equal(browser.activeTab, 1);
  assert.equal(browser.currentPage, null);
  assert.deepEqual(browser.chromeState().address, { text: '', cursor: 0 });

  await send(browser, ...typeAddress('http://a.test/b'));
  assert.equal(current(browser).document.url, 'http://a.test/b');
  assert.equal(browser.canGoBack, false);
  assert.equal(render(browser).rowText(0), ' [2/2] http://a.test/b'.padEnd(WIDTH));

  await send(browser, { type: 'switch-tab', direction: 1 });
  assert.equal(browser.activeTab, 0);
  assert.equal(current(browser).document.url, 'http://a.test/');
  await send(browser, { type: 'switch-tab', direction: -1 });
  assert.equal(current(browser).document.url, 'http://a.test/b');

  await send(browser, { type: 'close-tab' });
  assert.equal(browser.tabCount, 1);
  assert.equal(current(browser).document.url, 'http://a.test/');
  assert.equal(render(browser).rowText(0), ' http://a.test/'.padEnd(WIDTH));
  await send(browser, { type: 'switch-tab', direction: 1 });
  assert.deepEqual(browser.status, { text: 'No other tabs', kind: 'info' });

  assert.equal(browser.quitRequested, false);
  await send(browser, { type: 'close-tab' });
  assert.equal(browser.quitRequested, true);
});

test('Browser - a new tab without a page is dropped again', async () => {
  const transport = new MemoryTransport()
    .route('http://a.test/', '<p>a</p>')
    .route('http://a.test/b', '<p>b</p>');
  const browser = createBrowser(transport);
  await browser.open('http://a.test/');
  await browser.open('http://a.test/b');

  await send(browser, { type: 'new-tab' }, { type: 'edit', action: { kind: 'cancel' } });
  assert.equal(browser.tabCount, 1);
  assert.equal(current(browser).document.url, 'http://a.test/b');
  assert.equal(browser.canGoBack, true);

  await send(browser, { type: 'new-tab' }, ...typeAddress('http://a.test/missing'));
  assert.equal(browser.tabCount, 1);
  assert.equal(browser.activeTab, 0);
  assert.equal(browser.status?.kind, 'error');
  assert.equal(current(browser).document.url, 'http://a.test/b');
});

test('Browser - Alt-Enter opens a link in a new tab', async () => {
  const transport = new MemoryTransport()
    .route('http://a.test/', '<p><a href="/b">b</a></p>')
    .route('http://a.test/b', '<p>b</p>');
  const browser = createBrowser(transport);
  await browser.open('http://a.test/');
  await send(browser, TAB, { type: 'activate-new-tab' });
  assert.equal(browser.tabCount, 2);
  assert.equal(browser.activeTab, 1);
  assert.equal(current(browser).document.url, 'http://a.test/b');

  await send(browser, { type: 'toggle-theme' }, { type: 'switch-tab', direction: -1 });
  const first = current(browser);
  assert.equal(first.document.url, 'http://a.test/');
  assert.equal(first.builtFor.theme, 'dark');
  assert.notEqual(first.focused, null);
});

test('Browser - theme toggle re-runs media queries', async () => {
  const html = '<style>@media (prefers-color-scheme: dark) { p { color: red } }</style><p>x</p>';
  const transport = new MemoryTransport().route('http://a.test/', html);
  const changes: BrowserSettings[] = [];
  const browser = createBrowser(transport, {}, changes);
  await browser.open('http://a.test/');
  assert.deepEqual(render(browser).getCell(0, 2)?.foreground, THEMES.light.text);

  await send(browser, { type: 'toggle-theme' });
  assert.deepEqual(browser.status, { text: 'Theme: dark', kind: 'info' });
  assert.deepEqual(changes, [{ theme: 'dark', images: true, timeoutMs: 1000 }]);
  const buffer = render(browser);
  assert.deepEqual(buffer.getCell(0, 2)?.foreground, { r: 255, g: 0, b: 0 });
  assert.deepEqual(buffer.getCell(20, 3)?.background, THEMES.dark.background);
});

test('Browser - images load when they are turned on', async () => {
  const transport = new MemoryTransport()
    .route('http://a.test/', '<div><img src="/red.png" alt="pic"></div>')
    .route('http://a.test/red.png', redPng(), 'image/png');
  const browser = createBrowser(transport, { images: false });
  await browser.open('http://a.test/');
  assert.equal(transport.requests.length, 1);
  assert.equal(render(browser).rowText(1).slice(0, 3), 'pic');

  await send(browser, { type: 'toggle-images' });
  assert.deepEqual(browser.status, { text: 'Images on', kind: 'info' });
  assert.deepEqual(transport.requests.at(-1), { method: 'GET', url: 'http://a.test/red.png', kind: 'image' });
  const buffer = render(browser);
  assert.equal(buffer.rowText(1).slice(0, 2), '██');
  assert.deepEqual(buffer.getCell(0, 1)?.foreground, { r: 255, g: 0, b: 0 });

  // decoded images are cached across pages
  await browser.open('http://a.test/');
  assert.equal(transport.requests.filter(r => r.kind === 'image').length, 1);
});

test('Browser - images that failed for a transient reason are fetched again', async () => {
  const transport = new MemoryTransport()
    .route('http://a.test/', '<div><img src="/busy.png" alt="pic"></div>')
    .route('http://a.test/busy.png', '', 'text/plain', 503);
  const browser = createBrowser(transport);
  await browser.open('http://a.test/');
  await browser.open('http://a.test/');
  assert.equal(transport.requests.filter(r => r.kind === 'image').length, 2);
});

test('Browser - missing images are cached until the page is reloaded', async () => {
  const transport = new MemoryTransport()
    .route('http://a.test/', '<div><img src="/gone.png" alt="pic"></div>')
    .route('http://a.test/gone.png', 'not found', 'text/plain', 404);
  const browser = createBrowser(transport);
  await browser.open('http://a.test/');
  await browser.open('http://a.test/');
  assert.equal(transport.requests.filter(r => r.kind === 'image').length, 1);
  assert.equal(render(browser).rowText(1).slice(0, 3), 'pic');

  await send(browser, { type: 'reload' });
  assert.equal(transport.requests.filter(r => r.kind === 'image').length, 2);
});

test('Browser - resize lays the page out again', async () => {
  const transport = new MemoryTransport().route('http://a.test/', '<p>the quick brown fox jumps over</p>');
  const browser = createBrowser(transport);
  await browser.open('http://a.test/');
  const page = current(browser);
  assert.equal(page.layout.height, 3);

  await send(browser, { type: 'resize', width: 20, height: 10 });
  assert.equal(browser.pageRows, 8);
  assert.equal(page.builtFor.width, 20);
  assert.equal(page.layout.height, 4);
});

test('Browser - quit', async () => {
  const browser = createBrowser(new MemoryTransport());
  assert.equal(browser.quitRequested, false);
  await send(browser, { type: 'quit' });
  assert.equal(browser.quitRequested, true);
});
