// Browser session: tabs, each with a history of built pages, plus focus,
// scrolling, editing and settings, driven one event at a time.
//
// A navigation fetches the document and its subresources and runs the whole
// pipeline before it touches the history, so a failure leaves the current
// page exactly as it was.

import type { TerminalBuffer } from './buffer.js';
import { CHROME_ROWS, paintChrome, type ChromeState, type StatusMessage } from './chrome.js';
import { documentFromResponse, type ToadDocument } from './document.js';
import type { BrowserEvent, EditAction } from './events.js';
import type { Bounds, Size } from './geometry.js';
import type { NodeHandle } from './html/dom.js';
import { decodeText } from './html/charset.js';
import type { InputMode } from './input.js';
import { applyEdit, startEdit, type EditBuffer } from './line-editor.js';
import { getLogger } from './logging.js';
import { mediaQueryMatches, parseStylesheet, type MediaContext, type StyleRule } from './css/parser.js';
import { tokenizeCss } from './css/tokenizer.js';
import { FormModel, isTextControl } from './forms/form-model.js';
import { buildBoxTree } from './layout/box-builder.js';
import { borderBox, walkBoxes } from './layout/box.js';
import { layoutDocument, type Interactable, type LayoutResult } from './layout/layout.js';
import { decodeImage } from './net/image-decoder.js';
import { ImageCache, type CachedImage } from './net/image-cache.js';
import { mediaType, type Transport, type TransportRequest } from './net/transport.js';
import { fragmentOf, normalizeCliInput, resolveUrl, stripFragment } from './net/url.js';
import { paintDocument } from './paint/painter.js';
import { resolveStyles, type StyleMap } from './style/cascade.js';
import { userAgentRules } from './style/user-agent.js';
import { getTheme, otherTheme, type Theme } from './theme.js';
import type { ThemeName } from './config/config.js';
import type { Pixmap } from './types.js';
import { ensureError } from './utils/error.js';

const logger = getLogger('Browser');

const IMAGE_CACHE_BYTES = 64 * 1024 * 1024;
const MAX_HISTORY = 50;

export interface BrowserSettings {
  theme: ThemeName;
  images: boolean;
  timeoutMs: number;
}

export interface BrowserOptions {
  transport: Transport;
  /** Terminal size; the page gets every row but the chrome's */
  size: Size;
  settings: BrowserSettings;
  /** Called after the theme or image setting is toggled */
  onSettingsChange?: (settings: Readonly<BrowserSettings>) => void;
}

interface StylesheetText {
  text: string;
  media: string;
}

/** What a page's styles and layout were computed for */
interface BuildKey {
  theme: ThemeName;
  images: boolean;
  width: number;
  rows: number;
}

/** A fully built page: never observed half-constructed */
export interface Page {
  request: TransportRequest;
  status: number;
  document: ToadDocument;
  sheets: StylesheetText[];
  forms: FormModel;
  /** Decoded pixels per `<img>` element */
  images: Map<NodeHandle, Pixmap>;
  imagesLoaded: boolean;
  styles: StyleMap;
  layout: LayoutResult;
  scrollY: number;
  focused: NodeHandle | null;
  builtFor: BuildKey;
}

/** A tab keeps its own history; `index` is the page shown, -1 while empty */
export interface Tab {
  history: Page[];
  index: number;
}

type EditSession =
  | { target: 'address'; buffer: EditBuffer; newTab: boolean }
  | { target: 'control'; node: NodeHandle; multiline: boolean; buffer: EditBuffer };

export type NavigationResult = { ok: true; page: Page } | { ok: false; error: string };

export class Browser {
  private readonly _transport: Transport;
  private readonly _settings: BrowserSettings;
  private readonly _onSettingsChange: ((settings: Readonly<BrowserSettings>) => void) | undefined;
  private readonly _imageCache = new ImageCache(IMAGE_CACHE_BYTES);
  private _size: Size;
  private _tabs: Tab[] = [{ history: [], index: -1 }];
  private _active = 0;
  private _status: StatusMessage | null = null;
  private _edit: EditSession | null = null;
  private _quit = false;

  constructor(options: BrowserOptions) {
    this._transport = options.transport;
    this._settings = { ...options.settings };
    this._onSettingsChange = options.onSettingsChange;
    this._size = { ...options.size };
  }

  private get _tab(): Tab {
    return this._tabs[this._active];
  }

  get currentPage(): Page | null {
    return this._tab.history[this._tab.index] ?? null;
  }

  get tabCount(): number {
    return this._tabs.length;
  }

  get activeTab(): number {
    return this._active;
  }

  get settings(): Readonly<BrowserSettings> {
    return this._settings;
  }

  get status(): StatusMessage | null {
    return this._status;
  }

  get quitRequested(): boolean {
    return this._quit;
  }

  get inputMode(): InputMode {
    return this._edit ? 'edit' : 'browse';
  }

  get canGoBack(): boolean {
    return this._tab.index > 0;
  }

  get canGoForward(): boolean {
    return this._tab.index < this._tab.history.length - 1;
  }

  /** Rows available to the page below the title bar and above the status line */
  get pageRows(): number {
    return Math.max(1, this._size.height - CHROME_ROWS);
  }

  get theme(): Theme {
    return getTheme(this._settings.theme);
  }

  // Event loop

  /**
   * Handle one event. Navigation events resolve after the new page is built
   * or the attempt has failed.
   */
  async handle(event: BrowserEvent): Promise<void> {
    logger.trace('Event', { type: event.type });
    if (event.type !== 'edit') this._status = null;

    switch (event.type) {
      case 'quit':
        this._quit = true;
        break;
      case 'scroll':
        this._scrollBy(event.delta);
        break;
      case 'page':
        this._scrollBy(event.direction * Math.max(1, this.pageRows - 1));
        break;
      case 'home':
        this._scrollTo(0);
        break;
      case 'end':
        this._scrollTo(Number.MAX_SAFE_INTEGER);
        break;
      case 'focus':
        this._moveFocus(event.direction);
        break;
      case 'activate':
        await this._activate(false);
        break;
      case 'activate-new-tab':
        await this._activate(true);
        break;
      case 'new-tab':
        this._tabs.splice(this._active + 1, 0, { history: [], index: -1 });
        this._active++;
        this._edit = { target: 'address', buffer: startEdit(''), newTab: true };
        break;
      case 'close-tab':
        await this._closeTab();
        break;
      case 'switch-tab':
        await this._switchTab(event.direction);
        break;
      case 'navigate':
        await this._navigateInput(event.url);
        break;
      case 'open-address':
        this._edit = { target: 'address', buffer: startEdit(this.currentPage?.document.url ?? ''), newTab: false };
        break;
      case 'back':
        await this._go(-1);
        break;
      case 'forward':
        await this._go(1);
        break;
      case 'reload':
        await this.reload();
        break;
      case 'edit':
        await this._applyEdit(event.action);
        break;
      case 'resize':
        await this.resize({ width: event.width, height: event.height });
        break;
      case 'toggle-images':
        this._settings.images = !this._settings.images;
        this._onSettingsChange?.(this._settings);
        await this._refreshCurrent();
        this._status = { text: this._settings.images ? 'Images on' : 'Images off', kind: 'info' };
        break;
      case 'toggle-theme':
        this._settings.theme = otherTheme(this._settings.theme);
        this._onSettingsChange?.(this._settings);
        await this._refreshCurrent();
        this._status = { text: `Theme: ${this._settings.theme}`, kind: 'info' };
        break;
    }
  }

  // Navigation

  /**
   * Load a URL typed by the user (or given on the command line).
   */
  async open(input: string): Promise<NavigationResult> {
    const resolved = normalizeCliInput(input);
    if (!resolved.ok) return this._fail(resolved.error);
    return this.navigate({ method: 'GET', url: resolved.url, kind: 'document' });
  }

  /**
   * Fetch and build a page, then make it current. The history is only
   * touched once the page is complete.
   */
  async navigate(request: TransportRequest): Promise<NavigationResult> {
    const result = await this._buildPage(request);
    if (!result.ok) return this._fail(result.error);

    const tab = this._tab;
    tab.history = tab.history.slice(0, tab.index + 1);
    tab.history.push(result.page);
    if (tab.history.length > MAX_HISTORY) tab.history.shift();
    tab.index = tab.history.length - 1;
    this._edit = null;
    this._reportLoaded(result.page);
    return result;
  }

  /** Fetch the current page again, keeping its scroll position */
  async reload(): Promise<NavigationResult> {
    const page = this.currentPage;
    if (!page) return this._fail('Nothing to reload');
    // broken images get another chance
    for (const image of page.document.images) this._imageCache.forgetFailure(image.url);
    const result = await this._buildPage(page.request);
    if (!result.ok) return this._fail(result.error);

    result.page.scrollY = this._clampScroll(result.page, page.scrollY);
    const tab = this._tab;
    tab.history[tab.index] = result.page;
    this._reportLoaded(result.page);
    return result;
  }

  /** Re-lay out the current page for a new terminal size */
  async resize(size: Size): Promise<void> {
    this._size = { width: Math.max(1, size.width), height: Math.max(1, size.height) };
    await this._refreshCurrent();
  }

  private _fail(error: string): NavigationResult {
    logger.warn('Navigation failed', { error });
    this._status = { text: error, kind: 'error' };
    return { ok: false, error };
  }

  private _reportLoaded(page: Page): void {
    const { document } = page;
    logger.info('Page loaded', { url: document.url, status: page.status, height: page.layout.height });
    this._status = page.status >= 400
      ? { text: `HTTP ${page.status}`, kind: 'error' }
      : null;
  }

  private async _navigateInput(input: string): Promise<void> {
    const resolved = normalizeCliInput(input);
    if (!resolved.ok) {
      this._fail(resolved.error);
      return;
    }
    await this._follow(resolved.url);
  }

  /** Follow a link target: same-document fragments only scroll */
  private async _follow(url: string): Promise<void> {
    const page = this.currentPage;
    const fragment = fragmentOf(url);
    if (page && fragment !== null && stripFragment(url) === stripFragment(page.document.url)) {
      const row = fragmentRow(page, fragment);
      if (row === null) this._status = { text: `No anchor #${fragment}`, kind: 'error' };
      else page.scrollY = this._clampScroll(page, row);
      return;
    }
    await this.navigate({ method: 'GET', url, kind: 'document' });
  }

  private async _go(delta: 1 | -1): Promise<void> {
    const tab = this._tab;
    const target = tab.index + delta;
    if (target < 0 || target >= tab.history.length) {
      this._status = { text: delta < 0 ? 'No previous page' : 'No next page', kind: 'info' };
      return;
    }
    tab.index = target;
    this._edit = null;
    await this._refreshCurrent();
  }

  // Tabs

  /**
   * Build a page and show it in a new tab after the current one. The tab
   * only exists once the page is built.
   */
  async openInNewTab(url: string): Promise<NavigationResult> {
    const result = await this._buildPage({ method: 'GET', url, kind: 'document' });
    if (!result.ok) return this._fail(result.error);
    this._tabs.splice(this._active + 1, 0, { history: [result.page], index: 0 });
    this._active++;
    this._edit = null;
    await this._refreshCurrent();
    this._reportLoaded(result.page);
    return result;
  }

  /** Close the current tab; closing the last one quits */
  private async _closeTab(): Promise<void> {
    this._edit = null;
    this._tabs.splice(this._active, 1);
    if (this._tabs.length === 0) {
      this._tabs = [{ history: [], index: -1 }];
      this._active = 0;
      this._quit = true;
      return;
    }
    this._active = Math.max(0, this._active - 1);
    await this._refreshCurrent();
  }

  /** Tabs shown again catch up with theme, image and size changes */
  private async _switchTab(direction: 1 | -1): Promise<void> {
    if (this._tabs.length < 2) {
      this._status = { text: 'No other tabs', kind: 'info' };
      return;
    }
    this._edit = null;
    this._active = (this._active + direction + this._tabs.length) % this._tabs.length;
    await this._refreshCurrent();
  }

  // Page construction

  private _buildKey(): BuildKey {
    return { theme: this._settings.theme, images: this._settings.images, width: this._size.width, rows: this.pageRows };
  }

  private _media(): MediaContext {
    return { colorScheme: this._settings.theme };
  }

  private async _buildPage(request: TransportRequest): Promise<NavigationResult> {
    try {
      const fetched = await this._transport.send(request, { timeoutMs: this._settings.timeoutMs });
      if (!fetched.ok) return { ok: false, error: fetched.error };
      const { response } = fetched;

      const created = documentFromResponse(response, { width: this._size.width, height: this.pageRows });
      if (!created.ok) return created;
      const document = created.document;

      // an image document shows the bytes already fetched
      if (mediaType(response.contentType).startsWith('image/')) {
        this._imageCache.set(response.url, decodeImage(response.body));
      }

      const sheets = await this._loadStylesheets(document);
      const key = this._buildKey();
      const images = new Map<NodeHandle, Pixmap>();
      if (key.images) await this._loadImages(document, images);
      const styles = this._cascade(document, sheets);
      const page: Page = {
        request,
        status: response.status,
        document,
        sheets,
        forms: FormModel.fromDocument(document.tree, document.root),
        images,
        imagesLoaded: key.images,
        styles,
        layout: this._layout(document, styles, images),
        scrollY: 0,
        focused: null,
        builtFor: key,
      };

      const fragment = fragmentOf(response.url) ?? fragmentOf(request.url);
      if (fragment !== null) page.scrollY = this._clampScroll(page, fragmentRow(page, fragment) ?? 0);
      return { ok: true, page };
    } catch (error) {
      const err = ensureError(error);
      logger.error('Unexpected failure while building page', err, { url: request.url });
      return { ok: false, error: `Internal error: ${err.message}` };
    }
  }

  /** Stylesheet texts in document order; external sheets that fail are skipped */
  private async _loadStylesheets(document: ToadDocument): Promise<StylesheetText[]> {
    const sheets: StylesheetText[] = [];
    for (const source of document.stylesheets) {
      if (source.kind === 'inline') {
        sheets.push({ text: source.text, media: source.media });
        continue;
      }
      const result = await this._transport.send(
        { method: 'GET', url: source.url, kind: 'stylesheet' },
        { timeoutMs: this._settings.timeoutMs },
      );
      if (!result.ok) {
        logger.warn('Stylesheet not loaded', { url: source.url, error: result.error });
        continue;
      }
      if (result.response.status >= 400) {
        logger.warn('Stylesheet not loaded', { url: source.url, status: result.response.status });
        continue;
      }
      sheets.push({ text: decodeText(result.response.body, result.response.contentType), media: source.media });
    }
    return sheets;
  }

  private async _loadImages(document: ToadDocument, images: Map<NodeHandle, Pixmap>): Promise<void> {
    for (const image of document.images) {
      let entry = this._imageCache.get(image.url);
      if (entry === undefined) {
        const fetched = await this._fetchImage(image.url);
        entry = fetched.entry;
        if (fetched.cacheable) this._imageCache.set(image.url, entry);
      }
      if (entry.ok) images.set(image.node, entry.pixmap);
    }
  }

  /**
   * Fetch and decode one image. Transport errors and server or rate-limit
   * statuses are transient and must not be cached.
   */
  private async _fetchImage(url: string): Promise<{ entry: CachedImage; cacheable: boolean }> {
    const result = await this._transport.send({ method: 'GET', url, kind: 'image' }, { timeoutMs: this._settings.timeoutMs });
    if (!result.ok) {
      logger.warn('Image not loaded', { url, error: result.error });
      return { entry: result, cacheable: false };
    }
    const { status } = result.response;
    if (status >= 400) {
      logger.warn('Image not loaded', { url, status });
      return { entry: { ok: false, error: `HTTP ${status}` }, cacheable: !isTransientStatus(status) };
    }
    const decoded = decodeImage(result.response.body);
    if (!decoded.ok) logger.warn('Image not decoded', { url, error: decoded.error });
    return { entry: decoded, cacheable: true };
  }

  private _cascade(document: ToadDocument, sheets: readonly StylesheetText[]): StyleMap {
    const media = this._media();
    const author: StyleRule[] = [];
    for (const sheet of sheets) {
      if (sheet.media.trim() !== '' && !mediaQueryMatches(tokenizeCss(sheet.media), media)) continue;
      author.push(...parseStylesheet(sheet.text, { origin: 'author', sourceOrderStart: author.length, media }));
    }
    return resolveStyles(document.tree, document.root, { userAgent: userAgentRules(), author });
  }

  private _layout(document: ToadDocument, styles: StyleMap, images: ReadonlyMap<NodeHandle, Pixmap>): LayoutResult {
    const showImages = this._settings.images;
    const boxes = buildBoxTree(document.tree, document.root, styles, {
      imageFor: element => (showImages ? images.get(element.handle) ?? null : null),
    });
    document.viewport = { width: this._size.width, height: this.pageRows };
    return layoutDocument(boxes, document.viewport);
  }

  /**
   * Bring the current page up to date with the settings and terminal size.
   * A theme change re-runs the cascade (media queries can depend on it);
   * anything else only rebuilds boxes and layout from the existing styles.
   */
  private async _refreshCurrent(): Promise<void> {
    const page = this.currentPage;
    if (!page) return;
    const key = this._buildKey();
    const built = page.builtFor;
    if (built.theme === key.theme && built.images === key.images && built.width === key.width && built.rows === key.rows) {
      return;
    }
    if (built.theme !== key.theme) page.styles = this._cascade(page.document, page.sheets);
    if (key.images && !page.imagesLoaded) {
      await this._loadImages(page.document, page.images);
      page.imagesLoaded = true;
    }
    page.layout = this._layout(page.document, page.styles, page.images);
    page.builtFor = key;
    page.scrollY = this._clampScroll(page, page.scrollY);
    if (page.focused !== null && !focusables(page).some(item => item.node === page.focused)) page.focused = null;
    logger.debug('Page refreshed', { ...key });
  }

  // Scrolling and focus

  private _clampScroll(page: Page, scrollY: number): number {
    return Math.max(0, Math.min(scrollY, page.layout.height - this.pageRows));
  }

  private _scrollBy(delta: number): void {
    const page = this.currentPage;
    if (page) page.scrollY = this._clampScroll(page, page.scrollY + delta);
  }

  private _scrollTo(row: number): void {
    const page = this.currentPage;
    if (page) page.scrollY = this._clampScroll(page, row);
  }

  /**
   * Move focus to the next or previous interactable, wrapping at the ends.
   * Without a focus, start from the first one in view.
   */
  private _moveFocus(direction: 1 | -1): void {
    const page = this.currentPage;
    if (!page) return;
    const items = focusables(page);
    if (items.length === 0) {
      this._status = { text: 'No links on this page', kind: 'info' };
      return;
    }

    const current = items.findIndex(item => item.node === page.focused);
    let next: number;
    if (current >= 0) {
      next = (current + direction + items.length) % items.length;
    } else {
      const top = page.scrollY;
      const bottom = page.scrollY + this.pageRows;
      if (direction === 1) {
        next = Math.max(0, items.findIndex(item => firstRect(item).y >= top));
      } else {
        const visible = items.map(item => firstRect(item).y < bottom);
        next = visible.lastIndexOf(true);
        if (next < 0) next = items.length - 1;
      }
    }

    const item = items[next];
    page.focused = item.node;
    const rect = firstRect(item);
    if (rect.y < page.scrollY) page.scrollY = this._clampScroll(page, rect.y);
    else if (rect.y + rect.height > page.scrollY + this.pageRows) {
      page.scrollY = this._clampScroll(page, rect.y + rect.height - this.pageRows);
    }
  }

  // Activation and editing

  /** Act on the focused interactable; `newTab` opens links in a new tab */
  private async _activate(newTab: boolean): Promise<void> {
    const page = this.currentPage;
    if (!page || page.focused === null) return;
    const node = page.focused;
    const control = page.forms.control(node);

    if (!control) {
      const href = page.document.tree.getAttribute(node, 'href');
      if (href === undefined) return;
      const resolved = resolveUrl(href, page.document.baseUrl);
      if (!resolved.ok) {
        this._fail(resolved.error);
        return;
      }
      if (newTab) await this.openInNewTab(resolved.url);
      else await this._follow(resolved.url);
      return;
    }

    if (control.disabled) {
      this._status = { text: 'Control is disabled', kind: 'info' };
      return;
    }
    switch (control.type) {
      case 'checkbox':
      case 'radio':
        page.forms.toggle(node);
        break;
      case 'select':
        page.forms.cycleOption(node);
        break;
      case 'text':
      case 'password':
      case 'textarea':
        if (control.readOnly) {
          this._status = { text: 'Field is read-only', kind: 'info' };
          break;
        }
        this._edit = { target: 'control', node, multiline: control.type === 'textarea', buffer: startEdit(control.value) };
        break;
      case 'submit':
      case 'image':
        await this._submit(page, node);
        break;
      case 'reset':
        if (control.form !== null) page.forms.reset(control.form);
        break;
      case 'button':
      case 'file':
      case 'hidden':
        this._status = { text: `Unsupported control: ${control.type}`, kind: 'info' };
        break;
    }
  }

  private async _submit(page: Page, submitter: NodeHandle | null, formIndex?: number): Promise<void> {
    const index = formIndex ?? (submitter === null ? undefined : page.forms.control(submitter)?.form ?? undefined);
    if (index === undefined) {
      this._status = { text: 'Control is not in a form', kind: 'info' };
      return;
    }
    const built = page.forms.buildSubmission(index, page.document.baseUrl, submitter);
    if (!built.ok) {
      this._fail(built.error);
      return;
    }
    const { submission } = built;
    await this.navigate({
      method: submission.method,
      url: submission.url,
      kind: 'document',
      body: submission.body,
      contentType: submission.contentType,
    });
  }

  private async _applyEdit(action: EditAction): Promise<void> {
    const edit = this._edit;
    if (!edit) return;
    const outcome = applyEdit(edit.buffer, action, edit.target === 'control' && edit.multiline);
    switch (outcome.kind) {
      case 'editing':
        edit.buffer = outcome.buffer;
        return;
      case 'cancel':
        this._edit = null;
        if (edit.target === 'address' && edit.newTab) await this._closeEmptyTab();
        return;
      case 'commit':
        this._edit = null;
        if (edit.target === 'address') {
          if (outcome.text.trim() !== '') await this._navigateInput(outcome.text);
          // a new tab whose address did not load is dropped again
          if (edit.newTab) await this._closeEmptyTab();
          return;
        }
        await this._commitField(edit.node, outcome.text);
        return;
    }
  }

  private async _closeEmptyTab(): Promise<void> {
    if (this.currentPage === null && this._tabs.length > 1) await this._closeTab();
  }

  /** Store an edited value; Enter in a single-line field submits its form */
  private async _commitField(node: NodeHandle, text: string): Promise<void> {
    const page = this.currentPage;
    if (!page) return;
    page.forms.setValue(node, text);
    const control = page.forms.control(node);
    if (!control || control.type === 'textarea' || !isTextControl(control.type) || control.form === null) return;
    await this._submit(page, page.forms.defaultButton(control.form), control.form);
  }

  // Rendering

  /** Paint only the document into `viewport` of `buffer` */
  paintPage(buffer: TerminalBuffer, viewport: Bounds, scrollY?: number): void {
    const page = this.currentPage;
    if (!page) return;
    const edit = this._edit;
    paintDocument(buffer, page.layout, {
      tree: page.document.tree,
      forms: page.forms,
      theme: this.theme,
      viewport,
      scrollY: scrollY ?? page.scrollY,
      focused: page.focused,
      editing: edit?.target === 'control' ? { node: edit.node, ...edit.buffer } : null,
      images: this._settings.images,
    });
  }

  chromeState(): ChromeState {
    const page = this.currentPage;
    const edit = this._edit;
    return {
      title: page?.document.title ?? '',
      url: page?.document.url ?? '',
      status: this._status,
      hover: page ? this._focusedTarget(page) : null,
      address: edit?.target === 'address' ? edit.buffer : null,
      scrollY: page?.scrollY ?? 0,
      documentHeight: page?.layout.height ?? 0,
      pageRows: this.pageRows,
      tabs: { active: this._active, count: this._tabs.length },
    };
  }

  /**
   * Full repaint of the terminal: page rows between the title bar and the
   * status line. The same state always paints the same grid.
   */
  render(buffer: TerminalBuffer): void {
    const theme = this.theme;
    buffer.clear(theme.background);
    this.paintPage(buffer, { x: 0, y: 1, width: buffer.width, height: Math.max(0, buffer.height - CHROME_ROWS) });
    paintChrome(buffer, this.chromeState(), theme);
  }

  private _focusedTarget(page: Page): string | null {
    if (page.focused === null || page.forms.control(page.focused)) return null;
    const href = page.document.tree.getAttribute(page.focused, 'href');
    if (href === undefined) return null;
    const resolved = resolveUrl(href, page.document.baseUrl);
    return resolved.ok ? resolved.url : href;
  }
}

/** Statuses worth retrying later: timeouts, rate limits and server errors */
function isTransientStatus(status: number): boolean {
  return status === 408 || status === 429 || status >= 500;
}

/** Interactables that can take focus: visible, and not hidden or disabled controls */
function focusables(page: Page): Interactable[] {
  return page.layout.interactables.filter(item => {
    if (!item.rects.some(rect => rect.width > 0 && rect.height > 0)) return false;
    if (item.kind === 'link') return true;
    const control = page.forms.control(item.node);
    return control !== undefined && control.type !== 'hidden' && !control.disabled;
  });
}

function firstRect(item: Interactable): Bounds {
  return item.rects.find(rect => rect.width > 0 && rect.height > 0) ?? item.rects[0];
}

/**
 * Document row of the element a fragment names (`id`, or `name` on an
 * anchor), or null when there is none or it generated no box.
 */
export function fragmentRow(page: Page, fragment: string): number | null {
  const { tree, root } = page.document;
  let target: NodeHandle | null = null;
  for (const node of tree.descendants(root)) {
    if (node.kind !== 'element') continue;
    const id = tree.getAttribute(node.handle, 'id');
    const name = node.tagName === 'a' ? tree.getAttribute(node.handle, 'name') : undefined;
    if (id === fragment || name === fragment) {
      target = node.handle;
      break;
    }
  }
  if (target === null) return null;

  const inside = new Set<NodeHandle>();
  for (const node of tree.descendants(target)) inside.add(node.handle);

  for (const box of walkBoxes(page.layout.root)) {
    switch (box.kind) {
      case 'block':
        if (box.node !== null && inside.has(box.node)) return borderBox(box.geometry).y;
        break;
      case 'inline':
        if (box.node !== null && inside.has(box.node)) return box.fragments[0]?.y ?? box.geometry.content.y;
        break;
      case 'replaced':
      case 'form-control':
        if (box.node !== null && inside.has(box.node)) return box.geometry.content.y;
        break;
      case 'anonymous':
        for (const line of box.lines) {
          for (const fragment of line.fragments) {
            if (fragment.kind === 'text' && fragment.run.node !== null && inside.has(fragment.run.node)) return line.y;
          }
        }
        break;
    }
  }
  return null;
}
