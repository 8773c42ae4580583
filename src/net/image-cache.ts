// Decoded image cache shared by every page of a session

import type { Pixmap } from '../types.js';

/** Permanent failures are cached too, so they are not retried per page */
export type CachedImage = { ok: true; pixmap: Pixmap } | { ok: false; error: string };

/** Bytes charged for a failure entry, so failures take part in eviction */
export const FAILURE_COST = 1024;

function costOf(entry: CachedImage): number {
  return entry.ok ? entry.pixmap.data.length : FAILURE_COST;
}

/**
 * LRU cache of decoded images keyed by URL, bounded by the bytes of pixel
 * data it holds. Uses Map's insertion order for recency.
 */
export class ImageCache {
  private readonly _entries = new Map<string, CachedImage>();
  private readonly _maxBytes: number;
  private _bytes = 0;

  constructor(maxBytes: number) {
    if (maxBytes < 1) {
      throw new RangeError('Image cache size must be at least 1 byte');
    }
    this._maxBytes = maxBytes;
  }

  /**
   * Get an entry, marking it most recently used
   */
  get(url: string): CachedImage | undefined {
    const entry = this._entries.get(url);
    if (entry !== undefined) {
      this._entries.delete(url);
      this._entries.set(url, entry);
    }
    return entry;
  }

  has(url: string): boolean {
    return this._entries.has(url);
  }

  /**
   * Store an entry, evicting the least recently used ones until the cache
   * fits. An image larger than the whole cache is not kept.
   */
  set(url: string, entry: CachedImage): void {
    this.delete(url);
    const cost = costOf(entry);
    if (cost > this._maxBytes) return;

    this._entries.set(url, entry);
    this._bytes += cost;
    for (const [oldest, value] of this._entries) {
      if (this._bytes <= this._maxBytes) break;
      this._entries.delete(oldest);
      this._bytes -= costOf(value);
    }
  }

  /** Drop a cached failure so the next load fetches the image again */
  forgetFailure(url: string): boolean {
    const existing = this._entries.get(url);
    return existing !== undefined && !existing.ok && this.delete(url);
  }

  delete(url: string): boolean {
    const existing = this._entries.get(url);
    if (existing === undefined) return false;
    this._bytes -= costOf(existing);
    return this._entries.delete(url);
  }

  clear(): void {
    this._entries.clear();
    this._bytes = 0;
  }

  get size(): number {
    return this._entries.size;
  }

  /** Bytes of pixel data held, with failures at FAILURE_COST each */
  get bytes(): number {
    return this._bytes;
  }
}
