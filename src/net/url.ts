// URL helpers for navigation targets typed by the user or found in documents

import { existsSync } from 'node:fs';
import { resolve } from 'node:path';
import process from 'node:process';
import { pathToFileURL } from 'node:url';

export type UrlResult =
  | { ok: true; url: string }
  | { ok: false; error: string };

const SUPPORTED_SCHEMES = new Set(['http:', 'https:', 'file:', 'data:']);

/**
 * Check if a string starts with a URL scheme. `host:port` is not a scheme.
 */
export function hasScheme(input: string): boolean {
  return /^(https?|file|data):/i.test(input) || /^[a-z][a-z0-9+.-]*:\/\//i.test(input);
}

export function isSupportedUrl(url: string): boolean {
  try {
    return SUPPORTED_SCHEMES.has(new URL(url).protocol);
  } catch {
    return false;
  }
}

/**
 * Resolve a reference against a base URL. Whitespace around the reference
 * is ignored; a reference that cannot be resolved is an error.
 */
export function resolveUrl(input: string, base: string | null): UrlResult {
  const reference = input.trim();
  try {
    const url = base === null ? new URL(reference) : new URL(reference, base);
    if (!SUPPORTED_SCHEMES.has(url.protocol)) {
      return { ok: false, error: `Unsupported URL scheme: ${url.protocol}` };
    }
    return { ok: true, url: url.href };
  } catch {
    return { ok: false, error: `Invalid URL: ${reference}` };
  }
}

/**
 * Turn what the user typed into an absolute URL. Existing paths become
 * `file:` URLs, anything else without a scheme gets `https://`.
 */
export function normalizeCliInput(input: string, cwd: string = process.cwd()): UrlResult {
  const text = input.trim();
  if (text === '') return { ok: false, error: 'Empty address' };
  if (hasScheme(text)) return resolveUrl(text, null);

  const path = resolve(cwd, text);
  if (existsSync(path)) return { ok: true, url: pathToFileURL(path).href };
  return resolveUrl(`https://${text}`, null);
}

/** URL without its fragment, for comparing documents */
export function stripFragment(url: string): string {
  const hash = url.indexOf('#');
  return hash === -1 ? url : url.slice(0, hash);
}

/** Fragment identifier of a URL, decoded, or null */
export function fragmentOf(url: string): string | null {
  const hash = url.indexOf('#');
  if (hash === -1 || hash === url.length - 1) return null;
  try {
    return decodeURIComponent(url.slice(hash + 1));
  } catch {
    return url.slice(hash + 1);
  }
}
