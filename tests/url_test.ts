// Tests for URL resolution and address normalization

import { test } from 'node:test';
import assert from 'node:assert/strict';
import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { pathToFileURL } from 'node:url';
import { fragmentOf, hasScheme, isSupportedUrl, normalizeCliInput, resolveUrl, stripFragment } from '../mod.js';

test('resolveUrl - relative references', () => {
  assert.deepEqual(resolveUrl('../b.html', 'http://example.test/a/c.html'), { ok: true, url: 'http://example.test/b.html' });
  assert.deepEqual(resolveUrl('  page.html ', 'http://example.test/dir/'), { ok: true, url: 'http://example.test/dir/page.html' });
  assert.deepEqual(resolveUrl('#top', 'http://example.test/a'), { ok: true, url: 'http://example.test/a#top' });
});

test('resolveUrl - unsupported and invalid', () => {
  assert.deepEqual(resolveUrl('javascript:alert(1)', 'http://example.test/'), { ok: false, error: 'Unsupported URL scheme: javascript:' });
  assert.deepEqual(resolveUrl('relative', null), { ok: false, error: 'Invalid URL: relative' });
  assert.deepEqual(resolveUrl('http://[bad', null), { ok: false, error: 'Invalid URL: http://[bad' });
});

test('hasScheme - host and port is not a scheme', () => {
  assert.equal(hasScheme('localhost:8080'), false);
  assert.equal(hasScheme('http://example.test'), true);
  assert.equal(hasScheme('ftp://example.test'), true);
  assert.equal(hasScheme('data:text/plain,hi'), true);
});

test('isSupportedUrl', () => {
  assert.equal(isSupportedUrl('https://example.test/'), true);
  assert.equal(isSupportedUrl('file:///tmp/x.html'), true);
  assert.equal(isSupportedUrl('ftp://example.test/'), false);
  assert.equal(isSupportedUrl('garbage'), false);
});

test('normalizeCliInput - empty and bare host', () => {
  assert.deepEqual(normalizeCliInput('   '), { ok: false, error: 'Empty address' });
  assert.deepEqual(normalizeCliInput('example.test/path', '/nonexistent-toad-dir'), { ok: true, url: 'https://example.test/path' });
  assert.deepEqual(normalizeCliInput('http://example.test'), { ok: true, url: 'http://example.test/' });
});

test('normalizeCliInput - existing path becomes a file URL', () => {
  const dir = mkdtempSync(join(tmpdir(), 'toad-url-'));
  try {
    writeFileSync(join(dir, 'page.html'), '<p>x</p>');
    assert.deepEqual(normalizeCliInput('page.html', dir), { ok: true, url: pathToFileURL(join(dir, 'page.html')).href });
  } finally {
    rmSync(dir, { recursive: true, force: true });
  }
});

test('stripFragment and fragmentOf', () => {
  assert.equal(stripFragment('http://example.test/a#b'), 'http://example.test/a');
  assert.equal(stripFragment('http://example.test/a'), 'http://example.test/a');
  assert.equal(fragmentOf('http://example.test/a#sec%201'), 'sec 1');
  assert.equal(fragmentOf('http://example.test/a#'), null);
  assert.equal(fragmentOf('http://example.test/a'), null);
  assert.equal(fragmentOf('http://example.test/a#%E0%A4%A'), '%E0%A4%A');
});
