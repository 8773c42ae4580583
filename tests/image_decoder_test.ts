// Tests for PNG, JPEG and GIF decoding

import { test } from 'node:test';
import assert from 'node:assert/strict';
import { encode as encodePng } from 'fast-png';
import jpeg from 'jpeg-js';
import omggif from 'omggif';
import { decodeImage, detectImageFormat, type Pixmap } from '../mod.js';

function decoded(bytes: Uint8Array): Pixmap {
  const result = decodeImage(bytes);
  assert.ok(result.ok, result.ok ? '' : result.error);
  return result.pixmap;
}

test('detectImageFormat - magic bytes', () => {
  assert.equal(detectImageFormat(Uint8Array.of(0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a)), 'png');
  assert.equal(detectImageFormat(Uint8Array.of(0xff, 0xd8, 0xff, 0xe0)), 'jpeg');
  assert.equal(detectImageFormat(new TextEncoder().encode('GIF89a')), 'gif');
  assert.equal(detectImageFormat(new TextEncoder().encode('GIF87a')), 'gif');
  assert.equal(detectImageFormat(new TextEncoder().encode('<svg>')), null);
  assert.equal(detectImageFormat(new Uint8Array()), null);
});

test('decodeImage - unsupported and corrupt data', () => {
  assert.deepEqual(decodeImage(new TextEncoder().encode('RIFF....WEBP')), { ok: false, error: 'Unsupported image format' });
  const corrupt = decodeImage(Uint8Array.of(0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a, 0, 0));
  assert.equal(corrupt.ok, false);
  if (!corrupt.ok) assert.match(corrupt.error, /^Invalid PNG data: /);
});

test('decodeImage - RGBA PNG', () => {
  const png = encodePng({ width: 2, height: 1, data: Uint8Array.of(255, 0, 0, 255, 0, 0, 255, 128), channels: 4, depth: 8 });
  const pixmap = decoded(png);
  assert.equal(pixmap.width, 2);
  assert.equal(pixmap.height, 1);
  assert.deepEqual([...pixmap.data], [255, 0, 0, 255, 0, 0, 255, 128]);
});

test('decodeImage - greyscale PNG expands to RGBA', () => {
  const png = encodePng({ width: 2, height: 1, data: Uint8Array.of(0, 200), channels: 1, depth: 8 });
  assert.deepEqual([...decoded(png).data], [0, 0, 0, 255, 200, 200, 200, 255]);
});

test('decodeImage - 16-bit PNG keeps the high byte', () => {
  const png = encodePng({ width: 1, height: 1, data: Uint16Array.of(0x1234, 0xabcd, 0xffff), channels: 3, depth: 16 });
  assert.deepEqual([...decoded(png).data], [0x12, 0xab, 0xff, 255]);
});

test('decodeImage - GIF first frame', () => {
  const buffer = Buffer.alloc(256);
  const writer = new omggif.GifWriter(buffer, 2, 1, { palette: [0xff0000, 0x0000ff] });
  writer.addFrame(0, 0, 2, 1, [0, 1]);
  const length = writer.end();
  const pixmap = decoded(new Uint8Array(buffer.subarray(0, length)));
  assert.equal(pixmap.width, 2);
  assert.deepEqual([...pixmap.data], [255, 0, 0, 255, 0, 0, 255, 255]);
});

test('decodeImage - JPEG', () => {
  const width = 8;
  const height = 8;
  const data = Buffer.alloc(width * height * 4, 128);
  const encoded = jpeg.encode({ data, width, height }, 90);
  const pixmap = decoded(new Uint8Array(encoded.data));
  assert.equal(pixmap.width, 8);
  assert.equal(pixmap.height, 8);
  assert.equal(pixmap.data.length, 8 * 8 * 4);
  assert.ok(Math.abs(pixmap.data[0] - 128) <= 4);
  assert.equal(pixmap.data[3], 255);
});
