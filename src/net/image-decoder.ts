// Image decoding: PNG, JPEG and GIF (first frame) to RGBA pixmaps

import { decode as decodePng } from 'fast-png';
import jpeg from 'jpeg-js';
import omggif from 'omggif';
import type { Pixmap } from '../types.js';
import { ensureError } from '../utils/error.js';

export type ImageFormat = 'png' | 'jpeg' | 'gif';

export type DecodeResult =
  | { ok: true; pixmap: Pixmap }
  | { ok: false; error: string };

/** Images with more pixels than this are not decoded */
export const MAX_IMAGE_PIXELS = 40_000_000;

/**
 * Detect image format from magic bytes
 */
export function detectImageFormat(bytes: Uint8Array): ImageFormat | null {
  // PNG magic: 0x89 0x50 0x4E 0x47
  if (bytes[0] === 0x89 && bytes[1] === 0x50 && bytes[2] === 0x4e && bytes[3] === 0x47) {
    return 'png';
  }
  // JPEG magic: 0xFF 0xD8 0xFF
  if (bytes[0] === 0xff && bytes[1] === 0xd8 && bytes[2] === 0xff) {
    return 'jpeg';
  }
  // GIF magic: GIF87a or GIF89a
  if (bytes[0] === 0x47 && bytes[1] === 0x49 && bytes[2] === 0x46 &&
      bytes[3] === 0x38 && (bytes[4] === 0x37 || bytes[4] === 0x39) && bytes[5] === 0x61) {
    return 'gif';
  }
  return null;
}

/**
 * Decode PNG image bytes, expanding palette, grey and 16-bit data to 8-bit RGBA
 */
function decodePngImage(bytes: Uint8Array): Pixmap {
  const decoded = decodePng(bytes);
  const { width, height, channels } = decoded;
  const source = decoded.data;
  // 16-bit samples keep their high byte
  const sample = source instanceof Uint16Array
    ? (i: number) => source[i] >> 8
    : (i: number) => source[i];

  const data = new Uint8Array(width * height * 4);
  const palette = decoded.palette;
  for (let i = 0; i < width * height; i++) {
    const o = i * 4;
    if (palette && channels === 1) {
      // Indexed PNG: expand the palette entry
      const color = palette[source[i]] ?? [0, 0, 0];
      data[o] = color[0] ?? 0;
      data[o + 1] = color[1] ?? 0;
      data[o + 2] = color[2] ?? 0;
      data[o + 3] = color[3] ?? 255;
    } else if (channels === 1 || channels === 2) {
      // Grayscale (+ alpha)
      const gray = sample(i * channels);
      data[o] = gray;
      data[o + 1] = gray;
      data[o + 2] = gray;
      data[o + 3] = channels === 2 ? sample(i * 2 + 1) : 255;
    } else {
      // RGB or RGBA
      data[o] = sample(i * channels);
      data[o + 1] = sample(i * channels + 1);
      data[o + 2] = sample(i * channels + 2);
      data[o + 3] = channels === 4 ? sample(i * 4 + 3) : 255;
    }
  }
  return { width, height, data };
}

/**
 * Decode JPEG image bytes (jpeg-js with formatAsRGBA always gives RGBA)
 */
function decodeJpegImage(bytes: Uint8Array): Pixmap {
  const decoded = jpeg.decode(bytes, { useTArray: true, formatAsRGBA: true, maxResolutionInMP: MAX_IMAGE_PIXELS / 1_000_000 });
  return { width: decoded.width, height: decoded.height, data: new Uint8Array(decoded.data) };
}

/**
 * Decode GIF image bytes (first frame only)
 */
function decodeGifImage(bytes: Uint8Array): Pixmap {
  const reader = new omggif.GifReader(bytes);
  const { width, height } = reader;
  const data = new Uint8Array(width * height * 4);
  reader.decodeAndBlitFrameRGBA(0, data);
  return { width, height, data };
}

/**
 * Decode image bytes to RGBA, detecting the format from magic bytes.
 * Unsupported formats and corrupt data are returned as errors.
 */
export function decodeImage(bytes: Uint8Array): DecodeResult {
  const format = detectImageFormat(bytes);
  if (format === null) return { ok: false, error: 'Unsupported image format' };
  try {
    let pixmap: Pixmap;
    switch (format) {
      case 'png':
        pixmap = decodePngImage(bytes);
        break;
      case 'jpeg':
        pixmap = decodeJpegImage(bytes);
        break;
      case 'gif':
        pixmap = decodeGifImage(bytes);
        break;
    }
    if (pixmap.width * pixmap.height > MAX_IMAGE_PIXELS) {
      return { ok: false, error: `Image too large (${pixmap.width}x${pixmap.height})` };
    }
    return { ok: true, pixmap };
  } catch (error) {
    return { ok: false, error: `Invalid ${format.toUpperCase()} data: ${ensureError(error).message}` };
  }
}
