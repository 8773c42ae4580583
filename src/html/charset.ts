// Byte → text decoding for documents

import { getLogger } from '../logging.js';

const logger = getLogger('Charset');

const CHARSET_PARAM = /charset\s*=\s*["']?([\w.:-]+)/i;
const META_CHARSET = /<meta[^>]+charset\s*=\s*["']?([\w.:-]+)/i;

/**
 * Pick the document encoding: BOM, then the Content-Type parameter, then a
 * `<meta charset>` in the first kilobyte, then UTF-8.
 */
export function sniffCharset(bytes: Uint8Array, contentType?: string): string {
  if (bytes[0] === 0xef && bytes[1] === 0xbb && bytes[2] === 0xbf) return 'utf-8';
  if (bytes[0] === 0xfe && bytes[1] === 0xff) return 'utf-16be';
  if (bytes[0] === 0xff && bytes[1] === 0xfe) return 'utf-16le';

  const fromHeader = contentType ? CHARSET_PARAM.exec(contentType)?.[1] : undefined;
  if (fromHeader) return fromHeader.toLowerCase();

  const head = new TextDecoder('latin1').decode(bytes.subarray(0, 1024));
  const fromMeta = META_CHARSET.exec(head)?.[1];
  return fromMeta ? fromMeta.toLowerCase() : 'utf-8';
}

export function decodeText(bytes: Uint8Array, contentType?: string): string {
  const charset = sniffCharset(bytes, contentType);
  let decoder: TextDecoder;
  try {
    decoder = new TextDecoder(charset);
  } catch {
    logger.debug('Unsupported charset, decoding as UTF-8', { charset });
    decoder = new TextDecoder('utf-8');
  }
  return decoder.decode(bytes);
}
