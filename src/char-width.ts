// Display width of text in terminal cells, after wcwidth

/**
 * Width of one code point in cells: 0 for combining marks, zero-width
 * characters and controls, 2 for East Asian wide characters and emoji,
 * 1 otherwise.
 */
export function charWidth(char: string): number {
  const codePoint = char.codePointAt(0);
  if (codePoint === undefined) return 0;
  if (codePoint < 32 || (codePoint >= 0x7f && codePoint < 0xa0)) return 0;
  if (isZeroWidth(codePoint)) return 0;
  if (isWide(codePoint)) return 2;
  return 1;
}

export function stringWidth(text: string): number {
  // ASCII fast path
  if (/^[\x20-\x7e]*$/.test(text)) return text.length;
  let width = 0;
  for (const char of text) {
    width += charWidth(char);
  }
  return width;
}

/**
 * Longest prefix of `text` that fits in `width` cells. A wide character that
 * would straddle the limit is left out.
 */
export function truncateToWidth(text: string, width: number): string {
  if (width <= 0) return '';
  let used = 0;
  let result = '';
  for (const char of text) {
    const w = charWidth(char);
    if (used + w > width) break;
    used += w;
    result += char;
  }
  return result;
}

/** Pad with spaces (or truncate) to exactly `width` cells */
export function fitToWidth(text: string, width: number): string {
  const truncated = truncateToWidth(text, width);
  return truncated + ' '.repeat(Math.max(0, width - stringWidth(truncated)));
}

function isZeroWidth(codePoint: number): boolean {
  // combining marks
  if (codePoint >= 0x0300 && codePoint <= 0x036F) return true;
  if (codePoint >= 0x1AB0 && codePoint <= 0x1AFF) return true;
  if (codePoint >= 0x1DC0 && codePoint <= 0x1DFF) return true;
  if (codePoint >= 0x20D0 && codePoint <= 0x20FF) return true;
  if (codePoint >= 0xFE20 && codePoint <= 0xFE2F) return true;
  // variation selectors
  if (codePoint >= 0xFE00 && codePoint <= 0xFE0F) return true;
  // soft hyphen, zero width space/joiners, directional marks, BOM
  if (codePoint === 0x00AD) return true;
  if (codePoint >= 0x200B && codePoint <= 0x200F) return true;
  if (codePoint >= 0x2060 && codePoint <= 0x2064) return true;
  if (codePoint === 0xFEFF) return true;
  return false;
}

function isWide(codePoint: number): boolean {
  if (codePoint >= 0x1100 && codePoint <= 0x115F) return true; // Hangul Jamo
  if (codePoint >= 0x2329 && codePoint <= 0x232A) return true;
  if (codePoint >= 0x2E80 && codePoint <= 0x303E) return true; // CJK radicals, symbols
  if (codePoint >= 0x3040 && codePoint <= 0xA4CF) return true; // Hiragana .. Yi
  if (codePoint >= 0xAC00 && codePoint <= 0xD7A3) return true; // Hangul syllables
  if (codePoint >= 0xF900 && codePoint <= 0xFAFF) return true;
  if (codePoint >= 0xFE10 && codePoint <= 0xFE19) return true;
  if (codePoint >= 0xFE30 && codePoint <= 0xFE6F) return true;
  if (codePoint >= 0xFF00 && codePoint <= 0xFF60) return true; // fullwidth forms
  if (codePoint >= 0xFFE0 && codePoint <= 0xFFE6) return true;
  if (codePoint >= 0x1F300 && codePoint <= 0x1F64F) return true; // emoji
  if (codePoint >= 0x1F680 && codePoint <= 0x1F6FF) return true;
  if (codePoint >= 0x1F900 && codePoint <= 0x1F9FF) return true;
  if (codePoint >= 0x1FA70 && codePoint <= 0x1FAFF) return true;
  if (codePoint >= 0x20000 && codePoint <= 0x3FFFD) return true; // CJK extensions
  return false;
}
