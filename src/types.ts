// Shared value types

export interface Rgb {
  r: number;
  g: number;
  b: number;
}

/**
 * Decoded image: `data` holds `width * height` RGBA quadruplets, row-major.
 */
export interface Pixmap {
  width: number;
  height: number;
  data: Uint8Array;
}

/** Color as sent to the terminal after quantization */
export type TerminalColor =
  | { kind: 'indexed'; index: number }
  | { kind: 'rgb'; r: number; g: number; b: number };

export type ColorSupport = 'none' | '16' | '256' | 'truecolor';
