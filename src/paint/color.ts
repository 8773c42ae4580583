// Terminal color quantization: truecolor passes through, 256-color maps onto
// the xterm cube and grey ramp, 16-color picks the nearest VGA entry in Oklab.

import type { Rgba } from '../css/values.js';
import type { ColorSupport, Rgb, TerminalColor } from '../types.js';

// Pre-computed sRGB→linear LUT (eliminates Math.pow from hot path)
const SRGB_TO_LINEAR = new Float64Array(256);
for (let i = 0; i < 256; i++) {
  const s = i / 255;
  SRGB_TO_LINEAR[i] = s <= 0.04045 ? s / 12.92 : Math.pow((s + 0.055) / 1.055, 2.4);
}

function channel(value: number): number {
  return Math.max(0, Math.min(255, Math.round(value)));
}

export function srgbToOklab(r: number, g: number, b: number): [number, number, number] {
  const lr = SRGB_TO_LINEAR[channel(r)];
  const lg = SRGB_TO_LINEAR[channel(g)];
  const lb = SRGB_TO_LINEAR[channel(b)];

  const l = 0.4122214708 * lr + 0.5363325363 * lg + 0.0514459929 * lb;
  const m = 0.2119034982 * lr + 0.6806995451 * lg + 0.1073969566 * lb;
  const s = 0.0883024619 * lr + 0.2817188376 * lg + 0.6299787005 * lb;

  const l_ = Math.cbrt(l);
  const m_ = Math.cbrt(m);
  const s_ = Math.cbrt(s);

  return [
    0.2104542553 * l_ + 0.7936177850 * m_ - 0.0040720468 * s_,
    1.9779984951 * l_ - 2.4285922050 * m_ + 0.4505937099 * s_,
    0.0259040371 * l_ + 0.7827717662 * m_ - 0.8086757660 * s_,
  ];
}

// --- VGA palette: canonical RGB for each of the 16 colors, in SGR order ---

export const VGA_16: readonly Rgb[] = [
  { r: 0, g: 0, b: 0 },
  { r: 170, g: 0, b: 0 },
  { r: 0, g: 170, b: 0 },
  { r: 170, g: 85, b: 0 },
  { r: 0, g: 0, b: 170 },
  { r: 170, g: 0, b: 170 },
  { r: 0, g: 170, b: 170 },
  { r: 170, g: 170, b: 170 },
  { r: 85, g: 85, b: 85 },
  { r: 255, g: 85, b: 85 },
  { r: 85, g: 255, b: 85 },
  { r: 255, g: 255, b: 85 },
  { r: 85, g: 85, b: 255 },
  { r: 255, g: 85, b: 255 },
  { r: 85, g: 255, b: 255 },
  { r: 255, g: 255, b: 255 },
];

const VGA_OKLAB = VGA_16.map(c => srgbToOklab(c.r, c.g, c.b));

/** Index 0-15 of the VGA color closest to `color` */
export function nearest16(color: Rgb): number {
  const [L, A, B] = srgbToOklab(color.r, color.g, color.b);
  let best = 0;
  let bestDistance = Infinity;
  VGA_OKLAB.forEach(([l, a, b], index) => {
    const distance = (L - l) ** 2 + (A - a) ** 2 + (B - b) ** 2;
    if (distance < bestDistance) {
      bestDistance = distance;
      best = index;
    }
  });
  return best;
}

// xterm 6x6x6 cube levels
const CUBE_LEVELS = [0, 95, 135, 175, 215, 255];

function nearestCubeLevel(value: number): number {
  let best = 0;
  for (let i = 1; i < CUBE_LEVELS.length; i++) {
    if (Math.abs(CUBE_LEVELS[i] - value) < Math.abs(CUBE_LEVELS[best] - value)) best = i;
  }
  return best;
}

/** xterm-256 index of the closest cube or grey-ramp entry */
export function nearest256(color: Rgb): number {
  const ri = nearestCubeLevel(color.r);
  const gi = nearestCubeLevel(color.g);
  const bi = nearestCubeLevel(color.b);
  const cube = { r: CUBE_LEVELS[ri], g: CUBE_LEVELS[gi], b: CUBE_LEVELS[bi] };
  const cubeIndex = 16 + 36 * ri + 6 * gi + bi;

  // grey ramp 232-255: 8, 18, ..., 238
  const average = (color.r + color.g + color.b) / 3;
  const greyStep = Math.max(0, Math.min(23, Math.round((average - 8) / 10)));
  const grey = 8 + greyStep * 10;

  const distance = (c: Rgb) => (c.r - color.r) ** 2 + (c.g - color.g) ** 2 + (c.b - color.b) ** 2;
  return distance({ r: grey, g: grey, b: grey }) < distance(cube) ? 232 + greyStep : cubeIndex;
}

/**
 * Color as sent to a terminal with the given support, or null when the
 * terminal gets no color at all.
 */
export function quantize(color: Rgb, support: ColorSupport): TerminalColor | null {
  switch (support) {
    case 'none':
      return null;
    case '16':
      return { kind: 'indexed', index: nearest16(color) };
    case '256':
      return { kind: 'indexed', index: nearest256(color) };
    case 'truecolor':
      return { kind: 'rgb', r: channel(color.r), g: channel(color.g), b: channel(color.b) };
  }
}

/** Composite a translucent color over an opaque background */
export function blend(color: Rgba, background: Rgb): Rgb {
  if (color.a >= 255) return { r: color.r, g: color.g, b: color.b };
  const alpha = color.a / 255;
  return {
    r: Math.round(color.r * alpha + background.r * (1 - alpha)),
    g: Math.round(color.g * alpha + background.g * (1 - alpha)),
    b: Math.round(color.b * alpha + background.b * (1 - alpha)),
  };
}
