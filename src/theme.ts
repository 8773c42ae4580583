// Themes: page default colors and browser chrome, plus terminal color detection

import { Env } from './env.js';
import type { ColorMode, ThemeName } from './config/config.js';
import type { ColorSupport, Rgb } from './types.js';

export interface Theme {
  name: ThemeName;
  /** Canvas color when the page sets none */
  background: Rgb;
  /** Text color when the page sets none */
  text: Rgb;
  /** Title and status bars */
  ui: Rgb;
  /** Links and form controls */
  interactive: Rgb;
  /** Error messages in the status line */
  error: Rgb;
}

export const THEMES: Readonly<Record<ThemeName, Theme>> = {
  light: {
    name: 'light',
    background: { r: 255, g: 255, b: 255 },
    text: { r: 0, g: 0, b: 0 },
    ui: { r: 174, g: 175, b: 204 },
    interactive: { r: 129, g: 154, b: 255 },
    error: { r: 170, g: 0, b: 0 },
  },
  dark: {
    name: 'dark',
    background: { r: 55, g: 55, b: 55 },
    text: { r: 255, g: 255, b: 255 },
    ui: { r: 0, g: 0, b: 0 },
    interactive: { r: 192, g: 212, b: 255 },
    error: { r: 255, g: 85, b: 85 },
  },
};

export function getTheme(name: ThemeName): Theme {
  return THEMES[name];
}

export function otherTheme(name: ThemeName): ThemeName {
  return name === 'light' ? 'dark' : 'light';
}

// Terminal capability detection

/**
 * Detect terminal color support level from COLORTERM, TERM and NO_COLOR
 */
export function detectColorSupport(): ColorSupport {
  if (Env.has('NO_COLOR')) return 'none';
  const colorterm = Env.get('COLORTERM') || '';
  const term = Env.get('TERM') || '';

  // Truecolor support
  if (colorterm === 'truecolor' || colorterm === '24bit') {
    return 'truecolor';
  }

  // 256 color support
  if (term.includes('256color') || term.includes('256-color')) {
    return '256';
  }

  // Basic color support (xterm, etc.)
  if (term.includes('color') || term.includes('xterm') || term.includes('screen') || term.includes('tmux') || term === 'linux') {
    return '16';
  }

  return term === 'dumb' ? 'none' : '16';
}

export function resolveColorSupport(mode: ColorMode): ColorSupport {
  return mode === 'auto' ? detectColorSupport() : mode;
}
