// XDG Base Directory Specification support
// https://specifications.freedesktop.org/basedir/latest/

import { mkdirSync } from 'node:fs';
import { homedir } from 'node:os';
import { join } from 'node:path';
import { Env } from './env.js';

const APP_NAME = 'toad';

function getHomeDir(): string {
  return Env.get('HOME') || Env.get('USERPROFILE') || homedir();
}

/**
 * Get the XDG config directory for user-specific configuration files.
 *
 * Default: $HOME/.config/toad
 */
export function getConfigDir(): string {
  const baseDir = Env.get('XDG_CONFIG_HOME') || join(getHomeDir(), '.config');
  return join(baseDir, APP_NAME);
}

/**
 * Get the XDG cache directory for non-essential cached data such as logs.
 *
 * Default: $HOME/.cache/toad
 */
export function getCacheDir(): string {
  const baseDir = Env.get('XDG_CACHE_HOME') || join(getHomeDir(), '.cache');
  return join(baseDir, APP_NAME);
}

/**
 * Ensure a directory exists, creating it recursively if needed.
 */
export function ensureDir(path: string): void {
  mkdirSync(path, { recursive: true });
}
