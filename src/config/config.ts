// Configuration for toad, driven by schema.json
//
// Priority order (lowest to highest):
// 1. Schema defaults
// 2. File config (~/.config/toad/config.json)
// 3. Env vars
// 4. CLI flags (explicit user intent)

import { existsSync, readFileSync, writeFileSync } from 'node:fs';
import { dirname, join } from 'node:path';
import schema from './schema.json' with { type: 'json' };
import { Env } from '../env.js';
import { ensureDir, getConfigDir } from '../xdg.js';
import { getLogger, isLogLevel, type LogLevel } from '../logging.js';
import { ensureError } from '../utils/error.js';
import { VERSION } from '../version.js';

const logger = getLogger('Config');

/**
 * Schema property definition
 */
export interface ConfigProperty {
  type: string;
  default?: unknown;
  env?: string;
  envInverted?: boolean;
  flag?: string;
  flagInverted?: boolean;
  enum?: string[];
  minimum?: number;
  persist?: boolean;
  description?: string;
}

export interface ConfigSchema {
  properties: Record<string, ConfigProperty>;
}

export const CONFIG_SCHEMA: ConfigSchema = schema;

export type ConfigSource = 'default' | 'file' | 'env' | 'cli' | 'runtime';

export type ThemeName = 'light' | 'dark';
export type ColorMode = 'auto' | 'none' | '16' | '256' | 'truecolor';

export interface ConfigInitOptions {
  cliFlags?: Record<string, unknown>;
  /** Overrides the config file location (tests point this at a temp dir) */
  configFile?: string;
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

/**
 * Coerce a raw string (env var, CLI value) to the schema type.
 * Returns undefined for values the schema rejects.
 */
export function coerceValue(raw: string, prop: ConfigProperty): unknown {
  switch (prop.type) {
    case 'boolean':
      return raw === 'true' || raw === '1';
    case 'integer': {
      const value = Number.parseInt(raw, 10);
      if (Number.isNaN(value)) return undefined;
      return prop.minimum !== undefined && value < prop.minimum ? prop.minimum : value;
    }
    case 'number': {
      const value = Number.parseFloat(raw);
      return Number.isNaN(value) ? undefined : value;
    }
    default:
      if (prop.enum && !prop.enum.includes(raw)) return undefined;
      return raw;
  }
}

function getPath(obj: Record<string, unknown>, path: string): unknown {
  if (path in obj) {
    return obj[path];
  }
  let current: unknown = obj;
  for (const part of path.split('.')) {
    if (!isRecord(current)) return undefined;
    current = current[part];
  }
  return current;
}

function setPath(obj: Record<string, unknown>, path: string, value: unknown): void {
  const parts = path.split('.');
  let current = obj;
  for (const part of parts.slice(0, -1)) {
    const next = current[part];
    if (isRecord(next)) {
      current = next;
    } else {
      const created: Record<string, unknown> = {};
      current[part] = created;
      current = created;
    }
  }
  current[parts[parts.length - 1]] = value;
}

export function getDefaultConfigFile(): string {
  return join(getConfigDir(), 'config.json');
}

function loadConfigFile(path: string): Record<string, unknown> {
  if (!existsSync(path)) return {};
  try {
    const parsed: unknown = JSON.parse(readFileSync(path, 'utf8'));
    if (isRecord(parsed)) return parsed;
    logger.warn('Config file is not a JSON object, ignoring', { path });
  } catch (error) {
    logger.warn('Config file could not be read, ignoring', { path, reason: ensureError(error).message });
  }
  return {};
}

let _instance: ToadConfig | null = null;

export class ToadConfig {
  private data: Record<string, unknown> = {};
  private sources: Record<string, ConfigSource> = {};

  private constructor(
    readonly configFile: string,
    fileConfig: Record<string, unknown>,
    cliFlags: Record<string, unknown>,
  ) {
    for (const [path, prop] of Object.entries(CONFIG_SCHEMA.properties)) {
      const { value, source } = this.resolveValue(path, prop, fileConfig, cliFlags);
      this.data[path] = value;
      this.sources[path] = source;
    }
  }

  private resolveValue(
    path: string,
    prop: ConfigProperty,
    fileConfig: Record<string, unknown>,
    cliFlags: Record<string, unknown>,
  ): { value: unknown; source: ConfigSource } {
    // Flag inversion already happened in parseCliFlags
    if (prop.flag && cliFlags[path] !== undefined) {
      return { value: cliFlags[path], source: 'cli' };
    }

    if (prop.env) {
      const envVal = Env.get(prop.env);
      if (envVal !== undefined) {
        const parsed = coerceValue(envVal, prop);
        if (parsed !== undefined) {
          return { value: prop.envInverted ? !parsed : parsed, source: 'env' };
        }
        logger.warn(`Ignoring invalid ${prop.env}`, { value: envVal });
      }
    }

    const fileVal = getPath(fileConfig, path);
    if (fileVal !== undefined) return { value: fileVal, source: 'file' };

    return { value: prop.default, source: 'default' };
  }

  /**
   * Initialize config (call once at startup)
   */
  static init(options: ConfigInitOptions = {}): ToadConfig {
    if (_instance) {
      throw new ConfigError('ToadConfig already initialized. Call reset() first if re-initialization is needed.');
    }
    const configFile = options.configFile ?? getDefaultConfigFile();
    _instance = new ToadConfig(configFile, loadConfigFile(configFile), options.cliFlags ?? {});
    return _instance;
  }

  /**
   * Get initialized config (auto-inits with defaults if not initialized)
   */
  static get(): ToadConfig {
    return _instance ?? this.init();
  }

  /**
   * Reset singleton (for testing)
   */
  static reset(): void {
    _instance = null;
  }

  /**
   * Apply CLI flags to existing config (for late initialization)
   */
  static applyCliFlags(cliFlags: Record<string, unknown>): void {
    if (!_instance) {
      this.init({ cliFlags });
      return;
    }
    for (const [path, prop] of Object.entries(CONFIG_SCHEMA.properties)) {
      if (prop.flag && cliFlags[path] !== undefined) {
        _instance.data[path] = cliFlags[path];
        _instance.sources[path] = 'cli';
      }
    }
  }

  /**
   * Current config formatted as text (for --print-config)
   */
  getConfigText(): string {
    const lines: string[] = [];
    lines.push('Toad Configuration');
    lines.push('==================');
    lines.push('');
    lines.push(`Config file: ${this.configFile}${existsSync(this.configFile) ? '' : ' (not found)'}`);
    lines.push('Priority: default < file < env < cli');
    lines.push('');

    for (const [path, prop] of Object.entries(CONFIG_SCHEMA.properties)) {
      const value = this.data[path];
      const displayValue = value === undefined ? '(not set)' : String(value);
      const source = this.sources[path];
      let sourceStr = '';
      switch (source) {
        case 'env':
          sourceStr = ` <- ${prop.env}`;
          break;
        case 'cli':
          sourceStr = ` <- ${prop.flag}`;
          break;
        case 'file':
          sourceStr = ' <- config.json';
          break;
        case 'runtime':
          sourceStr = ' <- runtime';
          break;
        case 'default':
          break;
      }
      lines.push(`  ${path} = ${displayValue}${sourceStr}`);
    }
    return lines.join('\n');
  }

  getString(key: string, defaultValue: string): string {
    const value = this.data[key];
    if (value === undefined || value === null) return defaultValue;
    return String(value);
  }

  getBoolean(key: string, defaultValue: boolean): boolean {
    const value = this.data[key];
    if (value === undefined || value === null) return defaultValue;
    if (typeof value === 'boolean') return value;
    if (typeof value === 'string') return value === 'true' || value === '1';
    return Boolean(value);
  }

  getNumber(key: string, defaultValue: number): number {
    const value = this.data[key];
    if (typeof value === 'number') return value;
    if (typeof value === 'string') {
      const parsed = Number.parseFloat(value);
      return Number.isNaN(parsed) ? defaultValue : parsed;
    }
    return defaultValue;
  }

  getSource(key: string): ConfigSource | undefined {
    return this.sources[key];
  }

  /**
   * Set a value at runtime. Values coming from strings are coerced to the
   * schema type.
   */
  setValue(key: string, value: unknown): void {
    const prop = CONFIG_SCHEMA.properties[key];
    const coerced = prop && typeof value === 'string' ? coerceValue(value, prop) ?? value : value;
    this.data[key] = coerced;
    this.sources[key] = 'runtime';
    logger.info(`Config updated: ${key} = ${JSON.stringify(coerced)}`);
  }

  /**
   * Write the persistable settings (schema `persist: true`) back to the
   * config file, keeping any other keys already there.
   */
  saveSettings(): void {
    const fileConfig = loadConfigFile(this.configFile);
    for (const [path, prop] of Object.entries(CONFIG_SCHEMA.properties)) {
      if (prop.persist) {
        setPath(fileConfig, path, this.data[path]);
      }
    }
    try {
      ensureDir(dirname(this.configFile));
      writeFileSync(this.configFile, JSON.stringify(fileConfig, null, 2) + '\n');
      logger.debug('Settings saved', { path: this.configFile });
    } catch (error) {
      logger.warn('Could not save settings', { path: this.configFile, reason: ensureError(error).message });
    }
  }

  // Typed getters

  get theme(): ThemeName {
    return this.getString('theme', 'light') === 'dark' ? 'dark' : 'light';
  }

  get colorMode(): ColorMode {
    const value = this.getString('color', 'auto');
    switch (value) {
      case 'none':
      case '16':
      case '256':
      case 'truecolor':
        return value;
      default:
        return 'auto';
    }
  }

  get imagesEnabled(): boolean {
    return this.getBoolean('images.enabled', true);
  }

  get networkTimeout(): number {
    return this.getNumber('network.timeout', 15000);
  }

  get userAgent(): string {
    return this.getString('network.userAgent', `Toad/${VERSION}`);
  }

  get logLevel(): LogLevel {
    const level = this.getString('log.level', 'INFO').toUpperCase();
    return isLogLevel(level) ? level : 'INFO';
  }

  get logFile(): string | undefined {
    const value = this.data['log.file'];
    return typeof value === 'string' ? value : undefined;
  }

  get dumpEnabled(): boolean {
    return this.getBoolean('dump.enabled', false);
  }

  get dumpWidth(): number {
    return this.getNumber('dump.width', 80);
  }

  get dumpHeight(): number {
    return this.getNumber('dump.height', 0);
  }
}
