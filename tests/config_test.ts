// Tests for configuration layering, CLI flags and saved settings

import { afterEach, beforeEach, test } from 'node:test';
import assert from 'node:assert/strict';
import { mkdtempSync, readFileSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { CONFIG_SCHEMA, ConfigError, Env, generateFlagHelp, Logger, parseCliFlags, setGlobalLogger, ToadConfig } from '../mod.js';

// TOAD_LOG_FILE is hidden below, so keep config warnings out of the default log
setGlobalLogger(new Logger({ logFile: '' }));

let dir = '';
let configFile = '';

beforeEach(() => {
  dir = mkdtempSync(join(tmpdir(), 'toad-config-'));
  configFile = join(dir, 'config.json');
  for (const prop of Object.values(CONFIG_SCHEMA.properties)) {
    if (prop.env) Env.override(prop.env, undefined);
  }
  ToadConfig.reset();
});

afterEach(() => {
  ToadConfig.reset();
  Env.resetOverrides();
  rmSync(dir, { recursive: true, force: true });
});

test('ToadConfig - schema defaults', () => {
  const config = ToadConfig.init({ configFile });
  assert.equal(config.theme, 'light');
  assert.equal(config.colorMode, 'auto');
  assert.equal(config.imagesEnabled, true);
  assert.equal(config.networkTimeout, 15000);
  assert.equal(config.userAgent, 'Toad/0.3.0');
  assert.equal(config.logLevel, 'INFO');
  assert.equal(config.logFile, undefined);
  assert.equal(config.dumpEnabled, false);
  assert.equal(config.dumpWidth, 80);
  assert.equal(config.getSource('theme'), 'default');
});

test('ToadConfig - config file values', () => {
  writeFileSync(configFile, JSON.stringify({ theme: 'dark', images: { enabled: false } }));
  const config = ToadConfig.init({ configFile });
  assert.equal(config.theme, 'dark');
  assert.equal(config.getSource('theme'), 'file');
  assert.equal(config.imagesEnabled, false);
  assert.equal(config.getSource('images.enabled'), 'file');
});

test('ToadConfig - a malformed config file is ignored', () => {
  writeFileSync(configFile, '{ not json');
  const config = ToadConfig.init({ configFile });
  assert.equal(config.theme, 'light');
});

test('ToadConfig - environment beats the file', () => {
  writeFileSync(configFile, JSON.stringify({ theme: 'dark' }));
  Env.override('TOAD_THEME', 'light');
  Env.override('TOAD_NO_IMAGES', '1');
  Env.override('TOAD_COLOR', 'bogus');
  Env.override('TOAD_TIMEOUT', '50');
  const config = ToadConfig.init({ configFile });
  assert.equal(config.theme, 'light');
  assert.equal(config.getSource('theme'), 'env');
  assert.equal(config.imagesEnabled, false);
  assert.equal(config.colorMode, 'auto');
  assert.equal(config.getSource('color'), 'default');
  assert.equal(config.networkTimeout, 100);
});

test('ToadConfig - CLI flags beat the environment', () => {
  Env.override('TOAD_THEME', 'light');
  const { flags, remaining } = parseCliFlags(['--theme', 'dark', '--no-images', 'http://a.test/']);
  assert.deepEqual(flags, { theme: 'dark', 'images.enabled': false });
  assert.deepEqual(remaining, ['http://a.test/']);

  const config = ToadConfig.init({ configFile, cliFlags: flags });
  assert.equal(config.theme, 'dark');
  assert.equal(config.getSource('theme'), 'cli');
  assert.equal(config.imagesEnabled, false);
});

test('ToadConfig - init twice is an error', () => {
  ToadConfig.init({ configFile });
  assert.throws(() => ToadConfig.init({ configFile }), ConfigError);
});

test('ToadConfig - saved settings keep other keys', () => {
  writeFileSync(configFile, JSON.stringify({ custom: 1 }));
  const config = ToadConfig.init({ configFile });
  config.setValue('theme', 'dark');
  config.setValue('images.enabled', 'false');
  assert.equal(config.getSource('theme'), 'runtime');
  assert.equal(config.imagesEnabled, false);
  config.saveSettings();

  const saved: unknown = JSON.parse(readFileSync(configFile, 'utf8'));
  assert.deepEqual(saved, { custom: 1, theme: 'dark', images: { enabled: false } });
  assert.ok(config.getConfigText().split('\n').includes('  theme = dark <- runtime'));
});

// ---

test('parseCliFlags - values', () => {
  assert.deepEqual(parseCliFlags(['--timeout=50', '--color', '256', '--dump']).flags, {
    'network.timeout': 100,
    color: '256',
    'dump.enabled': true,
  });
  assert.deepEqual(parseCliFlags(['--unknown', 'x']).remaining, ['--unknown', 'x']);
});

test('parseCliFlags - errors', () => {
  assert.throws(() => parseCliFlags(['--timeout']), { name: 'ConfigError', message: '--timeout requires a value' });
  assert.throws(() => parseCliFlags(['--color=bogus']), {
    name: 'ConfigError',
    message: 'Invalid value for --color: bogus (expected auto|none|16|256|truecolor)',
  });
  assert.throws(() => parseCliFlags(['--width', 'wide']), {
    name: 'ConfigError',
    message: 'Invalid value for --width: wide (expected integer)',
  });
});

test('generateFlagHelp - one line per flag', () => {
  const lines = generateFlagHelp().split('\n');
  assert.equal(lines.length, Object.values(CONFIG_SCHEMA.properties).filter(prop => prop.flag).length);
  assert.ok(lines.some(line => line.startsWith('  --theme <light|dark>')));
});
