// Toad CLI: browse a page in the terminal, or render it once to stdout

import process from 'node:process';
import { createInterface, type Interface } from 'node:readline';
import { AnsiOutputGenerator } from './ansi-output.js';
import { Browser, type BrowserSettings } from './browser.js';
import { DualBuffer, TerminalBuffer } from './buffer.js';
import { CHROME_ROWS } from './chrome.js';
import { ConfigError, generateEnvVarHelp, generateFlagHelp, parseCliFlags, ToadConfig, type ParsedCliFlags } from './config/mod.js';
import { KEY_HELP, mapKey } from './input.js';
import { createLogger, getGlobalLogger, getLogger, setGlobalLogger } from './logging.js';
import { FetchTransport } from './net/transport.js';
import { Terminal } from './terminal.js';
import { resolveColorSupport } from './theme.js';
import type { ColorSupport } from './types.js';
import { ensureError } from './utils/error.js';
import { VERSION } from './version.js';

const logger = getLogger('Main');

export function printUsage(): void {
  console.log(`Toad ${VERSION} - a web browser for the terminal`);
  console.log('');
  console.log('Usage:');
  console.log('  toad [options] [url | file]');
  console.log('');
  console.log('Without a URL, toad asks for one. Addresses without a scheme are');
  console.log('opened as local files when they exist, otherwise over https.');
  console.log('');
  console.log('Options:');
  console.log(generateFlagHelp());
  console.log(`  ${'--print-config'.padEnd(36)} Show the resolved configuration and exit`);
  console.log(`  ${'--version'.padEnd(36)} Show the version and exit`);
  console.log(`  ${'--help, -h'.padEnd(36)} Show this help message`);
  console.log('');
  console.log('Keys:');
  for (const [keys, action] of KEY_HELP) {
    console.log(`  ${keys.padEnd(26)} ${action}`);
  }
  console.log('');
  console.log(generateEnvVarHelp());
}

function settingsFrom(config: ToadConfig): BrowserSettings {
  return { theme: config.theme, images: config.imagesEnabled, timeoutMs: config.networkTimeout };
}

/** Persist runtime toggles to the config file */
function saveSettings(config: ToadConfig, settings: Readonly<BrowserSettings>): void {
  config.setValue('theme', settings.theme);
  config.setValue('images.enabled', settings.images);
  config.saveSettings();
}

/** One line from the prompt, or null once input is closed */
function ask(rl: Interface, query: string): Promise<string | null> {
  return new Promise(resolve => {
    const onClose = () => resolve(null);
    rl.once('close', onClose);
    rl.question(query, answer => {
      rl.off('close', onClose);
      resolve(answer);
    });
  });
}

/**
 * Ask for addresses until one loads. Returns false when input ends first.
 */
async function promptForPage(browser: Browser): Promise<boolean> {
  const rl = createInterface({ input: process.stdin, output: process.stdout });
  try {
    for (;;) {
      const answer = await ask(rl, 'URL: ');
      if (answer === null) return false;
      if (answer.trim() === '') continue;
      const result = await browser.open(answer);
      if (result.ok) return true;
      process.stderr.write(`toad: ${result.error}\n`);
    }
  } finally {
    rl.close();
  }
}

/**
 * Render the page once without chrome. A dump height of 0 prints the whole
 * document.
 */
async function dump(config: ToadConfig, url: string, colorSupport: ColorSupport): Promise<number> {
  const width = Math.max(1, Math.floor(config.dumpWidth));
  const height = Math.max(0, Math.floor(config.dumpHeight));
  const browser = new Browser({
    transport: new FetchTransport({ userAgent: config.userAgent }),
    size: { width, height: (height > 0 ? height : 24) + CHROME_ROWS },
    settings: settingsFrom(config),
  });
  const result = await browser.open(url);
  if (!result.ok) {
    process.stderr.write(`toad: ${result.error}\n`);
    return 1;
  }

  const rows = height > 0 ? height : Math.max(1, result.page.layout.height);
  const buffer = new TerminalBuffer(width, rows);
  browser.paintPage(buffer, { x: 0, y: 0, width, height: rows }, 0);
  const lines = new AnsiOutputGenerator({ colorSupport }).renderLines(buffer);
  process.stdout.write(lines.join('\n') + '\n');
  return 0;
}

/**
 * Full-screen session. Every event is followed by a full repaint; only the
 * cells that changed are written.
 */
async function browse(browser: Browser, terminal: Terminal, colorSupport: ColorSupport): Promise<void> {
  const size = terminal.size();
  await browser.resize(size);
  const buffers = new DualBuffer(size.width, size.height);
  const output = new AnsiOutputGenerator({ colorSupport });

  const draw = () => {
    browser.render(buffers.currentBuffer);
    const { diff } = buffers.swapAndGetDiff();
    terminal.writeFrame(output.generateOptimizedOutput(diff, buffers.width));
  };

  terminal.start();
  try {
    draw();
    while (!browser.quitRequested) {
      const next = await terminal.nextEvent();
      const event = next.kind === 'key' ? mapKey(next.key, browser.inputMode) : next.event;
      if (event === null) continue;
      if (event.type === 'resize') buffers.resize(event.width, event.height);
      await browser.handle(event);
      draw();
    }
  } finally {
    terminal.stop();
  }
}

/**
 * Run the CLI. Returns the process exit code: 0 on a clean exit, 1 when
 * the arguments are bad or no page could be shown.
 */
export async function main(args: string[]): Promise<number> {
  if (args.includes('--help') || args.includes('-h')) {
    printUsage();
    return 0;
  }
  if (args.includes('--version')) {
    console.log(VERSION);
    return 0;
  }

  let parsed: ParsedCliFlags;
  try {
    parsed = parseCliFlags(args);
  } catch (error) {
    if (error instanceof ConfigError) {
      console.error(`toad: ${error.message}`);
      console.error('Use --help for usage information');
      return 1;
    }
    throw error;
  }

  const printConfig = parsed.remaining.includes('--print-config');
  const positional = parsed.remaining.filter(arg => arg !== '--print-config');
  const unknown = positional.find(arg => arg.startsWith('--'));
  if (unknown !== undefined) {
    console.error(`toad: Unknown option: ${unknown}`);
    console.error('Use --help for usage information');
    return 1;
  }

  const config = ToadConfig.init({ cliFlags: parsed.flags });
  setGlobalLogger(createLogger({
    level: config.logLevel,
    ...(config.logFile !== undefined ? { logFile: config.logFile } : {}),
  }));

  if (printConfig) {
    console.log(config.getConfigText());
    return 0;
  }

  const url = positional[0];
  logger.info('Starting', { version: VERSION, url: url ?? null, dump: config.dumpEnabled });

  if (config.dumpEnabled) {
    if (url === undefined) {
      console.error('toad: --dump needs a URL');
      return 1;
    }
    // no colors when piped unless a mode was asked for
    const mode = config.colorMode === 'auto' && !process.stdout.isTTY ? 'none' : resolveColorSupport(config.colorMode);
    return dump(config, url, mode);
  }

  const terminal = new Terminal();
  if (!terminal.isInteractive) {
    console.error('toad: standard input and output must be a terminal (use --dump to print a page)');
    return 1;
  }

  const browser = new Browser({
    transport: new FetchTransport({ userAgent: config.userAgent }),
    size: terminal.size(),
    settings: settingsFrom(config),
    onSettingsChange: settings => saveSettings(config, settings),
  });

  if (url === undefined) {
    if (!(await promptForPage(browser))) return 0;
  } else {
    const result = await browser.open(url);
    if (!result.ok) {
      console.error(`toad: ${result.error}`);
      return 1;
    }
  }

  await browse(browser, terminal, resolveColorSupport(config.colorMode));
  logger.info('Exiting');
  return 0;
}

/** Entry point for the `toad` binary */
export function run(): void {
  main(process.argv.slice(2)).then(
    code => {
      getGlobalLogger().close();
      process.exit(code);
    },
    (error: unknown) => {
      const err = ensureError(error);
      logger.fatal('Unhandled error', err);
      getGlobalLogger().close();
      console.error(`toad: ${err.message}`);
      process.exit(1);
    },
  );
}
