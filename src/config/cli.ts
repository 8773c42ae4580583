// CLI argument parser driven by schema.json

import { CONFIG_SCHEMA, ConfigError, coerceValue, type ConfigProperty } from './config.js';

export interface ParsedCliFlags {
  flags: Record<string, unknown>;
  remaining: string[];
}

/**
 * Parse CLI arguments based on schema flag definitions
 * @param args Command line arguments (typically process.argv.slice(2))
 * @returns Parsed flags keyed by config path, and the remaining arguments
 * @throws ConfigError when a flag is missing its value or the value is invalid
 */
export function parseCliFlags(args: string[]): ParsedCliFlags {
  const flags: Record<string, unknown> = {};
  const remaining: string[] = [];

  const flagMap = new Map<string, { path: string; prop: ConfigProperty }>();
  for (const [path, prop] of Object.entries(CONFIG_SCHEMA.properties)) {
    if (prop.flag) {
      flagMap.set(prop.flag, { path, prop });
    }
  }

  let i = 0;
  while (i < args.length) {
    const arg = args[i];

    // --flag=value syntax
    const eqIndex = arg.indexOf('=');
    let flagName = arg;
    let flagValue: string | undefined;
    if (eqIndex > 0 && arg.startsWith('--')) {
      flagName = arg.substring(0, eqIndex);
      flagValue = arg.substring(eqIndex + 1);
    }

    const entry = flagMap.get(flagName);
    if (!entry) {
      remaining.push(arg);
      i++;
      continue;
    }

    const { path, prop } = entry;
    if (prop.type === 'boolean') {
      flags[path] = !prop.flagInverted;
    } else {
      if (flagValue === undefined) {
        if (i + 1 < args.length && !args[i + 1].startsWith('--')) {
          flagValue = args[i + 1];
          i++;
        } else {
          const enumHint = prop.enum ? ` [${prop.enum.join('|')}]` : '';
          throw new ConfigError(`${flagName} requires a value${enumHint}`);
        }
      }
      const value = coerceValue(flagValue, prop);
      if (value === undefined) {
        const enumHint = prop.enum ? ` (expected ${prop.enum.join('|')})` : ` (expected ${prop.type})`;
        throw new ConfigError(`Invalid value for ${flagName}: ${flagValue}${enumHint}`);
      }
      flags[path] = value;
    }
    i++;
  }

  return { flags, remaining };
}

/**
 * Generate compact help for CLI flags (for --help)
 */
export function generateFlagHelp(): string {
  const lines: string[] = [];

  const flagEntries: Array<{ flag: string; prop: ConfigProperty }> = [];
  for (const prop of Object.values(CONFIG_SCHEMA.properties)) {
    if (prop.flag) {
      flagEntries.push({ flag: prop.flag, prop });
    }
  }
  flagEntries.sort((a, b) => a.flag.localeCompare(b.flag));

  for (const { flag, prop } of flagEntries) {
    let flagStr = flag;
    if (prop.type !== 'boolean') {
      flagStr += prop.enum ? ` <${prop.enum.join('|')}>` : ' <value>';
    }
    const envNote = prop.env ? ` (env: ${prop.env})` : '';
    lines.push(`  ${flagStr.padEnd(36)} ${prop.description ?? ''}${envNote}`);
  }

  return lines.join('\n');
}

/**
 * Generate environment variable reference
 */
export function generateEnvVarHelp(): string {
  const lines: string[] = ['Environment Variables:', ''];

  const envEntries = Object.values(CONFIG_SCHEMA.properties)
    .filter((prop): prop is ConfigProperty & { env: string } => prop.env !== undefined)
    .sort((a, b) => a.env.localeCompare(b.env));

  for (const prop of envEntries) {
    let typeInfo = '';
    if (prop.enum) {
      typeInfo = ` [${prop.enum.join('|')}]`;
    } else if (prop.type === 'boolean') {
      typeInfo = ' [true|false|1|0]';
    } else if (prop.type !== 'string') {
      typeInfo = ` (${prop.type})`;
    }
    const defaultStr = prop.default !== undefined ? ` (default: ${String(prop.default)})` : '';
    const invertedNote = prop.envInverted ? ' [set to disable]' : '';
    lines.push(`  ${prop.env}`);
    lines.push(`    ${prop.description ?? ''}${typeInfo}${defaultStr}${invertedNote}`);
  }

  return lines.join('\n');
}
