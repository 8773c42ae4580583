// Config module exports

export {
  ToadConfig,
  ConfigError,
  CONFIG_SCHEMA,
  getDefaultConfigFile,
  isRecord,
  type ColorMode,
  type ConfigInitOptions,
  type ConfigSource,
  type ThemeName,
} from './config.js';
export { parseCliFlags, generateFlagHelp, generateEnvVarHelp, type ParsedCliFlags } from './cli.js';
