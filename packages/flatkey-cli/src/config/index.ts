/**
 * Configuration module exports.
 */

export {
  type FlatkeyConfig,
  type PartialFlatkeyConfig,
  DEFAULT_CONFIG,
} from './types.js';

export {
  DEFAULT_CONFIG_FILE,
  loadConfig,
  loadConfigFile,
  loadEnvConfig,
  parseBracketPair,
  parseFlattenMode,
  parsePrintMode,
  toFlattenOptions,
} from './loader.js';
