/**
 * Configuration loading from multiple sources.
 *
 * Priority (highest to lowest):
 * 1. CLI arguments
 * 2. Environment variables
 * 3. Config file
 * 4. Defaults
 */

import { readFileSync, existsSync } from 'node:fs';
import { resolve } from 'node:path';
import {
  ConfigurationError,
  FlattenMode,
  PrintMode,
  escapePolicyByName,
  isFlattenMode,
  isPrintMode,
  resolveFlattenOptions,
  type FlattenOptions,
} from 'flatkey';
import { configLog } from '../common/logger.js';
import {
  type FlatkeyConfig,
  type PartialFlatkeyConfig,
  DEFAULT_CONFIG,
} from './types.js';

export const DEFAULT_CONFIG_FILE = 'flatkey.json';

export function parseFlattenMode(value: string, label: string): FlattenMode {
  if (!isFlattenMode(value)) {
    throw new ConfigurationError(
      `Invalid ${label} '${value}' (expected one of ${Object.values(FlattenMode).join(', ')})`
    );
  }
  return value;
}

export function parsePrintMode(value: string, label: string): PrintMode {
  if (!isPrintMode(value)) {
    throw new ConfigurationError(
      `Invalid ${label} '${value}' (expected one of ${Object.values(PrintMode).join(', ')})`
    );
  }
  return value;
}

/**
 * Splits a two-character bracket pair such as `<>` into left and right.
 */
export function parseBracketPair(value: string, label: string): [string, string] {
  const chars = [...value];
  if (chars.length !== 2) {
    throw new ConfigurationError(`${label} must be exactly two characters, got '${value}'`);
  }
  return [chars[0], chars[1]];
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function expectString(value: unknown, key: string, source: string): string {
  if (typeof value !== 'string') {
    throw new ConfigurationError(`Invalid config value for '${key}' in ${source}: expected a string`);
  }
  return value;
}

/**
 * Validates the parsed content of a config file.
 */
function parseConfigObject(raw: unknown, source: string): PartialFlatkeyConfig {
  if (!isRecord(raw)) {
    throw new ConfigurationError(`Config file ${source} must contain a JSON object`);
  }

  const config: PartialFlatkeyConfig = {};
  const { flattenMode, escapePolicy, separator, leftBracket, rightBracket, printMode, lazy } = raw;

  if (flattenMode !== undefined) {
    config.flattenMode = parseFlattenMode(expectString(flattenMode, 'flattenMode', source), `flattenMode in ${source}`);
  }
  if (escapePolicy !== undefined) config.escapePolicy = expectString(escapePolicy, 'escapePolicy', source);
  if (separator !== undefined) config.separator = expectString(separator, 'separator', source);
  if (leftBracket !== undefined) config.leftBracket = expectString(leftBracket, 'leftBracket', source);
  if (rightBracket !== undefined) config.rightBracket = expectString(rightBracket, 'rightBracket', source);
  if (printMode !== undefined) {
    config.printMode = parsePrintMode(expectString(printMode, 'printMode', source), `printMode in ${source}`);
  }
  if (lazy !== undefined) {
    if (typeof lazy !== 'boolean') {
      throw new ConfigurationError(`Invalid config value for 'lazy' in ${source}: expected a boolean`);
    }
    config.lazy = lazy;
  }

  return config;
}

/**
 * Load configuration from a JSON file.
 */
export function loadConfigFile(configPath: string): PartialFlatkeyConfig {
  const resolved = resolve(configPath);
  if (!existsSync(resolved)) {
    configLog('Config file not found: %s', resolved);
    return {};
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(readFileSync(resolved, 'utf-8'));
  } catch (err) {
    configLog('Failed to parse config file %s: %O', resolved, err);
    throw new ConfigurationError(`Failed to parse config file: ${resolved}`);
  }

  const config = parseConfigObject(parsed, resolved);
  configLog('Loaded config from %s', resolved);
  return config;
}

/**
 * Load configuration from environment variables.
 */
export function loadEnvConfig(): PartialFlatkeyConfig {
  const config: PartialFlatkeyConfig = {};

  if (process.env.FLATKEY_MODE) {
    config.flattenMode = parseFlattenMode(process.env.FLATKEY_MODE, 'FLATKEY_MODE');
  }
  if (process.env.FLATKEY_ESCAPE) {
    config.escapePolicy = process.env.FLATKEY_ESCAPE;
  }
  if (process.env.FLATKEY_SEPARATOR) {
    config.separator = process.env.FLATKEY_SEPARATOR;
  }
  if (process.env.FLATKEY_BRACKETS) {
    [config.leftBracket, config.rightBracket] = parseBracketPair(process.env.FLATKEY_BRACKETS, 'FLATKEY_BRACKETS');
  }
  if (process.env.FLATKEY_PRINT) {
    config.printMode = parsePrintMode(process.env.FLATKEY_PRINT, 'FLATKEY_PRINT');
  }
  if (process.env.FLATKEY_LAZY) {
    config.lazy = process.env.FLATKEY_LAZY === 'true' || process.env.FLATKEY_LAZY === '1';
  }

  return config;
}

function mergeConfig(
  base: FlatkeyConfig,
  ...overrides: PartialFlatkeyConfig[]
): FlatkeyConfig {
  const result = { ...base };

  for (const override of overrides) {
    if (override.flattenMode !== undefined) result.flattenMode = override.flattenMode;
    if (override.escapePolicy !== undefined) result.escapePolicy = override.escapePolicy;
    if (override.separator !== undefined) result.separator = override.separator;
    if (override.leftBracket !== undefined) result.leftBracket = override.leftBracket;
    if (override.rightBracket !== undefined) result.rightBracket = override.rightBracket;
    if (override.printMode !== undefined) result.printMode = override.printMode;
    if (override.lazy !== undefined) result.lazy = override.lazy;
  }

  return result;
}

/**
 * Load full configuration from all sources.
 */
export function loadConfig(options: {
  configPath?: string;
  overrides?: PartialFlatkeyConfig;
} = {}): FlatkeyConfig {
  const sources: PartialFlatkeyConfig[] = [];

  // Load from file if specified or default exists
  const configPath = options.configPath || DEFAULT_CONFIG_FILE;
  if (options.configPath || existsSync(configPath)) {
    sources.push(loadConfigFile(configPath));
  }

  sources.push(loadEnvConfig());

  if (options.overrides) {
    sources.push(options.overrides);
  }

  const config = mergeConfig(DEFAULT_CONFIG, ...sources);
  configLog('Final config: %O', config);

  return config;
}

/**
 * Resolves a configuration into validated flatten options.
 * @throws ConfigurationError for an unknown escape policy or invalid punctuation
 */
export function toFlattenOptions(config: FlatkeyConfig): FlattenOptions {
  return resolveFlattenOptions({
    flattenMode: config.flattenMode,
    escapePolicy: escapePolicyByName(config.escapePolicy),
    separator: config.separator,
    leftBracket: config.leftBracket,
    rightBracket: config.rightBracket,
    printMode: config.printMode,
  });
}
