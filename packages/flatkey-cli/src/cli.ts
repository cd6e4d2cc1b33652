import { createReadStream } from 'node:fs';
import { Command } from 'commander';
import chalk from 'chalk';
import {
  FlattenMode,
  JsonFlattener,
  enableLogging,
  unwrapError,
  type JsonChunkSource,
} from 'flatkey';
import { cliLog } from './common/logger.js';
import {
  loadConfig,
  parseBracketPair,
  parsePrintMode,
  toFlattenOptions,
  type FlatkeyConfig,
  type PartialFlatkeyConfig,
} from './config/index.js';

export const VERSION = '0.1.0';

/** Where the command writes its output. */
export interface CliIo {
  stdout: (text: string) => void;
  stderr: (text: string) => void;
  /** Colorize error output; defaults to true */
  color?: boolean;
}

export interface CliDeps {
  io: CliIo;
  /** Read when no file argument is given */
  stdin: JsonChunkSource;
}

interface CliOptions {
  keepArrays?: boolean;
  separator?: string;
  brackets?: string;
  escape?: string;
  print?: string;
  config?: string;
  lazy?: boolean;
  color: boolean;
  debug?: string;
}

function reportError(io: CliIo, error: unknown): void {
  cliLog('Command failed: %O', error);
  const [first, ...causes] = unwrapError(error);
  const lines = [
    `Error: ${first?.message ?? String(error)}`,
    ...causes.map(cause => `  caused by ${cause.name}: ${cause.message}`),
  ];
  const text = lines.join('\n');
  io.stderr((io.color !== false ? chalk.red(text) : text) + '\n');
}

/**
 * Flattens one JSON document and writes it to `io.stdout`.
 * Errors go to `io.stderr`.
 *
 * @returns the process exit code
 */
export async function runFlatten(input: string | JsonChunkSource, config: FlatkeyConfig, io: CliIo): Promise<number> {
  try {
    const options = toFlattenOptions(config);
    let flattener: JsonFlattener;
    if (typeof input === 'string') {
      flattener = config.lazy ? JsonFlattener.lazy(input, options) : JsonFlattener.of(input, options);
    } else {
      flattener = await JsonFlattener.fromStream(input, { ...options, lazy: config.lazy });
    }
    io.stdout(flattener.flatten() + '\n');
    return 0;
  } catch (error) {
    reportError(io, error);
    return 1;
  }
}

function buildOverrides(options: CliOptions): PartialFlatkeyConfig {
  const overrides: PartialFlatkeyConfig = {};

  if (options.keepArrays) overrides.flattenMode = FlattenMode.KEEP_ARRAYS;
  if (options.separator !== undefined) overrides.separator = options.separator;
  if (options.brackets !== undefined) {
    [overrides.leftBracket, overrides.rightBracket] = parseBracketPair(options.brackets, '--brackets');
  }
  if (options.escape !== undefined) overrides.escapePolicy = options.escape;
  if (options.print !== undefined) overrides.printMode = parsePrintMode(options.print, '--print');
  if (options.lazy) overrides.lazy = true;

  return overrides;
}

/**
 * Builds the `flatkey` command. `onExit` receives the exit code once the
 * action finishes.
 */
export function createProgram(deps: CliDeps, onExit: (code: number) => void): Command {
  const { io, stdin } = deps;
  const program = new Command();

  program
    .name('flatkey')
    .description('Flatten nested JSON into single-level key/value JSON')
    .version(VERSION)
    .argument('[file]', 'JSON file to flatten (reads stdin when omitted)')
    .option('-k, --keep-arrays', 'store non-empty arrays whole instead of flattening them')
    .option('-s, --separator <char>', 'character joining member names')
    .option('-b, --brackets <pair>', 'two characters around indices and fenced names, e.g. "<>"')
    .option('-e, --escape <policy>', 'string escaping: default, all-slashes, all-unicodes, all')
    .option('-p, --print <mode>', 'output layout: minimal, regular, pretty')
    .option('--config <path>', 'load configuration from file')
    .option('--lazy', 'defer parsing until the document is flattened')
    .option('--no-color', 'disable colored output')
    .option('--debug <namespaces>', 'debug namespaces (e.g., "flatkey:*")')
    .configureOutput({
      writeOut: text => io.stdout(text),
      writeErr: text => io.stderr(text),
    })
    .action(async (file: string | undefined, options: CliOptions) => {
      if (options.debug) {
        enableLogging(options.debug);
      }

      const runIo: CliIo = { ...io, color: options.color && io.color !== false };
      let config: FlatkeyConfig;
      try {
        config = loadConfig({
          configPath: options.config,
          overrides: buildOverrides(options),
        });
        // Settings are checked before the input file is opened
        toFlattenOptions(config);
      } catch (error) {
        reportError(runIo, error);
        onExit(1);
        return;
      }

      cliLog('Flattening %s', file ?? 'stdin');
      const input = file !== undefined ? createReadStream(file) : stdin;
      onExit(await runFlatten(input, config, runIo));
    });

  return program;
}

/**
 * Runs the command with user arguments (no node or script path).
 *
 * @returns the process exit code
 */
export async function run(argv: readonly string[], deps: CliDeps): Promise<number> {
  let exitCode = 0;
  const program = createProgram(deps, code => {
    exitCode = code;
  });
  await program.parseAsync([...argv], { from: 'user' });
  return exitCode;
}
