/**
 * flatkey-cli - command line front end for flatkey
 */

export { run, runFlatten, createProgram, VERSION } from './cli.js';
export type { CliIo, CliDeps } from './cli.js';
export * from './config/index.js';
