#!/usr/bin/env tsx
/**
 * CLI entry point for flatkey.
 */

import { run } from '../cli.js';

process.exitCode = await run(process.argv.slice(2), {
  io: {
    stdout: text => process.stdout.write(text),
    stderr: text => process.stderr.write(text),
  },
  stdin: process.stdin,
});
