#!/usr/bin/env node
/**
 * monty-hall CLI entry point.
 */

import type { CommandIO } from './commands/play';
import { createProgram } from './program';

const io: CommandIO = {
  stdout: (text) => {
    process.stdout.write(text);
  },
  stderr: (text) => {
    process.stderr.write(text);
  },
  env: process.env,
  color: process.stdout.isTTY === true,
};

createProgram(io)
  .parseAsync(process.argv)
  .catch((err: unknown) => {
    process.stderr.write(`Error: ${err instanceof Error ? err.message : String(err)}\n`);
    process.exitCode = 2;
  });
