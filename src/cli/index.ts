#!/usr/bin/env node

/**
 * Interview CLI entry point.
 *
 * This is the main entry point for the 'interview' CLI command.
 */

import { createInputReader, createOutputWriter } from './io.js';
import { runCli } from './main.js';
import { resolveDisplayOptions } from './utils/displayUtils.js';

const input = createInputReader();

runCli(process.argv.slice(2), {
  cwd: process.cwd(),
  env: process.env,
  input,
  output: createOutputWriter(),
  display: resolveDisplayOptions(process.env, process.stdout.isTTY),
}).then(
  (exitCode) => {
    input.close();
    process.exitCode = exitCode;
  },
  (error: unknown) => {
    input.close();
    console.error('Unexpected error:', error instanceof Error ? error.message : String(error));
    if (error instanceof Error && error.stack) {
      console.error(error.stack);
    }
    process.exitCode = 1;
  }
);
