#!/usr/bin/env node

import { runCli } from './cli/program';
import { createProcessRuntime } from './cli/runtime';

runCli(process.argv.slice(2), createProcessRuntime())
  .then(code => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    const message = error instanceof Error ? error.message : String(error);
    process.stderr.write(`Error: Unexpected error: ${message}\n`);
    process.exitCode = 1;
  });
