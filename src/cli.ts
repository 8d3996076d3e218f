#!/usr/bin/env node

/**
 * specforge CLI entry point
 */

import { runCli } from './cli/main.js';
import { createNodeRuntime } from './cli/runtime.js';
import { ENGINE_INFO } from './constants/index.js';

runCli(process.argv, { cliVersion: ENGINE_INFO.VERSION, runtime: createNodeRuntime() }).then(
  (code) => {
    process.exitCode = code;
  },
  (error: unknown) => {
    process.stderr.write(`${error instanceof Error ? (error.stack ?? error.message) : String(error)}\n`);
    process.exitCode = 1;
  }
);
