import fs from 'node:fs';
import chalk from 'chalk';
import type { Command } from 'commander';

import { loadEngineConfig } from '../../config/engine-config.js';
import type { EngineConfig } from '../../config/engine-config.js';
import { ErrorKind, errorKindName, fail, ok } from '../../error-handling/error-kinds.js';
import type { Failure, Outcome } from '../../error-handling/error-kinds.js';
import { decodeSpecText } from '../../spec/text-decoding.js';

export type CommandContext = {
  log: (line: string) => void;
  error: (line: string) => void;
  exit: (code: number) => never;
  /** defaults to process.env */
  env?: NodeJS.ProcessEnv;
};

type GlobalOptions = {
  config?: string;
};

/** Loads engine config from the global `--config` option and `SPECFORGE_*` env. */
export function resolveCommandConfig(command: Command, ctx: CommandContext): Outcome<EngineConfig> {
  const { config } = command.optsWithGlobals<GlobalOptions>();
  return loadEngineConfig({ configPath: config, env: ctx.env ?? process.env });
}

export function readTextFile(filePath: string, label: string): Outcome<string> {
  let bytes: Buffer;
  try {
    bytes = fs.readFileSync(filePath);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    return fail(ErrorKind.InvalidInput, `Cannot read ${label} file '${filePath}': ${reason}`);
  }
  return decodeSpecText(bytes, label);
}

export function writeTextFile(filePath: string, text: string): Outcome<void> {
  try {
    fs.writeFileSync(filePath, text, 'utf8');
    return ok(undefined);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    return fail(ErrorKind.InvalidInput, `Cannot write output file '${filePath}': ${reason}`);
  }
}

export function formatFailure(failure: Failure): string {
  return `${chalk.red('✗')} ${errorKindName(failure.kind)}: ${failure.message}`;
}

export function exitWithFailure(ctx: CommandContext, failure: Failure): never {
  ctx.error(formatFailure(failure));
  return ctx.exit(1);
}
