import { Command } from 'commander';

import { createRunCommand } from './commands/run.js';
import type { CommandContext } from './commands/shared.js';
import { createTranslateCommand } from './commands/translate.js';
import { createValidateCommand } from './commands/validate.js';
import type { CliRuntime } from './runtime.js';

export type CliProgramContext = {
  cliVersion: string;
  runtime: CliRuntime;
  exit: (code: number) => never;
};

export function createCliProgram(ctx: CliProgramContext): Command {
  const program = new Command();

  program.configureOutput({
    writeOut: (str) => ctx.runtime.writeOut(str),
    writeErr: (str) => ctx.runtime.writeErr(str)
  });
  // inherited by every subcommand added below: usage errors throw CommanderError
  program.exitOverride();

  program
    .name('specforge')
    .description('Translate prompt specs into provider requests, validate specs and run requests')
    .version(ctx.cliVersion)
    .option('-c, --config <file>', 'Engine configuration JSON file (or SPECFORGE_CONFIG)');

  const commandContext: CommandContext = {
    log: (line) => ctx.runtime.writeOut(`${line}\n`),
    error: (line) => ctx.runtime.writeErr(`${line}\n`),
    exit: ctx.exit,
    env: ctx.runtime.env
  };
  createTranslateCommand(program, commandContext);
  createValidateCommand(program, commandContext);
  createRunCommand(program, commandContext);

  return program;
}
