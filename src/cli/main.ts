import { CommanderError } from 'commander';

import { classifyError } from '../error-handling/error-classifier.js';
import { fail } from '../error-handling/error-kinds.js';
import { formatFailure } from './commands/shared.js';
import { createCliProgram } from './program.js';
import type { CliRuntime } from './runtime.js';

/** Thrown by the command context's `exit` so commands can stop without killing the process. */
export class CliExit extends Error {
  readonly exitCode: number;

  constructor(exitCode: number) {
    super(`exit ${exitCode}`);
    this.name = 'CliExit';
    this.exitCode = exitCode;
  }
}

export async function runCli(argv: string[], ctx: { cliVersion: string; runtime: CliRuntime }): Promise<number> {
  const program = createCliProgram({
    ...ctx,
    exit: (code) => {
      throw new CliExit(code);
    }
  });

  try {
    await program.parseAsync(argv, { from: 'node' });
    return 0;
  } catch (err) {
    if (err instanceof CliExit || err instanceof CommanderError) {
      return err.exitCode;
    }
    const { kind, message } = classifyError(err);
    ctx.runtime.writeErr(`${formatFailure(fail(kind, message))}\n`);
    return 1;
  }
}
