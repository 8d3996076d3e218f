import type { Command } from 'commander';

import { parseProviderRequest, run, runRequest } from '../../engine.js';
import { ErrorKind, fail, ok } from '../../error-handling/error-kinds.js';
import type { Outcome } from '../../error-handling/error-kinds.js';
import { normalizeResponse, toNormalizedResponseJson } from '../../execution/response-normalizer.js';
import { exitWithFailure, readTextFile, resolveCommandConfig } from './shared.js';
import type { CommandContext } from './shared.js';

export type RunCommandOptions = {
  timeout: string;
  normalize?: boolean;
};

/** `0` selects the configured default timeout. */
export function parseTimeoutOption(value: string): Outcome<number> {
  const trimmed = value.trim();
  if (!/^\d+$/.test(trimmed)) {
    return fail(ErrorKind.InvalidInput, `Timeout must be a non-negative whole number of seconds, got '${value}'`);
  }
  return ok(Number.parseInt(trimmed, 10));
}

export function createRunCommand(program: Command, ctx: CommandContext): void {
  program
    .command('run <request-file>')
    .description('Send a translated provider request and print the response body')
    .option('--timeout <seconds>', 'Request timeout in seconds (0 uses the configured default)', '0')
    .option('--normalize', 'Print a normalized response instead of the raw body')
    .action(async (file: string, options: RunCommandOptions, command: Command) => {
      const config = resolveCommandConfig(command, ctx);
      if (!config.ok) {
        exitWithFailure(ctx, config);
      }
      const timeout = parseTimeoutOption(options.timeout);
      if (!timeout.ok) {
        exitWithFailure(ctx, timeout);
      }
      const text = readTextFile(file, 'provider request');
      if (!text.ok) {
        exitWithFailure(ctx, text);
      }
      const env = ctx.env ?? process.env;

      if (!options.normalize) {
        const body = await run(text.value, timeout.value, { config: config.value, env });
        if (!body.ok) {
          exitWithFailure(ctx, body);
        }
        ctx.log(body.value);
        return;
      }

      const request = parseProviderRequest(text.value);
      if (!request.ok) {
        exitWithFailure(ctx, request);
      }
      const outcome = await runRequest(request.value, timeout.value, { config: config.value, env });
      if (!outcome.ok) {
        const retry = outcome.retryAfterSeconds !== undefined ? ` (retry after ${outcome.retryAfterSeconds}s)` : '';
        exitWithFailure(ctx, fail(outcome.kind, `${outcome.message}${retry}`));
      }
      const normalized = normalizeResponse(outcome.body);
      if (!normalized.ok) {
        exitWithFailure(ctx, normalized);
      }
      ctx.log(JSON.stringify(toNormalizedResponseJson(normalized.value), null, 2));
    });
}
