import chalk from 'chalk';
import type { Command } from 'commander';

import { translate } from '../../engine.js';
import { exitWithFailure, readTextFile, resolveCommandConfig, writeTextFile } from './shared.js';
import type { CommandContext } from './shared.js';

export type TranslateCommandOptions = {
  prompt: string;
  provider: string;
  model: string;
  mode: string;
  output?: string;
};

export function createTranslateCommand(program: Command, ctx: CommandContext): void {
  program
    .command('translate')
    .description('Translate a prompt spec into a provider request for one model')
    .requiredOption('--prompt <file>', 'Prompt spec JSON file')
    .requiredOption('--provider <file>', 'Provider spec JSON file')
    .requiredOption('--model <id>', 'Model id or alias declared by the provider spec')
    .option('--mode <mode>', 'standard (degrade) or strict (fail on unsupported features)', 'standard')
    .option('-o, --output <file>', 'Write the translation to a file instead of stdout')
    .action(async (options: TranslateCommandOptions, command: Command) => {
      const config = resolveCommandConfig(command, ctx);
      if (!config.ok) {
        exitWithFailure(ctx, config);
      }
      const promptText = readTextFile(options.prompt, 'prompt spec');
      if (!promptText.ok) {
        exitWithFailure(ctx, promptText);
      }
      const providerText = readTextFile(options.provider, 'provider spec');
      if (!providerText.ok) {
        exitWithFailure(ctx, providerText);
      }

      const result = translate(promptText.value, providerText.value, options.model, options.mode, {
        config: config.value
      });
      if (!result.ok) {
        exitWithFailure(ctx, result);
      }
      if (!options.output) {
        ctx.log(result.value);
        return;
      }
      const written = writeTextFile(options.output, `${result.value}\n`);
      if (!written.ok) {
        exitWithFailure(ctx, written);
      }
      ctx.log(`${chalk.green('✓')} Translation written to ${options.output}`);
    });
}
