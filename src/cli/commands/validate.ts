import chalk from 'chalk';
import type { Command } from 'commander';

import { toValidationReportJson, validateText } from '../../engine.js';
import type { ValidationFinding, ValidationReport } from '../../validation/types.js';
import { exitWithFailure, readTextFile, resolveCommandConfig } from './shared.js';
import type { CommandContext } from './shared.js';

export type ValidateCommandOptions = {
  type: string;
  mode: string;
  json?: boolean;
};

export function formatReport(report: ValidationReport): string[] {
  const status = report.valid ? chalk.green('✓') : chalk.red('✗');
  const verdict = report.valid ? 'valid' : 'invalid';
  const errors = report.findings.filter((finding) => finding.severity === 'error').length;
  const warnings = report.findings.length - errors;
  const lines = [`${status} ${report.specType} is ${verdict} (${report.mode}): ${errors} error(s), ${warnings} warning(s)`];
  for (const finding of report.findings) {
    lines.push(`  ${formatSeverity(finding)} ${finding.path}: ${finding.message}`);
  }
  return lines;
}

function formatSeverity(finding: ValidationFinding): string {
  return finding.severity === 'error' ? chalk.red('error  ') : chalk.yellow('warning');
}

export function createValidateCommand(program: Command, ctx: CommandContext): void {
  program
    .command('validate <file>')
    .description('Validate a prompt spec or provider spec')
    .requiredOption('-t, --type <type>', 'prompt_spec or provider_spec')
    .option('-m, --mode <mode>', 'basic, partial or strict', 'basic')
    .option('--json', 'Print the report as JSON')
    .action(async (file: string, options: ValidateCommandOptions, command: Command) => {
      const config = resolveCommandConfig(command, ctx);
      if (!config.ok) {
        exitWithFailure(ctx, config);
      }
      const text = readTextFile(file, 'spec');
      if (!text.ok) {
        exitWithFailure(ctx, text);
      }
      const report = validateText(text.value, options.type, options.mode, { config: config.value });
      if (!report.ok) {
        exitWithFailure(ctx, report);
      }

      const lines = options.json ? [JSON.stringify(toValidationReportJson(report.value), null, 2)] : formatReport(report.value);
      for (const line of lines) {
        ctx.log(line);
      }
      if (!report.value.valid) {
        ctx.exit(1);
      }
    });
}
