/**
 * CLI Output Formatter
 *
 * Human-readable lines go to stderr, so stdout carries only the JSON payload
 * and can be piped.
 */

import chalk from 'chalk';
import type { CliResult, CliOutput } from './types/cli-result.js';

export function formatOutput(output: CliOutput, isError: boolean = false): string {
  const lines: string[] = [];

  lines.push(isError ? chalk.red(`✗ ${output.message}`) : chalk.green(`✓ ${output.message}`));

  if (output.details && output.details.length > 0) {
    lines.push('');
    output.details.forEach((detail) => {
      lines.push(chalk.white(`  • ${detail}`));
    });
  }

  if (output.warnings && output.warnings.length > 0) {
    lines.push('');
    lines.push(chalk.yellow('Warnings:'));
    output.warnings.forEach((warning) => {
      lines.push(chalk.yellow(`  • ${warning}`));
    });
  }

  return lines.join('\n');
}

export function formatResult(result: CliResult): string {
  switch (result.kind) {
    case 'success':
      return result.output ? formatOutput(result.output, false) : '';

    case 'failure':
      return formatOutput(result.output, true);
  }
}

export function printResult(result: CliResult): void {
  const formatted = formatResult(result);
  if (formatted) console.error(formatted);

  const json = result.output?.json;
  if (json !== undefined) {
    console.log(JSON.stringify(json, null, 2));
  }
}
