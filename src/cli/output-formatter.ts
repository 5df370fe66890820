/**
 * CLI Output Formatter
 *
 * Converts CliResult to styled text with chalk. Status text never goes to
 * stdout while a transform is producing data there: success results carry no
 * output and failures print to stderr.
 */

import chalk from 'chalk';
import type { CliResult, CliOutput } from './types/cli-result.js';

export function formatOutput(output: CliOutput): string {
  const lines: string[] = [];

  lines.push(chalk.red(`b64url: ${output.message}`));

  if (output.details && output.details.length > 0) {
    output.details.forEach((detail) => {
      lines.push(chalk.white(`  ${detail}`));
    });
  }

  if (output.suggestions && output.suggestions.length > 0) {
    output.suggestions.forEach((suggestion) => {
      lines.push(chalk.gray(`  hint: ${suggestion}`));
    });
  }

  return lines.join('\n');
}

export function formatResult(result: CliResult): string {
  switch (result.kind) {
    case 'success':
      return '';

    case 'failure':
      return formatOutput(result.output);
  }
}

export function printResult(result: CliResult): void {
  if (result.kind === 'failure') {
    console.error(formatResult(result));
  }
}
